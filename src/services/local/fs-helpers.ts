/**
 * Small fs/promises wrappers shared by the local stores.
 */

import fs from 'fs/promises';
import path from 'path';

// fs errors may come from another realm (e.g. under a test VM), so match on shape
export function isNotFoundError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export async function readFileOrNull(filePath: string): Promise<Buffer | null> {
    try {
        return await fs.readFile(filePath);
    } catch (error) {
        if (isNotFoundError(error)) return null;
        throw error;
    }
}

export async function pathExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/** Sorted names of the directories directly under root; empty when root is missing. */
export async function listDirectories(root: string): Promise<string[]> {
    try {
        const entries = await fs.readdir(root, { withFileTypes: true });
        return entries
            .filter((entry) => entry.isDirectory())
            .map((entry) => entry.name)
            .sort();
    } catch (error) {
        if (isNotFoundError(error)) return [];
        throw error;
    }
}

/** Sorted names of files in dir ending with ext; empty when dir is missing. */
export async function listFiles(dir: string, ext: string): Promise<string[]> {
    try {
        const entries = await fs.readdir(dir, { withFileTypes: true });
        return entries
            .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === ext)
            .map((entry) => entry.name)
            .sort();
    } catch (error) {
        if (isNotFoundError(error)) return [];
        throw error;
    }
}

/** Remove dir only when nothing is left in it. True when it was removed. */
export async function removeDirectoryIfEmpty(dir: string): Promise<boolean> {
    try {
        const remaining = await fs.readdir(dir);
        if (remaining.length > 0) return false;
        await fs.rmdir(dir);
        return true;
    } catch (error) {
        if (isNotFoundError(error)) return false;
        throw error;
    }
}

/** Remove a record directory. False when it did not exist. */
export async function removeDirectory(dir: string): Promise<boolean> {
    if (!(await pathExists(dir))) return false;
    await fs.rm(dir, { recursive: true, force: true });
    return true;
}

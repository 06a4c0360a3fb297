/**
 * Local Unknown-Face Store
 *
 * <FACES_DIR>/unknown/<id>/
 *   image.jpg      full source image
 *   face.jpg       cropped face (optional)
 *   metadata.json  written last
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { IUnknownFaceStore } from '../interfaces/storage.interface.js';
import { UnknownFace, UnknownFaceImageKind } from '../../types/face.js';
import { StorageWriteError, errorMessage } from '../errors.js';
import { generateUnknownFaceId } from '../../utils/ids.js';
import { isSafeSegment, resolveWithin } from '../../utils/paths.js';
import { listDirectories, readFileOrNull, removeDirectory } from './fs-helpers.js';

const IMAGE_FILE = 'image.jpg';
const FACE_FILE = 'face.jpg';
const METADATA_FILE = 'metadata.json';

const metadataSchema = z.object({
    id: z.string(),
    timestamp: z.string(),
    image_path: z.string(),
    has_face_image: z.boolean(),
});

type UnknownFaceMetadata = z.infer<typeof metadataSchema>;

export class LocalUnknownFaceStore implements IUnknownFaceStore {
    private readonly unknownDir: string;

    constructor(baseDir: string) {
        this.unknownDir = path.join(baseDir, 'unknown');
    }

    private recordDir(id: string): string | null {
        if (!isSafeSegment(id)) return null;
        return resolveWithin(this.unknownDir, id);
    }

    async create(imageBuffer: Buffer, faceBuffer?: Buffer): Promise<{ id: string; warnings: string[] }> {
        const id = generateUnknownFaceId();
        const dir = path.join(this.unknownDir, id);
        const warnings: string[] = [];

        try {
            await fs.mkdir(dir, { recursive: true });
            await fs.writeFile(path.join(dir, IMAGE_FILE), imageBuffer);
        } catch (error) {
            console.error(`[STORAGE] Failed to save unknown face image: face_id=${id}`, error);
            await this.discardPartialRecord(dir);
            throw new StorageWriteError(`Failed to save unknown face ${id}: ${errorMessage(error)}`, { cause: error });
        }

        let hasFaceImage = false;
        if (faceBuffer) {
            try {
                await fs.writeFile(path.join(dir, FACE_FILE), faceBuffer);
                hasFaceImage = true;
            } catch (error) {
                const warning = `Failed to save cropped face for ${id}: ${errorMessage(error)}`;
                console.warn(`[STORAGE] ${warning} (continuing anyway)`);
                warnings.push(warning);
            }
        } else {
            console.warn(`[STORAGE] No cropped face supplied: face_id=${id}`);
        }

        const metadata: UnknownFaceMetadata = {
            id,
            timestamp: new Date().toISOString(),
            image_path: path.posix.join('unknown', id, IMAGE_FILE),
            has_face_image: hasFaceImage,
        };

        try {
            await fs.writeFile(path.join(dir, METADATA_FILE), JSON.stringify(metadata));
        } catch (error) {
            console.error(`[STORAGE] Failed to save metadata: face_id=${id}`, error);
            await this.discardPartialRecord(dir);
            throw new StorageWriteError(`Failed to save metadata for ${id}: ${errorMessage(error)}`, { cause: error });
        }

        console.log(`[STORAGE] Saved unknown face: face_id=${id}, has_face_image=${hasFaceImage}`);
        return { id, warnings };
    }

    private async discardPartialRecord(dir: string) {
        try {
            await removeDirectory(dir);
        } catch (error) {
            console.warn(`[STORAGE] Could not remove partial record ${dir}:`, error);
        }
    }

    async list(): Promise<UnknownFace[]> {
        const faces: UnknownFace[] = [];

        for (const id of await listDirectories(this.unknownDir)) {
            const face = await this.get(id);
            if (face) faces.push(face);
        }

        return faces.sort((a, b) => b.timestamp.localeCompare(a.timestamp) || b.id.localeCompare(a.id));
    }

    async get(id: string): Promise<UnknownFace | null> {
        const dir = this.recordDir(id);
        if (!dir) return null;

        const raw = await readFileOrNull(path.join(dir, METADATA_FILE));
        if (!raw) return null;

        try {
            const metadata = metadataSchema.parse(JSON.parse(raw.toString('utf8')));
            return {
                id: metadata.id,
                timestamp: metadata.timestamp,
                hasFaceImage: metadata.has_face_image,
            };
        } catch (error) {
            console.error(`[STORAGE] Error loading unknown face ${id}: ${errorMessage(error)}`);
            return null;
        }
    }

    async getImage(id: string, kind: UnknownFaceImageKind): Promise<Buffer | null> {
        const dir = this.recordDir(id);
        if (!dir) return null;

        if (kind === 'face') {
            const face = await readFileOrNull(path.join(dir, FACE_FILE));
            if (face) return face;
        }
        return readFileOrNull(path.join(dir, IMAGE_FILE));
    }

    async getBestImage(id: string): Promise<Buffer | null> {
        return this.getImage(id, 'face');
    }

    async delete(id: string): Promise<boolean> {
        const dir = this.recordDir(id);
        if (!dir) return false;

        const removed = await removeDirectory(dir);
        if (removed) {
            console.log(`[STORAGE] Deleted unknown face: face_id=${id}`);
        }
        return removed;
    }
}

import fs from 'fs/promises';
import path from 'path';
import vm from 'vm';
import {
    isNotFoundError,
    listDirectories,
    listFiles,
    readFileOrNull,
    removeDirectory,
    removeDirectoryIfEmpty,
} from '../../src/services/local/fs-helpers.js';
import { makeTempDir, removeTempDir } from '../helpers/fixtures.js';

describe('isNotFoundError', () => {
    it('matches ENOENT errors by code', () => {
        const error = Object.assign(new Error('missing'), { code: 'ENOENT' });

        expect(isNotFoundError(error)).toBe(true);
    });

    it('matches ENOENT errors created in another context', () => {
        const foreign: unknown = vm.runInNewContext('Object.assign(new Error("missing"), { code: "ENOENT" })');

        expect(foreign instanceof Error).toBe(false);
        expect(isNotFoundError(foreign)).toBe(true);
    });

    it('ignores other errors and non-objects', () => {
        expect(isNotFoundError(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe(false);
        expect(isNotFoundError(null)).toBe(false);
        expect(isNotFoundError('ENOENT')).toBe(false);
    });
});

describe('fs helpers on missing paths', () => {
    let baseDir: string;

    beforeEach(async () => {
        baseDir = await makeTempDir();
    });

    afterEach(async () => {
        await removeTempDir(baseDir);
    });

    it('reports missing files and directories as empty', async () => {
        const missing = path.join(baseDir, 'missing');

        expect(await readFileOrNull(path.join(missing, 'settings.json'))).toBeNull();
        expect(await listDirectories(missing)).toEqual([]);
        expect(await listFiles(missing, '.jpg')).toEqual([]);
        expect(await removeDirectory(missing)).toBe(false);
        expect(await removeDirectoryIfEmpty(missing)).toBe(false);
    });

    it('removes a directory only once it is empty', async () => {
        const dir = path.join(baseDir, 'Alice');
        await fs.mkdir(dir);
        await fs.writeFile(path.join(dir, 'a.jpg'), 'a');

        expect(await removeDirectoryIfEmpty(dir)).toBe(false);

        await fs.rm(path.join(dir, 'a.jpg'));
        expect(await removeDirectoryIfEmpty(dir)).toBe(true);
        expect(await listDirectories(baseDir)).toEqual([]);
    });
});

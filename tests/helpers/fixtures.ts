import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { IFaceDetectorService } from '../../src/services/interfaces/face-detector.interface.js';
import { ISettingsStore, IUnknownFaceStore } from '../../src/services/interfaces/storage.interface.js';
import { BoundingBox, DetectedFace, Embedding } from '../../src/types/face.js';

export const newDetectorMock = (): jest.Mocked<IFaceDetectorService> => ({
    detect: jest.fn(),
    getProviderName: jest.fn().mockReturnValue('test'),
});

export const newUnknownFaceStoreMock = (): jest.Mocked<IUnknownFaceStore> => ({
    create: jest.fn(),
    list: jest.fn(),
    get: jest.fn(),
    getImage: jest.fn(),
    getBestImage: jest.fn(),
    delete: jest.fn(),
});

export const newSettingsStoreMock = (): jest.Mocked<ISettingsStore> => ({
    load: jest.fn(),
    save: jest.fn(),
});

export function face(embedding: Embedding, box: BoundingBox = { top: 10, right: 60, bottom: 60, left: 10 }): DetectedFace {
    return { box, embedding };
}

/** Make fs.writeFile reject for paths ending with suffix; other writes go through. */
export function failWritesEndingWith(suffix: string, message = 'disk full') {
    const realWriteFile = fs.writeFile;
    return jest.spyOn(fs, 'writeFile').mockImplementation(async (file, data, options) => {
        if (String(file).endsWith(suffix)) {
            throw new Error(message);
        }
        return realWriteFile(file, data, options);
    });
}

export async function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'face-registry-'));
}

export async function removeTempDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

/** Solid-colour PNG */
export async function solidImage(
    width: number,
    height: number,
    color: { r: number; g: number; b: number },
    channels: 3 | 4 = 3
): Promise<Buffer> {
    const background = channels === 4 ? { ...color, alpha: 1 } : color;
    return sharp({ create: { width, height, channels, background } }).png().toBuffer();
}

export const BLACK = { r: 0, g: 0, b: 0 };
export const WHITE = { r: 255, g: 255, b: 255 };
export const GREY = { r: 128, g: 128, b: 128 };

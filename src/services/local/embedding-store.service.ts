/**
 * Local Embedding Store
 *
 * One directory per identity under <FACES_DIR>/known. Each enrollment is a
 * pair of files sharing a timestamp key:
 *   <key>.jpg  - the image the embedding was taken from
 *   <key>.json - the embedding as a JSON number array (written last)
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { IEmbeddingStore } from '../interfaces/storage.interface.js';
import { IFaceDetectorService } from '../interfaces/face-detector.interface.js';
import { Embedding, EmbeddingSnapshot, EnrollResult, IdentitySummary } from '../../types/face.js';
import { InvalidNameError, StorageWriteError, errorMessage } from '../errors.js';
import { generateTimestampKey } from '../../utils/ids.js';
import { isSafeSegment, normalizeIdentityName, resolveWithin } from '../../utils/paths.js';
import {
    isNotFoundError,
    listDirectories,
    listFiles,
    readFileOrNull,
    removeDirectory,
    removeDirectoryIfEmpty,
} from './fs-helpers.js';

const IMAGE_EXT = '.jpg';
const EMBEDDING_EXT = '.json';

const embeddingSchema = z.array(z.number().finite()).min(1);

export class LocalEmbeddingStore implements IEmbeddingStore {
    private readonly knownDir: string;
    private currentGeneration = 0;

    constructor(
        baseDir: string,
        private readonly detector: IFaceDetectorService
    ) {
        this.knownDir = path.join(baseDir, 'known');
    }

    get generation(): number {
        return this.currentGeneration;
    }

    private bumpGeneration() {
        this.currentGeneration++;
    }

    private identityDir(name: string): string | null {
        if (!isSafeSegment(name)) return null;
        return resolveWithin(this.knownDir, name);
    }

    /**
     * Resolve an enrollment image path, refusing anything that is not a .jpg
     * directly inside the identity directory.
     */
    private enrollmentImagePath(name: string, filename: string): string | null {
        const dir = this.identityDir(name);
        if (!dir || path.extname(filename).toLowerCase() !== IMAGE_EXT) return null;

        const filePath = resolveWithin(dir, filename);
        if (!filePath || path.dirname(filePath) !== dir) return null;
        return filePath;
    }

    async enroll(rawName: string, imageBuffer: Buffer): Promise<EnrollResult> {
        const name = normalizeIdentityName(rawName);
        const dir = this.identityDir(name);
        if (!dir) {
            throw new InvalidNameError(`Invalid name: "${rawName}"`);
        }
        console.log(`[STORAGE] Enrolling face: name=${name}, size=${imageBuffer.length} bytes`);

        const faces = await this.detector.detect(imageBuffer);
        if (faces.length === 0) {
            console.warn(`[STORAGE] Enroll rejected, no face detected: name=${name}`);
            return { success: false, reason: 'NO_FACE_DETECTED' };
        }
        if (faces.length > 1) {
            console.log(`[STORAGE] Found ${faces.length} faces for name=${name}, using first face`);
        }

        const key = generateTimestampKey();
        const imagePath = path.join(dir, `${key}${IMAGE_EXT}`);
        const embeddingPath = path.join(dir, `${key}${EMBEDDING_EXT}`);

        try {
            await fs.mkdir(dir, { recursive: true });
            await fs.writeFile(imagePath, imageBuffer);
            await fs.writeFile(embeddingPath, JSON.stringify(faces[0].embedding));
        } catch (error) {
            await this.discardPartialEnrollment(dir, imagePath);
            throw new StorageWriteError(`Failed to save enrollment for ${name}: ${errorMessage(error)}`, { cause: error });
        } finally {
            this.bumpGeneration();
        }

        console.log(`[STORAGE] Enrolled face: name=${name}, file=${key}${IMAGE_EXT}`);
        return { success: true, name, filename: `${key}${IMAGE_EXT}` };
    }

    /** Drop the image of a failed enrollment, and the identity directory if that leaves it empty. */
    private async discardPartialEnrollment(dir: string, imagePath: string) {
        try {
            await fs.rm(imagePath, { force: true });
            await removeDirectoryIfEmpty(dir);
        } catch (cleanupError) {
            console.warn(`[STORAGE] Could not remove partial enrollment ${imagePath}:`, cleanupError);
        }
    }

    async listIdentities(): Promise<IdentitySummary[]> {
        const names = await listDirectories(this.knownDir);
        const summaries: IdentitySummary[] = [];

        for (const name of names) {
            const images = await listFiles(path.join(this.knownDir, name), IMAGE_EXT);
            summaries.push({ name, imageCount: images.length });
        }

        return summaries;
    }

    async listEnrollments(name: string): Promise<string[]> {
        const dir = this.identityDir(name);
        if (!dir) return [];

        const images = await listFiles(dir, IMAGE_EXT);
        return images.reverse();
    }

    async readEnrollmentImage(name: string, filename: string): Promise<Buffer | null> {
        const filePath = this.enrollmentImagePath(name, filename);
        if (!filePath) return null;
        return readFileOrNull(filePath);
    }

    async deleteEnrollment(name: string, filename: string): Promise<boolean> {
        const imagePath = this.enrollmentImagePath(name, filename);
        if (!imagePath) return false;

        const embeddingPath = imagePath.slice(0, -IMAGE_EXT.length) + EMBEDDING_EXT;
        const dir = path.dirname(imagePath);

        try {
            await fs.unlink(imagePath);
        } catch (error) {
            if (isNotFoundError(error)) return false;
            throw error;
        }

        try {
            await fs.rm(embeddingPath, { force: true });

            if (await removeDirectoryIfEmpty(dir)) {
                console.log(`[STORAGE] Removed empty identity directory: name=${name}`);
            }
        } finally {
            this.bumpGeneration();
        }

        console.log(`[STORAGE] Deleted enrollment: name=${name}, file=${filename}`);
        return true;
    }

    async deleteIdentity(name: string): Promise<boolean> {
        const dir = this.identityDir(name);
        if (!dir) return false;

        const removed = await removeDirectory(dir);
        if (removed) {
            this.bumpGeneration();
            console.log(`[STORAGE] Deleted identity: name=${name}`);
        }
        return removed;
    }

    async loadSnapshot(): Promise<EmbeddingSnapshot> {
        const snapshot = new Map<string, Embedding[]>();

        for (const name of await listDirectories(this.knownDir)) {
            const dir = path.join(this.knownDir, name);
            const embeddings: Embedding[] = [];

            for (const file of await listFiles(dir, EMBEDDING_EXT)) {
                const embedding = await this.readEmbedding(path.join(dir, file));
                if (embedding) embeddings.push(embedding);
            }

            if (embeddings.length > 0) {
                snapshot.set(name, embeddings);
            }
        }

        return snapshot;
    }

    private async readEmbedding(filePath: string): Promise<Embedding | null> {
        const raw = await readFileOrNull(filePath);
        if (!raw) return null;

        try {
            const parsed = embeddingSchema.safeParse(JSON.parse(raw.toString('utf8')));
            if (parsed.success) return parsed.data;
            console.warn(`[STORAGE] Skipping malformed embedding file: ${filePath}`);
        } catch (error) {
            console.warn(`[STORAGE] Skipping unreadable embedding file: ${filePath}`, error);
        }
        return null;
    }
}

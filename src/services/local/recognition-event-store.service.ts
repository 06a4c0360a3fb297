/**
 * Local Recognition-Event Store
 *
 * <FACES_DIR>/recognitions/<id>/
 *   original.jpg    submitted image
 *   face_<i>.jpg    crop of detected face i
 *   metadata.json   per-face results, written last
 *
 * Events are immutable; the only mutation is whole-event deletion.
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { IRecognitionEventStore } from '../interfaces/storage.interface.js';
import { FaceCapture, RecognitionEvent, faceImageFilename, roundBox } from '../../types/face.js';
import { StorageWriteError, errorMessage } from '../errors.js';
import { generateRecognitionId } from '../../utils/ids.js';
import { isSafeSegment, resolveWithin } from '../../utils/paths.js';
import { listDirectories, readFileOrNull, removeDirectory } from './fs-helpers.js';

const ORIGINAL_FILE = 'original.jpg';
const METADATA_FILE = 'metadata.json';

const faceMetadataSchema = z.object({
    face_index: z.number().int().nonnegative(),
    known_person: z.boolean(),
    name_person: z.string(),
    distance: z.number().nullable().optional(),
    location: z.object({
        top: z.number(),
        right: z.number(),
        bottom: z.number(),
        left: z.number(),
    }),
    face_image: z.string(),
});

const eventMetadataSchema = z.object({
    event_id: z.string(),
    timestamp: z.string(),
    total_faces: z.number().int().nonnegative(),
    faces: z.array(faceMetadataSchema),
});

type EventMetadata = z.infer<typeof eventMetadataSchema>;
type FaceMetadata = z.infer<typeof faceMetadataSchema>;

function toFaceMetadata(face: FaceCapture): FaceMetadata {
    return {
        face_index: face.faceIndex,
        known_person: face.matched,
        name_person: face.name,
        distance: face.distance,
        location: roundBox(face.box),
        face_image: faceImageFilename(face.faceIndex),
    };
}

function fromMetadata(metadata: EventMetadata): RecognitionEvent {
    return {
        eventId: metadata.event_id,
        timestamp: metadata.timestamp,
        totalFaces: metadata.total_faces,
        faces: metadata.faces.map((face) => ({
            faceIndex: face.face_index,
            matched: face.known_person,
            name: face.name_person,
            distance: face.distance ?? null,
            box: face.location,
            faceImage: face.face_image,
        })),
    };
}

export class LocalRecognitionEventStore implements IRecognitionEventStore {
    private readonly recognitionsDir: string;

    constructor(baseDir: string) {
        this.recognitionsDir = path.join(baseDir, 'recognitions');
    }

    private eventDir(id: string): string | null {
        if (!isSafeSegment(id)) return null;
        return resolveWithin(this.recognitionsDir, id);
    }

    async create(imageBuffer: Buffer, faces: FaceCapture[]): Promise<string> {
        const eventId = generateRecognitionId();
        const dir = path.join(this.recognitionsDir, eventId);

        const metadata: EventMetadata = {
            event_id: eventId,
            timestamp: new Date().toISOString(),
            total_faces: faces.length,
            faces: faces.map(toFaceMetadata),
        };

        try {
            await fs.mkdir(dir, { recursive: true });
            await fs.writeFile(path.join(dir, ORIGINAL_FILE), imageBuffer);

            for (const face of faces) {
                await fs.writeFile(path.join(dir, faceImageFilename(face.faceIndex)), face.crop);
            }

            await fs.writeFile(path.join(dir, METADATA_FILE), JSON.stringify(metadata, null, 2));
        } catch (error) {
            console.error(`[STORAGE] Failed to save recognition event: event_id=${eventId}`, error);
            try {
                await removeDirectory(dir);
            } catch (cleanupError) {
                console.warn(`[STORAGE] Could not remove partial event ${eventId}:`, cleanupError);
            }
            throw new StorageWriteError(`Failed to save recognition event: ${errorMessage(error)}`, { cause: error });
        }

        console.log(`[STORAGE] Saved recognition event: event_id=${eventId}, faces=${faces.length}`);
        return eventId;
    }

    async list(): Promise<RecognitionEvent[]> {
        const events: RecognitionEvent[] = [];

        for (const id of await listDirectories(this.recognitionsDir)) {
            const event = await this.get(id);
            if (event) events.push(event);
        }

        return events.sort(
            (a, b) => b.timestamp.localeCompare(a.timestamp) || b.eventId.localeCompare(a.eventId)
        );
    }

    async get(id: string): Promise<RecognitionEvent | null> {
        const dir = this.eventDir(id);
        if (!dir) return null;

        const raw = await readFileOrNull(path.join(dir, METADATA_FILE));
        if (!raw) return null;

        try {
            return fromMetadata(eventMetadataSchema.parse(JSON.parse(raw.toString('utf8'))));
        } catch (error) {
            console.error(`[STORAGE] Error loading recognition event ${id}: ${errorMessage(error)}`);
            return null;
        }
    }

    async getOriginalImage(id: string): Promise<Buffer | null> {
        const dir = this.eventDir(id);
        if (!dir) return null;
        return readFileOrNull(path.join(dir, ORIGINAL_FILE));
    }

    async getFaceImage(id: string, faceIndex: number): Promise<Buffer | null> {
        const dir = this.eventDir(id);
        if (!dir || !Number.isInteger(faceIndex) || faceIndex < 0) return null;
        return readFileOrNull(path.join(dir, faceImageFilename(faceIndex)));
    }

    async delete(id: string): Promise<boolean> {
        const dir = this.eventDir(id);
        if (!dir) return false;

        const removed = await removeDirectory(dir);
        if (removed) {
            console.log(`[STORAGE] Deleted recognition event: event_id=${id}`);
        }
        return removed;
    }
}

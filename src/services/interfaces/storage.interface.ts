/**
 * Storage Interfaces
 *
 * Abstracts persistence of enrolled embeddings and face records. Implementations:
 * - LocalEmbeddingStore / LocalUnknownFaceStore / LocalRecognitionEventStore /
 *   LocalSettingsStore: one directory (or JSON file) per record under FACES_DIR
 *
 * Record writes put metadata last so a lister never sees a record whose
 * images are still missing.
 */

import {
    EmbeddingSnapshot,
    EnrollResult,
    FaceCapture,
    IdentitySummary,
    RecognitionEvent,
    UnknownFace,
    UnknownFaceImageKind,
} from '../../types/face.js';
import { ServerSettings } from '../../types/settings.js';

export interface IEmbeddingStore {
    /**
     * Bumped after every completed mutation. The embedding cache compares it
     * with the generation its snapshot was built from.
     */
    readonly generation: number;

    /**
     * Detect the first face in an image and store it as a new enrollment.
     * Writes nothing when the detector finds no face.
     * @throws DetectionFailureError when the image cannot be decoded
     */
    enroll(name: string, imageBuffer: Buffer): Promise<EnrollResult>;

    listIdentities(): Promise<IdentitySummary[]>;

    /** Enrollment image filenames, newest first. Empty for an unknown identity. */
    listEnrollments(name: string): Promise<string[]>;

    /** Null when the identity or file does not exist, or the filename escapes the identity. */
    readEnrollmentImage(name: string, filename: string): Promise<Buffer | null>;

    deleteEnrollment(name: string, filename: string): Promise<boolean>;

    deleteIdentity(name: string): Promise<boolean>;

    /** Full read of every identity's embeddings. */
    loadSnapshot(): Promise<EmbeddingSnapshot>;
}

export interface IUnknownFaceStore {
    /**
     * Persist an unidentified face.
     * @param imageBuffer - Full source image (required)
     * @param faceBuffer - Cropped face; a failed crop write is logged and skipped
     * @returns Generated id
     */
    create(imageBuffer: Buffer, faceBuffer?: Buffer): Promise<{ id: string; warnings: string[] }>;

    /** Newest first */
    list(): Promise<UnknownFace[]>;

    get(id: string): Promise<UnknownFace | null>;

    /** `face` falls back to the full image when no crop was stored. */
    getImage(id: string, kind: UnknownFaceImageKind): Promise<Buffer | null>;

    /** Cropped face when available, otherwise the full image. */
    getBestImage(id: string): Promise<Buffer | null>;

    delete(id: string): Promise<boolean>;
}

export interface IRecognitionEventStore {
    /**
     * Persist one recognition attempt. Any write failure is surfaced.
     * @returns Generated event id
     */
    create(imageBuffer: Buffer, faces: FaceCapture[]): Promise<string>;

    /** Newest first */
    list(): Promise<RecognitionEvent[]>;

    get(id: string): Promise<RecognitionEvent | null>;

    getOriginalImage(id: string): Promise<Buffer | null>;

    getFaceImage(id: string, faceIndex: number): Promise<Buffer | null>;

    delete(id: string): Promise<boolean>;
}

export interface ISettingsStore {
    load(): Promise<ServerSettings>;

    /** Replaces the whole record */
    save(settings: ServerSettings): Promise<ServerSettings>;
}

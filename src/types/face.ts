/**
 * Core face domain types shared by the detector, matcher, pipeline and stores.
 */

/** Pixel coordinates in the source image, same order the detector reports them. */
export interface BoundingBox {
    top: number;
    right: number;
    bottom: number;
    left: number;
}

/** Whole-pixel box, as persisted and returned in face results */
export function roundBox(box: BoundingBox): BoundingBox {
    return {
        top: Math.round(box.top),
        right: Math.round(box.right),
        bottom: Math.round(box.bottom),
        left: Math.round(box.left),
    };
}

export type Embedding = number[];

export interface DetectedFace {
    box: BoundingBox;
    embedding: Embedding;
}

/**
 * Identity name → reference embeddings, in a fixed iteration order.
 * Built once per reload and never mutated afterwards.
 */
export type EmbeddingSnapshot = ReadonlyMap<string, readonly Embedding[]>;

export interface MatchResult {
    matched: boolean;
    /** Empty string unless matched */
    name: string;
    /** Closest distance found; null when no identity is enrolled */
    distance: number | null;
}

export interface FaceResult extends MatchResult {
    faceIndex: number;
    box: BoundingBox;
    /** Filename of the persisted crop inside the event record */
    faceImage: string;
}

/** Crop filename of a face inside its recognition event */
export function faceImageFilename(faceIndex: number): string {
    return `face_${faceIndex}.jpg`;
}

export interface RecognitionOutcome {
    eventId: string;
    faces: FaceResult[];
    totalFaces: number;
    /** Best-effort writes that failed without failing the call */
    warnings: string[];
}

export interface IdentitySummary {
    name: string;
    imageCount: number;
}

export type EnrollResult =
    | { success: true; name: string; filename: string }
    | { success: false; reason: 'NO_FACE_DETECTED' };

export interface UnknownFace {
    id: string;
    timestamp: string;
    hasFaceImage: boolean;
}

export interface RecognitionEvent {
    eventId: string;
    timestamp: string;
    totalFaces: number;
    faces: FaceResult[];
}

/** Match outcome plus crop bytes, as handed to the event store (which names the crop file). */
export interface FaceCapture extends MatchResult {
    faceIndex: number;
    box: BoundingBox;
    crop: Buffer;
}

export type UnknownFaceImageKind = 'image' | 'face';

/**
 * Outcome of a curation step that enrolls a face.
 * `enrolled` may still carry warnings, e.g. a cleanup that failed after the enroll.
 */
export type PromotionResult =
    | { status: 'enrolled'; name: string; filename: string; warnings: string[] }
    | { status: 'not_found' }
    | { status: 'no_face' };

/**
 * Face Detector Interface
 *
 * Abstracts face detection and embedding extraction. Implementations:
 * - MockFaceDetectorService: Deterministic single-face detector for development/tests
 * - HttpFaceDetectorService: External face-embedding service over HTTP
 *
 * The detector owns image decoding. The core only sees boxes and embeddings.
 */

import { DetectedFace } from '../../types/face.js';

export interface IFaceDetectorService {
    /**
     * Detect every face in an image and compute one embedding per face.
     *
     * An image without faces resolves to an empty array, which is not an error.
     * Faces are returned in the detector's own order; callers treat index 0
     * as "the first face".
     *
     * @param imageBuffer - Raw image bytes (any format the detector decodes)
     * @throws DetectionFailureError when the image cannot be decoded or the detector fails
     */
    detect(imageBuffer: Buffer): Promise<DetectedFace[]>;

    /**
     * Get the provider name for this service
     */
    getProviderName(): string;
}

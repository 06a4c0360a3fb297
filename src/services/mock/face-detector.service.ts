/**
 * Mock Face Detector Service
 *
 * Deterministic stand-in for the external face-embedding service, for local
 * development and UI flows without a model server.
 *
 * DETERMINISTIC DETECTION RULES:
 * - Undecodable bytes fail with DetectionFailureError
 * - Images smaller than 32px on either side contain no face
 * - Anything else contains exactly one face: the centred square whose side is
 *   half the shorter image side
 * - The embedding is the 8x8 greyscale thumbnail of that square, scaled to 0-1
 *
 * Re-submitting the same image therefore yields distance 0 against its own
 * enrollment, and visually different images land far apart.
 */

import sharp from 'sharp';
import { IFaceDetectorService } from '../interfaces/face-detector.interface.js';
import { BoundingBox, DetectedFace } from '../../types/face.js';
import { DetectionFailureError, errorMessage } from '../errors.js';

export const MOCK_MIN_FACE_SIZE = 32;
const THUMBNAIL_SIZE = 8;

/**
 * Centred square covering half the shorter side.
 */
export function mockFaceBox(width: number, height: number): BoundingBox {
    const side = Math.floor(Math.min(width, height) / 2);
    const left = Math.floor((width - side) / 2);
    const top = Math.floor((height - side) / 2);
    return { top, right: left + side, bottom: top + side, left };
}

export class MockFaceDetectorService implements IFaceDetectorService {

    getProviderName(): string {
        return 'mock';
    }

    async detect(imageBuffer: Buffer): Promise<DetectedFace[]> {
        let width: number;
        let height: number;

        try {
            const metadata = await sharp(imageBuffer).metadata();
            width = metadata.width || 0;
            height = metadata.height || 0;
        } catch (error) {
            throw new DetectionFailureError(`Unable to decode image: ${errorMessage(error)}`, { cause: error });
        }

        if (width < MOCK_MIN_FACE_SIZE || height < MOCK_MIN_FACE_SIZE) {
            console.log(`[DETECTOR] mock: ${width}x${height} image too small, no face`);
            return [];
        }

        const box = mockFaceBox(width, height);

        try {
            const { data } = await sharp(imageBuffer)
                .extract({ left: box.left, top: box.top, width: box.right - box.left, height: box.bottom - box.top })
                .resize(THUMBNAIL_SIZE, THUMBNAIL_SIZE, { fit: 'fill' })
                .grayscale()
                .removeAlpha()
                .raw()
                .toBuffer({ resolveWithObject: true });

            const embedding = Array.from(data.subarray(0, THUMBNAIL_SIZE * THUMBNAIL_SIZE), (value) => value / 255);
            return [{ box, embedding }];
        } catch (error) {
            throw new DetectionFailureError(`Mock embedding failed: ${errorMessage(error)}`, { cause: error });
        }
    }
}

// Singleton instance
export const mockFaceDetectorService = new MockFaceDetectorService();

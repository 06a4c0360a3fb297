/**
 * HTTP Face Detector Service
 *
 * Client for an external face-embedding service.
 *
 *   POST {DETECTOR_URL}/detect  { "image": "<base64>" }
 *   200 { "faces": [{ "box": { top, right, bottom, left }, "embedding": number[] }] }
 *   4xx when the image cannot be decoded
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { IFaceDetectorService } from '../interfaces/face-detector.interface.js';
import { DetectedFace } from '../../types/face.js';
import { DetectionFailureError, errorMessage } from '../errors.js';

const detectResponseSchema = z.object({
    faces: z.array(z.object({
        box: z.object({
            top: z.number(),
            right: z.number(),
            bottom: z.number(),
            left: z.number(),
        }),
        embedding: z.array(z.number().finite()).min(1),
    })),
});

export interface HttpFaceDetectorOptions {
    baseUrl: string;
    timeoutMs: number;
}

export class HttpFaceDetectorService implements IFaceDetectorService {
    private client: AxiosInstance;

    constructor(options: HttpFaceDetectorOptions, client?: AxiosInstance) {
        this.client = client ?? axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            headers: { 'Content-Type': 'application/json' },
            maxBodyLength: Infinity,
        });
    }

    getProviderName(): string {
        return 'http';
    }

    async detect(imageBuffer: Buffer): Promise<DetectedFace[]> {
        let payload: unknown;

        try {
            const response = await this.client.post('/detect', { image: imageBuffer.toString('base64') });
            payload = response.data;
        } catch (error) {
            if (axios.isAxiosError(error) && error.response) {
                console.warn(`[DETECTOR] Service rejected image: status=${error.response.status}`);
                throw new DetectionFailureError(`Detector rejected image (HTTP ${error.response.status})`, { cause: error });
            }
            console.error('[DETECTOR] Detector request failed:', errorMessage(error));
            throw new DetectionFailureError(`Detector unavailable: ${errorMessage(error)}`, { cause: error });
        }

        const parsed = detectResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new DetectionFailureError(`Invalid detector response: ${parsed.error.errors[0]?.message ?? 'unknown'}`);
        }

        const dimensions = new Set(parsed.data.faces.map((face) => face.embedding.length));
        if (dimensions.size > 1) {
            throw new DetectionFailureError('Detector returned embeddings of different lengths');
        }

        console.log(`[DETECTOR] Detected ${parsed.data.faces.length} face(s)`);
        return parsed.data.faces;
    }
}

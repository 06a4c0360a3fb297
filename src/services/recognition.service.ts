/**
 * Recognition Pipeline
 *
 * detect → match every face against one cache snapshot → crop → persist the
 * event → persist every unmatched face as an unknown face.
 *
 * Nothing is written until detection, matching and cropping have all
 * succeeded. The event write is fatal on failure; unknown-face writes are
 * best-effort and come back as warnings.
 */

import { IFaceDetectorService } from './interfaces/face-detector.interface.js';
import {
    IRecognitionEventStore,
    ISettingsStore,
    IUnknownFaceStore,
} from './interfaces/storage.interface.js';
import { EmbeddingCacheService } from './embedding-cache.service.js';
import { ImageService, imageService } from './image.service.js';
import { findBestMatch } from './matcher.service.js';
import { uniqueSortedNames } from './webhook.service.js';
import { DetectionFailureError, errorMessage } from './errors.js';
import { DetectedFace, FaceCapture, MatchResult, RecognitionOutcome, faceImageFilename, roundBox } from '../types/face.js';

export interface RecognizedNames {
    knownPerson: boolean;
    names: string[];
    outcome: RecognitionOutcome;
}

export class RecognitionService {
    constructor(
        private readonly detector: IFaceDetectorService,
        private readonly cache: EmbeddingCacheService,
        private readonly eventStore: IRecognitionEventStore,
        private readonly unknownFaceStore: IUnknownFaceStore,
        private readonly settingsStore: ISettingsStore,
        private readonly images: ImageService = imageService
    ) {}

    async process(imageBuffer: Buffer): Promise<RecognitionOutcome> {
        const { tolerance } = await this.settingsStore.load();

        const detections = await this.detector.detect(imageBuffer);
        console.log(`[RECOGNITION] Detected ${detections.length} face(s) using ${this.detector.getProviderName()} detector`);

        const matches = await this.matchAll(detections, tolerance);
        const captures = await this.cropAll(imageBuffer, detections, matches);

        const eventId = await this.eventStore.create(imageBuffer, captures);

        const warnings: string[] = [];
        for (const capture of captures) {
            if (capture.matched) continue;

            try {
                const saved = await this.unknownFaceStore.create(imageBuffer, capture.crop);
                warnings.push(...saved.warnings);
                console.log(`[RECOGNITION] Saved unknown face: face_id=${saved.id}, event_id=${eventId}, face_index=${capture.faceIndex}`);
            } catch (error) {
                const warning = `Failed to save unknown face for face ${capture.faceIndex}: ${errorMessage(error)}`;
                console.warn(`[RECOGNITION] ${warning}`);
                warnings.push(warning);
            }
        }

        const faces = captures.map(({ crop, ...result }) => ({
            ...result,
            faceImage: faceImageFilename(result.faceIndex),
        }));

        return { eventId, faces, totalFaces: faces.length, warnings };
    }

    /**
     * Full recognition, reduced to the deduplicated, sorted set of matched names.
     */
    async recognizeNames(imageBuffer: Buffer): Promise<RecognizedNames> {
        const outcome = await this.process(imageBuffer);
        const names = uniqueSortedNames(outcome.faces.filter((face) => face.matched).map((face) => face.name));

        return { knownPerson: names.length > 0, names, outcome };
    }

    private async matchAll(detections: DetectedFace[], tolerance: number): Promise<MatchResult[]> {
        if (detections.length === 0) return [];

        const snapshot = await this.cache.getSnapshot();

        return detections.map((detection, index) => {
            const result = findBestMatch(detection.embedding, snapshot, tolerance);
            console.log(
                `[RECOGNITION] Face ${index}: known=${result.matched}, name=${result.name}, ` +
                `distance=${result.distance ?? 'N/A'}`
            );
            return result;
        });
    }

    private async cropAll(
        imageBuffer: Buffer,
        detections: DetectedFace[],
        matches: MatchResult[]
    ): Promise<FaceCapture[]> {
        const captures: FaceCapture[] = [];

        for (const [index, detection] of detections.entries()) {
            const box = roundBox(detection.box);
            let crop: Buffer;
            try {
                crop = await this.images.cropFace(imageBuffer, box);
            } catch (error) {
                throw new DetectionFailureError(`Unable to crop face ${index}: ${errorMessage(error)}`, { cause: error });
            }

            captures.push({ faceIndex: index, box, ...matches[index], crop });
        }

        return captures;
    }
}

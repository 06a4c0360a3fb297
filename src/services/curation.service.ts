/**
 * Curation Service
 *
 * Operator actions that change the enrolled set or clean up records:
 * enroll, promote an unknown face or an event face, and the deletes.
 *
 * Every mutation of the embedding store also invalidates the cache here,
 * on top of the store's generation bump.
 */

import {
    IEmbeddingStore,
    IRecognitionEventStore,
    IUnknownFaceStore,
} from './interfaces/storage.interface.js';
import { EmbeddingCacheService } from './embedding-cache.service.js';
import { errorMessage } from './errors.js';
import { EnrollResult, PromotionResult } from '../types/face.js';

export class CurationService {
    constructor(
        private readonly embeddingStore: IEmbeddingStore,
        private readonly cache: EmbeddingCacheService,
        private readonly unknownFaceStore: IUnknownFaceStore,
        private readonly eventStore: IRecognitionEventStore
    ) {}

    async enroll(name: string, imageBuffer: Buffer): Promise<EnrollResult> {
        try {
            return await this.embeddingStore.enroll(name, imageBuffer);
        } finally {
            this.cache.invalidate();
        }
    }

    async deleteIdentity(name: string): Promise<boolean> {
        const deleted = await this.embeddingStore.deleteIdentity(name);
        this.cache.invalidate();
        return deleted;
    }

    async deleteEnrollment(name: string, filename: string): Promise<boolean> {
        const deleted = await this.embeddingStore.deleteEnrollment(name, filename);
        this.cache.invalidate();
        return deleted;
    }

    /**
     * Enroll an unknown face under a name, then drop the unknown record.
     *
     * The record is only removed after a successful enroll. If the removal
     * itself fails the face is already enrolled, so the call still succeeds
     * and reports the leftover record as a warning.
     */
    async nameUnknownFace(faceId: string, name: string): Promise<PromotionResult> {
        const imageBuffer = await this.unknownFaceStore.getBestImage(faceId);
        if (!imageBuffer) {
            console.warn(`[CURATION] name_unknown_face: no image found - face_id=${faceId}`);
            return { status: 'not_found' };
        }

        const enrolled = await this.enroll(name, imageBuffer);
        if (!enrolled.success) {
            console.warn(`[CURATION] name_unknown_face: no face detected - face_id=${faceId}, name=${name}`);
            return { status: 'no_face' };
        }

        const warnings: string[] = [];
        try {
            const removed = await this.unknownFaceStore.delete(faceId);
            if (!removed) {
                warnings.push(`Unknown face ${faceId} was already removed`);
            }
        } catch (error) {
            const warning = `Failed to delete unknown face ${faceId} after enrolling: ${errorMessage(error)}`;
            console.warn(`[CURATION] ${warning}`);
            warnings.push(warning);
        }

        console.log(`[CURATION] Named unknown face: face_id=${faceId}, name=${enrolled.name}`);
        return { status: 'enrolled', name: enrolled.name, filename: enrolled.filename, warnings };
    }

    /**
     * Enroll the crop of one face from a past recognition event.
     * The event itself is left untouched.
     */
    async promoteEventFace(eventId: string, faceIndex: number, name: string): Promise<PromotionResult> {
        const crop = await this.eventStore.getFaceImage(eventId, faceIndex);
        if (!crop) {
            console.warn(`[CURATION] Face image not found: event_id=${eventId}, face_index=${faceIndex}`);
            return { status: 'not_found' };
        }

        const enrolled = await this.enroll(name, crop);
        if (!enrolled.success) {
            return { status: 'no_face' };
        }

        console.log(`[CURATION] Added event face to known faces: event_id=${eventId}, face_index=${faceIndex}, name=${enrolled.name}`);
        return { status: 'enrolled', name: enrolled.name, filename: enrolled.filename, warnings: [] };
    }

    async deleteUnknownFace(faceId: string): Promise<boolean> {
        return this.unknownFaceStore.delete(faceId);
    }

    async deleteEvent(eventId: string): Promise<boolean> {
        return this.eventStore.delete(eventId);
    }
}

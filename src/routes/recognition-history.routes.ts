/**
 * Recognition History Routes
 *
 * Browse past recognition events, their images, and promote a face from an
 * event into the known set.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { badRequest, notFound } from '../middleware/error.middleware.js';
import { getServices } from '../services/index.js';
import { RecognitionEvent } from '../types/face.js';
import { nameSchema } from './known-faces.routes.js';

const router = Router();

const faceIndexSchema = z.coerce.number().int().nonnegative();

function withImageUrls(event: RecognitionEvent) {
    const base = `/api/recognition-history/${event.eventId}`;
    return {
        ...event,
        originalImageUrl: `${base}/original`,
        faces: event.faces.map(face => ({
            ...face,
            faceImageUrl: `${base}/faces/${face.faceIndex}`,
        })),
    };
}

function parseFaceIndex(raw: string): number {
    const parsed = faceIndexSchema.safeParse(raw);
    if (!parsed.success) {
        throw badRequest('Invalid face index');
    }
    return parsed.data;
}

/**
 * GET /api/recognition-history
 * All events, newest first
 */
router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const events = await getServices().eventStore.list();
        console.log(`[API] Found ${events.length} recognition events`);
        res.json(events.map(withImageUrls));
    } catch (error) {
        next(error);
    }
});

/**
 * GET /api/recognition-history/:id
 */
router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const event = await getServices().eventStore.get(req.params.id);
        if (!event) {
            throw notFound('Recognition event not found');
        }

        res.json(withImageUrls(event));
    } catch (error) {
        next(error);
    }
});

/**
 * GET /api/recognition-history/:id/original
 */
router.get('/:id/original', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const image = await getServices().eventStore.getOriginalImage(req.params.id);
        if (!image) {
            throw notFound('Image not found');
        }

        res.type('image/jpeg').send(image);
    } catch (error) {
        next(error);
    }
});

/**
 * GET /api/recognition-history/:id/faces/:faceIndex
 */
router.get('/:id/faces/:faceIndex', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const faceIndex = parseFaceIndex(req.params.faceIndex);
        const image = await getServices().eventStore.getFaceImage(req.params.id, faceIndex);
        if (!image) {
            throw notFound('Face image not found');
        }

        res.type('image/jpeg').send(image);
    } catch (error) {
        next(error);
    }
});

/**
 * POST /api/recognition-history/:id/faces/:faceIndex/add-to-known
 * Enroll the face crop under a name; the event is kept as is
 */
router.post('/:id/faces/:faceIndex/add-to-known', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const faceIndex = parseFaceIndex(req.params.faceIndex);
        const { name } = nameSchema.parse(req.body);

        const result = await getServices().curation.promoteEventFace(req.params.id, faceIndex, name);
        if (result.status === 'not_found') {
            throw notFound('Face image not found in recognition event');
        }
        if (result.status === 'no_face') {
            throw badRequest('No face found in image');
        }

        res.json({ message: `Face added to known person '${result.name}' successfully`, name: result.name });
    } catch (error) {
        next(error);
    }
});

/**
 * DELETE /api/recognition-history/:id
 */
router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const deleted = await getServices().curation.deleteEvent(req.params.id);
        if (!deleted) {
            throw notFound('Recognition event not found');
        }

        res.json({ message: 'Recognition event deleted successfully' });
    } catch (error) {
        next(error);
    }
});

export default router;

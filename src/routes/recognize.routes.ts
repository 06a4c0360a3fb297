/**
 * Recognition Routes
 *
 * Submit a photo, get back who is in it.
 * Every call is recorded as a recognition event.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { badRequest } from '../middleware/error.middleware.js';
import { uploadImage } from '../middleware/upload.middleware.js';
import { getServices } from '../services/index.js';

const router = Router();

/**
 * POST /api/recognize
 * Simplified response for integrations: matched names only.
 * Triggers the webhook (fire-and-forget) when at least one person is known.
 */
router.post('/', uploadImage, async (req: Request, res: Response, next: NextFunction) => {
    try {
        if (!req.file) {
            throw badRequest('No image provided');
        }

        console.log(`[RECOGNITION] Received request: filename=${req.file.originalname}, size=${req.file.size} bytes`);

        const { recognition, webhook } = getServices();
        const { knownPerson, names, outcome } = await recognition.recognizeNames(req.file.buffer);

        console.log(`[RECOGNITION] event_id=${outcome.eventId}, known_person=${knownPerson}, names=[${names.join(', ')}]`);

        if (knownPerson) {
            webhook.notify(names)
                .catch(err => console.error('[WEBHOOK] Unexpected webhook error:', err));
        }

        res.json({ knownPerson, names });
    } catch (error) {
        next(error);
    }
});

/**
 * POST /api/recognize/all
 * Per-face results and the id of the stored event.
 */
router.post('/all', uploadImage, async (req: Request, res: Response, next: NextFunction) => {
    try {
        if (!req.file) {
            throw badRequest('No image provided');
        }

        const { recognition } = getServices();
        const outcome = await recognition.process(req.file.buffer);

        res.json({
            eventId: outcome.eventId,
            totalFaces: outcome.totalFaces,
            faces: outcome.faces.map(face => ({
                faceIndex: face.faceIndex,
                matched: face.matched,
                name: face.name,
                distance: face.distance,
                box: face.box,
            })),
            warnings: outcome.warnings,
        });
    } catch (error) {
        next(error);
    }
});

export default router;

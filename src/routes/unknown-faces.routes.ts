/**
 * Unknown Face Routes
 *
 * Review faces that did not match anyone, name them or throw them away.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { badRequest, notFound } from '../middleware/error.middleware.js';
import { getServices } from '../services/index.js';
import { UnknownFace } from '../types/face.js';
import { nameSchema } from './known-faces.routes.js';

const router = Router();

function withImageUrls(face: UnknownFace) {
    return {
        ...face,
        imageUrl: `/api/unknown-faces/${face.id}/image`,
        faceUrl: `/api/unknown-faces/${face.id}/face`,
    };
}

/**
 * GET /api/unknown-faces
 * Newest first
 */
router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const faces = await getServices().unknownFaceStore.list();
        res.json(faces.map(withImageUrls));
    } catch (error) {
        next(error);
    }
});

/**
 * GET /api/unknown-faces/:id/image
 * Full source image
 */
router.get('/:id/image', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const image = await getServices().unknownFaceStore.getImage(req.params.id, 'image');
        if (!image) {
            throw notFound('Face not found');
        }

        res.type('image/jpeg').send(image);
    } catch (error) {
        next(error);
    }
});

/**
 * GET /api/unknown-faces/:id/face
 * Cropped face, or the full image when no crop was stored
 */
router.get('/:id/face', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const image = await getServices().unknownFaceStore.getImage(req.params.id, 'face');
        if (!image) {
            throw notFound('Face not found');
        }

        res.type('image/jpeg').send(image);
    } catch (error) {
        next(error);
    }
});

/**
 * POST /api/unknown-faces/:id/name
 * Enroll the face under a name and remove it from the unknown list
 */
router.post('/:id/name', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const { name } = nameSchema.parse(req.body);
        const result = await getServices().curation.nameUnknownFace(req.params.id, name);

        if (result.status === 'not_found') {
            throw notFound('Face not found');
        }
        if (result.status === 'no_face') {
            throw badRequest('No face found in image');
        }

        res.json({ message: 'Face named successfully', name: result.name, warnings: result.warnings });
    } catch (error) {
        next(error);
    }
});

/**
 * DELETE /api/unknown-faces/:id
 */
router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const deleted = await getServices().curation.deleteUnknownFace(req.params.id);
        if (!deleted) {
            throw notFound('Face not found');
        }

        res.json({ message: 'Face deleted successfully' });
    } catch (error) {
        next(error);
    }
});

export default router;

/**
 * Known Face Routes
 *
 * Enroll people, browse their reference images and remove them.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { badRequest, forbidden, notFound } from '../middleware/error.middleware.js';
import { uploadImage } from '../middleware/upload.middleware.js';
import { getServices } from '../services/index.js';
import { isSafeSegment } from '../utils/paths.js';

const router = Router();

export const nameSchema = z.object({
    name: z.string({ required_error: 'Name is required' }).trim().min(1, 'Name is required').max(100),
});

function enrollmentImageUrl(name: string, filename: string): string {
    return `/api/known-faces/${encodeURIComponent(name)}/images/${encodeURIComponent(filename)}`;
}

/**
 * GET /api/known-faces
 * All enrolled people with their image counts
 */
router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const identities = await getServices().embeddingStore.listIdentities();
        console.log(`[API] Found ${identities.length} known faces`);
        res.json(identities);
    } catch (error) {
        next(error);
    }
});

/**
 * POST /api/known-faces
 * Enroll a face (multipart: image + name)
 */
router.post('/', uploadImage, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const { name } = nameSchema.parse(req.body);

        if (!req.file) {
            throw badRequest('No image provided');
        }

        const result = await getServices().curation.enroll(name, req.file.buffer);
        if (!result.success) {
            throw badRequest('No face found in image');
        }

        res.status(201).json({ message: 'Face added successfully', name: result.name, filename: result.filename });
    } catch (error) {
        next(error);
    }
});

/**
 * DELETE /api/known-faces/:name
 * Remove a person and every enrollment
 */
router.delete('/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const deleted = await getServices().curation.deleteIdentity(req.params.name);
        if (!deleted) {
            throw notFound('Person not found');
        }

        res.json({ message: 'Person deleted successfully' });
    } catch (error) {
        next(error);
    }
});

/**
 * GET /api/known-faces/:name/images
 * Enrollment images, newest first
 */
router.get('/:name/images', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const { name } = req.params;
        const filenames = await getServices().embeddingStore.listEnrollments(name);

        res.json(filenames.map(filename => ({
            filename,
            url: enrollmentImageUrl(name, filename),
        })));
    } catch (error) {
        next(error);
    }
});

/**
 * GET /api/known-faces/:name/images/:filename
 * Serve one enrollment image. Filenames that would leave the person's
 * directory are rejected.
 */
router.get('/:name/images/:filename', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const { name, filename } = req.params;

        if (!isSafeSegment(filename)) {
            console.error(`[API] Path traversal attempt - name=${name}, filename=${filename}`);
            throw forbidden('Invalid filename');
        }

        const image = await getServices().embeddingStore.readEnrollmentImage(name, filename);
        if (!image) {
            throw notFound('Image not found');
        }

        res.type('image/jpeg').send(image);
    } catch (error) {
        next(error);
    }
});

/**
 * DELETE /api/known-faces/:name/images/:filename
 * Remove a single enrollment
 */
router.delete('/:name/images/:filename', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const { name, filename } = req.params;

        if (!isSafeSegment(filename)) {
            throw forbidden('Invalid filename');
        }

        const deleted = await getServices().curation.deleteEnrollment(name, filename);
        if (!deleted) {
            throw notFound('Image not found');
        }

        res.json({ message: 'Face image deleted successfully' });
    } catch (error) {
        next(error);
    }
});

export default router;

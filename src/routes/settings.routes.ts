/**
 * Settings Routes
 *
 * Webhook target and matching tolerance. Updates replace the whole record.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { getServices } from '../services/index.js';
import { settingsSchema } from '../types/settings.js';

const router = Router();

/**
 * GET /api/settings
 */
router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
        res.json(await getServices().settingsStore.load());
    } catch (error) {
        next(error);
    }
});

/**
 * PUT /api/settings
 */
router.put('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const settings = settingsSchema.parse(req.body);
        res.json(await getServices().settingsStore.save(settings));
    } catch (error) {
        next(error);
    }
});

export default router;

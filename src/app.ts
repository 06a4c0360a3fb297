import express from 'express';
import cors from 'cors';

import recognizeRoutes from './routes/recognize.routes.js';
import knownFacesRoutes from './routes/known-faces.routes.js';
import unknownFacesRoutes from './routes/unknown-faces.routes.js';
import recognitionHistoryRoutes from './routes/recognition-history.routes.js';
import settingsRoutes from './routes/settings.routes.js';
import { errorHandler } from './middleware/error.middleware.js';
import { getServices } from './services/index.js';

export function createApp(): express.Express {
    const { config } = getServices();
    const app = express();

    app.use(cors({
        origin: (origin, callback) => {
            // Requests without Origin header (same-origin, curl, cameras)
            if (!origin || config.allowedOrigins.includes(origin)) {
                callback(null, origin || true);
            } else {
                console.log(`[CORS] Blocked origin: ${origin}`);
                callback(null, false);
            }
        },
    }));
    app.use(express.json({ limit: '1mb' }));
    app.use(express.urlencoded({ extended: true }));

    // Health check
    app.get('/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    // API Routes
    app.use('/api/recognize', recognizeRoutes);
    app.use('/api/known-faces', knownFacesRoutes);
    app.use('/api/unknown-faces', unknownFacesRoutes);
    app.use('/api/recognition-history', recognitionHistoryRoutes);
    app.use('/api/settings', settingsRoutes);

    // Error handling
    app.use(errorHandler);

    return app;
}

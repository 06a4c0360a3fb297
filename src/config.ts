/**
 * Runtime Configuration
 *
 * Reads process.env (populated by dotenv in index.ts) and validates it.
 * Every value has a development default so the server boots with an empty .env.
 */

import path from 'path';
import { z } from 'zod';

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8000),
    NODE_ENV: z.string().default('development'),
    FACES_DIR: z.string().min(1).default('faces'),
    FACE_TOLERANCE: z.coerce.number().nonnegative().default(0.75),
    USE_MOCK_SERVICES: z.string().optional(),
    DETECTOR_URL: z.string().url().default('http://localhost:5001'),
    DETECTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    FRONTEND_URL: z.string().optional(),
});

export interface AppConfig {
    port: number;
    nodeEnv: string;
    facesDir: string;
    defaultTolerance: number;
    useMockServices: boolean;
    detectorUrl: string;
    detectorTimeoutMs: number;
    webhookTimeoutMs: number;
    allowedOrigins: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.parse(env);

    return {
        port: parsed.PORT,
        nodeEnv: parsed.NODE_ENV,
        facesDir: path.resolve(process.cwd(), parsed.FACES_DIR),
        defaultTolerance: parsed.FACE_TOLERANCE,
        useMockServices: parsed.USE_MOCK_SERVICES === 'true',
        detectorUrl: parsed.DETECTOR_URL,
        detectorTimeoutMs: parsed.DETECTOR_TIMEOUT_MS,
        webhookTimeoutMs: parsed.WEBHOOK_TIMEOUT_MS,
        allowedOrigins: [...new Set([
            parsed.FRONTEND_URL || 'http://localhost:3000',
            'http://localhost:3000',
            'http://localhost:5173',
        ])],
    };
}

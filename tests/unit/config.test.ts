import path from 'path';
import { ZodError } from 'zod';
import { loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
    it('applies defaults to an empty environment', () => {
        const config = loadConfig({});

        expect(config).toEqual({
            port: 8000,
            nodeEnv: 'development',
            facesDir: path.resolve(process.cwd(), 'faces'),
            defaultTolerance: 0.75,
            useMockServices: false,
            detectorUrl: 'http://localhost:5001',
            detectorTimeoutMs: 30000,
            webhookTimeoutMs: 5000,
            allowedOrigins: ['http://localhost:3000', 'http://localhost:5173'],
        });
    });

    it('reads overrides', () => {
        const config = loadConfig({
            PORT: '9000',
            FACES_DIR: '/srv/faces',
            FACE_TOLERANCE: '0.6',
            USE_MOCK_SERVICES: 'true',
            DETECTOR_URL: 'http://detector.test:5001',
            FRONTEND_URL: 'https://app.test',
        });

        expect(config).toMatchObject({
            port: 9000,
            facesDir: path.resolve('/srv/faces'),
            defaultTolerance: 0.6,
            useMockServices: true,
            detectorUrl: 'http://detector.test:5001',
        });
        expect(config.allowedOrigins[0]).toBe('https://app.test');
    });

    it('only enables mock services for the exact string "true"', () => {
        expect(loadConfig({ USE_MOCK_SERVICES: '1' }).useMockServices).toBe(false);
    });

    it('rejects a negative tolerance', () => {
        expect(() => loadConfig({ FACE_TOLERANCE: '-1' })).toThrow(ZodError);
    });
});

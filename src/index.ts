import dotenv from 'dotenv';

// Load environment variables before anything reads the config
dotenv.config();

import { createApp } from './app.js';
import { getServices } from './services/index.js';

const { config, cache } = getServices();
const app = createApp();

const server = app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`Mock services: ${config.useMockServices ? 'ENABLED' : 'DISABLED'}`);
});

// Warm the embedding cache so the first recognition does not pay for the load
cache.getSnapshot()
    .catch(err => console.error('[CACHE] Initial load failed:', err));

// Graceful shutdown
process.on('SIGTERM', () => {
    console.log('SIGTERM received, shutting down...');
    server.close(() => process.exit(0));
});

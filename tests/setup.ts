import os from 'os';
import path from 'path';

process.env.NODE_ENV = 'test';
process.env.USE_MOCK_SERVICES = 'true';
process.env.FACES_DIR = path.join(os.tmpdir(), `face-registry-test-${process.pid}`);
process.env.WEBHOOK_TIMEOUT_MS = '1000';

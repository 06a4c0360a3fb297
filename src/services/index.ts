/**
 * Service Factory
 *
 * Builds the store, cache and pipeline instances once per process.
 * Switch between the mock and HTTP face detector via USE_MOCK_SERVICES env var.
 */

import { AppConfig, loadConfig } from '../config.js';
import { IFaceDetectorService } from './interfaces/face-detector.interface.js';
import {
    IEmbeddingStore,
    IRecognitionEventStore,
    ISettingsStore,
    IUnknownFaceStore,
} from './interfaces/storage.interface.js';
import { mockFaceDetectorService } from './mock/face-detector.service.js';
import { HttpFaceDetectorService } from './http/face-detector.service.js';
import { LocalEmbeddingStore } from './local/embedding-store.service.js';
import { LocalUnknownFaceStore } from './local/unknown-face-store.service.js';
import { LocalRecognitionEventStore } from './local/recognition-event-store.service.js';
import { LocalSettingsStore } from './local/settings-store.service.js';
import { EmbeddingCacheService } from './embedding-cache.service.js';
import { RecognitionService } from './recognition.service.js';
import { CurationService } from './curation.service.js';
import { WebhookService } from './webhook.service.js';
import { DEFAULT_SETTINGS } from '../types/settings.js';

export interface Services {
    config: AppConfig;
    detector: IFaceDetectorService;
    embeddingStore: IEmbeddingStore;
    unknownFaceStore: IUnknownFaceStore;
    eventStore: IRecognitionEventStore;
    settingsStore: ISettingsStore;
    cache: EmbeddingCacheService;
    recognition: RecognitionService;
    curation: CurationService;
    webhook: WebhookService;
}

export function createServices(config: AppConfig): Services {
    const detector: IFaceDetectorService = config.useMockServices
        ? mockFaceDetectorService
        : new HttpFaceDetectorService({ baseUrl: config.detectorUrl, timeoutMs: config.detectorTimeoutMs });

    const embeddingStore = new LocalEmbeddingStore(config.facesDir, detector);
    const unknownFaceStore = new LocalUnknownFaceStore(config.facesDir);
    const eventStore = new LocalRecognitionEventStore(config.facesDir);
    const settingsStore = new LocalSettingsStore(config.facesDir, {
        ...DEFAULT_SETTINGS,
        tolerance: config.defaultTolerance,
    });
    const cache = new EmbeddingCacheService(embeddingStore);

    return {
        config,
        detector,
        embeddingStore,
        unknownFaceStore,
        eventStore,
        settingsStore,
        cache,
        recognition: new RecognitionService(detector, cache, eventStore, unknownFaceStore, settingsStore),
        curation: new CurationService(embeddingStore, cache, unknownFaceStore, eventStore),
        webhook: new WebhookService(settingsStore, config.webhookTimeoutMs),
    };
}

let services: Services | null = null;

export function getServices(): Services {
    if (!services) {
        services = createServices(loadConfig());
        console.log(`[SERVICES] Faces directory: ${services.config.facesDir}`);
        console.log(`[SERVICES] Using ${services.detector.getProviderName()} face detector`);
    }
    return services;
}

/** Drop the cached instances so the next getServices() rereads the environment. */
export function resetServices(): void {
    services = null;
}

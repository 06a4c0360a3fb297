/**
 * Embedding Cache Service
 *
 * Keeps an in-memory snapshot of every enrolled embedding so recognition does
 * not hit the filesystem per request.
 *
 * Key features:
 * - Snapshot tagged with the store generation it was read at
 * - Full reload whenever the store generation moved or invalidate() was called
 * - Reloads serialized behind a mutex; readers never see a snapshot older than
 *   the last completed mutation
 * - No TTL and no incremental updates
 */

import { IEmbeddingStore } from './interfaces/storage.interface.js';
import { EmbeddingSnapshot, Embedding, MatchResult } from '../types/face.js';
import { findBestMatch } from './matcher.service.js';
import { Mutex } from '../utils/mutex.js';

interface CachedSnapshot {
    generation: number;
    epoch: number;
    snapshot: EmbeddingSnapshot;
}

export class EmbeddingCacheService {
    private cached: CachedSnapshot | null = null;
    // Bumped by invalidate(); a snapshot read before the bump is stale
    private epoch = 0;
    private readonly reloadLock = new Mutex();
    private reloadCount = 0;

    constructor(private readonly store: IEmbeddingStore) {}

    /**
     * Mark the snapshot stale. Mutating callers do this in addition to the
     * store's own generation bump.
     */
    invalidate(): void {
        this.epoch++;
        this.cached = null;
    }

    /** Number of full reloads performed so far */
    get reloads(): number {
        return this.reloadCount;
    }

    private isFresh(entry: CachedSnapshot | null): entry is CachedSnapshot {
        return entry !== null && entry.generation === this.store.generation && entry.epoch === this.epoch;
    }

    /**
     * Current snapshot, reloading first if it is stale.
     */
    async getSnapshot(): Promise<EmbeddingSnapshot> {
        const current = this.cached;
        if (this.isFresh(current)) {
            return current.snapshot;
        }

        return this.reloadLock.runExclusive(async () => {
            // A mutation that lands while we read is caught by the generation
            // check and forces another pass.
            for (;;) {
                const entry = this.cached;
                if (this.isFresh(entry)) {
                    return entry.snapshot;
                }

                const generation = this.store.generation;
                const epoch = this.epoch;
                const snapshot = await this.store.loadSnapshot();
                this.cached = { generation, epoch, snapshot };
                this.reloadCount++;
                console.log(`[CACHE] Reloaded embeddings: identities=${snapshot.size}, generation=${generation}`);
            }
        });
    }

    /** Explicit reload regardless of staleness */
    async reload(): Promise<EmbeddingSnapshot> {
        this.invalidate();
        return this.getSnapshot();
    }

    async match(probe: Embedding, tolerance: number): Promise<MatchResult> {
        const snapshot = await this.getSnapshot();
        return findBestMatch(probe, snapshot, tolerance);
    }
}

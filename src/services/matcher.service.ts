/**
 * Embedding Matcher
 *
 * Nearest-identity search over an embedding snapshot. The tolerance is
 * compared directly against Euclidean distance, which is unbounded; 0.75 is
 * the conventional default for 128-d face embeddings, not a probability.
 */

import { Embedding, EmbeddingSnapshot, MatchResult } from '../types/face.js';

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new RangeError(`Embedding length mismatch: ${a.length} vs ${b.length}`);
    }

    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        const diff = a[i] - b[i];
        sum += diff * diff;
    }
    return Math.sqrt(sum);
}

/**
 * Closest identity for a probe embedding.
 *
 * Identities are scanned in snapshot order and only a strictly smaller
 * distance replaces the current best, so ties go to the first identity.
 * Reference embeddings whose length differs from the probe's (e.g. enrolled
 * with another detector) are skipped.
 */
export function findBestMatch(
    probe: Embedding,
    snapshot: EmbeddingSnapshot,
    tolerance: number
): MatchResult {
    let bestName: string | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;

    let skipped = 0;

    for (const [name, embeddings] of snapshot) {
        for (const embedding of embeddings) {
            if (embedding.length !== probe.length) {
                skipped++;
                continue;
            }
            const distance = euclideanDistance(probe, embedding);
            if (distance < bestDistance) {
                bestDistance = distance;
                bestName = name;
            }
        }
    }

    if (skipped > 0) {
        console.warn(`[MATCHER] Skipped ${skipped} reference embedding(s) not of length ${probe.length}`);
    }

    if (bestName === null) {
        return { matched: false, name: '', distance: null };
    }

    const matched = bestDistance <= tolerance;
    return {
        matched,
        name: matched ? bestName : '',
        distance: bestDistance,
    };
}

/**
 * @file Seeded Random Streams
 *
 * Each target draws from its own deterministic stream, seeded from the
 * pipeline seed and the target's name. Renaming a target or changing
 * the pipeline seed changes its numbers; nothing else does.
 *
 * @module dag/execution
 */

import { digest_text } from '../fingerprint/hasher.js';

/** Pipeline seed used when none is configured. */
export const DEFAULT_PIPELINE_SEED = 0;

/** 32-bit seed for one target. */
export function seed_derive(pipelineSeed: number, targetName: string): number {
    return parseInt(digest_text(`${pipelineSeed}:${targetName}`).slice(0, 8), 16);
}

/** Mulberry32: a small 32-bit generator yielding numbers in [0, 1). */
export function random_create(seed: number): () => number {
    let state: number = seed >>> 0;
    return (): number => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t: number = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

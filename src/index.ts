/**
 * Legacy Subtractive Random Public API
 *
 * @module legacy-subtractive-random
 */

import { Random } from './random/random.js';
import { SeededStrategy } from './random/seeded.js';
import { OverridableStrategy } from './random/overridable.js';
import { SubtractiveEngine } from './random/subtractive.js';
import { createStrategy } from './random/strategy.js';
import { sharedSeedSource } from './random/shared.js';
import type { RandomOptions } from './random/types.js';

export type {
    RandomLogger as Logger,
    RandomOptions,
    RandomStrategy,
    SampleSource,
    SeedSource,
    StrategyVariant,
} from './random/types.js';
export { RandomError, ArgumentOutOfRangeError } from './random/errors.js';
export { INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN } from './random/constants.js';
export { Random, SeededStrategy, OverridableStrategy, SubtractiveEngine, createStrategy, sharedSeedSource };
export { SharedSeedSource } from './random/shared.js';

export const LegacyRandom = {
    /**
     * Creates a generator. Without a seed one is drawn from the shared seed source.
     */
    create: (seed?: number, options?: RandomOptions): Random => new Random(seed, options),

    /**
     * Creates the direct strategy for a fixed seed, bypassing the front object.
     */
    seeded: (seed: number, options?: Pick<RandomOptions, 'logger'>): SeededStrategy => new SeededStrategy(seed, options),

    /**
     * Fills a new buffer of `length` bytes from a fresh generator seeded with `seed`.
     */
    bytes: (seed: number, length: number): Uint8Array => {
        const buffer = new Uint8Array(length);
        new SeededStrategy(seed).nextBytes(buffer);
        return buffer;
    },

    Random,
};

export default LegacyRandom;

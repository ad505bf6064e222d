import { INT32_MAX } from './constants.js';
import { packUInt64 } from './bits.js';
import { HIGH_PART_BOUND, LOW_PART_BOUND, MID_PART_BOUND, StrategyBase } from './strategy-base.js';
import type { RandomOptions } from './types.js';

/**
 * Direct strategy: the engine is initialised at construction and every
 * operation reads it directly. Used when a seed is given and nothing can
 * override the sampling primitives.
 */
export class SeededStrategy extends StrategyBase {
    constructor(seed: number, options: Pick<RandomOptions, 'logger'> = {}) {
        super(seed, options.logger ?? null);
        this.engine.ensureInitialized(seed);
    }

    sample(): number {
        return this.engine.sample();
    }

    nextDouble(): number {
        return this.engine.sample();
    }

    nextBytes(buffer: Uint8Array): void {
        this.engine.nextBytes(buffer);
    }

    fillBytes(buffer: Uint8Array): void {
        this.engine.nextBytes(buffer);
    }

    protected nextRaw(): number {
        return this.engine.internalSample();
    }

    protected nextBelow(maxValue: number): number {
        // sample * maxValue < 2^31, so truncation is exact.
        return Math.trunc(this.engine.sample() * maxValue);
    }

    protected nextBetween(minValue: number, maxValue: number): number {
        const range = maxValue - minValue;
        return range <= INT32_MAX
            ? Math.trunc(this.engine.sample() * range) + minValue
            : Math.trunc(this.engine.sampleForLargeRange() * range) + minValue;
    }

    protected nextUInt64(): bigint {
        return packUInt64(
            this.nextBelow(LOW_PART_BOUND),
            this.nextBelow(MID_PART_BOUND),
            this.nextBelow(HIGH_PART_BOUND),
        );
    }

    protected singleSource(): number {
        return this.engine.sample();
    }
}

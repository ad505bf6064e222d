import { INT32_MAX } from './constants.js';
import { packUInt64 } from './bits.js';
import { HIGH_PART_BOUND, LOW_PART_BOUND, MID_PART_BOUND, StrategyBase } from './strategy-base.js';
import type { RandomOptions, SampleSource } from './types.js';

/**
 * Strategy for front objects whose primitives may be overridden.
 *
 * The engine is created on the first sampling call from the seed captured at
 * construction. Composite operations call back through `source` so that a
 * replaced `sample()` or `nextInt()` shows up in everything built on it;
 * without overrides the output matches {@link SeededStrategy} exactly.
 *
 * Lazy initialisation is a plain presence check. Concurrent first use of one
 * instance is the caller's problem, as is any other concurrent use.
 */
export class OverridableStrategy extends StrategyBase {
    constructor(
        private readonly source: SampleSource,
        seed: number,
        options: Pick<RandomOptions, 'logger'> = {},
    ) {
        super(seed, options.logger ?? null);
    }

    sample(): number {
        this.ensureReady();
        return this.engine.sample();
    }

    nextDouble(): number {
        this.ensureReady();
        return this.source.sample();
    }

    nextBytes(buffer: Uint8Array): void {
        this.ensureReady();
        this.engine.nextBytes(buffer);
    }

    fillBytes(buffer: Uint8Array): void {
        this.ensureReady();
        for (let i = 0; i < buffer.length; i++) {
            buffer[i] = this.source.nextInt() & 0xff;
        }
    }

    protected nextRaw(): number {
        this.ensureReady();
        return this.engine.internalSample();
    }

    protected nextBelow(maxValue: number): number {
        this.ensureReady();
        return Math.trunc(this.source.sample() * maxValue);
    }

    protected nextBetween(minValue: number, maxValue: number): number {
        this.ensureReady();
        const range = maxValue - minValue;
        // The wide branch reads the engine directly, as it always has.
        return range <= INT32_MAX
            ? Math.trunc(this.source.sample() * range) + minValue
            : Math.trunc(this.engine.sampleForLargeRange() * range) + minValue;
    }

    protected nextUInt64(): bigint {
        return packUInt64(
            this.source.nextIntBelow(LOW_PART_BOUND),
            this.source.nextIntBelow(MID_PART_BOUND),
            this.source.nextIntBelow(HIGH_PART_BOUND),
        );
    }

    protected singleSource(): number {
        return this.source.sample();
    }
}

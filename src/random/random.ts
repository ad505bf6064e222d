import { sharedSeedSource } from './shared.js';
import { createStrategy } from './strategy.js';
import type { RandomOptions, RandomStrategy, SampleSource, StrategyVariant } from './types.js';

/**
 * Seeded, legacy-compatible pseudo-random generator. Not cryptographically
 * strong.
 *
 * `Random` itself reads its engine directly. A subclass is routed through the
 * overridable strategy: overriding `sample()` changes `nextInt(max)`,
 * `nextInt(min, max)`, `nextInt64(...)`, `nextDouble()` and `nextSingle()`,
 * and overriding `nextInt()` changes `fillBytes()`.
 *
 * Instances are not safe for concurrent use.
 *
 * @example
 * const rng = new Random(42);
 * rng.nextInt(100); // 66
 */
export class Random {
    private readonly impl: RandomStrategy;

    constructor(seed?: number, options: RandomOptions = {}) {
        const resolved: Required<RandomOptions> = {
            logger: options.logger ?? null,
            seedSource: options.seedSource ?? sharedSeedSource,
            overridable: options.overridable ?? new.target !== Random,
        };

        const variant: StrategyVariant = resolved.overridable
            ? { kind: 'overridable', source: this.bindSampleSource() }
            : { kind: 'direct' };

        this.impl = createStrategy(variant, seed ?? resolved.seedSource.nextSeed(), { logger: resolved.logger });
    }

    get seed(): number {
        return this.impl.seed;
    }

    /** Double in [0, 1). The primitive subclasses override. */
    protected sample(): number {
        return this.impl.sample();
    }

    /**
     * `nextInt()`: integer in [0, INT32_MAX).
     * `nextInt(maxValue)`: integer in [0, maxValue); `maxValue >= 0`.
     * `nextInt(minValue, maxValue)`: integer in [minValue, maxValue); `minValue <= maxValue`.
     */
    nextInt(): number;
    nextInt(maxValue: number): number;
    nextInt(minValue: number, maxValue: number): number;
    nextInt(first?: number, second?: number): number {
        if (first === undefined) {
            return this.impl.nextInt();
        }
        return second === undefined ? this.impl.nextInt(first) : this.impl.nextInt(first, second);
    }

    /** Same shapes as {@link nextInt}, over signed 64-bit values; `nextInt64()` never returns INT64_MAX. */
    nextInt64(): bigint;
    nextInt64(maxValue: bigint): bigint;
    nextInt64(minValue: bigint, maxValue: bigint): bigint;
    nextInt64(first?: bigint, second?: bigint): bigint {
        if (first === undefined) {
            return this.impl.nextInt64();
        }
        return second === undefined ? this.impl.nextInt64(first) : this.impl.nextInt64(first, second);
    }

    nextDouble(): number {
        return this.impl.nextDouble();
    }

    /** Single-precision value in [0, 1). */
    nextSingle(): number {
        return this.impl.nextSingle();
    }

    nextBytes(buffer: Uint8Array): void {
        this.impl.nextBytes(buffer);
    }

    fillBytes(buffer: Uint8Array): void {
        this.impl.fillBytes(buffer);
    }

    private bindSampleSource(): SampleSource {
        return {
            sample: () => this.sample(),
            nextInt: () => this.nextInt(),
            nextIntBelow: (maxValue: number) => this.nextInt(maxValue),
        };
    }
}

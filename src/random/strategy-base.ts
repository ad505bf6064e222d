import { INT64_MAX, UINT64_PART_BITS } from './constants.js';
import { log2Ceiling, toSingle } from './bits.js';
import { assertInt32, assertInt64, assertNonNegative, assertOrdered } from './guards.js';
import { SubtractiveEngine } from './subtractive.js';
import type { RandomLogger, RandomStrategy } from './types.js';

export const [LOW_PART_BOUND, MID_PART_BOUND, HIGH_PART_BOUND] = UINT64_PART_BITS.map(bits => 2 ** bits);

/**
 * Argument checks, overload dispatch and the rejection-sampling loops shared
 * by both strategies. Subclasses decide where each primitive reads from.
 */
export abstract class StrategyBase implements RandomStrategy {
    protected readonly engine = new SubtractiveEngine();

    constructor(
        public readonly seed: number,
        protected readonly logger: RandomLogger | null,
    ) {
        assertInt32('seed', seed);
    }

    abstract sample(): number;
    abstract nextDouble(): number;
    abstract nextBytes(buffer: Uint8Array): void;
    abstract fillBytes(buffer: Uint8Array): void;

    protected abstract nextRaw(): number;
    protected abstract nextBelow(maxValue: number): number;
    protected abstract nextBetween(minValue: number, maxValue: number): number;
    /** Value in [0, 2^64). */
    protected abstract nextUInt64(): bigint;
    /** The double `nextSingle` narrows. */
    protected abstract singleSource(): number;

    protected ensureReady(): void {
        if (!this.engine.isInitialized) {
            this.logger?.debug?.(`[Random] initializing subtractive state (seed=${this.seed})`);
        }
        this.engine.ensureInitialized(this.seed);
    }

    nextInt(): number;
    nextInt(maxValue: number): number;
    nextInt(minValue: number, maxValue: number): number;
    nextInt(first?: number, second?: number): number {
        if (first === undefined) {
            return this.nextRaw();
        }

        if (second === undefined) {
            assertInt32('maxValue', first);
            assertNonNegative('maxValue', first);
            return this.nextBelow(first);
        }

        assertInt32('minValue', first);
        assertInt32('maxValue', second);
        assertOrdered(first, second);
        return this.nextBetween(first, second);
    }

    nextInt64(): bigint;
    nextInt64(maxValue: bigint): bigint;
    nextInt64(minValue: bigint, maxValue: bigint): bigint;
    nextInt64(first?: bigint, second?: bigint): bigint {
        if (first === undefined) {
            return this.nextNonNegativeInt64();
        }

        if (second === undefined) {
            assertInt64('maxValue', first);
            assertNonNegative('maxValue', first);
            return this.nextInt64InRange(0n, first);
        }

        assertInt64('minValue', first);
        assertInt64('maxValue', second);
        assertOrdered(first, second);
        return this.nextInt64InRange(first, second);
    }

    nextSingle(): number {
        this.ensureReady();
        while (true) {
            const f = toSingle(this.singleSource());
            if (f < 1.0) {
                return f;
            }
            this.logger?.debug?.('[Random] nextSingle: rounded up to 1.0, redrawing');
        }
    }

    private nextNonNegativeInt64(): bigint {
        this.ensureReady();
        while (true) {
            // Top 63 bits give [0, INT64_MAX]; the maximum itself is outside the contract.
            const result = this.nextUInt64() >> 1n;
            if (result !== INT64_MAX) {
                return result;
            }
            this.logger?.debug?.('[Random] nextInt64: drew INT64_MAX, redrawing');
        }
    }

    private nextInt64InRange(minValue: bigint, maxValue: bigint): bigint {
        const exclusiveRange = BigInt.asUintN(64, maxValue - minValue);

        if (exclusiveRange > 1n) {
            this.ensureReady();

            // Smallest power-of-two range covering exclusiveRange, then reject the overshoot.
            const shift = BigInt(64 - log2Ceiling(exclusiveRange));
            while (true) {
                const result = this.nextUInt64() >> shift;
                if (result < exclusiveRange) {
                    return result + minValue;
                }
                this.logger?.debug?.(`[Random] nextInt64: ${result} outside [0, ${exclusiveRange}), redrawing`);
            }
        }

        // minValue === maxValue or minValue + 1 === maxValue
        return minValue;
    }
}

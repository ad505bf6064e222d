import { INITIAL_INEXTP, INT32_MAX, INT32_MIN, SEED_MAGIC, STATE_SIZE } from './constants.js';
import { RandomError } from './errors.js';

/**
 * Modified Knuth subtractive generator, kept bit-compatible with the
 * historical seeded sequence.
 *
 * The state table is an `Int32Array` so every store wraps to signed 32 bits
 * exactly as the historical integer arithmetic did. Differences that are
 * compared before being stored are wrapped explicitly with `| 0`.
 *
 * Not safe for concurrent use; one owner per engine.
 */
export class SubtractiveEngine {
    private seedArray: Int32Array | null = null;
    private inext = 0;
    private inextp = 0;

    get isInitialized(): boolean {
        return this.seedArray !== null;
    }

    /** Plain presence check, not a one-time barrier. */
    ensureInitialized(seed: number): void {
        if (this.seedArray === null) {
            this.initialize(seed);
        }
    }

    private initialize(seed: number): void {
        const seedArray = new Int32Array(STATE_SIZE);

        const subtraction = seed === INT32_MIN ? INT32_MAX : Math.abs(seed);
        let mj = (SEED_MAGIC - subtraction) | 0;
        seedArray[55] = mj;
        let mk = 1;

        // Slots 1..54 are visited with stride 21; slot 0 stays unused.
        let ii = 0;
        for (let i = 1; i < 55; i++) {
            if ((ii += 21) >= 55) {
                ii -= 55;
            }

            seedArray[ii] = mk;
            mk = (mj - mk) | 0;
            if (mk < 0) {
                mk = (mk + INT32_MAX) | 0;
            }

            mj = seedArray[ii];
        }

        for (let k = 1; k < 5; k++) {
            for (let i = 1; i < 56; i++) {
                let n = i + 30;
                if (n >= 55) {
                    n -= 55;
                }

                seedArray[i] -= seedArray[1 + n];
                if (seedArray[i] < 0) {
                    seedArray[i] += INT32_MAX;
                }
            }
        }

        this.seedArray = seedArray;
        this.inext = 0;
        this.inextp = INITIAL_INEXTP;
    }

    /** Raw sample in [0, INT32_MAX - 1]. Mutates the state table. */
    internalSample(): number {
        const seedArray = this.seedArray;
        if (seedArray === null) {
            throw new RandomError('SubtractiveEngine: sampled before initialization');
        }

        let locINext = this.inext;
        if (++locINext >= STATE_SIZE) {
            locINext = 1;
        }

        let locINextp = this.inextp;
        if (++locINextp >= STATE_SIZE) {
            locINextp = 1;
        }

        let retVal = (seedArray[locINext] - seedArray[locINextp]) | 0;

        if (retVal === INT32_MAX) {
            retVal--;
        }
        if (retVal < 0) {
            retVal = (retVal + INT32_MAX) | 0;
        }

        seedArray[locINext] = retVal;
        this.inext = locINext;
        this.inextp = locINextp;

        return retVal;
    }

    /** Double in [0, 1). */
    sample(): number {
        return this.internalSample() * (1.0 / INT32_MAX);
    }

    /**
     * Double in [0, 1) with enough resolution for ranges wider than 2^31.
     * `sample()` scaled over such a range would only ever hit even values.
     */
    sampleForLargeRange(): number {
        let result = this.internalSample();

        // Sign from the parity of a second draw; adding two draws would skew the distribution.
        if (this.internalSample() % 2 === 0) {
            result = -result;
        }

        let d = result;
        d += INT32_MAX - 1; // [0, 2 * INT32_MAX - 1)
        d /= 2 * INT32_MAX - 1;
        return d;
    }

    /** One raw sample per byte, low 8 bits kept. */
    nextBytes(buffer: Uint8Array): void {
        for (let i = 0; i < buffer.length; i++) {
            buffer[i] = this.internalSample() & 0xff;
        }
    }
}

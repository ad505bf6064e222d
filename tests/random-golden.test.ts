// NOTE: Vitest globals are enabled (see vitest.config.ts).

import { createHash } from 'node:crypto';

import { Random } from '../src/random/random.js';
import { SeededStrategy } from '../src/random/seeded.js';
import { INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN } from '../src/random/constants.js';
import { loadSeedVectors } from './helpers/test-utils.js';

type Generator = Pick<Random, 'nextInt' | 'nextInt64' | 'nextDouble' | 'nextSingle' | 'nextBytes'>;

class Derived extends Random {}

const FACTORIES: Array<[string, (seed: number) => Generator]> = [
    ['SeededStrategy', seed => new SeededStrategy(seed)],
    ['Random', seed => new Random(seed)],
    ['Random subclass', seed => new Derived(seed)],
];

function times<T>(count: number, fn: () => T): T[] {
    return Array.from({ length: count }, fn);
}

describe('Golden seed vectors', () => {
    const { seeds } = loadSeedVectors();

    it('fixture covers the documented seeds', () => {
        expect(seeds.map(v => v.seed)).toEqual([0, 1, 42, -42, INT32_MIN, INT32_MAX, 123456789]);
    });

    for (const [label, create] of FACTORIES) {
        describe(label, () => {
            for (const v of seeds) {
                it(`seed ${v.seed}: integer operations match`, () => {
                    const raw = create(v.seed);
                    expect(times(20, () => raw.nextInt())).toEqual(v.internalSamples);

                    const below = create(v.seed);
                    expect(times(20, () => below.nextInt(100))).toEqual(v.nextIntBelow100);

                    const between = create(v.seed);
                    expect(times(10, () => between.nextInt(-1000, 1000))).toEqual(v.nextIntBetweenMinus1000And1000);

                    const full = create(v.seed);
                    expect(times(10, () => full.nextInt(INT32_MIN, INT32_MAX))).toEqual(v.nextIntFullRange);
                });

                it(`seed ${v.seed}: floating-point operations match`, () => {
                    const doubles = create(v.seed);
                    expect(times(5, () => doubles.nextDouble())).toEqual(v.nextDouble);

                    const singles = create(v.seed);
                    expect(times(5, () => singles.nextSingle())).toEqual(v.nextSingle);
                });

                it(`seed ${v.seed}: 64-bit operations match`, () => {
                    const plain = create(v.seed);
                    expect(times(5, () => plain.nextInt64())).toEqual(v.nextInt64.map(BigInt));

                    const below = create(v.seed);
                    expect(times(5, () => below.nextInt64(1_000_000_000_000n))).toEqual(v.nextInt64Below1e12.map(BigInt));

                    const full = create(v.seed);
                    expect(times(5, () => full.nextInt64(INT64_MIN, INT64_MAX))).toEqual(v.nextInt64FullRange.map(BigInt));
                });

                it(`seed ${v.seed}: byte stream hash matches`, () => {
                    const buffer = new Uint8Array(4096);
                    create(v.seed).nextBytes(buffer);
                    expect(createHash('sha256').update(buffer).digest('hex')).toBe(v.bytes4096Sha256);
                });
            }
        });
    }
});

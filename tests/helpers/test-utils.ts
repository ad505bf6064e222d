import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Logger, SampleSource } from '../../src/index.js';

export type SeedVector = {
    seed: number;
    internalSamples: number[];
    nextIntBelow100: number[];
    nextIntBetweenMinus1000And1000: number[];
    nextIntFullRange: number[];
    nextDouble: number[];
    nextSingle: number[];
    /** Decimal strings; JSON has no 64-bit integers. */
    nextInt64: string[];
    nextInt64Below1e12: string[];
    nextInt64FullRange: string[];
    bytes4096Sha256: string;
};

export type SeedVectorFile = {
    name: string;
    seeds: SeedVector[];
};

export function loadSeedVectors(): SeedVectorFile {
    const __filename = fileURLToPath(import.meta.url);
    const dir = path.resolve(path.dirname(__filename), '../fixtures/golden');
    return JSON.parse(readFileSync(path.join(dir, 'seed-vectors.expected.json'), 'utf8')) as SeedVectorFile;
}

/** Number of draws for the bound tests; override with RANDOM_DRAWS. */
export function drawCount(): number {
    return Number(process.env.RANDOM_DRAWS ?? '1000000');
}

export function recordingLogger(): Logger & { messages: string[] } {
    const messages: string[] = [];
    return {
        messages,
        debug: (msg: string) => { messages.push(msg); },
    };
}

/**
 * A SampleSource that replays fixed doubles (cycling). `nextIntBelow` scales
 * them the way the front object would; `nextInt` always returns `rawInt`.
 */
export function replaySource(samples: number[], rawInt = 0): SampleSource & { calls: number } {
    let i = 0;
    const source: SampleSource & { calls: number } = {
        calls: 0,
        sample(): number {
            source.calls++;
            const value = samples[i % samples.length];
            i++;
            return value;
        },
        nextInt(): number {
            return rawInt;
        },
        nextIntBelow(maxValue: number): number {
            return Math.trunc(source.sample() * maxValue);
        },
    };
    return source;
}

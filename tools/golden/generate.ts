import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createHash } from 'node:crypto';

import { SeededStrategy, INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN } from '../../src/index.js';

const SEEDS = [0, 1, 42, -42, INT32_MIN, INT32_MAX, 123456789];

function sha256Hex(bytes: Uint8Array): string {
    return createHash('sha256').update(bytes).digest('hex');
}

function draw<T>(seed: number, count: number, fn: (rng: SeededStrategy) => T): T[] {
    const rng = new SeededStrategy(seed);
    return Array.from({ length: count }, () => fn(rng));
}

function buildSeedVector(seed: number) {
    const bytes = new Uint8Array(4096);
    new SeededStrategy(seed).nextBytes(bytes);

    return {
        seed,
        internalSamples: draw(seed, 20, rng => rng.nextInt()),
        nextIntBelow100: draw(seed, 20, rng => rng.nextInt(100)),
        nextIntBetweenMinus1000And1000: draw(seed, 10, rng => rng.nextInt(-1000, 1000)),
        nextIntFullRange: draw(seed, 10, rng => rng.nextInt(INT32_MIN, INT32_MAX)),
        nextDouble: draw(seed, 5, rng => rng.nextDouble()),
        nextSingle: draw(seed, 5, rng => rng.nextSingle()),
        nextInt64: draw(seed, 5, rng => rng.nextInt64().toString()),
        nextInt64Below1e12: draw(seed, 5, rng => rng.nextInt64(1_000_000_000_000n).toString()),
        nextInt64FullRange: draw(seed, 5, rng => rng.nextInt64(INT64_MIN, INT64_MAX).toString()),
        bytes4096Sha256: sha256Hex(bytes),
    };
}

async function main(): Promise<void> {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const outDir = path.resolve(__dirname, '../../tests/fixtures/golden');
    await mkdir(outDir, { recursive: true });

    const doc = { name: 'seed-vectors', seeds: SEEDS.map(buildSeedVector) };
    const file = path.join(outDir, 'seed-vectors.expected.json');
    await writeFile(file, JSON.stringify(doc, null, 2) + '\n', 'utf8');

    console.log(`[golden] wrote ${SEEDS.length} seed vectors to ${file}`);
}

try {
    await main();
} catch (err) {
    console.error(err);
    process.exit(1);
}

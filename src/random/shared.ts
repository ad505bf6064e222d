import { randomInt } from 'node:crypto';

import { INT32_MAX } from './constants.js';
import type { SeedSource } from './types.js';

/** Process-wide seed provider backed by the OS CSPRNG. */
export class SharedSeedSource implements SeedSource {
    nextSeed(): number {
        return randomInt(0, INT32_MAX);
    }
}

export const sharedSeedSource: SeedSource = new SharedSeedSource();

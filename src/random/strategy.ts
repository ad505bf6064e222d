import { OverridableStrategy } from './overridable.js';
import { SeededStrategy } from './seeded.js';
import type { RandomOptions, RandomStrategy, StrategyVariant } from './types.js';

export function createStrategy(
    variant: StrategyVariant,
    seed: number,
    options: Pick<RandomOptions, 'logger'> = {},
): RandomStrategy {
    switch (variant.kind) {
        case 'direct':
            return new SeededStrategy(seed, options);
        case 'overridable':
            return new OverridableStrategy(variant.source, seed, options);
    }
}

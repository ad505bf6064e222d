export type RandomLogger = {
    debug?: (msg: string) => void;
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/** Supplies a 32-bit seed in [0, INT32_MAX) when a generator is built without one. */
export interface SeedSource {
    nextSeed(): number;
}

/**
 * The override-capable primitives of a front object. The overridable strategy
 * calls back through these instead of its own engine, so a subclass that
 * replaces one primitive changes every operation composed from it.
 */
export interface SampleSource {
    /** A double in [0, 1). */
    sample(): number;
    /** A non-negative 32-bit integer. */
    nextInt(): number;
    /** An integer in [0, maxValue). */
    nextIntBelow(maxValue: number): number;
}

export type StrategyVariant =
    | { kind: 'direct' }
    | { kind: 'overridable'; source: SampleSource };

export type RandomOptions = {
    /** Optional logger hook for initialisation and rejection-sampling messages. */
    logger?: RandomLogger | null;
    /** Seed provider used when no seed is passed. Defaults to the process-wide shared source. */
    seedSource?: SeedSource;
    /**
     * Route composite operations through the instance's overridable primitives.
     * Defaults to `true` for subclasses of `Random` and `false` for `Random` itself.
     */
    overridable?: boolean;
};

/**
 * Operation surface shared by both strategies. Instances are not safe for
 * concurrent use: every call, reads included, mutates the engine state.
 */
export interface RandomStrategy {
    readonly seed: number;

    sample(): number;

    nextInt(): number;
    nextInt(maxValue: number): number;
    nextInt(minValue: number, maxValue: number): number;

    nextInt64(): bigint;
    nextInt64(maxValue: bigint): bigint;
    nextInt64(minValue: bigint, maxValue: bigint): bigint;

    nextDouble(): number;
    nextSingle(): number;

    /** Fills the whole array from the engine. */
    nextBytes(buffer: Uint8Array): void;
    /** Fills a view; the overridable strategy draws each byte through `SampleSource.nextInt`. */
    fillBytes(buffer: Uint8Array): void;
}

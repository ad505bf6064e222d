export const INT32_MAX = 2147483647;
export const INT32_MIN = -2147483648;

export const INT64_MAX = (1n << 63n) - 1n;
export const INT64_MIN = -(1n << 63n);

/** Golden-ratio derived constant the state table is seeded from. */
export const SEED_MAGIC = 161803398;

/** Slot 0 is never used; slots 1..55 hold live state. */
export const STATE_SIZE = 56;
export const INITIAL_INEXTP = 21;

/** Bit widths of the three draws packed into one unsigned 64-bit value. */
export const UINT64_PART_BITS = [22, 22, 20] as const;

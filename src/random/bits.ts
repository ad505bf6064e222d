import { UINT64_PART_BITS } from './constants.js';

const [LOW_BITS, MID_BITS] = UINT64_PART_BITS;

/** ceil(log2(value)) for value >= 1. */
export function log2Ceiling(value: bigint): number {
    return value <= 1n ? 0 : (value - 1n).toString(2).length;
}

/**
 * Packs three narrow draws into an unsigned 64-bit value:
 * `low | mid << 22 | high << 44`. Parts are read as unsigned 32-bit and the
 * result is cut to 64 bits, so out-of-contract parts still pack the way the
 * historical unsigned casts did.
 */
export function packUInt64(low: number, mid: number, high: number): bigint {
    const packed = BigInt(low >>> 0)
        | (BigInt(mid >>> 0) << BigInt(LOW_BITS))
        | (BigInt(high >>> 0) << BigInt(LOW_BITS + MID_BITS));
    return BigInt.asUintN(64, packed);
}

/** Rounds a double to the nearest single-precision value. */
export function toSingle(value: number): number {
    return Math.fround(value);
}

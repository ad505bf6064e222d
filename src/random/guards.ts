import { INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN } from './constants.js';
import { ArgumentOutOfRangeError } from './errors.js';

export function assertInt32(paramName: string, value: number): void {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
        throw new ArgumentOutOfRangeError(paramName, value, 'must be a 32-bit signed integer');
    }
}

export function assertInt64(paramName: string, value: bigint): void {
    if (value < INT64_MIN || value > INT64_MAX) {
        throw new ArgumentOutOfRangeError(paramName, value, 'must be a 64-bit signed integer');
    }
}

export function assertNonNegative(paramName: string, value: number | bigint): void {
    if (typeof value === 'bigint' ? value < 0n : value < 0) {
        throw new ArgumentOutOfRangeError(paramName, value, `'${paramName}' must be greater than or equal to zero`);
    }
}

export function assertOrdered(minValue: number, maxValue: number): void;
export function assertOrdered(minValue: bigint, maxValue: bigint): void;
export function assertOrdered(minValue: number | bigint, maxValue: number | bigint): void {
    if (BigInt(minValue) > BigInt(maxValue)) {
        throw new ArgumentOutOfRangeError('minValue', minValue, `'minValue' cannot be greater than maxValue (${String(maxValue)})`);
    }
}

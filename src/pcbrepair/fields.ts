import { Decimal } from './decimal.js';
import { BadDecimalError, BadIntegerError } from './errors.js';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;
const UNSIGNED_PATTERN = /^\+?\d+$/;

/**
 * Parses a coordinate or radius field. Vendor files written under some locales
 * use `,` as the decimal separator.
 */
export function parseDecimalField(raw: string, row: number | null): Decimal {
    const normalized = raw.replace(/,/g, '.');
    if (!DECIMAL_PATTERN.test(normalized)) {
        throw new BadDecimalError(raw, row);
    }
    return new Decimal(normalized);
}

export const U16_MAX = 0xFFFF;
export const U64_MAX = 2n ** 64n - 1n;

/**
 * Parses a base-10 unsigned integer no larger than `max`.
 */
export function parseUnsignedField(raw: string, row: number | null, max: number): number {
    if (!UNSIGNED_PATTERN.test(raw)) {
        throw new BadIntegerError(raw, row);
    }
    const value = Number(raw);
    if (!Number.isSafeInteger(value) || value > max) {
        throw new BadIntegerError(raw, row);
    }
    return value;
}

/** Parses a base-10 unsigned 64-bit integer. */
export function parseU64Field(raw: string, row: number | null): bigint {
    if (!UNSIGNED_PATTERN.test(raw)) {
        throw new BadIntegerError(raw, row);
    }
    const value = BigInt(raw.replace(/^\+/, ''));
    if (value > U64_MAX) {
        throw new BadIntegerError(raw, row);
    }
    return value;
}

/** Lossy UTF-8 view of a decoded document. */
export function decodeText(bytes: Uint8Array): string {
    return new TextDecoder('utf-8', { fatal: false, ignoreBOM: true }).decode(bytes);
}

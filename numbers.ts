import { ParseError } from './errors';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/**
 * Parses a base-10 integer. Values outside the safe integer range are rejected
 * rather than silently rounded.
 */
export function parseInteger(input: string): number {
    if (!INTEGER_PATTERN.test(input)) {
        throw new ParseError(`Invalid integer: "${input}"`, input);
    }
    const value = Number(input);
    if (!Number.isSafeInteger(value)) {
        throw new ParseError(`Integer out of range: "${input}"`, input);
    }
    return value;
}

export function parseInt32(input: string): number {
    const value = parseInteger(input);
    if (value < INT32_MIN || value > INT32_MAX) {
        throw new ParseError(`Integer out of 32-bit range: "${input}"`, input);
    }
    return value;
}

export function parseFloat64(input: string): number {
    if (!FLOAT_PATTERN.test(input)) {
        throw new ParseError(`Invalid float: "${input}"`, input);
    }
    return Number(input);
}

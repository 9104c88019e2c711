import { ParseError, UnsupportedUnitError } from './errors';
import { parseFloat64 } from './numbers';
import { StorageScale, StorageValue } from './types';

// Decimal factors, as qstat reports them
const SCALE_FACTORS: Record<StorageScale, number> = {
    M: 1000 * 1000,
    G: 1000 * 1000 * 1000,
    T: 1000 * 1000 * 1000 * 1000,
};

function isStorageScale(unit: string): unit is StorageScale {
    return Object.prototype.hasOwnProperty.call(SCALE_FACTORS, unit);
}

/**
 * Breaks a scaled metric such as "10.2G" into its magnitude, unit and byte count.
 */
export function parseStorageValue(input: string): StorageValue {
    if (input.length < 2) {
        throw new ParseError(`Invalid storage value: "${input}"`, input);
    }

    const scale = input.slice(-1);
    const size = parseFloat64(input.slice(0, -1));

    if (!isStorageScale(scale)) {
        throw new UnsupportedUnitError(scale, input);
    }

    return { size, scale, bytes: Math.trunc(size * SCALE_FACTORS[scale]) };
}

export function formatStorageValue(value: StorageValue): string {
    return `${value.size}${value.scale}`;
}

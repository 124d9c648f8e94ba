import config from '../config.js';
import { toBigInt } from '../utils/bigint.js';

const maxValue: bigint = toBigInt(config.maxValue);

/**
 * Validates an amount against specified constraints
 * @param value - The value to validate
 * @param allowZero - Whether to allow zero value
 * @param allowNegative - Whether to allow negative values
 * @param minValue - Optional minimum value
 * @returns boolean indicating if value meets all constraints
 */
export default function validateBigInt(
    value: unknown,
    allowZero = false,
    allowNegative = false,
    minValue?: bigint
): value is bigint {
    if (typeof value !== 'bigint') return false;

    if (!allowZero && value === 0n) return false;
    if (!allowNegative && value < 0n) return false;
    if (value > maxValue) return false;
    if (minValue !== undefined && value < minValue) return false;

    return true;
}

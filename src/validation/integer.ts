/**
 * Checks ids, stake indexes, offsets, durations and APRs. Pool ids, indexes and
 * offsets pass `canBeZero`; APR does not, since a 0% pool earns nothing.
 * `max`/`min` bound the accepted range and default to the safe-integer range
 * (0 when negatives are refused).
 */
const validateInteger = (
    value: unknown,
    canBeZero = false,
    canBeNegative = false,
    max: number = Number.MAX_SAFE_INTEGER,
    min: number = canBeNegative ? Number.MIN_SAFE_INTEGER : 0
): value is number => {
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) return false;
    if (value === 0 && !canBeZero) return false;
    if (value < 0 && !canBeNegative) return false;
    return value <= max && value >= min;
};

export default validateInteger;

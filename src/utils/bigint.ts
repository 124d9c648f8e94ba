// Maximum expected length for any BigInt value we'll handle; amounts are
// stored zero-padded to this width so MongoDB sorts them lexicographically
const MAX_INTEGER_LENGTH = 40;

/**
 * Convert a value to BigInt, handling null, undefined, and string inputs
 */
export function toBigInt(value: string | bigint | number | null | undefined): bigint {
    if (value === null || value === undefined) return BigInt(0);
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.floor(value));
    const negative = value.startsWith('-');
    // Remove padding before converting to BigInt
    const digits = (negative ? value.slice(1) : value).replace(/^0+/, '') || '0';
    const parsed = BigInt(digits);
    return negative ? -parsed : parsed;
}

/**
 * Convert a value to BigInt and then to a zero-padded string suitable for database storage
 * @param value The value to convert (number, string, or bigint)
 * @param padLength Optional custom pad length
 * @returns A zero-padded string representation
 */
export function toDbString(
    value: number | string | bigint,
    padLength = MAX_INTEGER_LENGTH
): string {
    const bigValue = toBigInt(value);
    const isNegative = bigValue < 0n;
    const absStr = (isNegative ? -bigValue : bigValue).toString();

    if (absStr.length > padLength) {
        throw new Error(`Value ${value} too large to fit in padLength=${padLength}`);
    }

    const padded = absStr.padStart(padLength, '0');

    return isNegative ? '-' + padded : padded;
}

/**
 * Format an amount in smallest units with `decimals` decimal places,
 * trimming trailing zeros.
 */
export function formatTokenAmount(value: bigint, decimals: number): string {
    const negative = value < 0n;
    const abs = negative ? -value : value;
    if (decimals === 0) return `${negative ? '-' : ''}${abs.toString()}`;
    const str = abs.toString().padStart(decimals + 1, '0');
    const integerPart = str.slice(0, -decimals) || '0';
    const decimalPart = str.slice(-decimals);

    const trimmedDecimal = decimalPart.replace(/0+$/, '');
    const formatted = trimmedDecimal ? `${integerPart}.${trimmedDecimal}` : integerPart;
    return negative ? `-${formatted}` : formatted;
}

/**
 * Checks principal names and pool asset references against a length window
 * and a character set. With `edgeChars` set, the first and last characters
 * must come from it; inner characters may also come from `innerChars`, so
 * "a.b-c" passes where ".abc" does not.
 */
const validateString = (
    value: unknown,
    maxLength: number = Number.MAX_SAFE_INTEGER,
    minLength = 0,
    edgeChars?: string,
    innerChars?: string
): value is string => {
    if (typeof value !== 'string') return false;
    if (value.length > maxLength || value.length < minLength) return false;
    if (!edgeChars) return true;

    const last = value.length - 1;
    for (let i = 0; i < value.length; i++) {
        const char = value[i];
        if (edgeChars.includes(char)) continue;
        if (i === 0 || i === last) return false;
        if (!innerChars || !innerChars.includes(char)) return false;
    }
    return true;
};

export default validateString;

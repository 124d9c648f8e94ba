/**
 * Validates flags like `isNative` or `isActive`; both true and false are valid
 * @param value Value to validate
 * @returns True if the value is a boolean, false otherwise
 */
const validateBoolean = (value: unknown): value is boolean => typeof value === 'boolean';

export default validateBoolean;

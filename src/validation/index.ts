import array from './array.js';
import bigint from './bigint.js';
import boolean from './boolean.js';
import integer from './integer.js';
import principal from './principal.js';
import string from './string.js';

/**
 * Validation module interface
 */
export interface ValidationModule {
    array: (value: unknown, maxLength?: number) => value is unknown[];
    integer: (value: unknown, canBeZero?: boolean, canBeNegative?: boolean, max?: number, min?: number) => value is number;
    string: (value: unknown, maxLength?: number, minLength?: number, edgeChars?: string, innerChars?: string) => value is string;
    bigint: (value: unknown, allowZero?: boolean, allowNegative?: boolean, minValue?: bigint) => value is bigint;
    boolean: (value: unknown) => value is boolean;
    principal: (value: unknown, allowNull?: boolean) => value is string;
}

/**
 * Validation module with functions for validating different data types
 */
const validation: ValidationModule = {
    array,
    integer,
    string,
    bigint,
    boolean,
    principal,
};

export default validation;

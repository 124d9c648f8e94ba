import config from '../config.js';
import validateString from './string.js';

/**
 * Validates a principal (account) name. The null account is never a valid
 * destination.
 */
const validatePrincipal = (value: unknown, allowNull = false): value is string => {
    if (!validateString(
        value,
        config.principalMaxLength,
        config.principalMinLength,
        config.principalAllowedChars,
        config.principalAllowedCharsMiddle
    ))
        return false;
    if (!allowNull && value === config.nullAccountName)
        return false;
    return true;
};

export default validatePrincipal;

/**
 * Checks the request id list of a batch settlement: a non-empty array of at
 * most `maxLength` entries (config.maxBatchSize). Entries are checked by the
 * caller.
 */
const validateArray = (value: unknown, maxLength?: number): value is unknown[] =>
    Array.isArray(value) && value.length > 0 && (maxLength === undefined || value.length <= maxLength);

export default validateArray;

/**
 * Ledger error taxonomy. Every rejected operation throws one of these before
 * anything is committed; the executor rolls back and reports `code`.
 */

export type LedgerErrorCode =
    | 'UNAUTHORIZED'
    | 'NOT_FOUND'
    | 'INVALID_STATE'
    | 'POLICY_VIOLATION'
    | 'TRANSFER_FAILED'
    | 'INVALID_INPUT'
    | 'REENTRANT_CALL'
    | 'DATA_INTEGRITY_BREACH';

export type ErrorDetails = Record<string, string | number | boolean | null>;

export abstract class LedgerError extends Error {
    constructor(
        message: string,
        public readonly code: LedgerErrorCode,
        public readonly details: ErrorDetails = {}
    ) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Caller lacks the manager or owner role.
 */
export class UnauthorizedError extends LedgerError {
    constructor(message: string, actor: string, role: string) {
        super(message, 'UNAUTHORIZED', { actor, role });
    }
}

/**
 * Unknown pool, stake index or request index, or a page offset past the end.
 */
export class NotFoundError extends LedgerError {
    constructor(message: string, details?: ErrorDetails) {
        super(message, 'NOT_FOUND', details);
    }
}

/**
 * Status precondition not met (e.g. unstaking a stake that is already pending).
 */
export class InvalidStateError extends LedgerError {
    constructor(message: string, details?: ErrorDetails) {
        super(message, 'INVALID_STATE', details);
    }
}

/**
 * Amount below minimum, lock window not elapsed, attached value mismatch,
 * malformed pool configuration.
 */
export class PolicyViolationError extends LedgerError {
    constructor(message: string, details?: ErrorDetails) {
        super(message, 'POLICY_VIOLATION', details);
    }
}

export class TransferFailedError extends LedgerError {
    constructor(message: string, details?: ErrorDetails) {
        super(message, 'TRANSFER_FAILED', details);
    }
}

export class InvalidInputError extends LedgerError {
    constructor(message: string, field: string) {
        super(message, 'INVALID_INPUT', { field });
    }
}

export class ReentrantCallError extends LedgerError {
    constructor(operation: string) {
        super(`Reentrant call to ${operation} rejected`, 'REENTRANT_CALL', { operation });
    }
}

/**
 * A request and its stake no longer reference each other. Never expected;
 * surfaces corrupted state instead of settling it.
 */
export class DataIntegrityError extends LedgerError {
    constructor(message: string, details?: ErrorDetails) {
        super(message, 'DATA_INTEGRITY_BREACH', details);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

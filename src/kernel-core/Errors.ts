/**
 * Ledger Core Error Taxonomy
 * Centralized error codes for request-level rejections and chain-level faults.
 */

export enum ErrorCode {
    // I. Submission & Account
    ACCOUNT_NOT_FOUND = 'ACCOUNT_NOT_FOUND',
    INSUFFICIENT_ENERGY = 'INSUFFICIENT_ENERGY',
    INVALID_PROBLEM = 'INVALID_PROBLEM',
    INVALID_TRANSACTION = 'INVALID_TRANSACTION',

    // II. External Collaborators
    ORACLE_UNAVAILABLE = 'ORACLE_UNAVAILABLE',

    // III. Block Acceptance
    CHAIN_LINKAGE = 'CHAIN_LINKAGE',
    INVALID_NONCE = 'INVALID_NONCE',
    MALFORMED_BLOCK = 'MALFORMED_BLOCK',

    // IV. Integrity (hard faults)
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
    SOURCE_HALTED = 'SOURCE_HALTED',

    // V. Internal
    ILLEGAL_TRANSITION = 'ILLEGAL_TRANSITION',
    CONFIGURATION_INVALID = 'CONFIGURATION_INVALID',
}

/**
 * REJECTION: the request or block is refused, nothing else is affected.
 * FAULT: corruption-class failure; the source that produced it must be halted.
 */
export type ErrorSeverity = 'REJECTION' | 'FAULT';

export class CoreError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>,
        public readonly severity: ErrorSeverity = 'REJECTION'
    ) {
        super(`[Ledger:${code}] ${message}`);
        this.name = 'CoreError';
    }

    public get isFault(): boolean {
        return this.severity === 'FAULT';
    }
}

export function isCoreError(error: unknown, code?: ErrorCode): error is CoreError {
    if (!(error instanceof CoreError)) return false;
    return code === undefined || error.code === code;
}

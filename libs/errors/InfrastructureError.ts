/**
 * InfrastructureError
 * Environment fault raised by the sandbox runtime or the script proposer.
 * Never counted against the retry budget and never retried internally.
 */

export type InfrastructureSource = 'sandbox' | 'proposer';

export type InfrastructureCode =
    | 'SANDBOX_UNAVAILABLE'
    | 'SANDBOX_CRASHED'
    | 'PROPOSER_UNAVAILABLE'
    | 'PROPOSER_TIMEOUT'
    | 'PROPOSER_BAD_RESPONSE';

export class InfrastructureError extends Error {
    readonly source: InfrastructureSource;
    readonly code: InfrastructureCode;

    constructor(source: InfrastructureSource, code: InfrastructureCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'InfrastructureError';
        this.source = source;
        this.code = code;
        Object.setPrototypeOf(this, InfrastructureError.prototype);
    }
}

/**
 * Raised at a suspension point once the session's AbortSignal has fired.
 */
export class SessionCancelledError extends Error {
    readonly code = 'SESSION_CANCELLED';

    constructor(message = 'Session cancelled by caller') {
        super(message);
        this.name = 'SessionCancelledError';
        Object.setPrototypeOf(this, SessionCancelledError.prototype);
    }
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw new SessionCancelledError();
    }
}

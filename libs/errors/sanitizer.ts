import { logger } from '../logging/logger.js';
import crypto from 'crypto';

export type ForgeErrorCategory = 'INPUT' | 'INFRA' | 'CONFIG';

/**
 * Boundary error for the regeneration service.
 * Wraps internal failures in a public message plus an IncidentID for log
 * correlation; the internal details are logged once, never returned.
 */
export class ForgeError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: ForgeErrorCategory = 'INFRA',
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'ForgeError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a ForgeError.
     */
    sanitize: (err: unknown, contextLabel: string): ForgeError => {
        if (err instanceof ForgeError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new ForgeError(
            `An internal error occurred in ${contextLabel}. Incident ID is in the service log.`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            'INFRA',
            { cause: err, contextLabel }
        );
    }
};

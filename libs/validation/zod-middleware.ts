import type { z, ZodTypeAny } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

/**
 * Raised when a value fails its schema. Callers at the config and proposer
 * boundaries translate it into their own fault category.
 */
export class ValidationViolation extends Error {
    constructor(
        public readonly contextLabel: string,
        public readonly issues: readonly ValidationIssue[]
    ) {
        super(`Validation Violation in ${contextLabel}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationViolation';
        Object.setPrototypeOf(this, ValidationViolation.prototype);
    }
}

/**
 * Fail-closed validation: returns the parsed value or throws ValidationViolation.
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown, context: string): z.output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails: ValidationIssue[] = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Only paths and messages are logged; the input may carry credentials.
        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new ValidationViolation(context, errorDetails);
    }

    return result.data;
}

/**
 * Factory for creating reusable validators.
 */
export const createValidator = <S extends ZodTypeAny>(schema: S) => {
    return (data: unknown, contextLabel: string): z.output<S> => validate(schema, data, contextLabel);
};

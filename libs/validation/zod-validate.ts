import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

export type ValidationErrorFactory = (message: string) => Error;

const defaultErrorFactory: ValidationErrorFactory = message => new Error(message);

/**
 * Parses untrusted input against `schema`, logging and throwing on failure.
 * `toError` lets callers raise their own typed error with the same message.
 */
export function validate<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    data: unknown,
    context: string,
    toError: ValidationErrorFactory = defaultErrorFactory
): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Only the issue list is logged; the input may carry signatures or keys.
        logger.warn({ context, errors: errorDetails }, 'Input validation failure');

        throw toError(`Validation Violation in ${context}: ${JSON.stringify(errorDetails)}`);
    }

    return result.data;
}

/**
 * Factory for reusable validators bound to one schema.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>, toError?: ValidationErrorFactory) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel, toError);
};

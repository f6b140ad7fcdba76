import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { IccpError, IccpErrorCategory, IccpErrorCode } from '../errors/sanitizer.js';

/**
 * Fail-closed boundary validation.
 * Returns the parsed value or throws an IccpError carrying every issue path.
 * Raw input is never logged; only issue paths and messages.
 */
export function validate<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    data: unknown,
    context: string,
    code: IccpErrorCode = 'INVALID_IDENTITY',
    category: IccpErrorCategory = 'SEC'
): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({ context, errors: errorDetails }, "Input validation failure");

        throw new IccpError(
            code,
            `Validation violation in ${context}: ${errorDetails.map(d => `${d.path || '<root>'}: ${d.message}`).join('; ')}`,
            { errors: errorDetails },
            category,
            { contextLabel: context }
        );
    }

    return result.data;
}

/**
 * Factory for reusable validators bound to one schema.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>, code?: IccpErrorCode, category?: IccpErrorCategory) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel, code, category);
};

import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Error surface of the ICCP engine.
 * Internal details are logged once under an incident id; callers only ever
 * see the public message, the code and the incident id.
 */

export type IccpErrorCode =
    | 'UNKNOWN_RESOURCE'
    | 'INVALID_IDENTITY'
    | 'INVALID_REQUEST'
    | 'CONFIG_INVALID'
    | 'POLICY_INVALID'
    | 'AUDIT_PIPELINE_STOPPED'
    | 'INTERNAL';

export type IccpErrorCategory = 'SEC' | 'OPS' | 'CFG';

export class IccpError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly code: IccpErrorCode,
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: IccpErrorCategory = 'OPS',
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'IccpError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            code,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized IccpError.
     */
    sanitize: (err: unknown, contextLabel: string): IccpError => {
        if (err instanceof IccpError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err) {
            if (typeof err.message === 'string') {
                originalErrorMessage = err.message;
            }
            if ('stack' in err && typeof err.stack === 'string') {
                originalErrorStack = err.stack;
            }
        } else {
            originalErrorMessage = String(err);
        }

        return new IccpError(
            'INTERNAL',
            `An internal error occurred while mediating data access (${contextLabel}).`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            'OPS',
            { cause: err, contextLabel }
        );
    }
};

import type { ResourceDescriptor } from '../registry/resources.js';

export type RecordRow = Readonly<Record<string, unknown>>;

export const MASK_PLACEHOLDER = '[MASKED]';
export const FINANCIAL_MASK_PLACEHOLDER = '[MASKED-FINANCIAL]';

export function placeholderFor(descriptor: ResourceDescriptor): string {
    return descriptor.sensitivity === 'FERPA-Financial' ? FINANCIAL_MASK_PLACEHOLDER : MASK_PLACEHOLDER;
}

/**
 * Replaces the value of every masked field the row carries with the
 * placeholder. The field stays present so consumers can tell withheld from
 * absent. Idempotent.
 */
export function maskRow(row: RecordRow, maskedFields: readonly string[], placeholder: string): RecordRow {
    const masked: Record<string, unknown> = { ...row };
    for (const field of maskedFields) {
        if (Object.prototype.hasOwnProperty.call(masked, field)) {
            masked[field] = placeholder;
        }
    }
    return Object.freeze(masked);
}

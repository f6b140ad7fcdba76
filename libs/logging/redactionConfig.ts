/**
 * Centralized Redaction Configuration
 * Keys that must never appear in operational logs, whether they carry
 * credentials or institutional record values.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Identity numbers (Root and Nested)
    'ssn', '*.ssn',
    'social_security', '*.social_security',
    'national_id', '*.national_id',

    // Financial amounts (Root and Nested)
    'annual_salary', '*.annual_salary',
    'amount_due', '*.amount_due',
    'amount_paid', '*.amount_paid',
    'balance', '*.balance',
    'bank_account', '*.bank_account',

    // Raw record payloads handed in by the storage layer
    'records', '*.records',
    'rows', '*.rows'
];

export const REDACT_CENSOR = '[REDACTED]';

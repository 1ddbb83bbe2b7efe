/**
 * Centralized Redaction Configuration
 * Keys that must be redacted from logs to prevent credential leakage,
 * e.g. the proposer endpoint's API key or forwarded request headers.
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

    // Proposer transport
    '*.headers.authorization',
    'headers["x-api-key"]', '*.headers["x-api-key"]'
];

export const REDACT_CENSOR = '[REDACTED]';

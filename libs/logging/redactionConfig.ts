/**
 * Centralized Redaction Configuration
 * Keys whose values must never reach log output. Signatures and key material
 * travel through the verifier and key provider and are covered here.
 */
export const REDACT_KEYS = [
    // Signatures (Root and Nested)
    'signature', '*.signature',
    'zmsSignature', '*.zmsSignature',

    // Key material (Root and Nested)
    'key', '*.key',
    'publicKey', '*.publicKey',
    'pem', '*.pem',

    // Credentials that may appear in request context
    'authorization', '*.authorization',
    'token', '*.token',
    'secret', '*.secret',
];

export const REDACT_CENSOR = '[REDACTED]';

/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output in clear text.
 */
export const REDACT_KEYS = [
    // Approval credentials (Root and Nested)
    'token', '*.token',
    'approvalToken', '*.approvalToken',
    'approveUrl', '*.approveUrl',
    'rejectUrl', '*.rejectUrl',
    'signature', '*.signature',
    'secret', '*.secret',
    'approvalSecret', '*.approvalSecret',

    // Outbound integrations
    'webhookUrl', '*.webhookUrl', '*.*.webhookUrl',
    'authorization', '*.authorization',
    'password', '*.password',

    // Query strings carrying approval tokens
    'req.query.token',
    'req.url'
];

export const REDACT_CENSOR = '[REDACTED]';

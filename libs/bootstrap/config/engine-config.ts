import type { GuardRule } from '../config-guard.js';

const MIN_PRODUCTION_SECRET_LENGTH = 32;

function isPositiveInteger(name: string): boolean {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return true;
    const value = Number(raw);
    return Number.isInteger(value) && value > 0;
}

/**
 * Engine Configuration Guards
 * The approval secret signs every approval link; it has no default.
 */
export const ENGINE_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'APPROVAL_SECRET', sensitive: true },
    { type: 'required', name: 'APPROVAL_BASE_URL' },
    { type: 'required', name: 'POLICY_DIR' },

    {
        type: 'forbidIf',
        name: 'WEAK_APPROVAL_SECRET',
        when: () => process.env.NODE_ENV === 'production'
            && (process.env.APPROVAL_SECRET ?? '').length < MIN_PRODUCTION_SECRET_LENGTH,
        message: `APPROVAL_SECRET must be at least ${MIN_PRODUCTION_SECRET_LENGTH} characters in production`
    },
    {
        type: 'forbidIf',
        name: 'PLAINTEXT_APPROVAL_URL',
        when: () => process.env.NODE_ENV === 'production'
            && !(process.env.APPROVAL_BASE_URL ?? '').startsWith('https://'),
        message: 'APPROVAL_BASE_URL must use https in production'
    },
    {
        type: 'assert',
        check: () => ['APPROVAL_WINDOW_MINUTES', 'SWEEP_INTERVAL_MINUTES', 'SWEEP_BATCH_SIZE',
            'ROLLBACK_ESCALATION_THRESHOLD', 'COLLABORATOR_TIMEOUT_MS'].every(isPositiveInteger),
        message: 'Numeric engine settings must be positive integers'
    },
    {
        type: 'assert',
        check: () => ['', 'first-match', 'strict'].includes(process.env.POLICY_TIE_BREAK ?? ''),
        message: 'POLICY_TIE_BREAK must be first-match or strict'
    },
    {
        type: 'assert',
        check: () => ['', 'postgres', 'memory'].includes(process.env.LEDGER_BACKEND ?? ''),
        message: 'LEDGER_BACKEND must be postgres or memory'
    },
    {
        type: 'assert',
        check: () => ['', 'iam', 'simulated'].includes(process.env.EXECUTOR_BACKEND ?? ''),
        message: 'EXECUTOR_BACKEND must be iam or simulated'
    },
    {
        type: 'forbidIf',
        name: 'MEMORY_LEDGER_IN_PRODUCTION',
        when: () => process.env.NODE_ENV === 'production' && process.env.LEDGER_BACKEND === 'memory',
        message: 'The in-memory ledger loses executions on restart and cannot run in production'
    }
];

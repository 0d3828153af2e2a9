import type { OrchestratorSettings } from '../execution/orchestrator.js';
import { DEFAULT_COLLABORATOR_TIMEOUT_MS } from '../execution/timeout.js';
import type { TieBreakStrategy } from '../policy/matcher.js';
import { DEFAULT_SWEEP_BATCH_SIZE, DEFAULT_SWEEP_INTERVAL_MS } from '../rollback/RollbackScheduler.js';

export const DEFAULT_APPROVAL_WINDOW_MINUTES = 60;
export const DEFAULT_ESCALATION_THRESHOLD = 3;

export type LedgerBackend = 'postgres' | 'memory';
export type ExecutorBackend = 'iam' | 'simulated';

export interface EngineSettings extends OrchestratorSettings {
    readonly approvalSecret: string;
    readonly policyDir: string;
    readonly strictPolicyLoad: boolean;
    readonly sweepIntervalMs: number;
    readonly sweepBatchSize: number;
    readonly ledgerBackend: LedgerBackend;
    readonly executorBackend: ExecutorBackend;
    readonly notificationWebhookUrl: string | null;
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    return Number.isInteger(value) && value > 0 ? value : fallback;
}

function readChoice<T extends string>(env: NodeJS.ProcessEnv, name: string, choices: readonly T[], fallback: T): T {
    const raw = env[name];
    return choices.find(choice => choice === raw) ?? fallback;
}

/**
 * Typed view over the environment. Presence and shape are enforced separately by
 * ENGINE_CONFIG_GUARDS; this only applies defaults.
 */
export function loadEngineSettings(env: NodeJS.ProcessEnv = process.env): EngineSettings {
    const tieBreak: TieBreakStrategy = readChoice(env, 'POLICY_TIE_BREAK', ['first-match', 'strict'], 'first-match');

    return {
        approvalSecret: env.APPROVAL_SECRET ?? '',
        approvalBaseUrl: env.APPROVAL_BASE_URL ?? 'http://localhost:8080',
        approvalWindowMinutes: readInt(env, 'APPROVAL_WINDOW_MINUTES', DEFAULT_APPROVAL_WINDOW_MINUTES),
        policyDir: env.POLICY_DIR ?? 'policies',
        strictPolicyLoad: env.POLICY_STRICT_LOAD === 'true',
        tieBreak,
        forceSimulate: env.GUARDRAILS_FORCE_SIMULATE === 'true',
        collaboratorTimeoutMs: readInt(env, 'COLLABORATOR_TIMEOUT_MS', DEFAULT_COLLABORATOR_TIMEOUT_MS),
        escalationThreshold: readInt(env, 'ROLLBACK_ESCALATION_THRESHOLD', DEFAULT_ESCALATION_THRESHOLD),
        sweepIntervalMs: readInt(env, 'SWEEP_INTERVAL_MINUTES', DEFAULT_SWEEP_INTERVAL_MS / 60_000) * 60_000,
        sweepBatchSize: readInt(env, 'SWEEP_BATCH_SIZE', DEFAULT_SWEEP_BATCH_SIZE),
        ledgerBackend: readChoice(env, 'LEDGER_BACKEND', ['postgres', 'memory'], 'postgres'),
        executorBackend: readChoice(env, 'EXECUTOR_BACKEND', ['iam', 'simulated'], 'iam'),
        notificationWebhookUrl: env.NOTIFICATION_WEBHOOK_URL ?? null
    };
}

import { IAMClient } from '@aws-sdk/client-iam';
import type { EngineSettings } from '../bootstrap/engineSettings.js';
import type { GuardrailExecutor } from '../executor/guardrailExecutor.js';
import { IamGuardrailExecutor, createIamApi } from '../executor/iamExecutor.js';
import { SimulatedExecutor } from '../executor/simulatedExecutor.js';
import type { ExecutionLedger } from '../ledger/executionLedger.js';
import { InMemoryExecutionLedger } from '../ledger/memoryLedger.js';
import { PostgresExecutionLedger } from '../ledger/postgresLedger.js';
import { LogNotificationSink } from '../notification/logSink.js';
import type { NotificationSink } from '../notification/notification.js';
import { WebhookNotificationSink } from '../notification/webhookSink.js';
import { DirectoryPolicySource } from '../policy/policyStore.js';
import { createGuardrailEngine, type GuardrailEngine } from './guardrailEngine.js';

export function createLedger(settings: EngineSettings): ExecutionLedger {
    return settings.ledgerBackend === 'memory'
        ? new InMemoryExecutionLedger()
        : new PostgresExecutionLedger();
}

export function createExecutor(settings: EngineSettings): GuardrailExecutor {
    return settings.executorBackend === 'simulated'
        ? new SimulatedExecutor()
        : new IamGuardrailExecutor(createIamApi(new IAMClient({})));
}

export function createSinks(settings: EngineSettings): NotificationSink[] {
    // The log sink always runs so every notification leaves a trace.
    return [
        new LogNotificationSink(),
        new WebhookNotificationSink({
            defaultUrl: settings.notificationWebhookUrl ?? undefined,
            timeoutMs: settings.collaboratorTimeoutMs
        })
    ];
}

/**
 * Builds the engine the services run, from validated settings.
 */
export function createRuntimeEngine(settings: EngineSettings): GuardrailEngine {
    return createGuardrailEngine({
        policies: new DirectoryPolicySource(settings.policyDir, { strict: settings.strictPolicyLoad }),
        ledger: createLedger(settings),
        executor: createExecutor(settings),
        sinks: createSinks(settings)
    }, settings);
}

import type { GuardrailAction, NotificationRouting, PolicyMode, TargetPrincipal } from '../policy/guardrailPolicy.js';

interface ExecutionNotificationBase {
    readonly executionId: string;
    readonly policyId: string;
    readonly eventId: string;
    readonly target: TargetPrincipal;
    readonly routing: NotificationRouting;
}

/**
 * Structured payloads handed to notification sinks. Formatting for any particular chat tool
 * belongs to the sink.
 */
export type GuardrailNotification =
    | {
        readonly kind: 'simulation';
        readonly eventId: string;
        readonly policyId: string;
        readonly declaredMode: PolicyMode;
        readonly targets: readonly TargetPrincipal[];
        readonly actions: readonly GuardrailAction[];
        readonly ttlMinutes: number;
        readonly amount: number;
        readonly accountId: string;
        readonly routing: NotificationRouting;
    }
    | (ExecutionNotificationBase & {
        readonly kind: 'approval_request';
        readonly actions: readonly GuardrailAction[];
        readonly ttlMinutes: number;
        readonly approveUrl: string;
        readonly rejectUrl: string;
        readonly expiresAt: string;
    })
    | (ExecutionNotificationBase & {
        readonly kind: 'execution_confirmed';
        readonly executedBy: string;
        readonly ttlExpiresAt: string | null;
    })
    | (ExecutionNotificationBase & {
        readonly kind: 'execution_failed';
        readonly error: string;
    })
    | (ExecutionNotificationBase & {
        readonly kind: 'execution_rejected' | 'approval_expired';
        readonly resolvedBy: string;
    })
    | (ExecutionNotificationBase & {
        readonly kind: 'rollback_confirmed';
        readonly rolledBackAt: string;
        readonly requestedBy: string;
    })
    | (ExecutionNotificationBase & {
        readonly kind: 'rollback_escalation';
        readonly consecutiveFailures: number;
        readonly lastError: string;
    })
    | {
        readonly kind: 'event_failed';
        readonly eventId: string;
        readonly reason: string;
        readonly routing: null;
    };

export type NotificationKind = GuardrailNotification['kind'];

export interface NotificationSink {
    send(notification: GuardrailNotification): Promise<void>;
}

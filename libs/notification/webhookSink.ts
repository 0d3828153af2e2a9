import { pino } from 'pino';
import type { GuardrailNotification, NotificationSink } from './notification.js';

const logger = pino({ name: 'WebhookNotificationSink' });

export interface WebhookSinkOptions {
    /** Used when the policy's routing names no webhook */
    readonly defaultUrl?: string;
    readonly timeoutMs: number;
    readonly fetchImpl?: typeof fetch;
}

/**
 * POSTs the notification as JSON to the policy's webhook, or the default one.
 * Non-2xx responses are failures.
 */
export class WebhookNotificationSink implements NotificationSink {
    private readonly fetchImpl: typeof fetch;

    constructor(private readonly options: WebhookSinkOptions) {
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async send(notification: GuardrailNotification): Promise<void> {
        const url = notification.routing?.webhookUrl ?? this.options.defaultUrl;
        if (!url) {
            logger.debug({ kind: notification.kind }, 'No webhook configured; notification skipped');
            return;
        }

        const { routing, ...payload } = notification;
        const response = await this.fetchImpl(url, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: JSON.stringify({
                ...payload,
                channel: routing?.channel ?? null,
                mentionUsers: routing?.mentionUsers ?? []
            }),
            signal: AbortSignal.timeout(this.options.timeoutMs)
        });

        if (!response.ok) {
            throw new Error(`Webhook responded ${response.status} for ${notification.kind}`);
        }
    }
}

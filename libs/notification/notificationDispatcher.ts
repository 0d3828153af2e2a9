import { pino } from 'pino';
import { withTimeout } from '../execution/timeout.js';
import { describeError } from '../errors/taxonomy.js';
import type { GuardrailNotification, NotificationSink } from './notification.js';

const logger = pino({ name: 'NotificationDispatcher' });

/**
 * Delivers to every sink with a bounded wait. Never throws: a sink failure is logged and the
 * orchestration path carries on.
 */
export class NotificationDispatcher {
    constructor(
        private readonly sinks: readonly NotificationSink[],
        private readonly timeoutMs: number
    ) { }

    async publish(notification: GuardrailNotification): Promise<void> {
        const results = await Promise.allSettled(
            this.sinks.map(sink => withTimeout(() => sink.send(notification), this.timeoutMs, 'notification.send'))
        );

        for (const result of results) {
            if (result.status === 'rejected') {
                logger.warn({
                    kind: notification.kind,
                    error: describeError(result.reason)
                }, 'Notification delivery failed');
            }
        }
    }
}

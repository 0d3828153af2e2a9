import { logger } from '../logging/logger.js';
import type { GuardrailNotification, NotificationSink } from './notification.js';

/**
 * Writes every notification to the structured log. Approval links are redacted by the
 * logger's redact paths.
 */
export class LogNotificationSink implements NotificationSink {
    private readonly log = logger.child({ component: 'notifications' });

    async send(notification: GuardrailNotification): Promise<void> {
        this.log.info({ notification }, `Guardrail notification: ${notification.kind}`);
    }
}

/**
 * Normalizes AWS Budgets notifications into CostEvents.
 *
 * Accepted shapes, tried in order: SNS envelope (Records[0].Sns.Message), EventBridge
 * ("AWS Budget Notification") and the bare notification. Event ids are derived from the
 * notification content so a redelivered notification maps onto the same event.
 */

import crypto from 'node:crypto';
import { ValidationError } from '../errors/taxonomy.js';
import {
    BudgetEventBridgeSchema,
    BudgetNotificationSchema,
    SnsEnvelopeSchema
} from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';
import { parseCostEvent, type CostEvent } from './costEvent.js';

const ACCOUNT_ID = /^\d{12}$/;

type BudgetNotification = ReturnType<typeof BudgetNotificationSchema.parse>;

function hasKey(input: unknown, key: string): boolean {
    return input !== null && typeof input === 'object' && key in input;
}

function extractAccountId(notification: BudgetNotification): string {
    // arn:aws:budgets::123456789012:budget/name
    const fromArn = notification.notificationArn?.split(':')[4];
    if (fromArn && ACCOUNT_ID.test(fromArn)) return fromArn;
    if (notification.accountId && ACCOUNT_ID.test(notification.accountId)) return notification.accountId;

    throw new ValidationError('Could not extract account id from budget notification', [
        { path: 'notificationArn', message: 'expected arn:aws:budgets::<12-digit account>:...' }
    ], { contextLabel: 'BudgetsParser' });
}

function deriveEventId(accountId: string, notification: BudgetNotification, receivedAt: Date): string {
    const day = receivedAt.toISOString().slice(0, 10);
    const digest = crypto.createHash('sha256')
        .update([accountId, notification.budgetName, notification.notificationType, notification.threshold, day].join('|'))
        .digest('hex');
    return `budgets-${digest.slice(0, 16)}`;
}

function fromNotification(
    notification: BudgetNotification,
    receivedAt: Date,
    overrides: { eventId?: string; accountId?: string; region?: string; time?: string } = {}
): CostEvent {
    const accountId = overrides.accountId ?? extractAccountId(notification);
    const time = overrides.time ?? receivedAt.toISOString();
    const spend = notification.calculatedSpend.actualSpend;

    return parseCostEvent({
        eventId: overrides.eventId ?? deriveEventId(accountId, notification, receivedAt),
        source: 'budgets',
        accountId,
        amount: spend.amount,
        timePeriod: { start: time, end: time },
        details: {
            budgetName: notification.budgetName,
            notificationType: notification.notificationType,
            thresholdType: notification.thresholdType,
            threshold: notification.threshold,
            comparisonOperator: notification.comparisonOperator,
            currency: spend.unit,
            ...(overrides.region ? { region: overrides.region } : {})
        }
    }, 'BudgetNotification');
}

export function parseBudgetsEvent(input: unknown, receivedAt: Date = new Date()): CostEvent {
    if (hasKey(input, 'Records')) {
        const envelope = validate(SnsEnvelopeSchema, input, 'BudgetNotification:SNS');
        const [record] = envelope.Records;
        let message: unknown;
        try {
            message = JSON.parse(record?.Sns.Message ?? '');
        } catch (error) {
            throw new ValidationError('SNS message is not JSON', [{ path: 'Records.0.Sns.Message', message: 'invalid JSON' }], {
                contextLabel: 'BudgetsParser',
                cause: error
            });
        }
        return fromNotification(validate(BudgetNotificationSchema, message, 'BudgetNotification:SNS'), receivedAt);
    }

    if (hasKey(input, 'detail-type')) {
        const event = validate(BudgetEventBridgeSchema, input, 'BudgetNotification:EventBridge');
        return fromNotification(event.detail, receivedAt, {
            eventId: event.id,
            accountId: event.account,
            region: event.region,
            time: event.time
        });
    }

    if (hasKey(input, 'budgetName')) {
        return fromNotification(validate(BudgetNotificationSchema, input, 'BudgetNotification:Direct'), receivedAt);
    }

    throw new ValidationError('Unsupported budget notification format', [
        { path: '', message: 'expected an SNS envelope, an EventBridge event or a budget notification' }
    ], { contextLabel: 'BudgetsParser' });
}

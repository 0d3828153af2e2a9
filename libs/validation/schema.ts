import { z } from 'zod';
import { isDeletionClassOperation } from '../policy/actionSafety.js';
import { isValidTimeZone } from '../policy/timeWindows.js';

/**
 * Input Validation Framework
 * Central schema definitions for every input the engine accepts: cost events at ingest and
 * policy definitions at load. Objects are strict so unknown keys are rejected, never dropped.
 */

// --- Cost Events ---

export const COST_EVENT_SOURCES = ['budgets', 'anomaly'] as const;

const DetailValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const CostEventSchema = z.object({
    eventId: z.string().min(1).max(256),
    source: z.enum(COST_EVENT_SOURCES),
    accountId: z.string().min(1).max(64),
    amount: z.number().finite().positive(),
    timePeriod: z.object({
        start: z.string().datetime({ offset: true }),
        end: z.string().datetime({ offset: true })
    }).strict(),
    details: z.record(z.string(), DetailValueSchema).default({})
}).strict();

// --- Policy Definitions (on-disk, snake_case) ---

export const POLICY_MODES = ['simulate', 'approve', 'automatic'] as const;
export const PRINCIPAL_TYPES = ['iam_role', 'iam_user'] as const;
export const WEEKDAYS = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'] as const;

const IAM_ARN_PREFIX = 'arn:aws:iam::';
const CLOCK_TIME = /^([01]\d|2[0-3]):[0-5]\d$/;
const IAM_ACTION = /^[a-z0-9-]+:[A-Za-z0-9*]+$/;

const PrincipalSchema = z.object({
    type: z.enum(PRINCIPAL_TYPES),
    arn: z.string()
        .startsWith(IAM_ARN_PREFIX, { message: `Principal ARN must start with ${IAM_ARN_PREFIX}` })
        .refine(arn => !arn.includes('*'), { message: 'Wildcards are not allowed in principal ARNs' })
}).strict();

const DenyActionSchema = z.string()
    .regex(IAM_ACTION, { message: 'Deny entries must look like service:Action' })
    .refine(action => !isDeletionClassOperation(action), {
        message: 'Deletion-class operations cannot appear in a guardrail action'
    });

const ActionSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('attach_deny_policy'),
        deny: z.array(DenyActionSchema).min(1, { message: 'attach_deny_policy requires a non-empty deny list' })
    }).strict(),
    z.object({
        type: z.literal('notify_only')
    }).strict()
]);

const TimeWindowSchema = z.object({
    start: z.string().regex(CLOCK_TIME, { message: 'Expected HH:MM' }),
    end: z.string().regex(CLOCK_TIME, { message: 'Expected HH:MM' }),
    timezone: z.string().default('UTC')
        .refine(isValidTimeZone, { message: 'Unknown IANA timezone' }),
    days: z.array(z.enum(WEEKDAYS)).min(1).default([...WEEKDAYS])
}).strict();

const MatchSchema = z.object({
    source: z.array(z.enum(COST_EVENT_SOURCES)).min(1),
    account_ids: z.array(z.string().min(1)).min(1),
    min_amount_usd: z.number().finite().nonnegative().optional(),
    max_amount_usd: z.number().finite().positive().optional(),
    services: z.array(z.string().min(1)).optional(),
    regions: z.array(z.string().min(1)).optional()
}).strict().superRefine((match, ctx) => {
    if (match.min_amount_usd !== undefined && match.max_amount_usd !== undefined
        && match.max_amount_usd <= match.min_amount_usd) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['max_amount_usd'],
            message: 'max_amount_usd must be greater than min_amount_usd'
        });
    }
});

const NotifySchema = z.object({
    channel: z.string().min(1).optional(),
    webhook_url: z.string().url().optional(),
    mention_users: z.array(z.string().min(1)).default([])
}).strict();

const ExceptionsSchema = z.object({
    accounts: z.array(z.string().min(1)).default([]),
    principals: z.array(z.string().min(1)).default([]),
    time_windows: z.array(TimeWindowSchema).default([])
}).strict();

export const PolicyFileSchema = z.object({
    id: z.string().regex(/^[a-z0-9][a-z0-9-]{0,62}$/, { message: 'Policy ids are lowercase kebab-case' }),
    description: z.string().default(''),
    enabled: z.boolean().default(true),
    mode: z.enum(POLICY_MODES),
    ttl_minutes: z.number().int().nonnegative(),
    match: MatchSchema,
    scope: z.object({
        principals: z.array(PrincipalSchema).min(1, { message: 'scope.principals must not be empty' })
    }).strict(),
    actions: z.array(ActionSchema).min(1, { message: 'actions must not be empty' }),
    notify: NotifySchema.default({}),
    exceptions: ExceptionsSchema.optional()
}).strict();

export type PolicyFile = z.output<typeof PolicyFileSchema>;

// --- Approval callbacks ---

export const ApprovalQuerySchema = z.object({
    decision: z.enum(['approve', 'reject']),
    token: z.string().min(1).max(256),
    actor: z.string().min(1).max(128).optional()
});

export const ManualRollbackSchema = z.object({
    requestedBy: z.string().min(1).max(128)
}).strict();

// --- AWS Budgets notifications ---

const SpendSchema = z.object({
    amount: z.union([z.number(), z.string().regex(/^\d+(\.\d+)?$/)]).transform(Number),
    unit: z.string().default('USD')
});

export const BudgetNotificationSchema = z.object({
    budgetName: z.string().min(1),
    notificationArn: z.string().optional(),
    accountId: z.string().optional(),
    notificationType: z.string().default('ACTUAL'),
    thresholdType: z.string().default('PERCENTAGE'),
    threshold: z.number().default(0),
    comparisonOperator: z.string().default('GREATER_THAN'),
    calculatedSpend: z.object({ actualSpend: SpendSchema })
});

export const BudgetEventBridgeSchema = z.object({
    'id': z.string().min(1),
    'detail-type': z.literal('AWS Budget Notification'),
    'account': z.string().regex(/^\d{12}$/),
    'region': z.string().default('us-east-1'),
    'time': z.string().datetime({ offset: true }),
    'detail': BudgetNotificationSchema
});

export const SnsEnvelopeSchema = z.object({
    Records: z.array(z.object({
        EventSource: z.literal('aws:sns'),
        Sns: z.object({ Message: z.string() })
    })).min(1)
});

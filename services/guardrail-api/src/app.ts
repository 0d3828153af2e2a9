import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { pino } from 'pino';
import type { GuardrailEngine } from '../../../libs/engine/guardrailEngine.js';
import { ErrorSanitizer, type ErrorCategory, type GuardrailError } from '../../../libs/errors/sanitizer.js';
import { ValidationError } from '../../../libs/errors/taxonomy.js';
import type { ApprovalOutcome } from '../../../libs/approval/approvalGateway.js';
import type { EvaluationDecision, RollbackResult } from '../../../libs/execution/orchestrator.js';
import { parseBudgetsEvent } from '../../../libs/ingest/budgetsParser.js';
import { ApprovalQuerySchema, ManualRollbackSchema } from '../../../libs/validation/schema.js';
import { createValidator } from '../../../libs/validation/zod-middleware.js';

const logger = pino({ name: 'GuardrailApi' });

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
    VALIDATION: 400,
    CONFLICT: 409,
    EXPIRY: 410,
    EXECUTOR: 502,
    INTERNAL: 500
};

const validateApprovalQuery = createValidator(ApprovalQuerySchema);
const validateRollbackBody = createValidator(ManualRollbackSchema);

type ExecutionParams = { executionId: string };

const LINK_HOLDER = 'link-holder';

/**
 * The approval token proves possession of the link, not who followed it. A name passed in the
 * query is self-reported and recorded only under the link-holder label.
 */
export function approverLabel(claimedActor: string | undefined): string {
    return claimedActor === undefined ? LINK_HOLDER : `${LINK_HOLDER}:${claimedActor}`;
}

export function statusForDecision(decision: EvaluationDecision): number {
    switch (decision.outcome) {
        case 'rejected':
            return 400;
        case 'dispatched':
            return 202;
        default:
            return 200;
    }
}

export function statusForApproval(outcome: ApprovalOutcome): number {
    switch (outcome.outcome) {
        case 'invalid_token':
            return 403;
        case 'expired':
            return 410;
        case 'already_resolved':
            return 409;
        case 'failed':
            return 502;
        default:
            return 200;
    }
}

export function statusForRollback(result: RollbackResult): number {
    switch (result.status) {
        case 'rolled_back':
            return 200;
        case 'failed':
            return 502;
        case 'skipped':
            return result.reason === 'not_found' ? 404 : 409;
    }
}

export function errorBody(error: GuardrailError): Record<string, unknown> {
    return {
        error: error.publicMessage,
        code: error.code,
        incidentId: error.incidentId,
        ...(error instanceof ValidationError ? { issues: error.issues } : {})
    };
}

/**
 * Route handlers, kept separate from the express wiring so they can be driven directly.
 * Every handler forwards failures to `next`; the error middleware sanitizes them.
 */
export function createGuardrailRoutes(engine: GuardrailEngine) {
    return {
        ingestEvent: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
            try {
                const decision = await engine.evaluate(req.body);
                res.status(statusForDecision(decision)).json(decision);
            } catch (error) {
                next(error);
            }
        },

        ingestBudgetsNotification: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
            try {
                const event = parseBudgetsEvent(req.body);
                const decision = await engine.evaluate(event);
                res.status(statusForDecision(decision)).json(decision);
            } catch (error) {
                next(error);
            }
        },

        resolveApproval: async (req: Request<ExecutionParams>, res: Response, next: NextFunction): Promise<void> => {
            try {
                const query = validateApprovalQuery(req.query, 'GuardrailApi:Approval');
                const outcome = await engine.resolveApproval(
                    req.params.executionId,
                    query.token,
                    query.decision,
                    approverLabel(query.actor)
                );
                res.status(statusForApproval(outcome)).json(outcome);
            } catch (error) {
                next(error);
            }
        },

        rollbackExecution: async (req: Request<ExecutionParams>, res: Response, next: NextFunction): Promise<void> => {
            try {
                const body = validateRollbackBody(req.body, 'GuardrailApi:Rollback');
                const result = await engine.rollbackExecution(req.params.executionId, body.requestedBy);
                res.status(statusForRollback(result)).json(result);
            } catch (error) {
                next(error);
            }
        },

        getExecution: async (req: Request<ExecutionParams>, res: Response, next: NextFunction): Promise<void> => {
            try {
                const execution = await engine.getExecution(req.params.executionId);
                if (!execution) {
                    res.status(404).json({ error: 'Execution not found', executionId: req.params.executionId });
                    return;
                }
                res.status(200).json(execution);
            } catch (error) {
                next(error);
            }
        },

        health: (_req: Request, res: Response): void => {
            res.status(200).json({ status: 'ok' });
        }
    };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    const error = ErrorSanitizer.sanitize(err, `GuardrailApi:${req.method} ${req.path}`);
    const status = STATUS_BY_CATEGORY[error.category];
    if (status >= 500) {
        logger.error({ incidentId: error.incidentId, code: error.code, path: req.path }, 'Request failed');
    } else {
        logger.warn({ incidentId: error.incidentId, code: error.code, path: req.path }, 'Request refused');
    }
    res.status(status).json(errorBody(error));
}

export function createApp(engine: GuardrailEngine): express.Express {
    const app = express();
    const routes = createGuardrailRoutes(engine);

    app.disable('x-powered-by');
    app.use(express.json({ limit: '256kb' }));

    app.get('/healthz', routes.health);
    app.post('/events', routes.ingestEvent);
    app.post('/events/budgets', routes.ingestBudgetsNotification);
    app.get('/approvals/:executionId', routes.resolveApproval);
    app.get('/executions/:executionId', routes.getExecution);
    app.post('/executions/:executionId/rollback', routes.rollbackExecution);

    app.use(errorHandler);
    return app;
}

/**
 * Approval Gateway
 *
 * Validates one-time approval tokens and hands the decision to the orchestrator. Duplicate
 * webhook deliveries are harmless: the orchestrator only acts on a record still PLANNED.
 */

import { pino } from 'pino';
import { userActor } from '../execution/actionExecution.js';
import type { ExecutionOrchestrator, ResolutionOutcome } from '../execution/orchestrator.js';
import type { ApprovalTokenSigner } from './approvalToken.js';

const logger = pino({ name: 'ApprovalGateway' });

export type ApprovalDecision = 'approve' | 'reject';

export type ApprovalOutcome = ResolutionOutcome | { readonly outcome: 'invalid_token' };

export const DEFAULT_APPROVER = 'approver';

export class ApprovalGateway {
    constructor(
        private readonly orchestrator: ExecutionOrchestrator,
        private readonly tokens: ApprovalTokenSigner,
        private readonly clock: () => Date = () => new Date()
    ) { }

    async resolve(
        executionId: string,
        token: string,
        decision: ApprovalDecision,
        approver: string = DEFAULT_APPROVER,
        now?: Date
    ): Promise<ApprovalOutcome> {
        const at = now ?? this.clock();
        const verification = this.tokens.verify(executionId, token, at);

        if (verification.status === 'invalid') {
            // One outcome for every failure mode; the log is the only place the attempt shows.
            logger.warn({ executionId, decision }, 'Approval token rejected');
            return { outcome: 'invalid_token' };
        }

        if (verification.status === 'expired') {
            const execution = await this.orchestrator.findExecution(executionId);
            if (execution?.approvalExpiresAt && Date.parse(execution.approvalExpiresAt) <= at.getTime()) {
                await this.orchestrator.expire(execution, at, userActor(approver));
            }
            logger.info({ executionId, issuedAt: verification.issuedAt.toISOString() }, 'Approval token expired');
            return { outcome: 'expired', executionId };
        }

        const actor = userActor(approver);
        const outcome = decision === 'approve'
            ? await this.orchestrator.approve(executionId, actor, at)
            : await this.orchestrator.reject(executionId, actor, at);

        logger.info({ executionId, decision, outcome: outcome.outcome }, 'Approval decision resolved');
        return outcome;
    }
}

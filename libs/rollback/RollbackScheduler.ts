import { pino } from 'pino';
import { describeError } from '../errors/taxonomy.js';
import { SCHEDULER_ACTOR, type ExecutionOrchestrator } from '../execution/orchestrator.js';

const logger = pino({ name: 'RollbackScheduler' });

export const DEFAULT_SWEEP_INTERVAL_MS = 5 * 60_000;
export const DEFAULT_SWEEP_BATCH_SIZE = 100;

export interface SweepSummary {
    /** Expired EXECUTED records picked up this sweep */
    attempted: number;
    rolledBack: number;
    failed: number;
    /** Lost to a concurrent sweep or no longer EXECUTED */
    skipped: number;
    /** Unresolved approvals moved to EXPIRED */
    expired: number;
    /** In-flight executions past their claim deadline moved to FAILED */
    stalled: number;
    escalated: number;
    errors: string[];
}

export interface RollbackSchedulerOptions {
    readonly intervalMs?: number;
    readonly batchSize?: number;
    readonly clock?: () => Date;
}

/**
 * Rollback Scheduler
 *
 * Runs periodically to:
 * 1. Expire PLANNED executions whose approval window elapsed
 * 2. Fail PLANNED or APPROVED executions whose claim deadline passed with no outcome
 * 3. Revert EXECUTED executions whose TTL elapsed, from their stored diff
 *
 * A failed revert leaves the record EXECUTED for the next sweep. One bad record never stops
 * the rest of the batch.
 */
export class RollbackScheduler {
    private isRunning = false;
    private sweepInProgress = false;
    private intervalHandle: NodeJS.Timeout | null = null;
    private readonly intervalMs: number;
    private readonly batchSize: number;
    private readonly clock: () => Date;

    constructor(
        private readonly orchestrator: ExecutionOrchestrator,
        options: RollbackSchedulerOptions = {}
    ) {
        this.intervalMs = options.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
        this.batchSize = options.batchSize ?? DEFAULT_SWEEP_BATCH_SIZE;
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * Start the scheduler
     */
    public start(): void {
        if (this.isRunning) {
            logger.warn('RollbackScheduler already running');
            return;
        }

        this.isRunning = true;
        logger.info({ intervalMs: this.intervalMs }, 'RollbackScheduler started');

        // Run immediately, then on interval
        void this.tick();
        this.intervalHandle = setInterval(() => void this.tick(), this.intervalMs);
    }

    /**
     * Stop the scheduler
     */
    public stop(): void {
        this.isRunning = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        logger.info('RollbackScheduler stopped');
    }

    private async tick(): Promise<void> {
        // Overlapping ticks are safe, but pointless within one process
        if (this.sweepInProgress) return;
        this.sweepInProgress = true;
        try {
            await this.sweep(this.clock());
        } catch (error: unknown) {
            logger.error({ error: describeError(error) }, 'Rollback sweep aborted');
        } finally {
            this.sweepInProgress = false;
        }
    }

    /**
     * Run a single sweep. Never throws; failures are counted and reported in `errors`.
     */
    public async sweep(now: Date): Promise<SweepSummary> {
        const summary: SweepSummary = {
            attempted: 0,
            rolledBack: 0,
            failed: 0,
            skipped: 0,
            expired: 0,
            stalled: 0,
            escalated: 0,
            errors: []
        };

        await this.expireOverdueApprovals(now, summary);
        await this.failStalledExecutions(now, summary);
        await this.rollBackExpired(now, summary);

        if (summary.attempted > 0 || summary.expired > 0 || summary.stalled > 0 || summary.errors.length > 0) {
            logger.info({ ...summary, errors: summary.errors.length, now: now.toISOString() }, 'Rollback sweep complete');
        } else {
            logger.debug({ now: now.toISOString() }, 'Rollback sweep found nothing due');
        }

        return summary;
    }

    private async expireOverdueApprovals(now: Date, summary: SweepSummary): Promise<void> {
        try {
            const overdue = await this.orchestrator.listApprovalOverdue(now, this.batchSize);
            for (const execution of overdue) {
                try {
                    if (await this.orchestrator.expire(execution, now, SCHEDULER_ACTOR)) {
                        summary.expired += 1;
                    }
                } catch (error: unknown) {
                    const errorMessage = describeError(error);
                    summary.errors.push(`${execution.executionId}: ${errorMessage}`);
                    logger.error({ executionId: execution.executionId, error: errorMessage }, 'Approval expiry failed');
                }
            }
        } catch (error: unknown) {
            const errorMessage = describeError(error);
            summary.errors.push(errorMessage);
            logger.error({ error: errorMessage }, 'Approval expiry scan failed');
        }
    }

    private async failStalledExecutions(now: Date, summary: SweepSummary): Promise<void> {
        try {
            const stalled = await this.orchestrator.listClaimOverdue(now, this.batchSize);
            for (const execution of stalled) {
                try {
                    if (await this.orchestrator.failStalled(execution, now)) {
                        summary.stalled += 1;
                    }
                } catch (error: unknown) {
                    const errorMessage = describeError(error);
                    summary.errors.push(`${execution.executionId}: ${errorMessage}`);
                    logger.error({ executionId: execution.executionId, error: errorMessage }, 'Stalled execution could not be failed');
                }
            }
        } catch (error: unknown) {
            const errorMessage = describeError(error);
            summary.errors.push(errorMessage);
            logger.error({ error: errorMessage }, 'Stalled execution scan failed');
        }
    }

    private async rollBackExpired(now: Date, summary: SweepSummary): Promise<void> {
        try {
            const due = await this.orchestrator.listDueForRollback(now, this.batchSize);
            for (const execution of due) {
                summary.attempted += 1;
                try {
                    const result = await this.orchestrator.rollback(execution, SCHEDULER_ACTOR, now);
                    switch (result.status) {
                        case 'rolled_back':
                            summary.rolledBack += 1;
                            break;
                        case 'failed':
                            summary.failed += 1;
                            if (result.escalated) summary.escalated += 1;
                            break;
                        case 'skipped':
                            summary.skipped += 1;
                            break;
                    }
                } catch (error: unknown) {
                    const errorMessage = describeError(error);
                    summary.failed += 1;
                    summary.errors.push(`${execution.executionId}: ${errorMessage}`);
                    logger.error({ executionId: execution.executionId, error: errorMessage }, 'Rollback attempt failed');
                }
            }
        } catch (error: unknown) {
            const errorMessage = describeError(error);
            summary.errors.push(errorMessage);
            logger.error({ error: errorMessage }, 'Rollback scan failed');
        }
    }
}

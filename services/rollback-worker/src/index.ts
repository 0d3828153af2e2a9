import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { logger } from "../../../libs/logging/logger.js";
import { createRuntimeEngine } from "../../../libs/engine/runtime.js";
import { db } from "../../../libs/db/index.js";

/**
 * Dedicated sweeper: expires overdue approvals and reverts guardrails past their TTL.
 * Several replicas may run at once; the ledger's rollback lease keeps them from reverting
 * the same record twice.
 */
async function main() {
    const settings = await bootstrap("rollback-worker");
    const engine = createRuntimeEngine(settings);

    if (process.argv.includes("--once")) {
        const summary = await engine.sweep();
        logger.info({ ...summary }, "Single sweep finished");
        await db.close();
        return;
    }

    engine.scheduler.start();

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Rollback worker stopping");
        engine.scheduler.stop();
        db.close()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error({ error }, "Database pool close failed");
                process.exit(1);
            });
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});

import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { logger } from "../../../libs/logging/logger.js";
import { createRuntimeEngine } from "../../../libs/engine/runtime.js";
import { db } from "../../../libs/db/index.js";
import { createApp } from "./app.js";

const DEFAULT_PORT = 8080;

async function main() {
    const settings = await bootstrap("guardrail-api");
    const engine = createRuntimeEngine(settings);

    const port = process.env.PORT ? parseInt(process.env.PORT, 10) : DEFAULT_PORT;
    const server = createApp(engine).listen(port, () => {
        logger.info({ port }, "Guardrail API listening");
    });

    // The API also sweeps unless a dedicated rollback worker owns that.
    if (process.env.API_RUNS_SWEEPER !== "false") {
        engine.scheduler.start();
    }

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        engine.scheduler.stop();
        server.close(closeError => {
            if (closeError) logger.error({ error: closeError.message }, "HTTP server close failed");
            db.close()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error({ error }, "Database pool close failed");
                    process.exit(1);
                });
        });
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});

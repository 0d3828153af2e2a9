import { logger } from "../logging/logger.js";
import { ConfigGuard } from "./config-guard.js";
import { DB_CONFIG_GUARDS } from "./config/db-config.js";
import { ENGINE_CONFIG_GUARDS } from "./config/engine-config.js";
import { loadEngineSettings, type EngineSettings } from "./engineSettings.js";
import { db } from "../db/index.js";

/**
 * Fail-closed start sequence shared by every service: configuration first, then the
 * database roles the ledger will switch into.
 */
export async function bootstrap(serviceName: string): Promise<EngineSettings> {
    logger.info({ serviceName }, "Bootstrapping service");

    ConfigGuard.enforce(ENGINE_CONFIG_GUARDS);
    const settings = loadEngineSettings();

    if (settings.ledgerBackend === "postgres") {
        ConfigGuard.enforce(DB_CONFIG_GUARDS);
        await db.probeRoles();
    } else {
        logger.warn({ serviceName }, "Running on the in-memory ledger; executions do not survive a restart");
    }

    if (settings.forceSimulate) {
        logger.warn({ serviceName }, "GUARDRAILS_FORCE_SIMULATE is set; no guardrail will be applied");
    }

    logger.info({
        serviceName,
        ledgerBackend: settings.ledgerBackend,
        executorBackend: settings.executorBackend,
        policyDir: settings.policyDir
    }, "Startup checks passed");

    return settings;
}

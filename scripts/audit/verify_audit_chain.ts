import { db } from "../../libs/db/index.js";
import { verifyAuditChain } from "../../libs/audit/integrity.js";
import { PostgresExecutionLedger } from "../../libs/ledger/postgresLedger.js";

/**
 * Reads the full guardrail audit log and re-verifies its hash chain.
 */
async function runChainVerification() {
    console.log("--- VERIFYING GUARDRAIL AUDIT CHAIN ---");

    try {
        const records = await new PostgresExecutionLedger().readAuditTrail();
        const result = verifyAuditChain(records);

        if (!result.valid) {
            console.error(`FAILURE: ${result.reason}`);
            process.exitCode = 1;
        } else {
            console.log(`SUCCESS: ${records.length} record(s) verified`);
        }
    } catch (err) {
        console.error("CRITICAL: Audit chain verification could not run.");
        console.error(err);
        process.exitCode = 1;
    } finally {
        await db.close();
    }
}

runChainVerification().catch(err => {
    console.error(err);
    process.exit(1);
});

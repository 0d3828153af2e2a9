import path from "node:path";
import { listPolicyFiles, validatePolicyFile, type PolicyFileReport } from "../../libs/policy/policyStore.js";

/**
 * Validates every guardrail policy file in a directory (default: $POLICY_DIR or ./policies).
 * Prints one JSON line per file and exits 1 if any file is rejected.
 */
function validateDirectory(directory: string): PolicyFileReport[] {
    const reports = listPolicyFiles(directory).map(validatePolicyFile);

    // Ids must also be unique across the set
    const owners = new Map<string, string>();
    return reports.map(report => {
        if (!report.ok || report.policyId === null) return report;
        const owner = owners.get(report.policyId);
        if (owner) {
            return {
                ...report,
                ok: false,
                errors: [{ path: "id", message: `duplicate of ${owner}` }]
            };
        }
        owners.set(report.policyId, report.file);
        return report;
    });
}

function main() {
    const directory = path.resolve(process.argv[2] ?? process.env.POLICY_DIR ?? "policies");
    const reports = validateDirectory(directory);

    if (reports.length === 0) {
        console.error(`No policy files found in ${directory}`);
        process.exit(1);
    }

    for (const report of reports) {
        console.log(JSON.stringify({ file: report.file, ok: report.ok, errors: report.errors }));
    }

    const failed = reports.filter(report => !report.ok).length;
    if (failed > 0) {
        console.error(`${failed} of ${reports.length} policy file(s) failed validation`);
        process.exit(1);
    }
    console.log(`All ${reports.length} policy file(s) valid`);
}

main();

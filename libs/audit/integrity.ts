import crypto from "crypto";
import type { AuditEntry, AuditRecordV1 } from "./schema.js";

export const GENESIS_HASH = "0".repeat(64);

/**
 * JSON with object keys sorted at every depth. Stored records round-trip through jsonb, which
 * does not keep key order.
 */
export function canonicalJson(value: unknown): string {
    if (Array.isArray(value)) {
        return `[${value.map(canonicalJson).join(",")}]`;
    }
    if (value !== null && typeof value === "object") {
        const entries = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
        return `{${entries.join(",")}}`;
    }
    return JSON.stringify(value);
}

function computeHash(contents: Omit<AuditRecordV1, "integrity">, prevHash: string): string {
    return crypto.createHash("sha256")
        .update(canonicalJson(contents) + prevHash)
        .digest("hex");
}

export function sealAuditRecord(entry: AuditEntry, prevHash: string, recordedAt: Date): AuditRecordV1 {
    const contents: Omit<AuditRecordV1, "integrity"> = {
        ...entry,
        auditId: crypto.randomUUID(),
        recordedAt: recordedAt.toISOString()
    };
    return Object.freeze({
        ...contents,
        integrity: { prevHash, hash: computeHash(contents, prevHash) }
    });
}

/**
 * Audit Integrity Verifier
 * Validates the cryptographic chain over records in append order.
 */
export function verifyAuditChain(records: readonly AuditRecordV1[]): {
    valid: boolean;
    violationIndex?: number;
    reason?: string;
} {
    let lastHash = GENESIS_HASH;

    for (const [i, record] of records.entries()) {
        if (record.integrity.prevHash !== lastHash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Chain broken at record ${i}: prevHash mismatch. Expected ${lastHash}, found ${record.integrity.prevHash}`
            };
        }

        const { integrity, ...contentsOnly } = record;
        const computedHash = computeHash(contentsOnly, integrity.prevHash);
        if (computedHash !== integrity.hash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Integrity violation at record ${i}: hash mismatch. Computed ${computedHash}, found ${integrity.hash}`
            };
        }

        lastHash = integrity.hash;
    }

    return { valid: true };
}

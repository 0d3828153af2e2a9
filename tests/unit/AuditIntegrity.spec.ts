import { describe, it } from 'node:test';
import assert from 'node:assert';
import { GENESIS_HASH, canonicalJson, sealAuditRecord, verifyAuditChain } from '../../libs/audit/integrity.js';
import type { AuditRecordV1 } from '../../libs/audit/schema.js';

const AT = new Date('2026-03-02T10:00:00.000Z');

function chain(count: number): AuditRecordV1[] {
    const records: AuditRecordV1[] = [];
    let prevHash = GENESIS_HASH;
    for (let i = 0; i < count; i++) {
        const record = sealAuditRecord({
            type: 'EXECUTION_TRANSITION',
            actor: 'system:auto',
            executionId: 'exec-1',
            detail: { from: 'PLANNED', to: 'EXECUTED', version: i + 2 }
        }, prevHash, AT);
        records.push(record);
        prevHash = record.integrity.hash;
    }
    return records;
}

describe('verifyAuditChain (Integrity)', () => {
    it('should verify a valid chain', () => {
        const records = chain(3);
        assert.strictEqual(records[0]?.integrity.prevHash, GENESIS_HASH);
        assert.deepStrictEqual(verifyAuditChain(records), { valid: true });
    });

    it('should accept an empty trail', () => {
        assert.deepStrictEqual(verifyAuditChain([]), { valid: true });
    });

    it('should detect tampered contents', () => {
        const records = chain(2);
        const second = records[1];
        assert.ok(second);
        records[1] = { ...second, actor: 'user:mallory' };

        const result = verifyAuditChain(records);
        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.violationIndex, 1);
        assert.match(result.reason ?? '', /hash mismatch/);
    });

    it('should detect a removed record', () => {
        const records = chain(3);
        const result = verifyAuditChain([records[0], records[2]].filter((r): r is AuditRecordV1 => r !== undefined));

        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.violationIndex, 1);
        assert.match(result.reason ?? '', /prevHash mismatch/);
    });

    it('should hash independently of key order', () => {
        assert.strictEqual(canonicalJson({ b: 1, a: { d: [1, { f: 2, e: 3 }], c: null } }),
            '{"a":{"c":null,"d":[1,{"e":3,"f":2}]},"b":1}');
    });
});

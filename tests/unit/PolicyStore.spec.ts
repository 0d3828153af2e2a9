import { describe, it } from 'node:test';
import assert from 'node:assert';
import { fileURLToPath } from 'node:url';
import {
    DirectoryPolicySource,
    PolicyStore,
    listPolicyFiles,
    parsePolicyDefinition,
    validatePolicyFile
} from '../../libs/policy/policyStore.js';
import { ValidationError } from '../../libs/errors/taxonomy.js';
import { makePolicy, rawPolicy } from './helpers/guardrailFixtures.js';

const VALID_DIR = fileURLToPath(new URL('./fixtures/policies-valid', import.meta.url));
const MIXED_DIR = fileURLToPath(new URL('./fixtures/policies-mixed', import.meta.url));

function issuesOf(raw: Record<string, unknown>): Array<{ path: string; message: string }> {
    try {
        parsePolicyDefinition(raw, 'inline');
    } catch (error) {
        if (error instanceof ValidationError) {
            return error.issues.map(issue => ({ path: issue.path, message: issue.message }));
        }
        throw error;
    }
    assert.fail('Policy was accepted');
}

describe('Policy definitions', () => {
    it('maps snake_case files onto the frozen runtime model with defaults', () => {
        const policy = makePolicy();

        assert.strictEqual(policy.enabled, true);
        assert.strictEqual(policy.description, '');
        assert.strictEqual(policy.ttlMinutes, 180);
        assert.deepStrictEqual(policy.match.accountIds, ['A1']);
        assert.strictEqual(policy.match.maxAmountUsd, null);
        assert.strictEqual(policy.match.services, null);
        assert.deepStrictEqual(policy.notify, { channel: null, webhookUrl: null, mentionUsers: [] });
        assert.deepStrictEqual(policy.exemptions, { accounts: [], principals: [], timeWindows: [] });
        assert.ok(Object.isFrozen(policy));
        assert.ok(Object.isFrozen(policy.actions));
    });

    it('fills time window timezone and days', () => {
        const policy = makePolicy({ exceptions: { time_windows: [{ start: '22:00', end: '06:00' }] } });

        assert.deepStrictEqual(policy.exemptions.timeWindows, [{
            start: '22:00',
            end: '06:00',
            timezone: 'UTC',
            days: ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']
        }]);
    });

    it('rejects wildcard principals', () => {
        const issues = issuesOf(rawPolicy({
            scope: { principals: [{ type: 'iam_role', arn: 'arn:aws:iam::111111111111:role/*' }] }
        }));
        assert.deepStrictEqual(issues, [{ path: 'scope.principals.0.arn', message: 'Wildcards are not allowed in principal ARNs' }]);
    });

    it('rejects an empty principal list', () => {
        const issues = issuesOf(rawPolicy({ scope: { principals: [] } }));
        assert.deepStrictEqual(issues, [{ path: 'scope.principals', message: 'scope.principals must not be empty' }]);
    });

    it('rejects deletion-class and wildcard deny entries', () => {
        const issues = issuesOf(rawPolicy({
            actions: [{ type: 'attach_deny_policy', deny: ['ec2:TerminateInstances', 'ec2:*', 'ec2:RunInstances'] }]
        }));
        assert.deepStrictEqual(issues.map(issue => issue.path), ['actions.0.deny.0', 'actions.0.deny.1']);
        assert.strictEqual(issues[0]?.message, 'Deletion-class operations cannot appear in a guardrail action');
    });

    it('rejects an amount range whose max does not exceed min', () => {
        const issues = issuesOf(rawPolicy({
            match: { source: ['anomaly'], account_ids: ['A1'], min_amount_usd: 500, max_amount_usd: 100 }
        }));
        assert.deepStrictEqual(issues, [{ path: 'match.max_amount_usd', message: 'max_amount_usd must be greater than min_amount_usd' }]);
    });

    it('rejects unknown timezones', () => {
        const issues = issuesOf(rawPolicy({
            exceptions: { time_windows: [{ start: '22:00', end: '06:00', timezone: 'Mars/Base' }] }
        }));
        assert.deepStrictEqual(issues, [{ path: 'exceptions.time_windows.0.timezone', message: 'Unknown IANA timezone' }]);
    });

    it('rejects unknown keys instead of dropping them', () => {
        const issues = issuesOf(rawPolicy({ owner: 'finops' }));
        assert.strictEqual(issues.length, 1);
        assert.strictEqual(issues[0]?.path, '');
    });

    it('refuses duplicate ids in one store', () => {
        assert.throws(() => new PolicyStore([makePolicy(), makePolicy()]), ValidationError);
    });
});

describe('DirectoryPolicySource', () => {
    it('lists only .json files in filename order', () => {
        const files = listPolicyFiles(MIXED_DIR).map(file => file.slice(MIXED_DIR.length + 1));
        assert.deepStrictEqual(files, ['10-compute.json', '20-wildcard.json', '30-duplicate.json', '40-not-json.json']);
    });

    it('loads every valid file, disabled ones included', async () => {
        const snapshot = await new DirectoryPolicySource(VALID_DIR).loadPolicies();

        assert.deepStrictEqual(snapshot.policies.map(policy => policy.id), ['compute-freeze', 'storage-review']);
        assert.strictEqual(snapshot.policies[1]?.enabled, false);
        assert.deepStrictEqual(snapshot.rejected, []);
        assert.match(snapshot.revision, /^[a-f0-9]{64}$/);
    });

    it('rejects invalid files without dropping the valid ones', async () => {
        const snapshot = await new DirectoryPolicySource(MIXED_DIR).loadPolicies();

        assert.deepStrictEqual(snapshot.policies.map(policy => policy.id), ['compute-freeze']);
        assert.deepStrictEqual(snapshot.rejected.map(report => report.file), [
            '20-wildcard.json',
            '30-duplicate.json',
            '40-not-json.json'
        ]);
    });

    it('fails the whole load in strict mode', async () => {
        await assert.rejects(
            new DirectoryPolicySource(MIXED_DIR, { strict: true }).loadPolicies(),
            (error: unknown) => error instanceof ValidationError && error.message === '3 policy file(s) failed validation'
        );
    });

    it('reports per-file validation results', () => {
        const [valid, wildcard] = listPolicyFiles(MIXED_DIR).map(validatePolicyFile);

        assert.deepStrictEqual(valid, { file: '10-compute.json', ok: true, policyId: 'compute-freeze', errors: [] });
        assert.strictEqual(wildcard?.ok, false);
        assert.strictEqual(wildcard?.policyId, null);
    });
});

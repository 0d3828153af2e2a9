import { describe, it } from 'node:test';
import assert from 'node:assert';
import { evaluatePolicies, match, satisfiesPredicate } from '../../libs/policy/matcher.js';
import { ValidationError } from '../../libs/errors/taxonomy.js';
import { T0, makeEvent, makePolicy } from './helpers/guardrailFixtures.js';

describe('Policy Matcher', () => {
    const first = makePolicy({ id: 'first' });
    const second = makePolicy({ id: 'second' });

    it('returns the first matching policy in declared order', () => {
        assert.strictEqual(match(makeEvent(), [first, second], T0)?.id, 'first');
        assert.strictEqual(match(makeEvent(), [second, first], T0)?.id, 'second');
    });

    it('is deterministic for identical inputs', () => {
        const event = makeEvent();
        const results = Array.from({ length: 5 }, () => evaluatePolicies(event, [first, second], T0));
        for (const result of results) {
            assert.deepStrictEqual(result, results[0]);
        }
    });

    it('skips disabled policies', () => {
        const disabled = makePolicy({ id: 'disabled', enabled: false });
        const result = evaluatePolicies(makeEvent(), [disabled, second], T0);

        assert.strictEqual(result.policy?.id, 'second');
        assert.deepStrictEqual(result.skipped, [{ policyId: 'disabled', reason: 'disabled' }]);
    });

    it('returns null when no predicate holds', () => {
        const result = evaluatePolicies(makeEvent({ accountId: 'A2' }), [first], T0);

        assert.strictEqual(result.policy, null);
        assert.deepStrictEqual(result.skipped, [{ policyId: 'first', reason: 'predicate' }]);
    });

    it('applies amount bounds inclusively', () => {
        const bounded = makePolicy({
            match: { source: ['anomaly'], account_ids: ['A1'], min_amount_usd: 100, max_amount_usd: 500 }
        });

        assert.strictEqual(satisfiesPredicate(bounded.match, makeEvent({ amount: 100 })), true);
        assert.strictEqual(satisfiesPredicate(bounded.match, makeEvent({ amount: 500 })), true);
        assert.strictEqual(satisfiesPredicate(bounded.match, makeEvent({ amount: 99.99 })), false);
        assert.strictEqual(satisfiesPredicate(bounded.match, makeEvent({ amount: 500.01 })), false);
    });

    it('requires the service and region details when filters are declared', () => {
        const filtered = makePolicy({
            match: { source: ['anomaly'], account_ids: ['A1'], services: ['AmazonEC2'], regions: ['us-east-1'] }
        });

        assert.strictEqual(satisfiesPredicate(filtered.match, makeEvent()), false);
        assert.strictEqual(satisfiesPredicate(filtered.match, makeEvent({
            details: { service: 'AmazonEC2', region: 'us-east-1' }
        })), true);
        assert.strictEqual(satisfiesPredicate(filtered.match, makeEvent({
            details: { service: 'AmazonS3', region: 'us-east-1' }
        })), false);
    });

    it('rejects events whose source is not listed', () => {
        assert.strictEqual(match(makeEvent({ source: 'budgets' }), [first], T0), null);
    });

    it('treats an exempted policy as not matching and falls through', () => {
        const exempted = makePolicy({ id: 'exempted', exceptions: { accounts: ['A1'] } });
        const result = evaluatePolicies(makeEvent(), [exempted, second], T0);

        assert.strictEqual(result.policy?.id, 'second');
        assert.deepStrictEqual(result.skipped, [{ policyId: 'exempted', reason: 'exempt:account' }]);
    });

    it('throws under strict tie-break when two policies claim the event', () => {
        assert.throws(
            () => evaluatePolicies(makeEvent(), [first, second], T0, 'strict'),
            (error: unknown) => error instanceof ValidationError
                && error.issues.map(issue => issue.path).join(',') === 'first,second'
        );
    });

    it('returns the single eligible policy under strict tie-break', () => {
        const other = makePolicy({ id: 'other', match: { source: ['budgets'], account_ids: ['A1'] } });
        assert.strictEqual(match(makeEvent(), [other, first], T0, 'strict')?.id, 'first');
    });
});

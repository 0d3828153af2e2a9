/**
 * Policy Store
 *
 * Loads, validates and indexes guardrail policy definitions from a directory of JSON files.
 * Declared order is filename order. Invalid files are rejected (and reported); they never
 * contribute a partially-coerced policy.
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { logger } from '../logging/logger.js';
import { ValidationError, type ValidationIssue } from '../errors/taxonomy.js';
import { PolicyFileSchema } from '../validation/schema.js';
import { toValidationIssues } from '../validation/zod-middleware.js';
import { toGuardrailPolicy, type GuardrailPolicy } from './guardrailPolicy.js';

const POLICY_FILE_EXTENSION = '.json';

export interface PolicyFileReport {
    readonly file: string;
    readonly ok: boolean;
    readonly policyId: string | null;
    readonly errors: readonly ValidationIssue[];
}

export interface PolicySnapshot {
    /** Enabled and disabled policies, in declared order */
    readonly policies: readonly GuardrailPolicy[];
    /** sha256 over the accepted file contents, for audit correlation */
    readonly revision: string;
    readonly rejected: readonly PolicyFileReport[];
}

/**
 * Loaded once per evaluation cycle.
 */
export interface PolicySource {
    loadPolicies(): Promise<PolicySnapshot>;
}

/**
 * Validates one raw definition. Throws ValidationError with every issue found.
 */
export function parsePolicyDefinition(raw: unknown, source: string): GuardrailPolicy {
    const result = PolicyFileSchema.safeParse(raw);
    if (!result.success) {
        throw new ValidationError(`Invalid policy definition in ${source}`, toValidationIssues(result.error), {
            contextLabel: 'PolicyStore'
        });
    }
    return toGuardrailPolicy(result.data);
}

function readJson(filePath: string): unknown {
    const contents = fs.readFileSync(filePath, 'utf-8');
    try {
        return JSON.parse(contents);
    } catch (error) {
        throw new ValidationError(`Policy file ${filePath} is not valid JSON`, [
            { path: '', message: error instanceof Error ? error.message : 'parse error' }
        ], { contextLabel: 'PolicyStore', cause: error });
    }
}

export function validatePolicyFile(filePath: string): PolicyFileReport {
    const file = path.basename(filePath);
    try {
        const policy = parsePolicyDefinition(readJson(filePath), file);
        return { file, ok: true, policyId: policy.id, errors: [] };
    } catch (error) {
        if (error instanceof ValidationError) {
            return { file, ok: false, policyId: null, errors: error.issues };
        }
        throw error;
    }
}

export function listPolicyFiles(directory: string): string[] {
    return fs.readdirSync(directory)
        .filter(name => name.endsWith(POLICY_FILE_EXTENSION))
        .sort()
        .map(name => path.join(directory, name));
}

/**
 * In-memory index over an ordered policy list. Duplicate ids are refused.
 */
export class PolicyStore {
    private readonly byId = new Map<string, GuardrailPolicy>();

    constructor(private readonly ordered: readonly GuardrailPolicy[]) {
        for (const policy of ordered) {
            if (this.byId.has(policy.id)) {
                throw new ValidationError(`Duplicate policy id ${policy.id}`, [
                    { path: 'id', message: 'must be unique across the policy set' }
                ], { contextLabel: 'PolicyStore' });
            }
            this.byId.set(policy.id, policy);
        }
    }

    list(): readonly GuardrailPolicy[] {
        return this.ordered;
    }

    enabled(): readonly GuardrailPolicy[] {
        return this.ordered.filter(policy => policy.enabled);
    }

    get(policyId: string): GuardrailPolicy | null {
        return this.byId.get(policyId) ?? null;
    }

    get size(): number {
        return this.ordered.length;
    }
}

export interface DirectoryPolicySourceOptions {
    /** Fail the whole load when any file is rejected */
    readonly strict?: boolean;
}

export class DirectoryPolicySource implements PolicySource {
    constructor(
        private readonly directory: string,
        private readonly options: DirectoryPolicySourceOptions = {}
    ) { }

    async loadPolicies(): Promise<PolicySnapshot> {
        const accepted: GuardrailPolicy[] = [];
        const rejected: PolicyFileReport[] = [];
        const seenIds = new Set<string>();
        const revision = crypto.createHash('sha256');

        for (const filePath of listPolicyFiles(this.directory)) {
            const file = path.basename(filePath);
            try {
                const policy = parsePolicyDefinition(readJson(filePath), file);
                if (seenIds.has(policy.id)) {
                    throw new ValidationError(`Duplicate policy id ${policy.id}`, [
                        { path: 'id', message: 'must be unique across the policy set' }
                    ], { contextLabel: 'PolicyStore' });
                }
                seenIds.add(policy.id);
                accepted.push(policy);
                revision.update(`${file}\n${fs.readFileSync(filePath, 'utf-8')}\n`);
            } catch (error) {
                if (!(error instanceof ValidationError)) throw error;
                const report: PolicyFileReport = { file, ok: false, policyId: null, errors: error.issues };
                rejected.push(report);
                logger.error({ file, errors: error.issues }, 'Rejected invalid guardrail policy');
            }
        }

        if (rejected.length > 0 && this.options.strict) {
            throw new ValidationError(
                `${rejected.length} policy file(s) failed validation`,
                rejected.flatMap(report => report.errors.map(issue => ({
                    path: `${report.file}:${issue.path}`,
                    message: issue.message
                }))),
                { contextLabel: 'PolicyStore' }
            );
        }

        logger.debug({ directory: this.directory, loaded: accepted.length, rejected: rejected.length }, 'Policies loaded');

        return {
            policies: Object.freeze(accepted),
            revision: revision.digest('hex'),
            rejected: Object.freeze(rejected)
        };
    }
}

/**
 * Fixed in-process policy set. Used by tests and by callers that assemble policies themselves.
 */
export class StaticPolicySource implements PolicySource {
    private readonly store: PolicyStore;
    private readonly revision: string;

    constructor(policies: readonly GuardrailPolicy[]) {
        this.store = new PolicyStore(policies);
        this.revision = crypto.createHash('sha256').update(JSON.stringify(policies)).digest('hex');
    }

    async loadPolicies(): Promise<PolicySnapshot> {
        return { policies: this.store.list(), revision: this.revision, rejected: [] };
    }
}

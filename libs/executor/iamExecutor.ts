/**
 * IAM Guardrail Executor
 *
 * `attach_deny_policy` becomes a customer-managed policy with a single Deny statement,
 * attached to the target role or user. Managed policies are named from the guardrail policy
 * id and a hash of the deny list, so repeated applies converge on the same object.
 * Revert only detaches; the managed policy is left for reuse.
 */

import crypto from 'node:crypto';
import {
    AttachRolePolicyCommand,
    AttachUserPolicyCommand,
    CreatePolicyCommand,
    DetachRolePolicyCommand,
    DetachUserPolicyCommand,
    GetPolicyCommand,
    IAMClient,
    ListAttachedRolePoliciesCommand,
    ListAttachedUserPoliciesCommand,
    NoSuchEntityException
} from '@aws-sdk/client-iam';
import { pino } from 'pino';
import type { GuardrailDiff } from '../execution/actionExecution.js';
import type { GuardrailAction, PrincipalType, TargetPrincipal } from '../policy/guardrailPolicy.js';
import type { ApplyContext, GuardrailExecutor } from './guardrailExecutor.js';

const logger = pino({ name: 'IamGuardrailExecutor' });

export interface ParsedPrincipal {
    readonly type: PrincipalType;
    readonly accountId: string;
    readonly name: string;
}

/**
 * `arn:aws:iam::<account>:role/<path/>name`
 */
export function parsePrincipalArn(target: TargetPrincipal): ParsedPrincipal {
    const parts = target.arn.split(':');
    const accountId = parts[4] ?? '';
    const resource = parts.slice(5).join(':');
    const name = resource.split('/').at(-1) ?? '';
    if (!/^\d{12}$/.test(accountId) || name === '') {
        throw new Error(`Unparseable principal ARN: ${target.arn}`);
    }
    return { type: target.type, accountId, name };
}

export function denyPolicyName(policyId: string, deny: readonly string[]): string {
    const digest = crypto.createHash('sha256').update([...deny].sort().join(',')).digest('hex');
    return `guardrail-deny-${policyId}-${digest.slice(0, 8)}`;
}

export function buildDenyDocument(deny: readonly string[]): string {
    return JSON.stringify({
        Version: '2012-10-17',
        Statement: [{
            Sid: 'CostGuardrailDeny',
            Effect: 'Deny',
            Action: [...deny].sort(),
            Resource: '*'
        }]
    });
}

/**
 * The subset of IAM the executor needs.
 */
export interface IamApi {
    ensureManagedPolicy(params: { accountId: string; policyName: string; document: string; description: string }): Promise<string>;
    listAttachedPolicyArns(principal: ParsedPrincipal): Promise<string[]>;
    attachPolicy(principal: ParsedPrincipal, policyArn: string): Promise<void>;
    /** Resolves when the policy is no longer attached, including when it never was */
    detachPolicy(principal: ParsedPrincipal, policyArn: string): Promise<void>;
}

export function createIamApi(client: IAMClient = new IAMClient({})): IamApi {
    return {
        async ensureManagedPolicy({ accountId, policyName, document, description }) {
            const policyArn = `arn:aws:iam::${accountId}:policy/${policyName}`;
            try {
                await client.send(new GetPolicyCommand({ PolicyArn: policyArn }));
                return policyArn;
            } catch (error) {
                if (!(error instanceof NoSuchEntityException)) throw error;
            }

            const created = await client.send(new CreatePolicyCommand({
                PolicyName: policyName,
                PolicyDocument: document,
                Description: description,
                Tags: [{ Key: 'managed-by', Value: 'cost-guardrails' }]
            }));
            return created.Policy?.Arn ?? policyArn;
        },

        async listAttachedPolicyArns(principal) {
            const arns: string[] = [];
            let marker: string | undefined;
            do {
                const page = principal.type === 'iam_role'
                    ? await client.send(new ListAttachedRolePoliciesCommand({ RoleName: principal.name, Marker: marker }))
                    : await client.send(new ListAttachedUserPoliciesCommand({ UserName: principal.name, Marker: marker }));
                for (const attached of page.AttachedPolicies ?? []) {
                    if (attached.PolicyArn) arns.push(attached.PolicyArn);
                }
                marker = page.IsTruncated ? page.Marker : undefined;
            } while (marker);
            return arns.sort();
        },

        async attachPolicy(principal, policyArn) {
            if (principal.type === 'iam_role') {
                await client.send(new AttachRolePolicyCommand({ RoleName: principal.name, PolicyArn: policyArn }));
            } else {
                await client.send(new AttachUserPolicyCommand({ UserName: principal.name, PolicyArn: policyArn }));
            }
        },

        async detachPolicy(principal, policyArn) {
            try {
                if (principal.type === 'iam_role') {
                    await client.send(new DetachRolePolicyCommand({ RoleName: principal.name, PolicyArn: policyArn }));
                } else {
                    await client.send(new DetachUserPolicyCommand({ UserName: principal.name, PolicyArn: policyArn }));
                }
            } catch (error) {
                if (!(error instanceof NoSuchEntityException)) throw error;
                logger.info({ policyArn, principal: principal.name }, 'Deny policy already detached');
            }
        }
    };
}

export class IamGuardrailExecutor implements GuardrailExecutor {
    constructor(private readonly iam: IamApi = createIamApi()) { }

    async apply(target: TargetPrincipal, action: GuardrailAction, context: ApplyContext): Promise<GuardrailDiff> {
        if (action.type === 'notify_only') {
            return { kind: 'notify_only' };
        }

        const principal = parsePrincipalArn(target);
        const policyName = denyPolicyName(context.policyId, action.deny);
        const policyArn = await this.iam.ensureManagedPolicy({
            accountId: principal.accountId,
            policyName,
            document: buildDenyDocument(action.deny),
            description: `Cost guardrail ${context.policyId}`
        });

        const before = await this.iam.listAttachedPolicyArns(principal);
        const alreadyAttached = before.includes(policyArn);
        if (!alreadyAttached) {
            await this.iam.attachPolicy(principal, policyArn);
        }

        logger.info({
            executionId: context.executionId,
            principal: target.arn,
            policyArn,
            alreadyAttached
        }, 'Deny policy attached');

        return {
            kind: 'attach_deny_policy',
            policyArn,
            policyName,
            principalType: principal.type,
            principalName: principal.name,
            before,
            after: alreadyAttached ? before : [...before, policyArn].sort(),
            alreadyAttached,
            deniedActions: [...action.deny]
        };
    }

    async revert(target: TargetPrincipal, diff: GuardrailDiff): Promise<void> {
        if (diff['kind'] !== 'attach_deny_policy') {
            return;
        }

        const policyArn = diff['policyArn'];
        if (typeof policyArn !== 'string') {
            throw new Error(`Diff for ${target.arn} carries no policyArn`);
        }

        // Leave attachments this execution did not make
        if (diff['alreadyAttached'] === true) {
            logger.info({ principal: target.arn, policyArn }, 'Deny policy predates execution; leaving attached');
            return;
        }

        await this.iam.detachPolicy(parsePrincipalArn(target), policyArn);
        logger.info({ principal: target.arn, policyArn }, 'Deny policy detached');
    }
}

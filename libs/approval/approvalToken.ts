import crypto from 'node:crypto';

const TOKEN_FORMAT = /^(\d{1,15})\.([a-f0-9]{64})$/;

/** Tolerated clock drift for tokens that appear to be issued in the future. */
export const CLOCK_SKEW_MS = 60_000;

export type TokenVerification =
    | { readonly status: 'valid'; readonly issuedAt: Date }
    | { readonly status: 'expired'; readonly issuedAt: Date }
    | { readonly status: 'invalid' };

/**
 * One-time approval tokens: `<issuedAtMs>.<hex HMAC-SHA256(secret, "<executionId>:<issuedAtMs>")>`.
 *
 * Verification fails closed. A malformed token, a wrong signature and a token minted for a
 * different execution are indistinguishable to the caller. Only a signature-valid token can be
 * reported as expired.
 */
export class ApprovalTokenSigner {
    constructor(
        private readonly secret: string,
        private readonly windowMs: number
    ) {
        if (secret.length === 0) {
            throw new Error('Approval secret must not be empty');
        }
    }

    issue(executionId: string, issuedAt: Date): string {
        const issuedAtMs = issuedAt.getTime();
        return `${issuedAtMs}.${this.sign(executionId, issuedAtMs)}`;
    }

    verify(executionId: string, token: string, now: Date): TokenVerification {
        const parsed = TOKEN_FORMAT.exec(token);
        if (!parsed) return { status: 'invalid' };

        const [, issuedAtRaw = '', signature = ''] = parsed;
        const issuedAtMs = Number(issuedAtRaw);
        const expected = Buffer.from(this.sign(executionId, issuedAtMs), 'hex');
        const provided = Buffer.from(signature, 'hex');

        if (expected.length !== provided.length || !crypto.timingSafeEqual(expected, provided)) {
            return { status: 'invalid' };
        }

        const issuedAt = new Date(issuedAtMs);
        const age = now.getTime() - issuedAtMs;
        if (age > this.windowMs || age < -CLOCK_SKEW_MS) {
            return { status: 'expired', issuedAt };
        }
        return { status: 'valid', issuedAt };
    }

    private sign(executionId: string, issuedAtMs: number): string {
        return crypto.createHmac('sha256', this.secret)
            .update(`${executionId}:${issuedAtMs}`)
            .digest('hex');
    }
}

export function buildApprovalUrl(
    baseUrl: string,
    executionId: string,
    token: string,
    decision: 'approve' | 'reject'
): string {
    const url = new URL(`approvals/${encodeURIComponent(executionId)}`, baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);
    url.searchParams.set('decision', decision);
    url.searchParams.set('token', token);
    return url.toString();
}

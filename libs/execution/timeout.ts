import { ExecutorError } from '../errors/taxonomy.js';

export const DEFAULT_COLLABORATOR_TIMEOUT_MS = 10_000;

/**
 * Races `operation` against a timer. The timer is always cleared; a late settlement of the
 * operation is ignored.
 */
export async function withTimeout<T>(operation: () => Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new ExecutorError(`${label} timed out after ${timeoutMs}ms`, label, true, {
                contextLabel: 'CollaboratorTimeout'
            }));
        }, timeoutMs);
    });

    try {
        return await Promise.race([operation(), timeout]);
    } finally {
        clearTimeout(timer);
    }
}

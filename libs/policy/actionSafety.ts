/**
 * Guardrails restrict; they never destroy. A deny entry whose verb is deletion-class is
 * refused at load time. Wildcard verbs (`ec2:*`) are refused too, since they cover deletes.
 */
const DELETION_CLASS_VERBS = ['Delete', 'Terminate', 'Destroy', 'Purge', 'Remove', 'Drop'] as const;

export function isDeletionClassOperation(action: string): boolean {
    const separator = action.indexOf(':');
    const verb = separator === -1 ? action : action.slice(separator + 1);
    if (verb.includes('*')) return true;
    return DELETION_CLASS_VERBS.some(prefix => verb.startsWith(prefix));
}

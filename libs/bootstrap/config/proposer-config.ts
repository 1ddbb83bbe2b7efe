import type { GuardRule } from '../config-guard.js';

/**
 * Proposer endpoint guards for the regeneration worker.
 * Plain http is only accepted for a local model server outside production.
 */
export const PROPOSER_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'FORGE_PROPOSER_URL' },
    { type: 'required', name: 'FORGE_PROPOSER_API_KEY' },
    { type: 'required', name: 'FORGE_PROPOSER_MODEL' },

    {
        type: 'forbidIf',
        name: 'FORGE_PROPOSER_URL',
        when: (env) => env.NODE_ENV === 'production' && (env.FORGE_PROPOSER_URL ?? '').startsWith('http://'),
        message: 'Production cannot use a plain http proposer endpoint',
    },
];

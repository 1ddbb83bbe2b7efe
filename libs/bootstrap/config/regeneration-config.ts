import type { Env } from '../config-guard.js';
import { ForgeError } from '../../errors/sanitizer.js';
import {
    RegenerationConfigSchema,
    type RegenerationConfig,
    type RegenerationConfigInput
} from '../../validation/schema.js';
import { createValidator, ValidationViolation } from '../../validation/zod-middleware.js';

/**
 * Environment variables recognised by the loader, keyed by config field.
 */
export const CONFIG_ENV_KEYS = {
    retryBudget: 'FORGE_RETRY_BUDGET',
    perAttemptTimeoutMs: 'FORGE_ATTEMPT_TIMEOUT_MS',
    proposerTimeoutMs: 'FORGE_PROPOSER_TIMEOUT_MS',
    sandboxConcurrencyLimit: 'FORGE_SANDBOX_CONCURRENCY',
    sandboxImage: 'FORGE_SANDBOX_IMAGE',
    dockerBinary: 'FORGE_DOCKER_BIN',
} as const;

const validateConfig = createValidator(RegenerationConfigSchema);

const NUMERIC_KEYS = ['retryBudget', 'perAttemptTimeoutMs', 'proposerTimeoutMs', 'sandboxConcurrencyLimit'] as const;
const STRING_KEYS = ['sandboxImage', 'dockerBinary'] as const;

function readEnv(env: Env): RegenerationConfigInput {
    const fromEnv: RegenerationConfigInput = {};

    for (const key of NUMERIC_KEYS) {
        const raw = env[CONFIG_ENV_KEYS[key]];
        if (raw !== undefined && raw.trim() !== '') {
            fromEnv[key] = Number(raw);
        }
    }
    for (const key of STRING_KEYS) {
        const raw = env[CONFIG_ENV_KEYS[key]];
        if (raw !== undefined && raw.trim() !== '') {
            fromEnv[key] = raw;
        }
    }

    return fromEnv;
}

/**
 * Resolve the loop configuration: explicit overrides win over environment
 * variables, which win over schema defaults.
 *
 * @throws ForgeError with category CONFIG when a value is out of range.
 */
export function loadRegenerationConfig(
    overrides: RegenerationConfigInput = {},
    env: Env = process.env
): RegenerationConfig {
    try {
        return validateConfig({ ...readEnv(env), ...overrides }, 'RegenerationConfig');
    } catch (err) {
        if (err instanceof ValidationViolation) {
            throw new ForgeError(
                `Invalid regeneration configuration: ${err.issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
                { issues: err.issues },
                'CONFIG',
                { cause: err, contextLabel: 'RegenerationConfig' }
            );
        }
        throw err;
    }
}

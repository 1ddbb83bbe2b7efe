/**
 * Public surface of remap-forge.
 */

export * from './classification/index.js';
export * from './regeneration/index.js';
export * from './sandbox/index.js';
export * from './proposer/index.js';
export {
    InfrastructureError,
    SessionCancelledError,
    throwIfCancelled,
    type InfrastructureCode,
    type InfrastructureSource
} from './errors/InfrastructureError.js';
export { ErrorSanitizer, ForgeError, type ForgeErrorCategory } from './errors/sanitizer.js';
export { logger, getSessionLogger, type Logger } from './logging/logger.js';
export { loadRegenerationConfig, CONFIG_ENV_KEYS } from './bootstrap/config/regeneration-config.js';
export { ConfigGuard, type Env, type GuardRule } from './bootstrap/config-guard.js';
export {
    RegenerationConfigSchema,
    SessionRequestSchema,
    type RegenerationConfig,
    type RegenerationConfigInput,
    type SessionRequest
} from './validation/schema.js';
export { ValidationViolation, createValidator, validate } from './validation/zod-middleware.js';

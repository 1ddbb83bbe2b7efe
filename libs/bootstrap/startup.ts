import { logger } from "../logging/logger.js";
import type { RegenerationConfig } from "../validation/schema.js";
import { ConfigGuard, type Env, type GuardRule } from "./config-guard.js";
import { loadRegenerationConfig } from "./config/regeneration-config.js";

/**
 * Startup sequence shared by service entry points: fail-closed env guards,
 * then the validated loop configuration.
 */
export function bootstrap(serviceName: string, rules: readonly GuardRule[], env: Env = process.env): RegenerationConfig {
    logger.info({ serviceName }, "Bootstrapping service");

    ConfigGuard.enforce(rules, env);
    const config = loadRegenerationConfig({}, env);

    logger.info({ serviceName, config }, "Startup checks passed");
    return config;
}

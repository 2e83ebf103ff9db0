import { logger } from "../logging/logger.js";
import { ConfigGuard, Env } from "./config-guard.js";
import { loadRuntimeConfig, TRUST_CONFIG_REQUIREMENTS } from "./config/env.js";
import { readTrustConfig } from "./config/trust-config.js";
import { createPubKeyProvider, PubKeyProvider, staticKeyLoader } from "../crypto/pubKeyProvider.js";

/**
 * Builds the key provider a host hands to SignedPolicy.verify, from the
 * trust configuration file named by TRUST_CONFIG_PATH. Applies the
 * validated LOG_LEVEL to the shared logger.
 *
 * @throws ConfigError when the environment or the trust config is invalid
 */
export function bootstrapKeyProvider(env: Env = process.env): PubKeyProvider {
    ConfigGuard.enforce(TRUST_CONFIG_REQUIREMENTS, env);

    const config = loadRuntimeConfig(env);
    logger.level = config.logLevel;
    logger.info({ serviceName: config.serviceName }, "Bootstrapping key provider");

    const trust = readTrustConfig(config.trustConfigPath);

    return createPubKeyProvider(staticKeyLoader(trust), config.keyCache);
}

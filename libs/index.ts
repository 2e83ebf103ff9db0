export * from './policy/index.js';
export * from './mapping/index.js';

export type { Verifier } from './crypto/verifier.js';
export type { AthenzEnv, PubKeyProvider, KeyLoader, KeyCacheOptions } from './crypto/pubKeyProvider.js';
export type { TrustConfig, PublicKeyEntry } from './bootstrap/config/trust-config.js';
export type { RuntimeConfig } from './bootstrap/config/env.js';
export type { Env, GuardRule } from './bootstrap/config-guard.js';

export { PublicKeyVerifier } from './crypto/verifier.js';
export { EnvZTS, EnvZMS, createPubKeyProvider, staticKeyLoader } from './crypto/pubKeyProvider.js';
export { readTrustConfig, parseTrustConfig } from './bootstrap/config/trust-config.js';
export { loadRuntimeConfig, TRUST_CONFIG_REQUIREMENTS } from './bootstrap/config/env.js';
export { ConfigGuard, ConfigError } from './bootstrap/config-guard.js';
export { bootstrapKeyProvider } from './bootstrap/startup.js';
export { logger, resolveLogLevel } from './logging/logger.js';

/**
 * Public key resolution for signed policy verification.
 *
 * Verifiers are built lazily from PEM material and cached. Unknown or unusable
 * key ids are remembered in a short-lived negative cache so a stale key id in
 * a fetched document does not rebuild keys on every refresh.
 */

import { LRUCache } from 'lru-cache';
import { logger } from '../logging/logger.js';
import type { TrustConfig } from '../bootstrap/config/trust-config.js';
import { PublicKeyVerifier, Verifier } from './verifier.js';

export type AthenzEnv = 'zts' | 'zms';

export const EnvZTS: AthenzEnv = 'zts';
export const EnvZMS: AthenzEnv = 'zms';

/**
 * Resolves the verifier for a key id in one trust environment, or undefined
 * when the key is not known.
 */
export type PubKeyProvider = (env: AthenzEnv, keyId: string) => Verifier | undefined;

/**
 * Returns the PEM (or ybase64 PEM) for a key id, or undefined.
 */
export type KeyLoader = (env: AthenzEnv, keyId: string) => string | undefined;

export interface KeyCacheOptions {
    max?: number;
    ttlMs?: number;
    negativeTtlMs?: number;
}

const DEFAULT_MAX = 100;
const DEFAULT_TTL_MS = 5 * 60 * 1000;
const DEFAULT_NEGATIVE_TTL_MS = 30 * 1000;

function cacheKey(env: AthenzEnv, keyId: string): string {
    return `${env}:${keyId}`;
}

/**
 * Key loader over the public key lists of a trust configuration.
 */
export function staticKeyLoader(config: TrustConfig): KeyLoader {
    const keys = new Map<string, string>();
    for (const entry of config.ztsPublicKeys) {
        keys.set(cacheKey(EnvZTS, entry.id), entry.key);
    }
    for (const entry of config.zmsPublicKeys) {
        keys.set(cacheKey(EnvZMS, entry.id), entry.key);
    }
    return (env, keyId) => keys.get(cacheKey(env, keyId));
}

export function createPubKeyProvider(loader: KeyLoader, options: KeyCacheOptions = {}): PubKeyProvider {
    const positiveCache = new LRUCache<string, Verifier>({
        max: options.max ?? DEFAULT_MAX,
        ttl: options.ttlMs ?? DEFAULT_TTL_MS,
    });
    const negativeCache = new LRUCache<string, true>({
        max: options.max ?? DEFAULT_MAX,
        ttl: options.negativeTtlMs ?? DEFAULT_NEGATIVE_TTL_MS,
    });

    return (env, keyId) => {
        const key = cacheKey(env, keyId);

        const cached = positiveCache.get(key);
        if (cached) return cached;
        if (negativeCache.has(key)) return undefined;

        const pem = loader(env, keyId);
        if (pem === undefined) {
            logger.warn({ env, keyId }, 'Public key not found');
            negativeCache.set(key, true);
            return undefined;
        }

        try {
            const verifier = PublicKeyVerifier.fromPem(pem);
            positiveCache.set(key, verifier);
            return verifier;
        } catch (err) {
            logger.warn({
                env,
                keyId,
                error: err instanceof Error ? err.message : String(err),
            }, 'Public key material is unusable');
            negativeCache.set(key, true);
            return undefined;
        }
    };
}

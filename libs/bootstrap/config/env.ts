import { z, ZodTypeAny } from 'zod';
import { LOG_LEVELS } from '../../logging/logger.js';
import { validate } from '../../validation/zod-validate.js';
import { ConfigError, Env, GuardRule } from '../config-guard.js';

const RuntimeEnvSchema = z.object({
    SERVICE_NAME: z.string().min(1).default('signed-policy-authz'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    TRUST_CONFIG_PATH: z.string().default(''),
    KEY_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(5 * 60 * 1000),
    KEY_CACHE_NEGATIVE_TTL_MS: z.coerce.number().int().nonnegative().default(30 * 1000),
    KEY_CACHE_MAX: z.coerce.number().int().positive().default(100),
});

export interface RuntimeConfig {
    serviceName: string;
    logLevel: z.infer<typeof RuntimeEnvSchema>['LOG_LEVEL'];
    /** Empty when unset; TRUST_CONFIG_REQUIREMENTS rejects that before bootstrap reads it. */
    trustConfigPath: string;
    keyCache: {
        ttlMs: number;
        negativeTtlMs: number;
        max: number;
    };
}

function settingRule(name: string, field: ZodTypeAny, expected: string): GuardRule {
    return {
        type: 'assert',
        check: env => field.safeParse(env[name]).success,
        message: `${name} must be ${expected}`,
    };
}

/**
 * Environment requirements for hosts that build their key provider from a
 * trust configuration file. Each setting is checked with its own schema field.
 */
export const TRUST_CONFIG_REQUIREMENTS: readonly GuardRule[] = [
    { type: 'required', name: 'TRUST_CONFIG_PATH' },
    settingRule('LOG_LEVEL', RuntimeEnvSchema.shape.LOG_LEVEL, `one of ${LOG_LEVELS.join(', ')}`),
    settingRule('KEY_CACHE_TTL_MS', RuntimeEnvSchema.shape.KEY_CACHE_TTL_MS, 'a non-negative integer'),
    settingRule('KEY_CACHE_NEGATIVE_TTL_MS', RuntimeEnvSchema.shape.KEY_CACHE_NEGATIVE_TTL_MS, 'a non-negative integer'),
    settingRule('KEY_CACHE_MAX', RuntimeEnvSchema.shape.KEY_CACHE_MAX, 'a positive integer'),
];

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
    const parsed = validate(RuntimeEnvSchema, env, 'environment', message => new ConfigError([message]));

    return {
        serviceName: parsed.SERVICE_NAME,
        logLevel: parsed.LOG_LEVEL,
        trustConfigPath: parsed.TRUST_CONFIG_PATH,
        keyCache: {
            ttlMs: parsed.KEY_CACHE_TTL_MS,
            negativeTtlMs: parsed.KEY_CACHE_NEGATIVE_TTL_MS,
            max: parsed.KEY_CACHE_MAX,
        },
    };
}

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../../logging/logger.js';
import { validate } from '../../validation/zod-validate.js';
import { ConfigError } from '../config-guard.js';

const PublicKeyEntrySchema = z.object({
    id: z.string().min(1),
    key: z.string().min(1), // ybase64-encoded PEM
});

/**
 * Trust configuration in the athenz.conf layout. Only the public key lists
 * matter to verification; the URLs are carried for the host's fetch layer.
 */
export const TrustConfigSchema = z.object({
    ztsUrl: z.string().optional(),
    zmsUrl: z.string().optional(),
    ztsPublicKeys: z.array(PublicKeyEntrySchema).default([]),
    zmsPublicKeys: z.array(PublicKeyEntrySchema).default([]),
});

export type PublicKeyEntry = z.infer<typeof PublicKeyEntrySchema>;
export type TrustConfig = z.infer<typeof TrustConfigSchema>;

export function parseTrustConfig(raw: unknown, context = 'trust-config'): TrustConfig {
    return validate(TrustConfigSchema, raw, context, message => new ConfigError([message]));
}

/**
 * Reads and validates a trust configuration file.
 *
 * @throws ConfigError if the file is missing, not JSON, or malformed
 */
export function readTrustConfig(configPath: string): TrustConfig {
    const absolutePath = path.resolve(process.cwd(), configPath);
    if (!fs.existsSync(absolutePath)) {
        throw new ConfigError([`Trust config missing at ${absolutePath}`]);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
    } catch (err) {
        const message = err instanceof Error ? err.message : 'Unknown error';
        throw new ConfigError([`Failed to parse trust config: ${message}`]);
    }

    const config = parseTrustConfig(raw, absolutePath);
    logger.info({
        path: absolutePath,
        ztsKeyCount: config.ztsPublicKeys.length,
        zmsKeyCount: config.zmsPublicKeys.length,
    }, 'Trust config loaded');
    return config;
}

import { getDomainLogger } from '../logging/logger.js';
import { EnvZMS, EnvZTS, PubKeyProvider } from '../crypto/pubKeyProvider.js';
import { validate } from '../validation/zod-validate.js';
import { canonicalize } from './canonical.js';
import { DomainSignedPolicyData, DomainSignedPolicyDataSchema, PolicyData } from './schema.js';
import { SignedPolicyError } from './SignedPolicyError.js';

function causeMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * A fetched policy document with its two signatures:
 *   - ZTS (distribution authority) over `signedPolicyData`
 *   - ZMS (policy authority) over `signedPolicyData.policyData`
 *
 * The document is never mutated; a host verifies it once per refresh and
 * either accepts `policyData` or discards the document.
 */
export class SignedPolicy {
    readonly domainSignedPolicyData: DomainSignedPolicyData;

    constructor(domainSignedPolicyData: DomainSignedPolicyData) {
        this.domainSignedPolicyData = domainSignedPolicyData;
    }

    /**
     * Validates the shape of a decoded policy document.
     *
     * @throws SignedPolicyError (POLICY_MALFORMED)
     */
    static fromJSON(raw: unknown): SignedPolicy {
        const data = validate(
            DomainSignedPolicyDataSchema,
            raw,
            'signed-policy',
            message => new SignedPolicyError('POLICY_MALFORMED', message)
        );
        return new SignedPolicy(data);
    }

    get domain(): string {
        return this.domainSignedPolicyData.signedPolicyData.policyData.domain;
    }

    get policyData(): PolicyData {
        return this.domainSignedPolicyData.signedPolicyData.policyData;
    }

    /**
     * Checks the signature chain, outer envelope first. Stops at the first
     * failure; the ZMS key is not looked up unless the ZTS signature holds.
     *
     * @throws SignedPolicyError
     */
    verify(keyProvider: PubKeyProvider): void {
        const { keyId, signature, signedPolicyData } = this.domainSignedPolicyData;
        const log = getDomainLogger(signedPolicyData.policyData.domain);

        const ztsVerifier = keyProvider(EnvZTS, keyId);
        if (!ztsVerifier) {
            log.warn({ keyId }, 'ZTS key not found');
            throw new SignedPolicyError('ZTS_KEY_NOT_FOUND', 'zts key not found');
        }

        try {
            ztsVerifier.verify(canonicalize(signedPolicyData), signature);
        } catch (err) {
            log.warn({ keyId, error: causeMessage(err) }, 'ZTS signature verification failed');
            throw new SignedPolicyError(
                'ZTS_SIGNATURE_INVALID',
                `error verify signature: ${causeMessage(err)}`,
                { cause: err }
            );
        }

        const { zmsKeyId, zmsSignature, policyData } = signedPolicyData;

        const zmsVerifier = keyProvider(EnvZMS, zmsKeyId);
        if (!zmsVerifier) {
            log.warn({ zmsKeyId }, 'ZMS key not found');
            throw new SignedPolicyError('ZMS_KEY_NOT_FOUND', 'zms key not found');
        }

        try {
            zmsVerifier.verify(canonicalize(policyData), zmsSignature);
        } catch (err) {
            log.warn({ zmsKeyId, error: causeMessage(err) }, 'ZMS signature verification failed');
            throw new SignedPolicyError(
                'ZMS_SIGNATURE_INVALID',
                `error verify zms signature: ${causeMessage(err)}`,
                { cause: err }
            );
        }

        log.info({ keyId, zmsKeyId }, 'Signed policy verified');
    }

    expiresAt(): Date | undefined {
        const { expires } = this.domainSignedPolicyData.signedPolicyData;
        return expires ? new Date(expires) : undefined;
    }

    /**
     * A document without an expiry never expires.
     */
    isExpired(now: Date = new Date()): boolean {
        const expires = this.expiresAt();
        return expires !== undefined && expires.getTime() <= now.getTime();
    }

    /**
     * Verifies the signature chain, then rejects an expired document.
     * Returns the policy payload the host may activate.
     *
     * @throws SignedPolicyError
     */
    accept(keyProvider: PubKeyProvider, now: Date = new Date()): PolicyData {
        this.verify(keyProvider);

        const expires = this.expiresAt();
        if (expires && expires.getTime() <= now.getTime()) {
            getDomainLogger(this.domain).warn({ expires: expires.toISOString() }, 'Signed policy expired');
            throw new SignedPolicyError('POLICY_EXPIRED', `policy already expired at ${expires.toISOString()}`);
        }

        return this.policyData;
    }
}

import crypto, { KeyObject } from 'crypto';
import * as ybase64 from './ybase64.js';

/**
 * Checks a signature against the canonical string form of some signed data.
 * Throws when the signature does not verify.
 */
export interface Verifier {
    verify(data: string, signature: string): void;
}

const PEM_HEADER = '-----BEGIN';

/**
 * Verifier over a single public key (RSA or EC). Signatures are SHA-256,
 * ybase64-encoded; EC signatures are DER (ASN.1) encoded.
 */
export class PublicKeyVerifier implements Verifier {
    private readonly key: KeyObject;

    constructor(key: KeyObject) {
        if (key.type !== 'public') {
            throw new Error(`expected a public key, got ${key.type}`);
        }
        this.key = key;
    }

    /**
     * Accepts either a PEM document or a ybase64-encoded PEM as found in
     * trust configuration files.
     */
    static fromPem(pemOrY64: string): PublicKeyVerifier {
        const pem = pemOrY64.trimStart().startsWith(PEM_HEADER)
            ? pemOrY64
            : ybase64.decode(pemOrY64.trim()).toString('utf-8');
        return new PublicKeyVerifier(crypto.createPublicKey(pem));
    }

    verify(data: string, signature: string): void {
        if (!signature) {
            throw new Error('signature is empty');
        }

        let sig: Buffer;
        try {
            sig = ybase64.decode(signature);
        } catch (err) {
            throw new Error(`malformed signature: ${err instanceof Error ? err.message : String(err)}`);
        }

        let ok: boolean;
        try {
            ok = crypto.verify('sha256', Buffer.from(data, 'utf-8'), this.key, sig);
        } catch (err) {
            throw new Error(`invalid signature: ${err instanceof Error ? err.message : String(err)}`);
        }
        if (!ok) {
            throw new Error('invalid signature');
        }
    }
}

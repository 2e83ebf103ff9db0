/**
 * SignedPolicyError
 * Failure raised while authenticating a signed policy document.
 * The message is the exact text surfaced to the host; `code` is for machines.
 */

export type SignedPolicyErrorCode =
    | 'ZTS_KEY_NOT_FOUND'
    | 'ZTS_SIGNATURE_INVALID'
    | 'ZMS_KEY_NOT_FOUND'
    | 'ZMS_SIGNATURE_INVALID'
    | 'POLICY_EXPIRED'
    | 'POLICY_MALFORMED';

export class SignedPolicyError extends Error {
    readonly code: SignedPolicyErrorCode;

    constructor(code: SignedPolicyErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SignedPolicyError';
        this.code = code;
        Object.setPrototypeOf(this, SignedPolicyError.prototype);
    }
}

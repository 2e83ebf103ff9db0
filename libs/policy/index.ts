export type {
    Assertion,
    Policy,
    PolicyData,
    SignedPolicyData,
    DomainSignedPolicyData,
} from './schema.js';
export type { SignedPolicyErrorCode } from './SignedPolicyError.js';

export { SignedPolicy } from './signedPolicy.js';
export { SignedPolicyError } from './SignedPolicyError.js';
export { canonicalize } from './canonical.js';
export { DomainSignedPolicyDataSchema } from './schema.js';

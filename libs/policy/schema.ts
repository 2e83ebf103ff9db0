import { z } from 'zod';

/*
 * Signed policy document schemas. Objects pass unknown members through:
 * the canonical signed form is computed from the parsed value, so dropping
 * a field the authority signed would break verification.
 */

const Timestamp = z.string().datetime({ offset: true });

export const AssertionSchema = z.object({
    role: z.string(),
    resource: z.string(),
    action: z.string(),
    effect: z.enum(['ALLOW', 'DENY']).optional(),
    id: z.number().int().optional(),
}).passthrough();

export const PolicySchema = z.object({
    name: z.string(),
    modified: Timestamp.optional(),
    assertions: z.array(AssertionSchema),
}).passthrough();

export const PolicyDataSchema = z.object({
    domain: z.string().min(1),
    policies: z.array(PolicySchema),
}).passthrough();

export const SignedPolicyDataSchema = z.object({
    policyData: PolicyDataSchema,
    zmsSignature: z.string(),
    zmsKeyId: z.string(),
    modified: Timestamp.optional(),
    expires: Timestamp.optional(),
}).passthrough();

export const DomainSignedPolicyDataSchema = z.object({
    signedPolicyData: SignedPolicyDataSchema,
    signature: z.string(),
    keyId: z.string(),
}).passthrough();

export type Assertion = z.infer<typeof AssertionSchema>;
export type Policy = z.infer<typeof PolicySchema>;
export type PolicyData = z.infer<typeof PolicyDataSchema>;
export type SignedPolicyData = z.infer<typeof SignedPolicyDataSchema>;
export type DomainSignedPolicyData = z.infer<typeof DomainSignedPolicyDataSchema>;

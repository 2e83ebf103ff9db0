import { z } from 'zod';
import { validate } from '../validation/zod-validate.js';
import { MappingRuleError } from './MappingRuleError.js';
import type { RawMappingRules } from './mappingRules.js';

// Missing fields default to '' so that the compiler reports them as an empty rule.
export const RawRuleSchema = z.object({
    method: z.string().default(''),
    path: z.string().default(''),
    action: z.string().default(''),
    resource: z.string().default(''),
});

export const RawMappingRulesSchema = z.record(z.string(), z.array(RawRuleSchema).nullable());

/**
 * Shape-checks a rule source (e.g. the decoded policy payload or a host
 * config object). Semantic checks are left to `MappingRules.validate`.
 */
export function parseRawRules(input: unknown, context = 'mapping-rules'): RawMappingRules {
    return validate(
        RawMappingRulesSchema,
        input,
        context,
        message => new MappingRuleError('RULES_MALFORMED', message)
    );
}

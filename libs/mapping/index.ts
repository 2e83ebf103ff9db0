export type { Validated } from './validated.js';
export type { RawRule, Rule } from './rule.js';
export type { RawMappingRules, Translation } from './mappingRules.js';
export type { MappingRuleErrorCode } from './MappingRuleError.js';

export { MappingRules } from './mappingRules.js';
export { MappingRulesStore } from './rulesStore.js';
export { MappingRuleError } from './MappingRuleError.js';
export { parseRawRules, RawMappingRulesSchema } from './schema.js';
export { compileRule } from './rule.js';

/**
 * MappingRuleError
 * Raised when an authored mapping rule set cannot be compiled.
 * A rule set that raises this must not be activated.
 */

export type MappingRuleErrorCode =
    | 'DOMAIN_EMPTY'
    | 'RULES_NIL'
    | 'RULE_EMPTY'
    | 'PATH_NO_SLASH'
    | 'PATH_SLASH_ONLY'
    | 'PLACEHOLDER_EMPTY'
    | 'PLACEHOLDER_DUPLICATED'
    | 'QUERY_MULTIPLE_VALUES'
    | 'RULES_MALFORMED';

export class MappingRuleError extends Error {
    readonly code: MappingRuleErrorCode;

    constructor(code: MappingRuleErrorCode, message: string) {
        super(message);
        this.name = 'MappingRuleError';
        this.code = code;
        Object.setPrototypeOf(this, MappingRuleError.prototype);
    }
}

import { logger } from '../logging/logger.js';
import { MappingRuleError } from './MappingRuleError.js';
import { compileRule, RawRule, Rule, splitPath } from './rule.js';

/**
 * Authored rule source: domain name to its ordered rules. A `null` or missing
 * list is rejected; an empty list is accepted.
 */
export type RawMappingRules = Readonly<Record<string, readonly RawRule[] | null | undefined>>;

export interface Translation {
    readonly action: string;
    readonly resource: string;
}

const PLACEHOLDER_PATTERN = /\{[^{}]+\}/g;

interface RequestQuery {
    readonly values: ReadonlyMap<string, string>;
    readonly distinctKeys: number;
}

/**
 * Request queries are URL-decoded (`+` and `%XX`); malformed escapes stay
 * literal. Keys sent more than once stay out of `values` but still count
 * towards `distinctKeys`, so no rule can match them.
 */
function parseRequestQuery(query: string): RequestQuery {
    const counts = new Map<string, number>();
    const firstValues = new Map<string, string>();

    for (const [key, value] of new URLSearchParams(query)) {
        counts.set(key, (counts.get(key) ?? 0) + 1);
        if (!firstValues.has(key)) {
            firstValues.set(key, value);
        }
    }

    const values = new Map<string, string>();
    for (const [key, count] of counts) {
        const value = firstValues.get(key);
        if (count === 1 && value !== undefined) {
            values.set(key, value);
        }
    }

    return { values, distinctKeys: counts.size };
}

/**
 * Returns the placeholder captures for `rule` against the request, or
 * undefined when the rule does not match.
 */
function match(
    rule: Rule,
    method: string,
    segments: readonly string[],
    query: RequestQuery
): Map<string, string> | undefined {
    if (rule.method !== method) return undefined;
    if (rule.splitPaths.length !== segments.length) return undefined;
    if (rule.queryValueMap.size !== query.distinctKeys) return undefined;

    const captures = new Map<string, string>();

    for (let i = 0; i < rule.splitPaths.length; i++) {
        const token = rule.splitPaths[i];
        const segment = segments[i];
        if (token === undefined || segment === undefined) return undefined;

        if (token.kind === 'placeholder') {
            captures.set(token.name, segment);
        } else if (token.value !== segment) {
            return undefined;
        }
    }

    for (const [key, token] of rule.queryValueMap) {
        const value = query.values.get(key);
        if (value === undefined) return undefined;

        if (token.kind === 'placeholder') {
            captures.set(token.name, value);
        } else if (token.value !== value) {
            return undefined;
        }
    }

    return captures;
}

function render(template: string, captures: ReadonlyMap<string, string>): string {
    return template.replace(PLACEHOLDER_PATTERN, token => captures.get(token) ?? token);
}

/**
 * Compiled, immutable per-domain mapping rules.
 *
 * Build with `MappingRules.validate`; a refresh publishes a new instance
 * rather than mutating one in place, so concurrent `translate` callers never
 * observe a partial set.
 */
export class MappingRules {
    private readonly rules: ReadonlyMap<string, readonly Rule[]>;

    private constructor(rules: ReadonlyMap<string, readonly Rule[]>) {
        this.rules = rules;
        Object.freeze(this);
    }

    static empty(): MappingRules {
        return new MappingRules(new Map());
    }

    /**
     * Compiles every domain's rules in authored order. Stops at the first
     * error; nothing partial is returned.
     */
    static validate(raw: RawMappingRules): MappingRules {
        const compiled = new Map<string, readonly Rule[]>();

        for (const [domain, rules] of Object.entries(raw)) {
            if (!domain) {
                throw new MappingRuleError('DOMAIN_EMPTY', 'domain is empty');
            }
            if (rules === null || rules === undefined) {
                throw new MappingRuleError('RULES_NIL', 'rules is nil');
            }

            compiled.set(domain, Object.freeze(rules.map(compileRule)));
        }

        return new MappingRules(compiled);
    }

    domains(): string[] {
        return [...this.rules.keys()];
    }

    rulesFor(domain: string): readonly Rule[] | undefined {
        return this.rules.get(domain);
    }

    /**
     * Maps a request onto (action, resource). The first rule in authored
     * order that matches wins. When nothing matches the request maps to
     * itself: (method, path).
     */
    translate(domain: string, method: string, path: string, query: string): Translation {
        const rules = this.rules.get(domain);
        if (rules && rules.length > 0) {
            const segments = splitPath(path);
            const requestQuery = parseRequestQuery(query);

            for (const rule of rules) {
                const captures = match(rule, method, segments, requestQuery);
                if (captures) {
                    return { action: rule.action, resource: render(rule.resource, captures) };
                }
            }
        }

        logger.debug({ domain, method, path }, 'No mapping rule matched, using request as resource');
        return { action: method, resource: path };
    }
}

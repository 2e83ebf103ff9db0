import { MappingRuleError } from './MappingRuleError.js';
import { classify, Validated } from './validated.js';

export const PATH_DELIMITER = '/';
export const QUERY_DELIMITER = '?';
const PAIR_DELIMITER = '&';
const KEY_VALUE_DELIMITER = '=';

/**
 * Authored mapping entry, as it arrives from the rule source.
 */
export interface RawRule {
    method: string;
    path: string;
    action: string;
    resource: string;
}

/**
 * Compiled mapping entry. `splitPaths` is positional; `queryValueMap` is keyed
 * by query parameter name.
 */
export interface Rule {
    readonly method: string;
    readonly path: string;
    readonly action: string;
    readonly resource: string;
    readonly splitPaths: readonly Validated[];
    readonly queryValueMap: ReadonlyMap<string, Validated>;
}

/**
 * Splits a path on every `/`. A leading slash yields a leading empty segment
 * and `//` yields an empty segment between.
 */
export function splitPath(path: string): string[] {
    return path.split(PATH_DELIMITER);
}

/**
 * Splits `path?query` at the first `?` only; later `?` characters belong to the query.
 */
export function splitPathAndQuery(template: string): { path: string; query: string | undefined } {
    const idx = template.indexOf(QUERY_DELIMITER);
    if (idx === -1) {
        return { path: template, query: undefined };
    }
    return { path: template.slice(0, idx), query: template.slice(idx + 1) };
}

/**
 * Splits a query string into key/value pairs at `&`, then at the first `=`.
 * Empty pairs (`a=1&&b=2`) are skipped. Used for rule templates, whose keys
 * and values are taken as written (already decoded).
 */
export function parseQueryPairs(query: string): Array<[string, string]> {
    const pairs: Array<[string, string]> = [];
    if (query === '') return pairs;

    for (const pair of query.split(PAIR_DELIMITER)) {
        if (pair === '') continue;

        const idx = pair.indexOf(KEY_VALUE_DELIMITER);
        if (idx === -1) {
            pairs.push([pair, '']);
        } else {
            pairs.push([pair.slice(0, idx), pair.slice(idx + 1)]);
        }
    }
    return pairs;
}

function assertRuleShape(raw: RawRule): void {
    if (!raw.method || !raw.path || !raw.action || !raw.resource) {
        throw new MappingRuleError(
            'RULE_EMPTY',
            `rule is empty, method:${raw.method}, path:${raw.path}, action:${raw.action}, resource:${raw.resource}`
        );
    }

    if (!raw.path.startsWith(PATH_DELIMITER)) {
        throw new MappingRuleError('PATH_NO_SLASH', `path(${raw.path}) doesn't start with slash`);
    }

    if (raw.path === PATH_DELIMITER) {
        throw new MappingRuleError('PATH_SLASH_ONLY', 'path is slash only');
    }
}

/**
 * Compiles one authored rule. Throws the first MappingRuleError encountered.
 */
export function compileRule(raw: RawRule): Rule {
    assertRuleShape(raw);

    const seen = new Set<string>();
    const { path, query } = splitPathAndQuery(raw.path);

    const splitPaths = splitPath(path).map(segment => classify(segment, seen));

    const queryValueMap = new Map<string, Validated>();
    if (query !== undefined) {
        for (const [key, value] of parseQueryPairs(query)) {
            if (queryValueMap.has(key)) {
                throw new MappingRuleError('QUERY_MULTIPLE_VALUES', 'query multiple values is not allowed');
            }
            queryValueMap.set(key, classify(value, seen));
        }
    }

    return Object.freeze({
        method: raw.method,
        path: raw.path,
        action: raw.action,
        resource: raw.resource,
        splitPaths: Object.freeze(splitPaths),
        queryValueMap,
    });
}

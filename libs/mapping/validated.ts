import { MappingRuleError } from './MappingRuleError.js';

/**
 * One compiled path segment or query value: either a literal that must match
 * exactly, or a named capture. A placeholder's name keeps its braces (`{id}`)
 * so it can be substituted into resource templates verbatim.
 */
export type Validated =
    | { readonly kind: 'literal'; readonly value: string }
    | { readonly kind: 'placeholder'; readonly name: string };

export const EMPTY_PLACEHOLDER = '{}';

export function literal(value: string): Validated {
    return Object.freeze({ kind: 'literal', value });
}

export function placeholder(name: string): Validated {
    return Object.freeze({ kind: 'placeholder', name });
}

/**
 * Same shape the resource renderer substitutes: `{name}` with no braces
 * inside the name. Anything else compiles as a literal.
 */
export const PLACEHOLDER_TOKEN = /^\{[^{}]+\}$/;

export function isPlaceholderToken(token: string): boolean {
    return PLACEHOLDER_TOKEN.test(token);
}

/**
 * Classifies a raw template token. `seen` is the rule-wide placeholder
 * namespace shared by path segments and query values.
 */
export function classify(token: string, seen: Set<string>): Validated {
    if (token === EMPTY_PLACEHOLDER) {
        throw new MappingRuleError('PLACEHOLDER_EMPTY', 'placeholder is empty');
    }

    if (!isPlaceholderToken(token)) {
        return literal(token);
    }

    if (seen.has(token)) {
        throw new MappingRuleError('PLACEHOLDER_DUPLICATED', `placeholder(${token}) is duplicated`);
    }
    seen.add(token);

    return placeholder(token);
}

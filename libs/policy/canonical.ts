/**
 * Canonical "data to be signed" form of a JSON value.
 *
 * Object keys are sorted recursively, undefined members are dropped, and
 * `<`, `>`, `&`, U+2028 and U+2029 are written as \u escapes. The output is
 * byte-identical to a Go `encoding/json` round trip of the same document,
 * which is how the signing authorities produce the signed string.
 */

const ESCAPES: Record<string, string> = {
    '<': '\\u003c',
    '>': '\\u003e',
    '&': '\\u0026',
    '\u2028': '\\u2028',
    '\u2029': '\\u2029',
};

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (typeof value === 'object' && value !== null) {
        const sorted: Record<string, unknown> = {};
        for (const key of Object.keys(value).sort()) {
            const member: unknown = Reflect.get(value, key);
            if (member !== undefined) {
                sorted[key] = sortKeys(member);
            }
        }
        return sorted;
    }
    return value;
}

export function canonicalize(value: unknown): string {
    const json = JSON.stringify(sortKeys(value));
    if (json === undefined) {
        return 'null';
    }
    // These characters can only occur inside string literals of the output.
    return json.replace(/[<>&\u2028\u2029]/g, ch => ESCAPES[ch] ?? ch);
}

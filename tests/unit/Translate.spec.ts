/**
 * Unit Tests: request translation
 *
 * @see libs/mapping/mappingRules.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { MappingRules } from '../../libs/mapping/mappingRules.js';

function rulesFor(path: string, resource = 'resource', method = 'get'): MappingRules {
    return MappingRules.validate({ domain: [{ method, path, action: 'read', resource }] });
}

describe('MappingRules.translate', () => {
    describe('matches', () => {
        it('should map a literal path', () => {
            const result = rulesFor('/path1/path2').translate('domain', 'get', '/path1/path2', '');
            assert.deepStrictEqual(result, { action: 'read', resource: 'resource' });
        });

        it('should substitute a captured path segment', () => {
            const result = rulesFor('/path1/{placeholder1}/path3', 'resource.{placeholder1}')
                .translate('domain', 'get', '/path1/path2/path3', '');
            assert.deepStrictEqual(result, { action: 'read', resource: 'resource.path2' });
        });

        it('should substitute several captured path segments', () => {
            const result = rulesFor('/{placeholder1}/{placeholder2}', 'resource.{placeholder1}.{placeholder2}')
                .translate('domain', 'get', '/path1/path2', '');
            assert.deepStrictEqual(result, { action: 'read', resource: 'resource.path1.path2' });
        });

        it('should substitute every occurrence of a placeholder', () => {
            const result = rulesFor('/path1/{placeholder1}/path3', 'resource.{placeholder1}.{placeholder1}.{placeholder1}')
                .translate('domain', 'get', '/path1/path2/path3', '');
            assert.deepStrictEqual(result, { action: 'read', resource: 'resource.path2.path2.path2' });
        });

        it('should match query keys in any order and capture query placeholders', () => {
            const result = rulesFor('/path1/{placeholder1}?param1=value1&param2={placeholder2}', 'resource.{placeholder1}.{placeholder2}')
                .translate('domain', 'get', '/path1/path2', 'param2=value2&param1=value1');
            assert.deepStrictEqual(result, { action: 'read', resource: 'resource.path2.value2' });
        });

        it('should capture every query placeholder', () => {
            const result = rulesFor(
                '/path1/{placeholder1}?param1={placeholder2}&param2={placeholder3}',
                'resource.{placeholder1}.{placeholder2}.{placeholder3}'
            ).translate('domain', 'get', '/path1/path2', 'param2=value2&param1=value1');
            assert.deepStrictEqual(result, { action: 'read', resource: 'resource.path2.value1.value2' });
        });

        it('should render a path and query round trip', () => {
            const result = rulesFor('/a/{x}/b?q={y}', 'svc:{x}.{y}.{x}', 'M')
                .translate('domain', 'M', '/a/VAL/b', 'q=QV');
            assert.deepStrictEqual(result, { action: 'read', resource: 'svc:VAL.QV.VAL' });
        });

        it('should match a literal question mark inside a query value', () => {
            const result = rulesFor('/path1?param1=value1?&param2=value2')
                .translate('domain', 'get', '/path1', 'param1=value1?&param2=value2');
            assert.deepStrictEqual(result, { action: 'read', resource: 'resource' });
        });

        it('should let the first matching rule win', () => {
            const rules = MappingRules.validate({
                domain: [
                    { method: 'get', path: '/items/{id}', action: 'read-any', resource: 'items.{id}' },
                    { method: 'get', path: '/items/special', action: 'read-special', resource: 'items.special' },
                ],
            });
            assert.deepStrictEqual(
                rules.translate('domain', 'get', '/items/special', ''),
                { action: 'read-any', resource: 'items.special' }
            );
        });

        it('should skip earlier rules that do not match', () => {
            const rules = MappingRules.validate({
                domain: [
                    { method: 'post', path: '/items', action: 'create', resource: 'items' },
                    { method: 'get', path: '/items', action: 'list', resource: 'items' },
                ],
            });
            assert.deepStrictEqual(rules.translate('domain', 'get', '/items', ''), { action: 'list', resource: 'items' });
        });

        it('should leave unknown placeholders in the resource untouched', () => {
            const result = rulesFor('/a/{x}', 'res.{x}.{unknown}').translate('domain', 'get', '/a/1', '');
            assert.deepStrictEqual(result, { action: 'read', resource: 'res.1.{unknown}' });
        });

        it('should not substitute into captured values', () => {
            const result = rulesFor('/a/{x}/{y}', '{x}-{y}').translate('domain', 'get', '/a/{y}/v', '');
            assert.deepStrictEqual(result, { action: 'read', resource: '{y}-v' });
        });

        it('should decode request query values before matching and capturing', () => {
            const result = rulesFor('/search?q={q}&lang=en us', 'search.{q}')
                .translate('domain', 'get', '/search', 'q=a%20b&lang=en+us');
            assert.deepStrictEqual(result, { action: 'read', resource: 'search.a b' });
        });

        it('should keep a malformed escape in a request query literal', () => {
            const result = rulesFor('/search?q={q}', 'search.{q}').translate('domain', 'get', '/search', 'q=100%');
            assert.deepStrictEqual(result, { action: 'read', resource: 'search.100%' });
        });

        it('should match a rule whose path segment has inner braces only literally', () => {
            const rules = rulesFor('/a/{x}}', 'r.{x}}');
            assert.deepStrictEqual(rules.translate('domain', 'get', '/a/{x}}', ''), { action: 'read', resource: 'r.{x}}' });
            assert.deepStrictEqual(rules.translate('domain', 'get', '/a/VAL', ''), { action: 'get', resource: '/a/VAL' });
        });

        it('should return the action verbatim', () => {
            const rules = MappingRules.validate({
                domain: [{ method: 'get', path: '/a/{x}', action: 'read.{x}', resource: 'r' }],
            });
            assert.deepStrictEqual(rules.translate('domain', 'get', '/a/1', ''), { action: 'read.{x}', resource: 'r' });
        });
    });

    describe('fallback', () => {
        const rules = rulesFor('/path1/path2');

        it('should return the request for an unknown domain', () => {
            assert.deepStrictEqual(
                rules.translate('domain1', 'get', '/path1/path2', ''),
                { action: 'get', resource: '/path1/path2' }
            );
        });

        it('should return the request when the method differs', () => {
            assert.deepStrictEqual(
                rules.translate('domain', 'post', '/path1/path2', ''),
                { action: 'post', resource: '/path1/path2' }
            );
        });

        it('should compare methods case-sensitively', () => {
            assert.deepStrictEqual(
                rules.translate('domain', 'GET', '/path1/path2', ''),
                { action: 'GET', resource: '/path1/path2' }
            );
        });

        it('should return the request when there are no rules at all', () => {
            assert.deepStrictEqual(
                MappingRules.empty().translate('domain', 'get', '/path1/path2', ''),
                { action: 'get', resource: '/path1/path2' }
            );
        });

        it('should return the request for a domain with an empty rule list', () => {
            assert.deepStrictEqual(
                MappingRules.validate({ domain: [] }).translate('domain', 'get', '/path1/path2', ''),
                { action: 'get', resource: '/path1/path2' }
            );
        });

        it('should return the request when the segment counts differ', () => {
            assert.deepStrictEqual(
                rulesFor('/path1/{placeholder1}').translate('domain', 'get', '/path1', ''),
                { action: 'get', resource: '/path1' }
            );
        });

        it('should return the request when a literal segment differs', () => {
            assert.deepStrictEqual(
                rulesFor('/{placeholder1}/path3').translate('domain', 'get', '/path1/path2', ''),
                { action: 'get', resource: '/path1/path2' }
            );
        });

        it('should return the request when the query key counts differ', () => {
            assert.deepStrictEqual(
                rulesFor('/path1?param1=value1&param2={placeholder2}').translate('domain', 'get', '/path1', 'param1=value1'),
                { action: 'get', resource: '/path1' }
            );
        });

        it('should return the request when the request repeats a query key', () => {
            assert.deepStrictEqual(
                rulesFor('/path1?param1=value1').translate('domain', 'get', '/path1', 'param1=value1&param1=value2'),
                { action: 'get', resource: '/path1' }
            );
        });

        it('should return the request when a repeated key would also be a placeholder', () => {
            assert.deepStrictEqual(
                rulesFor('/path1?param1={p}').translate('domain', 'get', '/path1', 'param1=a&param1=a'),
                { action: 'get', resource: '/path1' }
            );
        });

        it('should return the request when an extra query key is sent once', () => {
            assert.deepStrictEqual(
                rulesFor('/p', 'res').translate('domain', 'get', '/p', 'a=1&b=x'),
                { action: 'get', resource: '/p' }
            );
            assert.deepStrictEqual(
                rulesFor('/p?a=1', 'res').translate('domain', 'get', '/p', 'a=1&b=x'),
                { action: 'get', resource: '/p' }
            );
        });

        it('should return the request when an extra query key is repeated', () => {
            assert.deepStrictEqual(
                rulesFor('/p?a=1', 'res').translate('domain', 'get', '/p', 'a=1&b=x&b=y'),
                { action: 'get', resource: '/p' }
            );
        });

        it('should return the request when the query key differs', () => {
            assert.deepStrictEqual(
                rulesFor('/path1?param2=value2').translate('domain', 'get', '/path1', 'param1=value1'),
                { action: 'get', resource: '/path1' }
            );
        });

        it('should return the request when a literal query value differs', () => {
            assert.deepStrictEqual(
                rulesFor('/path1?param1=value2').translate('domain', 'get', '/path1', 'param1=value1'),
                { action: 'get', resource: '/path1' }
            );
        });

        it('should return the request when the request has extra query keys', () => {
            assert.deepStrictEqual(
                rulesFor('/path1').translate('domain', 'get', '/path1', 'extra=1'),
                { action: 'get', resource: '/path1' }
            );
        });

        it('should return an empty request path unchanged', () => {
            assert.deepStrictEqual(
                rulesFor('/path1?param1=value1').translate('domain', 'get', '', 'param1=value1'),
                { action: 'get', resource: '' }
            );
        });

        it('should return a slash request path unchanged', () => {
            assert.deepStrictEqual(
                rulesFor('/path1?param1=value1').translate('domain', 'get', '/', 'param1=value1'),
                { action: 'get', resource: '/' }
            );
        });
    });

    it('should give identical results for repeated calls', () => {
        const rules = rulesFor('/a/{x}?q={y}', 'r.{x}.{y}');
        const first = rules.translate('domain', 'get', '/a/1', 'q=2');
        const second = rules.translate('domain', 'get', '/a/1', 'q=2');

        assert.deepStrictEqual(first, { action: 'read', resource: 'r.1.2' });
        assert.deepStrictEqual(second, first);
    });

    it('should be frozen after construction', () => {
        assert.ok(Object.isFrozen(rulesFor('/a')));
    });
});

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { MappingRulesStore } from '../../libs/mapping/rulesStore.js';
import { MappingRuleError } from '../../libs/mapping/MappingRuleError.js';

const goodRules = {
    domain: [{ method: 'get', path: '/items/{id}', action: 'read', resource: 'items.{id}' }],
};

describe('MappingRulesStore', () => {
    it('should fall back before anything is published', () => {
        const store = new MappingRulesStore();
        assert.strictEqual(store.generation, 0);
        assert.deepStrictEqual(store.translate('domain', 'get', '/items/1', ''), { action: 'get', resource: '/items/1' });
    });

    it('should translate with the published rules', () => {
        const store = new MappingRulesStore();
        store.publish(goodRules);

        assert.strictEqual(store.generation, 1);
        assert.deepStrictEqual(store.translate('domain', 'get', '/items/1', ''), { action: 'read', resource: 'items.1' });
    });

    it('should keep the previous rules when a new set is rejected', () => {
        const store = new MappingRulesStore();
        const published = store.publish(goodRules);

        assert.throws(
            () => store.publish({ domain: [{ method: 'get', path: 'items', action: 'read', resource: 'items' }] }),
            (err: unknown) => err instanceof MappingRuleError && err.code === 'PATH_NO_SLASH'
        );

        assert.strictEqual(store.rules, published);
        assert.strictEqual(store.generation, 1);
        assert.deepStrictEqual(store.translate('domain', 'get', '/items/1', ''), { action: 'read', resource: 'items.1' });
    });

    it('should swap in a whole new set on republish', () => {
        const store = new MappingRulesStore();
        const first = store.publish(goodRules);
        const second = store.publish({
            other: [{ method: 'post', path: '/orders', action: 'create', resource: 'orders' }],
        });

        assert.notStrictEqual(first, second);
        assert.strictEqual(store.generation, 2);
        assert.deepStrictEqual(store.translate('domain', 'get', '/items/1', ''), { action: 'get', resource: '/items/1' });
        assert.deepStrictEqual(first.translate('domain', 'get', '/items/1', ''), { action: 'read', resource: 'items.1' });
    });
});

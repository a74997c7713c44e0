import { describe, expect, it } from 'vitest';
import {
    interpolate,
    interpolateDeclaration,
    interpolateFields,
    stringifyScopeValue,
} from '@/lib/cms/interpolation';
import type { ScopeStore } from '@/lib/cms/types';

const scope: ScopeStore = {
    system: { user_name: 'Ada', user_id: 7, active: true, missing_login: null, groups: ['a', 'b'] },
    orders: { count: 3 },
};

describe('interpolate', () => {
    it('substitutes resolvable placeholders and tolerates inner whitespace', () => {
        expect(interpolate('Hi {{system.user_name}}, you have {{ orders.count }} orders', scope))
            .toBe('Hi Ada, you have 3 orders');
    });

    it('leaves unresolved placeholders exactly as written', () => {
        expect(interpolate('Total: {{orders.total}} / {{ghost}}', scope)).toBe('Total: {{orders.total}} / {{ghost}}');
    });

    it('returns text without placeholders unchanged', () => {
        const text = 'plain {text}';
        expect(interpolate(text, scope)).toBe(text);
    });

    it('stringifies booleans, nulls and arrays', () => {
        expect(interpolate('{{system.active}}|{{system.missing_login}}|{{system.groups}}', scope))
            .toBe('true||["a","b"]');
    });
});

describe('stringifyScopeValue', () => {
    it('renders false and numbers as text', () => {
        expect(stringifyScopeValue(false)).toBe('false');
        expect(stringifyScopeValue(1.5)).toBe('1.5');
        expect(stringifyScopeValue({ a: 1 })).toBe('{"a":1}');
    });
});

describe('interpolateFields', () => {
    it('touches only content fields, meta included', () => {
        const fields = interpolateFields({
            text: { content: 'Hello {{system.user_name}}', meta: '{"count":"{{orders.count}}"}' },
            css_class: { content: '{{system.user_name}}', meta: '{{orders.count}}' },
            title: { content: null, meta: 'm' },
        }, scope);

        expect(fields).toEqual({
            text: { content: 'Hello Ada', meta: '{"count":"3"}' },
            css_class: { content: '{{system.user_name}}', meta: '{{orders.count}}' },
            title: { content: null, meta: 'm' },
        });
    });
});

describe('interpolateDeclaration', () => {
    it('interpolates filter, scope and field lists', () => {
        const declaration = interpolateDeclaration({
            table: 'orders',
            filter: "AND user_id = {{system.user_id}}",
            scope: 'orders_{{system.user_id}}',
            fields: [{ field_name: 'total', not_found_text: 'none for {{system.user_name}}' }],
        }, scope);

        expect(declaration).toEqual({
            table: 'orders',
            filter: 'AND user_id = 7',
            scope: 'orders_7',
            fields: [{ field_name: 'total', not_found_text: 'none for Ada' }],
        });
    });

    it('keeps the original when the interpolated result no longer validates', () => {
        const original = { table: '{{system.missing_login}}' };
        expect(interpolateDeclaration(original, scope)).toBe(original);
    });
});

import { describe, expect, it } from 'vitest';
import {
    buildRetrieveRequest,
    namespaceFor,
    retrieveSectionData,
    shapeRows,
    type RetrievalContext,
} from '@/lib/cms/data-retrieval';
import type { DataRow } from '@/lib/cms/ports';
import { FakeDataRetriever } from '../helpers/in-memory-cms';

const rows: DataRow[] = [
    { record_id: 1, item: 'apple', qty: 2, note: '' },
    { record_id: 2, item: 'pear', qty: 5, note: 'ripe' },
];

function context(retriever: FakeDataRetriever, userId: number | null = 7): RetrievalContext {
    return { retriever, languageId: 3, timezone: 'UTC', userId };
}

describe('shapeRows', () => {
    it('joins values per field with commas in all mode', () => {
        expect(shapeRows(rows, { table: 't' })).toEqual({ record_id: '1,2', item: 'apple,pear', qty: '2,5', note: ',ripe' });
    });

    it('returns the single row itself in all mode', () => {
        expect(shapeRows(rows.slice(0, 1), { table: 't', retrieve: 'all' })).toEqual(rows[0]);
    });

    it('returns an empty object when nothing matched', () => {
        expect(shapeRows([], { table: 't', retrieve: 'all' })).toEqual({});
        expect(shapeRows([], { table: 't', retrieve: 'first' })).toEqual({});
        expect(shapeRows([], { table: 't', retrieve: 'all_as_array' })).toEqual({});
        expect(shapeRows([], { table: 't', retrieve: 'JSON' })).toEqual([]);
    });

    it('projects fields with holders and not-found text', () => {
        const shaped = shapeRows(rows.slice(0, 1), {
            table: 't',
            retrieve: 'first',
            all_fields: false,
            fields: [
                { field_name: 'item', field_holder: 'fruit' },
                { field_name: 'note', not_found_text: 'n/a' },
                { field_name: 'missing' },
            ],
        });

        expect(shaped).toEqual({ fruit: 'apple', note: 'n/a', missing: '' });
    });

    it('collects arrays per field in all_as_array mode', () => {
        expect(shapeRows(rows, { table: 't', retrieve: 'all_as_array', all_fields: false, fields: [{ field_name: 'qty' }] }))
            .toEqual({ qty: [2, 5] });
    });

    it('renames mapped fields in JSON mode and keeps the row when no fields are listed', () => {
        const shaped = shapeRows(rows, {
            table: 't',
            retrieve: 'JSON',
            map_fields: [{ field_name: 'item', field_new_name: 'label' }],
        });

        expect(shaped).toEqual([
            { record_id: 1, item: 'apple', qty: 2, note: '', label: 'apple' },
            { record_id: 2, item: 'pear', qty: 5, note: 'ripe', label: 'pear' },
        ]);
    });

    it('projects listed fields in JSON mode', () => {
        expect(shapeRows(rows, { table: 't', retrieve: 'JSON', fields: [{ field_name: 'qty', field_holder: 'n' }] }))
            .toEqual([{ n: 2 }, { n: 5 }]);
    });
});

describe('buildRetrieveRequest', () => {
    it('defaults to every field, own entries and ascending order', () => {
        expect(buildRetrieveRequest({ table: 'orders' }, context(new FakeDataRetriever()))).toEqual({
            table: 'orders',
            filter: '',
            fields: null,
            excludeDeleted: true,
            languageId: 3,
            timezone: 'UTC',
            ownEntriesOnly: true,
            userId: 7,
            order: 'asc',
            limit: null,
        });
    });

    it('asks for the newest single row in last mode', () => {
        const request = buildRetrieveRequest(
            { table: 'orders', retrieve: 'last', current_user: false, all_fields: false, fields: [{ field_name: 'total' }] },
            context(new FakeDataRetriever()),
        );

        expect(request.order).toBe('desc');
        expect(request.limit).toBe(1);
        expect(request.ownEntriesOnly).toBe(false);
        expect(request.fields).toEqual(['total']);
    });
});

describe('namespaceFor', () => {
    it('falls back to the declaration index when no scope is given', () => {
        expect(namespaceFor({ table: 't', scope: 'orders' }, 0)).toBe('orders');
        expect(namespaceFor({ table: 't', scope: '  ' }, 2)).toBe('2');
        expect(namespaceFor({ table: 't' }, 1)).toBe('1');
    });
});

describe('retrieveSectionData', () => {
    it('returns a failed result for one declaration without affecting the others', async () => {
        const retriever = new FakeDataRetriever()
            .setTable('orders', [{ row: { total: 10 }, userId: 7 }, { row: { total: 99 }, userId: 8 }])
            .failTable('broken', new Error('connection reset'));

        const outcomes = await retrieveSectionData(
            [{ table: 'broken', scope: 'b' }, { table: 'orders', scope: 'orders' }, { table: 'ghost' }],
            {},
            context(retriever),
        );

        expect(outcomes.map((o) => [o.namespace, o.result])).toEqual([
            ['b', { ok: false, error: 'connection reset' }],
            ['orders', { ok: true, value: { total: 10 } }],
            ['2', { ok: false, error: "Data table 'ghost' not found" }],
        ]);
    });

    it('interpolates declarations against the inherited scope', async () => {
        const retriever = new FakeDataRetriever().setTable('orders', []);

        await retrieveSectionData(
            [{ table: 'orders', filter: 'AND status = {{params.status}}', scope: 'orders_{{params.status}}' }],
            { params: { status: 'open' } },
            context(retriever),
        );

        expect(retriever.requests[0].filter).toBe('AND status = open');
    });

    it('gets nothing for own entries without a user', async () => {
        const retriever = new FakeDataRetriever().setTable('orders', [{ row: { total: 10 }, userId: 7 }]);

        const [outcome] = await retrieveSectionData([{ table: 'orders', scope: 'orders' }], {}, context(retriever, null));

        expect(outcome.result).toEqual({ ok: true, value: {} });
    });

    it('does not let a declaration see one declared earlier in the same section', async () => {
        const retriever = new FakeDataRetriever()
            .setTable('profile', [{ row: { name: 'Ada' }, userId: 7 }])
            .setTable('orders', []);

        await retrieveSectionData(
            [
                { table: 'profile', scope: 'profile', retrieve: 'first' },
                { table: 'orders', filter: "AND owner = '{{profile.name}}'", scope: 'orders' },
            ],
            {},
            context(retriever),
        );

        expect(retriever.requests[1].filter).toBe("AND owner = '{{profile.name}}'");
    });
});

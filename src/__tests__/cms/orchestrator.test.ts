import { afterEach, describe, expect, it, vi } from 'vitest';
import { JsonLogicConditionEvaluator } from '@/lib/cms/conditions';
import { processSections, type OrchestratorContext } from '@/lib/cms/orchestrator';
import { createRootScope } from '@/lib/cms/scope';
import { logger } from '@/lib/logger';
import { decodeDataConfig } from '@/lib/cms/section-tree';
import type { DataSourceDeclaration, TranslatedSection } from '@/lib/cms/types';
import { FakeDataRetriever } from '../helpers/in-memory-cms';

interface SectionOptions {
    text?: string;
    condition?: string;
    dataConfig?: DataSourceDeclaration[] | string;
    css?: string;
    children?: TranslatedSection[];
}

function section(id: number, options: SectionOptions = {}): TranslatedSection {
    const rawConfig = options.dataConfig === undefined
        ? null
        : typeof options.dataConfig === 'string' ? options.dataConfig : JSON.stringify(options.dataConfig);
    return {
        id,
        name: `section-${id}`,
        styleName: 'container',
        position: id,
        condition: options.condition ?? null,
        dataConfig: decodeDataConfig(rawConfig),
        css: options.css ?? null,
        cssMobile: null,
        debug: false,
        fields: options.text === undefined ? {} : { text: { content: options.text, meta: null } },
        properties: {},
        children: options.children ?? [],
    };
}

function setup() {
    const retriever = new FakeDataRetriever()
        .setTable('profile', [{ row: { name: 'Ada', role: 'member' }, userId: 7 }])
        .setTable('orders', [{ row: { total: 42 }, userId: 7 }])
        .setTable('other_profile', [{ row: { name: 'Bob' }, userId: 7 }])
        .setTable('secret', [{ row: { code: 'x' }, userId: 7 }])
        .failTable('broken', new Error('connection reset'));
    const ctx: OrchestratorContext = {
        retriever,
        conditions: new JsonLogicConditionEvaluator(),
        languageId: 3,
        timezone: 'UTC',
        userId: 7,
    };
    const root = createRootScope({ user_name: 'Test User' }, { site: 'Test Site' });
    return { retriever, ctx, root };
}

describe('processSections', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('passes a parent namespace down to children but not across siblings', async () => {
        const { ctx, root } = setup();
        const tree = [
            section(10, {
                text: 'Welcome {{system.user_name}} to {{globals.site}}',
                dataConfig: [{ table: 'profile', scope: 'profile', retrieve: 'first' }],
                children: [
                    section(11, {
                        text: 'Hi {{profile.name}}, {{orders.total}} orders',
                        dataConfig: [{ table: 'orders', scope: 'orders' }],
                    }),
                    section(12, { text: 'Orders: {{orders.total}}' }),
                ],
            }),
        ];

        const [parent] = await processSections(tree, root, ctx);

        expect(parent.fields.text.content).toBe('Welcome Test User to Test Site');
        expect(parent.retrievedData).toEqual({ profile: { name: 'Ada', role: 'member' } });
        expect(parent.children.map((child) => child.fields.text.content)).toEqual([
            'Hi Ada, 42 orders',
            'Orders: {{orders.total}}',
        ]);
        expect(parent.children[0].retrievedData).toEqual({ orders: { total: 42 } });
    });

    it('drops a section whose condition fails without visiting its subtree', async () => {
        const { ctx, root, retriever } = setup();
        const tree = [
            section(10, {
                dataConfig: [{ table: 'profile', scope: 'profile', retrieve: 'first' }],
                children: [
                    section(13, {
                        condition: '{"==":[{"var":"profile.role"},"admin"]}',
                        children: [section(14, { dataConfig: [{ table: 'secret', scope: 'secret' }] })],
                    }),
                    section(15, { condition: '{"==":[{"var":"profile.role"},"member"]}' }),
                ],
            }),
        ];

        const [parent] = await processSections(tree, root, ctx);

        expect(parent.children.map((child) => child.id)).toEqual([15]);
        expect(parent.children[0].conditionTrace).toEqual({
            result: true,
            error: null,
            variables: { 'profile.role': 'member' },
            conditionObject: { '==': [{ var: 'profile.role' }, 'member'] },
        });
        expect(retriever.requests.map((request) => request.table)).toEqual(['profile']);
    });

    it('keeps an ancestor value resolved before the section shadows the namespace', async () => {
        const { ctx, root } = setup();
        const tree = [
            section(10, {
                dataConfig: [{ table: 'profile', scope: 'profile', retrieve: 'first' }],
                children: [
                    section(11, {
                        text: '{{profile.name}}',
                        dataConfig: [{ table: 'other_profile', scope: 'profile', retrieve: 'first' }],
                        children: [section(12, { text: '{{profile.name}}' })],
                    }),
                ],
            }),
        ];

        const [parent] = await processSections(tree, root, ctx);
        const child = parent.children[0];

        expect(child.fields.text.content).toBe('Ada');
        expect(child.children[0].fields.text.content).toBe('Bob');
    });

    it('renders the section when a declaration fails or the data_config is malformed', async () => {
        const { ctx, root } = setup();
        const tree = [
            section(20, {
                text: 'Data: {{b.value}}',
                dataConfig: [{ table: 'broken', scope: 'b' }, { table: 'orders', scope: 'orders' }],
            }),
            section(21, { text: 'still here', dataConfig: '{not json' }),
        ];

        const rendered = await processSections(tree, root, ctx);

        expect(rendered.map((s) => s.id)).toEqual([20, 21]);
        expect(rendered[0].fields.text.content).toBe('Data: {{b.value}}');
        expect(rendered[0].retrievedData).toEqual({ orders: { total: 42 } });
        expect(rendered[1].dataConfig).toEqual([]);
        expect(rendered[1].retrievedData).toEqual({});
    });

    it('interpolates conditions and css before evaluating them', async () => {
        const { ctx, root } = setup();
        const tree = [
            section(30, {
                css: 'card card-{{profile.role}}',
                condition: '{"==":["{{profile.name}}","Ada"]}',
                dataConfig: [{ table: 'profile', scope: 'profile', retrieve: 'first' }],
            }),
        ];

        const [rendered] = await processSections(tree, root, ctx);

        expect(rendered.css).toBe('card card-member');
        expect(rendered.condition).toBe('{"==":["{{profile.name}}","Ada"]}');
        expect(rendered.conditionTrace?.result).toBe(true);
    });

    it('hides a sibling namespace from a later sibling condition', async () => {
        const { ctx, root } = setup();
        const tree = [
            section(40, { dataConfig: [{ table: 'orders', scope: 'orders' }] }),
            section(41, { condition: '{"!=":[{"var":"orders.total"},null]}' }),
            section(42, { condition: '{"==":[{"var":"orders.total"},null]}' }),
        ];

        const rendered = await processSections(tree, root, ctx);

        expect(rendered.map((s) => s.id)).toEqual([40, 42]);
        expect(rendered[1].conditionTrace?.variables).toEqual({ 'orders.total': null });
    });

    it('discards a failed retrieval on purpose and only logs it', async () => {
        const { ctx, root } = setup();
        const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);

        const [rendered] = await processSections([section(50, { dataConfig: [{ table: 'broken', scope: 'b' }] })], root, ctx);

        expect(rendered.retrievedData).toEqual({});
        expect(warn).toHaveBeenCalledWith('Data retrieval failed', {
            sectionId: 50,
            table: 'broken',
            scope: 'b',
            error: 'connection reset',
        });
    });
});

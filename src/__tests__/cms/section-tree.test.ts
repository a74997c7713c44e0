import { describe, expect, it } from 'vitest';
import { buildSectionTree, collectSectionIds, decodeDataConfig } from '@/lib/cms/section-tree';
import type { SectionNode, SectionRow } from '@/lib/cms/types';

function row(id: number, parentId: number | null, position: number | null, extra: Partial<SectionRow> = {}): SectionRow {
    return {
        id,
        parentId,
        position,
        name: `s${id}`,
        styleName: 'container',
        condition: null,
        dataConfig: null,
        css: null,
        cssMobile: null,
        debug: false,
        ...extra,
    };
}

function shape(nodes: SectionNode[]): unknown[] {
    return nodes.map((node) => (node.children.length > 0 ? { [node.id]: shape(node.children) } : node.id));
}

describe('buildSectionTree', () => {
    it('nests children under their parents ordered by position', () => {
        const tree = buildSectionTree([
            row(1, null, 2),
            row(2, null, 1),
            row(3, 1, 20),
            row(4, 1, 10),
            row(5, 4, 0),
        ]);

        expect(shape(tree)).toEqual([2, { 1: [{ 4: [5] }, 3] }]);
    });

    it('promotes rows with a missing parent to the root instead of dropping them', () => {
        const tree = buildSectionTree([row(1, null, 1), row(2, 99, 0)]);

        expect(shape(tree)).toEqual([2, 1]);
        expect(collectSectionIds(tree)).toEqual([2, 1]);
    });

    it('keeps row order for equal and null positions', () => {
        const tree = buildSectionTree([row(1, null, null), row(2, null, 0), row(3, null, null)]);
        expect(shape(tree)).toEqual([1, 2, 3]);
    });

    it('breaks parent cycles by promoting their members to the root', () => {
        const tree = buildSectionTree([row(1, 2, 0), row(2, 1, 1), row(3, 1, 0)]);

        expect(collectSectionIds(tree).sort()).toEqual([1, 2, 3]);
        expect(shape(tree)).toEqual([{ 1: [3] }, 2]);
    });

    it('decodes data_config once and normalizes empty conditions', () => {
        const [node] = buildSectionTree([
            row(1, null, 0, { condition: '   ', dataConfig: '[{"table":"orders","scope":"orders"}]' }),
        ]);

        expect(node.condition).toBeNull();
        expect(node.dataConfig).toEqual({
            status: 'valid',
            declarations: [{ table: 'orders', scope: 'orders' }],
            source: [{ table: 'orders', scope: 'orders' }],
        });
    });
});

describe('decodeDataConfig', () => {
    it('treats null, blank and JSON null as no configuration', () => {
        expect(decodeDataConfig(null)).toEqual({ status: 'none' });
        expect(decodeDataConfig('  ')).toEqual({ status: 'none' });
        expect(decodeDataConfig('null')).toEqual({ status: 'none' });
    });

    it('keeps the raw text of unparsable JSON as the source', () => {
        const state = decodeDataConfig('[{"table":');
        expect(state.status).toBe('invalid');
        if (state.status === 'invalid') {
            expect(state.source).toBe('[{"table":');
            expect(state.error).toMatch(/^data_config is not valid JSON/);
        }
    });

    it('reports where a declaration is malformed', () => {
        const state = decodeDataConfig('[{"table":"orders"},{"scope":"x"}]');
        expect(state.status).toBe('invalid');
        if (state.status === 'invalid') {
            expect(state.error).toMatch(/^data_config is malformed at 1\.table/);
            expect(state.source).toEqual([{ table: 'orders' }, { scope: 'x' }]);
        }
    });
});

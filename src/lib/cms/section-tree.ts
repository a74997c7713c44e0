/**
 * Section Tree Builder: flat (section, parent, position) rows → nested tree.
 *
 * JSON-encoded columns (data_config) are decoded here, once, so later passes
 * work on typed values.
 */

import {
    DataConfigSchema,
    JsonValueSchema,
    type DataConfigState,
    type SectionNode,
    type SectionRow,
} from './types';

type MutableNode = Omit<SectionNode, 'children'> & { children: MutableNode[] };

export function decodeDataConfig(raw: string | null): DataConfigState {
    if (raw === null || raw.trim() === '') {
        return { status: 'none' };
    }

    let decoded: unknown;
    try {
        decoded = JSON.parse(raw);
    } catch (error) {
        return {
            status: 'invalid',
            error: `data_config is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
            source: raw,
        };
    }

    const source = JsonValueSchema.safeParse(decoded);
    if (!source.success) {
        return { status: 'invalid', error: 'data_config is not a JSON value', source: raw };
    }
    if (source.data === null) {
        return { status: 'none' };
    }

    const declarations = DataConfigSchema.safeParse(source.data);
    if (!declarations.success) {
        const issue = declarations.error.issues[0];
        return {
            status: 'invalid',
            error: `data_config is malformed at ${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'invalid'}`,
            source: source.data,
        };
    }

    return { status: 'valid', declarations: declarations.data, source: source.data };
}

function normalizeCondition(raw: string | null): string | null {
    if (raw === null) return null;
    return raw.trim() === '' ? null : raw;
}

function comparePosition(a: MutableNode, b: MutableNode): number {
    return (a.position ?? 0) - (b.position ?? 0);
}

function sortRecursive(nodes: MutableNode[]): void {
    nodes.sort(comparePosition);
    for (const node of nodes) {
        if (node.children.length > 0) sortRecursive(node.children);
    }
}

/**
 * Build the section tree for one page.
 *
 * A row whose parent id is not among the rows is promoted to the root list
 * instead of being dropped. Siblings are ordered by position; the sort is
 * stable, so equal positions keep row order.
 */
export function buildSectionTree(rows: SectionRow[]): SectionNode[] {
    const index = new Map<number, MutableNode>();
    const roots: MutableNode[] = [];

    for (const row of rows) {
        index.set(row.id, {
            id: row.id,
            name: row.name,
            styleName: row.styleName,
            position: row.position,
            condition: normalizeCondition(row.condition),
            dataConfig: decodeDataConfig(row.dataConfig),
            css: row.css,
            cssMobile: row.cssMobile,
            debug: row.debug,
            children: [],
        });
    }

    const parentOf = new Map<number, number | null>();
    for (const row of rows) {
        parentOf.set(row.id, row.parentId);
    }

    // A parent chain that loops back to the node would detach it from every root.
    const inCycle = (id: number): boolean => {
        const seen = new Set<number>([id]);
        let current = parentOf.get(id) ?? null;
        while (current !== null && index.has(current)) {
            if (seen.has(current)) return current === id;
            seen.add(current);
            current = parentOf.get(current) ?? null;
        }
        return false;
    };

    const attached = new Set<number>();
    for (const row of rows) {
        const node = index.get(row.id);
        if (!node || attached.has(row.id)) continue;
        attached.add(row.id);

        const parentId = parentOf.get(row.id) ?? null;
        const parent = parentId !== null ? index.get(parentId) : undefined;
        if (parent && !inCycle(row.id)) {
            parent.children.push(node);
        } else {
            roots.push(node);
        }
    }

    sortRecursive(roots);
    return roots;
}

export function collectSectionIds<T extends { id: number; children: T[] }>(sections: T[]): number[] {
    const ids: number[] = [];
    const walk = (nodes: T[]) => {
        for (const node of nodes) {
            ids.push(node.id);
            walk(node.children);
        }
    };
    walk(sections);
    return ids;
}

/**
 * Cache scopes a live render depends on.
 *
 * The engine only declares keys and tags; storage and invalidation belong to
 * whichever `CacheStore` the caller plugs in.
 */

import type { RenderedPage, SectionNode } from './types';

export interface DataTableDependency {
    table: string;
    /** At least one declaration reads the table for every user. */
    global: boolean;
    /** At least one declaration restricts the table to the requesting user. */
    userScoped: boolean;
}

export interface RenderCacheDescriptor {
    key: string;
    tags: string[];
}

export interface CacheStore {
    get(key: string): Promise<RenderedPage | null>;
    set(key: string, value: RenderedPage, tags: string[]): Promise<void>;
    invalidateTag(tag: string): Promise<void>;
}

/** Walk every data_config in the tree, conditions notwithstanding. */
export function collectDataTableDependencies(tree: SectionNode[]): DataTableDependency[] {
    const byTable = new Map<string, DataTableDependency>();

    const visit = (nodes: SectionNode[]) => {
        for (const node of nodes) {
            if (node.dataConfig.status === 'valid') {
                for (const declaration of node.dataConfig.declarations) {
                    const entry = byTable.get(declaration.table) ?? { table: declaration.table, global: false, userScoped: false };
                    if (declaration.current_user ?? true) {
                        entry.userScoped = true;
                    } else {
                        entry.global = true;
                    }
                    byTable.set(declaration.table, entry);
                }
            }
            visit(node.children);
        }
    };
    visit(tree);

    return [...byTable.values()].sort((a, b) => a.table.localeCompare(b.table));
}

export function pageTag(pageId: number): string {
    return `page:${pageId}`;
}

export function dataTableTag(table: string, userId?: number | null): string {
    return userId === undefined || userId === null ? `data_table:${table}` : `data_table:${table}:user:${userId}`;
}

export function buildRenderCacheDescriptor(
    pageId: number,
    languageId: number,
    userId: number | null,
    dependencies: DataTableDependency[],
): RenderCacheDescriptor {
    const user = userId ?? 'anonymous';
    const tags = [pageTag(pageId), `language:${languageId}`, `user:${user}`];

    for (const dependency of dependencies) {
        tags.push(dataTableTag(dependency.table));
        if (dependency.userScoped && userId !== null) {
            tags.push(dataTableTag(dependency.table, userId));
        }
    }

    const tables = dependencies.map((dependency) => dependency.table).join(',');
    return {
        key: `page_render:${pageId}:${languageId}:${user}:${tables}`,
        tags,
    };
}

/** In-process store for single-node deployments and tests. */
export class MemoryCacheStore implements CacheStore {
    private readonly entries = new Map<string, { value: RenderedPage; tags: string[] }>();

    async get(key: string): Promise<RenderedPage | null> {
        return this.entries.get(key)?.value ?? null;
    }

    async set(key: string, value: RenderedPage, tags: string[]): Promise<void> {
        this.entries.set(key, { value, tags: [...tags] });
    }

    async invalidateTag(tag: string): Promise<void> {
        for (const [key, entry] of this.entries) {
            if (entry.tags.includes(tag)) {
                this.entries.delete(key);
            }
        }
    }

    get size(): number {
        return this.entries.size;
    }
}

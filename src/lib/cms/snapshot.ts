/**
 * Snapshot builder: the draft tree with every language, before any
 * interpolation, retrieval or condition evaluation.
 */

import { z } from 'zod';
import { NotFoundError } from './errors';
import type { ContentRepository } from './ports';
import { buildSectionTree, collectSectionIds } from './section-tree';
import { indexAllLanguageTranslations } from './translations';
import {
    JsonValueSchema,
    type DataConfigState,
    type JsonValue,
    type PageRecord,
    type PageSnapshot,
    type SectionNode,
    type SnapshotSection,
    type SnapshotTranslations,
} from './types';

function snapshotDataConfig(config: DataConfigState): JsonValue {
    return config.status === 'none' ? null : config.source;
}

function toSnapshotSections(nodes: SectionNode[], translations: Map<number, SnapshotTranslations>): SnapshotSection[] {
    return nodes.map((node) => ({
        id: node.id,
        section_name: node.name,
        style_name: node.styleName,
        position: node.position,
        condition: node.condition,
        data_config: snapshotDataConfig(node.dataConfig),
        css: node.css,
        css_mobile: node.cssMobile,
        debug: node.debug,
        translations: translations.get(node.id) ?? {},
        children: toSnapshotSections(node.children, translations),
    }));
}

export function buildPageSnapshot(
    page: PageRecord,
    tree: SectionNode[],
    translations: Map<number, SnapshotTranslations>,
): PageSnapshot {
    return {
        page: {
            id: page.id,
            keyword: page.keyword,
            url: page.url,
            parent_page_id: page.parentPageId,
            is_headless: page.isHeadless,
            nav_position: page.navPosition,
            footer_position: page.footerPosition,
            sections: toSnapshotSections(tree, translations),
        },
    };
}

/** Load the page's draft straight from storage and capture it as a snapshot. */
export async function loadDraftSnapshot(content: ContentRepository, pageId: number): Promise<PageSnapshot> {
    const page = await content.findPage(pageId);
    if (!page) {
        throw new NotFoundError(`Page ${pageId} not found`);
    }

    const tree = buildSectionTree(await content.fetchSectionRows(pageId));
    const rows = await content.fetchAllTranslations(collectSectionIds(tree));
    return buildPageSnapshot(page, tree, indexAllLanguageTranslations(rows));
}

const FieldContentSchema = z.object({
    content: z.string().nullable(),
    meta: z.string().nullable(),
});

const SnapshotSectionSchema: z.ZodType<SnapshotSection> = z.lazy(() => z.object({
    id: z.number(),
    section_name: z.string(),
    style_name: z.string(),
    position: z.number().nullable(),
    condition: z.string().nullable(),
    data_config: JsonValueSchema,
    css: z.string().nullable(),
    css_mobile: z.string().nullable(),
    debug: z.boolean(),
    translations: z.record(z.string(), z.record(z.string(), FieldContentSchema)),
    children: z.array(SnapshotSectionSchema),
}));

/** Shape check for page_json read back from storage. */
export const PageSnapshotSchema: z.ZodType<PageSnapshot> = z.object({
    page: z.object({
        id: z.number(),
        keyword: z.string(),
        url: z.string().nullable(),
        parent_page_id: z.number().nullable(),
        is_headless: z.boolean(),
        nav_position: z.number().nullable(),
        footer_position: z.number().nullable(),
        sections: z.array(SnapshotSectionSchema),
    }),
});

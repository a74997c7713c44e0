import { and, asc, eq, inArray } from 'drizzle-orm';
import { z } from 'zod';
import type { ContentRepository } from '@/lib/cms/ports';
import type { PageRecord, SectionRow, TranslationRow } from '@/lib/cms/types';
import { db, type DbOrTx } from '@/lib/db';
import {
    cmsPreferences,
    fields,
    globalValues,
    pages,
    sectionsFieldsTranslation,
    sql,
} from './schema';

const SectionRowRecordSchema = z.object({
    id: z.coerce.number(),
    parent_id: z.coerce.number().nullable(),
    position: z.coerce.number().nullable(),
    name: z.string(),
    style_name: z.string(),
    condition: z.string().nullable(),
    data_config: z.string().nullable(),
    css: z.string().nullable(),
    css_mobile: z.string().nullable(),
    debug: z.boolean(),
});

export class DrizzleContentRepository implements ContentRepository {
    constructor(private readonly dbClient: DbOrTx = db) {}

    async findPage(pageId: number): Promise<PageRecord | null> {
        const [page] = await this.dbClient.select({
            id: pages.id,
            keyword: pages.keyword,
            url: pages.url,
            parentPageId: pages.parentPageId,
            isHeadless: pages.isHeadless,
            navPosition: pages.navPosition,
            footerPosition: pages.footerPosition,
            publishedVersionId: pages.publishedVersionId,
        }).from(pages).where(eq(pages.id, pageId)).limit(1);
        return page || null;
    }

    async listPageIds(): Promise<number[]> {
        const rows = await this.dbClient.select({ id: pages.id }).from(pages).orderBy(asc(pages.id));
        return rows.map((row) => row.id);
    }

    /**
     * Page-level sections and everything below them. The path guard stops a
     * hierarchy cycle from recursing forever; the tree builder handles what
     * remains of it.
     */
    async fetchSectionRows(pageId: number): Promise<SectionRow[]> {
        const rows = await this.dbClient.execute<Record<string, unknown>>(sql`
            WITH RECURSIVE tree AS (
                SELECT ps.section_id AS id, NULL::int AS parent_id, ps.position, ARRAY[ps.section_id] AS path
                FROM pages_sections ps
                WHERE ps.page_id = ${pageId}
                UNION ALL
                SELECT sh.child, sh.parent, sh.position, tree.path || sh.child
                FROM sections_hierarchy sh
                JOIN tree ON sh.parent = tree.id
                WHERE NOT sh.child = ANY(tree.path)
            )
            SELECT tree.id, tree.parent_id, tree.position, s.name, st.name AS style_name,
                   s.condition, s.data_config, s.css, s.css_mobile, s.debug
            FROM tree
            JOIN sections s ON s.id = tree.id
            JOIN styles st ON st.id = s.style_id
        `);

        return z.array(SectionRowRecordSchema).parse(Array.from(rows)).map((row) => ({
            id: row.id,
            parentId: row.parent_id,
            position: row.position,
            name: row.name,
            styleName: row.style_name,
            condition: row.condition,
            dataConfig: row.data_config,
            css: row.css,
            cssMobile: row.css_mobile,
            debug: row.debug,
        }));
    }

    private async selectTranslations(sectionIds: number[], languageId: number | null): Promise<TranslationRow[]> {
        if (sectionIds.length === 0) return [];

        return this.dbClient.select({
            sectionId: sectionsFieldsTranslation.sectionId,
            languageId: sectionsFieldsTranslation.languageId,
            fieldName: fields.name,
            content: sectionsFieldsTranslation.content,
            meta: sectionsFieldsTranslation.meta,
        })
            .from(sectionsFieldsTranslation)
            .innerJoin(fields, eq(fields.id, sectionsFieldsTranslation.fieldId))
            .where(and(
                inArray(sectionsFieldsTranslation.sectionId, sectionIds),
                languageId === null ? undefined : eq(sectionsFieldsTranslation.languageId, languageId),
            ))
            .orderBy(asc(sectionsFieldsTranslation.sectionId), asc(sectionsFieldsTranslation.languageId), asc(fields.name));
    }

    async fetchTranslations(sectionIds: number[], languageId: number): Promise<TranslationRow[]> {
        return this.selectTranslations(sectionIds, languageId);
    }

    async fetchAllTranslations(sectionIds: number[]): Promise<TranslationRow[]> {
        return this.selectTranslations(sectionIds, null);
    }

    async getDefaultLanguageId(): Promise<number | null> {
        const [prefs] = await this.dbClient
            .select({ defaultLanguageId: cmsPreferences.defaultLanguageId })
            .from(cmsPreferences)
            .orderBy(asc(cmsPreferences.id))
            .limit(1);
        return prefs?.defaultLanguageId ?? null;
    }

    async fetchGlobalValues(languageId: number): Promise<Record<string, string>> {
        const rows = await this.dbClient
            .select({ key: globalValues.key, value: globalValues.value })
            .from(globalValues)
            .where(eq(globalValues.languageId, languageId));
        return Object.fromEntries(rows.map((row) => [row.key, row.value]));
    }
}

import { getCmsConfig } from '@/lib/config';
import { logger } from '@/lib/logger';
import { buildRenderCacheDescriptor, collectDataTableDependencies, type CacheStore } from './cache-scopes';
import type { ConditionEvaluator } from './conditions';
import { NotFoundError } from './errors';
import { processSections } from './orchestrator';
import type { ContentRepository, DataRetriever } from './ports';
import { buildSystemScope, createRootScope } from './scope';
import { buildSectionTree, collectSectionIds } from './section-tree';
import { applyTranslations, indexTranslations, type TranslationIndex } from './translations';
import type { RenderedPage, RequestContext } from './types';

export interface PageRendererOptions {
    content: ContentRepository;
    retriever: DataRetriever;
    conditions: ConditionEvaluator;
    cache?: CacheStore;
    propertyLanguageId?: number;
    fallbackLanguageId?: number;
}

/**
 * Live path: draft rows → tree → translations → orchestrator. Whether a
 * caller serves this or a published snapshot is decided outside.
 */
export class PageRenderer {
    private readonly propertyLanguageId: number;
    private readonly fallbackLanguageId: number;

    constructor(private readonly options: PageRendererOptions) {
        const config = options.propertyLanguageId === undefined || options.fallbackLanguageId === undefined
            ? getCmsConfig()
            : null;
        this.propertyLanguageId = options.propertyLanguageId ?? config?.propertyLanguageId ?? 1;
        this.fallbackLanguageId = options.fallbackLanguageId ?? config?.fallbackLanguageId ?? 2;
    }

    /** Explicit language, then the user's, then the project default, then the configured fallback. */
    async resolveLanguageId(languageId: number | null, ctx: RequestContext): Promise<number> {
        if (languageId !== null) return languageId;
        if (ctx.languageId !== null) return ctx.languageId;
        return (await this.options.content.getDefaultLanguageId()) ?? this.fallbackLanguageId;
    }

    async renderPage(pageId: number, languageId: number | null, ctx: RequestContext): Promise<RenderedPage> {
        const { content } = this.options;

        const page = await content.findPage(pageId);
        if (!page) {
            throw new NotFoundError(`Page ${pageId} not found`);
        }

        const workingLanguageId = await this.resolveLanguageId(languageId, ctx);
        const tree = buildSectionTree(await content.fetchSectionRows(pageId));

        const cacheKey = this.options.cache
            ? buildRenderCacheDescriptor(pageId, workingLanguageId, ctx.userId, collectDataTableDependencies(tree))
            : null;
        if (this.options.cache && cacheKey) {
            const cached = await this.options.cache.get(cacheKey.key);
            if (cached) {
                logger.debug('Render cache hit', { pageId, key: cacheKey.key });
                return cached;
            }
        }

        const sectionIds = collectSectionIds(tree);
        const defaultLanguageId = await content.getDefaultLanguageId();
        const fallback: TranslationIndex = defaultLanguageId !== null && defaultLanguageId !== workingLanguageId
            ? indexTranslations(await content.fetchTranslations(sectionIds, defaultLanguageId))
            : new Map();

        const translated = applyTranslations(tree, {
            working: indexTranslations(await content.fetchTranslations(sectionIds, workingLanguageId)),
            fallback,
            property: indexTranslations(await content.fetchTranslations(sectionIds, this.propertyLanguageId)),
        });

        const rootScope = createRootScope(
            buildSystemScope({ ...ctx, pageKeyword: ctx.pageKeyword || page.keyword }, workingLanguageId),
            await content.fetchGlobalValues(workingLanguageId),
        );

        const sections = await processSections(translated, rootScope, {
            retriever: this.options.retriever,
            conditions: this.options.conditions,
            languageId: workingLanguageId,
            timezone: ctx.timezone,
            userId: ctx.userId,
        });

        const rendered: RenderedPage = {
            page: {
                id: page.id,
                keyword: page.keyword,
                url: page.url,
                parentPageId: page.parentPageId,
                isHeadless: page.isHeadless,
                navPosition: page.navPosition,
                footerPosition: page.footerPosition,
                languageId: workingLanguageId,
                sections,
            },
        };

        if (this.options.cache && cacheKey) {
            await this.options.cache.set(cacheKey.key, rendered, cacheKey.tags);
        }
        return rendered;
    }
}

import { logger } from '@/lib/logger';
import { selectVersionsForRetention, type PageVersionService } from './page-versions';
import type { CmsRepository } from './ports';

export interface RetentionOptions {
    keep: number;
    /** Limit the run to one page; every page otherwise. */
    pageId: number | null;
    dryRun: boolean;
}

export interface PageRetentionResult {
    pageId: number;
    /** Version numbers selected for deletion, newest first. */
    candidates: number[];
    deleted: number;
}

/**
 * Apply the retention policy page by page. A dry run reports the same
 * selection without deleting anything.
 */
export async function runRetention(
    repo: CmsRepository,
    service: PageVersionService,
    options: RetentionOptions,
): Promise<PageRetentionResult[]> {
    const pageIds = options.pageId === null ? await repo.listPageIds() : [options.pageId];
    const results: PageRetentionResult[] = [];

    for (const pageId of pageIds) {
        const page = await repo.findPage(pageId);
        if (!page) {
            logger.warn('Retention skipped unknown page', { pageId });
            continue;
        }

        const candidates = selectVersionsForRetention(
            await repo.findVersionsByPage(pageId),
            options.keep,
            page.publishedVersionId,
        ).map((version) => version.versionNumber);

        const deleted = options.dryRun || candidates.length === 0
            ? 0
            : await service.applyRetentionPolicy(pageId, options.keep);
        results.push({ pageId, candidates, deleted });
    }

    return results;
}

/**
 * Page version lifecycle: snapshot, publish, unpublish, delete, retention,
 * change detection and comparison.
 *
 * Every mutation runs in one repository transaction. Client errors (404/400/409)
 * propagate unchanged; anything else is wrapped in a VersionServiceError that
 * keeps the original as its cause.
 */

import { getCmsConfig } from '@/lib/config';
import { errorMessage, logger } from '@/lib/logger';
import {
    InvalidStateError,
    isClientError,
    NotFoundError,
    VersionNumberConflictError,
    VersionServiceError,
} from './errors';
import { generateStructureHash } from './json-normalizer';
import type { CmsRepository } from './ports';
import { loadDraftSnapshot } from './snapshot';
import type { JsonObject, PageVersionRecord, PageVersionSummary } from './types';
import { compareSnapshots, parseDiffFormat, type DiffResult } from './version-diff';

export interface PageVersionServiceOptions {
    versionCreateRetries?: number;
    retentionKeep?: number;
    now?: () => Date;
}

export interface VersionHistory {
    versions: PageVersionSummary[];
    totalCount: number;
    limit: number;
    offset: number;
    hasUnpublishedChanges: boolean;
}

export interface VersionMeta {
    id: number;
    versionNumber: number;
    versionName: string | null;
    createdAt: Date;
    publishedAt: Date | null;
}

export type VersionComparison = DiffResult & {
    version1: VersionMeta;
    version2: VersionMeta;
};

export type DraftComparison = DiffResult & {
    draft: { pageId: number; keyword: string; url: string | null; comparedAt: Date };
    version: VersionMeta;
};

function toMeta(version: PageVersionSummary): VersionMeta {
    return {
        id: version.id,
        versionNumber: version.versionNumber,
        versionName: version.versionName,
        createdAt: version.createdAt,
        publishedAt: version.publishedAt,
    };
}

function toSummary(version: PageVersionRecord): PageVersionSummary {
    const { pageJson: _pageJson, ...summary } = version;
    return summary;
}

/**
 * Versions that fall outside the newest `keep` by version number, minus the
 * published one, which is never selected.
 */
export function selectVersionsForRetention<T extends { id: number; versionNumber: number }>(
    versions: T[],
    keep: number,
    publishedVersionId: number | null,
): T[] {
    if (versions.length <= keep) return [];
    return [...versions]
        .sort((a, b) => b.versionNumber - a.versionNumber)
        .slice(Math.max(0, keep))
        .filter((version) => version.id !== publishedVersionId);
}

export class PageVersionService {
    private readonly versionCreateRetries: number;
    private readonly retentionKeep: number;
    private readonly now: () => Date;

    constructor(private readonly repo: CmsRepository, options: PageVersionServiceOptions = {}) {
        const config = options.versionCreateRetries === undefined || options.retentionKeep === undefined
            ? getCmsConfig()
            : null;
        this.versionCreateRetries = options.versionCreateRetries ?? config?.versionCreateRetries ?? 3;
        this.retentionKeep = options.retentionKeep ?? config?.retentionKeep ?? 10;
        this.now = options.now ?? (() => new Date());
    }

    private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
        try {
            return await work();
        } catch (error) {
            if (isClientError(error)) throw error;
            throw new VersionServiceError(`Failed to ${operation}: ${errorMessage(error)}`, error);
        }
    }

    private async requirePage(repo: CmsRepository, pageId: number) {
        const page = await repo.findPage(pageId);
        if (!page) throw new NotFoundError(`Page with ID ${pageId} not found`);
        return page;
    }

    private async requireVersion(repo: CmsRepository, versionId: number): Promise<PageVersionRecord> {
        const version = await repo.findVersion(versionId);
        if (!version) throw new NotFoundError(`Version with ID ${versionId} not found`);
        return version;
    }

    private async insertNextVersion(
        tx: CmsRepository,
        pageId: number,
        versionName: string | null,
        metadata: JsonObject | null,
        createdBy: number | null,
    ): Promise<PageVersionRecord> {
        await this.requirePage(tx, pageId);
        await tx.lockPageVersions(pageId);
        const pageJson = await loadDraftSnapshot(tx, pageId);
        const versionNumber = (await tx.getLatestVersionNumber(pageId)) + 1;
        return tx.insertVersion({ pageId, versionNumber, versionName, pageJson, createdBy, metadata });
    }

    private async publishIn(tx: CmsRepository, pageId: number, versionId: number): Promise<PageVersionRecord> {
        await this.requirePage(tx, pageId);
        const version = await this.requireVersion(tx, versionId);
        if (version.pageId !== pageId) {
            throw new InvalidStateError(`Version ${versionId} does not belong to page ${pageId}`);
        }

        const publishedAt = this.now();
        await tx.clearPublishedAt(pageId, versionId);
        await tx.markVersionPublished(versionId, publishedAt);
        await tx.setPublishedVersion(pageId, versionId);
        return { ...version, publishedAt };
    }

    /** Retries the whole transaction when another writer took the same version number. */
    private async withVersionNumberRetry<T>(pageId: number, work: (tx: CmsRepository) => Promise<T>): Promise<T> {
        for (let attempt = 1; ; attempt++) {
            try {
                return await this.repo.transaction(work);
            } catch (error) {
                if (!(error instanceof VersionNumberConflictError) || attempt >= this.versionCreateRetries) {
                    throw error;
                }
                logger.warn('Version number conflict, retrying', { pageId, attempt });
            }
        }
    }

    async createVersion(
        pageId: number,
        versionName: string | null = null,
        metadata: JsonObject | null = null,
        createdBy: number | null = null,
    ): Promise<PageVersionRecord> {
        return this.guard('create page version', async () => {
            const version = await this.withVersionNumberRetry(pageId, (tx) =>
                this.insertNextVersion(tx, pageId, versionName, metadata, createdBy));
            logger.info('Created page version', { pageId, versionId: version.id, versionNumber: version.versionNumber });
            return version;
        });
    }

    async publishVersion(pageId: number, versionId: number): Promise<PageVersionRecord> {
        return this.guard('publish version', async () => {
            const version = await this.repo.transaction((tx) => this.publishIn(tx, pageId, versionId));
            logger.info('Published page version', { pageId, versionId, versionNumber: version.versionNumber });
            return version;
        });
    }

    /** Snapshot and publish in a single transaction. */
    async createAndPublishVersion(
        pageId: number,
        versionName: string | null = null,
        metadata: JsonObject | null = null,
        createdBy: number | null = null,
    ): Promise<PageVersionRecord> {
        return this.guard('create and publish page version', async () => {
            const version = await this.withVersionNumberRetry(pageId, async (tx) => {
                const created = await this.insertNextVersion(tx, pageId, versionName, metadata, createdBy);
                return this.publishIn(tx, pageId, created.id);
            });
            logger.info('Created and published page version', { pageId, versionId: version.id, versionNumber: version.versionNumber });
            return version;
        });
    }

    async unpublishPage(pageId: number): Promise<void> {
        await this.guard('unpublish page', () => this.repo.transaction(async (tx) => {
            await this.requirePage(tx, pageId);
            await tx.clearPublishedAt(pageId, null);
            await tx.setPublishedVersion(pageId, null);
        }));
        logger.info('Unpublished page', { pageId });
    }

    async getPublishedVersion(pageId: number): Promise<PageVersionRecord | null> {
        const page = await this.requirePage(this.repo, pageId);
        if (page.publishedVersionId === null) return null;
        return this.repo.findVersion(page.publishedVersionId);
    }

    async getVersionById(versionId: number): Promise<PageVersionRecord> {
        return this.requireVersion(this.repo, versionId);
    }

    /** Newest first, without snapshot bodies. */
    async getPageVersions(pageId: number): Promise<PageVersionSummary[]> {
        return this.repo.findVersionsByPage(pageId);
    }

    async getVersionHistory(pageId: number, limit = 10, offset = 0): Promise<VersionHistory> {
        const [versions, totalCount, hasUnpublishedChanges] = await Promise.all([
            this.repo.findVersionHistory(pageId, limit, offset),
            this.repo.countVersionsByPage(pageId),
            this.hasUnpublishedChanges(pageId),
        ]);
        return { versions, totalCount, limit, offset, hasUnpublishedChanges };
    }

    /**
     * Whether the draft differs from the published snapshot. No published
     * version, or any failure while checking, reports true.
     */
    async hasUnpublishedChanges(pageId: number): Promise<boolean> {
        try {
            const published = await this.getPublishedVersion(pageId);
            if (!published) return true;

            const draft = await loadDraftSnapshot(this.repo, pageId);
            return generateStructureHash(draft) !== generateStructureHash(published.pageJson);
        } catch (error) {
            logger.warn('Unpublished change check failed; assuming changes', { pageId, error: errorMessage(error) });
            return true;
        }
    }

    async compareVersions(versionId1: number, versionId2: number, format = 'unified'): Promise<VersionComparison> {
        const diffFormat = parseDiffFormat(format);
        const version1 = await this.getVersionById(versionId1);
        const version2 = await this.getVersionById(versionId2);
        if (version1.pageId !== version2.pageId) {
            throw new InvalidStateError('Versions must belong to the same page');
        }

        return {
            version1: toMeta(version1),
            version2: toMeta(version2),
            ...compareSnapshots(version1.pageJson, version2.pageJson, diffFormat),
        };
    }

    /** Diff from the stored version to the current draft. */
    async compareDraftWithVersion(pageId: number, versionId: number, format = 'side_by_side'): Promise<DraftComparison> {
        const diffFormat = parseDiffFormat(format);
        const draft = await loadDraftSnapshot(this.repo, pageId);
        const version = await this.getVersionById(versionId);
        if (version.pageId !== pageId) {
            throw new InvalidStateError(`Version ${versionId} does not belong to page ${pageId}`);
        }

        return {
            draft: { pageId, keyword: draft.page.keyword, url: draft.page.url, comparedAt: this.now() },
            version: toMeta(version),
            ...compareSnapshots(version.pageJson, draft, diffFormat),
        };
    }

    async deleteVersion(versionId: number): Promise<void> {
        const deleted = await this.guard('delete version', () => this.repo.transaction(async (tx) => {
            const version = await this.requireVersion(tx, versionId);
            const page = await this.requirePage(tx, version.pageId);
            if (page.publishedVersionId === versionId) {
                throw new InvalidStateError('Cannot delete the currently published version. Unpublish it first.');
            }
            await tx.deleteVersion(versionId);
            return toSummary(version);
        }));
        logger.info('Deleted page version', { pageId: deleted.pageId, versionId, versionNumber: deleted.versionNumber });
    }

    /**
     * Delete the oldest versions beyond `keep`. The published version always
     * survives. A failed delete is logged and skipped; the count covers
     * successful deletes only.
     */
    async applyRetentionPolicy(pageId: number, keep: number = this.retentionKeep): Promise<number> {
        const published = await this.getPublishedVersion(pageId);
        const candidates = selectVersionsForRetention(
            await this.repo.findVersionsByPage(pageId),
            keep,
            published?.id ?? null,
        );

        let deleted = 0;
        for (const version of candidates) {
            try {
                await this.deleteVersion(version.id);
                deleted++;
            } catch (error) {
                logger.warn('Retention could not delete version', { pageId, versionId: version.id, error: errorMessage(error) });
            }
        }

        if (deleted > 0) {
            logger.info('Applied version retention', { pageId, keep, deleted });
        }
        return deleted;
    }
}

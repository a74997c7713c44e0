import type { CmsRepository } from '@/lib/cms/ports';
import type {
    NewPageVersion,
    PageRecord,
    PageVersionRecord,
    PageVersionSummary,
    SectionRow,
    TranslationRow,
} from '@/lib/cms/types';
import { db, type DbOrTx } from '@/lib/db';
import { DrizzleContentRepository } from './content-repository';
import { DrizzleVersionRepository } from './version-repository';

/** Content and version queries over one executor; `transaction` rebinds both to the transaction. */
export class DrizzleCmsRepository implements CmsRepository {
    private readonly content: DrizzleContentRepository;
    private readonly versions: DrizzleVersionRepository;

    constructor(private readonly dbClient: DbOrTx = db) {
        this.content = new DrizzleContentRepository(dbClient);
        this.versions = new DrizzleVersionRepository(dbClient);
    }

    transaction<T>(work: (tx: CmsRepository) => Promise<T>): Promise<T> {
        return this.dbClient.transaction((tx) => work(new DrizzleCmsRepository(tx)));
    }

    findPage(pageId: number): Promise<PageRecord | null> {
        return this.content.findPage(pageId);
    }

    listPageIds(): Promise<number[]> {
        return this.content.listPageIds();
    }

    fetchSectionRows(pageId: number): Promise<SectionRow[]> {
        return this.content.fetchSectionRows(pageId);
    }

    fetchTranslations(sectionIds: number[], languageId: number): Promise<TranslationRow[]> {
        return this.content.fetchTranslations(sectionIds, languageId);
    }

    fetchAllTranslations(sectionIds: number[]): Promise<TranslationRow[]> {
        return this.content.fetchAllTranslations(sectionIds);
    }

    getDefaultLanguageId(): Promise<number | null> {
        return this.content.getDefaultLanguageId();
    }

    fetchGlobalValues(languageId: number): Promise<Record<string, string>> {
        return this.content.fetchGlobalValues(languageId);
    }

    lockPageVersions(pageId: number): Promise<void> {
        return this.versions.lockPageVersions(pageId);
    }

    getLatestVersionNumber(pageId: number): Promise<number> {
        return this.versions.getLatestVersionNumber(pageId);
    }

    insertVersion(version: NewPageVersion): Promise<PageVersionRecord> {
        return this.versions.insertVersion(version);
    }

    findVersion(versionId: number): Promise<PageVersionRecord | null> {
        return this.versions.findVersion(versionId);
    }

    findVersionsByPage(pageId: number): Promise<PageVersionSummary[]> {
        return this.versions.findVersionsByPage(pageId);
    }

    findVersionHistory(pageId: number, limit: number, offset: number): Promise<PageVersionSummary[]> {
        return this.versions.findVersionHistory(pageId, limit, offset);
    }

    countVersionsByPage(pageId: number): Promise<number> {
        return this.versions.countVersionsByPage(pageId);
    }

    markVersionPublished(versionId: number, publishedAt: Date): Promise<void> {
        return this.versions.markVersionPublished(versionId, publishedAt);
    }

    clearPublishedAt(pageId: number, keepVersionId: number | null): Promise<void> {
        return this.versions.clearPublishedAt(pageId, keepVersionId);
    }

    setPublishedVersion(pageId: number, versionId: number | null): Promise<void> {
        return this.versions.setPublishedVersion(pageId, versionId);
    }

    deleteVersion(versionId: number): Promise<void> {
        return this.versions.deleteVersion(versionId);
    }
}

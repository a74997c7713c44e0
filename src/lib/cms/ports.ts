/**
 * Interfaces the engine consumes. Drizzle-backed implementations live in
 * `@/lib/db`; tests use in-process fakes.
 */

import type {
    JsonValue,
    NewPageVersion,
    PageRecord,
    PageVersionRecord,
    PageVersionSummary,
    SectionRow,
    TranslationRow,
} from './types';

export interface ContentRepository {
    findPage(pageId: number): Promise<PageRecord | null>;
    listPageIds(): Promise<number[]>;
    /** Every section reachable from the page, with its parent (null for page-level sections). */
    fetchSectionRows(pageId: number): Promise<SectionRow[]>;
    fetchTranslations(sectionIds: number[], languageId: number): Promise<TranslationRow[]>;
    /** Translations in every language, property language included. */
    fetchAllTranslations(sectionIds: number[]): Promise<TranslationRow[]>;
    getDefaultLanguageId(): Promise<number | null>;
    fetchGlobalValues(languageId: number): Promise<Record<string, string>>;
}

export interface VersionRepository {
    /** Serializes version-number allocation for the page until the surrounding transaction ends. */
    lockPageVersions(pageId: number): Promise<void>;
    getLatestVersionNumber(pageId: number): Promise<number>;
    /** Throws VersionNumberConflictError when (pageId, versionNumber) is taken. */
    insertVersion(version: NewPageVersion): Promise<PageVersionRecord>;
    findVersion(versionId: number): Promise<PageVersionRecord | null>;
    /** Newest first. */
    findVersionsByPage(pageId: number): Promise<PageVersionSummary[]>;
    findVersionHistory(pageId: number, limit: number, offset: number): Promise<PageVersionSummary[]>;
    countVersionsByPage(pageId: number): Promise<number>;
    markVersionPublished(versionId: number, publishedAt: Date): Promise<void>;
    /** Clears published_at on the page's versions, except `keepVersionId` when given. */
    clearPublishedAt(pageId: number, keepVersionId: number | null): Promise<void>;
    setPublishedVersion(pageId: number, versionId: number | null): Promise<void>;
    deleteVersion(versionId: number): Promise<void>;
}

export interface CmsRepository extends ContentRepository, VersionRepository {
    /** Runs `work` atomically; a thrown error rolls every write back. */
    transaction<T>(work: (tx: CmsRepository) => Promise<T>): Promise<T>;
}

export type DataRow = Record<string, JsonValue>;

export interface RetrieveRequest {
    table: string;
    filter: string;
    /** Projection; null returns every field. */
    fields: string[] | null;
    excludeDeleted: boolean;
    languageId: number;
    timezone: string;
    /** Restricts rows to this user's entries when set; `ownEntriesOnly` with a null user yields nothing. */
    ownEntriesOnly: boolean;
    userId: number | null;
    order: 'asc' | 'desc';
    limit: number | null;
}

export interface DataRetriever {
    retrieve(request: RetrieveRequest): Promise<DataRow[]>;
}

import { and, count, desc, eq, isNotNull, ne } from 'drizzle-orm';
import postgres from 'postgres';
import { z } from 'zod';
import { VersionNumberConflictError } from '@/lib/cms/errors';
import type { VersionRepository } from '@/lib/cms/ports';
import { PageSnapshotSchema } from '@/lib/cms/snapshot';
import { JsonObjectSchema, type NewPageVersion, type PageVersionRecord, type PageVersionSummary } from '@/lib/cms/types';
import { db, type DbOrTx } from '@/lib/db';
import { pages, pageVersions, sql } from './schema';

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
    if (error instanceof postgres.PostgresError) return error.code === UNIQUE_VIOLATION;
    if (error instanceof Error && error.cause !== undefined) return isUniqueViolation(error.cause);
    return false;
}

const MetadataSchema = JsonObjectSchema.nullable();

function describeIssue(error: z.ZodError): string {
    const issue = error.issues[0];
    return `${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'invalid'}`;
}

/** jsonb columns are only typed by the schema; check what was actually stored. */
function toSummary(row: PageVersionSummary): PageVersionSummary {
    const metadata = MetadataSchema.safeParse(row.metadata);
    if (!metadata.success) {
        throw new Error(`Stored metadata of version ${row.id} is malformed at ${describeIssue(metadata.error)}`);
    }
    return { ...row, metadata: metadata.data };
}

function toRecord(row: typeof pageVersions.$inferSelect): PageVersionRecord {
    const pageJson = PageSnapshotSchema.safeParse(row.pageJson);
    if (!pageJson.success) {
        throw new Error(`Stored page_json of version ${row.id} is malformed at ${describeIssue(pageJson.error)}`);
    }
    return { ...toSummary(row), pageJson: pageJson.data };
}

const summaryColumns = {
    id: pageVersions.id,
    pageId: pageVersions.pageId,
    versionNumber: pageVersions.versionNumber,
    versionName: pageVersions.versionName,
    createdBy: pageVersions.createdBy,
    createdAt: pageVersions.createdAt,
    publishedAt: pageVersions.publishedAt,
    metadata: pageVersions.metadata,
};

export class DrizzleVersionRepository implements VersionRepository {
    constructor(private readonly dbClient: DbOrTx = db) {}

    async lockPageVersions(pageId: number): Promise<void> {
        const lockKey = `page_versions:${pageId}`;
        await this.dbClient.execute(sql`SELECT pg_advisory_xact_lock(hashtext(${lockKey}))`);
    }

    async getLatestVersionNumber(pageId: number): Promise<number> {
        const [latest] = await this.dbClient.select({
            maxVersion: sql<number>`coalesce(max(${pageVersions.versionNumber}), 0)::int`,
        }).from(pageVersions).where(eq(pageVersions.pageId, pageId));

        return latest?.maxVersion || 0;
    }

    async insertVersion(version: NewPageVersion): Promise<PageVersionRecord> {
        try {
            const [created] = await this.dbClient.insert(pageVersions).values({
                pageId: version.pageId,
                versionNumber: version.versionNumber,
                versionName: version.versionName,
                pageJson: version.pageJson,
                createdBy: version.createdBy,
                metadata: version.metadata,
            }).returning();

            if (!created) {
                throw new Error(`Insert of version ${version.versionNumber} for page ${version.pageId} returned no row`);
            }
            return toRecord(created);
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new VersionNumberConflictError(version.pageId, version.versionNumber);
            }
            throw error;
        }
    }

    async findVersion(versionId: number): Promise<PageVersionRecord | null> {
        const [version] = await this.dbClient.select()
            .from(pageVersions)
            .where(eq(pageVersions.id, versionId))
            .limit(1);
        return version ? toRecord(version) : null;
    }

    async findVersionsByPage(pageId: number): Promise<PageVersionSummary[]> {
        return this.dbClient.select(summaryColumns)
            .from(pageVersions)
            .where(eq(pageVersions.pageId, pageId))
            .orderBy(desc(pageVersions.versionNumber))
            .then((rows) => rows.map(toSummary));
    }

    async findVersionHistory(pageId: number, limit: number, offset: number): Promise<PageVersionSummary[]> {
        return this.dbClient.select(summaryColumns)
            .from(pageVersions)
            .where(eq(pageVersions.pageId, pageId))
            .orderBy(desc(pageVersions.versionNumber))
            .limit(limit)
            .offset(offset)
            .then((rows) => rows.map(toSummary));
    }

    async countVersionsByPage(pageId: number): Promise<number> {
        const [row] = await this.dbClient
            .select({ total: count() })
            .from(pageVersions)
            .where(eq(pageVersions.pageId, pageId));
        return row?.total ?? 0;
    }

    async markVersionPublished(versionId: number, publishedAt: Date): Promise<void> {
        await this.dbClient.update(pageVersions)
            .set({ publishedAt })
            .where(eq(pageVersions.id, versionId));
    }

    async clearPublishedAt(pageId: number, keepVersionId: number | null): Promise<void> {
        const conditions = [eq(pageVersions.pageId, pageId), isNotNull(pageVersions.publishedAt)];
        if (keepVersionId !== null) conditions.push(ne(pageVersions.id, keepVersionId));

        await this.dbClient.update(pageVersions)
            .set({ publishedAt: null })
            .where(and(...conditions));
    }

    async setPublishedVersion(pageId: number, versionId: number | null): Promise<void> {
        await this.dbClient.update(pages)
            .set({ publishedVersionId: versionId })
            .where(eq(pages.id, pageId));
    }

    async deleteVersion(versionId: number): Promise<void> {
        await this.dbClient.delete(pageVersions).where(eq(pageVersions.id, versionId));
    }
}

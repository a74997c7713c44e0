import { and, asc, desc, eq, isNull, or, type SQL } from 'drizzle-orm';
import type { DataRetriever, DataRow, RetrieveRequest } from '@/lib/cms/ports';
import { formatClock } from '@/lib/cms/scope';
import { db, type DbOrTx } from '@/lib/db';
import { logger } from '@/lib/logger';
import { dataRecords, dataTables, type DataRecordRow } from './schema';
import { recordFilterToSql } from './record-filter';
import { notDeleted } from './soft-delete';

/** Flatten a record into the row shape sections see: reserved columns plus its values. */
export function toDataRow(record: DataRecordRow, timezone: string, fields: string[] | null): DataRow {
    const clock = formatClock(record.createdAt, timezone);
    const row: DataRow = {
        record_id: record.id,
        user_id: record.userId,
        created_at: `${clock.date} ${clock.time}`,
        ...record.values,
    };
    if (fields === null) return row;

    const projected: DataRow = {};
    for (const field of fields) {
        if (field in row) projected[field] = row[field];
    }
    return projected;
}

export class DrizzleDataRetriever implements DataRetriever {
    constructor(private readonly dbClient: DbOrTx = db) {}

    /** An unknown table yields no rows, so its namespace is still set (to an empty value). */
    async retrieve(request: RetrieveRequest): Promise<DataRow[]> {
        if (request.ownEntriesOnly && request.userId === null) {
            return [];
        }

        const [table] = await this.dbClient
            .select({ id: dataTables.id })
            .from(dataTables)
            .where(eq(dataTables.name, request.table))
            .limit(1);
        if (!table) {
            logger.warn('Data table not found', { table: request.table });
            return [];
        }

        const conditions: Array<SQL | undefined> = [
            eq(dataRecords.dataTableId, table.id),
            or(isNull(dataRecords.languageId), eq(dataRecords.languageId, request.languageId)),
            request.excludeDeleted ? notDeleted(dataRecords) : undefined,
            request.ownEntriesOnly && request.userId !== null ? eq(dataRecords.userId, request.userId) : undefined,
            recordFilterToSql(request.filter),
        ];

        const query = this.dbClient
            .select()
            .from(dataRecords)
            .where(and(...conditions))
            .orderBy(request.order === 'desc' ? desc(dataRecords.id) : asc(dataRecords.id));
        const records = request.limit === null ? await query : await query.limit(request.limit);

        return records.map((record) => toDataRow(record, request.timezone, request.fields));
    }
}

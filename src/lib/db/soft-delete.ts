/**
 * Soft delete utilities.
 *
 * Data records are never removed outright: deleting one sets `deletedAt`, and
 * retrieval excludes those rows through `notDeleted()` unless asked not to.
 */

import { isNull, type SQL, type Column } from 'drizzle-orm';

/**
 * Returns a SQL condition that excludes soft-deleted rows.
 * Usage: `.where(and(eq(dataRecords.id, id), notDeleted(dataRecords)))`
 */
export function notDeleted(table: { deletedAt: Column }): SQL {
    return isNull(table.deletedAt);
}

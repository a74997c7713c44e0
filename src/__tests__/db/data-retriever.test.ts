import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { RetrieveRequest } from '@/lib/cms/ports';
import type { DataRecordRow } from '@/lib/db/schema';
import { logger } from '@/lib/logger';

const mockLimit = vi.fn();

const mockDb = {
    select: vi.fn(),
};

vi.mock('@/lib/db', () => ({
    db: mockDb,
}));

// Import after mocks are set up
const { DrizzleDataRetriever, toDataRow } = await import('@/lib/db/data-retriever');
const { dataTables } = await import('@/lib/db/schema');

const record: DataRecordRow = {
    id: 1,
    dataTableId: 4,
    userId: 7,
    languageId: null,
    values: { item: 'apple', qty: 2 },
    createdAt: new Date('2025-03-01T23:05:00Z'),
    deletedAt: null,
};

describe('toDataRow', () => {
    it('puts the reserved columns next to the record values', () => {
        expect(toDataRow(record, 'UTC', null)).toEqual({
            record_id: 1,
            user_id: 7,
            created_at: '2025-03-01 23:05',
            item: 'apple',
            qty: 2,
        });
    });

    it('formats created_at in the requested time zone', () => {
        expect(toDataRow(record, 'Asia/Tokyo', null).created_at).toBe('2025-03-02 08:05');
    });

    it('projects the requested fields and skips unknown ones', () => {
        expect(toDataRow(record, 'UTC', ['item', 'record_id', 'missing'])).toEqual({ item: 'apple', record_id: 1 });
    });
});

describe('DrizzleDataRetriever.retrieve', () => {
    const mockFrom = vi.fn();
    const request: RetrieveRequest = {
        table: 'orders',
        filter: '',
        fields: null,
        excludeDeleted: true,
        languageId: 2,
        timezone: 'UTC',
        ownEntriesOnly: false,
        userId: 7,
        order: 'asc',
        limit: null,
    };

    beforeEach(() => {
        vi.clearAllMocks();
        mockDb.select.mockReturnValue({
            from: mockFrom.mockReturnValue({ where: () => ({ limit: mockLimit }) }),
        });
    });

    it('returns no rows for an unknown table', async () => {
        mockLimit.mockResolvedValue([]);
        const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);

        expect(await new DrizzleDataRetriever().retrieve(request)).toEqual([]);

        expect(mockFrom).toHaveBeenCalledTimes(1);
        expect(mockFrom).toHaveBeenCalledWith(dataTables);
        expect(warn).toHaveBeenCalledWith('Data table not found', { table: 'orders' });
        warn.mockRestore();
    });

    it('skips the query for own entries without a user', async () => {
        expect(await new DrizzleDataRetriever().retrieve({ ...request, ownEntriesOnly: true, userId: null })).toEqual([]);
        expect(mockDb.select).not.toHaveBeenCalled();
    });
});

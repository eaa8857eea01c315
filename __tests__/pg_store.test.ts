import { ZodError } from 'zod';
import { PgRequestStore, toTrackedRequest } from '../src/tracker/pg_store';
import { DuplicateReferenceError } from '../src/tracker/request_store';

const NOW = new Date('2025-03-10T12:00:00Z');

function dbRow(overrides: Record<string, unknown> = {}) {
    return {
        id: 1,
        reference_id: null,
        agency: 'USDA APHIS',
        agency_key: 'USDA-APHIS',
        jurisdiction: 'US-Federal',
        topic: 'Inspection reports',
        request_text: '',
        created_at: new Date('2025-03-01T09:30:00Z'),
        filed_date: null,
        deadline: null,
        acknowledged_date: null,
        extended_date: null,
        extended_deadline: null,
        response_date: null,
        status: 'DRAFT',
        docs_received: 0,
        pages_received: 0,
        pages_withheld: 0,
        exemptions_cited: null,
        response_summary: null,
        filing_method: null,
        confirmation_number: null,
        assigned_analyst: null,
        fee_paid: null,
        fee_waiver_requested: true,
        fee_waiver_granted: null,
        notes: null,
        appeal_filed: false,
        appeal_date: null,
        appeal_body: null,
        appeal_outcome: null,
        ...overrides,
    };
}

describe('PgRequestStore', () => {
    const query = jest.fn();
    const clientQuery = jest.fn();
    const release = jest.fn();
    const pool = {
        query,
        connect: jest.fn(async () => ({ query: clientQuery, release })),
    };
    let store: PgRequestStore;

    beforeEach(() => {
        jest.resetAllMocks();
        pool.connect.mockImplementation(async () => ({ query: clientQuery, release }));
        store = new PgRequestStore(pool, { now: () => NOW });
    });

    describe('row mapping', () => {
        test('maps snake_case rows and normalises DATE values', () => {
            const request = toTrackedRequest(dbRow({ deadline: new Date(2025, 3, 7), filed_date: '2025-03-10' }));
            expect(request).toMatchObject({
                id: 1,
                agencyKey: 'USDA-APHIS',
                createdAt: '2025-03-01T09:30:00.000Z',
                filedDate: '2025-03-10',
                deadline: '2025-04-07',
                feeWaiverRequested: true,
            });
        });

        test('rejects rows with an unknown status', () => {
            expect(() => toTrackedRequest(dbRow({ status: 'LOST' }))).toThrow(ZodError);
        });
    });

    test('get returns null when no row matches', async () => {
        query.mockResolvedValueOnce({ rows: [], rowCount: 0 });
        expect(await store.get(42)).toBeNull();
        expect(query).toHaveBeenCalledWith('SELECT * FROM foia_requests WHERE id = $1', [42]);
    });

    describe('create', () => {
        test('inserts the provided columns with the creation time', async () => {
            query.mockResolvedValueOnce({ rows: [dbRow({ reference_id: 'REF-1' })], rowCount: 1 });

            const request = await store.create({
                agency: 'USDA APHIS',
                jurisdiction: 'US-Federal',
                topic: 'Inspection reports',
                referenceId: 'REF-1',
            });

            expect(request.referenceId).toBe('REF-1');
            expect(query).toHaveBeenCalledWith(
                'INSERT INTO foia_requests (agency, jurisdiction, topic, reference_id, request_text, created_at) '
                + 'VALUES ($1, $2, $3, $4, $5, $6) RETURNING *',
                ['USDA APHIS', 'US-Federal', 'Inspection reports', 'REF-1', '', NOW],
            );
        });

        test('maps unique violations to DuplicateReferenceError', async () => {
            query.mockRejectedValueOnce(Object.assign(new Error('duplicate key value'), { code: '23505' }));
            await expect(store.create({ agency: 'A', jurisdiction: 'UK', topic: 'T', referenceId: 'REF-1' }))
                .rejects.toThrow(DuplicateReferenceError);
        });

        test('propagates other storage errors unchanged', async () => {
            const failure = new Error('connection refused');
            query.mockRejectedValueOnce(failure);
            await expect(store.create({ agency: 'A', jurisdiction: 'UK', topic: 'T' })).rejects.toBe(failure);
        });
    });

    test('list builds its filter clauses and pagination', async () => {
        query.mockResolvedValueOnce({ rows: [dbRow()], rowCount: 1 });

        const rows = await store.list({ jurisdiction: 'UK', agency: 'home' });

        expect(rows).toHaveLength(1);
        expect(query).toHaveBeenCalledWith(
            'SELECT * FROM foia_requests WHERE jurisdiction = $1 AND position(lower($2) in lower(agency)) > 0 '
            + 'ORDER BY created_at DESC, id DESC LIMIT $3 OFFSET $4',
            ['UK', 'home', 100, 0],
        );
    });

    test('listOverdue compares the effective deadline with today and skips terminal statuses', async () => {
        query.mockResolvedValueOnce({ rows: [dbRow({ status: 'FILED', deadline: '2025-03-07' })], rowCount: 1 });

        const rows = await store.listOverdue();

        expect(rows.map(r => [r.id, r.deadline])).toEqual([[1, '2025-03-07']]);
        expect(query).toHaveBeenCalledWith(
            'SELECT * FROM foia_requests WHERE status <> ALL($1) AND COALESCE(extended_deadline, deadline) < $2::date ORDER BY id',
            [['COMPLETE', 'DENIED', 'WITHDRAWN', 'NO_RESPONSIVE_RECORDS'], '2025-03-10'],
        );
    });

    describe('updateStatus', () => {
        test('locks the row and updates it inside a transaction', async () => {
            clientQuery
                .mockResolvedValueOnce({ rows: [], rowCount: null })
                .mockResolvedValueOnce({ rows: [{ id: 1 }], rowCount: 1 })
                .mockResolvedValueOnce({ rows: [dbRow({ status: 'FILED', deadline: '2025-04-07' })], rowCount: 1 })
                .mockResolvedValueOnce({ rows: [], rowCount: null });

            const updated = await store.updateStatus(1, 'FILED', { deadline: '2025-04-07' });

            expect(updated?.status).toBe('FILED');
            expect(clientQuery.mock.calls).toEqual([
                ['BEGIN'],
                ['SELECT id FROM foia_requests WHERE id = $1 FOR UPDATE', [1]],
                ['UPDATE foia_requests SET deadline = $2, status = $3 WHERE id = $1 RETURNING *', [1, '2025-04-07', 'FILED']],
                ['COMMIT'],
            ]);
            expect(release).toHaveBeenCalledTimes(1);
        });

        test('returns null without updating when the row is missing', async () => {
            clientQuery.mockResolvedValue({ rows: [], rowCount: 0 });

            expect(await store.updateStatus(9, 'FILED')).toBeNull();
            expect(clientQuery.mock.calls.map(call => call[0])).toEqual([
                'BEGIN',
                'SELECT id FROM foia_requests WHERE id = $1 FOR UPDATE',
                'COMMIT',
            ]);
        });

        test('rolls back and rethrows when the update fails', async () => {
            const failure = new Error('deadlock detected');
            clientQuery
                .mockResolvedValueOnce({ rows: [], rowCount: null })
                .mockResolvedValueOnce({ rows: [{ id: 1 }], rowCount: 1 })
                .mockRejectedValueOnce(failure)
                .mockResolvedValueOnce({ rows: [], rowCount: null });

            await expect(store.updateStatus(1, 'DENIED')).rejects.toBe(failure);
            expect(clientQuery.mock.calls[3]).toEqual(['ROLLBACK']);
            expect(release).toHaveBeenCalledTimes(1);
        });
    });

    test('appendNote stamps the entry and appends it in SQL', async () => {
        query.mockResolvedValueOnce({ rows: [dbRow({ notes: '[2025-03-10 12:00] Called the FOIA office' })], rowCount: 1 });

        const noted = await store.appendNote(1, 'Called the FOIA office');

        expect(noted?.notes).toBe('[2025-03-10 12:00] Called the FOIA office');
        expect(query.mock.calls[0][1]).toEqual([1, '[2025-03-10 12:00] Called the FOIA office']);
    });

    test('recordResponse writes the response fields and derived status', async () => {
        query.mockResolvedValueOnce({ rows: [dbRow({ status: 'COMPLETE' })], rowCount: 1 });

        await store.recordResponse(1, { pagesReceived: 12 });

        expect(query.mock.calls[0]).toEqual([
            'UPDATE foia_requests SET docs_received = $2, pages_received = $3, pages_withheld = $4, exemptions_cited = $5, '
            + 'response_summary = $6, response_date = $7, status = $8 WHERE id = $1 RETURNING *',
            [1, 0, 12, 0, '', '', '2025-03-10', 'COMPLETE'],
        ]);
    });

    test('delete reports whether a row was removed', async () => {
        query.mockResolvedValueOnce({ rows: [], rowCount: 1 }).mockResolvedValueOnce({ rows: [], rowCount: 0 });
        expect(await store.delete(1)).toBe(true);
        expect(await store.delete(1)).toBe(false);
    });

    test('stats combines grouped counts with the overdue count', async () => {
        query
            .mockResolvedValueOnce({ rows: [{ status: 'FILED', count: 2 }, { status: 'DRAFT', count: '1' }], rowCount: 2 })
            .mockResolvedValueOnce({ rows: [{ count: 1 }], rowCount: 1 });

        const stats = await store.stats();

        expect(stats).toEqual({ total: 3, overdue: 1, byStatus: { DRAFT: 1, FILED: 2 } });
        expect(Object.keys(stats.byStatus)).toEqual(['DRAFT', 'FILED']);
    });
});

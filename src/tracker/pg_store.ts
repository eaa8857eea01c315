import { z } from 'zod';
import { REQUESTS_TABLE } from '../db/schema';
import {
    CreateRequestInput,
    Jurisdiction,
    ListRequestsFilter,
    REQUEST_STATUSES,
    RequestStats,
    RequestStatus,
    RequestUpdate,
    ResponseRecord,
    TERMINAL_STATUSES,
    TrackedRequest,
    isJurisdiction,
} from '../types/request_types';
import { toISODate } from '../utils/dates';
import {
    DEFAULT_LIST_LIMIT,
    DuplicateReferenceError,
    RequestStore,
    StoreOptions,
    appendNoteEntry,
    responseUpdate,
} from './request_store';

/** The slice of a pg Pool / PoolClient the store relies on. */
export interface SqlExecutor {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface SqlPool extends SqlExecutor {
    connect(): Promise<SqlExecutor & { release(): void }>;
}

type ColumnKey = keyof RequestUpdate | 'status';

const COLUMNS: Record<ColumnKey, string> = {
    referenceId: 'reference_id',
    agency: 'agency',
    agencyKey: 'agency_key',
    jurisdiction: 'jurisdiction',
    topic: 'topic',
    requestText: 'request_text',
    filedDate: 'filed_date',
    deadline: 'deadline',
    acknowledgedDate: 'acknowledged_date',
    extendedDate: 'extended_date',
    extendedDeadline: 'extended_deadline',
    responseDate: 'response_date',
    status: 'status',
    docsReceived: 'docs_received',
    pagesReceived: 'pages_received',
    pagesWithheld: 'pages_withheld',
    exemptionsCited: 'exemptions_cited',
    responseSummary: 'response_summary',
    filingMethod: 'filing_method',
    confirmationNumber: 'confirmation_number',
    assignedAnalyst: 'assigned_analyst',
    feePaid: 'fee_paid',
    feeWaiverRequested: 'fee_waiver_requested',
    feeWaiverGranted: 'fee_waiver_granted',
    appealFiled: 'appeal_filed',
    appealDate: 'appeal_date',
    appealBody: 'appeal_body',
    appealOutcome: 'appeal_outcome',
};

// DATE columns arrive as text or as a Date depending on the pool's type parsers
const dateColumn = z.union([z.string(), z.date()]).nullable()
    .transform(v => (v instanceof Date ? toISODate(v) : v));

const requestRowSchema = z.object({
    id: z.number().int(),
    reference_id: z.string().nullable(),
    agency: z.string(),
    agency_key: z.string().nullable(),
    jurisdiction: z.string().refine((v): v is Jurisdiction => isJurisdiction(v), 'Unrecognized jurisdiction'),
    topic: z.string(),
    request_text: z.string(),
    created_at: z.coerce.date(),
    filed_date: dateColumn,
    deadline: dateColumn,
    acknowledged_date: dateColumn,
    extended_date: dateColumn,
    extended_deadline: dateColumn,
    response_date: dateColumn,
    status: z.enum(REQUEST_STATUSES),
    docs_received: z.number().int(),
    pages_received: z.number().int(),
    pages_withheld: z.number().int(),
    exemptions_cited: z.string().nullable(),
    response_summary: z.string().nullable(),
    filing_method: z.string().nullable(),
    confirmation_number: z.string().nullable(),
    assigned_analyst: z.string().nullable(),
    fee_paid: z.string().nullable(),
    fee_waiver_requested: z.boolean(),
    fee_waiver_granted: z.boolean().nullable(),
    notes: z.string().nullable(),
    appeal_filed: z.boolean(),
    appeal_date: dateColumn,
    appeal_body: z.string().nullable(),
    appeal_outcome: z.string().nullable(),
}).transform((row): TrackedRequest => ({
    id: row.id,
    referenceId: row.reference_id,
    agency: row.agency,
    agencyKey: row.agency_key,
    jurisdiction: row.jurisdiction,
    topic: row.topic,
    requestText: row.request_text,
    createdAt: row.created_at.toISOString(),
    filedDate: row.filed_date,
    deadline: row.deadline,
    acknowledgedDate: row.acknowledged_date,
    extendedDate: row.extended_date,
    extendedDeadline: row.extended_deadline,
    responseDate: row.response_date,
    status: row.status,
    docsReceived: row.docs_received,
    pagesReceived: row.pages_received,
    pagesWithheld: row.pages_withheld,
    exemptionsCited: row.exemptions_cited,
    responseSummary: row.response_summary,
    filingMethod: row.filing_method,
    confirmationNumber: row.confirmation_number,
    assignedAnalyst: row.assigned_analyst,
    feePaid: row.fee_paid,
    feeWaiverRequested: row.fee_waiver_requested,
    feeWaiverGranted: row.fee_waiver_granted,
    notes: row.notes,
    appealFiled: row.appeal_filed,
    appealDate: row.appeal_date,
    appealBody: row.appeal_body,
    appealOutcome: row.appeal_outcome,
}));

const statsRowSchema = z.object({ status: z.enum(REQUEST_STATUSES), count: z.coerce.number().int() });
const countRowSchema = z.object({ count: z.coerce.number().int() });

export function toTrackedRequest(row: unknown): TrackedRequest {
    return requestRowSchema.parse(row);
}

const COLUMN_BY_KEY = new Map(Object.entries(COLUMNS));

/** Column/value pairs for the defined, mapped keys of a partial record. */
function assignments(fields: Partial<Record<ColumnKey, unknown>>): Array<[string, unknown]> {
    const pairs: Array<[string, unknown]> = [];
    for (const [key, value] of Object.entries(fields)) {
        const column = COLUMN_BY_KEY.get(key);
        if (column && value !== undefined) pairs.push([column, value]);
    }
    return pairs;
}

function isUniqueViolation(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}

/**
 * Postgres-backed store over the single `foia_requests` table. Status
 * changes lock the row inside a transaction, so concurrent writers to one
 * request apply one after the other.
 */
export class PgRequestStore implements RequestStore {
    private readonly pool: SqlPool;
    private readonly now: () => Date;

    constructor(pool: SqlPool, options: StoreOptions = {}) {
        this.pool = pool;
        this.now = options.now ?? (() => new Date());
    }

    public async create(input: CreateRequestInput): Promise<TrackedRequest> {
        const pairs = assignments({ ...input, requestText: input.requestText ?? '' });
        const columns = pairs.map(([column]) => column).join(', ');
        const placeholders = pairs.map((_, i) => `$${i + 1}`).join(', ');

        const result = await this.guardReference(input.referenceId, () => this.pool.query(
            `INSERT INTO ${REQUESTS_TABLE} (${columns}, created_at) VALUES (${placeholders}, $${pairs.length + 1}) RETURNING *`,
            [...pairs.map(([, value]) => value), this.now()],
        ));
        return toTrackedRequest(result.rows[0]);
    }

    public async get(id: number): Promise<TrackedRequest | null> {
        const result = await this.pool.query(`SELECT * FROM ${REQUESTS_TABLE} WHERE id = $1`, [id]);
        return result.rows.length > 0 ? toTrackedRequest(result.rows[0]) : null;
    }

    public async getByReference(referenceId: string): Promise<TrackedRequest | null> {
        const result = await this.pool.query(`SELECT * FROM ${REQUESTS_TABLE} WHERE reference_id = $1 LIMIT 1`, [referenceId]);
        return result.rows.length > 0 ? toTrackedRequest(result.rows[0]) : null;
    }

    public async list(filter: ListRequestsFilter = {}): Promise<TrackedRequest[]> {
        const clauses: string[] = [];
        const values: unknown[] = [];

        if (filter.jurisdiction) {
            values.push(filter.jurisdiction);
            clauses.push(`jurisdiction = $${values.length}`);
        }
        if (filter.status) {
            values.push(filter.status);
            clauses.push(`status = $${values.length}`);
        }
        if (filter.agency) {
            values.push(filter.agency);
            clauses.push(`position(lower($${values.length}) in lower(agency)) > 0`);
        }

        const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
        values.push(filter.limit ?? DEFAULT_LIST_LIMIT, filter.offset ?? 0);

        const result = await this.pool.query(
            `SELECT * FROM ${REQUESTS_TABLE} ${where} ORDER BY created_at DESC, id DESC LIMIT $${values.length - 1} OFFSET $${values.length}`,
            values,
        );
        return result.rows.map(toTrackedRequest);
    }

    public async listOverdue(): Promise<TrackedRequest[]> {
        const result = await this.pool.query(
            `SELECT * FROM ${REQUESTS_TABLE} WHERE status <> ALL($1) AND COALESCE(extended_deadline, deadline) < $2::date ORDER BY id`,
            [TERMINAL_STATUSES, toISODate(this.now())],
        );
        return result.rows.map(toTrackedRequest);
    }

    public async updateStatus(id: number, status: RequestStatus, updates: RequestUpdate = {}): Promise<TrackedRequest | null> {
        return this.withTransaction(async client => {
            const locked = await client.query(`SELECT id FROM ${REQUESTS_TABLE} WHERE id = $1 FOR UPDATE`, [id]);
            if (locked.rows.length === 0) return null;

            const pairs = assignments({ ...updates, status });
            const sets = pairs.map(([column], i) => `${column} = $${i + 2}`).join(', ');
            const result = await this.guardReference(updates.referenceId, () => client.query(
                `UPDATE ${REQUESTS_TABLE} SET ${sets} WHERE id = $1 RETURNING *`,
                [id, ...pairs.map(([, value]) => value)],
            ));
            return toTrackedRequest(result.rows[0]);
        });
    }

    public async appendNote(id: number, text: string): Promise<TrackedRequest | null> {
        const entry = appendNoteEntry(null, text, this.now());
        const result = await this.pool.query(
            `UPDATE ${REQUESTS_TABLE}
             SET notes = CASE WHEN notes IS NULL OR notes = '' THEN $2 ELSE notes || E'\\n' || $2 END
             WHERE id = $1 RETURNING *`,
            [id, entry],
        );
        return result.rows.length > 0 ? toTrackedRequest(result.rows[0]) : null;
    }

    public async recordResponse(id: number, response: ResponseRecord): Promise<TrackedRequest | null> {
        const pairs = assignments(responseUpdate(response, toISODate(this.now())));
        const sets = pairs.map(([column], i) => `${column} = $${i + 2}`).join(', ');
        const result = await this.pool.query(
            `UPDATE ${REQUESTS_TABLE} SET ${sets} WHERE id = $1 RETURNING *`,
            [id, ...pairs.map(([, value]) => value)],
        );
        return result.rows.length > 0 ? toTrackedRequest(result.rows[0]) : null;
    }

    public async delete(id: number): Promise<boolean> {
        const result = await this.pool.query(`DELETE FROM ${REQUESTS_TABLE} WHERE id = $1`, [id]);
        return (result.rowCount ?? 0) > 0;
    }

    public async stats(): Promise<RequestStats> {
        const grouped = await this.pool.query(`SELECT status, COUNT(*)::int AS count FROM ${REQUESTS_TABLE} GROUP BY status`);
        const counts = new Map(grouped.rows.map(row => {
            const parsed = statsRowSchema.parse(row);
            return [parsed.status, parsed.count] as const;
        }));

        const overdue = await this.pool.query(
            `SELECT COUNT(*)::int AS count FROM ${REQUESTS_TABLE} WHERE status <> ALL($1) AND COALESCE(extended_deadline, deadline) < $2::date`,
            [TERMINAL_STATUSES, toISODate(this.now())],
        );

        const byStatus: Partial<Record<RequestStatus, number>> = {};
        let total = 0;
        for (const status of REQUEST_STATUSES) {
            const count = counts.get(status) ?? 0;
            if (count > 0) byStatus[status] = count;
            total += count;
        }
        return { total, overdue: countRowSchema.parse(overdue.rows[0]).count, byStatus };
    }

    private async withTransaction<T>(work: (client: SqlExecutor) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        try {
            await client.query('BEGIN');
            const result = await work(client);
            await client.query('COMMIT');
            return result;
        } catch (err) {
            await client.query('ROLLBACK');
            throw err;
        } finally {
            client.release();
        }
    }

    private async guardReference<T>(referenceId: string | null | undefined, run: () => Promise<T>): Promise<T> {
        try {
            return await run();
        } catch (err) {
            if (referenceId && isUniqueViolation(err)) throw new DuplicateReferenceError(referenceId);
            throw err;
        }
    }
}

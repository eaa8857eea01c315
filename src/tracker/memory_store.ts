import {
    CreateRequestInput,
    ListRequestsFilter,
    REQUEST_STATUSES,
    RequestStats,
    RequestStatus,
    RequestUpdate,
    ResponseRecord,
    TrackedRequest,
} from '../types/request_types';
import { toISODate } from '../utils/dates';
import {
    DEFAULT_LIST_LIMIT,
    DuplicateReferenceError,
    RequestStore,
    StoreOptions,
    appendNoteEntry,
    blankRequest,
    isOverdue,
    responseUpdate,
    withoutUndefined,
} from './request_store';

/**
 * Map-backed store for development without a database and for tests.
 * Records are copied on the way in and out so callers never hold live state.
 */
export class InMemoryRequestStore implements RequestStore {
    private requests: Map<number, TrackedRequest> = new Map();
    private nextId = 1;
    private readonly now: () => Date;

    constructor(options: StoreOptions = {}) {
        this.now = options.now ?? (() => new Date());
    }

    public async create(input: CreateRequestInput): Promise<TrackedRequest> {
        if (input.referenceId != null) this.assertReferenceFree(input.referenceId, null);

        const request = blankRequest(this.nextId++, this.now().toISOString(), input);
        this.requests.set(request.id, request);
        return { ...request };
    }

    public async get(id: number): Promise<TrackedRequest | null> {
        const request = this.requests.get(id);
        return request ? { ...request } : null;
    }

    public async getByReference(referenceId: string): Promise<TrackedRequest | null> {
        for (const request of this.requests.values()) {
            if (request.referenceId === referenceId) return { ...request };
        }
        return null;
    }

    public async list(filter: ListRequestsFilter = {}): Promise<TrackedRequest[]> {
        const limit = filter.limit ?? DEFAULT_LIST_LIMIT;
        const offset = filter.offset ?? 0;
        const agency = filter.agency?.toLowerCase();

        return Array.from(this.requests.values())
            .filter(r => !filter.jurisdiction || r.jurisdiction === filter.jurisdiction)
            .filter(r => !filter.status || r.status === filter.status)
            .filter(r => !agency || r.agency.toLowerCase().includes(agency))
            .sort(newestFirst)
            .slice(offset, offset + limit)
            .map(r => ({ ...r }));
    }

    public async listOverdue(): Promise<TrackedRequest[]> {
        const today = this.now();
        return Array.from(this.requests.values())
            .filter(r => isOverdue(r, today))
            .map(r => ({ ...r }));
    }

    public async updateStatus(id: number, status: RequestStatus, updates: RequestUpdate = {}): Promise<TrackedRequest | null> {
        const current = this.requests.get(id);
        if (!current) return null;
        if (updates.referenceId != null) this.assertReferenceFree(updates.referenceId, id);

        const updated: TrackedRequest = { ...current, ...withoutUndefined(updates), status };
        this.requests.set(id, updated);
        return { ...updated };
    }

    public async appendNote(id: number, text: string): Promise<TrackedRequest | null> {
        const current = this.requests.get(id);
        if (!current) return null;

        const updated: TrackedRequest = { ...current, notes: appendNoteEntry(current.notes, text, this.now()) };
        this.requests.set(id, updated);
        return { ...updated };
    }

    public async recordResponse(id: number, response: ResponseRecord): Promise<TrackedRequest | null> {
        const current = this.requests.get(id);
        if (!current) return null;

        const updated: TrackedRequest = { ...current, ...responseUpdate(response, toISODate(this.now())) };
        this.requests.set(id, updated);
        return { ...updated };
    }

    public async delete(id: number): Promise<boolean> {
        return this.requests.delete(id);
    }

    public async stats(): Promise<RequestStats> {
        const all = Array.from(this.requests.values());
        const today = this.now();
        const byStatus: Partial<Record<RequestStatus, number>> = {};
        for (const status of REQUEST_STATUSES) {
            const count = all.filter(r => r.status === status).length;
            if (count > 0) byStatus[status] = count;
        }
        return {
            total: all.length,
            overdue: all.filter(r => isOverdue(r, today)).length,
            byStatus,
        };
    }

    private assertReferenceFree(referenceId: string, ownerId: number | null) {
        for (const request of this.requests.values()) {
            if (request.referenceId === referenceId && request.id !== ownerId) {
                throw new DuplicateReferenceError(referenceId);
            }
        }
    }
}

function newestFirst(a: TrackedRequest, b: TrackedRequest): number {
    if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
    return b.id - a.id;
}

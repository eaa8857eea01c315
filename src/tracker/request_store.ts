import { differenceInCalendarDays } from 'date-fns';
import {
    CreateRequestInput,
    ISODate,
    ListRequestsFilter,
    RequestStats,
    RequestStatus,
    RequestUpdate,
    ResponseRecord,
    TERMINAL_STATUSES,
    TrackedRequest,
} from '../types/request_types';
import { fromISODate, noteTimestamp } from '../utils/dates';

export const DEFAULT_LIST_LIMIT = 100;

export interface StoreOptions {
    /** Clock used for creation stamps, note stamps and "today". */
    now?: () => Date;
}

/**
 * Persistence contract for tracked requests. Lookups and mutations on an
 * unknown id resolve to null (or false for delete); storage failures reject.
 */
export interface RequestStore {
    create(input: CreateRequestInput): Promise<TrackedRequest>;
    get(id: number): Promise<TrackedRequest | null>;
    getByReference(referenceId: string): Promise<TrackedRequest | null>;
    /** Newest-created first. */
    list(filter?: ListRequestsFilter): Promise<TrackedRequest[]>;
    listOverdue(): Promise<TrackedRequest[]>;
    updateStatus(id: number, status: RequestStatus, updates?: RequestUpdate): Promise<TrackedRequest | null>;
    appendNote(id: number, text: string): Promise<TrackedRequest | null>;
    /** Sets the response facts; status becomes PARTIAL_RESPONSE when pages were withheld, else COMPLETE. */
    recordResponse(id: number, response: ResponseRecord): Promise<TrackedRequest | null>;
    delete(id: number): Promise<boolean>;
    stats(): Promise<RequestStats>;
}

export class DuplicateReferenceError extends Error {
    public readonly referenceId: string;

    constructor(referenceId: string) {
        super(`A request with reference '${referenceId}' already exists`);
        this.name = 'DuplicateReferenceError';
        this.referenceId = referenceId;
    }
}

// --- Derivations shared by stores and the alert engine ---

/** The extended deadline when one is set, else the original deadline. */
export function effectiveDeadline(request: Pick<TrackedRequest, 'deadline' | 'extendedDeadline'>): ISODate | null {
    return request.extendedDeadline ?? request.deadline;
}

export function isTerminal(status: RequestStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

/** Calendar days from `today` to the effective deadline; negative once it has passed. */
export function daysUntilDeadline(request: Pick<TrackedRequest, 'deadline' | 'extendedDeadline'>, today: Date = new Date()): number | null {
    const deadline = effectiveDeadline(request);
    if (deadline === null) return null;
    return differenceInCalendarDays(fromISODate(deadline), today);
}

export function isOverdue(request: Pick<TrackedRequest, 'status' | 'deadline' | 'extendedDeadline'>, today: Date = new Date()): boolean {
    if (isTerminal(request.status)) return false;
    const days = daysUntilDeadline(request, today);
    return days !== null && days < 0;
}

export function appendNoteEntry(existing: string | null, text: string, now: Date): string {
    const entry = `[${noteTimestamp(now)}] ${text}`;
    return existing ? `${existing}\n${entry}` : entry;
}

/** Response fields plus the status they imply. */
export function responseUpdate(response: ResponseRecord, today: ISODate): RequestUpdate & { status: RequestStatus } {
    const pagesWithheld = response.pagesWithheld ?? 0;
    return {
        docsReceived: response.docsReceived ?? 0,
        pagesReceived: response.pagesReceived ?? 0,
        pagesWithheld,
        exemptionsCited: response.exemptionsCited ?? '',
        responseSummary: response.responseSummary ?? '',
        responseDate: response.responseDate ?? today,
        status: pagesWithheld > 0 ? 'PARTIAL_RESPONSE' : 'COMPLETE',
    };
}

export function blankRequest(id: number, createdAt: string, input: CreateRequestInput): TrackedRequest {
    return {
        referenceId: null,
        agencyKey: null,
        requestText: '',
        filedDate: null,
        deadline: null,
        acknowledgedDate: null,
        extendedDate: null,
        extendedDeadline: null,
        responseDate: null,
        status: 'DRAFT',
        docsReceived: 0,
        pagesReceived: 0,
        pagesWithheld: 0,
        exemptionsCited: null,
        responseSummary: null,
        filingMethod: null,
        confirmationNumber: null,
        assignedAnalyst: null,
        feePaid: null,
        feeWaiverRequested: true,
        feeWaiverGranted: null,
        notes: null,
        appealFiled: false,
        appealDate: null,
        appealBody: null,
        appealOutcome: null,
        ...withoutUndefined(input),
        agency: input.agency,
        jurisdiction: input.jurisdiction,
        topic: input.topic,
        id,
        createdAt,
    };
}

/** Drops keys whose value is undefined so they cannot clobber defaults on spread. */
export function withoutUndefined<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key in value) {
        if (Object.hasOwn(value, key) && value[key] !== undefined) result[key] = value[key];
    }
    return result;
}

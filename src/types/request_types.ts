export type StateJurisdiction = `US-State-${string}`;

export type Jurisdiction = 'US-Federal' | 'India' | 'UK' | 'EU' | StateJurisdiction;

export const REQUEST_STATUSES = [
    'DRAFT',
    'FILED',
    'ACKNOWLEDGED',
    'PROCESSING',
    'EXTENDED',
    'PARTIAL_RESPONSE',
    'COMPLETE',
    'DENIED',
    'APPEALED',
    'APPEAL_WON',
    'APPEAL_DENIED',
    'LITIGATION',
    'WITHDRAWN',
    'NO_RESPONSIVE_RECORDS',
] as const;

export type RequestStatus = typeof REQUEST_STATUSES[number];

/** Statuses that can never be overdue, whatever their dates say. */
export const TERMINAL_STATUSES: readonly RequestStatus[] = ['COMPLETE', 'DENIED', 'WITHDRAWN', 'NO_RESPONSIVE_RECORDS'];

/** ISO calendar date, `YYYY-MM-DD`. */
export type ISODate = string;

export interface TrackedRequest {
    id: number;
    referenceId: string | null;
    agency: string;
    agencyKey: string | null;
    jurisdiction: Jurisdiction;
    topic: string;
    requestText: string;

    createdAt: string;
    filedDate: ISODate | null;
    deadline: ISODate | null;
    acknowledgedDate: ISODate | null;
    extendedDate: ISODate | null;
    extendedDeadline: ISODate | null;
    responseDate: ISODate | null;

    status: RequestStatus;

    docsReceived: number;
    pagesReceived: number;
    pagesWithheld: number;
    exemptionsCited: string | null;
    responseSummary: string | null;

    filingMethod: string | null;
    confirmationNumber: string | null;
    assignedAnalyst: string | null;
    feePaid: string | null;
    feeWaiverRequested: boolean;
    feeWaiverGranted: boolean | null;

    notes: string | null;

    appealFiled: boolean;
    appealDate: ISODate | null;
    appealBody: string | null;
    appealOutcome: string | null;
}

/**
 * Fields a caller may set alongside a status change. Identity, creation time
 * and the note log are excluded: notes only grow through `appendNote`.
 */
export type RequestUpdate = Partial<Omit<TrackedRequest, 'id' | 'createdAt' | 'status' | 'notes'>>;

export type CreateRequestInput = Pick<TrackedRequest, 'agency' | 'jurisdiction' | 'topic'>
    & Partial<Pick<TrackedRequest, 'requestText' | 'status'>>
    & RequestUpdate;

export interface ListRequestsFilter {
    jurisdiction?: string;
    status?: RequestStatus;
    /** Case-insensitive substring of the agency name. */
    agency?: string;
    limit?: number;
    offset?: number;
}

export interface ResponseRecord {
    docsReceived?: number;
    pagesReceived?: number;
    pagesWithheld?: number;
    exemptionsCited?: string;
    responseSummary?: string;
    responseDate?: ISODate;
}

export interface RequestStats {
    total: number;
    overdue: number;
    byStatus: Partial<Record<RequestStatus, number>>;
}

export function isRequestStatus(value: string): value is RequestStatus {
    return REQUEST_STATUSES.some(status => status === value);
}

export function isJurisdiction(value: string): value is Jurisdiction {
    return value === 'US-Federal' || value === 'India' || value === 'UK' || value === 'EU' || value.startsWith('US-State-');
}

export function isUSJurisdiction(jurisdiction: string): boolean {
    return jurisdiction === 'US-Federal' || jurisdiction.startsWith('US-State');
}

import { ISODate, RequestStatus, TrackedRequest } from '../types/request_types';
import { RequestStore, daysUntilDeadline, effectiveDeadline } from './request_store';

export type AlertSeverity = 'OVERDUE' | 'URGENT' | 'WARNING' | 'INFO';

export interface Alert {
    requestId: number;
    agency: string;
    jurisdiction: string;
    topic: string;
    severity: AlertSeverity;
    message: string;
    /** Negative when overdue. */
    daysRemaining: number;
    deadline: ISODate;
    suggestedAction: string;
}

/** Upper bound, in days remaining, of each non-overdue severity. */
export const ALERT_THRESHOLDS = {
    URGENT: 2,
    WARNING: 5,
    INFO: 10,
} as const;

const SEVERITY_RANK: Record<AlertSeverity, number> = {
    OVERDUE: 0,
    URGENT: 1,
    WARNING: 2,
    INFO: 3,
};

export const ACTIVE_STATUSES: readonly RequestStatus[] = ['FILED', 'ACKNOWLEDGED', 'PROCESSING', 'EXTENDED', 'APPEALED'];

// Scans read every active request of a status in one page
const SCAN_LIMIT = 10000;

export interface AlertEngineOptions {
    now?: () => Date;
}

/**
 * Classifies active requests by how close they are to their effective
 * deadline. Produces alert records only; delivery belongs to the caller.
 */
export class AlertEngine {
    private readonly store: RequestStore;
    private readonly now: () => Date;

    constructor(store: RequestStore, options: AlertEngineOptions = {}) {
        this.store = store;
        this.now = options.now ?? (() => new Date());
    }

    /** Most severe first, then fewest days remaining. */
    public async checkAll(): Promise<Alert[]> {
        const today = this.now();
        const alerts: Alert[] = [];

        for (const status of ACTIVE_STATUSES) {
            const requests = await this.store.list({ status, limit: SCAN_LIMIT });
            for (const request of requests) {
                const alert = classifyRequest(request, today);
                if (alert) alerts.push(alert);
            }
        }

        return alerts.sort((a, b) =>
            SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] || a.daysRemaining - b.daysRemaining);
    }

    public async checkOverdue(): Promise<Alert[]> {
        const alerts = await this.checkAll();
        return alerts.filter(a => a.severity === 'OVERDUE');
    }

    /** Deadlines still ahead and at most `withinDays` away. */
    public async checkUpcoming(withinDays: number = 7): Promise<Alert[]> {
        const alerts = await this.checkAll();
        return alerts.filter(a => a.daysRemaining > 0 && a.daysRemaining <= withinDays);
    }
}

export function classifyRequest(request: TrackedRequest, today: Date): Alert | null {
    const deadline = effectiveDeadline(request);
    const daysRemaining = daysUntilDeadline(request, today);
    if (deadline === null || daysRemaining === null) return null;

    const base = {
        requestId: request.id,
        agency: request.agency,
        jurisdiction: request.jurisdiction,
        topic: request.topic,
        daysRemaining,
        deadline,
    };

    if (daysRemaining < 0) {
        return {
            ...base,
            severity: 'OVERDUE',
            message: `Response is ${-daysRemaining} day(s) overdue. Deadline was ${deadline}.`,
            suggestedAction: overdueAction(request.jurisdiction),
        };
    }

    let severity: AlertSeverity;
    if (daysRemaining <= ALERT_THRESHOLDS.URGENT) severity = 'URGENT';
    else if (daysRemaining <= ALERT_THRESHOLDS.WARNING) severity = 'WARNING';
    else if (daysRemaining <= ALERT_THRESHOLDS.INFO) severity = 'INFO';
    else return null;

    return {
        ...base,
        severity,
        message: `Deadline in ${daysRemaining} day(s) (${deadline}).`,
        suggestedAction: upcomingAction(daysRemaining),
    };
}

export function overdueAction(jurisdiction: string): string {
    switch (jurisdiction) {
        case 'US-Federal':
            return 'Send a follow-up letter citing 5 U.S.C. Section 552(a)(6)(A). Consider filing an administrative '
                + 'appeal or contacting OGIS (ogis@nara.gov). Constructive denial of request may entitle you to '
                + 'immediate appeal.';
        case 'India':
            return 'File a first appeal under Section 19(1) of the RTI Act with the First Appellate Authority. '
                + `The PIO's failure to respond within 30 days is deemed a refusal.`;
        case 'UK':
            return 'Send a follow-up citing Section 10(1) of FOIA 2000. Request an internal review. If no response '
                + 'within a reasonable time, complain to the ICO.';
        case 'EU':
            return `The institution's silence after 15 working days constitutes an implied refusal. File a `
                + 'confirmatory application under Article 7(2) of Regulation 1049/2001.';
        default:
            return 'Send a follow-up letter and prepare an appeal.';
    }
}

function upcomingAction(daysRemaining: number): string {
    if (daysRemaining <= ALERT_THRESHOLDS.URGENT) {
        return 'Prepare appeal materials. Follow up with the agency immediately.';
    }
    if (daysRemaining <= ALERT_THRESHOLDS.WARNING) {
        return 'Send a courtesy follow-up to the FOIA officer inquiring about status.';
    }
    return 'Monitor. No action required yet.';
}

/** Plain-text rendering for message channels. */
export function formatAlertText(alert: Alert): string {
    return [
        `[${alert.severity}] Request #${alert.requestId} - ${alert.agency}`,
        `  Topic: ${alert.topic}`,
        `  ${alert.message}`,
        `  Action: ${alert.suggestedAction}`,
    ].join('\n');
}

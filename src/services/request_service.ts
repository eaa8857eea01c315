import { RedactionDetector, RedactionReport } from '../analysis/redaction_detector';
import { ResponseParser } from '../analysis/response_parser';
import { ParsedResponse } from '../types/analysis_types';
import { ISODate, TrackedRequest } from '../types/request_types';
import { DeadlineCalculator } from '../tracker/deadlines';
import { RequestStore } from '../tracker/request_store';
import { fromISODate, toISODate } from '../utils/dates';

/** A lifecycle step that the request's current state or jurisdiction does not allow. */
export class LifecycleError extends Error {
    public readonly requestId: number;

    constructor(requestId: number, message: string) {
        super(message);
        this.name = 'LifecycleError';
        this.requestId = requestId;
    }
}

export interface RequestServiceDeps {
    store: RequestStore;
    calculator?: DeadlineCalculator;
    parser?: ResponseParser;
    detector?: RedactionDetector;
    now?: () => Date;
}

export interface FilingDetails {
    filedDate?: ISODate;
    filingMethod?: string;
    confirmationNumber?: string;
}

export interface AppealDetails {
    appealBody: string;
    appealDate?: ISODate;
}

export interface ResponseAnalysis {
    request: TrackedRequest;
    parsed: ParsedResponse;
    report: RedactionReport;
}

/**
 * Lifecycle steps that span components: deadlines come from the calculator,
 * replies go through the parser and detector, and every result lands in the
 * store. Each step resolves to null when the request does not exist.
 */
export class RequestService {
    private readonly store: RequestStore;
    private readonly calculator: DeadlineCalculator;
    private readonly parser: ResponseParser;
    private readonly detector: RedactionDetector;
    private readonly now: () => Date;

    constructor(deps: RequestServiceDeps) {
        this.store = deps.store;
        this.calculator = deps.calculator ?? new DeadlineCalculator();
        this.parser = deps.parser ?? new ResponseParser();
        this.detector = deps.detector ?? new RedactionDetector();
        this.now = deps.now ?? (() => new Date());
    }

    public async fileRequest(id: number, details: FilingDetails = {}): Promise<TrackedRequest | null> {
        const request = await this.store.get(id);
        if (!request) return null;

        const filedDate = details.filedDate ?? this.today();
        const deadline = toISODate(this.calculator.computeDeadline(request.jurisdiction, fromISODate(filedDate)));

        console.log(`[Lifecycle] Request #${id} filed with ${request.agency} on ${filedDate}, due ${deadline}`);
        return this.store.updateStatus(id, 'FILED', {
            filedDate,
            deadline,
            filingMethod: details.filingMethod,
            confirmationNumber: details.confirmationNumber,
        });
    }

    public async invokeExtension(id: number, details: { extendedDate?: ISODate } = {}): Promise<TrackedRequest | null> {
        const request = await this.store.get(id);
        if (!request) return null;

        if (!request.deadline) {
            throw new LifecycleError(id, `Request #${id} has no deadline to extend`);
        }
        const extended = this.calculator.computeExtension(request.jurisdiction, fromISODate(request.deadline));
        if (!extended) {
            throw new LifecycleError(id, `${request.jurisdiction} grants no statutory extension`);
        }

        const extendedDeadline = toISODate(extended);
        console.log(`[Lifecycle] Request #${id} extended from ${request.deadline} to ${extendedDeadline}`);
        return this.store.updateStatus(id, 'EXTENDED', {
            extendedDate: details.extendedDate ?? this.today(),
            extendedDeadline,
        });
    }

    public async recordAppeal(id: number, details: AppealDetails): Promise<TrackedRequest | null> {
        const request = await this.store.get(id);
        if (!request) return null;

        console.log(`[Lifecycle] Appeal recorded for request #${id}`);
        return this.store.updateStatus(id, 'APPEALED', {
            appealFiled: true,
            appealDate: details.appealDate ?? this.today(),
            appealBody: details.appealBody,
        });
    }

    /** Parses an agency reply, scores it, and records it against the request. */
    public async analyzeResponse(id: number, text: string, options: { responseDate?: ISODate } = {}): Promise<ResponseAnalysis | null> {
        const request = await this.store.get(id);
        if (!request) return null;

        const parsed = this.parser.parse(text, request.jurisdiction);
        const report = this.detector.analyze(parsed, request.jurisdiction);

        const recorded = await this.store.recordResponse(id, {
            pagesReceived: parsed.pagesReleased,
            pagesWithheld: parsed.pagesWithheldFull,
            exemptionsCited: parsed.exemptions.join(', '),
            responseSummary: report.summary,
            responseDate: options.responseDate,
        });
        if (!recorded) return null;

        const score = Math.round(report.riskScore * 100);
        const noted = await this.store.appendNote(id, `Response analysed: ${parsed.determination}, risk score ${score}%`);

        console.log(`[Lifecycle] Request #${id} response: ${parsed.determination}, ${report.flags.length} flag(s)`);
        return { request: noted ?? recorded, parsed, report };
    }

    private today(): ISODate {
        return toISODate(this.now());
    }
}

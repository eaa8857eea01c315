export type Determination = 'full_grant' | 'partial_grant' | 'denial' | 'no_records' | 'unknown';

export interface ParsedResponse {
    determination: Determination;
    /** Deduplicated, sorted exemption codes in the jurisdiction's citation form. */
    exemptions: string[];
    /** Code → description, for codes the jurisdiction's table knows. */
    exemptionDetails: Record<string, string>;
    pagesReleased: number;
    pagesWithheldFull: number;
    pagesWithheldPartial: number;
    pagesReferred: number;
    trackingNumber: string;
    feeCharged: number | null;
    /** null when the letter does not mention a fee waiver. */
    feeWaiverGranted: boolean | null;
    assignedAnalyst: string;
    rawText: string;
}

export type FlagSeverity = 'high' | 'medium' | 'low';

export interface RedactionFlag {
    severity: FlagSeverity;
    category: string;
    description: string;
    recommendation: string;
    exemption?: string;
}

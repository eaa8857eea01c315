import { FlagSeverity, ParsedResponse, RedactionFlag } from '../types/analysis_types';
import { isUSJurisdiction } from '../types/request_types';

const SEVERITY_WEIGHTS: Record<FlagSeverity, number> = {
    high: 0.4,
    medium: 0.2,
    low: 0.1,
};

export const APPEAL_THRESHOLD = 0.3;

/**
 * Ordered findings for one response. Score, appeal recommendation and summary
 * are derived from the current flags whenever they are read.
 */
export class RedactionReport {
    public readonly flags: RedactionFlag[] = [];

    public addFlag(flag: RedactionFlag): void {
        this.flags.push(flag);
    }

    /** Sum of severity weights, capped at 1. */
    public get riskScore(): number {
        const total = this.flags.reduce((sum, f) => sum + (SEVERITY_WEIGHTS[f.severity] ?? 0.1), 0);
        return Math.min(1, total);
    }

    public get appealRecommended(): boolean {
        return this.riskScore >= APPEAL_THRESHOLD;
    }

    public get summary(): string {
        if (this.flags.length === 0) return 'No suspicious patterns detected in the agency response.';

        const parts: string[] = [];
        for (const severity of ['high', 'medium', 'low'] as const) {
            const count = this.flags.filter(f => f.severity === severity).length;
            if (count > 0) parts.push(`${count} ${severity}-severity`);
        }
        return `Detected ${parts.join(', ')} issue(s). `
            + `Overall risk score: ${Math.round(this.riskScore * 100)}%. `
            + (this.appealRecommended ? 'Appeal recommended.' : 'Monitor closely.');
    }

    public toJSON() {
        return {
            flags: this.flags,
            riskScore: this.riskScore,
            appealRecommended: this.appealRecommended,
            summary: this.summary,
        };
    }
}

export function formatReport(report: RedactionReport): string {
    const lines = [
        'REDACTION ANALYSIS REPORT',
        `Risk Score: ${(report.riskScore * 100).toFixed(1)}%`,
        `Appeal Recommended: ${report.appealRecommended ? 'Yes' : 'No'}`,
        `Flags Found: ${report.flags.length}`,
        '',
    ];

    report.flags.forEach((flag, i) => {
        lines.push(`--- Flag ${i + 1} [${flag.severity.toUpperCase()}] ---`);
        lines.push(`Category: ${flag.category}`);
        lines.push(`Issue: ${flag.description}`);
        if (flag.exemption) lines.push(`Exemption: ${flag.exemption}`);
        lines.push(`Recommendation: ${flag.recommendation}`);
        lines.push('');
    });

    if (report.appealRecommended) {
        lines.push(
            'RECOMMENDATION: Based on the patterns detected, an appeal is recommended. The withholdings show '
            + 'indicators of potential over-redaction or improper exemption usage.',
        );
    }
    return lines.join('\n');
}

export class RedactionDetector {
    public analyze(parsed: ParsedResponse, jurisdiction: string = 'US-Federal'): RedactionReport {
        const report = new RedactionReport();

        if (isUSJurisdiction(jurisdiction)) {
            this.checkExcessiveWithholding(parsed, report);
            this.checkMultipleExemptions(parsed, report);
            this.checkBlanketDenial(parsed, report);
            this.checkSegregability(parsed, report);
            this.checkExemptionCitations(parsed, report);
            this.checkVaughnIndex(parsed, report);
        } else if (jurisdiction === 'UK') {
            this.checkExcessiveWithholding(parsed, report);
            this.checkUKExemptions(parsed, report);
        } else if (jurisdiction === 'India') {
            this.checkExcessiveWithholding(parsed, report);
            this.checkIndiaExemptions(parsed, report);
        }

        return report;
    }

    // --- Shared ---

    private checkExcessiveWithholding(parsed: ParsedResponse, report: RedactionReport) {
        const total = parsed.pagesReleased + parsed.pagesWithheldFull;
        if (total === 0) return;

        const ratio = parsed.pagesWithheldFull / total;
        const percent = Math.round(ratio * 100);
        if (ratio > 0.8) {
            report.addFlag(createFlag(
                'high',
                'Excessive Withholding',
                `${parsed.pagesWithheldFull} of ${total} pages (${percent}%) were withheld in full. This ratio is `
                + 'unusually high and may indicate over-classification or blanket withholding.',
                'Appeal the withholding. Request a Vaughn index detailing the justification for each withheld document.',
            ));
        } else if (ratio > 0.5) {
            report.addFlag(createFlag(
                'medium',
                'High Withholding Rate',
                `${percent}% of pages withheld. Review exemption justifications carefully.`,
                'Request more detailed justification for each category of withheld records.',
            ));
        }
    }

    // --- US federal and state ---

    private checkMultipleExemptions(parsed: ParsedResponse, report: RedactionReport) {
        if (parsed.exemptions.length < 4) return;
        report.addFlag(createFlag(
            'medium',
            'Multiple Exemptions',
            `${parsed.exemptions.length} different exemptions cited. Using many exemptions for a single request `
            + `may indicate a 'kitchen sink' approach to withholding.`,
            'Challenge each exemption individually. Agencies must justify each exemption for each specific withholding.',
        ));
    }

    private checkBlanketDenial(parsed: ParsedResponse, report: RedactionReport) {
        if (parsed.determination !== 'denial' || parsed.pagesReleased !== 0) return;
        report.addFlag(createFlag(
            'high',
            'Blanket Denial',
            'The entire request was denied with no records released. Total denials warrant close scrutiny.',
            'File an appeal. Under 5 U.S.C. Section 552(b), the agency must demonstrate that an exemption applies '
            + 'to each withheld record. A blanket denial without document-by-document review is improper.',
        ));
    }

    private checkSegregability(parsed: ParsedResponse, report: RedactionReport) {
        if (parsed.pagesWithheldFull === 0 || parsed.pagesWithheldPartial !== 0) return;
        report.addFlag(createFlag(
            'medium',
            'No Partial Releases',
            'All withheld pages were withheld in full with no partial redactions. Under FOIA, agencies must '
            + 'release all reasonably segregable non-exempt portions.',
            `Challenge on segregability grounds. Cite 5 U.S.C. Section 552(b) (final sentence): 'Any reasonably `
            + `segregable portion of a record shall be provided.'`,
        ));
    }

    private checkExemptionCitations(parsed: ParsedResponse, report: RedactionReport) {
        const cites = (n: number) => parsed.exemptions.some(e => e.includes(`(${n})`));

        if (cites(4)) {
            report.addFlag(createFlag(
                'low',
                'Exemption 4 - Trade Secrets',
                'Exemption (b)(4) was cited. In the context of animal agriculture, this exemption is sometimes '
                + 'improperly applied to shield routine operational data.',
                'Verify whether the submitter was given notice under Executive Order 12600. Challenge if the '
                + 'information was submitted to the government voluntarily or is already publicly available.',
                '(b)(4)',
            ));
        }
        if (cites(5)) {
            report.addFlag(createFlag(
                'medium',
                'Exemption 5 - Deliberative Process',
                'Exemption (b)(5) is the most abused FOIA exemption. It requires the document be both predecisional '
                + 'AND deliberative. Factual material embedded in deliberative documents must be segregated and released.',
                'Challenge by arguing: (1) the document contains segregable factual material; (2) the decision has '
                + 'been made, so the privilege no longer protects; or (3) the document is not truly deliberative. '
                + 'Cite NLRB v. Sears.',
                '(b)(5)',
            ));
        }
        if (cites(7)) {
            report.addFlag(createFlag(
                'medium',
                'Exemption 7 - Law Enforcement',
                'Exemption (b)(7) requires a law enforcement nexus. Routine inspection records (e.g., USDA-APHIS '
                + 'Animal Welfare Act inspections, FSIS slaughter inspections) may not qualify as '
                + `'law enforcement' records under this exemption.`,
                'Challenge the law enforcement nexus. Argue that regulatory inspections for compliance purposes '
                + `are not compiled for 'law enforcement purposes' within the meaning of Exemption 7.`,
                '(b)(7)',
            ));
        }
    }

    private checkVaughnIndex(parsed: ParsedResponse, report: RedactionReport) {
        const withholding = parsed.determination === 'denial' || parsed.determination === 'partial_grant';
        if (parsed.pagesWithheldFull <= 10 || !withholding) return;
        if (parsed.rawText.toLowerCase().includes('vaughn')) return;

        report.addFlag(createFlag(
            'low',
            'No Vaughn Index',
            'The response withheld substantial records without providing a Vaughn index. While not required at '
            + 'the administrative stage, requesting one can reveal improper withholding patterns.',
            'In your appeal, request a Vaughn index that identifies each withheld document and the specific '
            + 'exemption(s) applied. See Vaughn v. Rosen, 484 F.2d 820 (D.C. Cir. 1973).',
        ));
    }

    // --- UK ---

    private checkUKExemptions(parsed: ParsedResponse, report: RedactionReport) {
        for (const exemption of parsed.exemptions) {
            if (exemption.includes('43')) {
                report.addFlag(createFlag(
                    'medium',
                    'Section 43 - Commercial Interests',
                    'Section 43 is a qualified exemption and requires a public interest test. The authority must '
                    + 'demonstrate that the public interest in maintaining the exemption outweighs the public '
                    + 'interest in disclosure.',
                    'Request internal review. Argue that the public interest in transparency about animal '
                    + 'agriculture practices outweighs commercial sensitivity.',
                    exemption,
                ));
            }
            if (exemption.includes('35') || exemption.includes('36')) {
                report.addFlag(createFlag(
                    'medium',
                    'Policy Formulation Exemption',
                    'Sections 35/36 are qualified exemptions frequently used to shield policy development. '
                    + 'Challenge if the policy decision has already been taken.',
                    'Argue that once a policy decision is made, the public interest shifts decisively toward disclosure.',
                    exemption,
                ));
            }
        }
    }

    // --- India ---

    private checkIndiaExemptions(parsed: ParsedResponse, report: RedactionReport) {
        for (const exemption of parsed.exemptions) {
            if (exemption.includes('8(1)(d)')) {
                report.addFlag(createFlag(
                    'medium',
                    'Section 8(1)(d) - Commercial Confidence',
                    'Section 8(1)(d) protects commercial confidence and trade secrets. However, Section 8(2) '
                    + 'provides that information may still be disclosed if the public interest outweighs the harm.',
                    'Appeal citing Section 8(2). Argue that public interest in food safety, animal welfare, and '
                    + 'environmental protection outweighs commercial confidence.',
                    exemption,
                ));
            }
            if (exemption.includes('8(1)(j)')) {
                report.addFlag(createFlag(
                    'low',
                    'Section 8(1)(j) - Personal Information',
                    'Section 8(1)(j) exempts personal information with no relationship to public activity. However, '
                    + 'information about public officials acting in their official capacity is not exempt.',
                    'Challenge if the withheld information relates to official duties of public servants, '
                    + 'particularly inspectors and regulatory officers.',
                    exemption,
                ));
            }
        }
    }
}

function createFlag(
    severity: FlagSeverity,
    category: string,
    description: string,
    recommendation: string,
    exemption?: string,
): RedactionFlag {
    return exemption === undefined
        ? { severity, category, description, recommendation }
        : { severity, category, description, recommendation, exemption };
}

import { Determination, ParsedResponse } from '../types/analysis_types';
import { isUSJurisdiction } from '../types/request_types';

/**
 * Deterministic extraction of structured facts from agency response letters.
 * Every extractor falls back to an empty default; unusual phrasing yields
 * missing facts, never an error.
 */

const DETERMINATION_PHRASES: Array<[Exclude<Determination, 'unknown'>, string[]]> = [
    ['full_grant', ['full grant', 'granted in full', 'fully granted', 'releasing all', 'all responsive records']],
    ['partial_grant', [
        'partial grant', 'granted in part', 'partially granted', 'releasing portions',
        'partial release', 'withheld in part', 'redacted',
    ]],
    ['denial', ['denied', 'denial', 'we are unable to', 'cannot release', 'refusing your request', 'exempt from disclosure']],
    ['no_records', [
        'no responsive records', 'no records responsive', 'no documents were located',
        'no records located', 'no records found',
    ]],
];

type ExemptionTable = Array<[RegExp, string]>;

export const US_EXEMPTIONS: ExemptionTable = [
    [/\(b\)\(1\)/, 'Exemption 1 - Classified national defense/foreign policy'],
    [/\(b\)\(2\)/, 'Exemption 2 - Internal agency rules and practices'],
    [/\(b\)\(3\)/, 'Exemption 3 - Specifically exempted by other statutes'],
    [/\(b\)\(4\)/, 'Exemption 4 - Trade secrets and confidential commercial information'],
    [/\(b\)\(5\)/, 'Exemption 5 - Inter-agency or intra-agency privileged communications'],
    [/\(b\)\(6\)/, 'Exemption 6 - Personal privacy'],
    [/\(b\)\(7\)\(A\)/, 'Exemption 7(A) - Law enforcement: could interfere with proceedings'],
    [/\(b\)\(7\)\(B\)/, 'Exemption 7(B) - Law enforcement: deprive right to fair trial'],
    [/\(b\)\(7\)\(C\)/, 'Exemption 7(C) - Law enforcement: personal privacy'],
    [/\(b\)\(7\)\(D\)/, 'Exemption 7(D) - Law enforcement: confidential sources'],
    [/\(b\)\(7\)\(E\)/, 'Exemption 7(E) - Law enforcement: techniques and procedures'],
    [/\(b\)\(7\)\(F\)/, 'Exemption 7(F) - Law enforcement: endanger life/physical safety'],
    [/\(b\)\(8\)/, 'Exemption 8 - Financial institution examination reports'],
    [/\(b\)\(9\)/, 'Exemption 9 - Geological and geophysical well data'],
];

export const UK_EXEMPTIONS: ExemptionTable = [
    [/[Ss]ection\s+21/, 'Section 21 - Information accessible by other means'],
    [/[Ss]ection\s+22/, 'Section 22 - Information intended for future publication'],
    [/[Ss]ection\s+23/, 'Section 23 - Security bodies'],
    [/[Ss]ection\s+24/, 'Section 24 - National security'],
    [/[Ss]ection\s+26/, 'Section 26 - Defence'],
    [/[Ss]ection\s+27/, 'Section 27 - International relations'],
    [/[Ss]ection\s+30/, 'Section 30 - Investigations and proceedings'],
    [/[Ss]ection\s+31/, 'Section 31 - Law enforcement'],
    [/[Ss]ection\s+35/, 'Section 35 - Formulation of government policy'],
    [/[Ss]ection\s+36/, 'Section 36 - Prejudice to effective conduct of public affairs'],
    [/[Ss]ection\s+38/, 'Section 38 - Health and safety'],
    [/[Ss]ection\s+40/, 'Section 40 - Personal information'],
    [/[Ss]ection\s+41/, 'Section 41 - Information provided in confidence'],
    [/[Ss]ection\s+42/, 'Section 42 - Legal professional privilege'],
    [/[Ss]ection\s+43/, 'Section 43 - Commercial interests'],
    [/[Ss]ection\s+44/, 'Section 44 - Prohibitions on disclosure'],
];

export const INDIA_EXEMPTIONS: ExemptionTable = [
    [/[Ss]ection\s+8\(1\)\(a\)/, 'Section 8(1)(a) - Sovereignty, integrity, security of India'],
    [/[Ss]ection\s+8\(1\)\(b\)/, 'Section 8(1)(b) - Expressly forbidden by court/tribunal'],
    [/[Ss]ection\s+8\(1\)\(c\)/, 'Section 8(1)(c) - Breach of Parliamentary privilege'],
    [/[Ss]ection\s+8\(1\)\(d\)/, 'Section 8(1)(d) - Commercial confidence, trade secrets'],
    [/[Ss]ection\s+8\(1\)\(e\)/, 'Section 8(1)(e) - Fiduciary relationship'],
    [/[Ss]ection\s+8\(1\)\(f\)/, 'Section 8(1)(f) - Received in confidence from foreign govt'],
    [/[Ss]ection\s+8\(1\)\(g\)/, 'Section 8(1)(g) - Endanger life or physical safety'],
    [/[Ss]ection\s+8\(1\)\(h\)/, 'Section 8(1)(h) - Impede investigation or prosecution'],
    [/[Ss]ection\s+8\(1\)\(i\)/, 'Section 8(1)(i) - Cabinet papers'],
    [/[Ss]ection\s+8\(1\)\(j\)/, 'Section 8(1)(j) - Personal information with no public interest'],
];

function exemptionTable(jurisdiction: string): ExemptionTable | null {
    if (isUSJurisdiction(jurisdiction)) return US_EXEMPTIONS;
    if (jurisdiction === 'UK') return UK_EXEMPTIONS;
    if (jurisdiction === 'India') return INDIA_EXEMPTIONS;
    return null;
}

function sortedUnique(values: Iterable<string>): string[] {
    return Array.from(new Set(values)).sort();
}

// Both word orders: "12 pages released" and "released 12 pages"
const PAGE_PATTERNS = {
    released: /(\d{1,6})\s+pages?\s+(?:released|provided|enclosed|produced)|(?:releas|provid|enclos|produc)\w+\s+(\d{1,6})\s+pages?/gi,
    withheld: /(\d{1,6})\s+pages?\s+(?:withheld|redacted|denied)|(?:withheld|redacted|denied)\s+(\d{1,6})\s+pages?/gi,
    referred: /(\d{1,6})\s+pages?\s+referred|referred\s+(\d{1,6})\s+pages?/gi,
};

const TRACKING_PATTERNS = [
    /(?:FOIA|FOI|RTI|ATI)[-\s]?\d{4}[-\s]?\d{3,8}/i,
    /\d{4}[-\s](?:FOIA|FOI)[-\s]?\d{3,8}/i,
    /(?:Case|Reference|Tracking|Request)\s*(?:No\.?|Number|#|ID)[:\s]*([A-Z0-9-]+)/i,
];

const FEE_PATTERNS = [
    /\$\s*(\d{1,6}(?:\.\d{2})?)/,
    /(?:fee|charge|cost)\s*(?:of|:)\s*\$?\s*(\d{1,6}(?:\.\d{2})?)/i,
];

// Keywords match in any case; the name after them must be two capitalised words.
const ANALYST_PATTERNS: Array<{ keyword: RegExp; name: RegExp }> = [
    { keyword: /analyst|specialist|officer|processor/gi, name: /^[:\s]+([A-Z][a-z]+\s+[A-Z][a-z]+)/ },
    { keyword: /contact|questions/gi, name: /^.*?([A-Z][a-z]+\s+[A-Z][a-z]+)\s+at/ },
];

// --- Extractors ---

export function detectDetermination(text: string): Determination {
    const lower = text.toLowerCase();
    for (const [determination, phrases] of DETERMINATION_PHRASES) {
        if (phrases.some(phrase => lower.includes(phrase))) return determination;
    }
    return 'unknown';
}

export function extractExemptions(text: string, jurisdiction: string): string[] {
    if (isUSJurisdiction(jurisdiction)) {
        const codes = Array.from(text.matchAll(/\(b\)\(\d\)(?:\([A-F]\))?/g), m => m[0]);
        // "Exemption 7(c)" → (b)(7)(C)
        for (const m of text.matchAll(/Exemption\s+(\d)(?:\(([A-F])\))?/gi)) {
            codes.push(m[2] ? `(b)(${m[1]})(${m[2].toUpperCase()})` : `(b)(${m[1]})`);
        }
        return sortedUnique(codes);
    }
    if (jurisdiction === 'UK') {
        const sections = sortedUnique(Array.from(text.matchAll(/[Ss]ection\s+(\d{1,2})/g), m => m[1]));
        return sections.map(n => `Section ${n}`);
    }
    if (jurisdiction === 'India') {
        const clauses = sortedUnique(Array.from(text.matchAll(/[Ss]ection\s+8\(1\)\(([a-j])\)/g), m => m[1]));
        return clauses.map(c => `Section 8(1)(${c})`);
    }
    return [];
}

export function describeExemptions(exemptions: string[], jurisdiction: string): Record<string, string> {
    const table = exemptionTable(jurisdiction);
    const details: Record<string, string> = {};
    if (!table) return details;

    for (const exemption of exemptions) {
        const entry = table.find(([pattern]) => pattern.test(exemption));
        if (entry) details[exemption] = entry[1];
    }
    return details;
}

function sumMatches(text: string, pattern: RegExp): number {
    let total = 0;
    for (const m of text.matchAll(pattern)) {
        total += Number(m[1] ?? m[2] ?? 0);
    }
    return total;
}

export interface PageCounts {
    released: number;
    withheldFull: number;
    withheldPartial: number;
    referred: number;
}

export function extractPageCounts(text: string): PageCounts {
    return {
        released: sumMatches(text, PAGE_PATTERNS.released),
        withheldFull: sumMatches(text, PAGE_PATTERNS.withheld),
        // letters rarely state partial withholdings in a form worth matching
        withheldPartial: 0,
        referred: sumMatches(text, PAGE_PATTERNS.referred),
    };
}

export function extractTrackingNumber(text: string): string {
    for (const pattern of TRACKING_PATTERNS) {
        const match = pattern.exec(text);
        if (match) return match[0].trim();
    }
    return '';
}

export function extractFee(text: string): number | null {
    for (const pattern of FEE_PATTERNS) {
        const match = pattern.exec(text);
        if (!match) continue;
        const amount = Number(match[1]);
        if (Number.isFinite(amount)) return amount;
    }
    return null;
}

export function detectFeeWaiver(text: string): boolean | null {
    const lower = text.toLowerCase();
    if (!lower.includes('fee waiver')) return null;
    if (['granted', 'approved', 'waived'].some(word => lower.includes(word))) return true;
    if (['denied', 'rejected', 'not granted'].some(word => lower.includes(word))) return false;
    return null;
}

export function extractAnalyst(text: string): string {
    for (const { keyword, name } of ANALYST_PATTERNS) {
        for (const hit of text.matchAll(keyword)) {
            const match = name.exec(text.slice((hit.index ?? 0) + hit[0].length));
            if (match) return match[1].trim();
        }
    }
    return '';
}

export class ResponseParser {
    public parse(text: string, jurisdiction: string = 'US-Federal'): ParsedResponse {
        const exemptions = extractExemptions(text, jurisdiction);
        const pages = extractPageCounts(text);

        return {
            determination: detectDetermination(text),
            exemptions,
            exemptionDetails: describeExemptions(exemptions, jurisdiction),
            pagesReleased: pages.released,
            pagesWithheldFull: pages.withheldFull,
            pagesWithheldPartial: pages.withheldPartial,
            pagesReferred: pages.referred,
            trackingNumber: extractTrackingNumber(text),
            feeCharged: extractFee(text),
            feeWaiverGranted: detectFeeWaiver(text),
            assignedAnalyst: extractAnalyst(text),
            rawText: text,
        };
    }
}

/** One fact per line; zero counts and absent facts are left out. */
export function summarizeParsedResponse(parsed: ParsedResponse): string {
    const lines = [`Determination: ${parsed.determination}`];
    if (parsed.pagesReleased) lines.push(`Pages released: ${parsed.pagesReleased}`);
    if (parsed.pagesWithheldFull) lines.push(`Pages withheld (full): ${parsed.pagesWithheldFull}`);
    if (parsed.pagesWithheldPartial) lines.push(`Pages withheld (partial): ${parsed.pagesWithheldPartial}`);
    if (parsed.pagesReferred) lines.push(`Pages referred: ${parsed.pagesReferred}`);
    if (parsed.exemptions.length > 0) lines.push(`Exemptions cited: ${parsed.exemptions.join(', ')}`);
    if (parsed.feeCharged !== null) lines.push(`Fee charged: $${parsed.feeCharged.toFixed(2)}`);
    if (parsed.trackingNumber) lines.push(`Tracking #: ${parsed.trackingNumber}`);
    return lines.join('\n');
}

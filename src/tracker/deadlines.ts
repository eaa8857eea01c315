import { addDays, getDate, getDay, getDaysInMonth, getMonth, isWeekend } from 'date-fns';

/**
 * Statutory response deadlines for public-records requests.
 *
 * Each jurisdiction has an initial response period counted in business or
 * calendar days, an optional holiday calendar and an optional extension.
 * Holidays are computed from rules ("3rd Monday of January"), never from
 * per-year tables.
 */

export type DayType = 'business' | 'calendar';

export type HolidayPredicate = (date: Date) => boolean;

export interface DeadlineRule {
    initialDays: number;
    dayType: DayType;
    holidays: HolidayPredicate | null;
    extensionDays: number;
    extensionType: DayType;
    notes: string;
}

export interface RuleInfo {
    jurisdiction: string;
    initialDays: number;
    dayType: DayType;
    extensionDays: number;
    notes: string;
}

export class UnknownJurisdictionError extends Error {
    public readonly jurisdiction: string;
    public readonly knownJurisdictions: string[];

    constructor(jurisdiction: string, knownJurisdictions: string[]) {
        super(`No deadline rules for jurisdiction '${jurisdiction}'. Known: ${knownJurisdictions.join(', ')}`);
        this.name = 'UnknownJurisdictionError';
        this.jurisdiction = jurisdiction;
        this.knownJurisdictions = knownJurisdictions;
    }
}

// --- Holiday calendars ---

/** month is 0-based; nth is 1-based, or 'last'. */
type HolidayRule =
    | { name: string; month: number; day: number }
    | { name: string; month: number; dayOfWeek: number; nth: number | 'last' };

export const US_FEDERAL_HOLIDAYS: HolidayRule[] = [
    { name: `New Year's Day`, month: 0, day: 1 },
    { name: 'Martin Luther King Jr. Day', month: 0, dayOfWeek: 1, nth: 3 },
    { name: `Presidents' Day`, month: 1, dayOfWeek: 1, nth: 3 },
    { name: 'Memorial Day', month: 4, dayOfWeek: 1, nth: 'last' },
    { name: 'Juneteenth', month: 5, day: 19 },
    { name: 'Independence Day', month: 6, day: 4 },
    { name: 'Labor Day', month: 8, dayOfWeek: 1, nth: 1 },
    { name: 'Columbus Day', month: 9, dayOfWeek: 1, nth: 2 },
    { name: 'Veterans Day', month: 10, day: 11 },
    { name: 'Thanksgiving Day', month: 10, dayOfWeek: 4, nth: 4 },
    { name: 'Christmas Day', month: 11, day: 25 },
];

// England & Wales
export const UK_BANK_HOLIDAYS: HolidayRule[] = [
    { name: `New Year's Day`, month: 0, day: 1 },
    { name: 'Early May bank holiday', month: 4, dayOfWeek: 1, nth: 1 },
    { name: 'Spring bank holiday', month: 4, dayOfWeek: 1, nth: 'last' },
    { name: 'Summer bank holiday', month: 7, dayOfWeek: 1, nth: 'last' },
    { name: 'Christmas Day', month: 11, day: 25 },
    { name: 'Boxing Day', month: 11, day: 26 },
];

/**
 * True when `date` is the nth given weekday of its month. The nth occurrence
 * always falls on days 7(n-1)+1 through 7n; the last one is within 7 days of
 * the month's end.
 */
export function isNthWeekdayOfMonth(date: Date, dayOfWeek: number, nth: number | 'last'): boolean {
    if (getDay(date) !== dayOfWeek) return false;
    const day = getDate(date);
    if (nth === 'last') {
        return day + 7 > getDaysInMonth(date);
    }
    return Math.ceil(day / 7) === nth;
}

function matchesHoliday(date: Date, rule: HolidayRule): boolean {
    if (getMonth(date) !== rule.month) return false;
    if ('day' in rule) return getDate(date) === rule.day;
    return isNthWeekdayOfMonth(date, rule.dayOfWeek, rule.nth);
}

export function holidayCalendar(rules: HolidayRule[]): HolidayPredicate {
    return (date: Date) => rules.some(rule => matchesHoliday(date, rule));
}

export const isUSFederalHoliday = holidayCalendar(US_FEDERAL_HOLIDAYS);
export const isUKBankHoliday = holidayCalendar(UK_BANK_HOLIDAYS);

// --- Day arithmetic ---

/**
 * Adds N business days to `start`, skipping weekends and holidays. The start
 * date itself is never counted: one business day after a Friday is Monday.
 */
export function addBusinessDays(start: Date, days: number, holidays: HolidayPredicate | null = null): Date {
    let current = start;
    let added = 0;
    while (added < days) {
        current = addDays(current, 1);
        if (isWeekend(current)) continue;
        if (holidays && holidays(current)) continue;
        added++;
    }
    return current;
}

export function addCalendarDays(start: Date, days: number): Date {
    return addDays(start, days);
}

export function isBusinessDay(date: Date, holidays: HolidayPredicate | null = null): boolean {
    return !isWeekend(date) && !(holidays && holidays(date));
}

// --- Jurisdiction rules ---

export const JURISDICTION_RULES: Record<string, DeadlineRule> = {
    'US-Federal': {
        initialDays: 20,
        dayType: 'business',
        holidays: isUSFederalHoliday,
        extensionDays: 10,
        extensionType: 'business',
        notes: '5 U.S.C. § 552(a)(6)(A)(i): 20 business days. Extension of up to 10 additional business days '
            + `under § 552(a)(6)(B)(i) for 'unusual circumstances.'`,
    },
    'India': {
        initialDays: 30,
        dayType: 'calendar',
        holidays: null,
        extensionDays: 0,
        extensionType: 'calendar',
        notes: 'RTI Act Section 7(1): 30 days from receipt. If life/liberty at stake: 48 hours. '
            + 'Transfer to another PIO: 5 days for transfer + 30 days.',
    },
    'UK': {
        initialDays: 20,
        dayType: 'business',
        holidays: isUKBankHoliday,
        extensionDays: 0,
        extensionType: 'business',
        notes: 'FOIA 2000 Section 10(1): 20 working days (excludes weekends and bank holidays). No statutory '
            + `extension, but the authority may need 'reasonable' additional time for the public interest test `
            + 'under qualified exemptions (Section 10(3)).',
    },
    'EU': {
        // institution holidays vary, so only weekends are skipped
        initialDays: 15,
        dayType: 'business',
        holidays: null,
        extensionDays: 15,
        extensionType: 'business',
        notes: 'Regulation 1049/2001 Article 7(1): 15 working days. Extension of 15 working days under '
            + `Article 7(3) 'in exceptional cases' with reasons given.`,
    },
};

const US_STATE_FALLBACK: DeadlineRule = {
    initialDays: 10,
    dayType: 'business',
    holidays: isUSFederalHoliday,
    extensionDays: 0,
    extensionType: 'business',
    notes: 'State deadlines vary. Check state-specific rules.',
};

function addDaysOfType(start: Date, days: number, dayType: DayType, holidays: HolidayPredicate | null): Date {
    return dayType === 'business' ? addBusinessDays(start, days, holidays) : addCalendarDays(start, days);
}

export class DeadlineCalculator {
    private readonly rules: Record<string, DeadlineRule>;

    constructor(customRules: Record<string, DeadlineRule> = {}) {
        this.rules = { ...JURISDICTION_RULES, ...customRules };
    }

    /** Initial statutory response deadline for a request filed on `filedDate`. */
    public computeDeadline(jurisdiction: string, filedDate: Date): Date {
        const rule = this.getRule(jurisdiction);
        return addDaysOfType(filedDate, rule.initialDays, rule.dayType, rule.holidays);
    }

    /** Extended deadline counted from the original one, or null when the jurisdiction grants none. */
    public computeExtension(jurisdiction: string, deadline: Date): Date | null {
        const rule = this.getRule(jurisdiction);
        if (rule.extensionDays === 0) return null;
        return addDaysOfType(deadline, rule.extensionDays, rule.extensionType, rule.holidays);
    }

    public describe(jurisdiction: string): RuleInfo {
        const rule = this.getRule(jurisdiction);
        return {
            jurisdiction,
            initialDays: rule.initialDays,
            dayType: rule.dayType,
            extensionDays: rule.extensionDays,
            notes: rule.notes,
        };
    }

    public listJurisdictions(): string[] {
        return Object.keys(this.rules);
    }

    public getRule(jurisdiction: string): DeadlineRule {
        if (Object.hasOwn(this.rules, jurisdiction)) return this.rules[jurisdiction];
        if (jurisdiction.startsWith('US-State')) return US_STATE_FALLBACK;
        throw new UnknownJurisdictionError(jurisdiction, this.listJurisdictions());
    }
}

import {
    DeadlineCalculator,
    UnknownJurisdictionError,
    addBusinessDays,
    isBusinessDay,
    isNthWeekdayOfMonth,
    isUKBankHoliday,
    isUSFederalHoliday,
} from '../src/tracker/deadlines';
import { toISODate } from '../src/utils/dates';

const day = (y: number, m: number, d: number) => new Date(y, m - 1, d);
const iso = (date: Date | null) => (date ? toISODate(date) : null);

describe('DeadlineCalculator', () => {
    const calculator = new DeadlineCalculator();

    describe('computeDeadline', () => {
        test('US-Federal counts 20 business days and skips MLK Day', () => {
            expect(toISODate(calculator.computeDeadline('US-Federal', day(2025, 1, 2)))).toBe('2025-01-31');
        });

        test('India counts 30 calendar days', () => {
            expect(toISODate(calculator.computeDeadline('India', day(2025, 2, 1)))).toBe('2025-03-03');
        });

        test('UK skips both May bank holidays', () => {
            expect(toISODate(calculator.computeDeadline('UK', day(2025, 4, 30)))).toBe('2025-05-30');
        });

        test('EU skips weekends but no holidays', () => {
            expect(toISODate(calculator.computeDeadline('EU', day(2025, 12, 22)))).toBe('2026-01-12');
        });

        test('unregistered US states fall back to 10 business days with federal holidays', () => {
            expect(toISODate(calculator.computeDeadline('US-State-IA', day(2025, 11, 20)))).toBe('2025-12-05');
        });

        test('unknown jurisdictions are rejected with the known list', () => {
            expect(() => calculator.computeDeadline('Mars', day(2025, 1, 2))).toThrow(UnknownJurisdictionError);
            try {
                calculator.computeDeadline('Mars', day(2025, 1, 2));
            } catch (err) {
                expect(err).toBeInstanceOf(UnknownJurisdictionError);
                if (err instanceof UnknownJurisdictionError) {
                    expect(err.jurisdiction).toBe('Mars');
                    expect(err.knownJurisdictions).toEqual(['US-Federal', 'India', 'UK', 'EU']);
                    expect(err.message).toBe(`No deadline rules for jurisdiction 'Mars'. Known: US-Federal, India, UK, EU`);
                }
            }
        });

        test('object prototype keys are not jurisdictions', () => {
            expect(() => calculator.getRule('constructor')).toThrow(UnknownJurisdictionError);
        });
    });

    describe('computeExtension', () => {
        test('US-Federal adds 10 business days to the deadline', () => {
            expect(iso(calculator.computeExtension('US-Federal', day(2025, 1, 31)))).toBe('2025-02-14');
        });

        test('EU adds 15 business days', () => {
            expect(iso(calculator.computeExtension('EU', day(2026, 1, 12)))).toBe('2026-02-02');
        });

        test('jurisdictions without an extension return null', () => {
            expect(calculator.computeExtension('India', day(2025, 3, 3))).toBeNull();
            expect(calculator.computeExtension('UK', day(2025, 5, 30))).toBeNull();
            expect(calculator.computeExtension('US-State-IA', day(2025, 12, 5))).toBeNull();
        });
    });

    describe('describe / listJurisdictions', () => {
        test('describe reports the rule for a jurisdiction', () => {
            const info = calculator.describe('EU');
            expect(info).toMatchObject({ jurisdiction: 'EU', initialDays: 15, dayType: 'business', extensionDays: 15 });
            expect(info.notes).toContain('Regulation 1049/2001');
        });

        test('describe echoes the requested state code for fallbacks', () => {
            expect(calculator.describe('US-State-OR')).toEqual({
                jurisdiction: 'US-State-OR',
                initialDays: 10,
                dayType: 'business',
                extensionDays: 0,
                notes: 'State deadlines vary. Check state-specific rules.',
            });
        });

        test('custom rules extend and override the registered table', () => {
            const custom = new DeadlineCalculator({
                'US-State-CA': {
                    initialDays: 10,
                    dayType: 'calendar',
                    holidays: null,
                    extensionDays: 14,
                    extensionType: 'calendar',
                    notes: 'California Public Records Act',
                },
            });
            expect(custom.listJurisdictions()).toEqual(['US-Federal', 'India', 'UK', 'EU', 'US-State-CA']);
            expect(toISODate(custom.computeDeadline('US-State-CA', day(2025, 3, 1)))).toBe('2025-03-11');
            expect(iso(custom.computeExtension('US-State-CA', day(2025, 3, 11)))).toBe('2025-03-25');
        });
    });
});

describe('holiday calendars', () => {
    test.each([
        [day(2025, 1, 1), true],
        [day(2025, 1, 20), true],
        [day(2025, 2, 17), true],
        [day(2025, 5, 26), true],
        [day(2025, 5, 19), false],
        [day(2025, 6, 19), true],
        [day(2025, 9, 1), true],
        [day(2025, 10, 13), true],
        [day(2025, 10, 6), false],
        [day(2025, 11, 27), true],
        [day(2025, 11, 20), false],
        [day(2025, 12, 25), true],
    ])('US federal %p → %p', (date, expected) => {
        expect(isUSFederalHoliday(date)).toBe(expected);
    });

    test.each([
        [day(2025, 5, 5), true],
        [day(2025, 5, 26), true],
        [day(2025, 8, 25), true],
        [day(2025, 8, 18), false],
        [day(2025, 12, 26), true],
        [day(2025, 7, 4), false],
    ])('UK bank %p → %p', (date, expected) => {
        expect(isUKBankHoliday(date)).toBe(expected);
    });

    test('nth weekday falls within its week of the month', () => {
        expect(isNthWeekdayOfMonth(day(2025, 3, 31), 1, 'last')).toBe(true);
        expect(isNthWeekdayOfMonth(day(2025, 3, 24), 1, 'last')).toBe(false);
        expect(isNthWeekdayOfMonth(day(2025, 3, 3), 1, 1)).toBe(true);
        expect(isNthWeekdayOfMonth(day(2025, 3, 4), 1, 1)).toBe(false);
    });
});

describe('addBusinessDays', () => {
    test('one business day after a Friday is the Monday', () => {
        expect(toISODate(addBusinessDays(day(2025, 3, 7), 1))).toBe('2025-03-10');
    });

    test('zero days returns the start date', () => {
        expect(toISODate(addBusinessDays(day(2025, 3, 8), 0))).toBe('2025-03-08');
    });

    test('the result is N counted business days after the start', () => {
        const start = day(2025, 1, 1);
        for (let offset = 0; offset < 60; offset++) {
            const from = new Date(start.getFullYear(), start.getMonth(), start.getDate() + offset);
            for (const n of [1, 5, 10, 20]) {
                const end = addBusinessDays(from, n, isUSFederalHoliday);
                expect(isBusinessDay(end, isUSFederalHoliday)).toBe(true);

                let counted = 0;
                const cursor = new Date(from);
                while (cursor < end) {
                    cursor.setDate(cursor.getDate() + 1);
                    if (isBusinessDay(cursor, isUSFederalHoliday)) counted++;
                }
                expect(counted).toBe(n);
            }
        }
    });
});

describe('computeDeadline business-day property', () => {
    const calculator = new DeadlineCalculator();

    test.each([
        ['US-Federal', 20, isUSFederalHoliday],
        ['UK', 20, isUKBankHoliday],
        ['EU', 15, null],
    ] as const)('%s deadlines land on a business day exactly %i counted days out', (jurisdiction, n, holidays) => {
        // a year of filing dates crosses every bank holiday in the calendar
        for (let offset = 0; offset < 365; offset += 3) {
            const filed = day(2025, 1, 1 + offset);
            const deadline = calculator.computeDeadline(jurisdiction, filed);
            expect(isBusinessDay(deadline, holidays)).toBe(true);

            let counted = 0;
            const cursor = new Date(filed);
            while (cursor < deadline) {
                cursor.setDate(cursor.getDate() + 1);
                if (isBusinessDay(cursor, holidays)) counted++;
            }
            expect(counted).toBe(n);
        }
    });
});

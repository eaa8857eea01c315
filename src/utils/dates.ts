import { parse, parseISO, format, isValid } from 'date-fns';
import { ISODate } from '../types/request_types';

const ACCEPTED_FORMATS = ['yyyy-MM-dd', 'MM/dd/yyyy', 'MM-dd-yyyy', 'yyyy/MM/dd', 'MMM d, yyyy', 'MMMM d, yyyy', 'd MMMM yyyy'];

/**
 * Normalizes the date spellings found in agency letters and API payloads to
 * ISO 8601 (YYYY-MM-DD). Returns null for anything it cannot read.
 */
export function normalizeDate(dateStr: string | null | undefined): ISODate | null {
    if (!dateStr) return null;
    const trimmed = dateStr.trim();

    for (const f of ACCEPTED_FORMATS) {
        const parsedDate = parse(trimmed, f, new Date());
        // date-fns reads "25" as year 25 under yyyy
        if (isValid(parsedDate) && parsedDate.getFullYear() >= 1000) {
            return format(parsedDate, 'yyyy-MM-dd');
        }
    }

    return null;
}

/** Local calendar date of a Date, as YYYY-MM-DD. */
export function toISODate(date: Date): ISODate {
    return format(date, 'yyyy-MM-dd');
}

/** Parses YYYY-MM-DD as local midnight. */
export function fromISODate(value: ISODate): Date {
    return parseISO(value);
}

/** `YYYY-MM-DD HH:MM` in UTC, the stamp used in note logs. */
export function noteTimestamp(date: Date): string {
    return date.toISOString().slice(0, 16).replace('T', ' ');
}

/**
 * Calendar Date Utilities
 *
 * Dates travel as `YYYY-MM-DD` strings. Arithmetic happens on UTC midnight
 * timestamps so results do not depend on the server timezone.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse `YYYY-MM-DD` into a UTC-midnight Date.
 * Returns null for malformed strings and impossible dates (2024-02-30).
 */
export function parseIsoDate(value: string): Date | null {
    const match = ISO_DATE_RE.exec(value.trim());
    if (!match) return null;
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

export function isIsoDate(value: string): boolean {
    return parseIsoDate(value) !== null;
}

/** Format a Date's UTC calendar day as `YYYY-MM-DD` */
export function toIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/** Today's calendar date in the server's local timezone */
export function todayIsoDate(now: Date = new Date()): string {
    const y = now.getFullYear();
    const m = String(now.getMonth() + 1).padStart(2, '0');
    const d = String(now.getDate()).padStart(2, '0');
    return `${y}-${m}-${d}`;
}

export function addDays(isoDate: string, days: number): string {
    const date = parseIsoDate(isoDate);
    if (!date) throw new RangeError(`Invalid date: ${isoDate}`);
    return toIsoDate(new Date(date.getTime() + days * DAY_MS));
}

/** 0 = Sunday … 6 = Saturday */
export function dayOfWeek(isoDate: string): number {
    const date = parseIsoDate(isoDate);
    if (!date) throw new RangeError(`Invalid date: ${isoDate}`);
    return date.getUTCDay();
}

/** Whole days from `from` to `to` (negative when `to` is earlier) */
export function daysBetween(from: string, to: string): number {
    const a = parseIsoDate(from);
    const b = parseIsoDate(to);
    if (!a || !b) throw new RangeError(`Invalid date range: ${from}..${to}`);
    return Math.round((b.getTime() - a.getTime()) / DAY_MS);
}

export function startOfMonth(isoDate: string): string {
    return `${isoDate.slice(0, 7)}-01`;
}

export function endOfMonth(isoDate: string): string {
    const date = parseIsoDate(isoDate);
    if (!date) throw new RangeError(`Invalid date: ${isoDate}`);
    return toIsoDate(new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0)));
}

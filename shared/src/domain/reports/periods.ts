/**
 * Report periods
 *
 * The workshop week runs Saturday to Thursday; Friday is the day off and
 * belongs to the week that starts the next day.
 */

import { addDays, dayOfWeek, endOfMonth, startOfMonth } from '../../utils/dateHelpers.js';

export const REPORT_PERIODS = ['daily', 'weekly', 'monthly'] as const;
export type ReportPeriod = (typeof REPORT_PERIODS)[number];

export interface DateRange {
    start: string;
    end: string;
}

const SATURDAY = 6;
const FRIDAY = 5;

export function isReportPeriod(value: unknown): value is ReportPeriod {
    return typeof value === 'string' && (REPORT_PERIODS as readonly string[]).includes(value);
}

/**
 * Saturday–Thursday week containing `anchor`.
 *
 * @example
 * saturdayWeek('2024-03-13') // { start: '2024-03-09', end: '2024-03-14' }
 * saturdayWeek('2024-03-15') // Friday → { start: '2024-03-16', end: '2024-03-21' }
 */
export function saturdayWeek(anchor: string): DateRange {
    const dow = dayOfWeek(anchor);
    const start = dow === FRIDAY ? addDays(anchor, 1) : addDays(anchor, -((dow - SATURDAY + 7) % 7));
    return { start, end: addDays(start, 5) };
}

/** Unknown period names fall back to daily */
export function periodRange(period: string, anchor: string): DateRange {
    if (period === 'weekly') return saturdayWeek(anchor);
    if (period === 'monthly') return { start: startOfMonth(anchor), end: endOfMonth(anchor) };
    return { start: anchor, end: anchor };
}

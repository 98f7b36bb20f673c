/**
 * Currency and Number Formatting Utilities
 *
 * Shared pure functions for consistent formatting across API responses,
 * CSV/PDF exports and reports.
 */

const amountFormatter = new Intl.NumberFormat('en-US', {
    maximumFractionDigits: 0,
    minimumFractionDigits: 0,
});

/**
 * Format a whole-unit amount with thousands separators.
 *
 * @example
 * formatAmount(1234) // "Rs 1,234"
 * formatAmount(-500) // "-Rs 500"
 */
export function formatAmount(amount: number, currency = 'Rs'): string {
    if (!Number.isFinite(amount)) return `${currency} 0`;
    const sign = amount < 0 ? '-' : '';
    return `${sign}${currency} ${amountFormatter.format(Math.abs(Math.round(amount)))}`;
}

/**
 * Format a count with thousands separators.
 *
 * @example
 * formatCount(12000) // "12,000"
 */
export function formatCount(value: number): string {
    if (!Number.isFinite(value)) return '0';
    return amountFormatter.format(value);
}

/**
 * Inches with an `in` suffix, dropping a trailing `.0`.
 *
 * @example
 * formatInches(6) // "6in"
 * formatInches(4.5) // "4.5in"
 */
export function formatInches(inches: number): string {
    return `${Number.isInteger(inches) ? inches.toFixed(0) : String(inches)}in`;
}

/**
 * Date Helper Utilities
 *
 * Records carry calendar dates, not timestamps. They are stored and compared
 * as `YYYY-MM-DD` strings, which sort lexically in date order, so range
 * filters can be pushed straight into SQL.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Convert a Date to YYYY-MM-DD using UTC components
 */
export function toDateString(date: Date): string {
    return date.toISOString().split('T')[0];
}

/**
 * Today's date (UTC) as YYYY-MM-DD
 */
export function todayDateString(now: Date = new Date()): string {
    return toDateString(now);
}

/**
 * Check that a string is a real calendar date in YYYY-MM-DD form.
 * Rejects shapes like "2024-1-5" and impossible dates like "2024-02-30".
 */
export function isIsoDateString(value: string): boolean {
    const match = ISO_DATE_PATTERN.exec(value);
    if (!match) return false;

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    // setUTCFullYear keeps years 0-99 literal; Date.UTC maps them to 19xx
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);

    return (
        date.getUTCFullYear() === year &&
        date.getUTCMonth() === month - 1 &&
        date.getUTCDate() === day
    );
}

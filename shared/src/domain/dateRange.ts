/**
 * Inclusive date ranges over YYYY-MM-DD strings.
 *
 * A missing bound is open. A range whose start falls after its end is
 * legal and simply matches nothing.
 */

export interface DateRange {
    startDate?: string;
    endDate?: string;
}

/**
 * True when both bounds are present and start > end
 */
export function isEmptyRange(range: DateRange): boolean {
    return range.startDate !== undefined
        && range.endDate !== undefined
        && range.startDate > range.endDate;
}

/**
 * Build a range from the `start_date` / `end_date` query parameters
 */
export function toDateRange(query: { start_date?: string; end_date?: string }): DateRange {
    return { startDate: query.start_date, endDate: query.end_date };
}

/**
 * Label used in export filenames: "2024-01-01_2024-01-31", "all_2024-01-31"
 */
export function rangeLabel(range: DateRange): string {
    return `${range.startDate ?? 'all'}_${range.endDate ?? 'all'}`;
}

/**
 * @fileoverview Aggregation Engine
 *
 * Turns a flat list of time entries into one ranked summary row per employee.
 * Side-effect free: the same entries always produce the same summary.
 *
 * ## Rules
 * - Soft-deleted entries (`deletedOn` set) are dropped before grouping.
 * - Entries are grouped by exact `employeeName`.
 * - Each entry contributes `endUtc - startUtc` in fractional hours. A negative
 *   interval is kept as a negative contribution; see `findMalformedEntries`.
 * - Rows are ordered by total hours, descending. Equal totals keep the order in
 *   which the employee was first seen.
 */

import { MS_PER_HOUR } from './constants.js';
import type { EmployeeSummary, TimeEntry } from './types.js';

/**
 * Length of an entry in fractional hours. Negative when the end precedes the start.
 */
export function getEntryDurationHours(entry: TimeEntry): number {
    return (entry.endUtc.getTime() - entry.startUtc.getTime()) / MS_PER_HOUR;
}

function isActive(entry: TimeEntry): boolean {
    return entry.deletedOn === null;
}

/**
 * Aggregates entries into a ranked per-employee summary.
 *
 * @param entries - Entries as fetched; may be empty or contain soft-deleted entries.
 * @returns One row per distinct non-deleted employee name, highest total first.
 *   Empty when there is nothing to render.
 */
export function aggregate(entries: readonly TimeEntry[]): EmployeeSummary[] {
    // Insertion-ordered: ties keep first-seen order
    const totals = new Map<string, number>();

    for (const entry of entries) {
        if (!isActive(entry)) continue;
        const current = totals.get(entry.employeeName) ?? 0;
        totals.set(entry.employeeName, current + getEntryDurationHours(entry));
    }

    // Stable sort
    return Array.from(totals, ([name, totalHours]): EmployeeSummary => ({ name, totalHours })).sort(
        (a, b) => b.totalHours - a.totalHours
    );
}

/**
 * Non-deleted entries whose end precedes their start.
 */
export function findMalformedEntries(entries: readonly TimeEntry[]): TimeEntry[] {
    return entries.filter((entry) => isActive(entry) && getEntryDurationHours(entry) < 0);
}

/**
 * Sum of all summary totals.
 */
export function sumHours(summary: readonly EmployeeSummary[]): number {
    return summary.reduce((total, employee) => total + employee.totalHours, 0);
}

import { format, isValid, parseISO } from 'date-fns';
import type { AvailabilityResult } from '../types';
import type { AvailabilityStore } from '../store/db';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Format a YYYY-MM-DD date for display ("February 20, 2026")
 *
 * Strings that are not a real calendar date are returned unchanged.
 */
export const formatDate = (date: string): string => {
    if (!ISO_DATE.test(date)) return date;
    const parsed = parseISO(date);
    return isValid(parsed) ? format(parsed, 'MMMM dd, yyyy') : date;
};

/**
 * "1 table", "3 tables"
 */
export const pluralizeTables = (count: number): string => `${count} table${count === 1 ? '' : 's'}`;

/**
 * Check whether a table is free at a date and time
 *
 * Read-only. Unknown dates and times are reported through `reasonCode`,
 * never thrown.
 *
 * @param store - Availability store to read
 * @param date - Date in YYYY-MM-DD format
 * @param time - Time in HH:MM format
 */
export function checkAvailability(store: AvailabilityStore, date: string, time: string): AvailabilityResult {
    if (!store.hasDate(date)) {
        return { available: false, tableCount: 0, reasonCode: 'date-not-found' };
    }

    const tableCount = store.getCount(date, time);
    if (tableCount === undefined) {
        return { available: false, tableCount: 0, reasonCode: 'time-not-found' };
    }

    const available = tableCount > 0;
    return { available, tableCount, reasonCode: available ? 'ok' : 'fully-booked' };
}

/**
 * Suggest somewhere else to sit
 *
 * Strategy:
 * 1. Free slots on the same date, in file order
 * 2. Otherwise every other date that still has at least one free table
 * 3. Otherwise a "nothing available" message
 *
 * Zero-capacity slots and dates are never suggested. Does not mutate the store.
 *
 * @param store - Availability store to read
 * @param date - Requested date (YYYY-MM-DD)
 */
export function suggestAlternative(store: AvailabilityStore, date: string): string {
    const sameDay = (store.slots(date) ?? [])
        .filter(([, count]) => count > 0)
        .map(([time, count]) => `${time} (${pluralizeTables(count)} left)`);

    if (sameDay.length > 0) {
        return `📋 Available times on ${formatDate(date)}: ${sameDay.join(', ')}`;
    }

    const otherDates = store.dates()
        .filter(d => d !== date && store.totalRemaining(d) > 0)
        .map(formatDate);

    if (otherDates.length > 0) {
        return `📋 No availability on ${formatDate(date)}. Try these dates instead: ${otherDates.join(', ')}`;
    }

    return '😔 Unfortunately, we have no available tables at this time. Please try again later.';
}

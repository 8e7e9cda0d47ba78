import type { BookingIntent, ParsedRequest } from '../types';

const DATE_PATTERN = /(\d{4}-\d{2}-\d{2})/;
const TIME_PATTERN = /(\d{1,2}):(\d{2})/;
const GUESTS_PATTERN = /(\d+)\s?(?:guest|people|person|pax|seat)/i;
// "table for 4", "party of 6". The number must not be the start of a date or time.
const FOR_OF_PATTERN = /\b(?:for|of)\s+(\d+)(?![\d:-])/i;

const CHECK_KEYWORDS = ['check', 'available', 'availability', 'open'];
const RESERVE_KEYWORDS = ['book', 'reserve', 'reservation'];

/**
 * Find the first ISO date (YYYY-MM-DD) in a message
 */
export const extractDate = (message: string): string | undefined => {
    return DATE_PATTERN.exec(message)?.[1];
};

/**
 * Find the first H:MM / HH:MM time in a message, zero-padded to HH:MM
 *
 * Example: "table at 7:30" => "07:30"
 */
export const extractTime = (message: string): string | undefined => {
    const match = TIME_PATTERN.exec(message);
    if (!match) return undefined;
    const [, hours = '', minutes = ''] = match;
    return `${hours.padStart(2, '0')}:${minutes}`;
};

const firstCount = (pattern: RegExp, message: string): number | undefined => {
    const digits = pattern.exec(message)?.[1];
    const count = digits === undefined ? 0 : Number.parseInt(digits, 10);
    return count > 0 ? count : undefined;
};

/**
 * Find the party size
 *
 * Tries "<n> guests|people|person|pax|seats" first, then "for <n>" / "of <n>".
 * A count of zero means no party size was given.
 */
export const extractGuests = (message: string): number | undefined =>
    firstCount(GUESTS_PATTERN, message) ?? firstCount(FOR_OF_PATTERN, message);

/**
 * Classify a message by keyword membership
 *
 * Availability keywords win over reservation keywords:
 * "is 19:00 available to book?" is a check.
 */
export const classifyIntent = (message: string): BookingIntent => {
    const lower = message.toLowerCase();
    if (CHECK_KEYWORDS.some(word => lower.includes(word))) return 'check-availability';
    if (RESERVE_KEYWORDS.some(word => lower.includes(word))) return 'make-reservation';
    return 'unrecognized';
};

/**
 * Parse a free-text booking message into date, time, party size and intent
 *
 * Each category uses its first match scanning left to right. Never throws:
 * anything not found is left absent (the date falls back to `defaultDate`).
 *
 * @param message - Raw user message
 * @param defaultDate - Date used when the message names none (YYYY-MM-DD)
 */
export function extract(message: string, defaultDate: string): ParsedRequest {
    const request: ParsedRequest = {
        date: extractDate(message) ?? defaultDate,
        intent: classifyIntent(message)
    };

    const time = extractTime(message);
    if (time !== undefined) request.time = time;

    const guests = extractGuests(message);
    if (guests !== undefined) request.guests = guests;

    return request;
}

import pino from 'pino';
import type { BaseLogger } from 'pino';
import type { BookingOutcome, BookingRejection, ParsedRequest } from '../types';
import type { AvailabilityStore } from '../store/db';
import { checkAvailability, formatDate, pluralizeTables, suggestAlternative } from './availability';
import { extract } from './extract';
import { KeyedLock } from './lock';

export interface BookingEngineOptions {
    /** Date used when a message names none (YYYY-MM-DD) */
    defaultDate: string;
    /** Shown in confirmations (default: "Bella Roma") */
    restaurantName?: string;
    logger?: BaseLogger;
    /** Lock guarding check-then-decrement, shared if several engines serve one store */
    lock?: KeyedLock;
}

/**
 * Rule-based booking engine
 *
 * Owns an availability store and answers one chat message at a time:
 * extracts slots, checks availability, commits reservations and suggests
 * alternatives. Holds no conversation state between messages.
 */
export class BookingEngine {
    readonly defaultDate: string;
    readonly restaurantName: string;
    private readonly store: AvailabilityStore;
    private readonly logger: BaseLogger;
    private readonly lock: KeyedLock;

    constructor(store: AvailabilityStore, options: BookingEngineOptions) {
        this.store = store;
        this.defaultDate = options.defaultDate;
        this.restaurantName = options.restaurantName ?? 'Bella Roma';
        this.logger = options.logger ?? pino({ level: 'silent' });
        this.lock = options.lock ?? new KeyedLock();
    }

    /**
     * Reserve one table in a slot
     *
     * Validation and availability failures come back as `rejected` outcomes
     * with a user-facing message and leave the store untouched. On success the
     * slot count drops by exactly one.
     *
     * The availability check and the decrement run under a per-slot lock;
     * a booker that finds the slot locked is rejected as `busy`.
     *
     * @param date - Date in YYYY-MM-DD format
     * @param time - Time in HH:MM format
     * @param guests - Party size (must be >= 1)
     */
    bookTable(date: string, time: string, guests: number): BookingOutcome {
        if (guests <= 0) {
            return this.reject('invalid-guests', '🚫 Number of guests must be at least 1. Please try again.', { date, time, guests });
        }

        const lockKey = `${date}:${time}`;
        if (!this.lock.acquire(lockKey)) {
            return this.reject(
                'busy',
                `⏳ Someone else is booking ${time} on ${formatDate(date)} right now. Please try again in a moment.`,
                { date, time, guests }
            );
        }

        try {
            const status = checkAvailability(this.store, date, time);
            const displayDate = formatDate(date);

            switch (status.reasonCode) {
                case 'date-not-found':
                    return this.reject(
                        'date-not-found',
                        `🚫 Sorry, we don't have availability data for ${displayDate}. ${suggestAlternative(this.store, date)}`,
                        { date, time, guests }
                    );
                case 'time-not-found':
                    return this.reject(
                        'time-not-found',
                        `🚫 Sorry, we don't offer reservations at ${time} on ${displayDate}. ${suggestAlternative(this.store, date)}`,
                        { date, time, guests }
                    );
                case 'fully-booked':
                    return this.reject(
                        'fully-booked',
                        `🚫 Sorry, no tables are available at ${time} on ${displayDate}. ${suggestAlternative(this.store, date)}`,
                        { date, time, guests }
                    );
                case 'ok':
                    break;
            }

            const remaining = this.store.decrement(date, time);
            this.logger.info({ date, time, guests, remaining }, 'reservation confirmed');

            return {
                status: 'confirmed',
                date,
                time,
                guests,
                remaining,
                message:
                    `✅ Reservation confirmed!\n\n` +
                    `📅 Date: ${displayDate}\n` +
                    `🕐 Time: ${time}\n` +
                    `👥 Guests: ${guests}\n\n` +
                    `🍕 We look forward to welcoming you at ${this.restaurantName}! ` +
                    `(${pluralizeTables(remaining)} remaining for this slot)`
            };
        } finally {
            this.lock.release(lockKey);
        }
    }

    /**
     * Answer one booking-related chat message
     *
     * Flow:
     * - check-availability: with a time, confirm or deny that slot (plus
     *   alternatives); without one, list what is free on the date
     * - make-reservation: ask for the time first, then the party size,
     *   then book
     * - anything else: help text with example phrasings and open dates
     *
     * @param message - Raw user message
     * @returns Reply text
     */
    handleMessage(message: string): string {
        const request = extract(message, this.defaultDate);
        this.logger.debug({ request }, 'parsed booking message');

        switch (request.intent) {
            case 'check-availability':
                return this.answerAvailability(request);
            case 'make-reservation':
                return this.answerReservation(request);
            case 'unrecognized':
                return this.helpText();
        }
    }

    private answerAvailability({ date, time }: ParsedRequest): string {
        if (time === undefined) {
            return suggestAlternative(this.store, date);
        }

        const status = checkAvailability(this.store, date, time);
        if (status.available) {
            return (
                `✅ Yes! We have ${pluralizeTables(status.tableCount)} available at ${time} on ${formatDate(date)}. ` +
                `Would you like to book one?`
            );
        }
        return `🚫 No tables available at ${time} on ${formatDate(date)}. ${suggestAlternative(this.store, date)}`;
    }

    private answerReservation({ date, time, guests }: ParsedRequest): string {
        if (time === undefined) {
            return (
                `🍕 I'd love to help you book a table! ` +
                `Please provide the time (e.g., 19:00), ` +
                `number of guests (e.g., 4 guests), ` +
                `and optionally a date (e.g., ${this.defaultDate}). ` +
                `Default date is ${formatDate(this.defaultDate)}.`
            );
        }
        if (guests === undefined) {
            return (
                `🍕 Great choice! ${time} on ${formatDate(date)}: ` +
                `how many guests will be joining? ` +
                `(e.g., 'book for 4 guests at ${time}')`
            );
        }
        return this.bookTable(date, time, guests).message;
    }

    private helpText(): string {
        return (
            `🍕 I can help you with reservations! Try:\n\n` +
            `• "Book a table for 4 at 19:00"\n` +
            `• "Check availability at 20:00"\n` +
            `• "Reserve for 2 guests at 18:00 on ${this.defaultDate}"\n\n` +
            `Our available dates: ${this.store.dates().map(formatDate).join(', ')}`
        );
    }

    private reject(
        reason: BookingRejection,
        message: string,
        context: { date: string; time: string; guests: number }
    ): BookingOutcome {
        this.logger.debug({ ...context, reason }, 'reservation rejected');
        return { status: 'rejected', reason, message };
    }
}

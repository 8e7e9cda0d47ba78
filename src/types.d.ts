/**
 * Raw availability file contents
 *
 * Keys are ISO dates (YYYY-MM-DD), each mapping `HH:MM` time slots to the
 * number of tables still free in that slot.
 */
export type AvailabilitySchedule = Record<string, Record<string, number>>;

/**
 * Classified purpose of a booking message
 */
export type BookingIntent = 'check-availability' | 'make-reservation' | 'unrecognized';

/**
 * Slots extracted from a single inbound message
 *
 * Created fresh per message. Absent fields mean the message did not mention them.
 */
export interface ParsedRequest {
    /** Date in YYYY-MM-DD format, the default date when the message names none */
    date: string;
    /** Time in HH:MM format */
    time?: string;
    guests?: number;
    intent: BookingIntent;
}

/**
 * Why an availability check succeeded or failed
 */
export type ReasonCode = 'ok' | 'fully-booked' | 'date-not-found' | 'time-not-found';

export interface AvailabilityResult {
    available: boolean;
    tableCount: number;
    reasonCode: ReasonCode;
}

export type BookingRejection = 'invalid-guests' | 'busy' | Exclude<ReasonCode, 'ok'>;

/**
 * Result of a reservation attempt
 *
 * Rejections never mutate the store.
 */
export type BookingOutcome =
    | {
        status: 'confirmed';
        date: string;
        time: string;
        guests: number;
        /** Tables left in the slot after this booking */
        remaining: number;
        message: string;
    }
    | {
        status: 'rejected';
        reason: BookingRejection;
        message: string;
    };

/**
 * Answers questions that are not about bookings (menu, opening hours, ...)
 */
export interface MenuAnswerer {
    answer(question: string): Promise<string>;
}

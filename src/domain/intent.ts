/**
 * Words that send a message to the booking engine instead of the menu answerer
 */
export const BOOKING_KEYWORDS = [
    'book',
    'reserve',
    'reservation',
    'available',
    'availability',
    'table',
    'seat',
    'booking'
] as const;

/**
 * Decide whether a chat message is about bookings
 *
 * Case-insensitive substring test, so "Seating" and "booked" both match.
 */
export const isBookingIntent = (message: string): boolean => {
    const lower = message.toLowerCase();
    return BOOKING_KEYWORDS.some(keyword => lower.includes(keyword));
};

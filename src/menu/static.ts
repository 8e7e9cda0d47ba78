import type { MenuAnswerer } from '../types';

/**
 * Menu answerer used when no retrieval backend is wired in
 *
 * Replies with a fixed pointer back to what the assistant can do.
 */
export const createStaticMenuAnswerer = (restaurantName: string): MenuAnswerer => ({
    answer: async () =>
        `🍝 Menu questions are not available right now, but I can help you book a table at ${restaurantName}! ` +
        `Try "Check availability at 20:00" or "Book a table for 2 at 19:00".`
});

import type { FastifyReply, FastifyRequest } from 'fastify';
import { ChatRequestSchema } from './schemas';
import { isBookingIntent } from './domain/intent';
import type { BookingEngine } from './domain/booking';
import type { MenuAnswerer } from './types';

export interface RouteDeps {
    engine: BookingEngine;
    menu: MenuAnswerer;
}

/**
 * Answer one chat message
 *
 * Routes booking-related messages to the booking engine and everything
 * else to the menu answerer.
 *
 * @returns `{ response }` with the assistant's reply
 *
 * @throws {400} Body is not `{ message: string }`
 */
export const chat = ({ engine, menu }: RouteDeps) => async (request: FastifyRequest, reply: FastifyReply) => {
    const body = ChatRequestSchema.safeParse(request.body);
    if (!body.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
    }

    const message = body.data.message.trim();
    if (!message) {
        return { response: "🍕 Please type a message! I'm here to help with our menu and reservations." };
    }

    if (isBookingIntent(message)) {
        return { response: engine.handleMessage(message) };
    }

    try {
        return { response: await menu.answer(message) };
    } catch (err) {
        request.log.error({ err }, 'menu answerer failed');
        return { response: "😔 Sorry, I couldn't look that up right now. Please try again in a moment." };
    }
}

/**
 * Liveness probe
 */
export const health = ({ engine }: RouteDeps) => async () => ({
    status: 'healthy',
    restaurant: engine.restaurantName
});

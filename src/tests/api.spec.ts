import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app';
import { BookingEngine } from '../domain/booking';
import { createStaticMenuAnswerer } from '../menu/static';
import type { AvailabilityStore } from '../store/db';
import type { MenuAnswerer } from '../types';
import { createSeedStore, DEFAULT_DATE } from './seed-data';

describe('Chat API', () => {
    let app: FastifyInstance;
    let store: AvailabilityStore;
    let questions: string[];

    const menu: MenuAnswerer = {
        answer: async (question) => {
            questions.push(question);
            return 'Our carbonara is made with guanciale.';
        }
    };

    beforeEach(async () => {
        store = createSeedStore();
        questions = [];
        app = buildApp({ engine: new BookingEngine(store, { defaultDate: DEFAULT_DATE }), menu });
        await app.ready();
    });

    afterEach(async () => {
        await app.close();
    });

    it('POST /chat - should answer availability questions', async () => {
        const response = await app.inject({
            method: 'POST',
            url: '/chat',
            payload: { message: 'Check availability at 20:00' }
        });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({
            response: '✅ Yes! We have 3 tables available at 20:00 on February 20, 2026. Would you like to book one?'
        });
        expect(questions).toEqual([]);
    });

    it('POST /chat - should book and decrement the store', async () => {
        const response = await app.inject({
            method: 'POST',
            url: '/chat',
            payload: { message: '  Book a table for 2 at 20:00  ' }
        });

        expect(response.statusCode).toBe(200);
        expect(response.json().response).toContain('(2 tables remaining for this slot)');
        expect(store.getCount('2026-02-20', '20:00')).toBe(2);
    });

    it('POST /chat - should send other questions to the menu answerer', async () => {
        const response = await app.inject({
            method: 'POST',
            url: '/chat',
            payload: { message: 'What is in the carbonara?' }
        });

        expect(response.json()).toEqual({ response: 'Our carbonara is made with guanciale.' });
        expect(questions).toEqual(['What is in the carbonara?']);
    });

    it('POST /chat - should prompt on blank messages', async () => {
        const response = await app.inject({
            method: 'POST',
            url: '/chat',
            payload: { message: '   ' }
        });

        expect(response.json()).toEqual({
            response: "🍕 Please type a message! I'm here to help with our menu and reservations."
        });
    });

    it('POST /chat - should reject a body without a message', async () => {
        const response = await app.inject({
            method: 'POST',
            url: '/chat',
            payload: { text: 'hello' }
        });

        expect(response.statusCode).toBe(400);
        expect(response.json().error).toBe('invalid_input');
    });

    it('GET /health - should report the restaurant', async () => {
        const response = await app.inject({ method: 'GET', url: '/health' });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({
            status: 'healthy',
            restaurant: 'Bella Roma'
        });
    });
});

describe('Chat API fallbacks', () => {

    it('should apologize when the menu answerer fails', async () => {
        const failing: MenuAnswerer = {
            answer: async () => {
                throw new Error('model unavailable');
            }
        };
        const app = buildApp({
            engine: new BookingEngine(createSeedStore(), { defaultDate: DEFAULT_DATE }),
            menu: failing
        });

        const response = await app.inject({ method: 'POST', url: '/chat', payload: { message: 'Any desserts?' } });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({
            response: "😔 Sorry, I couldn't look that up right now. Please try again in a moment."
        });
        await app.close();
    });

    it('should point menu questions back to bookings with the static answerer', async () => {
        const app = buildApp({
            engine: new BookingEngine(createSeedStore(), { defaultDate: DEFAULT_DATE }),
            menu: createStaticMenuAnswerer('Trattoria Test')
        });

        const response = await app.inject({ method: 'POST', url: '/chat', payload: { message: 'Any desserts?' } });

        expect(response.json().response).toBe(
            '🍝 Menu questions are not available right now, but I can help you book a table at Trattoria Test! ' +
            'Try "Check availability at 20:00" or "Book a table for 2 at 19:00".'
        );
        await app.close();
    });

    it('should rate limit chatty clients', async () => {
        const app = buildApp({
            engine: new BookingEngine(createSeedStore(), { defaultDate: DEFAULT_DATE }),
            menu: createStaticMenuAnswerer('Bella Roma'),
            rateLimitMax: 2
        });

        const statuses: number[] = [];
        for (let i = 0; i < 3; i++) {
            const response = await app.inject({ method: 'GET', url: '/health' });
            statuses.push(response.statusCode);
        }

        expect(statuses).toEqual([200, 200, 429]);
        await app.close();
    });
});

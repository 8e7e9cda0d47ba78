import fastify from 'fastify';
import type { FastifyServerOptions } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import { chat, health } from './routes';
import type { RouteDeps } from './routes';

export interface BuildAppOptions extends RouteDeps {
    logger?: FastifyServerOptions['logger'];
    /** Requests per minute per client (default: 100) */
    rateLimitMax?: number;
}

/**
 * Build the chat server without listening
 *
 * Rate limited, booking messages go to the engine and the rest to the menu answerer.
 */
export const buildApp = ({ engine, menu, logger = false, rateLimitMax = 100 }: BuildAppOptions) => {
    const app = fastify({ logger });

    app.register(rateLimit, {
        max: rateLimitMax,
        timeWindow: '1 minute'
    });

    app.register(function (app, _, done) {
        app.post('/chat', chat({ engine, menu }));
        app.get('/health', health({ engine, menu }));

        done();
    });

    return app;
};

/**
 * Restaurant booking assistant server
 *
 * Startup order:
 * 1. Load .env, then parse configuration from the environment
 * 2. Load the availability file (fatal if missing or malformed)
 * 3. Build the Fastify app and listen
 */

import pino from 'pino';
import { loadConfig, loadEnvFile } from './config';
import { loggerOptions } from './logger';
import { AvailabilityStore } from './store/db';
import { BookingEngine } from './domain/booking';
import { createStaticMenuAnswerer } from './menu/static';
import { buildApp } from './app';

loadEnvFile();
const config = loadConfig();
const log = pino(loggerOptions(config.LOG_LEVEL));

let store: AvailabilityStore;
try {
    store = AvailabilityStore.load(config.AVAILABILITY_PATH);
} catch (err) {
    log.fatal({ err }, 'failed to load availability');
    process.exit(1);
}

const engine = new BookingEngine(store, {
    defaultDate: config.DEFAULT_DATE,
    restaurantName: config.RESTAURANT_NAME,
    logger: log.child({ component: 'booking' })
});

const app = buildApp({
    engine,
    menu: createStaticMenuAnswerer(config.RESTAURANT_NAME),
    logger: loggerOptions(config.LOG_LEVEL)
});

log.info({ dates: store.dates().length }, `${config.RESTAURANT_NAME} booking engine ready`);

app.listen({ port: config.PORT, host: config.HOST }).catch(err => {
    app.log.fatal({ err }, 'server failed to start');
    process.exit(1);
});

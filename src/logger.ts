import type { LoggerOptions } from 'pino';

/**
 * Pretty console logging shared by the Fastify server and startup code
 */
export const loggerOptions = (level: string) => ({
    level,
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
            ignore: 'pid,hostname',
            translateTime: 'SYS:dd-mm-yyyy HH:MM:ss'
        }
    }
}) satisfies LoggerOptions;

import { pino } from 'pino';
import type { Logger } from 'pino';
import type { RequestHandler } from 'express';
import type { Config } from './config.js';

export function createLogger(config: Pick<Config, 'nodeEnv' | 'logLevel'>): Logger {
    return pino({
        level: config.logLevel,
        base: undefined,
        transport: config.nodeEnv === 'development'
            ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
            : undefined,
    });
}

/** One log line per finished request. */
export function requestLogger(logger: Logger): RequestHandler {
    return (req, res, next) => {
        const start = process.hrtime.bigint();
        res.on('finish', () => {
            const ms = Number(process.hrtime.bigint() - start) / 1e6;
            const entry = {
                method: req.method,
                url: req.originalUrl,
                status: res.statusCode,
                ms: Math.round(ms * 10) / 10,
            };
            if (res.statusCode >= 500) logger.error(entry, 'request failed');
            else if (res.statusCode >= 400) logger.warn(entry, 'request rejected');
            else logger.info(entry, 'request completed');
        });
        next();
    };
}

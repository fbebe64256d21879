import type { ErrorRequestHandler, RequestHandler, Response } from 'express';
import type { Logger } from 'pino';
import type { ZodError, ZodTypeAny, z } from 'zod';
import type { ErrorResponse } from './schemas.js';

/** Error carrying the HTTP status it should be answered with. */
export class HttpError extends Error {
    constructor(
        readonly status: number,
        message: string,
        readonly details?: Record<string, string[]>,
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export class ValidationError extends HttpError {
    constructor(message: string, details?: Record<string, string[]>) {
        super(400, message, details);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends HttpError {
    constructor(message = 'Not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

export type InputSource = 'body' | 'query' | 'params';

/**
 * Build a keyed validation details object from a Zod error.
 * Issues without a path are keyed by the input source.
 */
export function zodErrorDetails(error: ZodError, source: InputSource = 'body'): Record<string, string[]> {
    const details: Record<string, string[]> = {};
    for (const issue of error.issues) {
        const key = issue.path.join('.') || source;
        (details[key] ??= []).push(issue.message);
    }
    return details;
}

/** Parse `value` with `schema`, throwing ValidationError on failure. */
export function parseInput<S extends ZodTypeAny>(schema: S, value: unknown, source: InputSource): z.output<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new ValidationError('Validation failed', zodErrorDetails(result.error, source));
    }
    return result.data;
}

function isBodyParseError(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

/** 4xx errors from body-parser (size limit, charset, encoding) carry a status and a safe message. */
function exposedClientError(err: unknown): { status: number; message: string } | null {
    if (typeof err !== 'object' || err === null || !('status' in err)) return null;
    const status = err.status;
    if (typeof status !== 'number' || status < 400 || status > 499) return null;
    if (!('expose' in err) || err.expose !== true) return null;
    const message = 'message' in err && typeof err.message === 'string' ? err.message : 'Bad request';
    return { status, message };
}

function send(res: Response, status: number, error: string, details?: Record<string, string[]>): void {
    const body: ErrorResponse = { error, code: status, ...(details && { details }) };
    res.status(status).json(body);
}

export const notFoundHandler: RequestHandler = (_req, res) => {
    send(res, 404, 'Route not found');
};

/** Maps thrown errors to JSON responses; unexpected ones are logged and hidden. */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
    return (err: unknown, req, res, next) => {
        if (res.headersSent) {
            next(err);
            return;
        }
        if (err instanceof HttpError) {
            send(res, err.status, err.message, err.details);
            return;
        }
        if (isBodyParseError(err)) {
            send(res, 400, 'Malformed JSON body');
            return;
        }
        const clientError = exposedClientError(err);
        if (clientError) {
            send(res, clientError.status, clientError.message);
            return;
        }
        logger.error({ err, method: req.method, url: req.originalUrl }, 'Unhandled request error');
        send(res, 500, 'An unexpected error occurred');
    };
}

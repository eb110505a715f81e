import type { ErrorRequestHandler, RequestHandler } from 'express';
import { HttpError, NotFoundError } from '../utils/errors.js';

// body-parser tags its parse failures with `type`
const isBodyParseError = (error: unknown): boolean =>
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed';

// http-errors marks client faults it is safe to describe with `expose`
const isExposedClientError = (
    error: unknown,
): error is { status: number; message: string } =>
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500 &&
    'expose' in error &&
    error.expose === true &&
    'message' in error &&
    typeof error.message === 'string';

export const notFound: RequestHandler = (_req, _res, next) => {
    next(new NotFoundError());
};

export const errorHandler: ErrorRequestHandler = (error, _req, res, _next) => {
    if (error instanceof HttpError) {
        res.status(error.status).json({ message: error.message });
        return;
    }

    if (isBodyParseError(error)) {
        res.status(400).json({ message: 'Malformed JSON body' });
        return;
    }

    if (isExposedClientError(error)) {
        res.status(error.status).json({ message: error.message });
        return;
    }

    console.error('Unhandled error:', error);
    res.status(500).json({ message: 'Internal server error' });
};

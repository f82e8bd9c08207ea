// src/middleware/body.middleware.ts
/// <reference path="../types/express/index.d.ts" />
import express, { Request, Response, NextFunction, RequestHandler } from 'express';
import { env } from '@/config/environment';

// Accept every content type: the bytes are kept as-is and decoded by whoever needs them
const rawParser = express.raw({ type: () => true, limit: env.BODY_LIMIT });

/**
 * Reads the inbound stream to completion, once, into `req.rawBody`.
 *
 * The stream cannot be re-read, so every later consumer (field validation, the
 * handler's DTO mapping) works from this buffer. Calling it again on the same
 * request is a no-op.
 */
export const captureRawBody: RequestHandler = (req: Request, res: Response, next: NextFunction): void => {
    if (req.rawBody !== undefined) {
        next();
        return;
    }
    rawParser(req, res, (err?: unknown) => {
        if (err) {
            next(err);
            return;
        }
        req.rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
        req.body = undefined;
        next();
    });
};

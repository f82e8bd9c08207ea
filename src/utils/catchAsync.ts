// src/utils/catchAsync.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown> | unknown;

/**
 * Wraps an asynchronous request handler so a rejected promise reaches the
 * Express error handling middleware instead of becoming an unhandled rejection.
 */
const catchAsync = (fn: AsyncRequestHandler): RequestHandler => {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
};

export default catchAsync;

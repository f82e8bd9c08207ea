// src/middleware/rateLimit.middleware.ts
import rateLimit from 'express-rate-limit';
import httpStatus from 'http-status';
import { env } from '@/config';
import ApiError from '@/utils/ApiError';
import logger from '@/utils/logger';

export const RATE_LIMIT_MESSAGE = 'Demasiadas solicitudes desde esta IP, intente de nuevo más tarde.';

// Applied to every /api/v1 request, per client IP
export const generalRateLimiter = rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MINUTES * 60 * 1000,
    limit: env.RATE_LIMIT_MAX_REQUESTS,
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false,
    handler: (req, res, next) => {
        logger.warn(`Rate limit exceeded for IP: ${req.ip}, Path: ${req.path}`);
        next(new ApiError(httpStatus.TOO_MANY_REQUESTS, RATE_LIMIT_MESSAGE));
    },
});

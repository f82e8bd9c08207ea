// src/middleware/error.middleware.ts
import { Request, Response, NextFunction } from 'express';
import { DatabaseError } from 'pg';
import httpStatus from 'http-status';
import { env } from '@/config/environment';
import logger from '@/utils/logger';
import ApiError, { ApiErrorDetails } from '@/utils/ApiError';

const readStatusCode = (error: unknown): number | undefined => {
    if (typeof error !== 'object' || error === null) return undefined;
    const candidate = 'statusCode' in error ? error.statusCode : 'status' in error ? error.status : undefined;
    return typeof candidate === 'number' ? candidate : undefined;
};

/**
 * Maps a PostgreSQL error onto an operational ApiError when its SQLSTATE is one
 * the client can act on.
 */
const convertDatabaseError = (error: DatabaseError): ApiError | null => {
    const details: ApiErrorDetails = { code: error.code, constraint: error.constraint };
    switch (error.code) {
        case '23505': // unique_violation
            return new ApiError(httpStatus.CONFLICT, 'El registro ya existe o viola una restricción de unicidad.', true, details, error.stack);
        case '23503': // foreign_key_violation
            return new ApiError(
                httpStatus.CONFLICT,
                'La operación no es posible porque el registro está referenciado o referencia un registro inexistente.',
                true,
                details,
                error.stack
            );
        case '23502': // not_null_violation
            return new ApiError(httpStatus.BAD_REQUEST, `El campo '${error.column ?? 'desconocido'}' no admite valores nulos.`, true, details, error.stack);
        case '22P02': // invalid_text_representation
        case '22003': // numeric_value_out_of_range
        case '22001': // string_data_right_truncation
            return new ApiError(httpStatus.BAD_REQUEST, 'Datos de entrada inválidos para la base de datos.', true, details, error.stack);
        default:
            logger.warn(`Unhandled PostgreSQL error code: ${error.code}`);
            return null;
    }
};

/**
 * Converts anything thrown by a handler into an ApiError before the final handler runs.
 */
export const errorConverter = (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (err instanceof ApiError) {
        next(err);
        return;
    }

    if (err instanceof DatabaseError) {
        const converted = convertDatabaseError(err);
        if (converted) {
            next(converted);
            return;
        }
    }

    const statusCode = readStatusCode(err) ?? httpStatus.INTERNAL_SERVER_ERROR;
    const message =
        err instanceof Error && err.message ? err.message : String(httpStatus[httpStatus.INTERNAL_SERVER_ERROR]);
    // A status below 500 was set on purpose by whatever threw (body-parser limits, aborted requests)
    const isOperational = statusCode < 500;
    const stack = err instanceof Error ? err.stack : undefined;

    next(new ApiError(statusCode, message, isOperational, undefined, stack));
};

/**
 * Final error handler: logs the error and renders the response envelope
 * `{ success: false, message, data? }`.
 */
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export const errorHandler = (err: ApiError, req: Request, res: Response, next: NextFunction): void => {
    let { statusCode, message, errorDetails } = err;

    // Never leak details of programming errors in production
    if (env.NODE_ENV === 'production' && !err.isOperational) {
        statusCode = httpStatus.INTERNAL_SERVER_ERROR;
        message = String(httpStatus[httpStatus.INTERNAL_SERVER_ERROR]);
        errorDetails = undefined;
    }

    res.locals.errorMessage = err.message;

    const response: Record<string, unknown> = {
        success: false,
        message,
        ...(errorDetails && { data: errorDetails }),
        ...(env.NODE_ENV === 'development' && { stack: err.stack }),
    };

    const summary = `[${statusCode}${err.isOperational ? '' : ' NON-OPERATIONAL'}] ${message} - ${req.method} ${req.originalUrl}`;
    if (statusCode >= 500) {
        logger.error(`${summary}${err.stack && !err.isOperational ? `\nStack: ${err.stack}` : ''}`);
    } else {
        logger.warn(summary);
    }

    res.status(statusCode).json(response);
};

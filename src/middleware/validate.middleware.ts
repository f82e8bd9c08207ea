// src/middleware/validate.middleware.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { validate, ValidationError } from 'class-validator';
import { plainToInstance, ClassConstructor } from 'class-transformer';
import httpStatus from 'http-status';
import ApiError from '@/utils/ApiError';
import logger from '@/utils/logger';
import { readJsonObject } from '@/utils/request-body';

/**
 * Recursively extracts constraint messages from validation errors.
 */
const formatValidationErrors = (errors: ValidationError[]): string[] => {
    let messages: string[] = [];
    errors.forEach((err) => {
        if (err.constraints) {
            messages = messages.concat(Object.values(err.constraints));
        }
        if (err.children && err.children.length > 0) {
            messages = messages.concat(formatValidationErrors(err.children));
        }
    });
    return messages;
};

const failureMessages = {
    body: 'Error de validación',
    query: 'Parámetros de consulta inválidos',
    params: 'Parámetros inválidos',
} as const;

/**
 * Middleware factory validating one part of the request against a class-validator DTO.
 *
 * Bodies are read from the captured `req.rawBody`, so this works for operations
 * that have no field-rule binding. The request itself is left unchanged; handlers
 * map the data again with the same DTO.
 *
 * @param dtoClass - DTO class to validate against.
 * @param source - Where the data lives. Defaults to 'body'.
 * @param skipUndefinedProperties - Skip validation of absent properties (partial updates). A `null`
 *   is still validated.
 */
const validateRequest = <T extends object>(
    dtoClass: ClassConstructor<T>,
    source: 'body' | 'query' | 'params' = 'body',
    skipUndefinedProperties = false
): RequestHandler => {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const dataToValidate = source === 'body' ? readJsonObject(req) : req[source];
            const dtoInstance = plainToInstance(dtoClass, dataToValidate);

            const errors = await validate(dtoInstance, {
                skipUndefinedProperties,
                whitelist: true,
                forbidNonWhitelisted: source === 'body',
                forbidUnknownValues: true,
            });

            if (errors.length > 0) {
                const errorMessages = formatValidationErrors(errors);
                logger.warn(`Validation Error (${req.method} ${req.originalUrl}): ${errorMessages.join(', ')}`);
                next(new ApiError(httpStatus.BAD_REQUEST, failureMessages[source], true, errorMessages));
                return;
            }

            next();
        } catch (error) {
            next(error);
        }
    };
};

export default validateRequest;

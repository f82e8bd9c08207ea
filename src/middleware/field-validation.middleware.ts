// src/middleware/field-validation.middleware.ts
/// <reference path="../types/express/index.d.ts" />
import { Request, Response, NextFunction, RequestHandler } from 'express';
import httpStatus from 'http-status';
import ApiError from '@/utils/ApiError';
import logger from '@/utils/logger';
import { captureRawBody } from './body.middleware';
import { decodeJsonObject, JsonObject } from '@/validation/json-document';
import { validateFields as runFieldRules } from '@/validation/field.validator';
import { OperationBindings, operationBindings } from '@/validation/operation.bindings';
import { ruleRegistry } from '@/validation/rule.registry';
import { RuleRegistry, RuleSet } from '@/validation/rule.types';

export const UNKNOWN_ENTITY_MESSAGE = 'Entidad no reconocida';
export const MALFORMED_JSON_MESSAGE = 'JSON mal formado';
export const VALIDATION_FAILED_MESSAGE = 'Error de validación';

export interface FieldValidationOptions {
    bindings: OperationBindings;
    registry: RuleRegistry;
    /** Validation engine; the rule interpreter unless a caller substitutes one. */
    validate?: (payload: JsonObject, rules: RuleSet) => string[];
}

/** Tags the request with the operation it is routed to, so the binding table can be consulted. */
export const operation = (operationId: string): RequestHandler =>
    (req: Request, res: Response, next: NextFunction): void => {
        req.operationId = operationId;
        next();
    };

/**
 * Builds the field-validation stage.
 *
 * Requests whose operation has no binding pass through untouched. Otherwise the
 * bound entity's rules are resolved, the captured body is parsed and validated,
 * and the request is either aborted with a 400 or handed on with `req.rawBody`
 * unchanged so the handler decodes exactly the bytes that were validated.
 */
export const createFieldValidation = ({
    bindings,
    registry,
    validate = runFieldRules,
}: FieldValidationOptions): RequestHandler => {
    return (req: Request, res: Response, next: NextFunction): void => {
        const entityKey = req.operationId === undefined ? undefined : bindings.get(req.operationId);
        if (entityKey === undefined) {
            next();
            return;
        }

        const rules = registry.resolve(entityKey);
        if (!rules) {
            logger.error(
                `Field validation misconfigured: operation "${req.operationId}" is bound to unknown entity "${entityKey}"`
            );
            next(new ApiError(httpStatus.BAD_REQUEST, UNKNOWN_ENTITY_MESSAGE));
            return;
        }

        captureRawBody(req, res, (err?: unknown) => {
            if (err) {
                next(err);
                return;
            }

            const payload = decodeJsonObject(req.rawBody ?? Buffer.alloc(0));
            if (!payload) {
                logger.warn(`Malformed JSON body (${req.method} ${req.originalUrl})`);
                next(new ApiError(httpStatus.BAD_REQUEST, MALFORMED_JSON_MESSAGE));
                return;
            }

            const violations = validate(payload, rules);
            if (violations.length > 0) {
                logger.warn(`Validation Error (${req.method} ${req.originalUrl}) for "${entityKey}": ${violations.join(' ')}`);
                next(new ApiError(httpStatus.BAD_REQUEST, VALIDATION_FAILED_MESSAGE, true, violations));
                return;
            }

            next();
        });
    };
};

export const validateFields = createFieldValidation({
    bindings: operationBindings,
    registry: ruleRegistry,
});

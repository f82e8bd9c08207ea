// src/utils/request-body.ts
/// <reference path="../types/express/index.d.ts" />
import { Request } from 'express';
import { plainToInstance, ClassConstructor } from 'class-transformer';
import ApiError from './ApiError';
import { decodeJsonObject, PlainJson, toPlainObject } from '@/validation/json-document';

/**
 * Decodes the captured request body into a plain object.
 * @throws {ApiError} 400 when the body is not a JSON object.
 */
export const readJsonObject = (req: Request): { [key: string]: PlainJson } => {
    const document = decodeJsonObject(req.rawBody ?? Buffer.alloc(0));
    if (!document) {
        throw ApiError.badRequest('JSON mal formado');
    }
    return toPlainObject(document);
};

/** Maps the captured body onto a DTO class, keeping only the properties it exposes. */
export const readBodyAs = <T extends object>(req: Request, dtoClass: ClassConstructor<T>): T =>
    plainToInstance(dtoClass, readJsonObject(req), { excludeExtraneousValues: true });

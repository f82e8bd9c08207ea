// src/modules/catalogs/catalog.controller.ts
import { Request, Response } from 'express';
import httpStatus from 'http-status';
import catchAsync from '@/utils/catchAsync';
import { sendSuccess } from '@/utils/response';
import { readJsonObject } from '@/utils/request-body';
import { catalogService } from './catalog.service';
import { CatalogDefinition, catalogMessages } from './catalog.definitions';

/** Builds the CRUD handlers of one catalog resource. */
export const createCatalogController = (definition: CatalogDefinition) => {
    const messages = catalogMessages(definition);

    const list = catchAsync(async (req: Request, res: Response) => {
        const rows = await catalogService.findAll(definition);
        sendSuccess(res, httpStatus.OK, messages.listed, rows);
    });

    const get = catchAsync(async (req: Request, res: Response) => {
        const row = await catalogService.getById(definition, Number(req.params.id));
        sendSuccess(res, httpStatus.OK, messages.found, row);
    });

    const create = catchAsync(async (req: Request, res: Response) => {
        const row = await catalogService.create(definition, readJsonObject(req));
        sendSuccess(res, httpStatus.CREATED, messages.created, row);
    });

    const update = catchAsync(async (req: Request, res: Response) => {
        const row = await catalogService.update(definition, Number(req.params.id), readJsonObject(req));
        sendSuccess(res, httpStatus.OK, messages.updated, row);
    });

    const remove = catchAsync(async (req: Request, res: Response) => {
        await catalogService.remove(definition, Number(req.params.id));
        sendSuccess(res, httpStatus.OK, messages.deleted);
    });

    return { list, get, create, update, remove };
};

// src/modules/catalogs/catalog.routes.ts
import express, { Router } from 'express';
import validateRequest from '@/middleware/validate.middleware';
import { operation, validateFields } from '@/middleware/field-validation.middleware';
import { IdParamDto } from '@/dto/id-param.dto';
import { createCatalogController } from './catalog.controller';
import { CatalogDefinition, catalogDefinitions } from './catalog.definitions';

export const createCatalogRouter = (definition: CatalogDefinition): Router => {
    const router = express.Router();
    const controller = createCatalogController(definition);

    router.route('/')
        .get(controller.list)
        .post(operation(`${definition.resource}.create`), validateFields, controller.create);

    router.route('/:id')
        .get(validateRequest(IdParamDto, 'params'), controller.get)
        .put(
            validateRequest(IdParamDto, 'params'),
            operation(`${definition.resource}.update`),
            validateFields,
            controller.update
        )
        .delete(validateRequest(IdParamDto, 'params'), controller.remove);

    return router;
};

/** Mounts every catalog resource under its own path. */
const router = express.Router();
catalogDefinitions.forEach((definition) => {
    router.use(`/${definition.resource}`, createCatalogRouter(definition));
});

export default router;

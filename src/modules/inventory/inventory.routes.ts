// src/modules/inventory/inventory.routes.ts
import express from 'express';
import { inventoryController } from './inventory.controller';
import validateRequest from '@/middleware/validate.middleware';
import { operation, validateFields } from '@/middleware/field-validation.middleware';
import { IdParamDto } from '@/dto/id-param.dto';

const router = express.Router();
const validId = validateRequest(IdParamDto, 'params');

router.route('/')
    .get(inventoryController.getInventarios)
    .post(operation('inventarios.create'), validateFields, inventoryController.createInventario);

router.get('/usuario/:id', validId, inventoryController.getInventariosByUsuario);
router.get('/:id/ambientes', validId, inventoryController.getAmbientes);

router.route('/:id')
    .get(validId, inventoryController.getInventario)
    .put(validId, operation('inventarios.update'), validateFields, inventoryController.updateInventario)
    .delete(validId, inventoryController.deleteInventario);

export default router;

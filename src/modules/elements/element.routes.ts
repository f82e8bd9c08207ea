// src/modules/elements/element.routes.ts
import express from 'express';
import { elementController } from './element.controller';
import validateRequest from '@/middleware/validate.middleware';
import { operation, validateFields } from '@/middleware/field-validation.middleware';
import { IdParamDto } from '@/dto/id-param.dto';
import { EstadoActivoParamDto, PlacaParamDto } from './dto/element-params.dto';

const router = express.Router();
const validId = validateRequest(IdParamDto, 'params');

router.route('/')
    .get(elementController.getElementos)
    .post(operation('elementos.create'), validateFields, elementController.createElemento);

router.get('/inventario/:id', validId, elementController.getElementosByInventario);
router.get('/placa/:placa', validateRequest(PlacaParamDto, 'params'), elementController.getElementoByPlaca);
router.put('/:id/estado/:estado', validateRequest(EstadoActivoParamDto, 'params'), elementController.updateEstadoActivo);

router.route('/:id')
    .get(validId, elementController.getElemento)
    .put(validId, operation('elementos.update'), validateFields, elementController.updateElemento)
    .delete(validId, elementController.deleteElemento);

export default router;

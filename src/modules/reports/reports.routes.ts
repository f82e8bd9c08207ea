// src/modules/reports/reports.routes.ts
import express from 'express';
import { reportController } from './reports.controller';
import validateRequest from '@/middleware/validate.middleware';
import { operation, validateFields } from '@/middleware/field-validation.middleware';
import { IdParamDto } from '@/dto/id-param.dto';

const router = express.Router();
const validId = validateRequest(IdParamDto, 'params');

router.route('/')
    .get(reportController.getReportes)
    .post(operation('reportes.create'), validateFields, reportController.createReporte);

router.get('/inventario/:id', validId, reportController.getReportesByInventario);

router.route('/:id')
    .get(validId, reportController.getReporte)
    .put(validId, operation('reportes.update'), validateFields, reportController.updateReporte)
    .delete(validId, reportController.deleteReporte);

export default router;

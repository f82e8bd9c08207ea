// src/modules/reports/reports.controller.ts
import { Request, Response } from 'express';
import httpStatus from 'http-status';
import { reportService } from './reports.service';
import catchAsync from '@/utils/catchAsync';
import { sendSuccess } from '@/utils/response';
import { readBodyAs } from '@/utils/request-body';
import { ReporteDto } from './dto/reporte.dto';

const getReportes = catchAsync(async (req: Request, res: Response) => {
    const reportes = await reportService.queryReportes();
    sendSuccess(res, httpStatus.OK, 'Reportes obtenidos correctamente', reportes);
});

const getReporte = catchAsync(async (req: Request, res: Response) => {
    const reporte = await reportService.getReporteById(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Reporte obtenido correctamente', reporte);
});

const getReportesByInventario = catchAsync(async (req: Request, res: Response) => {
    const reportes = await reportService.getReportesByInventario(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Reportes del inventario obtenidos correctamente', reportes);
});

const createReporte = catchAsync(async (req: Request, res: Response) => {
    const reporte = await reportService.createReporte(readBodyAs(req, ReporteDto));
    sendSuccess(res, httpStatus.CREATED, 'Reporte creado correctamente', reporte);
});

const updateReporte = catchAsync(async (req: Request, res: Response) => {
    const reporte = await reportService.updateReporteById(Number(req.params.id), readBodyAs(req, ReporteDto));
    sendSuccess(res, httpStatus.OK, 'Reporte actualizado correctamente', reporte);
});

const deleteReporte = catchAsync(async (req: Request, res: Response) => {
    await reportService.deleteReporteById(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Reporte eliminado correctamente');
});

export const reportController = {
    getReportes,
    getReporte,
    getReportesByInventario,
    createReporte,
    updateReporte,
    deleteReporte,
};

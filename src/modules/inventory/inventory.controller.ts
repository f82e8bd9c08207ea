// src/modules/inventory/inventory.controller.ts
import { Request, Response } from 'express';
import httpStatus from 'http-status';
import { inventoryService } from './inventory.service';
import catchAsync from '@/utils/catchAsync';
import { sendSuccess } from '@/utils/response';
import { readBodyAs } from '@/utils/request-body';
import { InventarioDto } from './dto/inventario.dto';

const getInventarios = catchAsync(async (req: Request, res: Response) => {
    const inventarios = await inventoryService.queryInventarios();
    sendSuccess(res, httpStatus.OK, 'Inventarios obtenidos correctamente', inventarios);
});

const getInventario = catchAsync(async (req: Request, res: Response) => {
    const inventario = await inventoryService.getInventarioById(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Inventario obtenido correctamente', inventario);
});

const getInventariosByUsuario = catchAsync(async (req: Request, res: Response) => {
    const inventarios = await inventoryService.getInventariosByUsuario(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Inventarios del usuario obtenidos correctamente', inventarios);
});

const getAmbientes = catchAsync(async (req: Request, res: Response) => {
    const ambientes = await inventoryService.getAmbientesByInventario(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Ambientes del inventario obtenidos correctamente', ambientes);
});

const createInventario = catchAsync(async (req: Request, res: Response) => {
    const inventario = await inventoryService.createInventario(readBodyAs(req, InventarioDto));
    sendSuccess(res, httpStatus.CREATED, 'Inventario creado correctamente', inventario);
});

const updateInventario = catchAsync(async (req: Request, res: Response) => {
    const inventario = await inventoryService.updateInventarioById(Number(req.params.id), readBodyAs(req, InventarioDto));
    sendSuccess(res, httpStatus.OK, 'Inventario actualizado correctamente', inventario);
});

const deleteInventario = catchAsync(async (req: Request, res: Response) => {
    await inventoryService.deleteInventarioById(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Inventario eliminado correctamente');
});

export const inventoryController = {
    getInventarios,
    getInventario,
    getInventariosByUsuario,
    getAmbientes,
    createInventario,
    updateInventario,
    deleteInventario,
};

// src/modules/elements/element.controller.ts
import { Request, Response } from 'express';
import httpStatus from 'http-status';
import { elementService } from './element.service';
import catchAsync from '@/utils/catchAsync';
import { sendSuccess } from '@/utils/response';
import { readBodyAs } from '@/utils/request-body';
import { ElementoDto } from './dto/elemento.dto';

const getElementos = catchAsync(async (req: Request, res: Response) => {
    const elementos = await elementService.queryElementos();
    sendSuccess(res, httpStatus.OK, 'Elementos obtenidos correctamente', elementos);
});

const getElemento = catchAsync(async (req: Request, res: Response) => {
    const elemento = await elementService.getElementoById(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Elemento obtenido correctamente', elemento);
});

const getElementoByPlaca = catchAsync(async (req: Request, res: Response) => {
    const elemento = await elementService.getElementoByPlaca(Number(req.params.placa));
    sendSuccess(res, httpStatus.OK, 'Elemento obtenido correctamente', elemento);
});

const getElementosByInventario = catchAsync(async (req: Request, res: Response) => {
    const elementos = await elementService.getElementosByInventario(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Elementos del inventario obtenidos correctamente', elementos);
});

const createElemento = catchAsync(async (req: Request, res: Response) => {
    const elemento = await elementService.createElemento(readBodyAs(req, ElementoDto));
    sendSuccess(res, httpStatus.CREATED, 'Elemento creado correctamente', elemento);
});

const updateElemento = catchAsync(async (req: Request, res: Response) => {
    const elemento = await elementService.updateElementoById(Number(req.params.id), readBodyAs(req, ElementoDto));
    sendSuccess(res, httpStatus.OK, 'Elemento actualizado correctamente', elemento);
});

const updateEstadoActivo = catchAsync(async (req: Request, res: Response) => {
    const elemento = await elementService.setEstadoActivo(Number(req.params.id), req.params.estado === 'true');
    sendSuccess(res, httpStatus.OK, 'Estado del elemento actualizado correctamente', elemento);
});

const deleteElemento = catchAsync(async (req: Request, res: Response) => {
    await elementService.deleteElementoById(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Elemento eliminado correctamente');
});

export const elementController = {
    getElementos,
    getElemento,
    getElementoByPlaca,
    getElementosByInventario,
    createElemento,
    updateElemento,
    updateEstadoActivo,
    deleteElemento,
};

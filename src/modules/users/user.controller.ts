// src/modules/users/user.controller.ts
import { Request, Response } from 'express';
import httpStatus from 'http-status';
import { userService } from './user.service';
import catchAsync from '@/utils/catchAsync';
import { sendSuccess } from '@/utils/response';
import { readBodyAs } from '@/utils/request-body';
import { CreateUsuarioDto } from './dto/create-usuario.dto';
import { UpdateUsuarioDto } from './dto/update-usuario.dto';

const createUsuario = catchAsync(async (req: Request, res: Response) => {
    const usuario = await userService.createUsuario(readBodyAs(req, CreateUsuarioDto));
    sendSuccess(res, httpStatus.CREATED, 'Usuario creado correctamente', usuario);
});

const getUsuarios = catchAsync(async (req: Request, res: Response) => {
    const usuarios = await userService.queryUsuarios();
    sendSuccess(res, httpStatus.OK, 'Usuarios obtenidos correctamente', usuarios);
});

const getUsuario = catchAsync(async (req: Request, res: Response) => {
    const usuario = await userService.getUsuarioById(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Usuario obtenido correctamente', usuario);
});

const getUsuarioByDocumento = catchAsync(async (req: Request, res: Response) => {
    const usuario = await userService.getUsuarioByDocumento(req.params.documento);
    sendSuccess(res, httpStatus.OK, 'Usuario obtenido correctamente', usuario);
});

const getUsuarioByCorreo = catchAsync(async (req: Request, res: Response) => {
    const usuario = await userService.getUsuarioByCorreo(req.params.correo);
    sendSuccess(res, httpStatus.OK, 'Usuario obtenido correctamente', usuario);
});

const updateUsuario = catchAsync(async (req: Request, res: Response) => {
    const usuario = await userService.updateUsuarioById(Number(req.params.id), readBodyAs(req, UpdateUsuarioDto));
    sendSuccess(res, httpStatus.OK, 'Usuario actualizado correctamente', usuario);
});

const deleteUsuario = catchAsync(async (req: Request, res: Response) => {
    await userService.deleteUsuarioById(Number(req.params.id));
    sendSuccess(res, httpStatus.OK, 'Usuario eliminado correctamente');
});

export const userController = {
    createUsuario,
    getUsuarios,
    getUsuario,
    getUsuarioByDocumento,
    getUsuarioByCorreo,
    updateUsuario,
    deleteUsuario,
};

// src/modules/users/user.routes.ts
import express from 'express';
import { userController } from './user.controller';
import validateRequest from '@/middleware/validate.middleware';
import { operation, validateFields } from '@/middleware/field-validation.middleware';
import { IdParamDto } from '@/dto/id-param.dto';
import { UpdateUsuarioDto } from './dto/update-usuario.dto';

const router = express.Router();

router.route('/')
    .post(operation('usuarios.create'), validateFields, userController.createUsuario)
    .get(userController.getUsuarios);

router.get('/documento/:documento', userController.getUsuarioByDocumento);
router.get('/correo/:correo', userController.getUsuarioByCorreo);

router.route('/:id')
    .get(validateRequest(IdParamDto, 'params'), userController.getUsuario)
    .put(
        validateRequest(IdParamDto, 'params'),
        // Unbound: partial updates are checked by the DTO instead of the rule table
        operation('usuarios.update'),
        validateFields,
        validateRequest(UpdateUsuarioDto, 'body', true),
        userController.updateUsuario
    )
    .delete(validateRequest(IdParamDto, 'params'), userController.deleteUsuario);

export default router;

// src/modules/users/dto/create-usuario.dto.ts
import { Expose } from 'class-transformer';

/**
 * Body of POST /usuarios. Field rules are enforced by the `usuario` rule table
 * before the handler runs; this class only maps the validated payload.
 */
export class CreateUsuarioDto {
    @Expose() nombres!: string;
    @Expose() apellidos!: string;
    @Expose() tipo_documento_id!: number;
    @Expose() documento!: string;
    @Expose() genero_id!: number;
    @Expose() telefono!: string;
    @Expose() correo!: string;
    @Expose() ficha_id?: number | null;
    @Expose() contrasena!: string;
    @Expose() rol_id?: number | null;
}

// src/modules/users/dto/usuario.rules.ts
import { defineRules } from '@/validation/rule.types';

export const usuarioRules = defineRules([
    { name: 'nombres', required: true, minimum: 3, maximum: 100, kind: 'text' },
    { name: 'apellidos', required: true, minimum: 3, maximum: 100, kind: 'text' },
    { name: 'tipo_documento_id', required: true, minimum: 1, maximum: 2, kind: 'number' },
    { name: 'documento', required: true, minimum: 10, maximum: 11, kind: 'text' },
    { name: 'genero_id', required: true, minimum: 1, maximum: 2, kind: 'number' },
    { name: 'telefono', required: true, minimum: 8, maximum: 15, kind: 'text' },
    { name: 'correo', required: true, minimum: 6, maximum: 100, kind: 'text' },
    { name: 'ficha_id', required: false, minimum: 1, maximum: 2, kind: 'number' },
    { name: 'contrasena', required: true, minimum: 8, maximum: 50, kind: 'text' },
    { name: 'rol_id', required: false, minimum: 1, maximum: 2, kind: 'number' },
]);

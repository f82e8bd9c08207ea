// src/modules/inventory/dto/inventario.rules.ts
import { defineRules } from '@/validation/rule.types';

export const inventarioRules = defineRules([
    { name: 'nombre', required: true, minimum: 3, maximum: 50, kind: 'text' },
    // yyyy-MM-dd
    { name: 'fecha_creacion', required: true, minimum: 10, maximum: 10, kind: 'date' },
    { name: 'usuario_admin_id', required: true, minimum: 1, maximum: 2, kind: 'number' },
]);

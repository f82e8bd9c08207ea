// src/modules/elements/dto/elemento.rules.ts
import { defineRules } from '@/validation/rule.types';

// Element payloads use camelCase field names, unlike the other entities.
export const elementoRules = defineRules([
    { name: 'placa', required: true, minimum: 1, maximum: 50, kind: 'number' },
    { name: 'serial', required: false, minimum: 0, maximum: 50, kind: 'text' },
    { name: 'tipoElementoId', required: true, minimum: 1, maximum: 2, kind: 'number' },
    { name: 'fechaAdquisicion', required: true, minimum: 10, maximum: 10, kind: 'date' },
    { name: 'valorMonetario', required: true, minimum: 1, maximum: 20, kind: 'number' },
    { name: 'estadoId', required: true, minimum: 1, maximum: 2, kind: 'number' },
    { name: 'estadoActivo', required: true, minimum: 0, maximum: 0, kind: 'boolean' },
    { name: 'ambienteId', required: true, minimum: 1, maximum: 2, kind: 'number' },
    { name: 'inventarioId', required: true, minimum: 1, maximum: 2, kind: 'number' },
]);

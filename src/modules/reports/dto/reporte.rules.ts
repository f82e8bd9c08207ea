// src/modules/reports/dto/reporte.rules.ts
import { defineRules } from '@/validation/rule.types';

// The report date is assigned by the database, so it is not part of the payload.
export const reporteRules = defineRules([
    { name: 'asunto', required: true, minimum: 1, maximum: 100, kind: 'text' },
    { name: 'mensaje', required: true, minimum: 1, maximum: 1000, kind: 'text' },
    { name: 'usuario_id', required: true, minimum: 1, maximum: 2, kind: 'number' },
    { name: 'elemento_id', required: true, minimum: 1, maximum: 2, kind: 'number' },
]);

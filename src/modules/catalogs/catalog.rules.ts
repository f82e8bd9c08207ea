// src/modules/catalogs/catalog.rules.ts
import { defineRules } from '@/validation/rule.types';

export const rolRules = defineRules([
    { name: 'nombre', required: true, minimum: 3, maximum: 30, kind: 'text' },
    { name: 'descripcion', required: false, minimum: 0, maximum: 250, kind: 'text' },
]);

export const tipoDocumentoRules = defineRules([
    { name: 'nombre', required: true, minimum: 3, maximum: 50, kind: 'text' },
]);

export const programaFormacionRules = defineRules([
    { name: 'nombre', required: true, minimum: 3, maximum: 100, kind: 'text' },
]);

export const fichaRules = defineRules([
    { name: 'ficha', required: true, minimum: 7, maximum: 20, kind: 'text' },
    { name: 'programa_id', required: false, minimum: 1, maximum: 2, kind: 'number' },
]);

export const generoRules = defineRules([
    { name: 'nombre', required: true, minimum: 3, maximum: 50, kind: 'text' },
]);

export const ciudadRules = defineRules([
    { name: 'nombre', required: true, minimum: 3, maximum: 50, kind: 'text' },
]);

export const centroRules = defineRules([
    { name: 'nombre', required: true, minimum: 3, maximum: 50, kind: 'text' },
    { name: 'direccion', required: true, minimum: 5, maximum: 50, kind: 'text' },
    { name: 'ciudad_id', required: true, minimum: 1, maximum: 2, kind: 'number' },
]);

export const ambienteRules = defineRules([
    { name: 'nombre', required: true, minimum: 3, maximum: 50, kind: 'text' },
    { name: 'centro_id', required: true, minimum: 1, maximum: 2, kind: 'number' },
]);

export const tipoElementoRules = defineRules([
    { name: 'nombre', required: true, minimum: 3, maximum: 50, kind: 'text' },
    { name: 'consecutivo', required: true, minimum: 1, maximum: 10, kind: 'number' },
    { name: 'descripcion', required: false, minimum: 0, maximum: 250, kind: 'text' },
    { name: 'marca', required: false, minimum: 0, maximum: 50, kind: 'text' },
    { name: 'modelo', required: false, minimum: 0, maximum: 50, kind: 'text' },
    { name: 'atributos', required: true, minimum: 3, maximum: 250, kind: 'text' },
]);

export const estadoRules = defineRules([
    { name: 'nombre', required: true, minimum: 3, maximum: 20, kind: 'text' },
]);

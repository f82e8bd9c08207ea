// src/validation/operation.bindings.ts
import { EntityKey } from './rule.types';

/**
 * Maps an operation identifier to the entity key whose rules validate its body.
 * Keys are plain strings here; a key the registry does not know is reported at
 * request time as a configuration error.
 */
export type OperationBindings = ReadonlyMap<string, string>;

export const createOperationBindings = (entries: Readonly<Record<string, string>>): OperationBindings =>
    new Map(Object.entries(entries));

export const operationBindings: OperationBindings = createOperationBindings({
    'usuarios.create': 'usuario',
    // usuarios.update is left unbound: partial updates go through UpdateUsuarioDto instead.
    'roles.create': 'rol',
    'roles.update': 'rol',
    'tipos-documento.create': 'tipo_documento',
    'tipos-documento.update': 'tipo_documento',
    'programas-formacion.create': 'programa_formacion',
    'programas-formacion.update': 'programa_formacion',
    'fichas.create': 'ficha',
    'fichas.update': 'ficha',
    'generos.create': 'genero',
    'generos.update': 'genero',
    'ciudades.create': 'ciudad',
    'ciudades.update': 'ciudad',
    'centros.create': 'centro',
    'centros.update': 'centro',
    'ambientes.create': 'ambiente',
    'ambientes.update': 'ambiente',
    'estados.create': 'estado',
    'estados.update': 'estado',
    'tipos-elemento.create': 'tipo_elemento',
    'tipos-elemento.update': 'tipo_elemento',
    'inventarios.create': 'inventario',
    'inventarios.update': 'inventario',
    'elementos.create': 'elemento',
    'elementos.update': 'elemento',
    'reportes.create': 'reporte',
    'reportes.update': 'reporte',
} satisfies Record<string, EntityKey>);

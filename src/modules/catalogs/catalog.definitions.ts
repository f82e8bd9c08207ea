// src/modules/catalogs/catalog.definitions.ts

/**
 * A lookup table managed through the generic catalog endpoints. The payload's
 * field names are the table's column names.
 */
export interface CatalogDefinition {
    /** URL segment under /api/v1, also the prefix of the operation ids. */
    resource: string;
    table: string;
    columns: readonly string[];
    /** Singular and plural names used in response messages. */
    label: string;
    pluralLabel: string;
    gender: 'm' | 'f';
}

export const catalogDefinitions: readonly CatalogDefinition[] = [
    { resource: 'roles', table: 'roles', columns: ['nombre', 'descripcion'], label: 'Rol', pluralLabel: 'Roles', gender: 'm' },
    { resource: 'tipos-documento', table: 'tipos_documento', columns: ['nombre'], label: 'Tipo de documento', pluralLabel: 'Tipos de documento', gender: 'm' },
    { resource: 'programas-formacion', table: 'programas_formacion', columns: ['nombre'], label: 'Programa de formación', pluralLabel: 'Programas de formación', gender: 'm' },
    { resource: 'fichas', table: 'fichas', columns: ['ficha', 'programa_id'], label: 'Ficha', pluralLabel: 'Fichas', gender: 'f' },
    { resource: 'generos', table: 'generos', columns: ['nombre'], label: 'Género', pluralLabel: 'Géneros', gender: 'm' },
    { resource: 'ciudades', table: 'ciudades', columns: ['nombre'], label: 'Ciudad', pluralLabel: 'Ciudades', gender: 'f' },
    { resource: 'centros', table: 'centros', columns: ['nombre', 'direccion', 'ciudad_id'], label: 'Centro', pluralLabel: 'Centros', gender: 'm' },
    { resource: 'ambientes', table: 'ambientes', columns: ['nombre', 'centro_id'], label: 'Ambiente', pluralLabel: 'Ambientes', gender: 'm' },
    { resource: 'estados', table: 'estados', columns: ['nombre'], label: 'Estado', pluralLabel: 'Estados', gender: 'm' },
    {
        resource: 'tipos-elemento',
        table: 'tipos_elementos',
        columns: ['nombre', 'consecutivo', 'descripcion', 'marca', 'modelo', 'atributos'],
        label: 'Tipo de elemento',
        pluralLabel: 'Tipos de elemento',
        gender: 'm',
    },
];

const ending = (definition: CatalogDefinition, plural = false): string =>
    `${definition.gender === 'f' ? 'a' : 'o'}${plural ? 's' : ''}`;

export const catalogMessages = (definition: CatalogDefinition) => ({
    listed: `${definition.pluralLabel} obtenid${ending(definition, true)} correctamente`,
    found: `${definition.label} obtenid${ending(definition)} correctamente`,
    created: `${definition.label} cread${ending(definition)} correctamente`,
    updated: `${definition.label} actualizad${ending(definition)} correctamente`,
    deleted: `${definition.label} eliminad${ending(definition)} correctamente`,
    notFound: `${definition.label} no encontrad${ending(definition)}`,
});

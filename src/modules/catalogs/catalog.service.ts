// src/modules/catalogs/catalog.service.ts
import { db } from '@/config';
import ApiError from '@/utils/ApiError';
import logger from '@/utils/logger';
import { PlainJson } from '@/validation/json-document';
import { CatalogDefinition, catalogMessages } from './catalog.definitions';

export type CatalogRow = { id: number } & Record<string, unknown>;
export type CatalogInput = { [key: string]: PlainJson };

type LogContext = {
    function: string;
    table: string;
    id?: number;
    [key: string]: unknown;
};

// Table and column names come from the static definitions, never from the request
const selectList = (definition: CatalogDefinition): string => ['id', ...definition.columns].join(', ');

const valuesOf = (definition: CatalogDefinition, input: CatalogInput): PlainJson[] =>
    definition.columns.map((column) => input[column] ?? null);

const findAll = async (definition: CatalogDefinition): Promise<CatalogRow[]> => {
    const result = await db.query<CatalogRow>(`SELECT ${selectList(definition)} FROM ${definition.table} ORDER BY id`);
    return result.rows;
};

const findById = async (definition: CatalogDefinition, id: number): Promise<CatalogRow | null> => {
    const result = await db.query<CatalogRow>(
        `SELECT ${selectList(definition)} FROM ${definition.table} WHERE id = $1`,
        [id]
    );
    return result.rows[0] ?? null;
};

const getById = async (definition: CatalogDefinition, id: number): Promise<CatalogRow> => {
    const row = await findById(definition, id);
    if (!row) {
        throw ApiError.notFound(catalogMessages(definition).notFound);
    }
    return row;
};

const create = async (definition: CatalogDefinition, input: CatalogInput): Promise<CatalogRow> => {
    const logContext: LogContext = { function: 'createCatalogEntry', table: definition.table };
    const placeholders = definition.columns.map((_, index) => `$${index + 1}`).join(', ');
    const result = await db.query<CatalogRow>(
        `INSERT INTO ${definition.table} (${definition.columns.join(', ')}) VALUES (${placeholders}) RETURNING ${selectList(definition)}`,
        valuesOf(definition, input)
    );
    const created = result.rows[0];
    if (!created) {
        throw ApiError.internal(`Insert into ${definition.table} returned no row`);
    }
    logContext.id = created.id;
    logger.info('Catalog entry created', logContext);
    return created;
};

const update = async (definition: CatalogDefinition, id: number, input: CatalogInput): Promise<CatalogRow> => {
    const assignments = definition.columns.map((column, index) => `${column} = $${index + 1}`).join(', ');
    const result = await db.query<CatalogRow>(
        `UPDATE ${definition.table} SET ${assignments} WHERE id = $${definition.columns.length + 1} RETURNING ${selectList(definition)}`,
        [...valuesOf(definition, input), id]
    );
    const updated = result.rows[0];
    if (!updated) {
        throw ApiError.notFound(catalogMessages(definition).notFound);
    }
    logger.info('Catalog entry updated', { function: 'updateCatalogEntry', table: definition.table, id });
    return updated;
};

const remove = async (definition: CatalogDefinition, id: number): Promise<void> => {
    const result = await db.query(`DELETE FROM ${definition.table} WHERE id = $1`, [id]);
    if (result.rowCount === 0) {
        throw ApiError.notFound(catalogMessages(definition).notFound);
    }
    logger.info('Catalog entry deleted', { function: 'deleteCatalogEntry', table: definition.table, id });
};

export const catalogService = {
    findAll,
    findById,
    getById,
    create,
    update,
    remove,
};

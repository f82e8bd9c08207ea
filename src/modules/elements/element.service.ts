// src/modules/elements/element.service.ts
import { db } from '@/config';
import { Queryable } from '@/config/database';
import ApiError from '@/utils/ApiError';
import logger from '@/utils/logger';
import { toDateOnly } from '@/utils/date.utils';
import { ElementoDto } from './dto/elemento.dto';

export interface Elemento {
    id: number;
    placa: number;
    serial: string | null;
    tipoElementoId: number;
    fechaAdquisicion: string | null;
    valorMonetario: number;
    estadoId: number;
    observaciones: string | null;
    estadoActivo: boolean;
    ambienteId: number | null;
    inventarioId: number;
}

// pg hands BIGINT and NUMERIC back as strings and DATE as a Date
type ElementoRow = Omit<Elemento, 'placa' | 'valorMonetario' | 'fechaAdquisicion'> & {
    placa: string | number;
    valorMonetario: string | number;
    fechaAdquisicion: Date | string | null;
};

type LogContext = {
    function?: string;
    elementoId?: number | null;
    placa?: number;
    inventarioId?: number;
    [key: string]: unknown;
};

export const ELEMENTO_NOT_FOUND = 'Elemento no encontrado';

const ELEMENTO_COLUMNS = `id, placa, serial,
    tipo_elemento_id AS "tipoElementoId",
    fecha_adquisicion AS "fechaAdquisicion",
    valor_monetario AS "valorMonetario",
    estado_id AS "estadoId",
    observaciones,
    estado_activo AS "estadoActivo",
    ambiente_id AS "ambienteId",
    inventario_id AS "inventarioId"`;

const toElemento = (row: ElementoRow): Elemento => ({
    ...row,
    placa: Number(row.placa),
    valorMonetario: Number(row.valorMonetario),
    fechaAdquisicion: toDateOnly(row.fechaAdquisicion),
});

/**
 * Placa is always unique; serial only when one is given.
 * @param excludeId - The element being updated.
 */
const assertUnique = async (
    data: ElementoDto,
    client: Queryable,
    logContext: LogContext,
    excludeId?: number
): Promise<void> => {
    const placa = await db.query<{ id: number }>('SELECT id FROM elementos WHERE placa = $1', [data.placa], client);
    if (placa.rows.some((row) => row.id !== excludeId)) {
        logger.warn('Elemento write rejected: placa already registered', logContext);
        throw ApiError.conflict(`Ya existe un elemento con la placa ${data.placa}`);
    }

    if (data.serial) {
        const serial = await db.query<{ id: number }>('SELECT id FROM elementos WHERE serial = $1', [data.serial], client);
        if (serial.rows.some((row) => row.id !== excludeId)) {
            logger.warn('Elemento write rejected: serial already registered', logContext);
            throw ApiError.conflict(`Ya existe un elemento con el serial ${data.serial}`);
        }
    }
};

/**
 * Checks the rule table cannot express: placa is a BIGINT but travels as a JS number,
 * and observaciones has no rule at all.
 */
const assertWritable = (data: ElementoDto, logContext: LogContext): void => {
    const violations: string[] = [];
    if (!Number.isSafeInteger(data.placa) || data.placa < 1) {
        violations.push(`El campo 'placa' debe ser un número entero entre 1 y ${Number.MAX_SAFE_INTEGER}.`);
    }
    const observaciones: unknown = data.observaciones;
    if (observaciones !== undefined && observaciones !== null && typeof observaciones !== 'string') {
        violations.push("El campo 'observaciones' debe ser de tipo texto.");
    }
    if (violations.length > 0) {
        logger.warn(`Elemento write rejected: ${violations.join(', ')}`, logContext);
        throw ApiError.badRequest('Error de validación', violations);
    }
};

const touchInventario = async (client: Queryable, inventarioId: number): Promise<void> => {
    await db.query('UPDATE inventarios SET ultima_actualizacion = CURRENT_DATE WHERE id = $1', [inventarioId], client);
};

const valuesOf = (data: ElementoDto): unknown[] => [
    data.placa,
    data.serial ?? null,
    data.tipoElementoId,
    data.fechaAdquisicion,
    data.valorMonetario,
    data.estadoId,
    data.observaciones ?? null,
    data.estadoActivo,
    data.ambienteId,
    data.inventarioId,
];

const queryElementos = async (): Promise<Elemento[]> => {
    const result = await db.query<ElementoRow>(`SELECT ${ELEMENTO_COLUMNS} FROM elementos ORDER BY id DESC`);
    return result.rows.map(toElemento);
};

const getElementoById = async (id: number): Promise<Elemento> => {
    const result = await db.query<ElementoRow>(`SELECT ${ELEMENTO_COLUMNS} FROM elementos WHERE id = $1`, [id]);
    const row = result.rows[0];
    if (!row) throw ApiError.notFound(ELEMENTO_NOT_FOUND);
    return toElemento(row);
};

const getElementoByPlaca = async (placa: number): Promise<Elemento> => {
    const result = await db.query<ElementoRow>(`SELECT ${ELEMENTO_COLUMNS} FROM elementos WHERE placa = $1`, [placa]);
    const row = result.rows[0];
    if (!row) throw ApiError.notFound(ELEMENTO_NOT_FOUND);
    return toElemento(row);
};

const getElementosByInventario = async (inventarioId: number): Promise<Elemento[]> => {
    const result = await db.query<ElementoRow>(
        `SELECT ${ELEMENTO_COLUMNS} FROM elementos WHERE inventario_id = $1 ORDER BY id DESC`,
        [inventarioId]
    );
    return result.rows.map(toElemento);
};

/** Inserts the element and bumps its inventory's last-update date in one transaction. */
const createElemento = async (data: ElementoDto): Promise<Elemento> => {
    const logContext: LogContext = { function: 'createElemento', placa: data.placa, inventarioId: data.inventarioId };
    assertWritable(data, logContext);

    const elemento = await db.transaction(async (client) => {
        await assertUnique(data, client, logContext);
        const result = await db.query<ElementoRow>(
            `INSERT INTO elementos (placa, serial, tipo_elemento_id, fecha_adquisicion, valor_monetario, estado_id,
                                    observaciones, estado_activo, ambiente_id, inventario_id)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
             RETURNING ${ELEMENTO_COLUMNS}`,
            valuesOf(data),
            client
        );
        const row = result.rows[0];
        if (!row) throw ApiError.internal('Elemento insert returned no row');
        await touchInventario(client, data.inventarioId);
        return toElemento(row);
    });

    logContext.elementoId = elemento.id;
    logger.info('Elemento created successfully', logContext);
    return elemento;
};

const updateElementoById = async (id: number, data: ElementoDto): Promise<Elemento> => {
    const logContext: LogContext = { function: 'updateElementoById', elementoId: id, placa: data.placa };
    assertWritable(data, logContext);

    const elemento = await db.transaction(async (client) => {
        await assertUnique(data, client, logContext, id);
        const result = await db.query<ElementoRow>(
            `UPDATE elementos
                SET placa = $1, serial = $2, tipo_elemento_id = $3, fecha_adquisicion = $4, valor_monetario = $5,
                    estado_id = $6, observaciones = $7, estado_activo = $8, ambiente_id = $9, inventario_id = $10
              WHERE id = $11
              RETURNING ${ELEMENTO_COLUMNS}`,
            [...valuesOf(data), id],
            client
        );
        const row = result.rows[0];
        if (!row) throw ApiError.notFound(ELEMENTO_NOT_FOUND);
        await touchInventario(client, data.inventarioId);
        return toElemento(row);
    });

    logger.info('Elemento updated successfully', logContext);
    return elemento;
};

const setEstadoActivo = async (id: number, estadoActivo: boolean): Promise<Elemento> => {
    const result = await db.query<ElementoRow>(
        `UPDATE elementos SET estado_activo = $1 WHERE id = $2 RETURNING ${ELEMENTO_COLUMNS}`,
        [estadoActivo, id]
    );
    const row = result.rows[0];
    if (!row) throw ApiError.notFound(ELEMENTO_NOT_FOUND);
    logger.info('Elemento active flag changed', { function: 'setEstadoActivo', elementoId: id, estadoActivo });
    return toElemento(row);
};

const deleteElementoById = async (id: number): Promise<void> => {
    const logContext: LogContext = { function: 'deleteElementoById', elementoId: id };
    await getElementoById(id);

    const reportes = await db.query<{ total: string }>('SELECT COUNT(*) AS total FROM reportes WHERE elemento_id = $1', [id]);
    if (Number(reportes.rows[0]?.total ?? 0) > 0) {
        logger.warn('Elemento deletion blocked: reports reference it', logContext);
        throw ApiError.conflict('No se puede eliminar el elemento porque tiene reportes asociados');
    }

    await db.query('DELETE FROM elementos WHERE id = $1', [id]);
    logger.info('Elemento deleted', logContext);
};

export const elementService = {
    queryElementos,
    getElementoById,
    getElementoByPlaca,
    getElementosByInventario,
    createElemento,
    updateElementoById,
    setEstadoActivo,
    deleteElementoById,
};

// src/modules/inventory/inventory.service.ts
import { db } from '@/config';
import ApiError from '@/utils/ApiError';
import logger from '@/utils/logger';
import { toDateOnly } from '@/utils/date.utils';
import { InventarioDto } from './dto/inventario.dto';

export interface Inventario {
    id: number;
    nombre: string;
    fecha_creacion: string | null;
    ultima_actualizacion: string | null;
    usuario_admin_id: number;
}

export interface AmbienteResumen {
    id: number;
    nombre: string;
    centro_id: number | null;
}

type InventarioRow = Omit<Inventario, 'fecha_creacion' | 'ultima_actualizacion'> & {
    fecha_creacion: Date | string | null;
    ultima_actualizacion: Date | string | null;
};

type LogContext = {
    function?: string;
    inventarioId?: number | null;
    [key: string]: unknown;
};

export const INVENTARIO_NOT_FOUND = 'Inventario no encontrado';

const INVENTARIO_COLUMNS = 'id, nombre, fecha_creacion, ultima_actualizacion, usuario_admin_id';

const toInventario = (row: InventarioRow): Inventario => ({
    ...row,
    fecha_creacion: toDateOnly(row.fecha_creacion),
    ultima_actualizacion: toDateOnly(row.ultima_actualizacion),
});

const queryInventarios = async (): Promise<Inventario[]> => {
    const result = await db.query<InventarioRow>(`SELECT ${INVENTARIO_COLUMNS} FROM inventarios ORDER BY id`);
    return result.rows.map(toInventario);
};

const getInventarioById = async (id: number): Promise<Inventario> => {
    const result = await db.query<InventarioRow>(`SELECT ${INVENTARIO_COLUMNS} FROM inventarios WHERE id = $1`, [id]);
    const row = result.rows[0];
    if (!row) throw ApiError.notFound(INVENTARIO_NOT_FOUND);
    return toInventario(row);
};

const getInventariosByUsuario = async (usuarioId: number): Promise<Inventario[]> => {
    const result = await db.query<InventarioRow>(
        `SELECT ${INVENTARIO_COLUMNS} FROM inventarios WHERE usuario_admin_id = $1 ORDER BY id`,
        [usuarioId]
    );
    return result.rows.map(toInventario);
};

/** Rooms where at least one element of the inventory is located. */
const getAmbientesByInventario = async (id: number): Promise<AmbienteResumen[]> => {
    await getInventarioById(id);
    const result = await db.query<AmbienteResumen>(
        `SELECT DISTINCT a.id, a.nombre, a.centro_id
            FROM ambientes a
            JOIN elementos e ON e.ambiente_id = a.id
            WHERE e.inventario_id = $1
            ORDER BY a.id`,
        [id]
    );
    return result.rows;
};

const createInventario = async (data: InventarioDto): Promise<Inventario> => {
    const logContext: LogContext = { function: 'createInventario', nombre: data.nombre };
    // A new inventory is last updated on the day it was created
    const result = await db.query<InventarioRow>(
        `INSERT INTO inventarios (nombre, fecha_creacion, ultima_actualizacion, usuario_admin_id)
          VALUES ($1, $2, $2, $3)
          RETURNING ${INVENTARIO_COLUMNS}`,
        [data.nombre, data.fecha_creacion, data.usuario_admin_id]
    );
    const row = result.rows[0];
    if (!row) throw ApiError.internal('Inventario insert returned no row');
    logContext.inventarioId = row.id;
    logger.info('Inventario created successfully', logContext);
    return toInventario(row);
};

const updateInventarioById = async (id: number, data: InventarioDto): Promise<Inventario> => {
    const result = await db.query<InventarioRow>(
        `UPDATE inventarios SET nombre = $1, fecha_creacion = $2, usuario_admin_id = $3
            WHERE id = $4
            RETURNING ${INVENTARIO_COLUMNS}`,
        [data.nombre, data.fecha_creacion, data.usuario_admin_id, id]
    );
    const row = result.rows[0];
    if (!row) throw ApiError.notFound(INVENTARIO_NOT_FOUND);
    logger.info('Inventario updated successfully', { function: 'updateInventarioById', inventarioId: id });
    return toInventario(row);
};

const deleteInventarioById = async (id: number): Promise<void> => {
    const logContext: LogContext = { function: 'deleteInventarioById', inventarioId: id };
    await getInventarioById(id);

    const elementos = await db.query<{ total: string }>(
        'SELECT COUNT(*) AS total FROM elementos WHERE inventario_id = $1',
        [id]
    );
    if (Number(elementos.rows[0]?.total ?? 0) > 0) {
        logger.warn('Inventario deletion blocked: elements still assigned', logContext);
        throw ApiError.conflict('No se puede eliminar el inventario porque tiene elementos asociados');
    }

    await db.query('DELETE FROM inventarios WHERE id = $1', [id]);
    logger.info('Inventario deleted', logContext);
};

export const inventoryService = {
    queryInventarios,
    getInventarioById,
    getInventariosByUsuario,
    getAmbientesByInventario,
    createInventario,
    updateInventarioById,
    deleteInventarioById,
};

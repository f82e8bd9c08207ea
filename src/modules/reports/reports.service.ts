// src/modules/reports/reports.service.ts
import { db } from '@/config';
import ApiError from '@/utils/ApiError';
import logger from '@/utils/logger';
import { toDateOnly } from '@/utils/date.utils';
import { ReporteDto } from './dto/reporte.dto';

export interface Reporte {
    id: number;
    fecha: string | null;
    asunto: string;
    mensaje: string;
    usuario_id: number;
    elemento_id: number;
}

type ReporteRow = Omit<Reporte, 'fecha'> & { fecha: Date | string | null };

export const REPORTE_NOT_FOUND = 'Reporte no encontrado';

const REPORTE_COLUMNS = 'r.id, r.fecha, r.asunto, r.mensaje, r.usuario_id, r.elemento_id';

const toReporte = (row: ReporteRow): Reporte => ({ ...row, fecha: toDateOnly(row.fecha) });

const queryReportes = async (): Promise<Reporte[]> => {
    const result = await db.query<ReporteRow>(`SELECT ${REPORTE_COLUMNS} FROM reportes r ORDER BY r.id DESC`);
    return result.rows.map(toReporte);
};

const getReporteById = async (id: number): Promise<Reporte> => {
    const result = await db.query<ReporteRow>(`SELECT ${REPORTE_COLUMNS} FROM reportes r WHERE r.id = $1`, [id]);
    const row = result.rows[0];
    if (!row) throw ApiError.notFound(REPORTE_NOT_FOUND);
    return toReporte(row);
};

/** Reports filed against any element of the inventory, newest first. */
const getReportesByInventario = async (inventarioId: number): Promise<Reporte[]> => {
    const result = await db.query<ReporteRow>(
        `SELECT ${REPORTE_COLUMNS}
            FROM reportes r
            JOIN elementos e ON r.elemento_id = e.id
            WHERE e.inventario_id = $1
            ORDER BY r.id DESC`,
        [inventarioId]
    );
    return result.rows.map(toReporte);
};

const createReporte = async (data: ReporteDto): Promise<Reporte> => {
    // fecha defaults to the current date in the database
    const result = await db.query<ReporteRow>(
        `INSERT INTO reportes AS r (asunto, mensaje, usuario_id, elemento_id)
          VALUES ($1, $2, $3, $4)
          RETURNING ${REPORTE_COLUMNS}`,
        [data.asunto, data.mensaje, data.usuario_id, data.elemento_id]
    );
    const row = result.rows[0];
    if (!row) throw ApiError.internal('Reporte insert returned no row');
    logger.info('Reporte created successfully', { function: 'createReporte', reporteId: row.id, elementoId: data.elemento_id });
    return toReporte(row);
};

const updateReporteById = async (id: number, data: ReporteDto): Promise<Reporte> => {
    const result = await db.query<ReporteRow>(
        `UPDATE reportes AS r SET asunto = $1, mensaje = $2, usuario_id = $3, elemento_id = $4
            WHERE r.id = $5
            RETURNING ${REPORTE_COLUMNS}`,
        [data.asunto, data.mensaje, data.usuario_id, data.elemento_id, id]
    );
    const row = result.rows[0];
    if (!row) throw ApiError.notFound(REPORTE_NOT_FOUND);
    logger.info('Reporte updated successfully', { function: 'updateReporteById', reporteId: id });
    return toReporte(row);
};

const deleteReporteById = async (id: number): Promise<void> => {
    const result = await db.query('DELETE FROM reportes WHERE id = $1', [id]);
    if (result.rowCount === 0) throw ApiError.notFound(REPORTE_NOT_FOUND);
    logger.info('Reporte deleted', { function: 'deleteReporteById', reporteId: id });
};

export const reportService = {
    queryReportes,
    getReporteById,
    getReportesByInventario,
    createReporte,
    updateReporteById,
    deleteReporteById,
};

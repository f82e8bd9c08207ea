// src/modules/users/user.service.ts
import bcrypt from 'bcryptjs';
import { db, env } from '@/config';
import ApiError from '@/utils/ApiError';
import logger from '@/utils/logger';
import { CreateUsuarioDto } from './dto/create-usuario.dto';
import { UpdateUsuarioDto } from './dto/update-usuario.dto';

/** A user as returned by the API. The password hash is never selected. */
export interface Usuario {
    id: number;
    nombres: string;
    apellidos: string;
    tipo_documento_id: number;
    documento: string;
    genero_id: number;
    telefono: string;
    correo: string;
    ficha_id: number | null;
    rol_id: number | null;
    activo: boolean;
}

type LogContext = {
    function?: string;
    usuarioId?: number | null;
    documento?: string;
    correo?: string;
    [key: string]: unknown;
};

const USUARIO_COLUMNS =
    'id, nombres, apellidos, tipo_documento_id, documento, genero_id, telefono, correo, ficha_id, rol_id, activo';

export const USUARIO_NOT_FOUND = 'Usuario no encontrado';

const findOneBy = async (column: 'id' | 'documento' | 'correo', value: string | number): Promise<Usuario | null> => {
    const result = await db.query<Usuario>(`SELECT ${USUARIO_COLUMNS} FROM usuarios WHERE ${column} = $1`, [value]);
    return result.rows[0] ?? null;
};

/**
 * Rejects a documento or correo already held by another user.
 * @param excludeId - The user being updated, which may keep its own values.
 */
const assertUnique = async (
    values: { documento?: string; correo?: string },
    logContext: LogContext,
    excludeId?: number
): Promise<void> => {
    if (values.documento !== undefined) {
        const holder = await findOneBy('documento', values.documento);
        if (holder && holder.id !== excludeId) {
            logger.warn('Usuario write rejected: documento already registered', logContext);
            throw ApiError.conflict('El documento ya está registrado');
        }
    }
    if (values.correo !== undefined) {
        const holder = await findOneBy('correo', values.correo);
        if (holder && holder.id !== excludeId) {
            logger.warn('Usuario write rejected: correo already registered', logContext);
            throw ApiError.conflict('El correo ya está registrado');
        }
    }
};

const createUsuario = async (data: CreateUsuarioDto): Promise<Usuario> => {
    const logContext: LogContext = { function: 'createUsuario', documento: data.documento, correo: data.correo };
    await assertUnique({ documento: data.documento, correo: data.correo }, logContext);

    const contrasenaHash = await bcrypt.hash(data.contrasena, env.BCRYPT_SALT_ROUNDS);
    const result = await db.query<Usuario>(
        `INSERT INTO usuarios (nombres, apellidos, tipo_documento_id, documento, genero_id, telefono, correo, ficha_id, contrasena, rol_id)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         RETURNING ${USUARIO_COLUMNS}`,
        [
            data.nombres,
            data.apellidos,
            data.tipo_documento_id,
            data.documento,
            data.genero_id,
            data.telefono,
            data.correo,
            data.ficha_id ?? null,
            contrasenaHash,
            data.rol_id ?? null,
        ]
    );
    const usuario = result.rows[0];
    if (!usuario) {
        throw ApiError.internal('Usuario insert returned no row');
    }
    logContext.usuarioId = usuario.id;
    logger.info('Usuario created successfully', logContext);
    return usuario;
};

const queryUsuarios = async (): Promise<Usuario[]> => {
    const result = await db.query<Usuario>(`SELECT ${USUARIO_COLUMNS} FROM usuarios ORDER BY id DESC`);
    return result.rows;
};

const getUsuarioById = async (id: number): Promise<Usuario> => {
    const usuario = await findOneBy('id', id);
    if (!usuario) throw ApiError.notFound(USUARIO_NOT_FOUND);
    return usuario;
};

const getUsuarioByDocumento = async (documento: string): Promise<Usuario> => {
    const usuario = await findOneBy('documento', documento);
    if (!usuario) throw ApiError.notFound(USUARIO_NOT_FOUND);
    return usuario;
};

const getUsuarioByCorreo = async (correo: string): Promise<Usuario> => {
    const usuario = await findOneBy('correo', correo);
    if (!usuario) throw ApiError.notFound(USUARIO_NOT_FOUND);
    return usuario;
};

/**
 * Applies a partial update. Only the fields present in `data` are written; a new
 * contrasena is hashed before it is stored.
 */
const updateUsuarioById = async (id: number, data: UpdateUsuarioDto): Promise<Usuario> => {
    const logContext: LogContext = { function: 'updateUsuarioById', usuarioId: id };
    await getUsuarioById(id);

    const changes: [string, unknown][] = Object.entries(data).filter(([, value]) => value !== undefined);
    if (changes.length === 0) {
        throw ApiError.badRequest('No se enviaron campos para actualizar');
    }
    await assertUnique({ documento: data.documento, correo: data.correo }, logContext, id);

    const values = await Promise.all(
        changes.map(async ([column, value]) =>
            column === 'contrasena' && typeof value === 'string' ? bcrypt.hash(value, env.BCRYPT_SALT_ROUNDS) : value
        )
    );
    // Column names are the DTO's own property names, already whitelisted by validation
    const assignments = changes.map(([column], index) => `${column} = $${index + 1}`).join(', ');
    const result = await db.query<Usuario>(
        `UPDATE usuarios SET ${assignments} WHERE id = $${changes.length + 1} RETURNING ${USUARIO_COLUMNS}`,
        [...values, id]
    );
    const usuario = result.rows[0];
    if (!usuario) throw ApiError.notFound(USUARIO_NOT_FOUND);

    logger.info('Usuario updated successfully', { ...logContext, fields: changes.map(([column]) => column) });
    return usuario;
};

const deleteUsuarioById = async (id: number): Promise<void> => {
    const result = await db.query('DELETE FROM usuarios WHERE id = $1', [id]);
    if (result.rowCount === 0) throw ApiError.notFound(USUARIO_NOT_FOUND);
    logger.info('Usuario deleted', { function: 'deleteUsuarioById', usuarioId: id });
};

export const userService = {
    createUsuario,
    queryUsuarios,
    getUsuarioById,
    getUsuarioByDocumento,
    getUsuarioByCorreo,
    updateUsuarioById,
    deleteUsuarioById,
};

import request from 'supertest';
import httpStatus from 'http-status';
import app from '../../src/app';
import { db, Queryable } from '../../src/config/database';
import { queryResult, validPayloads } from '../utils/test-utils';

jest.mock('../../src/config/database', () => ({
    db: { query: jest.fn(), transaction: jest.fn(), verifyConnection: jest.fn(), close: jest.fn() },
}));

const mockedDb = jest.mocked(db);

const elementoRow = {
    id: 11,
    placa: '920001',
    serial: null,
    tipoElementoId: 1,
    fechaAdquisicion: '2023-08-15',
    valorMonetario: '2500000.00',
    estadoId: 1,
    observaciones: null,
    estadoActivo: true,
    ambienteId: 1,
    inventarioId: 1,
};

const elemento = { ...elementoRow, placa: 920001, valorMonetario: 2500000 };

describe('Element Routes', () => {
    const txClient: Queryable = { query: jest.fn() };

    beforeEach(() => {
        mockedDb.transaction.mockImplementation((callback) => callback(txClient));
    });

    describe('POST /api/v1/elementos', () => {
        it('creates the element and touches its inventory in one transaction', async () => {
            mockedDb.query
                .mockResolvedValueOnce(queryResult([])) // placa lookup
                .mockResolvedValueOnce(queryResult([elementoRow]))
                .mockResolvedValueOnce(queryResult([], 1));

            const res = await request(app).post('/api/v1/elementos').send(validPayloads.elemento);

            expect(res.status).toBe(httpStatus.CREATED);
            expect(res.body).toEqual({ success: true, message: 'Elemento creado correctamente', data: elemento });
            expect(mockedDb.transaction).toHaveBeenCalledTimes(1);
            expect(mockedDb.query).toHaveBeenCalledWith('SELECT id FROM elementos WHERE placa = $1', [920001], txClient);
            expect(mockedDb.query).toHaveBeenLastCalledWith(
                'UPDATE inventarios SET ultima_actualizacion = CURRENT_DATE WHERE id = $1',
                [1],
                txClient
            );
        });

        it('rejects a placa already in use', async () => {
            mockedDb.query.mockResolvedValueOnce(queryResult([{ id: 5 }]));

            const res = await request(app).post('/api/v1/elementos').send(validPayloads.elemento);

            expect(res.status).toBe(httpStatus.CONFLICT);
            expect(res.body).toEqual({ success: false, message: 'Ya existe un elemento con la placa 920001' });
            expect(mockedDb.query).toHaveBeenCalledTimes(1);
        });

        it('rejects a serial already in use', async () => {
            mockedDb.query
                .mockResolvedValueOnce(queryResult([]))
                .mockResolvedValueOnce(queryResult([{ id: 6 }]));

            const res = await request(app)
                .post('/api/v1/elementos')
                .send({ ...validPayloads.elemento, serial: 'SN-001' });

            expect(res.status).toBe(httpStatus.CONFLICT);
            expect(res.body.message).toBe('Ya existe un elemento con el serial SN-001');
        });

        it('requires estadoActivo to be a boolean', async () => {
            const res = await request(app)
                .post('/api/v1/elementos')
                .send({ ...validPayloads.elemento, estadoActivo: 'si' });

            expect(res.status).toBe(httpStatus.BAD_REQUEST);
            expect(res.body.data).toEqual(["El campo 'estadoActivo' debe ser de tipo booleano."]);
            expect(mockedDb.transaction).not.toHaveBeenCalled();
        });

        it('rejects a placa beyond the safe integer range before any query', async () => {
            const body = JSON.stringify({ ...validPayloads.elemento, placa: 0 }).replace('"placa":0', '"placa":9007199254740993');

            const res = await request(app).post('/api/v1/elementos').set('Content-Type', 'application/json').send(body);

            expect(res.status).toBe(httpStatus.BAD_REQUEST);
            expect(res.body).toEqual({
                success: false,
                message: 'Error de validación',
                data: ["El campo 'placa' debe ser un número entero entre 1 y 9007199254740991."],
            });
            expect(mockedDb.transaction).not.toHaveBeenCalled();
            expect(mockedDb.query).not.toHaveBeenCalled();
        });

        it('rejects observaciones that are not text', async () => {
            const res = await request(app)
                .post('/api/v1/elementos')
                .send({ ...validPayloads.elemento, observaciones: { nota: 'pantalla rota' } });

            expect(res.status).toBe(httpStatus.BAD_REQUEST);
            expect(res.body.data).toEqual(["El campo 'observaciones' debe ser de tipo texto."]);
            expect(mockedDb.query).not.toHaveBeenCalled();
        });
    });

    describe('PUT /api/v1/elementos/:id', () => {
        it('lets the element keep its own placa', async () => {
            mockedDb.query
                .mockResolvedValueOnce(queryResult([{ id: 11 }]))
                .mockResolvedValueOnce(queryResult([elementoRow]))
                .mockResolvedValueOnce(queryResult([], 1));

            const res = await request(app).put('/api/v1/elementos/11').send(validPayloads.elemento);

            expect(res.status).toBe(httpStatus.OK);
            expect(res.body.data).toEqual(elemento);
        });

        it('switches the active flag', async () => {
            mockedDb.query.mockResolvedValueOnce(queryResult([{ ...elementoRow, estadoActivo: false }]));

            const res = await request(app).put('/api/v1/elementos/11/estado/false');

            expect(res.status).toBe(httpStatus.OK);
            expect(res.body.data.estadoActivo).toBe(false);
            expect(mockedDb.query.mock.calls[0]?.[1]).toEqual([false, 11]);
        });

        it('rejects an estado that is not true or false', async () => {
            const res = await request(app).put('/api/v1/elementos/11/estado/quizas');

            expect(res.status).toBe(httpStatus.BAD_REQUEST);
            expect(res.body.data).toEqual(["El parámetro estado debe ser 'true' o 'false'."]);
        });
    });

    describe('GET /api/v1/elementos', () => {
        it('finds an element by placa', async () => {
            mockedDb.query.mockResolvedValueOnce(queryResult([elementoRow]));

            const res = await request(app).get('/api/v1/elementos/placa/920001');

            expect(res.status).toBe(httpStatus.OK);
            expect(res.body.data).toEqual(elemento);
            expect(mockedDb.query.mock.calls[0]?.[1]).toEqual([920001]);
        });

        it('rejects a placa parameter beyond the safe integer range', async () => {
            const res = await request(app).get('/api/v1/elementos/placa/9007199254740993');

            expect(res.status).toBe(httpStatus.BAD_REQUEST);
            expect(res.body).toEqual({
                success: false,
                message: 'Parámetros inválidos',
                data: ['El parámetro placa excede el máximo admitido.'],
            });
            expect(mockedDb.query).not.toHaveBeenCalled();
        });

        it('lists the elements of an inventory', async () => {
            mockedDb.query.mockResolvedValueOnce(queryResult([elementoRow]));

            const res = await request(app).get('/api/v1/elementos/inventario/1');

            expect(res.status).toBe(httpStatus.OK);
            expect(res.body.data).toEqual([elemento]);
        });
    });

    it('refuses to delete an element with reports', async () => {
        mockedDb.query
            .mockResolvedValueOnce(queryResult([elementoRow]))
            .mockResolvedValueOnce(queryResult([{ total: '2' }]));

        const res = await request(app).delete('/api/v1/elementos/11');

        expect(res.status).toBe(httpStatus.CONFLICT);
        expect(res.body.message).toBe('No se puede eliminar el elemento porque tiene reportes asociados');
    });
});

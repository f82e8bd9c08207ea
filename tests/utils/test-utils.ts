import { QueryResult, QueryResultRow } from 'pg';
import { JsonObject, toJsonValue } from '../../src/validation/json-document';
import validPayloads from '../fixtures/valid-payloads.json';

export { validPayloads };

/** Builds the result `db.query` resolves with. */
export const queryResult = (rows: QueryResultRow[], rowCount: number = rows.length): QueryResult => ({
    command: 'SELECT',
    rowCount,
    oid: 0,
    fields: [],
    rows,
});

/** Tags a plain object literal the way the body decoder does. */
export const jsonObject = (raw: unknown): JsonObject => {
    const value = toJsonValue(raw);
    if (value.type !== 'object') {
        throw new Error('Expected a JSON object');
    }
    return value;
};

/** Shallow copy of `payload` without `field`. */
export const without = (payload: Record<string, unknown>, field: string): Record<string, unknown> =>
    Object.fromEntries(Object.entries(payload).filter(([key]) => key !== field));

// src/validation/json-document.ts

/** A decoded JSON value, tagged so callers can match on it exhaustively. */
export type JsonValue =
    | { type: 'string'; value: string }
    | { type: 'number'; value: number }
    | { type: 'boolean'; value: boolean }
    | { type: 'null' }
    | { type: 'array'; items: JsonValue[] }
    | JsonObject;

export interface JsonObject {
    type: 'object';
    fields: ReadonlyMap<string, JsonValue>;
}

/** Plain JavaScript form of a JSON value, as handed to DTO mappers. */
export type PlainJson = string | number | boolean | null | PlainJson[] | { [key: string]: PlainJson };

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Converts the output of JSON.parse into a tagged value. Anything JSON.parse
 * cannot produce is reported as an error.
 */
export const toJsonValue = (raw: unknown): JsonValue => {
    if (raw === null) return { type: 'null' };
    if (typeof raw === 'string') return { type: 'string', value: raw };
    if (typeof raw === 'number') return { type: 'number', value: raw };
    if (typeof raw === 'boolean') return { type: 'boolean', value: raw };
    if (Array.isArray(raw)) return { type: 'array', items: raw.map(toJsonValue) };
    if (isRecord(raw)) {
        return {
            type: 'object',
            fields: new Map(Object.entries(raw).map(([key, value]) => [key, toJsonValue(value)])),
        };
    }
    throw new TypeError(`Unsupported JSON value of type ${typeof raw}`);
};

/**
 * Decodes UTF-8 bytes into a JSON object document.
 *
 * Returns null when the bytes are not valid JSON or when the top-level value is not
 * an object (an array, a scalar or an empty body).
 */
export const decodeJsonObject = (bytes: Buffer): JsonObject | null => {
    let raw: unknown;
    try {
        raw = JSON.parse(bytes.toString('utf8'));
    } catch (error) {
        if (error instanceof SyntaxError) return null;
        throw error;
    }
    const value = toJsonValue(raw);
    return value.type === 'object' ? value : null;
};

export const toPlain = (value: JsonValue): PlainJson => {
    switch (value.type) {
        case 'string':
        case 'number':
        case 'boolean':
            return value.value;
        case 'null':
            return null;
        case 'array':
            return value.items.map(toPlain);
        case 'object':
            return toPlainObject(value);
    }
};

export const toPlainObject = (value: JsonObject): { [key: string]: PlainJson } =>
    Object.fromEntries(Array.from(value.fields, ([key, field]): [string, PlainJson] => [key, toPlain(field)]));

import { decodeJsonObject, toJsonValue, toPlainObject } from '../../src/validation/json-document';

describe('decodeJsonObject', () => {
    it('decodes an object into tagged values', () => {
        const document = decodeJsonObject(Buffer.from('{"nombre":"Activo","orden":2,"visible":false,"extra":null,"tags":["a"]}'));

        expect(document?.fields.get('nombre')).toEqual({ type: 'string', value: 'Activo' });
        expect(document?.fields.get('orden')).toEqual({ type: 'number', value: 2 });
        expect(document?.fields.get('visible')).toEqual({ type: 'boolean', value: false });
        expect(document?.fields.get('extra')).toEqual({ type: 'null' });
        expect(document?.fields.get('tags')).toEqual({ type: 'array', items: [{ type: 'string', value: 'a' }] });
    });

    it('decodes UTF-8 text', () => {
        const document = decodeJsonObject(Buffer.from('{"nombre":"Género"}', 'utf8'));
        expect(document?.fields.get('nombre')).toEqual({ type: 'string', value: 'Género' });
    });

    it.each([
        ['invalid JSON', '{"nombre":'],
        ['an empty body', ''],
        ['an array', '[{"nombre":"Activo"}]'],
        ['a string', '"Activo"'],
        ['a number', '42'],
        ['null', 'null'],
    ])('returns null for %s', (_label, body) => {
        expect(decodeJsonObject(Buffer.from(body))).toBeNull();
    });
});

describe('toPlainObject', () => {
    it('returns the plain form of a nested document', () => {
        const raw = { nombre: 'Portátil', atributos: { ram: 16, discos: ['ssd'] }, activo: true, serial: null };
        const value = toJsonValue(raw);
        if (value.type !== 'object') throw new Error('expected an object');

        expect(toPlainObject(value)).toEqual(raw);
    });

    it('keeps a __proto__ key as data without touching the prototype', () => {
        const document = decodeJsonObject(Buffer.from('{"__proto__":{"polluted":true},"nombre":"x"}'));
        if (!document) throw new Error('expected a document');

        const plain = toPlainObject(document);

        expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
        expect(Object.prototype.hasOwnProperty.call(plain, '__proto__')).toBe(true);
        expect(Object.prototype.hasOwnProperty.call({}, 'polluted')).toBe(false);
    });
});

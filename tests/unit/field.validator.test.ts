import { validateFields } from '../../src/validation/field.validator';
import { defineRules, RuleSet, ENTITY_KEYS } from '../../src/validation/rule.types';
import { ruleRegistry } from '../../src/validation/rule.registry';
import { estadoRules, tipoElementoRules } from '../../src/modules/catalogs/catalog.rules';
import { usuarioRules } from '../../src/modules/users/dto/usuario.rules';
import { jsonObject, validPayloads, without } from '../utils/test-utils';

const rulesFor = (entity: string): RuleSet => {
    const rules = ruleRegistry.resolve(entity);
    if (!rules) throw new Error(`No rules registered for ${entity}`);
    return rules;
};

describe('validateFields', () => {
    it('has a valid fixture for every entity key', () => {
        expect(Object.keys(validPayloads).sort()).toEqual([...ENTITY_KEYS].sort());
    });

    describe.each(Object.entries(validPayloads))('entity %s', (entity, payload) => {
        it('accepts a complete, well-typed payload', () => {
            expect(validateFields(jsonObject(payload), rulesFor(entity))).toEqual([]);
        });

        it('reports exactly one violation per missing required field', () => {
            const required = rulesFor(entity).filter((rule) => rule.required);
            expect(required.length).toBeGreaterThan(0);
            for (const rule of required) {
                expect(validateFields(jsonObject(without(payload, rule.name)), rulesFor(entity))).toEqual([
                    `El campo '${rule.name}' es obligatorio.`,
                ]);
            }
        });
    });

    describe('estado', () => {
        it('accepts {"nombre":"Activo"}', () => {
            expect(validateFields(jsonObject({ nombre: 'Activo' }), estadoRules)).toEqual([]);
        });

        it('requires nombre', () => {
            expect(validateFields(jsonObject({}), estadoRules)).toEqual(["El campo 'nombre' es obligatorio."]);
        });

        it('rejects a nombre below the minimum length', () => {
            expect(validateFields(jsonObject({ nombre: 'Ok' }), estadoRules)).toEqual([
                "El campo 'nombre' debe tener al menos 3 caracteres.",
            ]);
        });

        it('rejects a number where text is expected, without length checks', () => {
            expect(validateFields(jsonObject({ nombre: 5 }), estadoRules)).toEqual([
                "El campo 'nombre' debe ser de tipo texto.",
            ]);
        });
    });

    describe('text bounds', () => {
        it.each([
            ['abc', []],
            ['a'.repeat(20), []],
            ['ab', ["El campo 'nombre' debe tener al menos 3 caracteres."]],
            ['a'.repeat(21), ["El campo 'nombre' debe tener como máximo 20 caracteres."]],
        ])('validates %p', (nombre, expected) => {
            expect(validateFields(jsonObject({ nombre }), estadoRules)).toEqual(expected);
        });

        it('checks both bounds independently when a rule is misconfigured', () => {
            const rules = defineRules([{ name: 'codigo', required: true, minimum: 10, maximum: 5, kind: 'text' }]);
            expect(validateFields(jsonObject({ codigo: 'abcdefg' }), rules)).toEqual([
                "El campo 'codigo' debe tener al menos 10 caracteres.",
                "El campo 'codigo' debe tener como máximo 5 caracteres.",
            ]);
        });
    });

    describe('dates', () => {
        const rules = defineRules([{ name: 'fecha', required: true, minimum: 10, maximum: 10, kind: 'date' }]);
        const formatViolation = "El campo 'fecha' no tiene un formato de fecha válido (yyyy-MM-dd).";

        it('accepts a leap day', () => {
            expect(validateFields(jsonObject({ fecha: '2024-02-29' }), rules)).toEqual([]);
        });

        it.each(['2023-02-29', '2024-02-30', '2024-13-01', '2024/02/29'])('rejects %s without rolling it over', (fecha) => {
            expect(validateFields(jsonObject({ fecha }), rules)).toEqual([formatViolation]);
        });

        it('requires the exact length before parsing', () => {
            expect(validateFields(jsonObject({ fecha: '2024-2-29' }), rules)).toEqual([
                "El campo 'fecha' debe tener exactamente 10 caracteres (formato yyyy-MM-dd).",
            ]);
        });

        it('requires a string', () => {
            expect(validateFields(jsonObject({ fecha: 20240229 }), rules)).toEqual([
                "El campo 'fecha' debe ser una cadena en formato fecha.",
            ]);
        });
    });

    describe('numbers and booleans', () => {
        it('rejects a numeric string for a number field', () => {
            const payload = { ...validPayloads.tipo_elemento, consecutivo: '101' };
            expect(validateFields(jsonObject(payload), tipoElementoRules)).toEqual([
                "El campo 'consecutivo' debe ser de tipo numérico.",
            ]);
        });

        it('does not enforce a range on numbers', () => {
            const payload = { ...validPayloads.tipo_elemento, consecutivo: 987654321 };
            expect(validateFields(jsonObject(payload), tipoElementoRules)).toEqual([]);
        });

        it('rejects a string for a boolean field', () => {
            const payload = { ...validPayloads.elemento, estadoActivo: 'true' };
            expect(validateFields(jsonObject(payload), rulesFor('elemento'))).toEqual([
                "El campo 'estadoActivo' debe ser de tipo booleano.",
            ]);
        });
    });

    it('treats a null value as present and checks its type', () => {
        expect(validateFields(jsonObject({ nombre: null }), estadoRules)).toEqual([
            "El campo 'nombre' debe ser de tipo texto.",
        ]);
    });

    it('skips an absent optional field but checks it when present', () => {
        const payload = validPayloads.usuario;
        expect(validateFields(jsonObject(payload), usuarioRules)).toEqual([]);
        expect(validateFields(jsonObject({ ...payload, ficha_id: 'uno' }), usuarioRules)).toEqual([
            "El campo 'ficha_id' debe ser de tipo numérico.",
        ]);
    });

    it('ignores fields no rule mentions', () => {
        expect(validateFields(jsonObject({ nombre: 'Activo', color: 'verde' }), estadoRules)).toEqual([]);
    });

    it('reports every failed rule in table order', () => {
        expect(validateFields(jsonObject({}), usuarioRules)).toEqual([
            "El campo 'nombres' es obligatorio.",
            "El campo 'apellidos' es obligatorio.",
            "El campo 'tipo_documento_id' es obligatorio.",
            "El campo 'documento' es obligatorio.",
            "El campo 'genero_id' es obligatorio.",
            "El campo 'telefono' es obligatorio.",
            "El campo 'correo' es obligatorio.",
            "El campo 'contrasena' es obligatorio.",
        ]);
    });

    it('reports an unrecognized kind as a violation', () => {
        const rules: RuleSet = JSON.parse('[{"name":"color","required":true,"minimum":0,"maximum":0,"kind":"color"}]');
        expect(validateFields(jsonObject({ color: 'rojo' }), rules)).toEqual(["Tipo no reconocido para el campo 'color'."]);
    });
});

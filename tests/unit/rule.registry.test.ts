import { createRuleRegistry, ruleRegistry, ruleTables } from '../../src/validation/rule.registry';
import { defineRules, ENTITY_KEYS } from '../../src/validation/rule.types';
import { estadoRules } from '../../src/modules/catalogs/catalog.rules';
import { elementoRules } from '../../src/modules/elements/dto/elemento.rules';

describe('ruleRegistry', () => {
    it('registers every entity key', () => {
        ENTITY_KEYS.forEach((key) => {
            expect(ruleRegistry.resolve(key)).toBe(ruleTables[key]);
        });
    });

    it('resolves keys case-insensitively', () => {
        expect(ruleRegistry.resolve('ESTADO')).toBe(estadoRules);
        expect(ruleRegistry.resolve('Elemento')).toBe(elementoRules);
    });

    it('returns null for an unregistered key', () => {
        expect(ruleRegistry.resolve('inexistente')).toBeNull();
        expect(ruleRegistry.resolve('')).toBeNull();
    });

    it('keeps rule order as written', () => {
        expect(elementoRules.map((rule) => rule.name)).toEqual([
            'placa',
            'serial',
            'tipoElementoId',
            'fechaAdquisicion',
            'valorMonetario',
            'estadoId',
            'estadoActivo',
            'ambienteId',
            'inventarioId',
        ]);
    });

    it('freezes tables and rules', () => {
        expect(Object.isFrozen(estadoRules)).toBe(true);
        expect(Object.isFrozen(estadoRules[0])).toBe(true);
        expect(Object.isFrozen(ruleRegistry)).toBe(true);
    });
});

describe('createRuleRegistry', () => {
    it('lower-cases the keys it is given', () => {
        const rules = defineRules([{ name: 'codigo', required: true, minimum: 1, maximum: 5, kind: 'text' }]);
        const registry = createRuleRegistry({ Sede: rules });

        expect(registry.resolve('sede')).toBe(rules);
        expect(registry.resolve('SEDE')).toBe(rules);
        expect(registry.resolve('estado')).toBeNull();
    });
});

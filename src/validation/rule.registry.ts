// src/validation/rule.registry.ts
import { RuleRegistry, RuleSet, RuleTables } from './rule.types';
import { usuarioRules } from '@/modules/users/dto/usuario.rules';
import { inventarioRules } from '@/modules/inventory/dto/inventario.rules';
import { elementoRules } from '@/modules/elements/dto/elemento.rules';
import { reporteRules } from '@/modules/reports/dto/reporte.rules';
import {
    ambienteRules,
    centroRules,
    ciudadRules,
    estadoRules,
    fichaRules,
    generoRules,
    programaFormacionRules,
    rolRules,
    tipoDocumentoRules,
    tipoElementoRules,
} from '@/modules/catalogs/catalog.rules';

/**
 * Builds an immutable registry over `tables`. Keys are stored lower-cased so
 * lookups ignore case.
 */
export const createRuleRegistry = (tables: Readonly<Record<string, RuleSet>>): RuleRegistry => {
    const byKey: ReadonlyMap<string, RuleSet> = new Map(
        Object.entries(tables).map(([key, rules]) => [key.toLowerCase(), rules])
    );

    return Object.freeze({
        resolve(entityKey: string): RuleSet | null {
            return byKey.get(entityKey.toLowerCase()) ?? null;
        },
    });
};

export const ruleTables: RuleTables = Object.freeze({
    usuario: usuarioRules,
    rol: rolRules,
    tipo_documento: tipoDocumentoRules,
    programa_formacion: programaFormacionRules,
    ficha: fichaRules,
    genero: generoRules,
    inventario: inventarioRules,
    centro: centroRules,
    ambiente: ambienteRules,
    ciudad: ciudadRules,
    tipo_elemento: tipoElementoRules,
    estado: estadoRules,
    elemento: elementoRules,
    reporte: reporteRules,
});

export const ruleRegistry = createRuleRegistry(ruleTables);

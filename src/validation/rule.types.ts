// src/validation/rule.types.ts

/** JSON shape a field must have. */
export type FieldKind = 'text' | 'number' | 'boolean' | 'date';

/**
 * One field's validation contract.
 *
 * `minimum`/`maximum` are character-count bounds for `text`. For `date`, `minimum`
 * is the exact string length expected. Neither is evaluated for `number` or `boolean`.
 */
export interface RuleDefinition {
    name: string;
    required: boolean;
    minimum: number;
    maximum: number;
    kind: FieldKind;
}

export type RuleSet = ReadonlyArray<Readonly<RuleDefinition>>;

export const ENTITY_KEYS = [
    'usuario',
    'rol',
    'tipo_documento',
    'programa_formacion',
    'ficha',
    'genero',
    'inventario',
    'centro',
    'ambiente',
    'ciudad',
    'tipo_elemento',
    'estado',
    'elemento',
    'reporte',
] as const;

export type EntityKey = (typeof ENTITY_KEYS)[number];

export type RuleTables = Readonly<Record<EntityKey, RuleSet>>;

export interface RuleRegistry {
    /** Rules for an entity key, compared case-insensitively; null when the key is not registered. */
    resolve(entityKey: string): RuleSet | null;
}

/** Freezes a hand-written table so it can be shared by every request. */
export const defineRules = (rules: RuleDefinition[]): RuleSet =>
    Object.freeze(rules.map((rule) => Object.freeze({ ...rule })));

// src/validation/field.validator.ts
import { isCalendarDate } from '@/utils/date.utils';
import { JsonObject, JsonValue } from './json-document';
import { RuleDefinition, RuleSet } from './rule.types';

const messages = {
    required: (field: string) => `El campo '${field}' es obligatorio.`,
    notText: (field: string) => `El campo '${field}' debe ser de tipo texto.`,
    tooShort: (field: string, min: number) => `El campo '${field}' debe tener al menos ${min} caracteres.`,
    tooLong: (field: string, max: number) => `El campo '${field}' debe tener como máximo ${max} caracteres.`,
    notNumber: (field: string) => `El campo '${field}' debe ser de tipo numérico.`,
    notBoolean: (field: string) => `El campo '${field}' debe ser de tipo booleano.`,
    dateNotText: (field: string) => `El campo '${field}' debe ser una cadena en formato fecha.`,
    dateLength: (field: string, length: number) =>
        `El campo '${field}' debe tener exactamente ${length} caracteres (formato yyyy-MM-dd).`,
    dateFormat: (field: string) => `El campo '${field}' no tiene un formato de fecha válido (yyyy-MM-dd).`,
    unknownKind: (field: string) => `Tipo no reconocido para el campo '${field}'.`,
};

const checkText = (rule: Readonly<RuleDefinition>, value: JsonValue): string[] => {
    if (value.type !== 'string') return [messages.notText(rule.name)];
    const violations: string[] = [];
    // Both bounds are checked independently; a rule with minimum > maximum fails both.
    if (value.value.length < rule.minimum) violations.push(messages.tooShort(rule.name, rule.minimum));
    if (value.value.length > rule.maximum) violations.push(messages.tooLong(rule.name, rule.maximum));
    return violations;
};

// minimum/maximum are carried on number rules but intentionally not enforced.
const checkNumber = (rule: Readonly<RuleDefinition>, value: JsonValue): string[] =>
    value.type === 'number' ? [] : [messages.notNumber(rule.name)];

const checkBoolean = (rule: Readonly<RuleDefinition>, value: JsonValue): string[] =>
    value.type === 'boolean' ? [] : [messages.notBoolean(rule.name)];

const checkDate = (rule: Readonly<RuleDefinition>, value: JsonValue): string[] => {
    if (value.type !== 'string') return [messages.dateNotText(rule.name)];
    if (value.value.length !== rule.minimum) return [messages.dateLength(rule.name, rule.minimum)];
    return isCalendarDate(value.value) ? [] : [messages.dateFormat(rule.name)];
};

const checkField = (rule: Readonly<RuleDefinition>, value: JsonValue): string[] => {
    const kind = rule.kind;
    switch (kind) {
        case 'text':
            return checkText(rule, value);
        case 'number':
            return checkNumber(rule, value);
        case 'boolean':
            return checkBoolean(rule, value);
        case 'date':
            return checkDate(rule, value);
        default: {
            // Only reachable when a table was built from untyped input
            const unreachable: never = kind;
            void unreachable;
            return [messages.unknownKind(rule.name)];
        }
    }
};

/**
 * Validates `payload` against every rule in order and returns one message per
 * failed check. An empty list means the payload is valid. Fields the rules do not
 * mention are ignored, and a field present with a null value counts as present.
 */
export const validateFields = (payload: JsonObject, rules: RuleSet): string[] => {
    const violations: string[] = [];
    for (const rule of rules) {
        const value = payload.fields.get(rule.name);
        if (value === undefined) {
            if (rule.required) violations.push(messages.required(rule.name));
            continue;
        }
        violations.push(...checkField(rule, value));
    }
    return violations;
};

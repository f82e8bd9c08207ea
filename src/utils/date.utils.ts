// src/utils/date.utils.ts
import { format, isMatch } from 'date-fns';

export const DATE_ONLY_PATTERN = 'yyyy-MM-dd';

const DATE_ONLY_SHAPE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * True when `value` is a real calendar date written exactly as yyyy-MM-dd.
 * Overflowing values such as 2023-02-29 or 2024-13-01 are rejected, never rolled over.
 */
export const isCalendarDate = (value: string): boolean =>
    DATE_ONLY_SHAPE.test(value) && isMatch(value, DATE_ONLY_PATTERN);

/** Renders a DATE column (returned by pg as a local-midnight Date) back to yyyy-MM-dd. */
export const toDateOnly = (value: Date | string | null): string | null => {
    if (value === null) return null;
    if (typeof value === 'string') return value.substring(0, 10);
    return format(value, DATE_ONLY_PATTERN);
};

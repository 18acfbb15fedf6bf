// utils/parsingUtils.ts
export type NumericIssue = 'missing' | 'unparsable';

export interface ParsedNumber {
    value: number;
    issue?: NumericIssue;
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parses a raw store value into a number without ever throwing.
 * Accepts plain decimals ("1234.56") and Brazilian currency ("R$ 1.234,56").
 * Absent values and anything non-numeric come back as 0 together with the reason,
 * so callers can keep the row and still report the coercion.
 */
export const parseNumeric = (value: unknown): ParsedNumber => {
    if (value === null || value === undefined) return { value: 0, issue: 'missing' };
    if (typeof value === 'number') {
        return Number.isFinite(value) ? { value } : { value: 0, issue: 'unparsable' };
    }
    if (typeof value === 'string') {
        const trimmed = value.replace(/R\$/g, '').trim();
        if (trimmed === '') return { value: 0, issue: 'missing' };
        // A comma marks the Brazilian layout: dots are thousands separators there.
        const cleaned = trimmed.includes(',') ? trimmed.replace(/\./g, '').replace(',', '.') : trimmed;
        // Hex, binary and exponent forms are not amounts.
        if (!DECIMAL.test(cleaned)) return { value: 0, issue: 'unparsable' };
        return { value: Number(cleaned) };
    }
    return { value: 0, issue: 'unparsable' };
};

/**
 * Safely parses a value into a floating-point number.
 * Returns 0 for null, undefined, NaN, or non-numeric strings.
 */
export const parseSafeFloat = (value: unknown): number => parseNumeric(value).value;

/** Renders a raw value for diagnostics (quality flags, logs). */
export const describeRaw = (value: unknown): string => {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';
    if (value instanceof Date) return value.toISOString();
    return String(value);
};

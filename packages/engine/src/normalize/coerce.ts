// Value coercion for canonical field kinds
//
// Each coercer takes a raw cell that is known to be non-blank and either
// returns the canonical value or a reason it could not be read.

import type { CalendarDate, FieldKind, TextCase } from '@corpledger/protocol';

export type CoercionResult<T> = { ok: true; value: T } | { ok: false; reason: string };

const NUMERIC_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_FIRST_DATE_REGEX = /^(\d{1,2})[-/](\d{1,2})[-/](\d{4})$/;
const ISO_DATETIME_REGEX = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;

/**
 * Whether a raw cell carries no value: missing, null, NaN or only whitespace.
 */
export function isBlank(raw: unknown): boolean {
  if (raw === undefined || raw === null || Number.isNaN(raw)) {
    return true;
  }
  return typeof raw === 'string' && raw.trim() === '';
}

export function coerceString(raw: unknown, textCase: TextCase = 'preserve'): CoercionResult<string> {
  let text: string;
  if (typeof raw === 'string') {
    text = raw;
  } else if (typeof raw === 'number' && Number.isFinite(raw)) {
    text = String(raw);
  } else {
    return { ok: false, reason: `expected text, got ${describe(raw)}` };
  }

  const collapsed = text.trim().replace(/\s+/g, ' ');
  return { ok: true, value: textCase === 'upper' ? collapsed.toUpperCase() : collapsed };
}

/**
 * Read a number. Strings may use comma digit grouping ("1,00,000").
 */
export function coerceNumber(raw: unknown): CoercionResult<number> {
  if (typeof raw === 'number') {
    return Number.isFinite(raw)
      ? { ok: true, value: raw }
      : { ok: false, reason: 'number is not finite' };
  }

  if (typeof raw !== 'string') {
    return { ok: false, reason: `expected a number, got ${describe(raw)}` };
  }

  const compact = raw.trim().replace(/,/g, '');
  if (!NUMERIC_REGEX.test(compact)) {
    return { ok: false, reason: `"${raw.trim()}" is not a number` };
  }

  const value = Number(compact);
  if (!Number.isFinite(value)) {
    return { ok: false, reason: `"${raw.trim()}" is out of range` };
  }
  return { ok: true, value };
}

/**
 * Read a calendar date as YYYY-MM-DD.
 *
 * Accepts YYYY-MM-DD, DD-MM-YYYY, DD/MM/YYYY, ISO 8601 date-times (reduced to
 * their UTC date) and Date objects.
 */
export function coerceDate(raw: unknown): CoercionResult<CalendarDate> {
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime())
      ? { ok: false, reason: 'invalid Date' }
      : { ok: true, value: raw.toISOString().slice(0, 10) };
  }

  if (typeof raw !== 'string') {
    return { ok: false, reason: `expected a date, got ${describe(raw)}` };
  }

  const text = raw.trim();

  const iso = ISO_DATE_REGEX.exec(text);
  if (iso) {
    return calendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]), text);
  }

  const dayFirst = DAY_FIRST_DATE_REGEX.exec(text);
  if (dayFirst) {
    return calendarDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]), text);
  }

  if (ISO_DATETIME_REGEX.test(text)) {
    const parsed = new Date(text);
    if (!Number.isNaN(parsed.getTime())) {
      return { ok: true, value: parsed.toISOString().slice(0, 10) };
    }
  }

  return { ok: false, reason: `"${text}" is not a recognized date` };
}

/**
 * Coerce a non-blank raw cell to the given field kind.
 */
export function coerceValue(
  raw: unknown,
  kind: FieldKind,
  textCase: TextCase = 'preserve'
): CoercionResult<string | number> {
  switch (kind) {
    case 'string':
      return coerceString(raw, textCase);
    case 'number':
      return coerceNumber(raw);
    case 'date':
      return coerceDate(raw);
  }
}

function calendarDate(year: number, month: number, day: number, text: string): CoercionResult<CalendarDate> {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return { ok: false, reason: `"${text}" is not a valid calendar date` };
  }

  const pad = (n: number, width: number) => String(n).padStart(width, '0');
  return { ok: true, value: `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` };
}

function describe(raw: unknown): string {
  if (raw === null) return 'null';
  if (Array.isArray(raw)) return 'array';
  if (raw instanceof Date) return 'Date';
  return typeof raw;
}

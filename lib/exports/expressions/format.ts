import type { Logic, RefStyle } from '@/lib/exports/expressions/types';

const NUMERIC_RE = /^-?\d+(\.\d+)?$/;

function sanitizeIdentifier(value: string): string {
  return value.replace(/[^a-zA-Z0-9_.\-]/g, '');
}

function dottedToUnderscore(value: string): string {
  return sanitizeIdentifier(value).replace(/[.\-]/g, '_');
}

/**
 * Renders a sheet variable reference.
 *
 * - `underscore`: `mc_jaime_health`
 * - `dollar_underscore`: `$mc_jaime_health`
 * - `lua_dict`: `Variable["mc.jaime.health"]`
 * - `dot`: `mc.jaime.health`
 */
export function formatVarRef(sheet: string, variable: string, style: RefStyle): string {
  switch (style) {
    case 'underscore':
      return `${dottedToUnderscore(sheet)}_${dottedToUnderscore(variable)}`;
    case 'dollar_underscore':
      return `$${dottedToUnderscore(sheet)}_${dottedToUnderscore(variable)}`;
    case 'lua_dict':
      return `Variable["${sanitizeIdentifier(sheet)}.${sanitizeIdentifier(variable)}"]`;
    case 'dot':
      return `${sanitizeIdentifier(sheet)}.${sanitizeIdentifier(variable)}`;
  }
}

export function quoteString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\0/g, '');
  return `"${escaped}"`;
}

/** Numbers, booleans and numeric-looking strings stay bare; other strings are quoted. */
export function formatLiteral(value: unknown, nullKeyword: string): string {
  if (value === null || value === undefined) return nullKeyword;
  if (typeof value === 'boolean') return String(value);
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '0';
  if (typeof value === 'string') {
    if (value === 'true' || value === 'false') return value;
    if (NUMERIC_RE.test(value)) return value;
    if (value === '') return '""';
    return quoteString(value);
  }
  return quoteString(JSON.stringify(value));
}

export function joinWithLogic(logic: Logic, parts: string[], keywords: { and: string; or: string }): string {
  return parts.join(logic === 'any' ? keywords.or : keywords.and);
}

export function parenthesize(expr: string): string {
  return `(${expr})`;
}

import type { ExportError } from '@/lib/exports/errors';

export const DIALECTS = ['ink', 'yarn', 'unity', 'godot', 'unreal', 'articy'] as const;
export type Dialect = (typeof DIALECTS)[number];

export function isDialect(value: unknown): value is Dialect {
  return typeof value === 'string' && (DIALECTS as readonly string[]).includes(value);
}

export type RefStyle = 'underscore' | 'dollar_underscore' | 'lua_dict' | 'dot';

export type Logic = 'all' | 'any';

export interface Rule {
  id: string | null;
  sheet: string;
  variable: string;
  operator: string;
  value: unknown;
}

export interface Assignment {
  sheet: string;
  variable: string;
  operator: string;
  value: unknown;
  valueType: string | null;
  valueSheet: string | null;
}

export type ConditionGroup =
  | { kind: 'rules'; logic: Logic; rules: Rule[] }
  | { kind: 'group'; logic: Logic; groups: ConditionGroup[] };

export type ConditionStructure =
  | { kind: 'flat'; logic: Logic; rules: Rule[] }
  | { kind: 'blocks'; logic: Logic; groups: ConditionGroup[] };

export type TranspileWarning =
  | {
      type: 'unsupported_operator';
      message: string;
      operator: string;
      dialect: Dialect;
      variable: string;
    }
  | {
      type: 'custom_function_required';
      message: string;
      operator: string;
      function: string;
      dialect: Dialect;
      variable: string;
    };

export type TranspileResult =
  | { ok: true; expr: string; warnings: TranspileWarning[] }
  | { ok: false; error: ExportError };

/** One rendered rule, or a skip with the warning that explains it. */
export type RenderedRule = { expr: string | null; warnings: TranspileWarning[] };

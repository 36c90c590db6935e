import { ExportError } from '@/lib/exports/errors';
import { unsupportedOperator } from '@/lib/exports/expressions/condition';
import { normalizeAssignments } from '@/lib/exports/expressions/decode';
import { DIALECT_RULES, type DialectRules } from '@/lib/exports/expressions/dialects';
import { formatLiteral, formatVarRef } from '@/lib/exports/expressions/format';
import {
  isDialect,
  type Assignment,
  type Dialect,
  type TranspileResult,
  type TranspileWarning
} from '@/lib/exports/expressions/types';

function valueExpr(table: DialectRules, assignment: Assignment): string {
  const { value, valueType, valueSheet } = assignment;
  if (valueType === 'variable_ref' && valueSheet && typeof value === 'string' && value !== '') {
    return formatVarRef(valueSheet, value, table.refStyle);
  }
  if (value === null || value === undefined) return '0';
  return formatLiteral(value, table.nullKeyword);
}

function renderAssignment(table: DialectRules, assignment: Assignment): { stmt: string | null; warning?: TranspileWarning } {
  const ref = formatVarRef(assignment.sheet, assignment.variable, table.refStyle);
  switch (assignment.operator) {
    case 'set':
      return { stmt: table.assign(ref, valueExpr(table, assignment)) };
    case 'set_true':
      return { stmt: table.assign(ref, 'true') };
    case 'set_false':
      return { stmt: table.assign(ref, 'false') };
    case 'toggle':
      return { stmt: table.assign(ref, table.negate(ref)) };
    case 'add':
      return { stmt: table.increment(ref, '+', valueExpr(table, assignment)) };
    case 'subtract':
      return { stmt: table.increment(ref, '-', valueExpr(table, assignment)) };
    case 'clear':
      return { stmt: table.assign(ref, '""') };
    case 'set_if_unset':
      return { stmt: table.setIfUnset(ref, valueExpr(table, assignment)) };
    default:
      return { stmt: null, warning: unsupportedOperator(assignment.operator, table.dialect, ref) };
  }
}

/** Compiles an assignment list into newline-separated dialect statements. */
export function transpileInstruction(assignments: unknown, dialect: string): TranspileResult {
  if (!isDialect(dialect)) {
    return { ok: false, error: new ExportError('UNKNOWN_ENGINE', `Unknown dialect: ${dialect}`, { dialect }) };
  }
  const table = DIALECT_RULES[dialect];
  const statements: string[] = [];
  const warnings: TranspileWarning[] = [];
  for (const assignment of normalizeAssignments(assignments)) {
    const { stmt, warning } = renderAssignment(table, assignment);
    if (stmt) statements.push(stmt);
    if (warning) warnings.push(warning);
  }
  return { ok: true, expr: statements.join('\n'), warnings };
}

/** Single-assignment form; incomplete assignments compile to `""`. */
export function compileAssignment(assignment: unknown, dialect: Dialect): string {
  const result = transpileInstruction([assignment], dialect);
  return result.ok ? result.expr : '';
}

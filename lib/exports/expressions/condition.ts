import { ExportError } from '@/lib/exports/errors';
import { decodeCondition, findRule } from '@/lib/exports/expressions/decode';
import { CUSTOM_FUNCTIONS, DIALECT_RULES, isStringOperator, type DialectRules } from '@/lib/exports/expressions/dialects';
import { formatLiteral, formatVarRef, joinWithLogic, parenthesize } from '@/lib/exports/expressions/format';
import {
  isDialect,
  type ConditionGroup,
  type ConditionStructure,
  type Dialect,
  type Logic,
  type RenderedRule,
  type Rule,
  type TranspileResult,
  type TranspileWarning
} from '@/lib/exports/expressions/types';

const COMPARISONS = new Map<string, string>([
  ['equals', '=='],
  ['greater_than', '>'],
  ['less_than', '<'],
  ['greater_than_or_equal', '>='],
  ['less_than_or_equal', '<=']
]);

const DATE_COMPARISONS = new Map<string, string>([
  ['before', '<'],
  ['after', '>']
]);

export function unsupportedOperator(operator: string, dialect: Dialect, variable: string): TranspileWarning {
  return {
    type: 'unsupported_operator',
    message: `Operator '${operator}' is not supported by ${dialect}`,
    operator,
    dialect,
    variable
  };
}

function customFunctionRequired(operator: string, fn: string, dialect: Dialect, variable: string): TranspileWarning {
  return {
    type: 'custom_function_required',
    message: `Operator '${operator}' requires custom function '${fn}' in ${dialect}`,
    operator,
    function: fn,
    dialect,
    variable
  };
}

function unsupported(table: DialectRules, rule: Rule, ref: string): RenderedRule {
  const warning = unsupportedOperator(rule.operator, table.dialect, ref);
  return { expr: table.unsupported ? table.unsupported(rule.operator) : null, warnings: [warning] };
}

export function renderRule(table: DialectRules, rule: Rule): RenderedRule {
  const ref = formatVarRef(rule.sheet, rule.variable, table.refStyle);
  const literal = () => formatLiteral(rule.value, table.nullKeyword);
  const { operator } = rule;

  const comparison = COMPARISONS.get(operator);
  if (comparison) return { expr: `${ref} ${comparison} ${literal()}`, warnings: [] };

  switch (operator) {
    case 'not_equals':
      return { expr: `${ref} ${table.notEquals} ${literal()}`, warnings: [] };
    case 'is_true':
      return { expr: table.isTrue(ref), warnings: [] };
    case 'is_false':
      return { expr: table.isFalse(ref), warnings: [] };
    case 'is_nil':
      return table.isNil ? { expr: table.isNil(ref), warnings: [] } : unsupported(table, rule, ref);
    case 'is_empty':
      return { expr: `${ref} == ""`, warnings: [] };
  }

  if (isStringOperator(operator)) {
    if (!table.stringOp) return unsupported(table, rule, ref);
    const expr = table.stringOp(operator, ref, literal());
    const warnings = table.customStringFunctions
      ? [customFunctionRequired(operator, CUSTOM_FUNCTIONS[operator], table.dialect, ref)]
      : [];
    return { expr, warnings };
  }

  const dateComparison = DATE_COMPARISONS.get(operator);
  if (dateComparison) {
    if (!table.dates) return unsupported(table, rule, ref);
    return { expr: `${ref} ${dateComparison} ${literal()}`, warnings: [] };
  }

  return unsupported(table, rule, ref);
}

function join(table: DialectRules, logic: Logic, parts: string[]): string {
  const operands =
    logic === 'any' && table.wrapOrOperands && parts.length > 1
      ? parts.map((part) => (part.startsWith('(') && part.endsWith(')') ? part : parenthesize(part)))
      : parts;
  return joinWithLogic(logic, operands, table.keywords);
}

function renderRules(table: DialectRules, rules: Rule[], warnings: TranspileWarning[]): string[] {
  const parts: string[] = [];
  for (const rule of rules) {
    const rendered = renderRule(table, rule);
    warnings.push(...rendered.warnings);
    if (rendered.expr) parts.push(rendered.expr);
  }
  return parts;
}

function renderGroup(table: DialectRules, group: ConditionGroup, warnings: TranspileWarning[]): string | null {
  const parts =
    group.kind === 'rules'
      ? renderRules(table, group.rules, warnings)
      : group.groups
          .map((inner) => renderGroup(table, inner, warnings))
          .filter((expr): expr is string => expr !== null);
  if (parts.length === 0) return null;
  if (parts.length === 1) return parts[0];
  return parenthesize(join(table, group.logic, parts));
}

function renderStructure(table: DialectRules, structure: ConditionStructure): { expr: string; warnings: TranspileWarning[] } {
  const warnings: TranspileWarning[] = [];
  if (structure.kind === 'flat') {
    return { expr: join(table, structure.logic, renderRules(table, structure.rules, warnings)), warnings };
  }
  const parts = structure.groups
    .map((group) => renderGroup(table, group, warnings))
    .filter((expr): expr is string => expr !== null);
  return { expr: join(table, structure.logic, parts), warnings };
}

/**
 * Compiles a stored condition into the dialect's boolean expression. An empty
 * condition compiles to `""`; callers decide what an unconditional guard looks like.
 */
export function transpileCondition(condition: unknown, dialect: string): TranspileResult {
  if (!isDialect(dialect)) {
    return { ok: false, error: new ExportError('UNKNOWN_ENGINE', `Unknown dialect: ${dialect}`, { dialect }) };
  }
  const decoded = decodeCondition(condition);
  if (!decoded.ok) return decoded;
  if (!decoded.condition) return { ok: true, expr: '', warnings: [] };
  const { expr, warnings } = renderStructure(DIALECT_RULES[dialect], decoded.condition);
  return { ok: true, expr, warnings };
}

/** Never fails: broken or empty conditions become the dialect's `true`. */
export function compileCondition(condition: unknown, dialect: Dialect): string {
  const result = transpileCondition(condition, dialect);
  if (!result.ok || result.expr === '') return DIALECT_RULES[dialect].trueLiteral;
  return result.expr;
}

/**
 * Guard for one case of a switch-mode condition node, whose cases are keyed by
 * rule id. Returns null when the case has no matching rule.
 */
export function compileCaseGuard(condition: unknown, caseId: string, dialect: Dialect): string | null {
  const decoded = decodeCondition(condition);
  if (!decoded.ok) return null;
  const rule = findRule(decoded.condition, caseId);
  if (!rule) return null;
  return renderRule(DIALECT_RULES[dialect], rule).expr;
}

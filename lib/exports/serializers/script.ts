import { FORMAT_VERSION } from '@/config/exports';
import { renderRule, transpileCondition } from '@/lib/exports/expressions/condition';
import { decodeCondition, findRule } from '@/lib/exports/expressions/decode';
import { DIALECT_RULES } from '@/lib/exports/expressions/dialects';
import type { TranspileWarning } from '@/lib/exports/expressions/types';
import { identifierFromShortcut, safeIdentifier, uniqueKeys, type Variable } from '@/lib/exports/helpers';
import type { ConditionCase, ConditionNode } from '@/lib/exports/nodes';
import type { Flow, ProjectData, Sheet } from '@/lib/exports/schema';
import { takeExpr, type TranspileContext } from '@/lib/exports/serializers/context';

export function requiredFunctions(warnings: TranspileWarning[]): string[] {
  const names = new Set<string>();
  for (const warning of warnings) {
    if (warning.type === 'custom_function_required') names.add(warning.function);
  }
  return [...names].sort();
}

export function flowIdentifier(flow: Pick<Flow, 'id' | 'shortcut' | 'name'>, digitPrefix: string): string {
  const ident = identifierFromShortcut(flow.shortcut || flow.name) || `flow_${flow.id}`;
  return safeIdentifier(ident, digitPrefix);
}

export function projectIdentifier(project: ProjectData['project']): string {
  return identifierFromShortcut(project.slug || 'story') || 'story';
}

/** Flow id → identifier, plus shortcut → identifier for subflow and jump lookups. */
export interface FlowNames {
  byId: Map<string, string>;
  byShortcut: Map<string, string>;
}

export function buildFlowNames(flows: Flow[], digitPrefix: string): FlowNames {
  const byId = uniqueKeys(flows, (flow) => flowIdentifier(flow, digitPrefix));
  const byShortcut = new Map<string, string>();
  for (const flow of flows) {
    const ident = byId.get(flow.id);
    if (flow.shortcut && ident) byShortcut.set(flow.shortcut, ident);
  }
  return { byId, byShortcut };
}

export function flowName(names: FlowNames, flow: Flow, digitPrefix: string): string {
  return names.byId.get(flow.id) ?? flowIdentifier(flow, digitPrefix);
}

export function resolveFlowName(
  names: FlowNames,
  target: { flowId?: string | null; shortcut?: string | null },
  digitPrefix: string
): string | null {
  if (target.flowId) {
    const byId = names.byId.get(target.flowId);
    if (byId) return byId;
  }
  if (target.shortcut) {
    return names.byShortcut.get(target.shortcut) ?? safeIdentifier(identifierFromShortcut(target.shortcut), digitPrefix);
  }
  return null;
}

export type BranchGuard = { kind: 'if' | 'elseif'; expr: string } | { kind: 'else' };

function caseGuard(ctx: TranspileContext, node: ConditionNode, caseId: string | null): string | null {
  if (!caseId) return null;
  const decoded = decodeCondition(node.condition);
  if (!decoded.ok) return null;
  const rule = findRule(decoded.condition, caseId);
  if (!rule) return null;
  const rendered = renderRule(DIALECT_RULES[ctx.dialect], rule);
  ctx.warnings.push(...rendered.warnings);
  return rendered.expr;
}

/**
 * Guard for one branch of a condition node.
 *
 * Switch mode keys each case to a rule; a case without a rule is `false`
 * unless it is the last one. Otherwise the first branch takes the whole
 * condition (negated when its case value is `"false"`), middle branches are
 * unreachable and the last branch is the fallback.
 */
export function branchGuard(ctx: TranspileContext, node: ConditionNode, branch: ConditionCase, index: number): BranchGuard {
  const table = DIALECT_RULES[ctx.dialect];
  const last = index > 0 && index === node.cases.length - 1;

  if (node.switchMode) {
    const guard = caseGuard(ctx, node, branch.id);
    if (index === 0) return { kind: 'if', expr: guard ?? 'false' };
    if (guard) return { kind: 'elseif', expr: guard };
    return last ? { kind: 'else' } : { kind: 'elseif', expr: 'false' };
  }

  if (index === 0) {
    const expr = takeExpr(ctx, transpileCondition(node.condition, ctx.dialect)) ?? table.trueLiteral;
    return { kind: 'if', expr: branch.value === 'false' ? table.negate(`(${expr})`) : expr };
  }
  return last ? { kind: 'else' } : { kind: 'elseif', expr: 'false' };
}

export interface ScriptMetadataInput {
  formatKey: string;
  project: ProjectData['project'];
  sheets: Sheet[];
  variables: Variable[];
  flows: Flow[];
  flowNames: FlowNames;
  variableRef(variable: Variable): string;
  characterName(sheet: Sheet): string;
  characterKey: string;
  warnings: TranspileWarning[];
}

/** Sidecar describing how source names map onto script identifiers. */
export function buildScriptMetadata(input: ScriptMetadataInput): Record<string, unknown> {
  const characters: Record<string, Record<string, string>> = {};
  for (const sheet of input.sheets) {
    characters[sheet.shortcut] = { name: sheet.name, [input.characterKey]: input.characterName(sheet) };
  }

  const variableMapping: Record<string, string> = {};
  for (const variable of input.variables) variableMapping[variable.fullRef] = input.variableRef(variable);

  const flowMapping: Record<string, string> = {};
  const sourceNames = uniqueKeys(input.flows, (flow) => flow.shortcut || flow.name);
  for (const flow of input.flows) {
    flowMapping[sourceNames.get(flow.id) ?? flow.id] = input.flowNames.byId.get(flow.id) ?? '';
  }

  const metadata: Record<string, unknown> = {
    [input.formatKey]: FORMAT_VERSION,
    project: input.project.name,
    characters,
    variable_mapping: variableMapping,
    flow_mapping: flowMapping
  };
  const functions = requiredFunctions(input.warnings);
  if (functions.length > 0) metadata.required_functions = functions;
  return metadata;
}

export function indent(depth: number): string {
  return '    '.repeat(depth);
}

import { z } from 'zod';
import { ExportError } from '@/lib/exports/errors';
import type { Assignment, ConditionGroup, ConditionStructure, Logic, Rule } from '@/lib/exports/expressions/types';

const RuleSchema = z.object({
  id: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((id) => (id === null || id === undefined ? null : String(id))),
  sheet: z.string().min(1),
  variable: z.string().min(1),
  operator: z.string().min(1),
  value: z.unknown()
});

const AssignmentSchema = z.object({
  sheet: z.string().min(1),
  variable: z.string().min(1),
  operator: z.string().min(1),
  value: z.unknown(),
  value_type: z.string().nullish(),
  value_sheet: z.string().nullish()
});

const BlockSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('block'), logic: z.string().nullish(), rules: z.array(z.unknown()) }),
  z.object({ type: z.literal('group'), logic: z.string().nullish(), blocks: z.array(z.unknown()) })
]);

const ConditionShapeSchema = z.union([
  z.object({ logic: z.string().nullish(), rules: z.array(z.unknown()) }),
  z.object({ logic: z.string().nullish(), blocks: z.array(z.unknown()) })
]);

export type DecodedCondition =
  | { ok: true; condition: ConditionStructure | null }
  | { ok: false; error: ExportError };

function toLogic(value: string | null | undefined): Logic {
  return value === 'any' ? 'any' : 'all';
}

/** Drops rules missing a sheet, variable or operator. */
export function normalizeRules(rules: unknown[]): Rule[] {
  const out: Rule[] = [];
  for (const raw of rules) {
    const parsed = RuleSchema.safeParse(raw);
    if (parsed.success) out.push({ ...parsed.data, value: parsed.data.value });
  }
  return out;
}

export function normalizeAssignments(assignments: unknown): Assignment[] {
  if (!Array.isArray(assignments)) return [];
  const out: Assignment[] = [];
  for (const raw of assignments) {
    const parsed = AssignmentSchema.safeParse(raw);
    if (!parsed.success) continue;
    const { sheet, variable, operator, value, value_type, value_sheet } = parsed.data;
    out.push({ sheet, variable, operator, value, valueType: value_type ?? null, valueSheet: value_sheet ?? null });
  }
  return out;
}

function extractBlock(raw: unknown): ConditionGroup | null {
  const parsed = BlockSchema.safeParse(raw);
  if (!parsed.success) return null;
  const block = parsed.data;
  if (block.type === 'block') {
    return { kind: 'rules', logic: toLogic(block.logic), rules: normalizeRules(block.rules) };
  }
  const groups = block.blocks.map(extractBlock).filter((g): g is ConditionGroup => g !== null);
  return { kind: 'group', logic: toLogic(block.logic), groups };
}

function structureOf(shape: z.infer<typeof ConditionShapeSchema>): ConditionStructure {
  if ('blocks' in shape) {
    const groups = shape.blocks.map(extractBlock).filter((g): g is ConditionGroup => g !== null);
    return { kind: 'blocks', logic: toLogic(shape.logic), groups };
  }
  return { kind: 'flat', logic: toLogic(shape.logic), rules: normalizeRules(shape.rules) };
}

/**
 * Normalizes every stored condition shape. JSON strings are decoded; a string
 * that is not a structured condition is a legacy free-text condition and cannot
 * be compiled.
 */
export function decodeCondition(input: unknown): DecodedCondition {
  if (input === null || input === undefined || input === '') return { ok: true, condition: null };

  if (typeof input === 'string') {
    let decoded: unknown;
    try {
      decoded = JSON.parse(input);
    } catch {
      return legacy(input);
    }
    const shape = ConditionShapeSchema.safeParse(decoded);
    return shape.success ? { ok: true, condition: structureOf(shape.data) } : legacy(input);
  }

  const shape = ConditionShapeSchema.safeParse(input);
  return { ok: true, condition: shape.success ? structureOf(shape.data) : null };
}

function legacy(source: string): DecodedCondition {
  return {
    ok: false,
    error: new ExportError('LEGACY_CONDITION', 'Plain-text conditions cannot be transpiled', { source })
  };
}

export function findRule(structure: ConditionStructure | null, ruleId: string): Rule | null {
  if (!structure) return null;
  const search = (group: ConditionGroup): Rule | null => {
    if (group.kind === 'rules') return group.rules.find((rule) => rule.id === ruleId) ?? null;
    for (const inner of group.groups) {
      const found = search(inner);
      if (found) return found;
    }
    return null;
  };
  if (structure.kind === 'flat') return structure.rules.find((rule) => rule.id === ruleId) ?? null;
  for (const group of structure.groups) {
    const found = search(group);
    if (found) return found;
  }
  return null;
}

/** Every sheet shortcut a condition reads, for reference tracking. */
export function conditionSheets(structure: ConditionStructure | null): string[] {
  if (!structure) return [];
  const sheets: string[] = [];
  const visit = (group: ConditionGroup) => {
    if (group.kind === 'rules') group.rules.forEach((rule) => sheets.push(rule.sheet));
    else group.groups.forEach(visit);
  };
  if (structure.kind === 'flat') structure.rules.forEach((rule) => sheets.push(rule.sheet));
  else structure.groups.forEach(visit);
  return sheets;
}

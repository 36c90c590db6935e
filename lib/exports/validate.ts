import { conditionSheets, decodeCondition, normalizeAssignments } from '@/lib/exports/expressions/decode';
import { stripHtml } from '@/lib/exports/helpers';
import type { FlowNode } from '@/lib/exports/nodes';
import type { Flow, Localization, ProjectData, Sheet } from '@/lib/exports/schema';

export type FindingLevel = 'error' | 'warning' | 'info';

export type ValidationRule =
  | 'missing_entry'
  | 'orphan_nodes'
  | 'unreachable_nodes'
  | 'empty_dialogue'
  | 'missing_speakers'
  | 'circular_subflows'
  | 'broken_references'
  | 'missing_translations'
  | 'orphan_sheets';

export interface Finding {
  level: FindingLevel;
  rule: ValidationRule;
  message: string;
  flow_id?: string;
  flow_name?: string;
  node_id?: string;
  node_type?: string;
  ref_type?: 'hub' | 'flow' | 'scene';
  ref_value?: string;
  locale?: string;
  pending_count?: number;
  total_count?: number;
  sheet_id?: string;
  sheet_name?: string;
}

export type ValidationStatus = 'passed' | 'warnings' | 'errors';

export interface ValidationResult {
  status: ValidationStatus;
  errors: Finding[];
  warnings: Finding[];
  info: Finding[];
  statistics: {
    total_findings: number;
    error_count: number;
    warning_count: number;
    info_count: number;
  };
}

const UNTRANSLATED_STATUSES = new Set(['pending', 'draft']);

function flowFinding(level: FindingLevel, rule: ValidationRule, flow: Flow, message: string): Finding {
  return { level, rule, message, flow_id: flow.id, flow_name: flow.name };
}

function nodeFinding(level: FindingLevel, rule: ValidationRule, flow: Flow, node: FlowNode, message: string): Finding {
  return { ...flowFinding(level, rule, flow, message), node_id: node.id, node_type: node.type };
}

function checkMissingEntry(flows: Flow[]): Finding[] {
  return flows
    .filter((flow) => !flow.nodes.some((node) => node.kind === 'entry'))
    .map((flow) => flowFinding('error', 'missing_entry', flow, `Flow "${flow.name}" has no Entry node`));
}

function checkOrphanNodes(flows: Flow[]): Finding[] {
  return flows.flatMap((flow) => {
    const connected = new Set<string>();
    for (const connection of flow.connections) {
      connected.add(connection.source_node_id);
      connected.add(connection.target_node_id);
    }
    return flow.nodes
      .filter((node) => node.kind !== 'entry' && node.kind !== 'exit' && !connected.has(node.id))
      .map((node) =>
        nodeFinding(
          'warning',
          'orphan_nodes',
          flow,
          node,
          `${node.type} node (id: ${node.id}) in flow "${flow.name}" has no connections`
        )
      );
  });
}

function reachableFrom(starts: string[], flow: Flow): Set<string> {
  const adjacency = new Map<string, string[]>();
  for (const connection of flow.connections) {
    adjacency.set(connection.source_node_id, [...(adjacency.get(connection.source_node_id) ?? []), connection.target_node_id]);
  }
  const visited = new Set(starts);
  const queue = [...starts];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of adjacency.get(current) ?? []) {
      if (visited.has(next)) continue;
      visited.add(next);
      queue.push(next);
    }
  }
  return visited;
}

function checkUnreachableNodes(flows: Flow[]): Finding[] {
  return flows.flatMap((flow) => {
    const entries = flow.nodes.filter((node) => node.kind === 'entry').map((node) => node.id);
    if (entries.length === 0) return [];
    const reachable = reachableFrom(entries, flow);
    return flow.nodes
      .filter((node) => node.kind !== 'entry' && !reachable.has(node.id))
      .map((node) =>
        nodeFinding(
          'warning',
          'unreachable_nodes',
          flow,
          node,
          `${node.type} node (id: ${node.id}) in flow "${flow.name}" is not reachable from Entry`
        )
      );
  });
}

function checkDialogues(flows: Flow[]): Finding[] {
  const empty: Finding[] = [];
  const speakerless: Finding[] = [];
  for (const flow of flows) {
    for (const node of flow.nodes) {
      if (node.kind !== 'dialogue') continue;
      if (stripHtml(node.text) === '') {
        empty.push(
          nodeFinding('warning', 'empty_dialogue', flow, node, `Dialogue node (id: ${node.id}) in flow "${flow.name}" has no text`)
        );
      }
      if (!node.speakerSheetId) {
        speakerless.push(
          nodeFinding(
            'warning',
            'missing_speakers',
            flow,
            node,
            `Dialogue node (id: ${node.id}) in flow "${flow.name}" has no speaker assigned`
          )
        );
      }
    }
  }
  return [...empty, ...speakerless];
}

/**
 * Flags every flow whose subflow references lead back onto the current
 * reference path, which includes flows that only call into a cycle.
 */
function checkCircularSubflows(flows: Flow[]): Finding[] {
  const graph = new Map<string, string[]>();
  for (const flow of flows) {
    const targets = flow.nodes.flatMap((node) => (node.kind === 'subflow' && node.targetFlowId ? [node.targetFlowId] : []));
    if (targets.length > 0) graph.set(flow.id, targets);
  }

  // Finished flows map to whether they reach a cycle; `onPath` holds the open ones.
  const done = new Map<string, boolean>();
  const onPath = new Set<string>();
  const hasCycle = (flowId: string): boolean => {
    if (onPath.has(flowId)) return true;
    const known = done.get(flowId);
    if (known !== undefined) return known;

    onPath.add(flowId);
    let found = false;
    for (const target of graph.get(flowId) ?? []) {
      if (hasCycle(target)) found = true;
    }
    onPath.delete(flowId);
    done.set(flowId, found);
    return found;
  };

  const byId = new Map(flows.map((flow): [string, Flow] => [flow.id, flow]));
  return [...graph.keys()]
    .filter((flowId) => hasCycle(flowId))
    .map((flowId): Finding => {
      const name = byId.get(flowId)?.name ?? 'unknown';
      return {
        level: 'warning',
        rule: 'circular_subflows',
        message: `Flow "${name}" is part of a circular subflow reference chain`,
        flow_id: flowId,
        flow_name: name
      };
    });
}

function checkBrokenReferences(project: ProjectData): Finding[] {
  const flowIds = new Set(project.flows.map((flow) => flow.id));
  const flowShortcuts = new Set(project.flows.flatMap((flow) => (flow.shortcut ? [flow.shortcut] : [])));
  const sceneIds = new Set(project.scenes.map((scene) => scene.id));
  const jumps: Finding[] = [];
  const subflows: Finding[] = [];
  const scenes: Finding[] = [];

  for (const flow of project.flows) {
    const hubKeys = new Set<string>();
    for (const node of flow.nodes) {
      if (node.kind !== 'hub') continue;
      hubKeys.add(node.id);
      if (node.hubKey) hubKeys.add(node.hubKey);
    }

    for (const node of flow.nodes) {
      if (node.kind === 'jump' && node.hubRef && !hubKeys.has(node.hubRef)) {
        jumps.push({
          ...nodeFinding(
            'error',
            'broken_references',
            flow,
            node,
            `Jump node (id: ${node.id}) in flow "${flow.name}" references non-existent hub "${node.hubRef}"`
          ),
          ref_type: 'hub',
          ref_value: node.hubRef
        });
      }
      if (node.kind === 'subflow') {
        const brokenId = node.targetFlowId !== null && !flowIds.has(node.targetFlowId);
        const brokenShortcut = node.flowShortcut !== null && !flowShortcuts.has(node.flowShortcut);
        if (brokenId || brokenShortcut) {
          subflows.push({
            ...nodeFinding(
              'error',
              'broken_references',
              flow,
              node,
              `Subflow node (id: ${node.id}) in flow "${flow.name}" references non-existent flow`
            ),
            ref_type: 'flow',
            ref_value: (brokenId ? node.targetFlowId : node.flowShortcut) ?? undefined
          });
        }
      }
      if (node.kind === 'scene' && node.sceneId !== null && !sceneIds.has(node.sceneId)) {
        scenes.push({
          ...nodeFinding(
            'error',
            'broken_references',
            flow,
            node,
            `Scene node (id: ${node.id}) in flow "${flow.name}" references non-existent scene`
          ),
          ref_type: 'scene',
          ref_value: node.sceneId
        });
      }
    }
  }
  return [...jumps, ...subflows, ...scenes];
}

function checkMissingTranslations(localization: Localization): Finding[] {
  const targets = localization.languages.filter((lang) => !lang.is_source).map((lang) => lang.locale_code);
  if (targets.length === 0) return [];

  const sources = new Set(
    localization.strings.map((text) => JSON.stringify([text.source_type, text.source_id, text.source_field]))
  );
  const pending = new Map<string, number>();
  for (const text of localization.strings) {
    if (!targets.includes(text.locale_code) || !UNTRANSLATED_STATUSES.has(text.status)) continue;
    pending.set(text.locale_code, (pending.get(text.locale_code) ?? 0) + 1);
  }

  return targets.flatMap((locale): Finding[] => {
    const count = pending.get(locale) ?? 0;
    if (count === 0) return [];
    return [
      {
        level: 'warning',
        rule: 'missing_translations',
        message: `${count} of ${sources.size} strings are untranslated for locale "${locale}"`,
        locale,
        pending_count: count,
        total_count: sources.size
      }
    ];
  });
}

/** Sheet ids and shortcuts named by speakers, condition rules and assignments. */
function referencedSheets(flows: Flow[]): Set<string> {
  const refs = new Set<string>();
  const addCondition = (condition: unknown) => {
    const decoded = decodeCondition(condition);
    if (decoded.ok) conditionSheets(decoded.condition).forEach((sheet) => refs.add(sheet));
  };
  const addAssignments = (assignments: unknown[]) => {
    for (const assignment of normalizeAssignments(assignments)) {
      refs.add(assignment.sheet);
      if (assignment.valueSheet) refs.add(assignment.valueSheet);
    }
  };

  for (const flow of flows) {
    for (const node of flow.nodes) {
      switch (node.kind) {
        case 'dialogue':
          if (node.speakerSheetId) refs.add(node.speakerSheetId);
          addCondition(node.condition);
          for (const response of node.responses) {
            addCondition(response.condition);
            addAssignments(response.assignments);
          }
          break;
        case 'condition':
          addCondition(node.condition);
          break;
        case 'instruction':
          addAssignments(node.assignments);
          break;
        default:
          break;
      }
    }
  }
  return refs;
}

function checkOrphanSheets(sheets: Sheet[], flows: Flow[]): Finding[] {
  const refs = referencedSheets(flows);
  return sheets
    .filter((sheet) => !refs.has(sheet.id) && !refs.has(sheet.shortcut))
    .map((sheet): Finding => ({
      level: 'info',
      rule: 'orphan_sheets',
      message: `Sheet "${sheet.name}" has no references from flows or scenes`,
      sheet_id: sheet.id,
      sheet_name: sheet.name
    }));
}

export function validateProject(project: ProjectData): ValidationResult {
  const findings: Finding[] = [
    ...checkMissingEntry(project.flows),
    ...checkOrphanNodes(project.flows),
    ...checkUnreachableNodes(project.flows),
    ...checkDialogues(project.flows),
    ...checkCircularSubflows(project.flows),
    ...checkBrokenReferences(project),
    ...checkMissingTranslations(project.localization),
    ...checkOrphanSheets(project.sheets, project.flows)
  ];

  const errors = findings.filter((finding) => finding.level === 'error');
  const warnings = findings.filter((finding) => finding.level === 'warning');
  const info = findings.filter((finding) => finding.level === 'info');
  const status: ValidationStatus = errors.length > 0 ? 'errors' : warnings.length > 0 ? 'warnings' : 'passed';

  return {
    status,
    errors,
    warnings,
    info,
    statistics: {
      total_findings: findings.length,
      error_count: errors.length,
      warning_count: warnings.length,
      info_count: info.length
    }
  };
}

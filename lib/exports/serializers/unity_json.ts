import { FORMAT_VERSION } from '@/config/exports';
import { notImplemented } from '@/lib/exports/errors';
import { transpileCondition } from '@/lib/exports/expressions/condition';
import { transpileInstruction } from '@/lib/exports/expressions/instruction';
import { indexFlow, outgoing, outgoingByPin } from '@/lib/exports/graph/index_flow';
import { collectVariables, dialogueText, stripHtml, toJson, type VariableValue } from '@/lib/exports/helpers';
import type { ExportOptions } from '@/lib/exports/options';
import type { Flow, ProjectData, Sheet } from '@/lib/exports/schema';
import { createTranspileContext, takeExpr, type TranspileContext } from '@/lib/exports/serializers/context';
import type { SerializeResult, Serializer } from '@/lib/exports/serializers/types';

export interface UnityEntry {
  id: number;
  node_id: string;
  node_type: string;
  is_root: boolean;
  is_group: boolean;
  links_to: number[];
  actor_id?: number;
  dialogue_text?: string;
  menu_text?: string;
  conditions?: string;
  user_script?: string;
  stage_directions?: string;
  response_id?: string;
}

function buildActors(sheets: Sheet[]) {
  return sheets.map((sheet, i) => {
    const fields: Record<string, VariableValue> = {};
    for (const variable of collectVariables([sheet])) fields[variable.variableName] = variable.default;
    return { id: i + 1, name: sheet.name, shortcut: sheet.shortcut, fields };
  });
}

function linkIds(entryIds: Map<string, number>, targetIds: string[]): number[] {
  const links: number[] = [];
  for (const targetId of targetIds) {
    const id = entryIds.get(targetId);
    if (id !== undefined) links.push(id);
  }
  return links;
}

function buildEntries(ctx: TranspileContext, flow: Flow, actorIds: Map<string, number>): UnityEntry[] {
  const index = indexFlow(flow);
  const entryIds = new Map(flow.nodes.map((node, i): [string, number] => [node.id, i + 1]));
  const condition = (value: unknown) => takeExpr(ctx, transpileCondition(value, 'unity')) ?? '';
  const script = (value: unknown) => takeExpr(ctx, transpileInstruction(value, 'unity')) ?? '';

  // Response entries are numbered after the last node entry.
  let nextResponseId = flow.nodes.length + 1;
  const entries: UnityEntry[] = [];
  flow.nodes.forEach((node, i) => {
    const id = i + 1;
    const base: UnityEntry = {
      id,
      node_id: node.id,
      node_type: node.type,
      is_root: node.kind === 'entry',
      is_group: node.kind === 'hub' || node.kind === 'entry',
      links_to: linkIds(entryIds, outgoing(index, node.id).map((edge) => edge.targetId))
    };

    switch (node.kind) {
      case 'dialogue': {
        const byPin = outgoingByPin(index, node.id);
        const responses = node.responses.map((response): UnityEntry => {
          const targets = (byPin.get(`response_${response.id}`) ?? []).map((edge) => edge.targetId);
          return {
            id: nextResponseId++,
            node_id: node.id,
            response_id: response.id,
            node_type: 'response',
            is_root: false,
            is_group: false,
            actor_id: 0,
            dialogue_text: stripHtml(response.text),
            menu_text: stripHtml(response.menuText ?? response.text),
            conditions: condition(response.condition),
            user_script: script(response.assignments),
            links_to: linkIds(entryIds, targets)
          };
        });
        entries.push({
          ...base,
          links_to: responses.length > 0 ? responses.map((entry) => entry.id) : base.links_to,
          actor_id: node.speakerSheetId ? (actorIds.get(node.speakerSheetId) ?? 0) : 0,
          dialogue_text: dialogueText(node),
          menu_text: node.menuText ?? '',
          conditions: condition(node.condition),
          user_script: '',
          stage_directions: stripHtml(node.stageDirections)
        });
        entries.push(...responses);
        return;
      }
      case 'condition':
        entries.push({ ...base, conditions: condition(node.condition), user_script: '' });
        return;
      case 'instruction':
        entries.push({ ...base, conditions: '', user_script: script(node.assignments) });
        return;
      default:
        entries.push(base);
    }
  });
  return entries;
}

/** Actors, conversations and a global variable table for the Unity dialogue database. */
function serialize(project: ProjectData, options: ExportOptions): SerializeResult {
  const ctx = createTranspileContext('unity');
  const actorIds = new Map(project.sheets.map((sheet, i): [string, number] => [sheet.id, i + 1]));

  const document = {
    format: 'unity_dialogue_system',
    version: FORMAT_VERSION,
    exporter_version: options.version,
    database: {
      actors: buildActors(project.sheets),
      conversations: project.flows.map((flow, i) => ({
        id: i + 1,
        title: flow.name,
        shortcut: flow.shortcut,
        entries: buildEntries(ctx, flow, actorIds)
      })),
      variables: collectVariables(project.sheets).map((variable) => ({
        name: variable.fullRef,
        type: variable.type,
        initial_value: variable.default
      }))
    }
  };

  return { ok: true, output: toJson(document, options.pretty_print), warnings: ctx.warnings };
}

export const unitySerializer: Serializer = {
  format: 'unity',
  contentType: () => 'application/json',
  fileExtension: () => 'json',
  formatLabel: () => 'Unity Dialogue System (JSON)',
  supportedSections: () => ['flows', 'sheets'],
  serialize,
  serializeToFile: () => ({ ok: false, error: notImplemented('serializeToFile') })
};

import { FORMAT_VERSION } from '@/config/exports';
import { notImplemented } from '@/lib/exports/errors';
import { transpileCondition } from '@/lib/exports/expressions/condition';
import { transpileInstruction } from '@/lib/exports/expressions/instruction';
import { indexFlow, outgoing, type Edge, type FlowIndex } from '@/lib/exports/graph/index_flow';
import {
  buildSpeakerMap,
  collectVariables,
  dialogueText,
  identifierFromShortcut,
  speakerShortcut,
  stripHtml,
  toJson,
  uniqueKeys,
  type SpeakerMap
} from '@/lib/exports/helpers';
import type { FlowNode } from '@/lib/exports/nodes';
import type { ExportOptions } from '@/lib/exports/options';
import type { Flow, ProjectData, Sheet } from '@/lib/exports/schema';
import { createTranspileContext, takeExpr, type TranspileContext } from '@/lib/exports/serializers/context';
import type { SerializeResult, Serializer } from '@/lib/exports/serializers/types';

type GodotNode = { type: string; next: string[] } & Record<string, unknown>;

const isResponsePin = (edge: Edge) => edge.pin.startsWith('response_');
const targetIds = (edges: Edge[]) => edges.map((edge) => edge.targetId);

function buildCharacters(sheets: Sheet[]) {
  const characters: Record<string, { name: string; properties: Record<string, { type: string; value: unknown }> }> = {};
  for (const sheet of sheets) {
    const properties: Record<string, { type: string; value: unknown }> = {};
    for (const variable of collectVariables([sheet])) {
      properties[variable.variableName] = { type: variable.type, value: variable.default };
    }
    characters[sheet.shortcut] = { name: sheet.name, properties };
  }
  return characters;
}

function buildVariables(sheets: Sheet[]) {
  const variables: Record<string, { type: string; default: unknown; source: string }> = {};
  for (const variable of collectVariables(sheets)) {
    variables[identifierFromShortcut(variable.fullRef)] = {
      type: variable.type,
      default: variable.default,
      source: variable.fullRef
    };
  }
  return variables;
}

function buildNode(ctx: TranspileContext, index: FlowIndex, node: FlowNode, speakers: SpeakerMap): GodotNode {
  const edges = outgoing(index, node.id);
  const base: GodotNode = { type: node.type, next: targetIds(edges) };
  const condition = (value: unknown) => takeExpr(ctx, transpileCondition(value, 'godot'));

  switch (node.kind) {
    case 'dialogue':
      return {
        ...base,
        next: node.responses.length > 0 ? targetIds(edges.filter((edge) => !isResponsePin(edge))) : base.next,
        character: speakerShortcut(node, speakers),
        text: dialogueText(node),
        stage_directions: stripHtml(node.stageDirections),
        responses: node.responses.map((response) => ({
          id: response.id,
          text: stripHtml(response.text),
          next: targetIds(edges.filter((edge) => edge.pin === `response_${response.id}`)),
          condition: condition(response.condition)
        }))
      };
    case 'condition':
      return { ...base, condition: condition(node.condition) };
    case 'instruction':
      return {
        ...base,
        code: takeExpr(ctx, transpileInstruction(node.assignments, 'godot')),
        assignments: node.assignments
      };
    case 'hub':
      return { ...base, label: node.label ?? '' };
    case 'jump':
      return { ...base, target: node.hubRef ?? node.targetFlowShortcut };
    case 'subflow':
      return { ...base, flow_shortcut: node.flowShortcut };
    case 'scene':
      return { ...base, location: node.location ?? node.slugLine ?? '' };
    case 'exit':
      return { ...base, technical_id: node.technicalId ?? '' };
    default:
      return base;
  }
}

function buildFlows(ctx: TranspileContext, flows: Flow[], speakers: SpeakerMap) {
  const out: Record<string, { name: string; start_node: string | null; nodes: Record<string, GodotNode> }> = {};
  const keys = uniqueKeys(flows, (flow) => flow.shortcut || flow.name);
  for (const flow of flows) {
    const index = indexFlow(flow);
    const nodes: Record<string, GodotNode> = {};
    for (const node of flow.nodes) nodes[node.id] = buildNode(ctx, index, node, speakers);
    out[keys.get(flow.id) ?? flow.id] = { name: flow.name, start_node: index.entry?.id ?? null, nodes };
  }
  return out;
}

function serialize(project: ProjectData, options: ExportOptions): SerializeResult {
  const ctx = createTranspileContext('godot');
  const document = {
    format: 'godot_dialogue',
    version: FORMAT_VERSION,
    exporter_version: options.version,
    characters: buildCharacters(project.sheets),
    variables: buildVariables(project.sheets),
    flows: buildFlows(ctx, project.flows, buildSpeakerMap(project.sheets))
  };
  return { ok: true, output: toJson(document, options.pretty_print), warnings: ctx.warnings };
}

export const godotSerializer: Serializer = {
  format: 'godot',
  contentType: () => 'application/json',
  fileExtension: () => 'json',
  formatLabel: () => 'Godot Dialogue (JSON)',
  supportedSections: () => ['flows', 'sheets'],
  serialize,
  serializeToFile: () => ({ ok: false, error: notImplemented('serializeToFile') })
};

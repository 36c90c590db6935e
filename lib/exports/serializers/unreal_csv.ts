import { FORMAT_VERSION } from '@/config/exports';
import { notImplemented } from '@/lib/exports/errors';
import { transpileCondition } from '@/lib/exports/expressions/condition';
import { transpileInstruction } from '@/lib/exports/expressions/instruction';
import { indexFlow, outgoing, type Edge } from '@/lib/exports/graph/index_flow';
import {
  buildCsv,
  buildSpeakerMap,
  collectVariables,
  dialogueText,
  identifierFromShortcut,
  speakerShortcut,
  stripHtml,
  toJson,
  uniqueKeys,
  type CsvValue,
  type SpeakerMap,
  type Variable
} from '@/lib/exports/helpers';
import type { FlowNode } from '@/lib/exports/nodes';
import type { ExportOptions } from '@/lib/exports/options';
import type { Flow, ProjectData, Sheet } from '@/lib/exports/schema';
import { createTranspileContext, takeExpr, type TranspileContext } from '@/lib/exports/serializers/context';
import type { SerializeResult, Serializer } from '@/lib/exports/serializers/types';

export const DIALOGUE_HEADERS = [
  'Name',
  'ConversationId',
  'NodeType',
  'SpeakerId',
  'Text',
  'TextKey',
  'MenuText',
  'StageDirections',
  'Sequence',
  'NextLines',
  'Conditions',
  'UserScript'
];
export const CHARACTER_HEADERS = ['Name', 'DisplayName', 'ShortcutId', 'Properties'];
export const VARIABLE_HEADERS = ['Name', 'VariableId', 'Type', 'DefaultValue', 'SheetShortcut', 'VariableName'];

export function rowName(n: number): string {
  return `DLG_${String(n).padStart(4, '0')}`;
}

export function conversationId(flow: Pick<Flow, 'id' | 'shortcut' | 'name'>): string {
  return identifierFromShortcut(flow.shortcut || flow.name) || `flow_${flow.id}`;
}

interface RowContext {
  ctx: TranspileContext;
  speakers: SpeakerMap;
  convId: string;
  rowNames: Map<string, string>;
  edges: Edge[];
  sequence: number;
}

/** Targets without a row (outside the flow or of an unknown kind) are dropped. */
function joinRows(rowNames: Map<string, string>, edges: Edge[]): string {
  return edges.flatMap((edge) => rowNames.get(edge.targetId) ?? []).join('|');
}

function nodeRows(row: RowContext, node: FlowNode): CsvValue[][] {
  const name = row.rowNames.get(node.id) ?? '';
  const next = joinRows(row.rowNames, row.edges);
  const condition = (value: unknown) => takeExpr(row.ctx, transpileCondition(value, 'unreal')) ?? '';
  const script = (value: unknown) => takeExpr(row.ctx, transpileInstruction(value, 'unreal')) ?? '';
  const simple = (type: string, text: string, conditions: string, userScript: string): CsvValue[] => [
    name,
    row.convId,
    type,
    '',
    text,
    '',
    '',
    '',
    row.sequence,
    next,
    conditions,
    userScript
  ];

  switch (node.kind) {
    case 'dialogue': {
      const responseNames = node.responses.map((_, i) => `${name}_R${i + 1}`);
      const main: CsvValue[] = [
        name,
        row.convId,
        'dialogue',
        speakerShortcut(node, row.speakers) ?? '',
        dialogueText(node),
        name.toLowerCase(),
        node.menuText ?? '',
        stripHtml(node.stageDirections),
        row.sequence,
        node.responses.length > 0 ? responseNames.join('|') : next,
        condition(node.condition),
        ''
      ];
      const responses = node.responses.map((response, i): CsvValue[] => {
        const responseName = responseNames[i] ?? `${name}_R${i + 1}`;
        const targets = row.edges.filter((edge) => edge.pin === `response_${response.id}`);
        return [
          responseName,
          row.convId,
          'response',
          '',
          stripHtml(response.text),
          responseName.toLowerCase(),
          stripHtml(response.menuText ?? response.text),
          '',
          row.sequence,
          joinRows(row.rowNames, targets),
          condition(response.condition),
          script(response.assignments)
        ];
      });
      return [main, ...responses];
    }
    case 'condition':
      return [simple('condition', '', condition(node.condition), '')];
    case 'instruction':
      return [simple('instruction', '', '', script(node.assignments))];
    case 'hub':
      return [simple('hub', node.label ?? '', '', '')];
    case 'jump':
      return [simple('jump', '', '', node.hubRef ?? node.targetFlowShortcut ?? '')];
    case 'scene':
      return [simple('scene', node.location ?? node.slugLine ?? '', '', '')];
    case 'subflow':
      return [simple('subflow', node.flowShortcut ?? '', '', '')];
    case 'entry':
      return [simple('entry', '', '', '')];
    case 'exit':
      return [[name, row.convId, 'exit', '', node.technicalId ?? '', '', '', '', row.sequence, '', '', '']];
    case 'unknown':
      return [];
  }
}

/** Row names are numbered across the whole export, so every flow's rows stay unique. */
function buildDialogueCsv(
  ctx: TranspileContext,
  flows: Flow[],
  convIds: Map<string, string>,
  speakers: SpeakerMap
): string {
  let counter = 0;
  const rows: CsvValue[][] = [];
  for (const flow of flows) {
    const index = indexFlow(flow);
    const convId = convIds.get(flow.id) ?? conversationId(flow);
    const rowNames = new Map<string, string>();
    for (const node of flow.nodes) {
      if (node.kind === 'unknown') continue;
      counter += 1;
      rowNames.set(node.id, rowName(counter));
    }
    flow.nodes.forEach((node, sequence) => {
      rows.push(
        ...nodeRows({ ctx, speakers, convId, rowNames, edges: outgoing(index, node.id), sequence }, node)
      );
    });
  }
  return buildCsv(DIALOGUE_HEADERS, rows);
}

function buildCharactersCsv(sheets: Sheet[]): string {
  const rows = sheets.map((sheet): CsvValue[] => {
    const properties: Record<string, unknown> = {};
    for (const variable of collectVariables([sheet])) properties[variable.variableName] = variable.default;
    return [`CHAR_${identifierFromShortcut(sheet.shortcut)}`, sheet.name, sheet.shortcut, JSON.stringify(properties)];
  });
  return buildCsv(CHARACTER_HEADERS, rows);
}

function buildVariablesCsv(variables: Variable[]): string {
  const rows = variables.map((variable): CsvValue[] => [
    `VAR_${identifierFromShortcut(variable.fullRef)}`,
    variable.fullRef,
    variable.type,
    String(variable.default),
    variable.sheetShortcut,
    variable.variableName
  ]);
  return buildCsv(VARIABLE_HEADERS, rows);
}

function buildConversations(flows: Flow[], convIds: Map<string, string>, sheets: Sheet[], variables: Variable[]) {
  const conversations: Record<string, unknown> = {};
  for (const flow of flows) {
    const index = indexFlow(flow);
    const nodes: Record<string, { type: string; outputs: string[] }> = {};
    for (const node of flow.nodes) {
      nodes[node.id] = { type: node.type, outputs: outgoing(index, node.id).map((edge) => edge.targetId) };
    }
    conversations[convIds.get(flow.id) ?? conversationId(flow)] = {
      name: flow.name,
      shortcut: flow.shortcut,
      start_node: index.entry?.id ?? null,
      nodes
    };
  }

  const characters: Record<string, { display_name: string; shortcut: string }> = {};
  for (const sheet of sheets) {
    characters[identifierFromShortcut(sheet.shortcut)] = { display_name: sheet.name, shortcut: sheet.shortcut };
  }

  const variableMap: Record<string, { type: string; default: unknown }> = {};
  for (const variable of variables) variableMap[variable.fullRef] = { type: variable.type, default: variable.default };

  return { format: 'unreal_data_tables', version: FORMAT_VERSION, conversations, characters, variables: variableMap };
}

function serialize(project: ProjectData, options: ExportOptions): SerializeResult {
  const ctx = createTranspileContext('unreal');
  const variables = collectVariables(project.sheets);
  const speakers = buildSpeakerMap(project.sheets);
  const convIds = uniqueKeys(project.flows, conversationId);

  return {
    ok: true,
    output: [
      { filename: 'DT_DialogueLines.csv', content: buildDialogueCsv(ctx, project.flows, convIds, speakers) },
      { filename: 'DT_Characters.csv', content: buildCharactersCsv(project.sheets) },
      { filename: 'DT_Variables.csv', content: buildVariablesCsv(variables) },
      {
        filename: 'Conversations.json',
        content: toJson(buildConversations(project.flows, convIds, project.sheets, variables), options.pretty_print)
      }
    ],
    warnings: ctx.warnings
  };
}

export const unrealSerializer: Serializer = {
  format: 'unreal',
  contentType: () => 'text/csv',
  fileExtension: () => 'csv',
  formatLabel: () => 'Unreal Engine (CSV)',
  supportedSections: () => ['flows', 'sheets'],
  serialize,
  serializeToFile: () => ({ ok: false, error: notImplemented('serializeToFile') })
};

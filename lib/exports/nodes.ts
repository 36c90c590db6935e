export type NodeData = Record<string, unknown>;

export interface RawNode {
  id: string;
  type: string;
  data: NodeData;
  position_x: number | null;
  position_y: number | null;
}

export interface DialogueResponse {
  id: string;
  text: string;
  menuText: string | null;
  condition: unknown;
  /** Parsed from the stored `instruction` JSON string. */
  assignments: unknown[];
  raw: NodeData;
}

export interface ConditionCase {
  id: string | null;
  value: string | null;
  label: string | null;
}

interface NodeBase {
  id: string;
  type: string;
  data: NodeData;
  position: { x: number; y: number } | null;
}

export type EntryNode = NodeBase & { kind: 'entry' };
export type ExitNode = NodeBase & { kind: 'exit'; technicalId: string | null };
export type DialogueNode = NodeBase & {
  kind: 'dialogue';
  text: string;
  speakerSheetId: string | null;
  stageDirections: string | null;
  menuText: string | null;
  technicalId: string | null;
  condition: unknown;
  responses: DialogueResponse[];
};
export type ConditionNode = NodeBase & {
  kind: 'condition';
  condition: unknown;
  cases: ConditionCase[];
  switchMode: boolean;
};
export type InstructionNode = NodeBase & { kind: 'instruction'; assignments: unknown[] };
export type HubNode = NodeBase & { kind: 'hub'; label: string | null; hubKey: string | null; color: string | null };
export type JumpNode = NodeBase & { kind: 'jump'; hubRef: string | null; targetFlowShortcut: string | null };
export type SceneNode = NodeBase & {
  kind: 'scene';
  location: string | null;
  slugLine: string | null;
  sceneId: string | null;
};
export type SubflowNode = NodeBase & { kind: 'subflow'; flowShortcut: string | null; targetFlowId: string | null };
export type UnknownNode = NodeBase & { kind: 'unknown' };

export type FlowNode =
  | EntryNode
  | ExitNode
  | DialogueNode
  | ConditionNode
  | InstructionNode
  | HubNode
  | JumpNode
  | SceneNode
  | SubflowNode
  | UnknownNode;

export type NodeKind = FlowNode['kind'];

function isRecord(value: unknown): value is NodeData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(data: NodeData, key: string): string | null {
  const value = data[key];
  if (typeof value === 'string') return value === '' ? null : value;
  if (typeof value === 'number') return String(value);
  return null;
}

function parseAssignmentJson(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (typeof value !== 'string' || value === '') return [];
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : [];
  } catch {
    return [];
  }
}

function decodeResponse(raw: unknown, index: number): DialogueResponse | null {
  if (!isRecord(raw)) return null;
  return {
    id: text(raw, 'id') ?? String(index),
    text: text(raw, 'text') ?? '',
    menuText: text(raw, 'menu_text'),
    condition: raw.condition,
    assignments: parseAssignmentJson(raw.instruction_assignments ?? raw.instruction),
    raw
  };
}

function decodeCase(raw: unknown): ConditionCase | null {
  if (!isRecord(raw)) return null;
  return { id: text(raw, 'id'), value: text(raw, 'value'), label: text(raw, 'label') };
}

function listOf<T>(value: unknown, decode: (item: unknown, index: number) => T | null): T[] {
  if (!Array.isArray(value)) return [];
  const out: T[] = [];
  value.forEach((item, index) => {
    const decoded = decode(item, index);
    if (decoded !== null) out.push(decoded);
  });
  return out;
}

/**
 * Interprets a node's untyped data payload once, by node type. Missing or
 * mistyped fields fall back to neutral values; unrecognized types decode to
 * the `unknown` variant.
 */
export function decodeNode(raw: RawNode): FlowNode {
  const { data } = raw;
  const base: NodeBase = {
    id: raw.id,
    type: raw.type,
    data,
    position: raw.position_x !== null && raw.position_y !== null ? { x: raw.position_x, y: raw.position_y } : null
  };

  switch (raw.type) {
    case 'entry':
      return { ...base, kind: 'entry' };
    case 'exit':
      return { ...base, kind: 'exit', technicalId: text(data, 'technical_id') };
    case 'dialogue':
      return {
        ...base,
        kind: 'dialogue',
        text: text(data, 'text') ?? '',
        speakerSheetId: text(data, 'speaker_sheet_id'),
        stageDirections: text(data, 'stage_directions'),
        menuText: text(data, 'menu_text'),
        technicalId: text(data, 'technical_id'),
        condition: data.condition,
        responses: listOf(data.responses, decodeResponse)
      };
    case 'condition':
      return {
        ...base,
        kind: 'condition',
        condition: data.condition,
        cases: listOf(data.cases, decodeCase),
        switchMode: data.switch_mode === true
      };
    case 'instruction':
      return { ...base, kind: 'instruction', assignments: parseAssignmentJson(data.assignments) };
    case 'hub':
      return { ...base, kind: 'hub', label: text(data, 'label'), hubKey: text(data, 'hub_id'), color: text(data, 'color') };
    case 'jump':
      return {
        ...base,
        kind: 'jump',
        hubRef: text(data, 'hub_id') ?? text(data, 'target_hub_id'),
        targetFlowShortcut: text(data, 'target_flow_shortcut')
      };
    case 'scene':
      return {
        ...base,
        kind: 'scene',
        location: text(data, 'location'),
        slugLine: text(data, 'slug_line'),
        sceneId: text(data, 'scene_id')
      };
    case 'subflow':
      return {
        ...base,
        kind: 'subflow',
        flowShortcut: text(data, 'flow_shortcut'),
        targetFlowId: text(data, 'target_flow_id')
      };
    default:
      return { ...base, kind: 'unknown' };
  }
}

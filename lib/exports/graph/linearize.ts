import { identifierFromShortcut } from '@/lib/exports/helpers';
import {
  indexFlow,
  outgoing,
  outgoingByPin,
  resolveHub,
  type Edge,
  type FlowIndex
} from '@/lib/exports/graph/index_flow';
import type {
  ConditionCase,
  ConditionNode,
  DialogueNode,
  DialogueResponse,
  ExitNode,
  FlowNode,
  HubNode,
  InstructionNode,
  JumpNode,
  SceneNode,
  SubflowNode
} from '@/lib/exports/nodes';
import type { Flow } from '@/lib/exports/schema';

export type Instruction =
  | { type: 'dialogue'; node: DialogueNode }
  | { type: 'choices_start'; node: DialogueNode }
  | { type: 'choice'; node: DialogueNode; response: DialogueResponse; index: number }
  | { type: 'choices_end'; node: DialogueNode }
  | { type: 'condition_start'; node: ConditionNode }
  | { type: 'condition_branch'; node: ConditionNode; branch: ConditionCase; pin: string; label: string; index: number }
  | { type: 'condition_end'; node: ConditionNode }
  | { type: 'instruction'; node: InstructionNode }
  | { type: 'scene'; node: SceneNode }
  | { type: 'subflow'; node: SubflowNode }
  | { type: 'jump'; node: JumpNode; target: string }
  | { type: 'divert'; target: string }
  | { type: 'exit'; node: ExitNode };

/**
 * A named body emitted once and reached through `divert`. Hub sections start
 * after a hub node; join sections start at a node that more than one branch
 * arrives at, so its subgraph is not copied into every branch.
 */
export interface HubSection {
  label: string;
  kind: 'hub' | 'join';
  nodeId: string;
  instructions: Instruction[];
}

export interface Linearized {
  instructions: Instruction[];
  hubSections: HubSection[];
}

type PendingSection = { kind: 'hub'; node: HubNode } | { kind: 'join'; node: ExpandableNode; label: string };

type ExpandableNode = DialogueNode | ConditionNode | InstructionNode | SceneNode | SubflowNode;

interface TraversalState {
  index: FlowIndex;
  /** Sections in first-seen order; grows while sections are being built. */
  queue: PendingSection[];
  hubSeen: Set<string>;
  /** Nodes already expanded somewhere in this call. */
  expanded: Set<string>;
  joinLabels: Map<string, string>;
  usedLabels: Set<string>;
}

function labelOf(state: TraversalState, hub: HubNode): string {
  return state.index.hubLabels.get(hub.id) ?? identifierFromShortcut(`hub_${hub.id}`);
}

function enqueueHub(state: TraversalState, hub: HubNode): string {
  if (!state.hubSeen.has(hub.id)) {
    state.hubSeen.add(hub.id);
    state.queue.push({ kind: 'hub', node: hub });
  }
  return labelOf(state, hub);
}

function resolveJumpTarget(state: TraversalState, node: JumpNode): string {
  if (node.targetFlowShortcut) return identifierFromShortcut(node.targetFlowShortcut);

  if (node.hubRef) {
    const hub = resolveHub(state.index, node.hubRef);
    if (hub) return enqueueHub(state, hub);
  }

  for (const edge of outgoing(state.index, node.id)) {
    const hub = state.index.hubs.get(edge.targetId);
    if (hub) return enqueueHub(state, hub);
  }
  return 'unknown';
}

function enqueueJoin(state: TraversalState, node: ExpandableNode): string {
  const known = state.joinLabels.get(node.id);
  if (known) return known;

  const base = identifierFromShortcut(`node_${node.id}`);
  let label = base;
  for (let n = 2; state.usedLabels.has(label); n++) label = `${base}_${n}`;
  state.usedLabels.add(label);
  state.joinLabels.set(node.id, label);
  state.queue.push({ kind: 'join', node, label });
  return label;
}

function isExpandable(node: FlowNode): node is ExpandableNode {
  return (
    node.kind === 'dialogue' ||
    node.kind === 'condition' ||
    node.kind === 'instruction' ||
    node.kind === 'scene' ||
    node.kind === 'subflow'
  );
}

function follow(state: TraversalState, edges: Edge[], path: Set<string>, out: Instruction[]): void {
  for (const edge of edges) visit(state, edge.targetId, path, out);
}

/**
 * `path` holds the nodes on the current root-to-here path only; sibling
 * branches never see each other's nodes. A node with a body that a sibling
 * branch already expanded becomes a divert to its join section.
 */
function visit(state: TraversalState, nodeId: string, path: Set<string>, out: Instruction[]): void {
  const node = state.index.nodes.get(nodeId);
  if (!node) return;

  if (path.has(nodeId)) {
    if (node.kind === 'hub') out.push({ type: 'divert', target: labelOf(state, node) });
    return;
  }

  if (isExpandable(node)) {
    if (state.expanded.has(node.id)) {
      out.push({ type: 'divert', target: enqueueJoin(state, node) });
      return;
    }
    state.expanded.add(node.id);
  }
  expand(state, node, path, out);
}

function expand(state: TraversalState, node: FlowNode, path: Set<string>, out: Instruction[]): void {
  const nodeId = node.id;
  path.add(nodeId);
  try {
    switch (node.kind) {
      case 'entry':
        follow(state, outgoing(state.index, node.id), path, out);
        return;

      case 'exit':
        out.push({ type: 'exit', node });
        return;

      case 'dialogue': {
        out.push({ type: 'dialogue', node });
        if (node.responses.length === 0) {
          follow(state, outgoing(state.index, node.id), path, out);
          return;
        }
        const byPin = outgoingByPin(state.index, node.id);
        out.push({ type: 'choices_start', node });
        node.responses.forEach((response, index) => {
          out.push({ type: 'choice', node, response, index });
          follow(state, byPin.get(`response_${response.id}`) ?? [], path, out);
        });
        out.push({ type: 'choices_end', node });
        return;
      }

      case 'condition': {
        const byPin = outgoingByPin(state.index, node.id);
        out.push({ type: 'condition_start', node });
        node.cases.forEach((branch, index) => {
          const pin = branch.id ?? branch.value ?? `case_${index}`;
          const label = branch.label ?? branch.value ?? `case_${index}`;
          out.push({ type: 'condition_branch', node, branch, pin, label, index });
          follow(state, byPin.get(pin) ?? [], path, out);
        });
        out.push({ type: 'condition_end', node });
        return;
      }

      case 'instruction':
        out.push({ type: 'instruction', node });
        follow(state, outgoing(state.index, node.id), path, out);
        return;

      case 'scene':
        out.push({ type: 'scene', node });
        follow(state, outgoing(state.index, node.id), path, out);
        return;

      case 'subflow':
        out.push({ type: 'subflow', node });
        follow(state, outgoing(state.index, node.id), path, out);
        return;

      case 'hub':
        out.push({ type: 'divert', target: enqueueHub(state, node) });
        return;

      case 'jump':
        out.push({ type: 'jump', node, target: resolveJumpTarget(state, node) });
        return;

      case 'unknown':
        return;
    }
  } finally {
    path.delete(nodeId);
  }
}

/**
 * Lowers a flow graph into an instruction stream starting at the entry node,
 * plus one section per hub reached from it (directly or from other hub
 * sections). Never throws; malformed graphs produce partial output.
 */
export function linearize(flow: Pick<Flow, 'nodes' | 'connections'>): Linearized {
  const index = indexFlow(flow);
  if (!index.entry) return { instructions: [], hubSections: [] };

  const state: TraversalState = {
    index,
    queue: [],
    hubSeen: new Set(),
    expanded: new Set(),
    joinLabels: new Map(),
    usedLabels: new Set(index.hubLabels.values())
  };
  const instructions: Instruction[] = [];
  visit(state, index.entry.id, new Set(), instructions);

  const hubSections: HubSection[] = [];
  for (let i = 0; i < state.queue.length; i++) {
    const pending = state.queue[i];
    const body: Instruction[] = [];
    if (pending.kind === 'hub') {
      follow(state, outgoing(index, pending.node.id), new Set([pending.node.id]), body);
      hubSections.push({ label: labelOf(state, pending.node), kind: 'hub', nodeId: pending.node.id, instructions: body });
    } else {
      expand(state, pending.node, new Set(), body);
      hubSections.push({ label: pending.label, kind: 'join', nodeId: pending.node.id, instructions: body });
    }
  }

  return { instructions, hubSections };
}

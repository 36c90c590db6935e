import { identifierFromShortcut } from '@/lib/exports/helpers';
import type { EntryNode, FlowNode, HubNode } from '@/lib/exports/nodes';
import type { Connection, Flow } from '@/lib/exports/schema';

export interface Edge {
  targetId: string;
  pin: string;
  connection: Connection;
}

export interface FlowIndex {
  nodes: Map<string, FlowNode>;
  /** Outgoing edges per source node, ordered by source pin. */
  adjacency: Map<string, Edge[]>;
  entry: EntryNode | null;
  hubs: Map<string, HubNode>;
  hubLabels: Map<string, string>;
}

export function hubLabel(hub: Pick<HubNode, 'id' | 'label'>): string {
  return identifierFromShortcut(hub.label) || identifierFromShortcut(`hub_${hub.id}`);
}

export function indexFlow(flow: Pick<Flow, 'nodes' | 'connections'>): FlowIndex {
  const nodes = new Map<string, FlowNode>();
  const hubs = new Map<string, HubNode>();
  const hubLabels = new Map<string, string>();
  let entry: EntryNode | null = null;

  for (const node of flow.nodes) {
    nodes.set(node.id, node);
    if (node.kind === 'entry' && !entry) entry = node;
    if (node.kind === 'hub') {
      hubs.set(node.id, node);
      hubLabels.set(node.id, hubLabel(node));
    }
  }

  const adjacency = new Map<string, Edge[]>();
  for (const connection of flow.connections) {
    const edges = adjacency.get(connection.source_node_id) ?? [];
    edges.push({ targetId: connection.target_node_id, pin: connection.source_pin, connection });
    adjacency.set(connection.source_node_id, edges);
  }
  for (const edges of adjacency.values()) {
    edges.sort((a, b) => (a.pin < b.pin ? -1 : a.pin > b.pin ? 1 : 0));
  }

  return { nodes, adjacency, entry, hubs, hubLabels };
}

export function outgoing(index: FlowIndex, nodeId: string): Edge[] {
  return index.adjacency.get(nodeId) ?? [];
}

export function outgoingByPin(index: FlowIndex, nodeId: string): Map<string, Edge[]> {
  const byPin = new Map<string, Edge[]>();
  for (const edge of outgoing(index, nodeId)) {
    const edges = byPin.get(edge.pin) ?? [];
    edges.push(edge);
    byPin.set(edge.pin, edges);
  }
  return byPin;
}

/** Resolves a jump's hub reference by node id, then by the hub's own `hub_id` key. */
export function resolveHub(index: FlowIndex, ref: string): HubNode | null {
  const byId = index.hubs.get(ref);
  if (byId) return byId;
  for (const hub of index.hubs.values()) {
    if (hub.hubKey === ref) return hub;
  }
  return null;
}


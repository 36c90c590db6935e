import { DOMImplementation, XMLSerializer } from '@xmldom/xmldom';
import { notImplemented } from '@/lib/exports/errors';
import { transpileCondition } from '@/lib/exports/expressions/condition';
import { transpileInstruction } from '@/lib/exports/expressions/instruction';
import {
  buildSpeakerMap,
  collectVariables,
  dialogueText,
  generateGuid,
  identifierFromShortcut,
  speakerShortcut,
  stripHtml,
  type SpeakerMap,
  type Variable,
  type VariableType
} from '@/lib/exports/helpers';
import type { FlowNode } from '@/lib/exports/nodes';
import type { ExportOptions } from '@/lib/exports/options';
import type { Connection, Flow, ProjectData, Sheet } from '@/lib/exports/schema';
import { createTranspileContext, takeExpr, type TranspileContext } from '@/lib/exports/serializers/context';
import type { SerializeResult, Serializer } from '@/lib/exports/serializers/types';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const ELEMENT_NODE = 1;

type Attrs = Record<string, string>;

interface XmlWriter {
  doc: Document;
  ctx: TranspileContext;
  speakers: SpeakerMap;
}

function add(w: XmlWriter, parent: Node, name: string, attrs: Attrs = {}, text?: string): Element {
  const el = w.doc.createElement(name);
  for (const [key, value] of Object.entries(attrs)) el.setAttribute(key, value);
  if (text !== undefined) el.appendChild(w.doc.createTextNode(text));
  parent.appendChild(el);
  return el;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/** Inserts whitespace text nodes so container elements print one child per line. */
function indentTree(doc: Document, el: Element, depth: number): void {
  const children = Array.from(el.childNodes).filter(isElement);
  if (children.length === 0) return;
  for (const child of children) {
    el.insertBefore(doc.createTextNode(`\n${'  '.repeat(depth + 1)}`), child);
    indentTree(doc, child, depth + 1);
  }
  el.appendChild(doc.createTextNode(`\n${'  '.repeat(depth)}`));
}

export function articyType(type: VariableType): string {
  switch (type) {
    case 'number':
      return 'int';
    case 'boolean':
      return 'bool';
    case 'string':
      return 'string';
  }
}

function namespaceOf(variable: Variable): string {
  return variable.sheetShortcut.split('.')[0] ?? variable.sheetShortcut;
}

function addGlobalVariables(w: XmlWriter, parent: Element, variables: Variable[]): void {
  const root = add(w, parent, 'GlobalVariables');
  const namespaces = new Map<string, Variable[]>();
  for (const variable of variables) {
    const ns = namespaceOf(variable);
    namespaces.set(ns, [...(namespaces.get(ns) ?? []), variable]);
  }
  for (const ns of [...namespaces.keys()].sort()) {
    const nsEl = add(w, root, 'Namespace', { Name: ns });
    for (const variable of namespaces.get(ns) ?? []) {
      const localName = variable.fullRef.startsWith(`${ns}.`) ? variable.fullRef.slice(ns.length + 1) : variable.fullRef;
      add(w, nsEl, 'Variable', { Name: localName, Type: articyType(variable.type), Value: String(variable.default) });
    }
  }
}

function addEntity(w: XmlWriter, parent: Element, sheet: Sheet): void {
  const entity = add(w, parent, 'Entity', {
    Type: 'Character',
    Id: generateGuid(`entity:${sheet.id}`),
    TechnicalName: sheet.shortcut
  });
  add(w, entity, 'DisplayName', {}, sheet.name);
  const properties = add(w, entity, 'Properties');
  for (const variable of collectVariables([sheet])) {
    add(w, properties, 'Property', { Name: variable.variableName, Type: articyType(variable.type) }, String(variable.default));
  }
}

function addNode(w: XmlWriter, parent: Element, node: FlowNode): void {
  const id = generateGuid(`node:${node.id}`);
  const condition = (value: unknown) => takeExpr(w.ctx, transpileCondition(value, 'articy'));
  const script = (value: unknown) => takeExpr(w.ctx, transpileInstruction(value, 'articy'));

  switch (node.kind) {
    case 'dialogue': {
      const fragment = add(w, parent, 'DialogueFragment', {
        Id: id,
        Speaker: speakerShortcut(node, w.speakers) ?? '',
        TechnicalName: `dlg_${node.id}`
      });
      add(w, fragment, 'Text', {}, dialogueText(node));
      add(w, fragment, 'MenuText', {}, node.menuText ?? '');
      add(w, fragment, 'StageDirections', {}, stripHtml(node.stageDirections));
      const guard = condition(node.condition);
      if (guard) add(w, fragment, 'Condition', {}, guard);

      for (const response of node.responses) {
        const responseEl = add(w, parent, 'DialogueFragment', {
          Id: generateGuid(`resp:${response.id}`),
          Speaker: '',
          TechnicalName: `resp_${response.id}`,
          Parent: id
        });
        add(w, responseEl, 'Text', {}, stripHtml(response.text));
        const responseGuard = condition(response.condition);
        if (responseGuard) add(w, responseEl, 'Condition', {}, responseGuard);
        const instruction = script(response.assignments);
        if (instruction) add(w, responseEl, 'Instruction', {}, instruction);
      }
      return;
    }
    case 'condition': {
      const el = add(w, parent, 'Condition', { Id: id, TechnicalName: `cond_${node.id}` });
      add(w, el, 'Expression', {}, condition(node.condition) ?? '');
      return;
    }
    case 'instruction': {
      const el = add(w, parent, 'Instruction', { Id: id, TechnicalName: `inst_${node.id}` });
      add(w, el, 'Expression', {}, script(node.assignments) ?? '');
      return;
    }
    case 'hub': {
      const el = add(w, parent, 'Hub', { Id: id, TechnicalName: `hub_${node.id}` });
      add(w, el, 'DisplayName', {}, node.label ?? '');
      return;
    }
    case 'jump':
      add(w, parent, 'Jump', {
        Id: id,
        TechnicalName: `jump_${node.id}`,
        Target: node.hubRef ?? node.targetFlowShortcut ?? ''
      });
      return;
    case 'entry':
      add(w, parent, 'Entry', { Id: id, TechnicalName: `entry_${node.id}` });
      return;
    case 'exit':
      add(w, parent, 'Exit', { Id: id, TechnicalName: `exit_${node.id}` });
      return;
    case 'scene': {
      const el = add(w, parent, 'LocationSettings', { Id: id, TechnicalName: `scene_${node.id}` });
      add(w, el, 'Location', {}, node.location ?? node.slugLine ?? '');
      return;
    }
    case 'subflow':
      add(w, parent, 'FlowFragment', {
        Id: id,
        TechnicalName: `subflow_${node.id}`,
        Reference: node.flowShortcut ?? ''
      });
      return;
    case 'unknown':
      return;
  }
}

export function connectionKey(connection: Connection): string {
  return connection.id
    ? `conn:${connection.id}`
    : `conn:${connection.source_node_id}:${connection.source_pin}:${connection.target_node_id}`;
}

function addFlow(w: XmlWriter, parent: Element, flow: Flow): void {
  const fragment = add(w, parent, 'FlowFragment', {
    Type: 'Dialogue',
    Id: generateGuid(`flow:${flow.id}`),
    TechnicalName: flow.shortcut || flow.name || `flow_${flow.id}`
  });
  add(w, fragment, 'DisplayName', {}, flow.name);
  const nodes = add(w, fragment, 'Nodes');
  for (const node of flow.nodes) addNode(w, nodes, node);
  const connections = add(w, fragment, 'Connections');
  for (const connection of flow.connections) {
    add(w, connections, 'Connection', {
      Id: generateGuid(connectionKey(connection)),
      Source: generateGuid(`node:${connection.source_node_id}`),
      SourcePin: connection.source_pin,
      Target: generateGuid(`node:${connection.target_node_id}`)
    });
  }
}

function serialize(project: ProjectData, options: ExportOptions): SerializeResult {
  const doc = new DOMImplementation().createDocument(null, 'ArticyData', null);
  const w: XmlWriter = {
    doc,
    ctx: createTranspileContext('articy'),
    speakers: buildSpeakerMap(project.sheets)
  };

  const root = doc.documentElement;
  const info = project.project;
  const projectEl = add(w, root, 'Project', {
    Name: info.name,
    Guid: generateGuid(`project:${info.id}`),
    TechnicalName: identifierFromShortcut(info.slug || 'narrative_project')
  });
  const settings = add(w, projectEl, 'ExportSettings');
  add(w, settings, 'ExportVersion', {}, '1.0');
  add(w, settings, 'ExporterVersion', {}, options.version);

  addGlobalVariables(w, projectEl, collectVariables(project.sheets));

  const hierarchy = add(w, projectEl, 'Hierarchy');
  for (const sheet of project.sheets) addEntity(w, hierarchy, sheet);
  for (const flow of project.flows) addFlow(w, hierarchy, flow);

  if (options.pretty_print) indentTree(doc, root, 0);
  const xml = `${XML_DECLARATION}\n${new XMLSerializer().serializeToString(doc)}`;
  return { ok: true, output: xml, warnings: w.ctx.warnings };
}

export const articySerializer: Serializer = {
  format: 'articy',
  contentType: () => 'application/xml',
  fileExtension: () => 'xml',
  formatLabel: () => 'articy:draft (XML)',
  supportedSections: () => ['flows', 'sheets'],
  serialize,
  serializeToFile: () => ({ ok: false, error: notImplemented('serializeToFile') })
};

import { FORMAT_VERSION } from '@/config/exports';
import { notImplemented } from '@/lib/exports/errors';
import { toJson } from '@/lib/exports/helpers';
import type { FlowNode } from '@/lib/exports/nodes';
import { includeSection, type ExportOptions } from '@/lib/exports/options';
import type {
  Asset,
  Connection,
  Flow,
  GlossaryEntry,
  Localization,
  LocalizedText,
  ProjectData,
  Sheet
} from '@/lib/exports/schema';
import type { SerializeResult, Serializer } from '@/lib/exports/serializers/types';

function serializeSheet(sheet: Sheet) {
  return {
    id: sheet.id,
    shortcut: sheet.shortcut,
    name: sheet.name,
    description: sheet.description,
    color: sheet.color,
    parent_id: sheet.parent_id,
    blocks: sheet.blocks.map((block) => ({
      id: block.id,
      type: block.type,
      position: block.position ?? null,
      config: block.config,
      value: block.value,
      is_constant: block.is_constant,
      variable_name: block.variable_name,
      ...(block.type === 'table' ? { table_data: block.table_data ?? { columns: [], rows: [] } } : {})
    }))
  };
}

/** Response assignments are stored as a JSON string; the export carries them parsed. */
function serializeNode(node: FlowNode) {
  const data =
    node.kind === 'dialogue'
      ? {
          ...node.data,
          responses: node.responses.map((response) => ({
            ...response.raw,
            instruction_assignments: response.assignments
          }))
        }
      : node.data;
  return {
    id: node.id,
    type: node.type,
    position_x: node.position?.x ?? null,
    position_y: node.position?.y ?? null,
    data
  };
}

function serializeConnection(connection: Connection) {
  return {
    id: connection.id,
    source_node_id: connection.source_node_id,
    source_pin: connection.source_pin,
    target_node_id: connection.target_node_id,
    target_pin: connection.target_pin,
    label: connection.label
  };
}

function serializeFlow(flow: Flow) {
  return {
    id: flow.id,
    shortcut: flow.shortcut,
    name: flow.name,
    description: flow.description,
    parent_id: flow.parent_id,
    is_main: flow.is_main,
    settings: flow.settings,
    nodes: flow.nodes.map(serializeNode),
    connections: flow.connections.map(serializeConnection)
  };
}

function groupStrings(strings: LocalizedText[]) {
  const groups = new Map<string, LocalizedText[]>();
  for (const text of strings) {
    const key = JSON.stringify([text.source_type, text.source_id, text.source_field]);
    groups.set(key, [...(groups.get(key) ?? []), text]);
  }
  return [...groups.values()].map((group) => {
    const first = group[0];
    const translations: Record<string, unknown> = {};
    for (const text of group) {
      translations[text.locale_code] = {
        translated_text: text.translated_text,
        status: text.status,
        vo_status: text.vo_status,
        translator_notes: text.translator_notes,
        reviewer_notes: text.reviewer_notes,
        word_count: text.word_count,
        machine_translated: text.machine_translated
      };
    }
    return {
      source_type: first.source_type,
      source_id: first.source_id,
      source_field: first.source_field,
      source_text: first.source_text,
      source_text_hash: first.source_text_hash,
      speaker_sheet_id: first.speaker_sheet_id,
      translations
    };
  });
}

function groupGlossary(entries: GlossaryEntry[]) {
  const groups = new Map<string, GlossaryEntry[]>();
  for (const entry of entries) {
    const key = JSON.stringify([entry.source_term, entry.source_locale]);
    groups.set(key, [...(groups.get(key) ?? []), entry]);
  }
  return [...groups.values()].map((group) => {
    const first = group[0];
    const translations: Record<string, string | null> = {};
    for (const entry of group) translations[entry.target_locale] = entry.target_term;
    return {
      source_term: first.source_term,
      source_locale: first.source_locale,
      translations,
      do_not_translate: first.do_not_translate,
      context: first.context
    };
  });
}

function serializeLocalization(localization: Localization) {
  const source = localization.languages.find((lang) => lang.is_source);
  return {
    source_language: source?.locale_code ?? 'en',
    languages: localization.languages.map((lang) => ({
      locale_code: lang.locale_code,
      name: lang.name,
      is_source: lang.is_source
    })),
    strings: groupStrings(localization.strings),
    glossary: groupGlossary(localization.glossary)
  };
}

function serializeAssets(assets: Asset[], options: ExportOptions) {
  return { mode: String(options.include_assets), items: assets };
}

export function statistics(project: ProjectData) {
  let nodeCount = 0;
  let connectionCount = 0;
  for (const flow of project.flows) {
    nodeCount += flow.nodes.length;
    connectionCount += flow.connections.length;
  }
  return {
    sheet_count: project.sheets.length,
    flow_count: project.flows.length,
    node_count: nodeCount,
    connection_count: connectionCount,
    scene_count: project.scenes.length,
    screenplay_count: project.screenplays.length,
    asset_count: project.assets.length
  };
}

/**
 * Full-fidelity document. Excluded sections are left out as keys, not written
 * as empty lists.
 */
function serialize(project: ProjectData, options: ExportOptions): SerializeResult {
  const document: Record<string, unknown> = {
    format: 'narrative_export',
    format_version: FORMAT_VERSION,
    export_version: options.version,
    exported_at: options.exported_at,
    project: {
      id: project.project.id,
      name: project.project.name,
      slug: project.project.slug,
      description: project.project.description,
      settings: project.project.settings
    }
  };

  if (includeSection(options, 'sheets')) document.sheets = project.sheets.map(serializeSheet);
  if (includeSection(options, 'flows')) document.flows = project.flows.map(serializeFlow);
  if (includeSection(options, 'scenes')) document.scenes = project.scenes;
  if (includeSection(options, 'screenplays')) document.screenplays = project.screenplays;
  if (includeSection(options, 'localization')) document.localization = serializeLocalization(project.localization);
  if (includeSection(options, 'assets')) document.assets = serializeAssets(project.assets, options);
  document.metadata = { statistics: statistics(project) };

  return { ok: true, output: toJson(document, options.pretty_print), warnings: [] };
}

export const nativeSerializer: Serializer = {
  format: 'native',
  contentType: () => 'application/json',
  fileExtension: () => 'json',
  formatLabel: () => 'Native project JSON',
  supportedSections: () => ['sheets', 'flows', 'scenes', 'screenplays', 'localization', 'assets'],
  serialize,
  serializeToFile: () => ({ ok: false, error: notImplemented('serializeToFile') })
};

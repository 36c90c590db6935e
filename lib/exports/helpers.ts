import { createHash } from 'node:crypto';
import type { Block, Sheet } from '@/lib/exports/schema';
import type { DialogueNode } from '@/lib/exports/nodes';

export type VariableType = 'number' | 'boolean' | 'string';
export type VariableValue = number | boolean | string;

export interface Variable {
  sheetShortcut: string;
  variableName: string;
  /** `sheet.shortcut + "." + variable_name`, e.g. `mc.jaime.health`. */
  fullRef: string;
  type: VariableType;
  default: VariableValue;
  block: Block;
}

export interface Speaker {
  name: string;
  shortcut: string;
}

export type SpeakerMap = Map<string, Speaker>;

/** Block types that never carry a value. */
export const NON_VARIABLE_BLOCK_TYPES: readonly string[] = ['divider', 'reference', 'table'];

// ---------------------------------------------------------------------------
// Variables
// ---------------------------------------------------------------------------

export function collectVariables(sheets: Sheet[]): Variable[] {
  const out: Variable[] = [];
  for (const sheet of sheets) {
    for (const block of sheet.blocks) {
      if (block.is_constant) continue;
      if (NON_VARIABLE_BLOCK_TYPES.includes(block.type)) continue;
      if (!block.variable_name) continue;
      out.push({
        sheetShortcut: sheet.shortcut,
        variableName: block.variable_name,
        fullRef: `${sheet.shortcut}.${block.variable_name}`,
        type: inferVariableType(block),
        default: inferDefaultValue(block),
        block
      });
    }
  }
  return out;
}

export function inferVariableType(block: Pick<Block, 'type'>): VariableType {
  switch (block.type) {
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'string';
  }
}

/** The block's stored value when it has the expected shape, else the type's zero value. */
export function inferDefaultValue(block: Pick<Block, 'type' | 'value'>): VariableValue {
  const stored = block.value[block.type];
  switch (block.type) {
    case 'number':
      return typeof stored === 'number' && Number.isFinite(stored) ? stored : 0;
    case 'boolean':
      return typeof stored === 'boolean' ? stored : false;
    case 'rich_text':
      return typeof stored === 'string' ? stripHtml(stored) : '';
    case 'text':
    case 'select':
    case 'date':
      return typeof stored === 'string' ? stored : '';
    default:
      return '';
  }
}

/** Declaration literal shared by the script dialects. */
export function formatDeclarationValue(variable: Pick<Variable, 'type' | 'default'>): string {
  const value = variable.default;
  switch (variable.type) {
    case 'number':
      return typeof value === 'number' ? String(value) : '0';
    case 'boolean':
      return typeof value === 'boolean' ? String(value) : 'false';
    case 'string':
      if (typeof value !== 'string' || value === '') return '""';
      return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\r?\n/g, '\\n')}"`;
  }
}

// ---------------------------------------------------------------------------
// Speakers
// ---------------------------------------------------------------------------

export function buildSpeakerMap(sheets: Sheet[]): SpeakerMap {
  return new Map(sheets.map((sheet): [string, Speaker] => [sheet.id, { name: sheet.name, shortcut: sheet.shortcut }]));
}

export function speakerName(node: Pick<DialogueNode, 'speakerSheetId'>, speakers: SpeakerMap): string | null {
  if (!node.speakerSheetId) return null;
  return speakers.get(node.speakerSheetId)?.name ?? null;
}

export function speakerShortcut(node: Pick<DialogueNode, 'speakerSheetId'>, speakers: SpeakerMap): string | null {
  if (!node.speakerSheetId) return null;
  return speakers.get(node.speakerSheetId)?.shortcut ?? null;
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

/** Rich-text HTML to plain text; paragraph and line breaks become newlines. */
export function stripHtml(html: string | null | undefined): string {
  if (!html) return '';
  return html
    .replace(/<br\s*\/?>/g, '\n')
    .replace(/<\/p>\s*<p>/g, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .trim();
}

export function dialogueText(node: Pick<DialogueNode, 'text'>): string {
  return stripHtml(node.text);
}

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

// Letters NFD does not decompose into base + combining mark.
const TRANSLITERATIONS: Record<string, string> = {
  ß: 'ss',
  æ: 'ae',
  Æ: 'AE',
  œ: 'oe',
  Œ: 'OE',
  ø: 'o',
  Ø: 'O',
  đ: 'd',
  Đ: 'D',
  ð: 'd',
  Ð: 'D',
  ł: 'l',
  Ł: 'L',
  þ: 'th',
  Þ: 'TH',
  ı: 'i'
};

export function transliterate(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\x00-\x7F]/g, (ch) => TRANSLITERATIONS[ch] ?? '');
}

/** Lowercase ASCII slug with underscores, used for derived variable names. */
export function slugify(label: string): string {
  return transliterate(label)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/** `mc.jaime` → `mc_jaime`. Anything outside `[A-Za-z0-9_]` is dropped. */
export function identifierFromShortcut(shortcut: string | null | undefined): string {
  if (!shortcut) return '';
  return transliterate(shortcut)
    .replace(/[.\-\s]/g, '_')
    .replace(/[^A-Za-z0-9_]/g, '');
}

/** Identifiers cannot start with a digit in any script dialect. */
export function safeIdentifier(identifier: string, prefix: string): string {
  return /^[0-9]/.test(identifier) ? `${prefix}${identifier}` : identifier;
}

/** Item id → key. A key that is already taken gets `_<id>` appended. */
export function uniqueKeys<T extends { id: string }>(items: T[], keyOf: (item: T) => string): Map<string, string> {
  const keys = new Map<string, string>();
  const taken = new Set<string>();
  for (const item of items) {
    let key = keyOf(item);
    if (taken.has(key)) key = `${key}_${item.id}`;
    for (let n = 2; taken.has(key); n++) key = `${keyOf(item)}_${item.id}_${n}`;
    taken.add(key);
    keys.set(item.id, key);
  }
  return keys;
}

// ---------------------------------------------------------------------------
// CSV
// ---------------------------------------------------------------------------

export type CsvValue = string | number | boolean | null | undefined;

export function escapeCsvField(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  if (typeof value !== 'string') return String(value);
  if (/[,"\n\r]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

export function buildCsv(headers: string[], rows: CsvValue[][]): string {
  const lines = [headers.map(escapeCsvField).join(',')];
  for (const row of rows) lines.push(row.map(escapeCsvField).join(','));
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

const GUID_NAMESPACE = '6ba7b810-9dad-11d1-80b4-00c04fd430c8';

/** Stable `0x`-prefixed 128-bit id derived from a key such as `node:42`. */
export function generateGuid(key: string): string {
  const hash = createHash('sha1');
  hash.update(`${GUID_NAMESPACE}:${key}`);
  return `0x${hash.digest('hex').slice(0, 32).toUpperCase()}`;
}

export function toJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

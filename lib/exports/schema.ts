import { z } from 'zod';
import { ExportError } from '@/lib/exports/errors';
import { slugify } from '@/lib/exports/helpers';
import { decodeNode } from '@/lib/exports/nodes';

const IdSchema = z.union([z.string(), z.number()]).transform((id) => String(id));
const RefSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((id) => (id === null || id === undefined || id === '' ? null : String(id)));
const DataSchema = z
  .record(z.unknown())
  .nullish()
  .transform((data) => data ?? {});
const TextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? null);
const FlagSchema = z
  .boolean()
  .nullish()
  .transform((value) => value ?? false);

export const BLOCK_TYPES = [
  'text',
  'rich_text',
  'number',
  'select',
  'multi_select',
  'boolean',
  'date',
  'divider',
  'reference',
  'table'
] as const;
export type BlockType = (typeof BLOCK_TYPES)[number];

export const BlockSchema = z
  .object({
    id: IdSchema,
    type: z.string(),
    position: z.number().nullish(),
    config: DataSchema,
    value: DataSchema,
    is_constant: FlagSchema,
    variable_name: TextSchema,
    table_data: z.record(z.unknown()).nullish()
  })
  .transform((block) => {
    const label = block.config.label;
    const derived = typeof label === 'string' ? slugify(label) : '';
    return { ...block, variable_name: block.variable_name || derived || null };
  });

export const SheetSchema = z.object({
  id: IdSchema,
  shortcut: z.string(),
  name: z.string(),
  description: TextSchema,
  color: TextSchema,
  parent_id: RefSchema,
  blocks: z.array(BlockSchema).default([])
});

export const NodeSchema = z
  .object({
    id: IdSchema,
    type: z.string(),
    data: DataSchema,
    position_x: z.number().nullish().transform((v) => v ?? null),
    position_y: z.number().nullish().transform((v) => v ?? null)
  })
  .transform(decodeNode);

export const ConnectionSchema = z.object({
  id: RefSchema,
  source_node_id: IdSchema,
  source_pin: z
    .string()
    .nullish()
    .transform((pin) => pin || 'output'),
  target_node_id: IdSchema,
  target_pin: TextSchema,
  label: TextSchema
});

export const FlowSchema = z.object({
  id: IdSchema,
  shortcut: TextSchema,
  name: z.string().default(''),
  description: TextSchema,
  parent_id: RefSchema,
  is_main: FlagSchema,
  settings: DataSchema,
  nodes: z.array(NodeSchema).default([]),
  connections: z.array(ConnectionSchema).default([])
});

/** Scenes and screenplays are carried through untouched apart from id normalization. */
const PassthroughEntitySchema = z
  .object({
    id: IdSchema,
    name: TextSchema,
    shortcut: TextSchema
  })
  .passthrough();

export const LanguageSchema = z.object({
  locale_code: z.string(),
  name: TextSchema,
  is_source: FlagSchema
});

export const LocalizedTextSchema = z.object({
  source_type: z.string(),
  source_id: IdSchema,
  source_field: z.string(),
  source_text: TextSchema,
  source_text_hash: TextSchema,
  speaker_sheet_id: RefSchema,
  locale_code: z.string(),
  translated_text: TextSchema,
  status: z.string().default('pending'),
  vo_status: TextSchema,
  translator_notes: TextSchema,
  reviewer_notes: TextSchema,
  word_count: z.number().nullish().transform((v) => v ?? null),
  machine_translated: FlagSchema
});

export const GlossaryEntrySchema = z.object({
  source_term: z.string(),
  source_locale: z.string(),
  target_term: TextSchema,
  target_locale: z.string(),
  do_not_translate: FlagSchema,
  context: TextSchema
});

export const LocalizationSchema = z.object({
  languages: z.array(LanguageSchema).default([]),
  strings: z.array(LocalizedTextSchema).default([]),
  glossary: z.array(GlossaryEntrySchema).default([])
});

export const AssetSchema = z.object({
  id: IdSchema,
  filename: z.string(),
  content_type: TextSchema,
  size: z.number().nullish().transform((v) => v ?? null),
  key: TextSchema,
  url: TextSchema,
  metadata: DataSchema
});

export const ProjectSchema = z.object({
  id: IdSchema,
  name: z.string(),
  slug: TextSchema,
  description: TextSchema,
  settings: DataSchema
});

export const ProjectDataSchema = z.object({
  project: ProjectSchema,
  sheets: z.array(SheetSchema).default([]),
  flows: z.array(FlowSchema).default([]),
  scenes: z.array(PassthroughEntitySchema).default([]),
  screenplays: z.array(PassthroughEntitySchema).default([]),
  localization: LocalizationSchema.default({}),
  assets: z.array(AssetSchema).default([])
});

export type Block = z.infer<typeof BlockSchema>;
export type Sheet = z.infer<typeof SheetSchema>;
export type Connection = z.infer<typeof ConnectionSchema>;
export type Flow = z.infer<typeof FlowSchema>;
export type Scene = z.infer<typeof PassthroughEntitySchema>;
export type Screenplay = z.infer<typeof PassthroughEntitySchema>;
export type Language = z.infer<typeof LanguageSchema>;
export type LocalizedText = z.infer<typeof LocalizedTextSchema>;
export type GlossaryEntry = z.infer<typeof GlossaryEntrySchema>;
export type Localization = z.infer<typeof LocalizationSchema>;
export type Asset = z.infer<typeof AssetSchema>;
export type ProjectInfo = z.infer<typeof ProjectSchema>;
export type ProjectData = z.infer<typeof ProjectDataSchema>;
/** Accepted input shape, before ids are normalized and nodes decoded. */
export type ProjectDataInput = z.input<typeof ProjectDataSchema>;

export type ParseProjectResult = { ok: true; project: ProjectData } | { ok: false; error: ExportError };

export function parseProjectData(input: unknown): ParseProjectResult {
  const parsed = ProjectDataSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return {
      ok: false,
      error: new ExportError('INVALID_PROJECT', `Project data is invalid: ${issues[0]}`, { issues })
    };
  }
  return { ok: true, project: parsed.data };
}

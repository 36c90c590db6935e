import { z } from 'zod';
import { EXPORT_DEFAULTS } from '@/config/exports';
import { ExportError } from '@/lib/exports/errors';

export const EXPORT_FORMATS = ['native', 'ink', 'yarn', 'unity', 'godot', 'unreal', 'articy'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const ASSET_MODES = ['references', 'embedded', 'bundled'] as const;
export type AssetMode = (typeof ASSET_MODES)[number];

export type Section = 'sheets' | 'flows' | 'scenes' | 'screenplays' | 'localization' | 'assets';

/** `'all'` or an explicit allow-list of ids. */
export type IdSelection = 'all' | string[];

const flag = (fallback: boolean) =>
  z.unknown().transform((value): boolean => {
    if (value === null || value === undefined) return fallback;
    if (value === 'false' || value === '0') return false;
    return Boolean(value);
  });

const selection = z.unknown().transform((value): IdSelection => {
  if (!Array.isArray(value)) return 'all';
  return value
    .filter((id): id is string | number => typeof id === 'string' || typeof id === 'number')
    .map((id) => String(id));
});

export const ExportOptionsSchema = z.object({
  format: z
    .enum(EXPORT_FORMATS)
    .nullish()
    .transform((format) => format ?? 'native'),
  version: z
    .string()
    .nullish()
    .transform((version) => version || EXPORT_DEFAULTS.version),
  include_sheets: flag(true),
  include_flows: flag(true),
  include_scenes: flag(true),
  include_screenplays: flag(true),
  include_localization: flag(true),
  include_assets: z
    .union([z.enum(ASSET_MODES), z.literal(false)])
    .nullish()
    .transform((mode): AssetMode | false => mode ?? 'references'),
  languages: selection,
  flow_ids: selection,
  sheet_ids: selection,
  scene_ids: selection,
  validate_before_export: flag(true),
  pretty_print: flag(EXPORT_DEFAULTS.prettyPrint),
  exported_at: z
    .string()
    .nullish()
    .transform((at) => at || new Date().toISOString())
});

export type ExportOptions = z.output<typeof ExportOptionsSchema>;
export type ExportOptionsInput = z.input<typeof ExportOptionsSchema>;

export type ParseOptionsResult = { ok: true; options: ExportOptions } | { ok: false; error: ExportError };

export function isExportFormat(value: unknown): value is ExportFormat {
  return typeof value === 'string' && (EXPORT_FORMATS as readonly string[]).includes(value);
}

/** Configuration errors surface here, before any traversal starts. */
export function parseExportOptions(input: unknown = {}): ParseOptionsResult {
  const raw = z.record(z.unknown()).safeParse(input ?? {});
  if (!raw.success) {
    return { ok: false, error: new ExportError('INVALID_OPTIONS', 'Export options must be an object') };
  }

  const parsed = ExportOptionsSchema.safeParse(raw.data);
  if (parsed.success) return { ok: true, options: parsed.data };

  const issue = parsed.error.issues[0];
  const field = issue?.path[0];
  if (field === 'format') {
    const value = raw.data.format;
    return {
      ok: false,
      error: new ExportError('INVALID_FORMAT', `Unknown export format: ${String(value)}`, { value })
    };
  }
  if (field === 'include_assets') {
    const value = raw.data.include_assets;
    return {
      ok: false,
      error: new ExportError('INVALID_ASSET_MODE', `Unknown asset mode: ${String(value)}`, { value })
    };
  }
  return {
    ok: false,
    error: new ExportError('INVALID_OPTIONS', issue?.message ?? 'Invalid export options', { path: issue?.path ?? [] })
  };
}

/** Options for in-process callers that already hold valid values. */
export function defaultExportOptions(overrides: Partial<ExportOptions> = {}): ExportOptions {
  const parsed = ExportOptionsSchema.parse({});
  return { ...parsed, ...overrides };
}

export function includeSection(options: ExportOptions, section: Section): boolean {
  switch (section) {
    case 'sheets':
      return options.include_sheets;
    case 'flows':
      return options.include_flows;
    case 'scenes':
      return options.include_scenes;
    case 'screenplays':
      return options.include_screenplays;
    case 'localization':
      return options.include_localization;
    case 'assets':
      return options.include_assets !== false;
  }
}

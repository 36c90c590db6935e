import type { ExportError } from '@/lib/exports/errors';
import type { TranspileWarning } from '@/lib/exports/expressions/types';
import type { ExportFormat, ExportOptions, Section } from '@/lib/exports/options';
import type { ProjectData } from '@/lib/exports/schema';

export interface OutputFile {
  filename: string;
  content: string;
}

/** A single payload, or named files for multi-file formats. */
export type SerializeOutput = string | OutputFile[];

export type SerializeResult =
  | { ok: true; output: SerializeOutput; warnings: TranspileWarning[] }
  | { ok: false; error: ExportError };

export interface Serializer {
  readonly format: ExportFormat;
  contentType(): string;
  fileExtension(): string;
  formatLabel(): string;
  supportedSections(): Section[];
  serialize(project: ProjectData, options: ExportOptions): SerializeResult;
  /** Output is always built in memory; this path is permanently unsupported. */
  serializeToFile(project: ProjectData, filePath: string, options: ExportOptions): SerializeResult;
}

import { defaultExportOptions, type ExportOptions } from '@/lib/exports/options';
import type { ProjectDataInput } from '@/lib/exports/schema';
import type { SerializeOutput, Serializer } from '@/lib/exports/serializers/types';
import { parsed } from './project';

export const EXPORTED_AT = '2026-01-01T00:00:00.000Z';

export function testOptions(overrides: Partial<ExportOptions> = {}): ExportOptions {
  return defaultExportOptions({ pretty_print: false, exported_at: EXPORTED_AT, ...overrides });
}

export function run(serializer: Serializer, input: ProjectDataInput, overrides: Partial<ExportOptions> = {}) {
  const result = serializer.serialize(parsed(input), testOptions(overrides));
  if (!result.ok) throw result.error;
  return result;
}

export function single(output: SerializeOutput): string {
  if (typeof output !== 'string') throw new Error('expected a single payload');
  return output;
}

export function fileNames(output: SerializeOutput): string[] {
  if (typeof output === 'string') throw new Error('expected named files');
  return output.map((file) => file.filename);
}

export function file(output: SerializeOutput, filename: string): string {
  if (typeof output === 'string') throw new Error('expected named files');
  const found = output.find((candidate) => candidate.filename === filename);
  if (!found) throw new Error(`missing ${filename}`);
  return found.content;
}

export function record(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) throw new Error('expected a JSON object');
  return Object.fromEntries(Object.entries(value));
}

export function list(value: unknown): unknown[] {
  if (!Array.isArray(value)) throw new Error('expected a JSON array');
  return value;
}

export function json(content: string): Record<string, unknown> {
  return record(JSON.parse(content));
}

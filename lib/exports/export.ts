import { FORMAT_VERSION } from '@/config/exports';
import { ExportError } from '@/lib/exports/errors';
import type { TranspileWarning } from '@/lib/exports/expressions/types';
import { filterProject } from '@/lib/exports/filter';
import { parseExportOptions, type ExportFormat } from '@/lib/exports/options';
import { parseProjectData, type ProjectData } from '@/lib/exports/schema';
import { projectIdentifier } from '@/lib/exports/serializers/script';
import { getSerializer } from '@/lib/exports/serializers/registry';
import type { OutputFile, SerializeOutput } from '@/lib/exports/serializers/types';
import { validateProject, type ValidationResult } from '@/lib/exports/validate';
import { emitExportMetrics } from '@/lib/metrics/telemetry';

export type ExportResult =
  | {
      ok: true;
      format: ExportFormat;
      contentType: string;
      extension: string;
      files: OutputFile[];
      warnings: TranspileWarning[];
      validation?: ValidationResult;
    }
  | { ok: false; error: ExportError; validation?: ValidationResult };

function toFiles(output: SerializeOutput, project: ProjectData, extension: string): OutputFile[] {
  if (typeof output !== 'string') return output;
  return [{ filename: `${projectIdentifier(project.project)}.${extension}`, content: output }];
}

function countNodes(project: ProjectData): number {
  return project.flows.reduce((sum, flow) => sum + flow.nodes.length, 0);
}

/**
 * Parses, filters, validates and serializes one project. Validation looks at
 * the whole project so references into flows left out by the filter still
 * resolve.
 */
export function exportProject(input: unknown, rawOptions: unknown = {}): ExportResult {
  const parsedOptions = parseExportOptions(rawOptions);
  if (!parsedOptions.ok) return { ok: false, error: parsedOptions.error };
  const options = parsedOptions.options;

  const parsedProject = parseProjectData(input);
  if (!parsedProject.ok) return { ok: false, error: parsedProject.error };

  const found = getSerializer(options.format);
  if (!found.ok) return { ok: false, error: found.error };
  const serializer = found.serializer;

  const project = filterProject(parsedProject.project, options);

  let validation: ValidationResult | undefined;
  if (options.validate_before_export) {
    validation = validateProject(parsedProject.project);
    if (validation.status === 'errors') {
      console.warn('[EXPORT]', { format: options.format, validation: validation.statistics });
      return {
        ok: false,
        error: new ExportError('VALIDATION_FAILED', `Validation found ${validation.errors.length} error(s)`, {
          statistics: validation.statistics
        }),
        validation
      };
    }
  }

  const started = performance.now();
  const result = serializer.serialize(project, options);
  const serializeMs = performance.now() - started;
  if (!result.ok) return { ok: false, error: result.error, validation };

  const files = toFiles(result.output, project, serializer.fileExtension());
  const bytes = files.reduce((sum, file) => sum + Buffer.byteLength(file.content, 'utf8'), 0);

  console.info(
    `[EXPORT][format=${options.format}] flows=${project.flows.length} files=${files.length} bytes=${bytes} warnings=${result.warnings.length}`
  );
  emitExportMetrics({
    format: options.format,
    flows: project.flows.length,
    nodes: countNodes(project),
    files: files.length,
    bytes,
    warnings: result.warnings.length,
    validation: validation?.status ?? 'skipped',
    serializeMs,
    version: { format: FORMAT_VERSION, app: options.version }
  });

  return {
    ok: true,
    format: options.format,
    contentType: serializer.contentType(),
    extension: serializer.fileExtension(),
    files,
    warnings: result.warnings,
    ...(validation ? { validation } : {})
  };
}

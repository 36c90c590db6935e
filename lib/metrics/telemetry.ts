import { EXPORT_DEFAULTS } from '@/config/exports';

export interface ExportMetrics {
  format: string;
  flows: number;
  nodes: number;
  files: number;
  bytes: number;
  warnings: number;
  validation: 'passed' | 'warnings' | 'errors' | 'skipped';
  serializeMs: number;
  version: { format: string; app: string };
}

export function emitExportMetrics(m: ExportMetrics): void {
  if (!EXPORT_DEFAULTS.metricsLog) return;
  console.info(`[METRICS][format=${m.format}]`, m);
}

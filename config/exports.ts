function envFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return !/^(0|false|no|off)$/i.test(value.trim());
}

function envInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export interface ExportDefaults {
  /** Flow count above which script formats split into one file per flow. */
  multiFileThreshold: number;
  version: string;
  prettyPrint: boolean;
  metricsLog: boolean;
}

export const EXPORT_DEFAULTS: ExportDefaults = {
  multiFileThreshold: envInt(process.env.EXPORT_MULTI_FILE_THRESHOLD, 5),
  version: process.env.EXPORT_VERSION || '1.0.0',
  prettyPrint: envFlag(process.env.EXPORT_PRETTY_PRINT, true),
  metricsLog: envFlag(process.env.EXPORT_METRICS_LOG, false)
};

/** Version stamp written into every export's header. */
export const FORMAT_VERSION = '1.0.0';

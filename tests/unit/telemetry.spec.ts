import { afterEach, describe, it, expect, vi } from 'vitest';
import { EXPORT_DEFAULTS } from '@/config/exports';
import { emitExportMetrics, type ExportMetrics } from '@/lib/metrics/telemetry';

const sample: ExportMetrics = {
  format: 'yarn',
  flows: 2,
  nodes: 9,
  files: 2,
  bytes: 512,
  warnings: 0,
  validation: 'passed',
  serializeMs: 1.5,
  version: { format: '1.0.0', app: '1.0.0' }
};

describe('emitExportMetrics', () => {
  const initial = EXPORT_DEFAULTS.metricsLog;
  afterEach(() => {
    EXPORT_DEFAULTS.metricsLog = initial;
  });

  it('stays quiet unless metrics logging is on', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    EXPORT_DEFAULTS.metricsLog = false;
    emitExportMetrics(sample);
    expect(info).not.toHaveBeenCalled();

    EXPORT_DEFAULTS.metricsLog = true;
    emitExportMetrics(sample);
    expect(info).toHaveBeenCalledWith('[METRICS][format=yarn]', sample);
  });
});

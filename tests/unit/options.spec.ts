import { describe, it, expect } from 'vitest';
import { EXPORT_DEFAULTS } from '@/config/exports';
import { includeSection, isExportFormat, parseExportOptions } from '@/lib/exports/options';

function options(input: unknown) {
  const result = parseExportOptions(input);
  if (!result.ok) throw result.error;
  return result.options;
}

describe('parseExportOptions', () => {
  it('fills defaults', () => {
    const parsed = options({});
    expect(parsed.format).toBe('native');
    expect(parsed.version).toBe(EXPORT_DEFAULTS.version);
    expect(parsed.include_assets).toBe('references');
    expect(parsed.flow_ids).toBe('all');
    expect(parsed.validate_before_export).toBe(true);
    expect(parsed.exported_at).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('reads string flags and id lists', () => {
    const parsed = options({ include_sheets: 'false', include_flows: '0', flow_ids: [1, '2', null], sheet_ids: 'x' });
    expect(parsed.include_sheets).toBe(false);
    expect(parsed.include_flows).toBe(false);
    expect(parsed.flow_ids).toEqual(['1', '2']);
    expect(parsed.sheet_ids).toBe('all');
  });

  it('rejects unknown formats and asset modes with their own codes', () => {
    const format = parseExportOptions({ format: 'twine' });
    expect(format.ok).toBe(false);
    if (!format.ok) {
      expect(format.error.code).toBe('INVALID_FORMAT');
      expect(format.error.message).toBe('Unknown export format: twine');
    }

    const assets = parseExportOptions({ include_assets: 'zip' });
    expect(assets.ok).toBe(false);
    if (!assets.ok) expect(assets.error.code).toBe('INVALID_ASSET_MODE');
  });

  it('rejects non-object input', () => {
    const result = parseExportOptions(42);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('INVALID_OPTIONS');
  });

  it('treats include_assets false as an excluded section', () => {
    expect(includeSection(options({ include_assets: false }), 'assets')).toBe(false);
    expect(includeSection(options({ include_assets: 'bundled' }), 'assets')).toBe(true);
  });
});

describe('isExportFormat', () => {
  it('accepts the registered names only', () => {
    expect(isExportFormat('unreal')).toBe(true);
    expect(isExportFormat('json')).toBe(false);
    expect(isExportFormat(3)).toBe(false);
  });
});

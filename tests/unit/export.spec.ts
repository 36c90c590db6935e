import { describe, it, expect, vi } from 'vitest';
import { exportProject } from '@/lib/exports/export';
import { conn, demoProject, flow, node } from '../fixtures/project';
import { EXPORTED_AT } from '../fixtures/serialize';

const brokenJump = flow(9, 'broken', [node(1, 'entry'), node(2, 'jump', { target_hub_id: 'nope' })], [conn(1, 2)]);

describe('exportProject', () => {
  it('serializes, validates and logs one line', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const result = exportProject(demoProject(), { exported_at: EXPORTED_AT });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.format).toBe('native');
    expect(result.contentType).toBe('application/json');
    expect(result.files.map((file) => file.filename)).toEqual(['demo_story.json']);
    expect(result.validation?.status).toBe('passed');
    expect(info).toHaveBeenCalledWith(
      expect.stringMatching(/^\[EXPORT\]\[format=native\] flows=1 files=1 bytes=\d+ warnings=0$/)
    );
  });

  it('stops on validation errors', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const result = exportProject(demoProject({ flows: [brokenJump] }), { format: 'ink' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('VALIDATION_FAILED');
    expect(result.error.message).toBe('Validation found 1 error(s)');
    expect(result.validation?.errors.map((f) => f.rule)).toEqual(['broken_references']);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('skips validation when asked', () => {
    const result = exportProject(demoProject({ flows: [brokenJump] }), { format: 'yarn', validate_before_export: 'false' });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.validation).toBeUndefined();
    expect(result.files.map((file) => file.filename)).toEqual(['demo_story.yarn', 'metadata.json']);
  });

  it('validates the unfiltered project', () => {
    const caller = flow(1, 'a', [node(1, 'entry'), node(2, 'subflow', { flow_shortcut: 'b' }), node(3, 'exit')], [
      conn(1, 2),
      conn(2, 3)
    ]);
    const callee = flow(2, 'b', [node(1, 'entry'), node(2, 'exit')], [conn(1, 2)]);
    const result = exportProject(demoProject({ sheets: [], flows: [caller, callee] }), { format: 'yarn', flow_ids: ['1'] });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.files[0].content).toBe('title: a\ntags:\n---\n<<jump b>>\n===\n');
  });

  it('reports option and project errors before serializing', () => {
    const format = exportProject(demoProject(), { format: 'twine' });
    expect(format.ok ? null : format.error.code).toBe('INVALID_FORMAT');

    const project = exportProject({ flows: [] });
    expect(project.ok ? null : project.error.code).toBe('INVALID_PROJECT');
  });
});

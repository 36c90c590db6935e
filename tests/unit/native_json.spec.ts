import { describe, it, expect } from 'vitest';
import { nativeSerializer, statistics } from '@/lib/exports/serializers/native_json';
import { demoProject, parsed } from '../fixtures/project';
import { EXPORTED_AT, json, run, single } from '../fixtures/serialize';

describe('nativeSerializer', () => {
  it('writes the header and project info', () => {
    const document = json(single(run(nativeSerializer, demoProject()).output));
    expect(document).toMatchObject({
      format: 'narrative_export',
      format_version: '1.0.0',
      export_version: '1.0.0',
      exported_at: EXPORTED_AT,
      project: { id: '7', name: 'Demo Story', slug: 'demo-story', description: null, settings: {} },
      assets: { mode: 'references', items: [] },
      metadata: {
        statistics: {
          sheet_count: 2,
          flow_count: 1,
          node_count: 3,
          connection_count: 3,
          scene_count: 0,
          screenplay_count: 0,
          asset_count: 0
        }
      }
    });
  });

  it('carries response assignments parsed', () => {
    const document = json(single(run(nativeSerializer, demoProject()).output));
    expect(document).toMatchObject({
      flows: [
        {
          nodes: [
            { id: '1', type: 'entry', position_x: null },
            {
              id: '2',
              data: {
                responses: [
                  {
                    id: 'r1',
                    instruction_assignments: [{ sheet: 'mc.jaime', variable: 'health', operator: 'subtract', value: 10 }]
                  },
                  { id: 'r2', instruction_assignments: [] }
                ]
              }
            },
            { id: '3' }
          ]
        }
      ]
    });
  });

  it('leaves excluded sections out', () => {
    const document = json(
      single(run(nativeSerializer, demoProject(), { include_sheets: false, include_localization: false }).output)
    );
    expect(Object.keys(document)).toEqual([
      'format',
      'format_version',
      'export_version',
      'exported_at',
      'project',
      'flows',
      'scenes',
      'screenplays',
      'assets',
      'metadata'
    ]);
  });

  it('groups translations by source string', () => {
    const input = demoProject({
      localization: {
        languages: [{ locale_code: 'en', is_source: true }, { locale_code: 'es' }, { locale_code: 'fr' }],
        strings: [
          { source_type: 'flow_node', source_id: 2, source_field: 'text', locale_code: 'es', translated_text: 'Hola', status: 'final' },
          { source_type: 'flow_node', source_id: 2, source_field: 'text', locale_code: 'fr', translated_text: 'Salut' }
        ],
        glossary: [
          { source_term: 'Jaime', source_locale: 'en', target_term: 'Jaime', target_locale: 'es', do_not_translate: true },
          { source_term: 'Jaime', source_locale: 'en', target_term: 'Jaime', target_locale: 'fr', do_not_translate: true }
        ]
      }
    });
    const document = json(single(run(nativeSerializer, input).output));
    expect(document).toMatchObject({
      localization: {
        source_language: 'en',
        strings: [
          {
            source_type: 'flow_node',
            source_id: '2',
            translations: {
              es: { translated_text: 'Hola', status: 'final' },
              fr: { translated_text: 'Salut', status: 'pending' }
            }
          }
        ],
        glossary: [{ source_term: 'Jaime', translations: { es: 'Jaime', fr: 'Jaime' }, do_not_translate: true }]
      }
    });
  });

  it('gives table blocks an empty table when none is stored', () => {
    const input = demoProject({
      sheets: [{ id: 5, shortcut: 'inv', name: 'Inventory', blocks: [{ id: 1, type: 'table', config: { label: 'Items' } }] }]
    });
    const document = json(single(run(nativeSerializer, input).output));
    expect(document).toMatchObject({ sheets: [{ blocks: [{ table_data: { columns: [], rows: [] } }] }] });
  });

  it('counts nodes and connections across flows', () => {
    expect(statistics(parsed(demoProject({ flows: [] })))).toMatchObject({ flow_count: 0, node_count: 0 });
  });
});

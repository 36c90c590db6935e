import { describe, it, expect } from 'vitest';
import { escapeYarnText, yarnSerializer } from '@/lib/exports/serializers/yarn';
import { checkFlow, conn, demoProject, flow, loopFlow, node, parsed } from '../fixtures/project';
import { file, fileNames, json, run, testOptions } from '../fixtures/serialize';

function simpleFlow(i: number) {
  return flow(i, `f${i}`, [node(1, 'entry'), node(2, 'exit')], [conn(1, 2)]);
}

describe('escapeYarnText', () => {
  it('escapes every markup character', () => {
    expect(escapeYarnText('a [b] \\ c {d} #e')).toBe('a \\[b\\] \\\\ c \\{d\\} \\#e');
  });

  it('escapes text that would read as an option or a command', () => {
    expect(escapeYarnText('-> go')).toBe('\\-> go');
    expect(escapeYarnText('<b>')).toBe('\\<b>');
    expect(escapeYarnText('<<set $x to 1>>')).toBe('\\<<set $x to 1>>');
    expect(escapeYarnText('a << b')).toBe('a \\<< b');
    expect(escapeYarnText('well - fine')).toBe('well - fine');
  });
});

describe('yarnSerializer', () => {
  it('writes declarations, speaker lines and choices into one file', () => {
    const { output, warnings } = run(yarnSerializer, demoProject());
    expect(fileNames(output)).toEqual(['demo_story.yarn', 'metadata.json']);
    expect(file(output, 'demo_story.yarn')).toBe(
      [
        'title: intro',
        'tags:',
        '---',
        '<<declare $mc_jaime_health = 100>>',
        '<<declare $mc_jaime_is_alive = true>>',
        '<<declare $world_weather = "rain">>',
        'Jaime: Hello there #line:line_0001',
        '-> Fight #line:line_0002',
        '    <<set $mc_jaime_health to $mc_jaime_health - 10>>',
        '-> Flee #line:line_0003',
        '===',
        ''
      ].join('\n')
    );
    expect(warnings).toEqual([]);
  });

  it('maps source names in the metadata sidecar', () => {
    const { output } = run(yarnSerializer, demoProject());
    expect(json(file(output, 'metadata.json'))).toEqual({
      yarn_metadata: '1.0.0',
      project: 'Demo Story',
      characters: {
        'mc.jaime': { name: 'Jaime', yarn_name: 'Jaime' },
        world: { name: 'World', yarn_name: 'World' }
      },
      variable_mapping: {
        'mc.jaime.health': '$mc_jaime_health',
        'mc.jaime.is_alive': '$mc_jaime_is_alive',
        'world.weather': '$world_weather'
      },
      flow_mapping: { intro: 'intro' }
    });
  });

  it('renders condition nodes as if/else blocks', () => {
    const { output } = run(yarnSerializer, demoProject({ sheets: [], flows: [checkFlow()] }));
    expect(file(output, 'demo_story.yarn')).toBe(
      [
        'title: check',
        'tags:',
        '---',
        '<<if $mc_jaime_health > 50>>',
        '    Strong #line:line_0001',
        '<<else>>',
        '    Weak #line:line_0002',
        '<<endif>>',
        '===',
        ''
      ].join('\n')
    );
  });

  it('gives each hub its own node', () => {
    const { output } = run(yarnSerializer, demoProject({ sheets: [], flows: [loopFlow()] }));
    expect(file(output, 'demo_story.yarn')).toBe(
      [
        'title: loop',
        'tags:',
        '---',
        '<<jump loop_Market_Square>>',
        '===',
        '',
        'title: loop_Market_Square',
        'tags:',
        '---',
        'Buy something? #line:line_0001',
        '<<jump loop_Market_Square>>',
        '===',
        ''
      ].join('\n')
    );
  });

  it('escapes markup characters and prefixes digit-leading titles', () => {
    const escaped = flow(1, '1st', [node(1, 'entry'), node(2, 'dialogue', { text: 'Use {braces} #tag' })], [conn(1, 2)]);
    const { output } = run(yarnSerializer, demoProject({ sheets: [], flows: [escaped] }));
    expect(file(output, 'demo_story.yarn')).toBe(
      'title: flow_1st\ntags:\n---\nUse \\{braces\\} \\#tag #line:line_0001\n===\n'
    );
  });

  it('gives flows that share a name distinct titles', () => {
    const twin = (id: number) => flow(id, null, [node(1, 'entry'), node(2, 'exit')], [conn(1, 2)], { name: 'Act One' });
    const { output } = run(yarnSerializer, demoProject({ sheets: [], flows: [twin(1), twin(2)] }));
    expect(file(output, 'demo_story.yarn').match(/^title: .*$/gm)).toEqual(['title: Act_One', 'title: Act_One_2']);
    expect(json(file(output, 'metadata.json')).flow_mapping).toEqual({ 'Act One': 'Act_One', 'Act One_2': 'Act_One_2' });
  });

  it('stops on jumps to unknown hubs', () => {
    const broken = flow(1, 'j', [node(1, 'entry'), node(2, 'jump', { target_hub_id: 'nope' })], [conn(1, 2)]);
    const { output } = run(yarnSerializer, demoProject({ sheets: [], flows: [broken] }));
    expect(file(output, 'demo_story.yarn')).toBe('title: j\ntags:\n---\n<<stop>>\n===\n');
  });

  it('guards choices and lists the custom functions they need', () => {
    const ask = flow(
      1,
      'ask',
      [
        node(1, 'entry'),
        node(2, 'dialogue', {
          text: 'Well?',
          responses: [
            {
              id: 'a',
              text: 'Ask',
              condition: { logic: 'all', rules: [{ sheet: 'world', variable: 'weather', operator: 'contains', value: 'ai' }] }
            }
          ]
        })
      ],
      [conn(1, 2)]
    );
    const { output, warnings } = run(yarnSerializer, demoProject({ sheets: [], flows: [ask] }));
    expect(file(output, 'demo_story.yarn').split('\n')[4]).toBe(
      '-> Ask <<if string_contains($world_weather, "ai")>> #line:line_0002'
    );
    expect(warnings.map((w) => w.type)).toEqual(['custom_function_required']);
    expect(json(file(output, 'metadata.json'))).toMatchObject({ required_functions: ['string_contains'] });
  });

  it('splits into one file per flow above the threshold', () => {
    const flows = [1, 2, 3, 4, 5, 6].map(simpleFlow);
    const { output } = run(yarnSerializer, demoProject({ flows }));
    expect(fileNames(output)).toEqual([
      'variables.yarn',
      'f1.yarn',
      'f2.yarn',
      'f3.yarn',
      'f4.yarn',
      'f5.yarn',
      'f6.yarn',
      'metadata.json'
    ]);
    expect(file(output, 'variables.yarn')).toBe(
      [
        'title: __declarations',
        'tags:',
        '---',
        '<<declare $mc_jaime_health = 100>>',
        '<<declare $mc_jaime_is_alive = true>>',
        '<<declare $world_weather = "rain">>',
        '===',
        ''
      ].join('\n')
    );
    expect(file(output, 'f3.yarn')).toBe('title: f3\ntags:\n---\n\n===\n');
  });

  it('does not write to disk', () => {
    const result = yarnSerializer.serializeToFile(parsed(demoProject()), '/tmp/out.yarn', testOptions());
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('NOT_IMPLEMENTED');
  });
});

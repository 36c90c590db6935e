import { describe, it, expect } from 'vitest';
import { escapeInkText, inkSerializer } from '@/lib/exports/serializers/ink';
import { checkFlow, conn, demoProject, flow, loopFlow, node } from '../fixtures/project';
import { file, fileNames, json, run } from '../fixtures/serialize';

describe('escapeInkText', () => {
  it('escapes markup and a leading weave marker', () => {
    expect(escapeInkText('a {b} [c] | d')).toBe('a \\{b\\} \\[c\\] \\| d');
    expect(escapeInkText('- not a gather')).toBe('\\- not a gather');
  });

  it('escapes every leading weave marker', () => {
    expect(escapeInkText('* star')).toBe('\\* star');
    expect(escapeInkText('+ sticky')).toBe('\\+ sticky');
    expect(escapeInkText('= stitch')).toBe('\\= stitch');
    expect(escapeInkText('| bar')).toBe('\\| bar');
    expect(escapeInkText('~ tilde')).toBe('\\~ tilde');
    expect(escapeInkText('x ~ y # z \\ w')).toBe('x \\~ y \\# z \\\\ w');
  });

  it('escapes diverts and comments inside text', () => {
    expect(escapeInkText('mid -> arrow')).toBe('mid -\\> arrow');
    expect(escapeInkText('-> go')).toBe('\\-\\> go');
    expect(escapeInkText('see http://x')).toBe('see http:/\\/x');
    expect(escapeInkText('a /// b')).toBe('a /\\/\\/ b');
  });
});

describe('inkSerializer', () => {
  it('writes VARs, a start divert and one knot per flow', () => {
    const { output } = run(inkSerializer, demoProject());
    expect(fileNames(output)).toEqual(['demo_story.ink', 'metadata.json']);
    expect(file(output, 'demo_story.ink')).toBe(
      [
        'VAR mc_jaime_health = 100',
        'VAR mc_jaime_is_alive = true',
        'VAR world_weather = "rain"',
        '',
        '-> intro',
        '=== intro ===',
        'Jaime: Hello there',
        '* [Fight]',
        '    ~ mc_jaime_health -= 10',
        '    -> END',
        '* [Flee]',
        '    -> END',
        ''
      ].join('\n')
    );
    expect(json(file(output, 'metadata.json'))).toMatchObject({
      ink_metadata: '1.0.0',
      variable_mapping: { 'mc.jaime.health': 'mc_jaime_health' },
      flow_mapping: { intro: 'intro' }
    });
  });

  it('renders condition nodes as multiline conditionals', () => {
    const { output } = run(inkSerializer, demoProject({ sheets: [], flows: [checkFlow()] }));
    expect(file(output, 'demo_story.ink')).toBe(
      [
        '-> check',
        '=== check ===',
        '{',
        '    - mc_jaime_health > 50:',
        '        Strong',
        '    - true:',
        '        Weak',
        '}',
        ''
      ].join('\n')
    );
  });

  it('turns hubs into stitches', () => {
    const { output } = run(inkSerializer, demoProject({ sheets: [], flows: [loopFlow()] }));
    expect(file(output, 'demo_story.ink')).toBe(
      ['-> loop', '=== loop ===', '-> loop.Market_Square', '', '= Market_Square', 'Buy something?', '-> loop.Market_Square', ''].join(
        '\n'
      )
    );
  });

  it('tunnels into subflows and returns from their exits', () => {
    const caller = flow(1, 'a', [node(1, 'entry'), node(2, 'subflow', { target_flow_id: 2 }), node(3, 'exit')], [
      conn(1, 2),
      conn(2, 3)
    ]);
    const callee = flow(2, 'b', [node(1, 'entry'), node(2, 'exit')], [conn(1, 2)]);
    const { output } = run(inkSerializer, demoProject({ sheets: [], flows: [caller, callee] }));
    expect(file(output, 'demo_story.ink')).toBe(
      ['-> a', '=== a ===', '-> b ->', '-> END', '', '=== b ===', '->->', ''].join('\n')
    );
  });

  it('starts at the main flow and prefixes digit-leading knots', () => {
    const first = flow(1, '2nd', [node(1, 'entry'), node(2, 'exit')], [conn(1, 2)]);
    const main = flow(2, 'main', [node(1, 'entry'), node(2, 'exit')], [conn(1, 2)], { is_main: true });
    const { output } = run(inkSerializer, demoProject({ sheets: [], flows: [first, main] }));
    expect(file(output, 'demo_story.ink')).toBe(
      ['-> main', '=== _2nd ===', '-> END', '', '=== main ===', '-> END', ''].join('\n')
    );
  });

  it('guards choices with inline conditions', () => {
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
              text: 'Rest',
              condition: { logic: 'all', rules: [{ sheet: 'mc.jaime', variable: 'health', operator: 'less_than', value: 5 }] }
            }
          ]
        })
      ],
      [conn(1, 2)]
    );
    const { output } = run(inkSerializer, demoProject({ sheets: [], flows: [ask] }));
    expect(file(output, 'demo_story.ink')).toBe(['-> ask', '=== ask ===', 'Well?', '* {mc_jaime_health < 5} [Rest]', ''].join('\n'));
  });

  it('splits into INCLUDEs above the threshold', () => {
    const flows = [1, 2, 3, 4, 5, 6].map((i) => flow(i, `f${i}`, [node(1, 'entry'), node(2, 'exit')], [conn(1, 2)]));
    const { output } = run(inkSerializer, demoProject({ sheets: [], flows }));
    expect(fileNames(output)).toEqual(['main.ink', 'f1.ink', 'f2.ink', 'f3.ink', 'f4.ink', 'f5.ink', 'f6.ink', 'metadata.json']);
    expect(file(output, 'main.ink')).toBe(
      ['', 'INCLUDE f1.ink', 'INCLUDE f2.ink', 'INCLUDE f3.ink', 'INCLUDE f4.ink', 'INCLUDE f5.ink', 'INCLUDE f6.ink', '', '-> f1', ''].join(
        '\n'
      )
    );
    expect(file(output, 'f2.ink')).toBe('=== f2 ===\n-> END\n');
  });
});

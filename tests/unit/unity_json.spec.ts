import { describe, it, expect } from 'vitest';
import { unitySerializer } from '@/lib/exports/serializers/unity_json';
import { conn, demoProject, flow, node } from '../fixtures/project';
import { json, list, record, run, single } from '../fixtures/serialize';

describe('unitySerializer', () => {
  const { output } = run(unitySerializer, demoProject());
  const document = json(single(output));

  it('writes actors and the variable table', () => {
    expect(document).toMatchObject({
      format: 'unity_dialogue_system',
      version: '1.0.0',
      database: {
        actors: [
          { id: 1, name: 'Jaime', shortcut: 'mc.jaime', fields: { health: 100, is_alive: true } },
          { id: 2, name: 'World', shortcut: 'world', fields: { weather: 'rain' } }
        ],
        variables: [
          { name: 'mc.jaime.health', type: 'number', initial_value: 100 },
          { name: 'mc.jaime.is_alive', type: 'boolean', initial_value: true },
          { name: 'world.weather', type: 'string', initial_value: 'rain' }
        ]
      }
    });
  });

  it('links dialogue entries through their responses', () => {
    expect(document).toMatchObject({
      database: {
        conversations: [
          {
            id: 1,
            title: 'Intro',
            shortcut: 'intro',
            entries: [
              { id: 1, node_id: '1', node_type: 'entry', is_root: true, is_group: true, links_to: [2] },
              {
                id: 2,
                node_id: '2',
                node_type: 'dialogue',
                is_root: false,
                links_to: [4, 5],
                actor_id: 1,
                dialogue_text: 'Hello there',
                menu_text: '',
                conditions: '',
                user_script: ''
              },
              {
                id: 4,
                response_id: 'r1',
                node_type: 'response',
                actor_id: 0,
                dialogue_text: 'Fight',
                menu_text: 'Fight',
                user_script: 'Variable["mc.jaime.health"] = Variable["mc.jaime.health"] - 10',
                links_to: [3]
              },
              { id: 5, response_id: 'r2', user_script: '', links_to: [3] },
              { id: 3, node_type: 'exit', links_to: [] }
            ]
          }
        ]
      }
    });
  });

  it('numbers responses after every node entry', () => {
    const exits = Array.from({ length: 2098 }).map((_, i) => node(i + 3, 'exit'));
    const large = flow(
      1,
      'large',
      [
        node(1, 'entry'),
        node(2, 'dialogue', { text: 'Pick', responses: [{ id: 'a', text: 'A' }, { id: 'b', text: 'B' }] }),
        ...exits
      ],
      [conn(1, 2), conn(2, 3, 'response_a'), conn(2, 4, 'response_b')]
    );
    const result = run(unitySerializer, demoProject({ sheets: [], flows: [large] }));
    const database = record(json(single(result.output)).database);
    const entries = list(record(list(database.conversations)[0]).entries).map(record);
    const ids = entries.map((entry) => entry.id);

    expect(ids).toHaveLength(2102);
    expect(new Set(ids).size).toBe(2102);
    expect(entries.filter((entry) => entry.node_type === 'response').map((entry) => entry.id)).toEqual([2101, 2102]);
  });
});

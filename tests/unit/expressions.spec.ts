import { describe, it, expect } from 'vitest';
import { compileCaseGuard, compileCondition, transpileCondition } from '@/lib/exports/expressions/condition';
import { decodeCondition, normalizeAssignments } from '@/lib/exports/expressions/decode';
import { formatLiteral, formatVarRef } from '@/lib/exports/expressions/format';
import { compileAssignment, transpileInstruction } from '@/lib/exports/expressions/instruction';
import type { TranspileResult } from '@/lib/exports/expressions/types';

const lowHealth = { sheet: 'mc.jaime', variable: 'health', operator: 'less_than', value: '10' };
const rainy = { sheet: 'world', variable: 'weather', operator: 'equals', value: 'rain' };
const alive = { sheet: 'mc.jaime', variable: 'is_alive', operator: 'is_true' };

function expr(result: TranspileResult): string {
  if (!result.ok) throw result.error;
  return result.expr;
}

describe('formatVarRef', () => {
  it('renders each reference style', () => {
    expect(formatVarRef('mc.jaime', 'health', 'underscore')).toBe('mc_jaime_health');
    expect(formatVarRef('mc.jaime', 'health', 'dollar_underscore')).toBe('$mc_jaime_health');
    expect(formatVarRef('mc.jaime', 'health', 'lua_dict')).toBe('Variable["mc.jaime.health"]');
    expect(formatVarRef('mc.jaime', 'health', 'dot')).toBe('mc.jaime.health');
  });
});

describe('formatLiteral', () => {
  it('keeps numeric strings bare and quotes the rest', () => {
    expect(formatLiteral('42', 'nil')).toBe('42');
    expect(formatLiteral('-3.5', 'nil')).toBe('-3.5');
    expect(formatLiteral('true', 'nil')).toBe('true');
    expect(formatLiteral('a "b"', 'nil')).toBe('"a \\"b\\""');
    expect(formatLiteral(null, 'nil')).toBe('nil');
    expect(formatLiteral(Number.NaN, 'nil')).toBe('0');
  });
});

describe('transpileCondition', () => {
  const flat = { logic: 'any', rules: [lowHealth, rainy] };

  it('joins flat rules per dialect', () => {
    expect(expr(transpileCondition(flat, 'yarn'))).toBe('$mc_jaime_health < 10 or $world_weather == "rain"');
    expect(expr(transpileCondition(flat, 'ink'))).toBe('mc_jaime_health < 10 or world_weather == "rain"');
    expect(expr(transpileCondition(flat, 'godot'))).toBe('mc_jaime_health < 10 or world_weather == "rain"');
    expect(expr(transpileCondition(flat, 'unreal'))).toBe('mc.jaime.health < 10 OR world.weather == "rain"');
    expect(expr(transpileCondition(flat, 'articy'))).toBe('mc.jaime.health < 10 || world.weather == "rain"');
  });

  it('wraps each OR operand for Lua', () => {
    expect(expr(transpileCondition(flat, 'unity'))).toBe(
      '(Variable["mc.jaime.health"] < 10) or (Variable["world.weather"] == "rain")'
    );
  });

  it('parenthesizes nested blocks', () => {
    const blocks = {
      logic: 'all',
      blocks: [
        { type: 'block', logic: 'any', rules: [lowHealth, rainy] },
        { type: 'block', logic: 'all', rules: [alive] }
      ]
    };
    expect(expr(transpileCondition(blocks, 'yarn'))).toBe(
      '($mc_jaime_health < 10 or $world_weather == "rain") and $mc_jaime_is_alive == true'
    );
    expect(expr(transpileCondition(blocks, 'ink'))).toBe(
      '(mc_jaime_health < 10 or world_weather == "rain") and mc_jaime_is_alive'
    );
  });

  it('decodes JSON strings', () => {
    expect(expr(transpileCondition(JSON.stringify({ logic: 'all', rules: [alive] }), 'godot'))).toBe(
      'mc_jaime_is_alive == true'
    );
  });

  it('compiles empty input to an empty expression', () => {
    expect(transpileCondition(null, 'yarn')).toEqual({ ok: true, expr: '', warnings: [] });
    expect(transpileCondition({ logic: 'all', rules: [{ sheet: 'a', variable: 'b' }] }, 'yarn')).toEqual({
      ok: true,
      expr: '',
      warnings: []
    });
  });

  it('rejects plain-text conditions and unknown dialects', () => {
    const legacy = transpileCondition('health > 5', 'yarn');
    expect(legacy.ok).toBe(false);
    if (!legacy.ok) expect(legacy.error.code).toBe('LEGACY_CONDITION');

    const unknown = transpileCondition({ logic: 'all', rules: [alive] }, 'twine');
    expect(unknown.ok).toBe(false);
    if (!unknown.ok) expect(unknown.error.code).toBe('UNKNOWN_ENGINE');
  });

  it('reports custom functions for Yarn string operators', () => {
    const contains = { sheet: 'world', variable: 'weather', operator: 'contains', value: 'ai' };
    expect(transpileCondition({ logic: 'all', rules: [contains] }, 'yarn')).toEqual({
      ok: true,
      expr: 'string_contains($world_weather, "ai")',
      warnings: [
        {
          type: 'custom_function_required',
          message: "Operator 'contains' requires custom function 'string_contains' in yarn",
          operator: 'contains',
          function: 'string_contains',
          dialect: 'yarn',
          variable: '$world_weather'
        }
      ]
    });
    expect(expr(transpileCondition({ logic: 'all', rules: [{ ...contains, operator: 'not_contains' }] }, 'yarn'))).toBe(
      '!string_contains($world_weather, "ai")'
    );
  });

  it('renders native string operators elsewhere', () => {
    const rule = { sheet: 'world', variable: 'weather', operator: 'contains', value: 'ai' };
    expect(expr(transpileCondition({ logic: 'all', rules: [rule] }, 'godot'))).toBe('"ai" in world_weather');
    expect(expr(transpileCondition({ logic: 'all', rules: [{ ...rule, operator: 'starts_with' }] }, 'unity'))).toBe(
      'string.sub(Variable["world.weather"], 1, string.len("ai")) == "ai"'
    );
    expect(expr(transpileCondition({ logic: 'all', rules: [{ ...rule, operator: 'ends_with' }] }, 'unreal'))).toBe(
      'EndsWith(world.weather, "ai")'
    );
  });

  it('keeps Ink output valid for operators it cannot express', () => {
    const rule = { sheet: 'world', variable: 'weather', operator: 'contains', value: 'ai' };
    expect(transpileCondition({ logic: 'all', rules: [rule, alive] }, 'ink')).toEqual({
      ok: true,
      expr: 'true /* contains unsupported */ and mc_jaime_is_alive',
      warnings: [
        {
          type: 'unsupported_operator',
          message: "Operator 'contains' is not supported by ink",
          operator: 'contains',
          dialect: 'ink',
          variable: 'world_weather'
        }
      ]
    });
  });

  it('drops unknown operators with a warning', () => {
    const result = transpileCondition({ logic: 'all', rules: [{ ...rainy, operator: 'matches' }] }, 'yarn');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.expr).toBe('');
      expect(result.warnings.map((w) => w.type)).toEqual(['unsupported_operator']);
    }
  });

  it('uses dialect nil and inequality spellings', () => {
    const nil = { sheet: 'world', variable: 'weather', operator: 'is_nil' };
    expect(expr(transpileCondition({ logic: 'all', rules: [nil] }, 'unity'))).toBe('Variable["world.weather"] == nil');
    expect(expr(transpileCondition({ logic: 'all', rules: [{ ...rainy, operator: 'not_equals' }] }, 'unity'))).toBe(
      'Variable["world.weather"] ~= "rain"'
    );
    expect(expr(transpileCondition({ logic: 'all', rules: [nil] }, 'unreal'))).toBe('world.weather == None');
  });
});

describe('compileCondition', () => {
  it('falls back to true', () => {
    expect(compileCondition(null, 'ink')).toBe('true');
    expect(compileCondition('not json', 'yarn')).toBe('true');
    expect(compileCondition({ logic: 'all', rules: [alive] }, 'articy')).toBe('mc.jaime.is_alive == true');
  });

  it('finds the rule for a switch case', () => {
    const condition = { logic: 'all', rules: [{ ...lowHealth, id: 'r9' }, { ...rainy, id: 'r10' }] };
    expect(compileCaseGuard(condition, 'r10', 'godot')).toBe('world_weather == "rain"');
    expect(compileCaseGuard(condition, 'missing', 'godot')).toBeNull();
  });
});

describe('decodeCondition', () => {
  it('normalizes numeric rule ids', () => {
    const decoded = decodeCondition({ logic: 'any', rules: [{ ...alive, id: 4 }] });
    expect(decoded).toEqual({
      ok: true,
      condition: {
        kind: 'flat',
        logic: 'any',
        rules: [{ id: '4', sheet: 'mc.jaime', variable: 'is_alive', operator: 'is_true', value: undefined }]
      }
    });
  });
});

describe('transpileInstruction', () => {
  it('joins statements with newlines', () => {
    const assignments = [
      { sheet: 'world', variable: 'weather', operator: 'set', value: 'sun' },
      { sheet: 'mc.jaime', variable: 'is_alive', operator: 'toggle' },
      { sheet: 'mc.jaime', variable: 'health', operator: 'add', value: 5 }
    ];
    expect(expr(transpileInstruction(assignments, 'yarn'))).toBe(
      [
        '<<set $world_weather to "sun">>',
        '<<set $mc_jaime_is_alive to !$mc_jaime_is_alive>>',
        '<<set $mc_jaime_health to $mc_jaime_health + 5>>'
      ].join('\n')
    );
    expect(expr(transpileInstruction(assignments, 'ink'))).toBe(
      ['~ world_weather = "sun"', '~ mc_jaime_is_alive = not mc_jaime_is_alive', '~ mc_jaime_health += 5'].join('\n')
    );
  });

  it('renders set_if_unset per dialect', () => {
    const assignment = [{ sheet: 'mc.jaime', variable: 'health', operator: 'set_if_unset', value: 1 }];
    expect(expr(transpileInstruction(assignment, 'unity'))).toBe(
      'if Variable["mc.jaime.health"] == nil then Variable["mc.jaime.health"] = 1 end'
    );
    expect(expr(transpileInstruction(assignment, 'godot'))).toBe('if mc_jaime_health == null: mc_jaime_health = 1');
  });

  it('references another variable', () => {
    const assignment = {
      sheet: 'mc.jaime',
      variable: 'health',
      operator: 'set',
      value: 'health',
      value_type: 'variable_ref',
      value_sheet: 'mc.elena'
    };
    expect(expr(transpileInstruction([assignment], 'godot'))).toBe('mc_jaime_health = mc_elena_health');
  });

  it('warns on unknown operators and defaults missing values to 0', () => {
    const result = transpileInstruction(
      [
        { sheet: 'mc.jaime', variable: 'health', operator: 'multiply', value: 2 },
        { sheet: 'mc.jaime', variable: 'health', operator: 'set', value: null }
      ],
      'articy'
    );
    expect(result).toEqual({
      ok: true,
      expr: 'mc.jaime.health = 0',
      warnings: [
        {
          type: 'unsupported_operator',
          message: "Operator 'multiply' is not supported by articy",
          operator: 'multiply',
          dialect: 'articy',
          variable: 'mc.jaime.health'
        }
      ]
    });
  });

  it('compiles a single assignment and ignores incomplete ones', () => {
    expect(compileAssignment({ sheet: 'world', variable: 'weather', operator: 'clear' }, 'ink')).toBe('~ world_weather = ""');
    expect(compileAssignment({ sheet: 'world' }, 'ink')).toBe('');
  });

  it('normalizes camel-cased value fields', () => {
    expect(normalizeAssignments([{ sheet: 's', variable: 'v', operator: 'set', value: 1, value_type: 'literal' }])).toEqual([
      { sheet: 's', variable: 'v', operator: 'set', value: 1, valueType: 'literal', valueSheet: null }
    ]);
  });
});

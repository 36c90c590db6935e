import type { Dialect, RefStyle } from '@/lib/exports/expressions/types';

export type StringOperator = 'contains' | 'not_contains' | 'starts_with' | 'ends_with';

export const STRING_OPERATORS: readonly StringOperator[] = ['contains', 'not_contains', 'starts_with', 'ends_with'];

export function isStringOperator(operator: string): operator is StringOperator {
  return (STRING_OPERATORS as readonly string[]).includes(operator);
}

/** Runtime helper a script must register for each string operator. */
export const CUSTOM_FUNCTIONS: Record<StringOperator, string> = {
  contains: 'string_contains',
  not_contains: 'string_contains',
  starts_with: 'string_starts_with',
  ends_with: 'string_ends_with'
};

export interface DialectRules {
  dialect: Dialect;
  refStyle: RefStyle;
  keywords: { and: string; or: string };
  trueLiteral: string;
  nullKeyword: string;
  /** Lua `and` binds tighter than `or`; each OR operand gets its own parentheses. */
  wrapOrOperands: boolean;
  notEquals: string;
  isTrue(ref: string): string;
  isFalse(ref: string): string;
  isNil: ((ref: string) => string) | null;
  stringOp: ((op: StringOperator, ref: string, literal: string) => string) | null;
  /** String operators compile to calls the host runtime must provide. */
  customStringFunctions: boolean;
  dates: boolean;
  /** Placeholder for a rule the dialect cannot express, or null to drop the rule. */
  unsupported: ((operator: string) => string) | null;
  assign(ref: string, expr: string): string;
  increment(ref: string, op: '+' | '-', value: string): string;
  negate(ref: string): string;
  setIfUnset(ref: string, value: string): string;
}

const equalsTrue = (ref: string) => `${ref} == true`;
const equalsFalse = (ref: string) => `${ref} == false`;
const plainAssign = (ref: string, expr: string) => `${ref} = ${expr}`;
const compoundIncrement = (ref: string, op: '+' | '-', value: string) => `${ref} ${op}= ${value}`;
const bangNegate = (ref: string) => `!${ref}`;

const ink: DialectRules = {
  dialect: 'ink',
  refStyle: 'underscore',
  keywords: { and: ' and ', or: ' or ' },
  trueLiteral: 'true',
  nullKeyword: '""',
  wrapOrOperands: false,
  notEquals: '!=',
  isTrue: (ref) => ref,
  isFalse: (ref) => `not ${ref}`,
  isNil: null,
  stringOp: null,
  customStringFunctions: false,
  dates: false,
  unsupported: (operator) => `true /* ${operator} unsupported */`,
  assign: (ref, expr) => `~ ${ref} = ${expr}`,
  increment: (ref, op, value) => `~ ${ref} ${op}= ${value}`,
  negate: (ref) => `not ${ref}`,
  setIfUnset: (ref, value) => `~ ${ref} = ${value}`
};

const yarn: DialectRules = {
  dialect: 'yarn',
  refStyle: 'dollar_underscore',
  keywords: { and: ' and ', or: ' or ' },
  trueLiteral: 'true',
  nullKeyword: '""',
  wrapOrOperands: false,
  notEquals: '!=',
  isTrue: equalsTrue,
  isFalse: equalsFalse,
  isNil: (ref) => `${ref} == ""`,
  stringOp: (op, ref, literal) => {
    const call = `${CUSTOM_FUNCTIONS[op]}(${ref}, ${literal})`;
    return op === 'not_contains' ? `!${call}` : call;
  },
  customStringFunctions: true,
  dates: true,
  unsupported: null,
  assign: (ref, expr) => `<<set ${ref} to ${expr}>>`,
  increment: (ref, op, value) => `<<set ${ref} to ${ref} ${op} ${value}>>`,
  negate: bangNegate,
  setIfUnset: (ref, value) => `<<set ${ref} to ${value}>>`
};

const unity: DialectRules = {
  dialect: 'unity',
  refStyle: 'lua_dict',
  keywords: { and: ' and ', or: ' or ' },
  trueLiteral: 'true',
  nullKeyword: 'nil',
  wrapOrOperands: true,
  notEquals: '~=',
  isTrue: equalsTrue,
  isFalse: equalsFalse,
  isNil: (ref) => `${ref} == nil`,
  stringOp: (op, ref, literal) => {
    switch (op) {
      case 'contains':
        return `string.find(${ref}, ${literal}) ~= nil`;
      case 'not_contains':
        return `string.find(${ref}, ${literal}) == nil`;
      case 'starts_with':
        return `string.sub(${ref}, 1, string.len(${literal})) == ${literal}`;
      case 'ends_with':
        return `string.sub(${ref}, -string.len(${literal})) == ${literal}`;
    }
  },
  customStringFunctions: false,
  dates: true,
  unsupported: null,
  assign: plainAssign,
  increment: (ref, op, value) => `${ref} = ${ref} ${op} ${value}`,
  negate: (ref) => `not ${ref}`,
  setIfUnset: (ref, value) => `if ${ref} == nil then ${ref} = ${value} end`
};

const godot: DialectRules = {
  dialect: 'godot',
  refStyle: 'underscore',
  keywords: { and: ' and ', or: ' or ' },
  trueLiteral: 'true',
  nullKeyword: 'null',
  wrapOrOperands: false,
  notEquals: '!=',
  isTrue: equalsTrue,
  isFalse: equalsFalse,
  isNil: (ref) => `${ref} == null`,
  stringOp: (op, ref, literal) => {
    switch (op) {
      case 'contains':
        return `${literal} in ${ref}`;
      case 'not_contains':
        return `${literal} not in ${ref}`;
      case 'starts_with':
        return `${ref}.begins_with(${literal})`;
      case 'ends_with':
        return `${ref}.ends_with(${literal})`;
    }
  },
  customStringFunctions: false,
  dates: true,
  unsupported: null,
  assign: plainAssign,
  increment: compoundIncrement,
  negate: bangNegate,
  setIfUnset: (ref, value) => `if ${ref} == null: ${ref} = ${value}`
};

const unreal: DialectRules = {
  dialect: 'unreal',
  refStyle: 'dot',
  keywords: { and: ' AND ', or: ' OR ' },
  trueLiteral: 'true',
  nullKeyword: 'None',
  wrapOrOperands: false,
  notEquals: '!=',
  isTrue: equalsTrue,
  isFalse: equalsFalse,
  isNil: (ref) => `${ref} == None`,
  stringOp: (op, ref, literal) => {
    switch (op) {
      case 'contains':
        return `Contains(${ref}, ${literal})`;
      case 'not_contains':
        return `!Contains(${ref}, ${literal})`;
      case 'starts_with':
        return `StartsWith(${ref}, ${literal})`;
      case 'ends_with':
        return `EndsWith(${ref}, ${literal})`;
    }
  },
  customStringFunctions: false,
  dates: true,
  unsupported: null,
  assign: plainAssign,
  increment: compoundIncrement,
  negate: bangNegate,
  setIfUnset: (ref, value) => `if ${ref} == None: ${ref} = ${value}`
};

const articy: DialectRules = {
  dialect: 'articy',
  refStyle: 'dot',
  keywords: { and: ' && ', or: ' || ' },
  trueLiteral: 'true',
  nullKeyword: 'null',
  wrapOrOperands: false,
  notEquals: '!=',
  isTrue: equalsTrue,
  isFalse: equalsFalse,
  isNil: (ref) => `${ref} == null`,
  stringOp: (op, ref, literal) => {
    switch (op) {
      case 'contains':
        return `contains(${ref}, ${literal})`;
      case 'not_contains':
        return `!contains(${ref}, ${literal})`;
      case 'starts_with':
        return `startsWith(${ref}, ${literal})`;
      case 'ends_with':
        return `endsWith(${ref}, ${literal})`;
    }
  },
  customStringFunctions: false,
  dates: true,
  unsupported: null,
  assign: plainAssign,
  increment: compoundIncrement,
  negate: bangNegate,
  setIfUnset: (ref, value) => `if (${ref} == null) ${ref} = ${value}`
};

export const DIALECT_RULES: Record<Dialect, DialectRules> = { ink, yarn, unity, godot, unreal, articy };

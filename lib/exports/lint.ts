import type { OutputFile } from '@/lib/exports/serializers/types';

export type StaticIssueCode =
  | 'HEADER/MISSING_TITLE'
  | 'TOKEN/LEADING_DIGIT'
  | 'TOKEN/NULL_LITERAL'
  | 'BLOCK/UNBALANCED'
  | 'BLOCK/MULTIPLE_ELSE'
  | 'DECL/DUPLICATE'
  | 'INK/ELSE_BRANCH'
  | 'INK/UNESCAPED_BRACKET';

export type StaticIssue = {
  code: StaticIssueCode;
  message: string;
  severity: 'low' | 'medium' | 'high';
  line?: number;
  meta?: Record<string, unknown>;
};

export type StaticCheckResult = { ok: boolean; issues: StaticIssue[] };

const YARN_TITLE_RE = /^title:\s*(.*)$/;
const YARN_DECLARE_RE = /<<declare\s+\$([A-Za-z0-9_]+)/;
const YARN_VARIABLE_RE = /\$([A-Za-z0-9_]+)/g;
const YARN_JUMP_RE = /<<jump\s+([^>\s]+)\s*>>/g;
const YARN_COMMAND_RE = /(?<!\\)<<(.*?)>>/g;
const NULL_RE = /\b(null|nil|undefined)\b/;
// `{...}` not opened by an escaped brace.
const INLINE_EXPR_RE = /(?<!\\)\{([^{}]*)\}/g;

const INK_KNOT_RE = /^===\s*([^=\s]*)\s*(?:===)?\s*$/;
const INK_STITCH_RE = /^=\s*([^=\s]*)\s*$/;
const INK_VAR_RE = /^VAR\s+([A-Za-z0-9_]+)\s*=\s*(.*)$/;
const INK_DIVERT_RE = /->\s*([A-Za-z0-9_.]+)/g;
const INK_BRANCH_RE = /^-\s*(.+?):\s*$/;
const INK_CHOICE_RE = /^[*+]+\s*/;

function splitLines(source: string): string[] {
  return source.replace(/\r\n?/g, '\n').split('\n');
}

function finish(issues: StaticIssue[]): StaticCheckResult {
  return { ok: !issues.some((issue) => issue.severity === 'high'), issues };
}

function leadingDigit(name: string): boolean {
  return /^[0-9]/.test(name);
}

/** Unescaped occurrences of `ch`. */
function countUnescaped(text: string, ch: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\\') {
      i++;
      continue;
    }
    if (text[i] === ch) count++;
  }
  return count;
}

type IfFrame = { line: number; elseSeen: boolean };

export function checkYarnSource(source: string): StaticCheckResult {
  const issues: StaticIssue[] = [];
  const lines = splitLines(source);
  const declared = new Map<string, number>();
  let inBody = false;
  let nodeStart = 0;
  let title: string | null = null;
  let stack: IfFrame[] = [];

  const closeNode = (line: number) => {
    for (const frame of stack) {
      issues.push({
        code: 'BLOCK/UNBALANCED',
        message: `<<if>> at line ${frame.line} has no matching <<endif>>`,
        severity: 'high',
        line: frame.line
      });
    }
    stack = [];
    inBody = false;
    title = null;
    nodeStart = line + 1;
  };

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i].trim();
    const line = i + 1;

    if (!inBody) {
      if (text === '') continue;
      const titleMatch = YARN_TITLE_RE.exec(text);
      if (titleMatch) {
        title = titleMatch[1].trim();
        if (leadingDigit(title)) {
          issues.push({ code: 'TOKEN/LEADING_DIGIT', message: `Node title "${title}" starts with a digit`, severity: 'high', line });
        }
        continue;
      }
      if (text === '---') {
        if (!title) {
          issues.push({
            code: 'HEADER/MISSING_TITLE',
            message: 'Node header has no title',
            severity: 'high',
            line: nodeStart || line
          });
        }
        inBody = true;
      }
      continue;
    }

    if (text === '===') {
      closeNode(line);
      continue;
    }

    const declare = YARN_DECLARE_RE.exec(text);
    if (declare) {
      const name = declare[1];
      const first = declared.get(name);
      if (first !== undefined) {
        issues.push({
          code: 'DECL/DUPLICATE',
          message: `$${name} is already declared at line ${first}`,
          severity: 'high',
          line
        });
      } else {
        declared.set(name, line);
      }
    }

    // Variables only count inside commands and interpolations; `$` in plain text is just text.
    const expressions = [...text.matchAll(YARN_COMMAND_RE), ...text.matchAll(INLINE_EXPR_RE)].map((m) => m[1]);
    for (const expression of expressions) {
      for (const match of expression.matchAll(YARN_VARIABLE_RE)) {
        if (leadingDigit(match[1])) {
          issues.push({ code: 'TOKEN/LEADING_DIGIT', message: `Variable $${match[1]} starts with a digit`, severity: 'high', line });
        }
      }
    }
    for (const match of text.matchAll(YARN_JUMP_RE)) {
      if (leadingDigit(match[1])) {
        issues.push({ code: 'TOKEN/LEADING_DIGIT', message: `Jump target "${match[1]}" starts with a digit`, severity: 'high', line });
      }
    }
    for (const match of text.matchAll(YARN_COMMAND_RE)) {
      if (NULL_RE.test(match[1])) {
        issues.push({ code: 'TOKEN/NULL_LITERAL', message: `Command <<${match[1].trim()}>> uses a null literal`, severity: 'high', line });
      }
    }

    if (text.startsWith('<<if ')) {
      stack.push({ line, elseSeen: false });
    } else if (text.startsWith('<<elseif ') || text === '<<else>>') {
      const frame = stack[stack.length - 1];
      if (!frame) {
        issues.push({ code: 'BLOCK/UNBALANCED', message: `${text} outside an <<if>> block`, severity: 'high', line });
      } else if (frame.elseSeen) {
        issues.push({
          code: 'BLOCK/MULTIPLE_ELSE',
          message: `Branch after <<else>> in the block opened at line ${frame.line}`,
          severity: 'high',
          line
        });
      } else if (text === '<<else>>') {
        frame.elseSeen = true;
      }
    } else if (text === '<<endif>>') {
      if (!stack.pop()) {
        issues.push({ code: 'BLOCK/UNBALANCED', message: '<<endif>> without an open <<if>>', severity: 'high', line });
      }
    }
  }

  if (inBody) {
    issues.push({
      code: 'BLOCK/UNBALANCED',
      message: `Node "${title ?? ''}" is not terminated by ===`,
      severity: 'high',
      line: nodeStart || 1
    });
    closeNode(lines.length);
  }

  return finish(issues);
}

type InkFrame = { line: number; branches: { text: string; line: number }[] };

/** Lines whose brackets are Ink syntax rather than text. */
function isInkLogicLine(text: string): boolean {
  return (
    text.startsWith('//') ||
    text.startsWith('VAR ') ||
    text.startsWith('INCLUDE ') ||
    text.startsWith('->') ||
    text.startsWith('=') ||
    text.startsWith('~') ||
    text.startsWith('#') ||
    text.startsWith('-') ||
    text.startsWith('{') ||
    text.startsWith('}')
  );
}

function checkInkBranches(frame: InkFrame, issues: StaticIssue[]): void {
  frame.branches.forEach((branch, index) => {
    const last = index === frame.branches.length - 1;
    if (branch.text === 'else' && !last) {
      issues.push({ code: 'INK/ELSE_BRANCH', message: '- else: must be the last branch', severity: 'high', line: branch.line });
    }
    if (branch.text === 'True' || branch.text === 'False') {
      issues.push({
        code: 'INK/ELSE_BRANCH',
        message: `Branch literal "${branch.text}" is not an Ink boolean`,
        severity: 'high',
        line: branch.line
      });
    }
  });
  const elses = frame.branches.filter((branch) => branch.text === 'else');
  if (elses.length > 1) {
    issues.push({
      code: 'BLOCK/MULTIPLE_ELSE',
      message: `Conditional block at line ${frame.line} has ${elses.length} else branches`,
      severity: 'high',
      line: elses[1].line
    });
  }
}

export function checkInkSource(source: string): StaticCheckResult {
  const issues: StaticIssue[] = [];
  const lines = splitLines(source);
  const vars = new Map<string, number>();
  const knots = new Map<string, number>();
  const stack: InkFrame[] = [];

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i].trim();
    const line = i + 1;
    if (text === '' || text.startsWith('//')) continue;

    const knot = INK_KNOT_RE.exec(text);
    if (knot && text.startsWith('===')) {
      const name = knot[1];
      if (name === '') {
        issues.push({ code: 'HEADER/MISSING_TITLE', message: 'Knot header has no name', severity: 'high', line });
      } else {
        if (leadingDigit(name)) {
          issues.push({ code: 'TOKEN/LEADING_DIGIT', message: `Knot "${name}" starts with a digit`, severity: 'high', line });
        }
        const first = knots.get(name);
        if (first !== undefined) {
          issues.push({ code: 'DECL/DUPLICATE', message: `Knot "${name}" is already defined at line ${first}`, severity: 'high', line });
        } else {
          knots.set(name, line);
        }
      }
      continue;
    }

    const stitch = INK_STITCH_RE.exec(text);
    if (stitch) {
      const name = stitch[1];
      if (name === '') {
        issues.push({ code: 'HEADER/MISSING_TITLE', message: 'Stitch header has no name', severity: 'high', line });
      } else if (leadingDigit(name)) {
        issues.push({ code: 'TOKEN/LEADING_DIGIT', message: `Stitch "${name}" starts with a digit`, severity: 'high', line });
      }
      continue;
    }

    const variable = INK_VAR_RE.exec(text);
    if (variable) {
      const [, name, value] = variable;
      if (leadingDigit(name)) {
        issues.push({ code: 'TOKEN/LEADING_DIGIT', message: `VAR ${name} starts with a digit`, severity: 'high', line });
      }
      if (NULL_RE.test(value) && !value.trim().startsWith('"')) {
        issues.push({ code: 'TOKEN/NULL_LITERAL', message: `VAR ${name} is initialized with a null literal`, severity: 'high', line });
      }
      const first = vars.get(name);
      if (first !== undefined) {
        issues.push({ code: 'DECL/DUPLICATE', message: `VAR ${name} is already declared at line ${first}`, severity: 'high', line });
      } else {
        vars.set(name, line);
      }
      continue;
    }

    for (const match of text.matchAll(INK_DIVERT_RE)) {
      const target = match[1];
      if (target !== 'END' && target !== 'DONE' && target.split('.').some(leadingDigit)) {
        issues.push({ code: 'TOKEN/LEADING_DIGIT', message: `Divert target "${target}" starts with a digit`, severity: 'high', line });
      }
    }

    if (text === '{' || (text.startsWith('{') && text.endsWith(':') && countUnescaped(text, '}') === 0)) {
      stack.push({ line, branches: [] });
      continue;
    }
    if (text === '}') {
      const frame = stack.pop();
      if (frame) checkInkBranches(frame, issues);
      else issues.push({ code: 'BLOCK/UNBALANCED', message: '} without an open conditional block', severity: 'high', line });
      continue;
    }

    const branch = INK_BRANCH_RE.exec(text);
    const frame = stack[stack.length - 1];
    if (branch && frame && !text.startsWith('->')) {
      frame.branches.push({ text: branch[1].trim(), line });
      continue;
    }

    if (countUnescaped(text, '{') !== countUnescaped(text, '}')) {
      issues.push({ code: 'BLOCK/UNBALANCED', message: 'Unbalanced braces on line', severity: 'high', line });
    }
    for (const inline of text.matchAll(INLINE_EXPR_RE)) {
      if (NULL_RE.test(inline[1])) {
        issues.push({ code: 'TOKEN/NULL_LITERAL', message: `Expression {${inline[1]}} uses a null literal`, severity: 'high', line });
      }
    }

    if (INK_CHOICE_RE.test(text)) {
      if (countUnescaped(text, '[') > 1 || countUnescaped(text, ']') > 1) {
        issues.push({
          code: 'INK/UNESCAPED_BRACKET',
          message: 'Choice text contains unescaped brackets',
          severity: 'medium',
          line
        });
      }
    } else if (!isInkLogicLine(text) && (countUnescaped(text, '[') > 0 || countUnescaped(text, ']') > 0)) {
      issues.push({ code: 'INK/UNESCAPED_BRACKET', message: 'Content line contains unescaped brackets', severity: 'medium', line });
    }
  }

  for (const frame of stack) {
    issues.push({
      code: 'BLOCK/UNBALANCED',
      message: `Conditional block at line ${frame.line} is never closed`,
      severity: 'high',
      line: frame.line
    });
  }

  return finish(issues);
}

function withFile(issues: StaticIssue[], filename: string): StaticIssue[] {
  return issues.map((issue) => ({ ...issue, meta: { ...issue.meta, file: filename } }));
}

/** Per-file checks plus names that must be unique across the whole export. */
function checkFiles(
  files: OutputFile[],
  extension: string,
  check: (source: string) => StaticCheckResult,
  names: (source: string) => { kind: string; name: string; line: number }[]
): StaticCheckResult {
  const issues: StaticIssue[] = [];
  const seen = new Map<string, string>();
  for (const file of files.filter((f) => f.filename.endsWith(`.${extension}`))) {
    issues.push(...withFile(check(file.content).issues, file.filename));
    for (const entry of names(file.content)) {
      const key = `${entry.kind}:${entry.name}`;
      const owner = seen.get(key);
      if (owner !== undefined && owner !== file.filename) {
        issues.push({
          code: 'DECL/DUPLICATE',
          message: `${entry.kind} "${entry.name}" is also defined in ${owner}`,
          severity: 'high',
          line: entry.line,
          meta: { file: file.filename }
        });
      } else if (owner === undefined) {
        seen.set(key, file.filename);
      }
    }
  }
  return finish(issues);
}

function yarnNames(source: string) {
  const out: { kind: string; name: string; line: number }[] = [];
  splitLines(source).forEach((raw, i) => {
    const text = raw.trim();
    const title = YARN_TITLE_RE.exec(text);
    if (title) out.push({ kind: 'node', name: title[1].trim(), line: i + 1 });
    const declare = YARN_DECLARE_RE.exec(text);
    if (declare) out.push({ kind: 'variable', name: declare[1], line: i + 1 });
  });
  return out;
}

function inkNames(source: string) {
  const out: { kind: string; name: string; line: number }[] = [];
  splitLines(source).forEach((raw, i) => {
    const text = raw.trim();
    const knot = INK_KNOT_RE.exec(text);
    if (knot && text.startsWith('===') && knot[1] !== '') out.push({ kind: 'knot', name: knot[1], line: i + 1 });
    const variable = INK_VAR_RE.exec(text);
    if (variable) out.push({ kind: 'VAR', name: variable[1], line: i + 1 });
  });
  return out;
}

export function checkYarnFiles(files: OutputFile[]): StaticCheckResult {
  return checkFiles(files, 'yarn', checkYarnSource, yarnNames);
}

export function checkInkFiles(files: OutputFile[]): StaticCheckResult {
  return checkFiles(files, 'ink', checkInkSource, inkNames);
}

import { EXPORT_DEFAULTS } from '@/config/exports';
import { notImplemented } from '@/lib/exports/errors';
import { transpileCondition } from '@/lib/exports/expressions/condition';
import { formatVarRef } from '@/lib/exports/expressions/format';
import { transpileInstruction } from '@/lib/exports/expressions/instruction';
import { linearize, type Instruction } from '@/lib/exports/graph/linearize';
import {
  buildSpeakerMap,
  collectVariables,
  dialogueText,
  formatDeclarationValue,
  safeIdentifier,
  speakerName,
  stripHtml,
  toJson,
  type SpeakerMap,
  type Variable
} from '@/lib/exports/helpers';
import type { ExportOptions } from '@/lib/exports/options';
import type { Flow, ProjectData } from '@/lib/exports/schema';
import {
  branchGuard,
  buildFlowNames,
  buildScriptMetadata,
  flowName,
  indent,
  projectIdentifier,
  resolveFlowName,
  type FlowNames
} from '@/lib/exports/serializers/script';
import { createTranspileContext, takeExpr, type TranspileContext } from '@/lib/exports/serializers/context';
import type { OutputFile, SerializeResult, Serializer } from '@/lib/exports/serializers/types';

const DIGIT_PREFIX = '_';

interface InkState {
  ctx: TranspileContext;
  speakers: SpeakerMap;
  flowNames: FlowNames;
  /** Flows entered through a tunnel; their exits return with `->->`. */
  tunnelTargets: Set<string>;
}

export function escapeInkText(text: string): string {
  const escaped = text
    .replace(/[[\]{}#|~\\]/g, (ch) => `\\${ch}`)
    .replace(/->/g, '-\\>')
    .replace(/\/(?=\/)/g, '/\\');
  return /^[*+\-=]/.test(escaped) ? `\\${escaped}` : escaped;
}

function singleLine(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ');
}

export function inkVariableRef(variable: Pick<Variable, 'sheetShortcut' | 'variableName'>): string {
  return formatVarRef(variable.sheetShortcut, variable.variableName, 'underscore');
}

export function varLines(variables: Variable[]): string[] {
  return variables.map((variable) => `VAR ${inkVariableRef(variable)} = ${formatDeclarationValue(variable)}`);
}

function stitchName(label: string): string {
  return safeIdentifier(label, DIGIT_PREFIX);
}

function renderInstructions(state: InkState, flowIdent: string, instructions: Instruction[]): string[] {
  const lines: string[] = [];
  // Each frame is the indentation depth and weave level it was opened at.
  const frames: { depth: number; weave: number }[] = [];
  let depth = 0;
  let weave = 0;
  const push = (line: string, at = depth) => lines.push(`${indent(at)}${line}`);
  const top = () => frames[frames.length - 1] ?? { depth: 0, weave: 0 };
  const exitLine = state.tunnelTargets.has(flowIdent) ? '->->' : '-> END';

  for (const instr of instructions) {
    switch (instr.type) {
      case 'dialogue': {
        const text = singleLine(dialogueText(instr.node));
        if (!text) break;
        const speaker = speakerName(instr.node, state.speakers);
        push(speaker ? `${escapeInkText(speaker)}: ${escapeInkText(text)}` : escapeInkText(text));
        break;
      }

      case 'choices_start':
        frames.push({ depth, weave });
        weave += 1;
        break;

      case 'choice': {
        const base = top().depth;
        const { response } = instr;
        const label = singleLine(stripHtml(response.text)) || singleLine(stripHtml(response.menuText)) || '...';
        const guard = takeExpr(state.ctx, transpileCondition(response.condition, 'ink'));
        const marker = '*'.repeat(weave);
        push(guard ? `${marker} {${guard}} [${escapeInkText(label)}]` : `${marker} [${escapeInkText(label)}]`, base);
        const statements = takeExpr(state.ctx, transpileInstruction(response.assignments, 'ink'));
        if (statements) statements.split('\n').forEach((stmt) => push(stmt, base + 1));
        depth = base + 1;
        break;
      }

      case 'choices_end': {
        const frame = frames.pop() ?? { depth: 0, weave: 0 };
        depth = frame.depth;
        weave = frame.weave;
        break;
      }

      case 'condition_start':
        frames.push({ depth, weave });
        if (instr.node.cases.length > 0) push('{');
        break;

      case 'condition_branch': {
        const base = top().depth;
        const guard = branchGuard(state.ctx, instr.node, instr.branch, instr.index);
        // A conditional body is its own weave.
        push(guard.kind === 'else' ? '- true:' : `- ${guard.expr}:`, base + 1);
        depth = base + 2;
        weave = 1;
        break;
      }

      case 'condition_end': {
        const frame = frames.pop() ?? { depth: 0, weave: 0 };
        if (instr.node.cases.length > 0) push('}', frame.depth);
        depth = frame.depth;
        weave = frame.weave;
        break;
      }

      case 'instruction': {
        const statements = takeExpr(state.ctx, transpileInstruction(instr.node.assignments, 'ink'));
        if (statements) statements.split('\n').forEach((stmt) => push(stmt));
        break;
      }

      case 'scene': {
        const value = instr.node.location ?? instr.node.slugLine;
        push(value ? `# scene: ${singleLine(value).replace(/#/g, '')}` : '# scene:');
        break;
      }

      case 'subflow': {
        const target = resolveFlowName(
          state.flowNames,
          { flowId: instr.node.targetFlowId, shortcut: instr.node.flowShortcut },
          DIGIT_PREFIX
        );
        push(target ? `-> ${target} ->` : `// subflow ${instr.node.id} has no target`);
        break;
      }

      case 'jump': {
        if (instr.node.targetFlowShortcut) {
          const target = resolveFlowName(state.flowNames, { shortcut: instr.node.targetFlowShortcut }, DIGIT_PREFIX);
          push(`-> ${target ?? instr.target}`);
        } else if (instr.target === 'unknown') {
          push('-> END');
        } else {
          push(`-> ${flowIdent}.${stitchName(instr.target)}`);
        }
        break;
      }

      case 'divert':
        push(`-> ${flowIdent}.${stitchName(instr.target)}`);
        break;

      case 'exit':
        push(exitLine);
        break;
    }
  }
  return lines;
}

function flowToInk(state: InkState, flow: Flow): string {
  const ident = flowName(state.flowNames, flow, DIGIT_PREFIX);
  const { instructions, hubSections } = linearize(flow);
  const body = renderInstructions(state, ident, instructions);
  const out = [`=== ${ident} ===`, ...(body.length > 0 ? body : ['-> END'])];
  for (const section of hubSections) {
    out.push('', `= ${stitchName(section.label)}`, ...renderInstructions(state, ident, section.instructions));
  }
  return `${out.join('\n')}\n`;
}

function tunnelTargets(flows: Flow[], names: FlowNames): Set<string> {
  const targets = new Set<string>();
  for (const flow of flows) {
    for (const node of flow.nodes) {
      if (node.kind !== 'subflow') continue;
      const target = resolveFlowName(names, { flowId: node.targetFlowId, shortcut: node.flowShortcut }, DIGIT_PREFIX);
      if (target) targets.add(target);
    }
  }
  return targets;
}

function startFlow(flows: Flow[]): Flow | undefined {
  return flows.find((flow) => flow.is_main) ?? flows[0];
}

function serialize(project: ProjectData, options: ExportOptions): SerializeResult {
  const { sheets, flows } = project;
  const variables = collectVariables(sheets);
  const flowNames = buildFlowNames(flows, DIGIT_PREFIX);
  const state: InkState = {
    ctx: createTranspileContext('ink'),
    speakers: buildSpeakerMap(sheets),
    flowNames,
    tunnelTargets: tunnelTargets(flows, flowNames)
  };

  const header = varLines(variables);
  const start = startFlow(flows);
  const divert = start ? [`-> ${flowName(state.flowNames, start, DIGIT_PREFIX)}`] : [];

  const files: OutputFile[] = [];
  if (flows.length > EXPORT_DEFAULTS.multiFileThreshold) {
    const includes = flows.map((flow) => `INCLUDE ${flowName(state.flowNames, flow, DIGIT_PREFIX)}.ink`);
    files.push({ filename: 'main.ink', content: `${[...header, '', ...includes, '', ...divert].join('\n')}\n` });
    for (const flow of flows) {
      files.push({ filename: `${flowName(state.flowNames, flow, DIGIT_PREFIX)}.ink`, content: flowToInk(state, flow) });
    }
  } else {
    const preamble = [...header, ...(header.length > 0 ? [''] : []), ...divert];
    const knots = flows.map((flow) => flowToInk(state, flow));
    const content = [preamble.join('\n'), ...knots].filter((part) => part !== '').join('\n');
    files.push({ filename: `${projectIdentifier(project.project)}.ink`, content });
  }

  const metadata = buildScriptMetadata({
    formatKey: 'ink_metadata',
    project: project.project,
    sheets,
    variables,
    flows,
    flowNames,
    variableRef: inkVariableRef,
    characterKey: 'ink_name',
    characterName: (sheet) => sheet.name,
    warnings: state.ctx.warnings
  });
  files.push({ filename: 'metadata.json', content: toJson(metadata, options.pretty_print) });

  return { ok: true, output: files, warnings: state.ctx.warnings };
}

export const inkSerializer: Serializer = {
  format: 'ink',
  contentType: () => 'text/plain',
  fileExtension: () => 'ink',
  formatLabel: () => 'Ink (.ink)',
  supportedSections: () => ['flows', 'sheets'],
  serialize,
  serializeToFile: () => ({ ok: false, error: notImplemented('serializeToFile') })
};

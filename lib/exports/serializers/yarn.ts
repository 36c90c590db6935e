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

const DIGIT_PREFIX = 'flow_';
const DECLARATIONS_TITLE = '__declarations';

interface YarnState {
  ctx: TranspileContext;
  speakers: SpeakerMap;
  flowNames: FlowNames;
  lineCount: number;
}

/** A leading `-` or `<` would start an option or a command. */
export function escapeYarnText(text: string): string {
  const escaped = text.replace(/[\\#[\]{}]/g, (ch) => `\\${ch}`).replace(/<(?=<)/g, '\\<');
  return /^[-<]/.test(escaped) ? `\\${escaped}` : escaped;
}

/** Yarn lines cannot span newlines. */
function singleLine(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ');
}

function lineTag(state: YarnState): string {
  state.lineCount += 1;
  return `#line:line_${String(state.lineCount).padStart(4, '0')}`;
}

export function yarnVariableRef(variable: Pick<Variable, 'sheetShortcut' | 'variableName'>): string {
  return formatVarRef(variable.sheetShortcut, variable.variableName, 'dollar_underscore');
}

export function declarationLines(variables: Variable[]): string[] {
  return variables.map((variable) => `<<declare ${yarnVariableRef(variable)} = ${formatDeclarationValue(variable)}>>`);
}

function hubTitle(flowTitle: string, label: string): string {
  return `${flowTitle}_${label}`;
}

function yarnNode(title: string, body: string[]): string {
  return `title: ${title}\ntags:\n---\n${body.join('\n')}\n===\n`;
}

function renderInstructions(state: YarnState, flowTitle: string, instructions: Instruction[]): string[] {
  const lines: string[] = [];
  const frames: number[] = [];
  let depth = 0;
  const push = (line: string, at = depth) => lines.push(`${indent(at)}${line}`);
  const top = () => frames[frames.length - 1] ?? 0;

  for (const instr of instructions) {
    switch (instr.type) {
      case 'dialogue': {
        const text = singleLine(dialogueText(instr.node));
        if (!text) break;
        const speaker = speakerName(instr.node, state.speakers);
        const body = speaker ? `${escapeYarnText(speaker)}: ${escapeYarnText(text)}` : escapeYarnText(text);
        push(`${body} ${lineTag(state)}`);
        break;
      }

      case 'choices_start':
        frames.push(depth);
        break;

      case 'choice': {
        const base = top();
        const { response } = instr;
        const label = singleLine(stripHtml(response.text)) || singleLine(stripHtml(response.menuText)) || '...';
        const guard = takeExpr(state.ctx, transpileCondition(response.condition, 'yarn'));
        const condition = guard ? ` <<if ${guard}>>` : '';
        push(`-> ${escapeYarnText(label)}${condition} ${lineTag(state)}`, base);
        const statements = takeExpr(state.ctx, transpileInstruction(response.assignments, 'yarn'));
        if (statements) statements.split('\n').forEach((stmt) => push(stmt, base + 1));
        depth = base + 1;
        break;
      }

      case 'choices_end':
        depth = frames.pop() ?? 0;
        break;

      case 'condition_start':
        frames.push(depth);
        break;

      case 'condition_branch': {
        const base = top();
        const guard = branchGuard(state.ctx, instr.node, instr.branch, instr.index);
        if (guard.kind === 'else') push('<<else>>', base);
        else push(`<<${guard.kind} ${guard.expr}>>`, base);
        depth = base + 1;
        break;
      }

      case 'condition_end': {
        const base = frames.pop() ?? 0;
        if (instr.node.cases.length > 0) push('<<endif>>', base);
        depth = base;
        break;
      }

      case 'instruction': {
        const statements = takeExpr(state.ctx, transpileInstruction(instr.node.assignments, 'yarn'));
        if (statements) statements.split('\n').forEach((stmt) => push(stmt));
        break;
      }

      case 'scene': {
        const value = instr.node.location ?? instr.node.slugLine;
        push(value ? `<<scene ${singleLine(value)}>>` : '<<scene>>');
        break;
      }

      case 'subflow': {
        const target =
          resolveFlowName(state.flowNames, { flowId: instr.node.targetFlowId, shortcut: instr.node.flowShortcut }, DIGIT_PREFIX) ??
          `subflow_${instr.node.id}`;
        push(`<<jump ${target}>>`);
        break;
      }

      case 'jump': {
        if (instr.node.targetFlowShortcut) {
          const target = resolveFlowName(state.flowNames, { shortcut: instr.node.targetFlowShortcut }, DIGIT_PREFIX);
          push(`<<jump ${target ?? instr.target}>>`);
        } else if (instr.target === 'unknown') {
          push('<<stop>>');
        } else {
          push(`<<jump ${hubTitle(flowTitle, instr.target)}>>`);
        }
        break;
      }

      case 'divert':
        push(`<<jump ${hubTitle(flowTitle, instr.target)}>>`);
        break;

      case 'exit':
        break;
    }
  }
  return lines;
}

function flowToYarn(state: YarnState, flow: Flow, preamble: string[]): string {
  const title = flowName(state.flowNames, flow, DIGIT_PREFIX);
  const { instructions, hubSections } = linearize(flow);
  const nodes = [yarnNode(title, [...preamble, ...renderInstructions(state, title, instructions)])];
  for (const section of hubSections) {
    nodes.push(yarnNode(hubTitle(title, section.label), renderInstructions(state, title, section.instructions)));
  }
  return nodes.join('\n');
}

/**
 * Up to the multi-file threshold every flow lands in `<project>.yarn` with the
 * declarations at the top of the first node. Above it each flow gets its own
 * file and declarations move to `variables.yarn`.
 */
function serialize(project: ProjectData, options: ExportOptions): SerializeResult {
  const { sheets, flows } = project;
  const variables = collectVariables(sheets);
  const declarations = declarationLines(variables);
  const state: YarnState = {
    ctx: createTranspileContext('yarn'),
    speakers: buildSpeakerMap(sheets),
    flowNames: buildFlowNames(flows, DIGIT_PREFIX),
    lineCount: 0
  };

  const files: OutputFile[] = [];
  if (flows.length > EXPORT_DEFAULTS.multiFileThreshold) {
    if (declarations.length > 0) {
      files.push({ filename: 'variables.yarn', content: yarnNode(DECLARATIONS_TITLE, declarations) });
    }
    for (const flow of flows) {
      files.push({ filename: `${flowName(state.flowNames, flow, DIGIT_PREFIX)}.yarn`, content: flowToYarn(state, flow, []) });
    }
  } else {
    const nodes = flows.map((flow, i) => flowToYarn(state, flow, i === 0 ? declarations : []));
    if (flows.length === 0 && declarations.length > 0) nodes.push(yarnNode(DECLARATIONS_TITLE, declarations));
    files.push({ filename: `${projectIdentifier(project.project)}.yarn`, content: nodes.join('\n') });
  }

  const metadata = buildScriptMetadata({
    formatKey: 'yarn_metadata',
    project: project.project,
    sheets,
    variables,
    flows,
    flowNames: state.flowNames,
    variableRef: yarnVariableRef,
    characterKey: 'yarn_name',
    characterName: (sheet) => sheet.name,
    warnings: state.ctx.warnings
  });
  files.push({ filename: 'metadata.json', content: toJson(metadata, options.pretty_print) });

  return { ok: true, output: files, warnings: state.ctx.warnings };
}

export const yarnSerializer: Serializer = {
  format: 'yarn',
  contentType: () => 'text/plain',
  fileExtension: () => 'yarn',
  formatLabel: () => 'Yarn Spinner (.yarn)',
  supportedSections: () => ['flows', 'sheets'],
  serialize,
  serializeToFile: () => ({ ok: false, error: notImplemented('serializeToFile') })
};

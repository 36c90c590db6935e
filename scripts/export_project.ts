#!/usr/bin/env tsx
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { jsonrepair } from 'jsonrepair';
import { exportProject } from '@/lib/exports/export';
import { listFormats } from '@/lib/exports/serializers/registry';

async function main() {
  const args = process.argv.slice(2);
  const input = args.find((arg) => !arg.startsWith('--'));
  if (!input) {
    const formats = listFormats()
      .map((info) => info.format)
      .join('|');
    console.error(`Usage: tsx scripts/export_project.ts <project.json> [--format=${formats}] [--out=dir] [--no-validate]`);
    process.exit(1);
  }

  const formatArg = args.find((arg) => arg.startsWith('--format='));
  const outArg = args.find((arg) => arg.startsWith('--out='));
  const format = formatArg ? formatArg.split('=')[1] : 'native';
  const outDir = outArg ? outArg.split('=')[1] : 'export';
  const validate = !args.includes('--no-validate');

  // Hand-edited project files often carry trailing commas or comments.
  const raw = await readFile(input, 'utf8');
  const project: unknown = JSON.parse(jsonrepair(raw));

  const result = exportProject(project, { format, validate_before_export: validate });
  if (result.validation) {
    const { statistics } = result.validation;
    console.error(
      `Validation: ${result.validation.status} (errors=${statistics.error_count} warnings=${statistics.warning_count} info=${statistics.info_count})`
    );
    for (const finding of [...result.validation.errors, ...result.validation.warnings]) {
      console.error(`  [${finding.level}] ${finding.rule}: ${finding.message}`);
    }
  }
  if (!result.ok) {
    console.error(`${result.error.code}: ${result.error.message}`);
    process.exit(1);
  }

  await mkdir(outDir, { recursive: true });
  for (const file of result.files) {
    const target = path.join(outDir, file.filename);
    await writeFile(target, file.content, 'utf8');
    console.error(`Wrote ${target}`);
  }
  for (const warning of result.warnings) console.error(`  [transpile] ${warning.message}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

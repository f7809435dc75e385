// src/reporters.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import matter from 'gray-matter';
import type { RuleMeta, Summary } from './types';
import { color } from './utils';

// Rule frontmatter is flat `key: value` pairs and often not valid YAML
// (`globs: **/*.rs` reads as an alias), so gray-matter gets a line engine.
export function parseFlatFrontmatter(input: string): Record<string, string> {
  const data: Record<string, string> = {};
  for (const line of input.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const idx = trimmed.indexOf(':');
    if (idx <= 0) continue;
    const key = trimmed.slice(0, idx).trim();
    const value = trimmed
      .slice(idx + 1)
      .trim()
      .replace(/^(['"])(.*)\1$/, '$2');
    data[key] = value;
  }
  return data;
}

// Only a bare `---` line opens frontmatter. Text after the delimiter would
// select another gray-matter engine (`---js` evaluates its body).
const OPENING_DELIMITER = /^---\r?\n/;

export function inspectRule(content: string): RuleMeta | null {
  if (!OPENING_DELIMITER.test(content)) return null;
  const { data } = matter(content, {
    language: 'yaml',
    engines: { yaml: parseFlatFrontmatter },
  });

  const meta: RuleMeta = {};
  if (typeof data.description === 'string' && data.description) {
    meta.description = data.description;
  }
  if (typeof data.globs === 'string' && data.globs) {
    meta.globs = data.globs;
  }
  if (data.alwaysApply === 'true' || data.alwaysApply === 'false') {
    meta.alwaysApply = data.alwaysApply === 'true';
  }
  return meta;
}

export function renderConsoleReport(summary: Summary) {
  const { model, checked, converted, failed, files } = summary;

  const hr = color.dim('─'.repeat(70));
  const meta =
    `${color.dim('Model')}: ${color.bold(model)}  ${color.dim('•')} ` +
    `${color.dim('Files')}: ${color.bold(String(checked))}  ${color.dim('•')} ` +
    `${color.green(`${converted} converted`)}  ${color.dim('•')} ` +
    color.red(`${failed} failed`);
  const indent = '      ';

  console.log('\n' + hr);
  console.log(color.bold('Doc → Rule Conversion Report'));
  console.log(meta);
  console.log(hr);

  const ok = files.filter((f) => f.ok);
  if (ok.length) {
    console.log(`\n  ${color.green('Converted:')}`);
    for (const f of ok) {
      console.log(`    ${color.green('✔')} ${color.bold(path.basename(f.file))} → ${f.outputPath}`);
      const ruleMeta = inspectRule(f.rule);
      if (!ruleMeta) {
        console.log(`${indent}${color.yellow('• no frontmatter in generated rule')}`);
      } else if (ruleMeta.description) {
        console.log(`${indent}${color.cyan('•')} ${color.dim(ruleMeta.description)}`);
      }
    }
  }

  const bad = files.filter((f) => !f.ok);
  if (bad.length) console.log(`\n  ${color.red('Failed:')}`);
  for (const f of files) {
    if (f.ok) continue;
    console.log(`    ${color.red('✖')} ${color.bold(path.basename(f.file))}`);
    console.log(`${indent}${color.yellow('•')} ${color.yellow(`${f.stage}:`)} ${f.error}`);
  }

  console.log('\n' + hr);
  console.log(
    failed
      ? color.yellow(`Done with ${failed} failure${failed > 1 ? 's' : ''}`)
      : color.green('All files processed.')
  );
  console.log(hr + '\n');
}

export async function writeJsonReport(summary: Summary, reportPath: string) {
  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, JSON.stringify(summary, null, 2), 'utf8');
  console.log(`📦 Wrote JSON summary to ${reportPath}`);
}

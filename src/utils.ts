import path from 'node:path';
import fg from 'fast-glob';
import fs from 'node:fs/promises';
import { CLIError, DocumentReadError, errorMessage } from './errors';
import type { CLIOpts, FileResult } from './types';

// ---------- Pretty logging ----------
export const color = {
  dim: (s: string) => `\x1b[2m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
};

function ms(t: number) {
  return `${t} ms`;
}

export const DEFAULT_OUTPUT_DIR = '.cursor/rules';
export const DEFAULT_COMPONENTS_DIR = 'docs/handbook/components';
export const DEFAULT_ENV_FILE = '.env';
export const DEFAULT_TEST_COUNT = 2;
export const DOC_EXTENSION = '.mdx';
export const RULE_EXTENSION = '.mdc';

// ---------- CLI ----------

function parseCount(flag: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new CLIError(`${flag} expects a positive integer, got "${raw}"`);
  }
  return n;
}

const BATCH_ONLY_FLAGS = new Set(['--components-dir', '--recursive', '--test', '--test-count']);

export type CLIMode = 'single' | 'batch';

export function parseCLI(argv: string[], mode: CLIMode = 'batch'): CLIOpts {
  const opts: CLIOpts = {
    positional: [],
    outputDir: DEFAULT_OUTPUT_DIR,
    apiKey: null,
    envFile: DEFAULT_ENV_FILE,
    model: null,
    reportPath: null,
    componentsDir: DEFAULT_COMPONENTS_DIR,
    recursive: false,
    testMode: false,
    testCount: DEFAULT_TEST_COUNT,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('-')) {
      opts.positional.push(arg);
      continue;
    }

    // --flag=value or --flag value
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);
    if (mode === 'single' && BATCH_ONLY_FLAGS.has(flag)) {
      throw new CLIError(`${flag} is only accepted by doc-to-rule-batch`);
    }
    const value = () => {
      if (inline !== undefined) return inline;
      const next = argv[++i];
      if (next === undefined) throw new CLIError(`Missing value for ${flag}`);
      return next;
    };

    switch (flag) {
      case '--output-dir':
        opts.outputDir = value();
        break;
      case '--api-key':
        opts.apiKey = value();
        break;
      case '--env-file':
        opts.envFile = value();
        break;
      case '--model':
        opts.model = value();
        break;
      case '--report':
        opts.reportPath = value();
        break;
      case '--components-dir':
        opts.componentsDir = value();
        break;
      case '--recursive':
        opts.recursive = true;
        break;
      case '--test':
        opts.testMode = true;
        break;
      case '--test-count':
        opts.testCount = parseCount(flag, value());
        break;
      default:
        throw new CLIError(`Unknown flag: ${arg}`);
    }
  }
  return opts;
}

// ---------- Files ----------

export async function getDocFiles(
  dir: string,
  opts: { recursive?: boolean } = {}
): Promise<string[]> {
  const pattern = opts.recursive ? `**/*${DOC_EXTENSION}` : `*${DOC_EXTENSION}`;
  const files = await fg(pattern, { cwd: dir, dot: false, onlyFiles: true });
  return files.map((f) => path.resolve(dir, f)).sort();
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

export async function readDocument(filePath: string): Promise<string> {
  let raw: Buffer;
  try {
    raw = await fs.readFile(filePath);
  } catch (e) {
    throw new DocumentReadError(
      filePath,
      `Error reading file ${filePath}: ${errorMessage(e)}`
    );
  }

  let content: string;
  try {
    content = utf8.decode(raw);
  } catch {
    throw new DocumentReadError(filePath, `File ${filePath} is not UTF-8 encoded`);
  }

  if (!content.trim()) {
    throw new DocumentReadError(filePath, `File ${filePath} is empty`);
  }
  return content;
}

export async function writeRuleFile(filePath: string, content: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf8');
}

// My_Doc_Name.mdx -> my-doc-name.mdc
export function outputFileName(inputPath: string): string {
  const stem = path.parse(inputPath).name;
  return stem.replace(/_/g, '-').toLowerCase() + RULE_EXTENSION;
}

export function outputPathFor(inputPath: string, outputDir: string): string {
  return path.join(outputDir, outputFileName(inputPath));
}

// compact per-file log line
export async function runFileWithLogs(
  file: string,
  builder: () => Promise<FileResult>
): Promise<FileResult> {
  const start = Date.now();
  const label = color.dim(`[${path.basename(file)}]`);

  const res = await builder();
  const elapsed = color.gray(`(${ms(Date.now() - start)})`);

  const lines: string[] = [];
  if (res.ok) {
    lines.push(`  ${label} ${color.bold('▶')} ${color.green('OK')}  ${elapsed}`);
    lines.push(`      ${color.cyan('•')} ${color.cyan('created:')} ${res.outputPath}`);
  } else {
    lines.push(`  ${label} ${color.bold('▶')} ${color.red('FAIL')}  ${elapsed}`);
    lines.push(
      `      ${color.yellow('•')} ${color.yellow(`${res.stage}:`)} ${res.error}`
    );
  }
  console.log(lines.join('\n'));
  return res;
}

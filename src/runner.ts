import fs from 'node:fs/promises';
import path from 'node:path';
import { resolveConfig, type Env } from './config';
import { CLIError, ConfigError, errorMessage } from './errors';
import { processDocs, selectFiles } from './pipeline';
import { createOpenAIProvider } from './provider';
import { renderConsoleReport, writeJsonReport } from './reporters';
import type {
  CLIOpts,
  ConversionConfig,
  ProviderFactory,
  Summary,
} from './types';
import { color, getDocFiles, parseCLI, type CLIMode } from './utils';

export type RunDeps = {
  env: Env;
  createProvider: ProviderFactory;
};

export const defaultDeps = (): RunDeps => ({
  env: process.env,
  createProvider: createOpenAIProvider,
});

type Setup = { cli: CLIOpts; config: ConversionConfig };

// Parse flags and resolve the key; prints and returns an exit code on failure.
function setup(argv: string[], env: Env, mode: CLIMode): Setup | number {
  let cli: CLIOpts;
  try {
    cli = parseCLI(argv, mode);
  } catch (e) {
    if (!(e instanceof CLIError)) throw e;
    console.error(color.red(`Error: ${e.message}`));
    return 2;
  }

  try {
    const { source, ...config } = resolveConfig(cli, env);
    console.log(color.dim(`Using OpenAI API key from ${source}, model ${config.model}`));
    return { cli, config };
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    console.error(color.red(`Error: ${e.message}`));
    return 2;
  }
}

// Reporting never changes the exit code.
async function finish(summary: Summary, cli: CLIOpts) {
  try {
    renderConsoleReport(summary);
  } catch (e) {
    console.error(color.red(`Error rendering report: ${errorMessage(e)}`));
  }
  if (!cli.reportPath) return;
  try {
    await writeJsonReport(summary, path.resolve(cli.reportPath));
  } catch (e) {
    console.error(color.red(`Error writing report ${cli.reportPath}: ${errorMessage(e)}`));
  }
}

/**
 * Single-file entry point. A file path converts that file and fails the run
 * if it fails; a directory path converts every `.mdx` below it and always
 * exits 0.
 */
export async function runSingle(
  argv: string[],
  deps: RunDeps = defaultDeps()
): Promise<number> {
  const ready = setup(argv, deps.env, 'single');
  if (typeof ready === 'number') return ready;
  const { cli, config } = ready;

  const [input] = cli.positional;
  if (!input || cli.positional.length > 1) {
    console.error(color.red('Usage: doc-to-rule <file-or-directory> [options]'));
    return 2;
  }

  let isDir = false;
  try {
    isDir = (await fs.stat(input)).isDirectory();
  } catch (e) {
    console.error(color.red(`Error reading ${input}: ${errorMessage(e)}`));
    return 1;
  }

  const files = isDir
    ? await getDocFiles(input, { recursive: true })
    : [path.resolve(input)];
  console.log(`Output directory: ${cli.outputDir}`);
  if (isDir) {
    console.log(`Found ${files.length} .mdx file(s) in ${input}`);
  }

  const summary = await processDocs(files, {
    outputDir: cli.outputDir,
    provider: deps.createProvider(config),
    model: config.model,
  });
  await finish(summary, cli);

  return !isDir && summary.failed > 0 ? 1 : 0;
}

/**
 * Batch entry point. Always exits 0 once the key is resolved; per-file
 * failures are reported, not raised.
 */
export async function runBatch(
  argv: string[],
  deps: RunDeps = defaultDeps()
): Promise<number> {
  const ready = setup(argv, deps.env, 'batch');
  if (typeof ready === 'number') return ready;
  const { cli, config } = ready;

  const dir = cli.positional[0] ?? cli.componentsDir;
  const discovered = await getDocFiles(dir, { recursive: cli.recursive });
  if (discovered.length === 0) {
    console.log(`No .mdx files found in ${dir}`);
    return 0;
  }

  const files = selectFiles(discovered, {
    testMode: cli.testMode,
    testCount: cli.testCount,
  });
  if (cli.testMode) {
    console.log(color.yellow(`Test mode: processing ${files.length} of ${discovered.length} files`));
  }

  const summary = await processDocs(files, {
    outputDir: cli.outputDir,
    provider: deps.createProvider(config),
    model: config.model,
  });
  await finish(summary, cli);
  return 0;
}

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runBatch, runSingle, type RunDeps } from '../runner';
import type { ConversionConfig, ConversionPrompt, TextCompletionProvider } from '../types';

let tmp: string;
let docsDir: string;
let outDir: string;
let missingEnv: string;

function makeDeps(env: RunDeps['env'] = {}) {
  const provider: TextCompletionProvider = {
    complete: vi.fn(async (prompt: ConversionPrompt) => {
      if (prompt.user.includes('poison')) throw new Error('500 Internal Server Error');
      return '# Rule';
    }),
  };
  const createProvider = vi.fn((_config: ConversionConfig) => provider);
  return { deps: { env, createProvider }, provider, createProvider };
}

async function writeDoc(rel: string, content = '# Doc') {
  const file = path.join(docsDir, rel);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, 'utf8');
  return file;
}

const listOutputs = async () => (await fs.readdir(outDir)).sort();

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'doc-to-rule-runner-'));
  docsDir = path.join(tmp, 'docs');
  outDir = path.join(tmp, 'rules');
  missingEnv = path.join(tmp, 'missing.env');
  await fs.mkdir(docsDir);
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(tmp, { recursive: true, force: true });
});

describe('runBatch', () => {
  it('exits non-zero without a key and never creates a provider', async () => {
    await writeDoc('a.mdx');
    const { deps, createProvider } = makeDeps();

    const code = await runBatch(['--components-dir', docsDir, '--env-file', missingEnv], deps);

    expect(code).toBe(2);
    expect(createProvider).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('processes only the first files in test mode', async () => {
    for (let i = 9; i >= 0; i--) await writeDoc(`Doc_0${i}.mdx`);
    const { deps, provider } = makeDeps({ OPENAI_API_KEY: 'test-key' });

    const code = await runBatch(
      ['--components-dir', docsDir, '--output-dir', outDir, '--env-file', missingEnv, '--test', '--test-count', '2'],
      deps
    );

    expect(code).toBe(0);
    expect(provider.complete).toHaveBeenCalledTimes(2);
    expect(await listOutputs()).toEqual(['doc-00.mdc', 'doc-01.mdc']);
  });

  it('exits 0 when some files fail', async () => {
    await writeDoc('good.mdx');
    await writeDoc('bad.mdx', '# poison');
    const { deps } = makeDeps();

    const code = await runBatch(
      [docsDir, '--output-dir', outDir, '--api-key', 'test-key', '--env-file', missingEnv],
      deps
    );

    expect(code).toBe(0);
    expect(await listOutputs()).toEqual(['good.mdc']);
  });

  it('only walks subdirectories with --recursive', async () => {
    await writeDoc('top.mdx');
    await writeDoc('nested/inner.mdx');
    const { deps } = makeDeps({ OPENAI_API_KEY: 'test-key' });
    const base = ['--components-dir', docsDir, '--output-dir', outDir, '--env-file', missingEnv];

    await runBatch(base, deps);
    expect(await listOutputs()).toEqual(['top.mdc']);

    await runBatch([...base, '--recursive'], deps);
    expect(await listOutputs()).toEqual(['inner.mdc', 'top.mdc']);
  });

  it('exits 0 when a reply carries a language-tagged frontmatter block', async () => {
    await writeDoc('a.mdx');
    const { deps, provider } = makeDeps({ OPENAI_API_KEY: 'test-key' });
    vi.mocked(provider.complete).mockResolvedValue('---toml\ntitle = 1\n---\n# Rule');

    const code = await runBatch(
      ['--components-dir', docsDir, '--output-dir', outDir, '--env-file', missingEnv],
      deps
    );

    expect(code).toBe(0);
    expect(await listOutputs()).toEqual(['a.mdc']);
  });

  it('exits 0 when the JSON report cannot be written', async () => {
    await writeDoc('a.mdx');
    const { deps } = makeDeps({ OPENAI_API_KEY: 'test-key' });
    const blocker = path.join(tmp, 'blocker');
    await fs.writeFile(blocker, 'not a directory', 'utf8');

    const code = await runBatch(
      ['--components-dir', docsDir, '--output-dir', outDir, '--env-file', missingEnv, '--report', path.join(blocker, 'run.json')],
      deps
    );

    expect(code).toBe(0);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('exits 2 when the env file cannot be read', async () => {
    await writeDoc('a.mdx');
    const { deps, createProvider } = makeDeps();

    const code = await runBatch(['--components-dir', docsDir, '--env-file', docsDir], deps);

    expect(code).toBe(2);
    expect(createProvider).not.toHaveBeenCalled();
  });

  it('writes a JSON report when asked', async () => {
    await writeDoc('a.mdx');
    const { deps, createProvider } = makeDeps({ OPENAI_API_KEY: 'test-key' });
    const report = path.join(tmp, 'reports', 'run.json');

    await runBatch(
      ['--components-dir', docsDir, '--output-dir', outDir, '--env-file', missingEnv, '--report', report],
      deps
    );

    const summary = JSON.parse(await fs.readFile(report, 'utf8'));
    expect(summary.model).toBe('gpt-4.1-mini-2025-04-14');
    expect(summary.converted).toBe(1);
    expect(summary.failed).toBe(0);
    expect(createProvider).toHaveBeenCalledWith({
      apiKey: 'test-key',
      model: 'gpt-4.1-mini-2025-04-14',
      temperature: 0.3,
    });
  });
});

describe('runSingle', () => {
  it('converts one file', async () => {
    const file = await writeDoc('Getting_Started.mdx');
    const { deps } = makeDeps({ OPENAI_API_KEY: 'test-key' });

    const code = await runSingle([file, '--output-dir', outDir, '--env-file', missingEnv], deps);

    expect(code).toBe(0);
    await expect(fs.readFile(path.join(outDir, 'getting-started.mdc'), 'utf8')).resolves.toBe(
      '# Rule'
    );
  });

  it('fails the run when the file fails', async () => {
    const file = await writeDoc('broken.mdx', '# poison');
    const { deps } = makeDeps({ OPENAI_API_KEY: 'test-key' });

    const code = await runSingle([file, '--output-dir', outDir, '--env-file', missingEnv], deps);

    expect(code).toBe(1);
  });

  it('fails the run when the input does not exist', async () => {
    const { deps, createProvider } = makeDeps({ OPENAI_API_KEY: 'test-key' });

    const code = await runSingle(
      [path.join(docsDir, 'nope.mdx'), '--output-dir', outDir, '--env-file', missingEnv],
      deps
    );

    expect(code).toBe(1);
    expect(createProvider).not.toHaveBeenCalled();
  });

  it('walks a directory recursively and keeps going past failures', async () => {
    await writeDoc('a.mdx');
    await writeDoc('guides/b.mdx', '# poison');
    await writeDoc('guides/deep/c.mdx');
    const { deps } = makeDeps({ OPENAI_API_KEY: 'test-key' });

    const code = await runSingle([docsDir, '--output-dir', outDir, '--env-file', missingEnv], deps);

    expect(code).toBe(0);
    expect(await listOutputs()).toEqual(['a.mdc', 'c.mdc']);
  });

  it('requires exactly one input path', async () => {
    const { deps } = makeDeps({ OPENAI_API_KEY: 'test-key' });
    expect(await runSingle(['--env-file', missingEnv], deps)).toBe(2);
  });

  it('rejects batch-only flags before converting anything', async () => {
    for (let i = 0; i < 5; i++) await writeDoc(`doc_${i}.mdx`);
    const { deps, createProvider } = makeDeps({ OPENAI_API_KEY: 'test-key' });

    const code = await runSingle(
      [docsDir, '--test', '--test-count', '1', '--output-dir', outDir, '--env-file', missingEnv],
      deps
    );

    expect(code).toBe(2);
    expect(createProvider).not.toHaveBeenCalled();
    await expect(fs.readdir(outDir)).rejects.toThrow();
  });

  it('rejects unknown flags', async () => {
    const { deps, createProvider } = makeDeps({ OPENAI_API_KEY: 'test-key' });
    expect(await runSingle(['x.mdx', '--force'], deps)).toBe(2);
    expect(createProvider).not.toHaveBeenCalled();
  });
});

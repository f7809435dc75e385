import { convertDocToRule } from './converter';
import { errorMessage } from './errors';
import type {
  FileResult,
  FileStage,
  Summary,
  TextCompletionProvider,
} from './types';
import {
  color,
  DEFAULT_TEST_COUNT,
  outputPathFor,
  readDocument,
  runFileWithLogs,
  writeRuleFile,
} from './utils';

export type ProcessOptions = {
  outputDir: string;
  provider: TextCompletionProvider;
  model: string;
};

export function selectFiles(
  files: string[],
  opts: { testMode?: boolean; testCount?: number } = {}
): string[] {
  if (!opts.testMode) return files;
  return files.slice(0, opts.testCount ?? DEFAULT_TEST_COUNT);
}

// read -> convert -> write, stopping at the first stage that throws
async function convertOne(
  file: string,
  opts: ProcessOptions
): Promise<FileResult> {
  let stage: FileStage = 'read';
  try {
    const doc = await readDocument(file);

    stage = 'convert';
    const rule = await convertDocToRule(doc, opts.provider);

    stage = 'write';
    const outputPath = outputPathFor(file, opts.outputDir);
    await writeRuleFile(outputPath, rule);

    return { ok: true, file, outputPath, rule };
  } catch (e) {
    return { ok: false, file, stage, error: errorMessage(e) };
  }
}

/**
 * Convert each file in order, one remote call at a time. A failure is
 * recorded against its file and the loop carries on.
 */
export async function processDocs(
  files: string[],
  opts: ProcessOptions
): Promise<Summary> {
  const results: FileResult[] = [];
  // output path -> input that last wrote it
  const written = new Map<string, string>();
  for (const file of files) {
    const res = await runFileWithLogs(file, () => convertOne(file, opts));
    if (res.ok) {
      const previous = written.get(res.outputPath);
      if (previous) {
        console.log(
          color.yellow(`      • ${res.outputPath} overwrote the rule converted from ${previous}`)
        );
      }
      written.set(res.outputPath, file);
    }
    results.push(res);
  }

  const converted = results.filter((r) => r.ok).length;
  return {
    model: opts.model,
    checked: results.length,
    converted,
    failed: results.length - converted,
    files: results,
  };
}

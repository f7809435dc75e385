export type CLIOpts = {
  outputDir: string;
  apiKey?: string | null;
  envFile: string;
  model?: string | null;
  reportPath?: string | null;
  componentsDir: string;
  recursive: boolean;
  testMode: boolean;
  testCount: number;
  positional: string[]; // input paths
};

export type ConversionConfig = {
  apiKey: string;
  model: string;
  temperature: number;
};

export type ConversionPrompt = {
  system: string;
  user: string;
};

// One remote call: prompt in, completion text out.
export interface TextCompletionProvider {
  complete(prompt: ConversionPrompt): Promise<string>;
}

export type ProviderFactory = (config: ConversionConfig) => TextCompletionProvider;

export type FileStage = 'read' | 'convert' | 'write';

export type FileResult =
  | { ok: true; file: string; outputPath: string; rule: string }
  | { ok: false; file: string; stage: FileStage; error: string };

export type Summary = {
  model: string;
  checked: number;
  converted: number;
  failed: number;
  files: FileResult[];
};

export type RuleMeta = {
  description?: string;
  globs?: string;
  alwaysApply?: boolean;
};

export type ApiKeySource = 'flag' | 'env' | 'env-file';

import fs from 'node:fs';
import { parse } from 'dotenv';
import { ConfigError, errorMessage, MissingApiKeyError } from './errors';
import { DEFAULT_MODEL, DEFAULT_TEMPERATURE } from './provider';
import type { ApiKeySource, CLIOpts, ConversionConfig } from './types';

export const API_KEY_VAR = 'OPENAI_API_KEY';
export const MODEL_VAR = 'DOC_TO_RULE_MODEL';

export type Env = Record<string, string | undefined>;

/**
 * Read a `.env` file into a plain object. The process environment is left
 * alone; a missing file reads as empty.
 */
export function readEnvFile(envFile: string): Env {
  if (!fs.existsSync(envFile)) return {};
  try {
    return parse(fs.readFileSync(envFile));
  } catch (e) {
    throw new ConfigError(`Cannot read env file ${envFile}: ${errorMessage(e)}`);
  }
}

/** Precedence: explicit flag, then the environment, then the `.env` file. */
export function resolveApiKey(input: {
  flag?: string | null;
  env: Env;
  fileEnv: Env;
}): { apiKey: string; source: ApiKeySource } | null {
  if (input.flag) return { apiKey: input.flag, source: 'flag' };

  const fromEnv = input.env[API_KEY_VAR];
  if (fromEnv) return { apiKey: fromEnv, source: 'env' };

  const fromFile = input.fileEnv[API_KEY_VAR];
  if (fromFile) return { apiKey: fromFile, source: 'env-file' };

  return null;
}

export function resolveConfig(
  cli: CLIOpts,
  env: Env
): ConversionConfig & { source: ApiKeySource } {
  const fileEnv = readEnvFile(cli.envFile);
  const key = resolveApiKey({ flag: cli.apiKey, env, fileEnv });
  if (!key) throw new MissingApiKeyError();

  return {
    apiKey: key.apiKey,
    source: key.source,
    model: cli.model || env[MODEL_VAR] || fileEnv[MODEL_VAR] || DEFAULT_MODEL,
    temperature: DEFAULT_TEMPERATURE,
  };
}

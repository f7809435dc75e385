export class InvalidDocumentError extends Error {
  constructor(message = 'Invalid documentation content') {
    super(message);
    this.name = 'InvalidDocumentError';
  }
}

export class DocumentReadError extends Error {
  constructor(
    readonly filePath: string,
    message: string
  ) {
    super(message);
    this.name = 'DocumentReadError';
  }
}

export class EmptyCompletionError extends Error {
  constructor(model: string) {
    super(`Model ${model} returned no content`);
    this.name = 'EmptyCompletionError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class MissingApiKeyError extends ConfigError {
  constructor() {
    super(
      'OpenAI API key not provided. Use --api-key, set OPENAI_API_KEY, or add it to your .env file.'
    );
    this.name = 'MissingApiKeyError';
  }
}

export class CLIError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CLIError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

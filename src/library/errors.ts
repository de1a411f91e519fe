/**
 * Input path does not exist.
 */
export class NotFoundError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'NotFoundError';
    this.path = path;
  }
}

/**
 * File extension is not one the loader understands.
 */
export class UnsupportedFormatError extends Error {
  readonly extension: string;

  constructor(message: string, extension: string) {
    super(message);
    this.name = 'UnsupportedFormatError';
    this.extension = extension;
  }
}

/**
 * A delimited file has no header or rows.
 */
export class EmptyInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyInputError';
  }
}

/**
 * A directory load produced no documents.
 */
export class NoDocumentsError extends Error {
  readonly directory: string;

  constructor(message: string, directory: string) {
    super(message);
    this.name = 'NoDocumentsError';
    this.directory = directory;
  }
}

export class CodebookFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CodebookFormatError';
  }
}

export class PromptTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PromptTemplateError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Transport or response-shape failure from the model provider.
 */
export class LLMCallError extends Error {
  readonly model: string;

  constructor(message: string, model: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LLMCallError';
    this.model = model;
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

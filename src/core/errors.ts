/**
 * Error taxonomy for the translation pipeline.
 *
 * Transport and exhaustion errors abort the current document (or table
 * entry). Malformed input and I/O failures skip the current document. None of
 * them abort a batch; the orchestrator records them and moves on.
 */

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/** Network failure, non-2xx status or unparseable response from the backend */
export class TransportError extends PipelineError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.name = 'TransportError';
    this.status = options?.status;
  }
}

/** Every attempt returned sentinel-corrupted output */
export class TranslationExhaustedError extends PipelineError {
  readonly attempts: number;
  readonly sourceText: string;

  constructor(sourceText: string, attempts: number) {
    super(`Backend returned corrupt output for ${attempts} attempt(s): "${preview(sourceText)}"`);
    this.name = 'TranslationExhaustedError';
    this.attempts = attempts;
    this.sourceText = sourceText;
  }
}

/** Input JSON is missing expected fields or has the wrong shape */
export class MalformedInputError extends PipelineError {
  readonly filePath: string;

  constructor(filePath: string, detail: string, options?: { cause?: unknown }) {
    super(`Malformed input in ${filePath}: ${detail}`, options);
    this.name = 'MalformedInputError';
    this.filePath = filePath;
  }
}

/** Cannot read an input file or write an output file */
export class IOFailureError extends PipelineError {
  readonly filePath: string;

  constructor(filePath: string, operation: 'read' | 'write', options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to ${operation} ${filePath}${reason}`, options);
    this.name = 'IOFailureError';
    this.filePath = filePath;
  }
}

/** Configuration file missing or invalid */
export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function preview(text: string): string {
  return text.length > 40 ? `${text.substring(0, 40)}...` : text;
}

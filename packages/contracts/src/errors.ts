export class PipelineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class InfrastructureError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class FfmpegNotFoundError extends InfrastructureError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/** An output path could not be created, written or renamed into place. */
export class FilesystemError extends InfrastructureError {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.path = path;
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Describes a malformed directive. The parser records these as diagnostics and
 * keeps the offending line as plain text; it never throws one for a document.
 */
export class ParseError extends ValidationError {
  readonly line: number;

  constructor(line: number, message: string, options?: ErrorOptions) {
    super(`line ${line}: ${message}`, options);
    this.line = line;
  }
}

export type SynthesisErrorDetails = {
  voice: string;
  service: string;
  status?: number;
  retryable?: boolean;
};

export class SynthesisError extends PipelineError {
  readonly voice: string;
  readonly service: string;
  readonly status: number | undefined;
  readonly retryable: boolean;

  constructor(message: string, details: SynthesisErrorDetails, options?: ErrorOptions) {
    super(message, options);
    this.voice = details.voice;
    this.service = details.service;
    this.status = details.status;
    this.retryable = details.retryable ?? false;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DublineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed timestamp or subtitle block. */
export class FormatError extends DublineError {}

/** Extraction or speech-to-text failure. Fatal for the owning pipeline. */
export class ExternalServiceError extends DublineError {}

/** A file at a caller supplied path could not be read or written. */
export class ResourceError extends DublineError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

export class TaskCancelledError extends DublineError {
  constructor() {
    super("Task cancelled");
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Error types raised across ingestion. Each carries the value that failed so
 * log lines can name it; wrapped failures keep the original as `cause`.
 */

type BaseErrorOpts = {
  message: string;
  cause?: unknown;
};

export class InvariantError extends Error {
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "InvariantError";
    this.context = context;
  }
}

export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor({ message, status, url, cause }: BaseErrorOpts & { status: number; url: string }) {
    super(`${message}: ${status} for ${url}`, { cause });
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

export class ConfigError extends Error {
  readonly source: string;

  constructor({ message, source, cause }: BaseErrorOpts & { source: string }) {
    super(`${message} (${source})`, { cause });
    this.name = "ConfigError";
    this.source = source;
  }
}

export class MappingError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor({ message, field, value, cause }: BaseErrorOpts & { field: string; value: unknown }) {
    super(`${message} for field "${field}"`, { cause });
    this.name = "MappingError";
    this.field = field;
    this.value = value;
  }
}

export class RdfLoadError extends Error {
  readonly source: string;

  constructor({ message, source, cause }: BaseErrorOpts & { source: string }) {
    super(`${message}: ${source}`, { cause });
    this.name = "RdfLoadError";
    this.source = source;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

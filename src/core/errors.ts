export interface ValidationIssue {
  path: string;
  message: string;
}

export class TransientNetworkError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, options: { url: string; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "TransientNetworkError";
    this.url = options.url;
    this.status = options.status;
  }
}

export class MalformedResponseError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = "MalformedResponseError";
    this.issues = issues;
  }

  getDetailedMessage(): string {
    const lines = this.issues.map((issue) => `  - ${issue.path || "<root>"}: ${issue.message}`);
    return [this.message, ...lines].join("\n");
  }
}

export class DownloadIOError extends Error {
  readonly path: string;

  constructor(message: string, options: { path: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "DownloadIOError";
    this.path = options.path;
  }
}

export class ExhaustedRetriesError extends Error {
  readonly operationName: string;
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(operationName: string, attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`${operationName} failed after ${attempts} attempt(s): ${reason}`, { cause: lastError });
    this.name = "ExhaustedRetriesError";
    this.operationName = operationName;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class MetadataFetchError extends Error {
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Metadata fetch failed for ${url} after ${attempts} attempt(s): ${reason}`, { cause });
    this.name = "MetadataFetchError";
    this.url = url;
    this.attempts = attempts;
  }
}

export class InvalidPostUrlError extends Error {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`Invalid post URL ${url}: ${reason}`);
    this.name = "InvalidPostUrlError";
    this.url = url;
  }
}

export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : "Error";
}

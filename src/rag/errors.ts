export type ErrorCode =
  | "UNPROCESSABLE_DOCUMENT"
  | "RETRIEVAL_STORE_UNAVAILABLE"
  | "PROVIDER_REQUEST_FAILED"
  | "PROVIDER_EXHAUSTED"
  | "CONFIGURATION_INVALID"
  | "OPERATION_CANCELLED";

/**
 * Base class for every failure the CLI knows how to report.
 * `hint` is shown to the user underneath the message.
 */
export class ArchivistError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly hint?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnprocessableDocumentError extends ArchivistError {
  constructor(
    readonly filePath: string,
    readonly reason: string,
    cause?: unknown,
  ) {
    super(
      `Cannot process ${filePath}: ${reason}`,
      "UNPROCESSABLE_DOCUMENT",
      "Open the file in a PDF viewer to check it. Password-protected files must be unlocked first.",
      { cause },
    );
  }
}

export class RetrievalStoreUnavailableError extends ArchivistError {
  constructor(operation: string, cause?: unknown) {
    super(
      `Vector store ${operation} failed: ${describeError(cause)}`,
      "RETRIEVAL_STORE_UNAVAILABLE",
      "Check the embedding API key and that the index directory is readable.",
      { cause },
    );
  }
}

export class ProviderRequestError extends ArchivistError {
  constructor(
    message: string,
    readonly model: string,
    readonly transient: boolean,
    readonly status?: number,
    cause?: unknown,
  ) {
    super(message, "PROVIDER_REQUEST_FAILED", hintForStatus(status), { cause });
  }
}

export interface ModelAttempt {
  model: string;
  attempts: number;
  lastError: string;
}

export class ProviderExhaustedError extends ArchivistError {
  constructor(readonly attempts: ModelAttempt[]) {
    super(
      `All models failed: ${attempts
        .map((a) => `${a.model} (${a.attempts}x: ${a.lastError})`)
        .join("; ")}`,
      "PROVIDER_EXHAUSTED",
      "Check the OpenRouter API key and network, or configure other fallback models.",
    );
  }

  get models(): string[] {
    return this.attempts.map((a) => a.model);
  }
}

export class ConfigurationError extends ArchivistError {
  constructor(readonly issues: string[]) {
    super(
      `Invalid configuration: ${issues.join("; ")}`,
      "CONFIGURATION_INVALID",
      "Run `archivist config show` and fix the listed keys.",
    );
  }
}

export class OperationCancelledError extends ArchivistError {
  constructor(operation: string) {
    super(`${operation} was cancelled`, "OPERATION_CANCELLED");
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function hintForStatus(status: number | undefined): string {
  if (status === 401 || status === 403) return "Check the OpenRouter API key.";
  if (status === 404) return "The model is not available; pick another with `archivist models list`.";
  if (status === 429) return "Rate limit exceeded. Wait a moment and try again.";
  if (status !== undefined && status >= 500) return "OpenRouter is having trouble. Try again later or use another model.";
  return "Check the network connection and API configuration.";
}

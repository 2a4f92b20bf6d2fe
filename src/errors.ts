/**
 * Error types shared by the CLI, the providers and the tool layer.
 *
 * Tool failures are reported back to the model as text and never surface
 * here; these classes cover what should stop a run.
 */

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class ProviderError extends Error {
  readonly provider: string;
  readonly status?: number;
  readonly statusText?: string;

  constructor(
    provider: string,
    message: string,
    details: { status?: number; statusText?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = 'ProviderError';
    this.provider = provider;
    this.status = details.status;
    this.statusText = details.statusText;
  }
}

export class ToolArgumentError extends Error {
  readonly toolName: string;

  constructor(toolName: string, message: string) {
    super(message);
    this.name = 'ToolArgumentError';
    this.toolName = toolName;
  }
}

export class TodoStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TodoStoreError';
  }
}

export interface ErrorDetails {
  status?: number;
  statusText?: string;
  message: string;
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * Pull an HTTP status and the most specific message out of whatever an SDK threw.
 * SDKs disagree on where they keep these, so several shapes are checked.
 */
export function describeError(error: unknown): ErrorDetails {
  const response = readProperty(error, 'response');
  const statusCandidate =
    readProperty(error, 'status') ?? readProperty(error, 'statusCode') ?? readProperty(response, 'status');
  const statusTextCandidate = readProperty(response, 'statusText') ?? readProperty(error, 'statusText');

  const apiMessage =
    readProperty(readProperty(readProperty(response, 'data'), 'error'), 'message') ??
    readProperty(readProperty(error, 'error'), 'message');

  let message: string;
  if (typeof apiMessage === 'string' && apiMessage) {
    message = apiMessage;
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = String(error);
  }

  return {
    status: typeof statusCandidate === 'number' ? statusCandidate : undefined,
    statusText: typeof statusTextCandidate === 'string' && statusTextCandidate ? statusTextCandidate : undefined,
    message,
  };
}

export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const { status, statusText, message } = describeError(error);
  return new ProviderError(provider, message, { status, statusText, cause: error });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

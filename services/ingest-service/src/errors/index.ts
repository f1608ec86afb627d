/**
 * Error taxonomy for the ingest pipeline.
 *
 * - ConfigurationError: setup problem shared by every location, aborts the run.
 * - NetworkError: transport fault left after the retry budget (or a cancelled call).
 * - ProviderResponseError: unexpected status or payload shape, never retried.
 * - ValidationError: a single record broke an invariant and is dropped.
 * - IngestRunError: every location of a run failed.
 */

export class IngestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends IngestError {}

export class NetworkError extends IngestError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

const EXCERPT_LIMIT = 500;

export class ProviderResponseError extends IngestError {
  readonly status?: number;
  readonly excerpt?: string;

  constructor(
    message: string,
    details: { status?: number; payload?: unknown; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.status = details.status;
    if (details.payload !== undefined) {
      this.excerpt = toExcerpt(details.payload);
    }
  }
}

export class ValidationError extends IngestError {}

export type LocationFailure = {
  location: string;
  error: string;
  message: string;
};

export class IngestRunError extends IngestError {
  readonly failures: ReadonlyArray<LocationFailure>;

  constructor(label: string, failures: ReadonlyArray<LocationFailure>) {
    const reasons = failures
      .map((f) => `${f.location}: ${f.error}: ${f.message}`)
      .join('; ');
    super(`All ${failures.length} location(s) failed for ${label} -> ${reasons}`);
    this.failures = failures;
  }
}

export function toExcerpt(payload: unknown): string {
  const text = typeof payload === 'string' ? payload : safeStringify(payload);
  return text.slice(0, EXCERPT_LIMIT);
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function describeError(err: unknown): { error: string; message: string } {
  if (err instanceof Error) {
    return { error: err.name, message: err.message };
  }
  return { error: 'Error', message: String(err) };
}

// Error taxonomy for startup, data loading and external service calls

/** Missing credential or unreachable data source. Fatal at startup. */
export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration errors: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

/** The transaction source could not be read or parsed. Fatal for the run. */
export class DataLoadError extends Error {
  constructor(
    message: string,
    public readonly detail: Record<string, unknown> = {},
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'DataLoadError';
  }
}

export type ExternalService = 'generation' | 'embedding' | 'vector-store';

/** A call to an outside service failed. Retried, then degraded by the caller. */
export class ExternalServiceError extends Error {
  constructor(
    public readonly service: ExternalService,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ExternalServiceError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

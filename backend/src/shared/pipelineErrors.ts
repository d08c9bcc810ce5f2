export type SourceName = 'events' | 'metadata' | 'importers';

// Raised when a source dataset cannot be read and nothing cached can stand in for it.
export class FetchError extends Error {
  readonly code = 'FETCH_FAILED';

  constructor(
    readonly source: SourceName,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

export class MalformedDateError extends Error {
  readonly code = 'MALFORMED_DATE';

  constructor(readonly value: unknown) {
    super(`Unrecognised date value: ${String(value)}`);
    this.name = 'MalformedDateError';
  }
}

export class InvalidReportQueryError extends Error {
  readonly code = 'INVALID_QUERY';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidReportQueryError';
  }
}

export interface JoinKeyCollisionWarning {
  code: 'JOIN_KEY_COLLISION';
  entityId: string;
  keptIndex: number;
  discardedIndex: number;
}

export interface EmptyResultWarning {
  code: 'EMPTY_RESULT';
  message: string;
}

export const toFetchError = (source: SourceName, error: unknown): FetchError => {
  if (error instanceof FetchError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new FetchError(source, `Unable to load ${source} dataset: ${reason}`, { cause: error });
};

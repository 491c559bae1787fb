export class SnapshotError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SnapshotError';
  }
}

/** A category's query could not complete. The snapshot keeps its prior state. */
export class QueryFailure extends SnapshotError {
  readonly category: string;

  constructor(category: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'QueryFailure';
    this.category = category;
  }
}

export class QueryTimeoutError extends QueryFailure {
  readonly timeoutMs: number;

  constructor(category: string, timeoutMs: number) {
    super(category, `Query for "${category}" timed out after ${timeoutMs}ms`);
    this.name = 'QueryTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Query issued before `open()` or after `close()` */
export class DataSourceClosedError extends QueryFailure {
  constructor(category: string) {
    super(category, `Data source is not open; cannot query "${category}"`);
    this.name = 'DataSourceClosedError';
  }
}

export class RefreshInProgressError extends SnapshotError {
  readonly category: string;

  constructor(category: string) {
    super(`Category "${category}" is already refreshing asynchronously`);
    this.name = 'RefreshInProgressError';
    this.category = category;
  }
}

export interface CategoryFailure {
  category: string;
  error: SnapshotError;
}

/** One or more categories failed during a root refresh */
export class AggregateRefreshError extends SnapshotError {
  readonly failures: CategoryFailure[];

  constructor(failures: CategoryFailure[]) {
    const names = failures.map((f) => f.category).join(', ');
    super(`Refresh failed for ${failures.length} categories: ${names}`);
    this.name = 'AggregateRefreshError';
    this.failures = failures;
  }
}

export class SnapshotDocumentError extends SnapshotError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SnapshotDocumentError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wraps anything a data source throws into a QueryFailure for `category` */
export function toQueryFailure(category: string, err: unknown): QueryFailure {
  if (err instanceof QueryFailure) return err;
  return new QueryFailure(category, `Query for "${category}" failed: ${errorMessage(err)}`, {
    cause: err,
  });
}

export function toSnapshotError(category: string, err: unknown): SnapshotError {
  if (err instanceof SnapshotError) return err;
  return toQueryFailure(category, err);
}

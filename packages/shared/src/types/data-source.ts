/** Map from category name to the record shape that category produces */
export type RecordMap = object;

export type CategoryName<M extends RecordMap> = keyof M & string;

export interface QueryOptions {
  /** Deadline for this query in ms */
  timeoutMs: number;
  /** Aborted when the caller gives up on the query */
  signal?: AbortSignal;
}

/**
 * The system-query capability the snapshot core depends on:
 * run one category's query and return its current rows.
 *
 * Sources have an explicit lifecycle. Queries are only valid between
 * `open()` and `close()`, and must tolerate being issued concurrently.
 */
export interface DataSource<M extends RecordMap> {
  open(): Promise<void>;
  close(): Promise<void>;
  query<K extends CategoryName<M>>(category: K, options: QueryOptions): Promise<M[K][]>;
  querySync<K extends CategoryName<M>>(category: K, options: QueryOptions): M[K][];
}

/** One category's view of a data source, as consumed by a category snapshot */
export interface CategorySource<R> {
  query(options: QueryOptions): Promise<R[]>;
  querySync(options: QueryOptions): R[];
}

export function bindCategory<M extends RecordMap, K extends CategoryName<M>>(
  dataSource: DataSource<M>,
  category: K,
): CategorySource<M[K]> {
  return {
    query: (options) => dataSource.query(category, options),
    querySync: (options) => dataSource.querySync(category, options),
  };
}

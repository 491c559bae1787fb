import type { RecordMap, SourceManifest } from '@hostsnap/shared';

/** How one category is queried: a command to run and a parser for its stdout */
export interface CategoryHandler<R> {
  command: string;
  args: string[];
  /** Turns raw stdout into records. Throws on malformed output */
  parse: (stdout: string) => R[];
  /** Pass stdout through the secret scrubber before parsing */
  scrub?: boolean;
}

/** One handler per category, typed by the record shape it produces */
export type HandlerMap<M extends RecordMap> = { [K in keyof M]: CategoryHandler<M[K]> };

/** A group of related categories with its manifest and handlers */
export interface SourceGroup {
  manifest: SourceManifest;
  handlers: Record<string, CategoryHandler<unknown>>;
}

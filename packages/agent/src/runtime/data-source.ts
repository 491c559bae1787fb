import { execFile, execFileSync } from 'node:child_process';
import { promisify } from 'node:util';
import type {
  CategoryDefinition,
  CategoryName,
  DataSource,
  QueryOptions,
  RecordMap,
} from '@hostsnap/shared';
import type { CategoryHandler, HandlerMap } from '@hostsnap/sources';
import { type Logger, logger as rootLogger } from '../logger.js';
import { type SystemChecker, checkCategoryRequirements, createSystemChecker } from '../system/scanner.js';
import {
  DataSourceClosedError,
  QueryFailure,
  QueryTimeoutError,
  errorMessage,
} from './errors.js';
import { type ScrubPattern, buildPatterns, scrubString } from './scrubber.js';

const execFileAsync = promisify(execFile);

/** Largest stdout a single query may produce */
export const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface ExecOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export type ExecFn = (command: string, args: string[], options: ExecOptions) => Promise<string>;
export type ExecSyncFn = (command: string, args: string[], options: ExecOptions) => string;

/** Default exec function that shells out to real commands */
async function defaultExec(command: string, args: string[], options: ExecOptions): Promise<string> {
  const { stdout } = await execFileAsync(command, args, {
    timeout: options.timeoutMs,
    maxBuffer: MAX_OUTPUT_BYTES,
    signal: options.signal,
    encoding: 'utf8',
  });
  return stdout;
}

function defaultExecSync(command: string, args: string[], options: ExecOptions): string {
  return execFileSync(command, args, {
    timeout: options.timeoutMs,
    maxBuffer: MAX_OUTPUT_BYTES,
    encoding: 'utf8',
    stdio: ['ignore', 'pipe', 'pipe'],
  });
}

/** Child-process errors carry `code: 'ETIMEDOUT'` (sync) or a SIGTERM kill (async) on timeout */
function isExecTimeout(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if ('code' in err && err.code === 'ETIMEDOUT') return true;
  return 'killed' in err && err.killed === true && 'signal' in err && err.signal === 'SIGTERM';
}

export interface ExecDataSourceOptions<M extends RecordMap> {
  handlers: HandlerMap<M>;
  /** Requirements checked on open; categories without a definition are assumed available */
  definitions?: ReadonlyMap<string, CategoryDefinition>;
  exec?: ExecFn;
  execSync?: ExecSyncFn;
  checker?: SystemChecker;
  scrubPatterns?: ScrubPattern[];
  logger?: Logger;
}

type Status = 'idle' | 'open' | 'closed';

/**
 * Data source that answers each category by running a local command and
 * parsing its stdout. Queries are independent child processes, so any
 * number may run at once.
 */
export class ExecDataSource<M extends RecordMap> implements DataSource<M> {
  private readonly handlers: HandlerMap<M>;
  private readonly definitions: ReadonlyMap<string, CategoryDefinition>;
  private readonly exec: ExecFn;
  private readonly execSync: ExecSyncFn;
  private readonly checker: SystemChecker;
  private readonly scrubPatterns: ScrubPattern[];
  private readonly log: Logger;
  private status: Status = 'idle';
  private unavailable = new Map<string, string[]>();
  private inflight = new Set<AbortController>();

  constructor(options: ExecDataSourceOptions<M>) {
    this.handlers = options.handlers;
    this.definitions = options.definitions ?? new Map();
    this.exec = options.exec ?? defaultExec;
    this.execSync = options.execSync ?? defaultExecSync;
    this.checker = options.checker ?? createSystemChecker();
    this.scrubPatterns = options.scrubPatterns ?? buildPatterns();
    this.log = options.logger ?? rootLogger;
  }

  get isOpen(): boolean {
    return this.status === 'open';
  }

  /**
   * Checks every handled category's required commands. Categories with a
   * missing command stay unavailable and fail fast until the next open.
   */
  async open(): Promise<void> {
    if (this.status === 'open') return;

    const handled = [...this.definitions.values()].filter((d) =>
      Object.hasOwn(this.handlers, d.name),
    );
    this.unavailable = new Map();
    for (const result of checkCategoryRequirements(handled, this.checker)) {
      if (!result.available) {
        this.unavailable.set(result.category, result.missingCommands);
        this.log.warn(
          { category: result.category, missing: result.missingCommands },
          'Category unavailable on this host',
        );
      }
    }

    this.status = 'open';
    this.log.debug({ categories: Object.keys(this.handlers).length }, 'Data source opened');
  }

  /** Aborts in-flight queries; later queries fail with DataSourceClosedError */
  async close(): Promise<void> {
    if (this.status === 'closed') return;
    this.status = 'closed';
    for (const controller of this.inflight) controller.abort();
    this.inflight.clear();
    this.log.debug('Data source closed');
  }

  /** Categories found unavailable at open, with the commands they lack */
  unavailableCategories(): ReadonlyMap<string, string[]> {
    return this.unavailable;
  }

  async query<K extends CategoryName<M>>(category: K, options: QueryOptions): Promise<M[K][]> {
    const handler = this.prepare(category);

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (options.signal?.aborted) controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    this.inflight.add(controller);

    try {
      const stdout = await this.exec(handler.command, handler.args, {
        timeoutMs: options.timeoutMs,
        signal: controller.signal,
      });
      if (this.status !== 'open') throw new DataSourceClosedError(category);
      return this.parse(category, handler, stdout);
    } catch (err: unknown) {
      throw this.toFailure(category, err, options.timeoutMs, controller.signal.aborted);
    } finally {
      this.inflight.delete(controller);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  querySync<K extends CategoryName<M>>(category: K, options: QueryOptions): M[K][] {
    const handler = this.prepare(category);

    let stdout: string;
    try {
      stdout = this.execSync(handler.command, handler.args, { timeoutMs: options.timeoutMs });
    } catch (err: unknown) {
      throw this.toFailure(category, err, options.timeoutMs, false);
    }
    return this.parse(category, handler, stdout);
  }

  private prepare<K extends CategoryName<M>>(category: K): CategoryHandler<M[K]> {
    if (this.status !== 'open') throw new DataSourceClosedError(category);

    if (!Object.hasOwn(this.handlers, category)) {
      throw new QueryFailure(category, `Unknown category "${category}"`);
    }

    const missing = this.unavailable.get(category);
    if (missing) {
      throw new QueryFailure(
        category,
        `Category "${category}" is unavailable: missing command(s) ${missing.join(', ')}`,
      );
    }

    return this.handlers[category];
  }

  private parse<K extends CategoryName<M>>(
    category: K,
    handler: CategoryHandler<M[K]>,
    stdout: string,
  ): M[K][] {
    const text = handler.scrub ? scrubString(stdout, this.scrubPatterns) : stdout;
    try {
      return handler.parse(text);
    } catch (err: unknown) {
      throw new QueryFailure(category, `Malformed output for "${category}": ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private toFailure(
    category: string,
    err: unknown,
    timeoutMs: number,
    aborted: boolean,
  ): QueryFailure {
    if (err instanceof QueryFailure) return err;
    if (aborted && this.status !== 'open') return new DataSourceClosedError(category);
    if (aborted) {
      return new QueryFailure(category, `Query for "${category}" was aborted`, { cause: err });
    }
    if (isExecTimeout(err)) return new QueryTimeoutError(category, timeoutMs);
    return new QueryFailure(category, `Query for "${category}" failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

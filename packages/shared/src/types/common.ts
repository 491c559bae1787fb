import { z } from 'zod';

export const FirstRefreshPolicy = z.enum(['unchanged', 'changed']);
export type FirstRefreshPolicy = z.infer<typeof FirstRefreshPolicy>;

export const RefreshMode = z.enum(['sync', 'async']);
export type RefreshMode = z.infer<typeof RefreshMode>;

export const Platform = z.enum(['linux', 'darwin', 'win32']);
export type Platform = z.infer<typeof Platform>;

/** Default per-query deadline in milliseconds */
export const DEFAULT_QUERY_TIMEOUT_MS = 30_000;

/** Default cap on category refreshes running at once */
export const DEFAULT_REFRESH_CONCURRENCY = 8;

/** Default watch interval in milliseconds */
export const DEFAULT_WATCH_INTERVAL_MS = 60_000;

/** Lower bound for the watch interval */
export const MIN_WATCH_INTERVAL_MS = 1_000;

/** Longest delay a Node timer honours; larger values fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

import {
  type HardwareRecords,
  hardwareHandlers,
  hardwareSource,
} from './hardware/index.js';
import {
  type OperatingSystemRecords,
  operatingSystemHandlers,
  operatingSystemSource,
} from './operating-system/index.js';
import type { HandlerMap } from './types.js';
import { createSourceRegistry, listCategoryDefinitions } from './validation.js';

export type { CategoryHandler, HandlerMap, SourceGroup } from './types.js';
export type {
  FilesystemRecord,
  OperatingSystemRecords,
  ProcessRecord,
  ServiceRecord,
  ThreadRecord,
  UserRecord,
} from './operating-system/index.js';
export type {
  BlockDeviceRecord,
  HardwareRecords,
  NetworkInterfaceRecord,
} from './hardware/index.js';
export { operatingSystemSource, operatingSystemHandlers } from './operating-system/index.js';
export { hardwareSource, hardwareHandlers } from './hardware/index.js';
export {
  SourceValidationError,
  createSourceRegistry,
  listCategoryDefinitions,
  validateSourceGroup,
} from './validation.js';

/** Record shape of every built-in category, keyed by category name */
export interface CategoryRecords extends OperatingSystemRecords, HardwareRecords {}

export type BuiltinCategory = keyof CategoryRecords;

/** Union of all built-in record shapes */
export type HostRecord = CategoryRecords[BuiltinCategory];

export const categoryHandlers: HandlerMap<CategoryRecords> = {
  ...operatingSystemHandlers,
  ...hardwareHandlers,
};

/** Registry of all built-in source groups, keyed by group name */
export const sourceRegistry = createSourceRegistry([operatingSystemSource, hardwareSource]);

/** Built-in category definitions, keyed by category name */
export const categoryDefinitions = listCategoryDefinitions(sourceRegistry);

export function isBuiltinCategory(name: string): name is BuiltinCategory {
  return Object.hasOwn(categoryHandlers, name);
}

/** Built-in category names in registry order */
export const BUILTIN_CATEGORIES: readonly BuiltinCategory[] = [...categoryDefinitions.keys()].filter(
  isBuiltinCategory,
);

import type { HandlerMap, SourceGroup } from '../types.js';
import { operatingSystemManifest } from './manifest.js';
import { type FilesystemRecord, filesystems } from './queries/filesystems.js';
import { type ProcessRecord, processes } from './queries/processes.js';
import { type ServiceRecord, services } from './queries/services.js';
import { type ThreadRecord, threads } from './queries/threads.js';
import { type UserRecord, users } from './queries/users.js';

export type { FilesystemRecord, ProcessRecord, ServiceRecord, ThreadRecord, UserRecord };

export interface OperatingSystemRecords {
  processes: ProcessRecord;
  threads: ThreadRecord;
  services: ServiceRecord;
  filesystems: FilesystemRecord;
  users: UserRecord;
}

export const operatingSystemHandlers: HandlerMap<OperatingSystemRecords> = {
  processes,
  threads,
  services,
  filesystems,
  users,
};

export const operatingSystemSource: SourceGroup = {
  manifest: operatingSystemManifest,
  handlers: operatingSystemHandlers,
};

import type { SourceManifest } from '@hostsnap/shared';

export const operatingSystemManifest: SourceManifest = {
  name: 'operating-system',
  version: '0.3.0',
  description: 'Operating system state: processes, threads, services, filesystems, user accounts',
  platforms: ['linux'],
  categories: [
    {
      name: 'processes',
      description: 'Process table with parent, owner, state and command line',
      timeout: 10_000,
      requires: { commands: ['ps'] },
    },
    {
      name: 'threads',
      description: 'Thread table (one row per LWP)',
      timeout: 15_000,
      requires: { commands: ['ps'] },
    },
    {
      name: 'services',
      description: 'systemd service units and their load/active state',
      timeout: 10_000,
      requires: { commands: ['systemctl'] },
    },
    {
      name: 'filesystems',
      description: 'Mounted filesystems and their usage',
      timeout: 10_000,
      requires: { commands: ['df'] },
    },
    {
      name: 'users',
      description: 'User accounts from the passwd database',
      timeout: 10_000,
      requires: { commands: ['getent'] },
    },
  ],
};

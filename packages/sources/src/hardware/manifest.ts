import type { SourceManifest } from '@hostsnap/shared';

export const hardwareManifest: SourceManifest = {
  name: 'hardware',
  version: '0.2.0',
  description: 'Hardware inventory: block devices and network interfaces',
  platforms: ['linux'],
  categories: [
    {
      name: 'block-devices',
      description: 'Disks, partitions and other block devices with size and mount point',
      timeout: 10_000,
      requires: { commands: ['lsblk'] },
    },
    {
      name: 'network-interfaces',
      description: 'Network links with MAC address, MTU and operational state',
      timeout: 10_000,
      requires: { commands: ['ip'] },
    },
  ],
};

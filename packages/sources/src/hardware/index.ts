import type { HandlerMap, SourceGroup } from '../types.js';
import { hardwareManifest } from './manifest.js';
import { type BlockDeviceRecord, blockDevices } from './queries/block-devices.js';
import { type NetworkInterfaceRecord, networkInterfaces } from './queries/network-interfaces.js';

export type { BlockDeviceRecord, NetworkInterfaceRecord };

export interface HardwareRecords {
  'block-devices': BlockDeviceRecord;
  'network-interfaces': NetworkInterfaceRecord;
}

export const hardwareHandlers: HandlerMap<HardwareRecords> = {
  'block-devices': blockDevices,
  'network-interfaces': networkInterfaces,
};

export const hardwareSource: SourceGroup = {
  manifest: hardwareManifest,
  handlers: hardwareHandlers,
};

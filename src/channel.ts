import { createBLEChannel } from './ble-channel';
import type { ChannelOptions } from './channel-core';
import { createSPPChannel } from './spp-channel';
import type { DeviceDescriptor, TransportChannel } from './types';

export type ChannelFactory = (
  device: DeviceDescriptor,
  options?: ChannelOptions,
) => TransportChannel;

/**
 * Creates the channel matching the device's transport kind.
 */
export const createChannel: ChannelFactory = (device, options = {}) => {
  switch (device.kind) {
    case 'ble':
      return createBLEChannel(device, options);
    case 'classic':
      return createSPPChannel(device, options);
  }
};

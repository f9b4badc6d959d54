import {
  type ChannelOptions,
  createChannelCore,
  type Link,
  type LinkDriver,
} from './channel-core';
import type { ClassicDeviceDescriptor, TransportChannel } from './types';

/**
 * Link driver for classic Serial Port Profile modules.
 */
export function createSPPLinkDriver(device: ClassicDeviceDescriptor): LinkDriver {
  return {
    name: 'SPPChannel',

    async open(hooks): Promise<Link> {
      const socket = await device.handle.open();
      const stopData = socket.onData(hooks.onData);
      const stopClose = socket.onClose(hooks.onLinkLost);

      return {
        write: (bytes) => socket.write(bytes),
        async close(): Promise<void> {
          stopData();
          stopClose();
          await socket.close();
        },
      };
    },
  };
}

/**
 * Creates a channel to a classic SPP module (HC-05, HC-06).
 */
export function createSPPChannel(
  device: ClassicDeviceDescriptor,
  options: ChannelOptions = {},
): TransportChannel {
  return createChannelCore(device, createSPPLinkDriver(device), options);
}

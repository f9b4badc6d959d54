import {
  type ChannelOptions,
  createChannelCore,
  type Link,
  type LinkDriver,
} from './channel-core';
import {
  BLE_NOTIFICATION_TIMEOUT_MS,
  BLE_WRITE_TIMEOUT_MS,
} from './constants';
import { createTaggedLogger } from './logger';
import {
  findUartCharacteristic,
  startNotifications,
  writeWithTimeout,
} from './transport';
import type {
  BLEDeviceDescriptor,
  BLEGATTCharacteristic,
  TransportChannel,
} from './types';

/**
 * Link driver for BLE UART modules: connects, locates the `ffe1`
 * characteristic and subscribes to its notifications.
 */
export function createBLELinkDriver(
  device: BLEDeviceDescriptor,
  options: ChannelOptions = {},
): LinkDriver {
  const logger = createTaggedLogger('BLEChannel', options.logger);
  const notificationTimeoutMs =
    options.notificationTimeoutMs ?? BLE_NOTIFICATION_TIMEOUT_MS;
  const writeTimeoutMs = options.writeTimeoutMs ?? BLE_WRITE_TIMEOUT_MS;

  return {
    name: 'BLEChannel',

    async open(hooks): Promise<Link> {
      const session = await device.handle.connect();
      const stopDisconnectListener =
        session.onDisconnect?.(hooks.onLinkLost) ?? null;

      let char: BLEGATTCharacteristic;
      let stopNotify: () => Promise<void>;
      try {
        char = await findUartCharacteristic(session, device.address);
        stopNotify = await startNotifications(char, hooks.onData, {
          timeoutMs: notificationTimeoutMs,
          logger,
        });
      } catch (err) {
        stopDisconnectListener?.();
        // Idempotent; findUartCharacteristic may already have disconnected
        await session.disconnect().catch((e: unknown) => {
          logger.warn('Error releasing session after failed setup:', e);
        });
        throw err;
      }

      return {
        write: (bytes) => writeWithTimeout(char, bytes, writeTimeoutMs),
        async close(): Promise<void> {
          stopDisconnectListener?.();
          await stopNotify();
          await session.disconnect();
        },
      };
    },
  };
}

/**
 * Creates a channel to a BLE UART module (HM-10, BT-05, AT-09).
 */
export function createBLEChannel(
  device: BLEDeviceDescriptor,
  options: ChannelOptions = {},
): TransportChannel {
  return createChannelCore(device, createBLELinkDriver(device, options), options);
}

import { type ChannelFactory, createChannel } from './channel';
import type { ChannelOptions } from './channel-core';
import { NoActiveConnectionError } from './errors';
import { createEventEmitter, type TypedEventEmitter } from './event-emitter';
import { createTaggedLogger, type Logger } from './logger';
import type {
  ConnectionState,
  DeviceDescriptor,
  TransportChannel,
} from './types';

/**
 * Events emitted by the connection manager.
 */
export type ConnectionManagerEvents = {
  connectionStateChange: {
    device: DeviceDescriptor;
    from: ConnectionState;
    to: ConnectionState;
  };
  /** The active link dropped without `disconnect()` being called. */
  connectionLost: { device: DeviceDescriptor };
};

export interface ConnectionManager {
  /**
   * Connects to a device, tearing down the current channel first so that
   * only one physical link exists at a time.
   * @throws {ConnectionError} If the link cannot be established
   */
  connect(device: DeviceDescriptor): Promise<void>;

  /**
   * Disconnects the active channel. Safe to call when not connected.
   */
  disconnect(): Promise<void>;

  /**
   * Sends a command on the active channel.
   * @throws {NoActiveConnectionError} If no channel is active
   * @throws {SendError} If the transport rejects the write
   */
  send(command: string): Promise<void>;

  /**
   * Inbound byte chunks of the active channel.
   * @throws {NoActiveConnectionError} If no channel is active
   */
  receive(): AsyncIterable<Uint8Array>;

  getActiveDevice(): DeviceDescriptor | null;
  getConnectionState(): ConnectionState;
  isConnected(): boolean;

  readonly events: TypedEventEmitter<ConnectionManagerEvents>;
}

export interface CreateConnectionManagerOptions extends ChannelOptions {
  /**
   * Builds the channel for a descriptor.
   * @default createChannel
   */
  channelFactory?: ChannelFactory;
}

/**
 * Creates the owner of the single active transport channel.
 *
 * @example
 * ```typescript
 * const connections = createConnectionManager();
 * await connections.connect(device);
 * await connections.send('3');
 * ```
 */
export function createConnectionManager(
  options: CreateConnectionManagerOptions = {},
): ConnectionManager {
  const { channelFactory = createChannel, ...channelOptions } = options;
  const logger = createTaggedLogger('ConnectionManager', options.logger);
  const events = createEventEmitter<ConnectionManagerEvents>({
    logger: options.logger,
  });

  let active: TransportChannel | null = null;
  let stopWatching: (() => void) | null = null;

  // Connection mutex to prevent overlapping connects
  let connectionLock: Promise<void> = Promise.resolve();

  /**
   * Acquires the connection lock and returns a release function.
   */
  async function acquireConnectionLock(): Promise<() => void> {
    const previousLock = connectionLock;
    let releaseLock: () => void = () => {};
    connectionLock = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });
    await previousLock;
    return releaseLock;
  }

  function watch(channel: TransportChannel): () => void {
    const { device } = channel;
    return channel.onStateChange((from, to) => {
      events.emit('connectionStateChange', { device, from, to });
      if (from === 'connected' && to === 'disconnected' && active === channel) {
        logger.warn(`Lost connection to ${device.name} (${device.address})`);
        active = null;
        events.emit('connectionLost', { device });
      }
    });
  }

  /**
   * Tears down the active channel. The reference is cleared before the
   * teardown so the watcher does not report it as a lost link.
   */
  async function dropActive(): Promise<void> {
    const channel = active;
    const unwatch = stopWatching;
    active = null;
    stopWatching = null;
    if (!channel) {
      unwatch?.();
      return;
    }
    try {
      await channel.disconnect();
    } finally {
      unwatch?.();
    }
  }

  async function connect(device: DeviceDescriptor): Promise<void> {
    const releaseLock = await acquireConnectionLock();
    try {
      await dropActive();

      const channel = channelFactory(device, channelOptions);
      active = channel;
      stopWatching = watch(channel);

      try {
        await channel.connect();
      } catch (err) {
        if (active === channel) {
          active = null;
        }
        throw err;
      }
      logger.debug?.(`Active channel: ${device.kind} ${device.address}`);
    } finally {
      releaseLock();
    }
  }

  // Not serialized: a disconnect must be able to cancel a pending connect
  function disconnect(): Promise<void> {
    return dropActive();
  }

  function requireActive(): TransportChannel {
    if (!active) {
      throw new NoActiveConnectionError();
    }
    return active;
  }

  return {
    connect,
    disconnect,
    send: async (command) => requireActive().send(command),
    receive: () => requireActive().receive(),
    getActiveDevice: () => active?.device ?? null,
    getConnectionState: () => active?.getConnectionState() ?? 'disconnected',
    isConnected: () => active?.getConnectionState() === 'connected',
    events,
  };
}

import { createChunkQueue } from './chunk-queue';
import { BLE_CONNECTION_TIMEOUT_MS } from './constants';
import {
  ConnectFailedError,
  ConnectionError,
  ConnectTimeoutError,
  NotConnectedError,
  SendError,
  StateViolationError,
  TimeoutError,
  withTimeout,
} from './errors';
import { createTaggedLogger, type Logger } from './logger';
import { createStateMachine, type TransitionTable } from './state-machine';
import type {
  ConnectionState,
  DeviceDescriptor,
  TransportChannel,
} from './types';
import { encodeCommand } from './transport';

/**
 * Valid channel transitions:
 * - disconnected -> connecting
 * - connecting -> connected | failed | disconnected (cancelled)
 * - connected -> disconnected
 * - failed -> disconnected
 *
 * There is no way back to 'connecting': a channel is single use.
 */
const CHANNEL_TRANSITIONS: TransitionTable<ConnectionState> = {
  disconnected: ['connecting'],
  connecting: ['connected', 'failed', 'disconnected'],
  connected: ['disconnected'],
  failed: ['disconnected'],
};

/**
 * Options shared by both transport backends.
 */
export interface ChannelOptions {
  /**
   * Bound on establishing the link, in milliseconds.
   * @default 15000
   */
  connectTimeoutMs?: number;
  /**
   * Timeout for enabling BLE notifications.
   * @default 15000
   */
  notificationTimeoutMs?: number;
  /**
   * Timeout for a single BLE write.
   * @default 10000
   */
  writeTimeoutMs?: number;
  logger?: Logger;
}

/** Callbacks a backend uses to report inbound traffic. */
export interface LinkHooks {
  onData(chunk: Uint8Array): void;
  /** The link dropped without being asked to. */
  onLinkLost(): void;
}

/**
 * An open physical link, as produced by a backend.
 */
export interface Link {
  /** Resolves once the bytes are flushed to the transport. */
  write(bytes: Uint8Array): Promise<void>;
  /**
   * Removes inbound subscriptions, then tears the link down.
   * May throw; the channel logs and swallows teardown errors.
   */
  close(): Promise<void>;
}

/**
 * The backend-specific part of a channel: how to open a link.
 */
export interface LinkDriver {
  /** Tag used in log messages */
  readonly name: string;
  open(hooks: LinkHooks): Promise<Link>;
}

function toConnectionError(err: unknown, address: string): ConnectionError {
  if (err instanceof ConnectionError) return err;
  if (err instanceof TimeoutError) {
    return new ConnectTimeoutError(address, err.timeout);
  }
  return new ConnectFailedError(address, err);
}

/**
 * Builds a transport channel around a backend driver. The channel owns
 * the lifecycle (state, single use, teardown ordering, inbound queue);
 * the driver only knows how to move bytes.
 */
export function createChannelCore(
  device: DeviceDescriptor,
  driver: LinkDriver,
  options: ChannelOptions = {},
): TransportChannel {
  const logger = createTaggedLogger(driver.name, options.logger);
  const connectTimeoutMs =
    options.connectTimeoutMs ?? BLE_CONNECTION_TIMEOUT_MS;
  const stateMachine = createStateMachine(
    CHANNEL_TRANSITIONS,
    'disconnected',
    { name: driver.name, logger: options.logger },
  );
  const inbound = createChunkQueue();

  let link: Link | null = null;
  let used = false;
  let teardown: Promise<void> | null = null;

  function transitionState(to: ConnectionState): void {
    if (stateMachine.canTransition(to)) {
      stateMachine.transition(to);
    }
  }

  async function closeLink(): Promise<void> {
    const current = link;
    link = null;
    if (!current) return;
    try {
      await current.close();
    } catch (e) {
      logger.warn(
        `Error while closing link to ${device.address}:`,
        e instanceof Error ? e.message : String(e),
      );
    }
  }

  function handleLinkLost(): void {
    if (teardown || stateMachine.getState() !== 'connected') return;
    logger.warn(`Link to ${device.name} (${device.address}) lost`);
    // Let the consumer drain what already arrived
    inbound.end();
    teardown = closeLink().then(() => transitionState('disconnected'));
  }

  async function openLink(): Promise<Link> {
    const pending = driver.open({
      onData: (chunk) => inbound.push(chunk),
      onLinkLost: handleLinkLost,
    });
    try {
      return await withTimeout(pending, connectTimeoutMs, 'Connection');
    } catch (err) {
      if (err instanceof TimeoutError) {
        // The link may still come up after the deadline; drop it if so
        pending
          .then((late) => late.close())
          .catch((e: unknown) => {
            logger.debug?.('Late link failed or could not be closed:', e);
          });
      }
      throw err;
    }
  }

  async function connect(): Promise<void> {
    if (used) {
      throw new StateViolationError(
        'Channel already used; create a new channel to reconnect',
      );
    }
    used = true;
    transitionState('connecting');
    logger.debug?.(`Connecting to ${device.name} (${device.address})`);

    let opened: Link;
    try {
      opened = await openLink();
    } catch (err) {
      inbound.abort();
      transitionState('failed');
      const error = toConnectionError(err, device.address);
      logger.warn(`Connection to ${device.address} failed:`, error.message);
      throw error;
    }

    if (teardown) {
      // disconnect() ran while the link was coming up
      link = opened;
      await closeLink();
      throw new ConnectFailedError(
        device.address,
        new Error('Disconnected while connecting'),
      );
    }

    link = opened;
    transitionState('connected');
    logger.debug?.(`Connected to ${device.name} (${device.address})`);
  }

  async function doDisconnect(): Promise<void> {
    await closeLink();
    transitionState('disconnected');
    logger.debug?.(`Disconnected from ${device.address}`);
  }

  function disconnect(): Promise<void> {
    // Inbound delivery stops before the link closes, so bytes or errors
    // produced by a closing socket never reach the consumer.
    inbound.abort();
    if (!teardown) {
      teardown = doDisconnect();
    }
    return teardown;
  }

  async function send(command: string): Promise<void> {
    const current = link;
    if (stateMachine.getState() !== 'connected' || !current || teardown) {
      throw new NotConnectedError();
    }
    const bytes = encodeCommand(command);
    try {
      await current.write(bytes);
    } catch (err) {
      logger.warn(`Send of '${command}' failed:`, err);
      throw new SendError(command, err);
    }
    logger.debug?.(`Sent '${command}'`);
  }

  return {
    kind: device.kind,
    device,
    getConnectionState: () => stateMachine.getState(),
    connect,
    disconnect,
    send,
    receive: () => inbound,
    onStateChange: (callback) => stateMachine.onTransition(callback),
  };
}

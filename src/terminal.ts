import type { ChannelFactory } from './channel';
import {
  createConnectionManager,
  type ConnectionManager,
} from './connection-manager';
import {
  BLE_CONNECTION_TIMEOUT_MS,
  BLE_NOTIFICATION_TIMEOUT_MS,
  BLE_SCAN_TIMEOUT_MS,
  BLE_WRITE_TIMEOUT_MS,
  COIN_DENOMINATION,
} from './constants';
import { createDeviceDiscovery, type DeviceDiscovery } from './discovery';
import { NoActiveConnectionError, SessionActiveError } from './errors';
import { createTaggedLogger, type Logger } from './logger';
import { createProtocolDecoder, type ProtocolDecoder } from './protocol-decoder';
import {
  createSessionController,
  type SessionController,
  type SessionSnapshot,
} from './session-controller';
import { parseTicketPrice } from './ticket';
import type {
  BLEAdapter,
  ClassicAdapter,
  ConnectionState,
  DeviceDescriptor,
} from './types';

/**
 * Tunables of a terminal. All durations are in milliseconds.
 */
export interface TerminalConfig {
  scanTimeoutMs: number;
  connectTimeoutMs: number;
  notificationTimeoutMs: number;
  writeTimeoutMs: number;
  /** Value of one coin in currency units */
  denomination: number;
}

export const DEFAULT_TERMINAL_CONFIG: Readonly<TerminalConfig> = {
  scanTimeoutMs: BLE_SCAN_TIMEOUT_MS,
  connectTimeoutMs: BLE_CONNECTION_TIMEOUT_MS,
  notificationTimeoutMs: BLE_NOTIFICATION_TIMEOUT_MS,
  writeTimeoutMs: BLE_WRITE_TIMEOUT_MS,
  denomination: COIN_DENOMINATION,
};

const CONFIG_KEYS: readonly (keyof TerminalConfig)[] = [
  'scanTimeoutMs',
  'connectTimeoutMs',
  'notificationTimeoutMs',
  'writeTimeoutMs',
  'denomination',
];

/**
 * Merges overrides onto the defaults and validates the result.
 * @throws {RangeError} If a value is not a positive finite number, or the
 * denomination is not an integer
 */
export function resolveTerminalConfig(
  overrides: Partial<TerminalConfig> = {},
): TerminalConfig {
  const config: TerminalConfig = { ...DEFAULT_TERMINAL_CONFIG };
  for (const key of CONFIG_KEYS) {
    const value = overrides[key] ?? DEFAULT_TERMINAL_CONFIG[key];
    if (!Number.isFinite(value) || value <= 0) {
      throw new RangeError(`${key} must be a positive number, got ${value}`);
    }
    config[key] = value;
  }
  if (!Number.isInteger(config.denomination)) {
    throw new RangeError(
      `denomination must be an integer, got ${config.denomination}`,
    );
  }
  return config;
}

export interface CreateParkingTerminalOptions {
  /** BLE backend, e.g. `createNobleAdapter()` */
  ble?: BLEAdapter;
  /** Classic backend, e.g. `createSerialPortAdapter()` */
  classic?: ClassicAdapter;
  logger?: Logger;
  config?: Partial<TerminalConfig>;
  /** Overrides how channels are built; mostly useful in tests */
  channelFactory?: ChannelFactory;
}

/**
 * A payment terminal wired to a coin acceptor over Bluetooth.
 */
export interface ParkingTerminal {
  /** Runs device discovery and resolves with the catalog. */
  scan(): Promise<readonly DeviceDescriptor[]>;
  stopScan(): Promise<void>;
  getDevices(): readonly DeviceDescriptor[];

  /**
   * Stops any scan, connects to the device and starts feeding its inbound
   * stream to the session.
   * @throws {ConnectionError} If the link cannot be established
   */
  connect(device: DeviceDescriptor): Promise<void>;

  /**
   * Stops inbound processing, then disconnects. No chunk handled after
   * this call starts reaches the session.
   */
  disconnect(): Promise<void>;

  /**
   * Starts a payment session for a scanned ticket payload.
   * @throws {NoActiveConnectionError} If no device is connected
   * @throws {TicketFormatError} If the payload carries no price
   * @throws {SessionActiveError} If a session is already active
   * @throws {SendError} If the coin count cannot be sent
   */
  scanTicket(payload: string): Promise<SessionSnapshot>;

  /** Sends the coin count of the current session again. */
  resendRate(): Promise<void>;
  cancel(): void;
  finalize(): SessionSnapshot | null;

  getSession(): SessionSnapshot | null;
  getConnectionState(): ConnectionState;
  isConnected(): boolean;

  readonly config: Readonly<TerminalConfig>;
  readonly discovery: DeviceDiscovery;
  readonly connections: ConnectionManager;
  readonly sessions: SessionController;
  readonly decoder: ProtocolDecoder;
}

interface Pump {
  stopped: boolean;
  done: Promise<void>;
}

/**
 * Creates a terminal. Each call builds its own components; nothing is
 * shared between terminals.
 *
 * @example
 * ```typescript
 * const terminal = createParkingTerminal({
 *   ble: createNobleAdapter(),
 *   classic: createSerialPortAdapter(),
 * });
 * const [device] = await terminal.scan();
 * await terminal.connect(device);
 * terminal.sessions.events.on('paymentComplete', () => openBarrier());
 * await terminal.scanTicket('TICKET-ID-17|PRECIO:45');
 * ```
 */
export function createParkingTerminal(
  options: CreateParkingTerminalOptions = {},
): ParkingTerminal {
  const config = resolveTerminalConfig(options.config);
  const logger = createTaggedLogger('ParkingTerminal', options.logger);

  const discovery = createDeviceDiscovery({
    ble: options.ble,
    classic: options.classic,
    scanTimeoutMs: config.scanTimeoutMs,
    logger: options.logger,
  });
  const connections = createConnectionManager({
    channelFactory: options.channelFactory,
    connectTimeoutMs: config.connectTimeoutMs,
    notificationTimeoutMs: config.notificationTimeoutMs,
    writeTimeoutMs: config.writeTimeoutMs,
    logger: options.logger,
  });
  const decoder = createProtocolDecoder({ logger: options.logger });
  const sessions = createSessionController(connections, {
    denomination: config.denomination,
    logger: options.logger,
  });

  let pump: Pump | null = null;

  /**
   * Feeds the active channel's chunks to the decoder, one at a time.
   * Each chunk is handled synchronously, so setting `stopped` drops every
   * chunk not yet handled.
   */
  function startPump(stream: AsyncIterable<Uint8Array>): Pump {
    const state: Pump = { stopped: false, done: Promise.resolve() };
    state.done = (async () => {
      try {
        for await (const chunk of stream) {
          if (state.stopped) break;
          const events = decoder.push(chunk, sessions.getDecodeContext());
          for (const event of events) {
            sessions.onProtocolEvent(event);
          }
        }
      } catch (e) {
        logger.error('Inbound stream failed:', e);
      }
      logger.debug?.('Inbound stream ended');
    })();
    return state;
  }

  async function stopPump(): Promise<void> {
    const current = pump;
    pump = null;
    if (!current) return;
    current.stopped = true;
    await current.done;
  }

  async function connect(device: DeviceDescriptor): Promise<void> {
    const previous = pump;
    if (previous) previous.stopped = true;
    pump = null;
    await discovery.stopScan();
    await connections.connect(device);
    await previous?.done;
    pump = startPump(connections.receive());
  }

  async function disconnect(): Promise<void> {
    const stopping = stopPump();
    await connections.disconnect();
    await stopping;
  }

  async function scanTicket(payload: string): Promise<SessionSnapshot> {
    if (!connections.isConnected()) {
      throw new NoActiveConnectionError();
    }
    const price = parseTicketPrice(payload);
    if (sessions.getSession()) {
      throw new SessionActiveError();
    }
    // Leftovers from a previous session must not count towards this one
    decoder.reset();
    return sessions.startSession(price);
  }

  function cancel(): void {
    sessions.cancel();
    decoder.reset();
  }

  function finalize(): SessionSnapshot | null {
    const final = sessions.finalize();
    decoder.reset();
    return final;
  }

  return {
    scan: () => discovery.scan(),
    stopScan: () => discovery.stopScan(),
    getDevices: () => discovery.getDevices(),
    connect,
    disconnect,
    scanTicket,
    resendRate: () => sessions.resendRate(),
    cancel,
    finalize,
    getSession: () => sessions.getSession(),
    getConnectionState: () => connections.getConnectionState(),
    isConnected: () => connections.isConnected(),
    config,
    discovery,
    connections,
    sessions,
    decoder,
  };
}

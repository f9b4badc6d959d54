/**
 * Parking terminal core: settles ticket payments against a coin acceptor
 * reached over Bluetooth Low Energy or classic SPP.
 *
 * @packageDocumentation
 *
 * @example Quick Start
 * ```typescript
 * import {
 *   createNobleAdapter,
 *   createParkingTerminal,
 *   createSerialPortAdapter,
 * } from 'parking-terminal-ble';
 *
 * const terminal = createParkingTerminal({
 *   ble: createNobleAdapter(),
 *   classic: createSerialPortAdapter(),
 * });
 *
 * const devices = await terminal.scan();
 * await terminal.connect(devices[0]);
 *
 * terminal.sessions.events.on('coinReceived', ({ session }) => {
 *   console.log(`${session.coinsRemaining} coins to go`);
 * });
 * terminal.sessions.events.on('paymentComplete', () => openBarrier());
 *
 * await terminal.scanTicket('TICKET-ID-17|PRECIO:45');
 * ```
 *
 * @example Components on their own
 * ```typescript
 * import {
 *   createConnectionManager,
 *   createSessionController,
 * } from 'parking-terminal-ble';
 *
 * const connections = createConnectionManager({ connectTimeoutMs: 30000 });
 * const sessions = createSessionController(connections);
 * ```
 */

// ============================================================================
// TERMINAL - What most users need
// ============================================================================

export {
  createParkingTerminal,
  DEFAULT_TERMINAL_CONFIG,
  resolveTerminalConfig,
} from './terminal';
export type {
  CreateParkingTerminalOptions,
  ParkingTerminal,
  TerminalConfig,
} from './terminal';

export { createNobleAdapter } from './adapter/noble';
export type { NobleAdapterOptions } from './adapter/noble';
export {
  createSerialPortAdapter,
  identifyBluetoothPort,
} from './adapter/serialport';
export type {
  SerialPortAdapterOptions,
  SerialPortInfo,
} from './adapter/serialport';

export type {
  ConnectionState,
  DeviceDescriptor,
  TransportChannel,
  TransportKind,
} from './types';

// ============================================================================
// ERRORS - For error handling
// ============================================================================

export {
  CharacteristicNotFoundError,
  ConnectFailedError,
  ConnectionError,
  ConnectTimeoutError,
  NoActiveConnectionError,
  NoActiveSessionError,
  NotConnectedError,
  SendError,
  SessionActiveError,
  StateViolationError,
  TicketFormatError,
  TimeoutError,
} from './errors';

// ============================================================================
// COMPONENTS - For custom wiring
// ============================================================================

export { createDeviceDiscovery } from './discovery';
export type {
  DeviceDiscovery,
  DeviceDiscoveryOptions,
  DiscoveryEvents,
} from './discovery';

export { createConnectionManager } from './connection-manager';
export type {
  ConnectionManager,
  ConnectionManagerEvents,
  CreateConnectionManagerOptions,
} from './connection-manager';

export { createBLEChannel } from './ble-channel';
export { createSPPChannel } from './spp-channel';
export { createChannel } from './channel';
export type { ChannelFactory } from './channel';
export type { ChannelOptions } from './channel-core';

export { createProtocolDecoder, decodeChunk } from './protocol-decoder';
export type {
  DecodeContext,
  DecodeResult,
  ProtocolAnomaly,
  ProtocolDecoder,
  ProtocolEvent,
} from './protocol-decoder';

export { createSessionController } from './session-controller';
export type {
  CommandSink,
  SessionController,
  SessionControllerOptions,
  SessionEvents,
  SessionPhase,
  SessionSnapshot,
} from './session-controller';

export {
  coinsRequiredFor,
  createTicket,
  formatTicket,
  parseTicket,
  parseTicketPrice,
} from './ticket';
export type { Ticket } from './ticket';

// ============================================================================
// BACKENDS - For plugging in another Bluetooth stack
// ============================================================================

export type {
  BLEAdapter,
  BLEAdvertisement,
  BLEConnectedSession,
  BLEDeviceDescriptor,
  BLEGATTCharacteristic,
  BLEGATTService,
  BLEPeripheral,
  ClassicAdapter,
  ClassicBondedDevice,
  ClassicDeviceDescriptor,
  SPPEndpoint,
  SPPSocket,
} from './types';

export type { TypedEventEmitter } from './event-emitter';

// ============================================================================
// CONFIGURATION - For custom logging
// ============================================================================

/** Custom logger interface */
export type { Logger } from './logger';
export { enableDebugLogging, resetLogger, setLogger } from './logger';

/**
 * Bluetooth technology behind a device.
 * - 'ble': Bluetooth Low Energy module emulating a UART over GATT
 * - 'classic': Bluetooth classic module speaking Serial Port Profile
 */
export type TransportKind = 'ble' | 'classic';

/**
 * Connection lifecycle state of a transport channel.
 * - 'disconnected': No link (initial, or torn down)
 * - 'connecting': Link being established
 * - 'connected': Link up, notifications flowing
 * - 'failed': Connection attempt failed
 */
export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'failed';

interface DeviceDescriptorBase {
  /** Advertised or bonded name. May be a placeholder. */
  readonly name: string;
  /** Transport-level address; unique within a discovery session. */
  readonly address: string;
}

export interface BLEDeviceDescriptor extends DeviceDescriptorBase {
  readonly kind: 'ble';
  readonly handle: BLEPeripheral;
}

export interface ClassicDeviceDescriptor extends DeviceDescriptorBase {
  readonly kind: 'classic';
  readonly handle: SPPEndpoint;
}

/**
 * A discovered device, tagged by transport kind.
 * The handle is the backend-specific object used to open the link.
 */
export type DeviceDescriptor = BLEDeviceDescriptor | ClassicDeviceDescriptor;

// ============================================================================
// BLE collaborator
// ============================================================================

/**
 * One advertisement observed during a BLE scan.
 */
export interface BLEAdvertisement {
  address: string;
  /** Advertised local name; empty when the device advertises none. */
  name: string;
  peripheral: BLEPeripheral;
}

/**
 * A BLE device that can be connected to.
 */
export interface BLEPeripheral {
  readonly address: string;
  /**
   * Opens the physical link.
   * @throws Error if the link cannot be established
   */
  connect(): Promise<BLEConnectedSession>;
}

/**
 * Represents an established BLE connection session.
 * Provides access to GATT services and connection lifecycle management.
 *
 * @remarks
 * Implementers should ensure that:
 * - `getPrimaryServices()` returns all available GATT services
 * - `disconnect()` cleanly terminates the connection
 * - `onDisconnect()` fires when the device disconnects unexpectedly
 */
export interface BLEConnectedSession {
  /**
   * Retrieves all primary GATT services from the connected device.
   */
  getPrimaryServices(): Promise<BLEGATTService[]>;

  /**
   * Disconnects from the BLE device.
   * Should be idempotent - safe to call multiple times.
   */
  disconnect(): Promise<void>;

  /**
   * Registers a callback for unexpected disconnection events
   * (out of range, powered off, etc.).
   * @returns A function to unregister the callback
   */
  onDisconnect?(callback: () => void): () => void;
}

/**
 * Represents a BLE GATT service.
 */
export interface BLEGATTService {
  /** The UUID of this service (short or 128-bit form) */
  uuid: string;

  getCharacteristics(): Promise<BLEGATTCharacteristic[]>;
}

/**
 * Represents a BLE GATT characteristic.
 */
export interface BLEGATTCharacteristic {
  uuid: string;

  /**
   * Writes a value and waits for the acknowledgment.
   * Some UART modules do not support write-without-response, so the
   * terminal always writes with response.
   */
  writeValueWithResponse(value: Uint8Array): Promise<void>;

  /** Enables notification delivery for this characteristic. */
  startNotifications(): Promise<void>;

  stopNotifications(): Promise<void>;

  /**
   * Registers a listener for notified values.
   * @returns A function to unregister the listener
   */
  onValueChanged(listener: (value: Uint8Array) => void): () => void;
}

/**
 * Adapter interface for BLE discovery.
 * Implement it to plug in a Bluetooth backend (noble, React Native, ...).
 */
export interface BLEAdapter {
  /**
   * Starts an active radio scan. Resolves once scanning is under way;
   * advertisements keep arriving until `stopScan()`.
   */
  startScan(onAdvertisement: (advertisement: BLEAdvertisement) => void): Promise<void>;

  /** Stops the radio scan. Safe to call when no scan is running. */
  stopScan(): Promise<void>;
}

// ============================================================================
// Classic (SPP) collaborator
// ============================================================================

/**
 * A device the operating system has already paired with.
 */
export interface ClassicBondedDevice {
  address: string;
  /** Null when the OS could not resolve a name. */
  name: string | null;
  endpoint: SPPEndpoint;
}

export interface SPPEndpoint {
  readonly address: string;
  /**
   * Opens a Serial Port Profile socket to the device.
   * @throws Error on socket failure
   */
  open(): Promise<SPPSocket>;
}

/**
 * An open SPP byte-stream socket.
 */
export interface SPPSocket {
  /** Writes bytes; resolves once they are flushed to the transport. */
  write(data: Uint8Array): Promise<void>;
  /** @returns A function to unregister the listener */
  onData(listener: (data: Uint8Array) => void): () => void;
  /** Fires when the remote side or the OS closes the socket. */
  onClose(listener: () => void): () => void;
  close(): Promise<void>;
}

/**
 * Adapter interface for classic Bluetooth.
 * Classic devices are never scanned for; only bonded devices are listed.
 */
export interface ClassicAdapter {
  getBondedDevices(): Promise<ClassicBondedDevice[]>;
}

// ============================================================================
// Transport channel
// ============================================================================

/**
 * A live link to one device, independent of the Bluetooth technology.
 * Owned exclusively by the connection manager.
 */
export interface TransportChannel {
  readonly kind: TransportKind;
  readonly device: DeviceDescriptor;

  getConnectionState(): ConnectionState;

  /**
   * Establishes the link. A channel can be connected only once.
   * @throws {ConnectionError} If the link cannot be established
   */
  connect(): Promise<void>;

  /**
   * Stops inbound delivery, then tears the link down.
   * Idempotent; never throws.
   */
  disconnect(): Promise<void>;

  /**
   * Sends a command followed by the line terminator and waits for the
   * bytes to be flushed.
   * @throws {NotConnectedError} If the channel is not connected
   * @throws {SendError} On transport I/O failure
   */
  send(command: string): Promise<void>;

  /**
   * Raw inbound chunks, in arrival order. Ends when the link drops or the
   * channel is disconnected. Can be iterated only once.
   */
  receive(): AsyncIterable<Uint8Array>;

  /**
   * Registers a callback for connection state changes.
   * @returns A function to unregister the callback
   */
  onStateChange(
    callback: (from: ConnectionState, to: ConnectionState) => void,
  ): () => void;
}

import type { Logger } from './logger';
import type {
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

export const UART_SERVICE_UUID = '0000ffe0-0000-1000-8000-00805f9b34fb';
export const UART_CHARACTERISTIC_UUID = '0000ffe1-0000-1000-8000-00805f9b34fb';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function text(data: Uint8Array): string {
  return decoder.decode(data);
}

async function wait(delay: number | Promise<void>): Promise<void> {
  if (typeof delay === 'number') {
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
    return;
  }
  await delay;
}

// ============================================================================
// BLE
// ============================================================================

export interface MockCharacteristicOptions {
  uuid?: string;
  writeDelay?: number | Promise<void>;
  writeShouldFail?: boolean;
  writeFailError?: Error;
  startNotificationsDelay?: number | Promise<void>;
  startNotificationsShouldFail?: boolean;
  startNotificationsFailError?: Error;
  stopNotificationsShouldFail?: boolean;
}

export interface MockCharacteristic extends BLEGATTCharacteristic {
  simulateNotification(data: Uint8Array | string): void;
  getWrittenValues(): Uint8Array[];
  getWrittenText(): string[];
  getListenerCount(): number;
  wasStartNotificationsCalled(): boolean;
  wasStopNotificationsCalled(): boolean;
  setWriteDelay(delay: number | Promise<void>): void;
}

export function createMockCharacteristic(
  options: MockCharacteristicOptions = {},
): MockCharacteristic {
  const {
    uuid = UART_CHARACTERISTIC_UUID,
    writeShouldFail = false,
    writeFailError = new Error('Write failed'),
    startNotificationsDelay = 0,
    startNotificationsShouldFail = false,
    startNotificationsFailError = new Error('startNotifications failed'),
    stopNotificationsShouldFail = false,
  } = options;

  const listeners = new Set<(value: Uint8Array) => void>();
  const writtenValues: Uint8Array[] = [];
  let startNotificationsCalled = false;
  let stopNotificationsCalled = false;
  let writeDelay: number | Promise<void> = options.writeDelay ?? 0;

  return {
    uuid,

    async writeValueWithResponse(value: Uint8Array): Promise<void> {
      await wait(writeDelay);
      if (writeShouldFail) {
        throw writeFailError;
      }
      writtenValues.push(value);
    },

    setWriteDelay(delay: number | Promise<void>): void {
      writeDelay = delay;
    },

    async startNotifications(): Promise<void> {
      startNotificationsCalled = true;
      await wait(startNotificationsDelay);
      if (startNotificationsShouldFail) {
        throw startNotificationsFailError;
      }
    },

    async stopNotifications(): Promise<void> {
      stopNotificationsCalled = true;
      if (stopNotificationsShouldFail) {
        throw new Error('stopNotifications failed');
      }
    },

    onValueChanged(listener: (value: Uint8Array) => void): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    simulateNotification(data: Uint8Array | string): void {
      const value = typeof data === 'string' ? bytes(data) : data;
      for (const listener of [...listeners]) {
        listener(value);
      }
    },

    getWrittenValues(): Uint8Array[] {
      return [...writtenValues];
    },

    getWrittenText(): string[] {
      return writtenValues.map(text);
    },

    getListenerCount(): number {
      return listeners.size;
    },

    wasStartNotificationsCalled(): boolean {
      return startNotificationsCalled;
    },

    wasStopNotificationsCalled(): boolean {
      return stopNotificationsCalled;
    },
  };
}

export interface MockServiceOptions {
  uuid?: string;
  characteristics?: BLEGATTCharacteristic[];
}

export function createMockService(
  options: MockServiceOptions = {},
): BLEGATTService {
  const { uuid = UART_SERVICE_UUID, characteristics = [] } = options;

  return {
    uuid,
    async getCharacteristics(): Promise<BLEGATTCharacteristic[]> {
      return characteristics;
    },
  };
}

export interface MockSessionOptions {
  services?: BLEGATTService[];
  disconnectShouldFail?: boolean;
  disconnectFailError?: Error;
}

export interface MockConnectedSession extends BLEConnectedSession {
  onDisconnect(callback: () => void): () => void;
  /** Fires the disconnect listeners, as an out-of-range device would. */
  simulateDisconnect(): void;
  wasDisconnectCalled(): boolean;
  getDisconnectCallCount(): number;
  getDisconnectListenerCount(): number;
}

export function createMockConnectedSession(
  options: MockSessionOptions = {},
): MockConnectedSession {
  const {
    services = [],
    disconnectShouldFail = false,
    disconnectFailError = new Error('Disconnect failed'),
  } = options;

  const disconnectListeners = new Set<() => void>();
  let disconnectCallCount = 0;

  return {
    async getPrimaryServices(): Promise<BLEGATTService[]> {
      return services;
    },

    async disconnect(): Promise<void> {
      disconnectCallCount++;
      if (disconnectShouldFail) {
        throw disconnectFailError;
      }
    },

    onDisconnect(callback: () => void): () => void {
      disconnectListeners.add(callback);
      return () => {
        disconnectListeners.delete(callback);
      };
    },

    simulateDisconnect(): void {
      for (const listener of [...disconnectListeners]) {
        listener();
      }
    },

    wasDisconnectCalled(): boolean {
      return disconnectCallCount > 0;
    },

    getDisconnectCallCount(): number {
      return disconnectCallCount;
    },

    getDisconnectListenerCount(): number {
      return disconnectListeners.size;
    },
  };
}

export interface MockPeripheralOptions {
  address?: string;
  session?: BLEConnectedSession;
  connectDelay?: number | Promise<void>;
  connectShouldFail?: boolean;
  connectFailError?: Error;
}

export interface MockPeripheral extends BLEPeripheral {
  getConnectCallCount(): number;
}

export function createMockPeripheral(
  options: MockPeripheralOptions = {},
): MockPeripheral {
  const {
    address = 'AA:BB:CC:DD:EE:01',
    session = createMockConnectedSession(),
    connectDelay = 0,
    connectShouldFail = false,
    connectFailError = new Error('Connect failed'),
  } = options;

  let connectCallCount = 0;

  return {
    address,

    async connect(): Promise<BLEConnectedSession> {
      connectCallCount++;
      await wait(connectDelay);
      if (connectShouldFail) {
        throw connectFailError;
      }
      return session;
    },

    getConnectCallCount(): number {
      return connectCallCount;
    },
  };
}

export interface UartMockSetup {
  device: BLEDeviceDescriptor;
  peripheral: MockPeripheral;
  session: MockConnectedSession;
  service: BLEGATTService;
  char: MockCharacteristic;
}

/**
 * A BLE module exposing the UART service, ready to be connected.
 */
export function createUartMocks(
  options: {
    name?: string;
    address?: string;
    characteristic?: MockCharacteristicOptions;
    session?: Omit<MockSessionOptions, 'services'>;
    peripheral?: Omit<MockPeripheralOptions, 'address' | 'session'>;
  } = {},
): UartMockSetup {
  const { name = 'HM-10', address = 'AA:BB:CC:DD:EE:01' } = options;
  const char = createMockCharacteristic(options.characteristic);
  const service = createMockService({ characteristics: [char] });
  const session = createMockConnectedSession({
    ...options.session,
    services: [service],
  });
  const peripheral = createMockPeripheral({
    ...options.peripheral,
    address,
    session,
  });
  const device: BLEDeviceDescriptor = {
    kind: 'ble',
    name,
    address,
    handle: peripheral,
  };
  return { device, peripheral, session, service, char };
}

export interface MockBLEAdapterOptions {
  startScanShouldFail?: boolean;
  stopScanShouldFail?: boolean;
}

export interface MockBLEAdapter extends BLEAdapter {
  /** Delivers an advertisement while a scan is running. */
  simulateAdvertisement(
    advertisement: Partial<BLEAdvertisement> & { address: string },
  ): void;
  isScanning(): boolean;
  getStartScanCallCount(): number;
  getStopScanCallCount(): number;
}

export function createMockBLEAdapter(
  options: MockBLEAdapterOptions = {},
): MockBLEAdapter {
  const { startScanShouldFail = false, stopScanShouldFail = false } = options;

  let onAdvertisement: ((ad: BLEAdvertisement) => void) | null = null;
  let startScanCallCount = 0;
  let stopScanCallCount = 0;

  return {
    async startScan(listener): Promise<void> {
      startScanCallCount++;
      if (startScanShouldFail) {
        throw new Error('Bluetooth adapter is off');
      }
      onAdvertisement = listener;
    },

    async stopScan(): Promise<void> {
      stopScanCallCount++;
      onAdvertisement = null;
      if (stopScanShouldFail) {
        throw new Error('stopScan failed');
      }
    },

    simulateAdvertisement(advertisement): void {
      onAdvertisement?.({
        name: '',
        peripheral: createMockPeripheral({ address: advertisement.address }),
        ...advertisement,
      });
    },

    isScanning(): boolean {
      return onAdvertisement !== null;
    },

    getStartScanCallCount(): number {
      return startScanCallCount;
    },

    getStopScanCallCount(): number {
      return stopScanCallCount;
    },
  };
}

// ============================================================================
// Classic (SPP)
// ============================================================================

export interface MockSocketOptions {
  writeDelay?: number | Promise<void>;
  writeShouldFail?: boolean;
  writeFailError?: Error;
  closeShouldFail?: boolean;
}

export interface MockSPPSocket extends SPPSocket {
  simulateData(data: Uint8Array | string): void;
  /** Fires the close listeners, as a dropped link would. */
  simulateClose(): void;
  getWrittenText(): string[];
  wasCloseCalled(): boolean;
  getListenerCount(): number;
}

export function createMockSocket(
  options: MockSocketOptions = {},
): MockSPPSocket {
  const {
    writeDelay = 0,
    writeShouldFail = false,
    writeFailError = new Error('Broken pipe'),
    closeShouldFail = false,
  } = options;

  const dataListeners = new Set<(data: Uint8Array) => void>();
  const closeListeners = new Set<() => void>();
  const written: Uint8Array[] = [];
  let closeCalled = false;

  return {
    async write(data: Uint8Array): Promise<void> {
      await wait(writeDelay);
      if (writeShouldFail) {
        throw writeFailError;
      }
      written.push(data);
    },

    onData(listener: (data: Uint8Array) => void): () => void {
      dataListeners.add(listener);
      return () => {
        dataListeners.delete(listener);
      };
    },

    onClose(listener: () => void): () => void {
      closeListeners.add(listener);
      return () => {
        closeListeners.delete(listener);
      };
    },

    async close(): Promise<void> {
      closeCalled = true;
      if (closeShouldFail) {
        throw new Error('Socket close failed');
      }
    },

    simulateData(data: Uint8Array | string): void {
      const value = typeof data === 'string' ? bytes(data) : data;
      for (const listener of [...dataListeners]) {
        listener(value);
      }
    },

    simulateClose(): void {
      for (const listener of [...closeListeners]) {
        listener();
      }
    },

    getWrittenText(): string[] {
      return written.map(text);
    },

    wasCloseCalled(): boolean {
      return closeCalled;
    },

    getListenerCount(): number {
      return dataListeners.size + closeListeners.size;
    },
  };
}

export interface MockEndpointOptions {
  address?: string;
  socket?: SPPSocket;
  openDelay?: number | Promise<void>;
  openShouldFail?: boolean;
  openFailError?: Error;
}

export interface MockSPPEndpoint extends SPPEndpoint {
  getOpenCallCount(): number;
}

export function createMockEndpoint(
  options: MockEndpointOptions = {},
): MockSPPEndpoint {
  const {
    address = '98:D3:31:00:00:01',
    socket = createMockSocket(),
    openDelay = 0,
    openShouldFail = false,
    openFailError = new Error('read failed, socket might closed or timeout'),
  } = options;

  let openCallCount = 0;

  return {
    address,

    async open(): Promise<SPPSocket> {
      openCallCount++;
      await wait(openDelay);
      if (openShouldFail) {
        throw openFailError;
      }
      return socket;
    },

    getOpenCallCount(): number {
      return openCallCount;
    },
  };
}

export interface ClassicMockSetup {
  device: ClassicDeviceDescriptor;
  endpoint: MockSPPEndpoint;
  socket: MockSPPSocket;
}

/**
 * A bonded SPP module, ready to be connected.
 */
export function createClassicMocks(
  options: {
    name?: string;
    address?: string;
    socket?: MockSocketOptions;
    endpoint?: Omit<MockEndpointOptions, 'address' | 'socket'>;
  } = {},
): ClassicMockSetup {
  const { name = 'HC-05', address = '98:D3:31:00:00:01' } = options;
  const socket = createMockSocket(options.socket);
  const endpoint = createMockEndpoint({
    ...options.endpoint,
    address,
    socket,
  });
  const device: ClassicDeviceDescriptor = {
    kind: 'classic',
    name,
    address,
    handle: endpoint,
  };
  return { device, endpoint, socket };
}

export interface MockClassicAdapterOptions {
  devices?: ClassicBondedDevice[];
  delay?: number | Promise<void>;
  shouldFail?: boolean;
}

export interface MockClassicAdapter extends ClassicAdapter {
  getCallCount(): number;
}

export function createMockClassicAdapter(
  options: MockClassicAdapterOptions = {},
): MockClassicAdapter {
  const { devices = [], delay = 0, shouldFail = false } = options;
  let callCount = 0;

  return {
    async getBondedDevices(): Promise<ClassicBondedDevice[]> {
      callCount++;
      await wait(delay);
      if (shouldFail) {
        throw new Error('Bluetooth permission denied');
      }
      return devices;
    },

    getCallCount(): number {
      return callCount;
    },
  };
}

export function bondedDevice(
  address: string,
  name: string | null,
): ClassicBondedDevice {
  return { address, name, endpoint: createMockEndpoint({ address }) };
}

// ============================================================================
// Helpers
// ============================================================================

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: Error) => void = () => {};

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

export interface LogEntry {
  level: 'debug' | 'warn' | 'error';
  message: string;
  args: unknown[];
}

export interface MockLogger extends Logger {
  readonly entries: LogEntry[];
  messages(level?: LogEntry['level']): string[];
}

/**
 * A logger that records every call instead of printing it.
 */
export function createMockLogger(): MockLogger {
  const entries: LogEntry[] = [];

  return {
    entries,
    debug(message: string, ...args: unknown[]): void {
      entries.push({ level: 'debug', message, args });
    },
    warn(message: string, ...args: unknown[]): void {
      entries.push({ level: 'warn', message, args });
    },
    error(message: string, ...args: unknown[]): void {
      entries.push({ level: 'error', message, args });
    },
    messages(level?: LogEntry['level']): string[] {
      return entries
        .filter((entry) => level === undefined || entry.level === level)
        .map((entry) => entry.message);
    },
  };
}

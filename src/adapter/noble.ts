import { BLE_POWER_ON_TIMEOUT_MS } from '../constants';
import { TimeoutError } from '../errors';
import { createTaggedLogger, type Logger } from '../logger';
import type {
  BLEAdapter,
  BLEAdvertisement,
  BLEConnectedSession,
  BLEGATTCharacteristic,
  BLEGATTService,
  BLEPeripheral,
} from '../types';

// The part of @abandonware/noble this adapter relies on

type DataListener = (data: Buffer, isNotification: boolean) => void;

interface NobleCharacteristic {
  readonly uuid: string;
  writeAsync(data: Buffer, withoutResponse: boolean): Promise<void>;
  subscribeAsync(): Promise<void>;
  unsubscribeAsync(): Promise<void>;
  on(event: 'data', listener: DataListener): unknown;
  removeListener(event: 'data', listener: DataListener): unknown;
}

interface NobleService {
  readonly uuid: string;
  discoverCharacteristicsAsync(
    characteristicUUIDs?: string[],
  ): Promise<NobleCharacteristic[]>;
}

interface NoblePeripheral {
  readonly id: string;
  readonly address: string;
  readonly advertisement: { localName?: string };
  connectAsync(): Promise<void>;
  disconnectAsync(): Promise<void>;
  discoverServicesAsync(serviceUUIDs?: string[]): Promise<NobleService[]>;
  on(event: 'disconnect', listener: () => void): unknown;
  removeListener(event: 'disconnect', listener: () => void): unknown;
}

type StateListener = (state: string) => void;
type DiscoverListener = (peripheral: NoblePeripheral) => void;

interface NobleModule {
  readonly state: string;
  startScanningAsync(
    serviceUUIDs?: string[],
    allowDuplicates?: boolean,
  ): Promise<void>;
  stopScanningAsync(): Promise<void>;
  on(event: 'stateChange', listener: StateListener): unknown;
  on(event: 'discover', listener: DiscoverListener): unknown;
  removeListener(event: 'stateChange', listener: StateListener): unknown;
  removeListener(event: 'discover', listener: DiscoverListener): unknown;
}

/**
 * Loads noble on first use, so importing this library never touches the
 * Bluetooth stack.
 */
async function loadNoble(): Promise<NobleModule> {
  const mod: NobleModule & { default?: NobleModule } = await import(
    '@abandonware/noble'
  );
  return mod.default ?? mod;
}

function waitForPoweredOn(noble: NobleModule, timeoutMs: number): Promise<void> {
  if (noble.state === 'poweredOn') return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    const onStateChange = (state: string): void => {
      if (state !== 'poweredOn') return;
      clearTimeout(timer);
      noble.removeListener('stateChange', onStateChange);
      resolve();
    };
    const timer = setTimeout(() => {
      noble.removeListener('stateChange', onStateChange);
      reject(new TimeoutError('Bluetooth power-on', timeoutMs));
    }, timeoutMs);
    noble.on('stateChange', onStateChange);
  });
}

function adaptCharacteristic(char: NobleCharacteristic): BLEGATTCharacteristic {
  return {
    uuid: char.uuid,
    writeValueWithResponse: (value) =>
      char.writeAsync(Buffer.from(value), false),
    startNotifications: () => char.subscribeAsync(),
    stopNotifications: () => char.unsubscribeAsync(),
    onValueChanged(listener) {
      const handler: DataListener = (data) => {
        listener(new Uint8Array(data));
      };
      char.on('data', handler);
      return () => {
        char.removeListener('data', handler);
      };
    },
  };
}

function adaptService(service: NobleService): BLEGATTService {
  return {
    uuid: service.uuid,
    getCharacteristics: async () => {
      const chars = await service.discoverCharacteristicsAsync([]);
      return chars.map(adaptCharacteristic);
    },
  };
}

function createSession(
  peripheral: NoblePeripheral,
  logger: Logger,
): BLEConnectedSession {
  return {
    async getPrimaryServices(): Promise<BLEGATTService[]> {
      const services = await peripheral.discoverServicesAsync([]);
      return services.map(adaptService);
    },
    async disconnect(): Promise<void> {
      try {
        await peripheral.disconnectAsync();
      } catch (e) {
        logger.warn(
          'Error during GATT disconnect:',
          e instanceof Error ? e.message : String(e),
        );
      }
    },
    onDisconnect(callback: () => void): () => void {
      const handler = (): void => {
        callback();
      };
      peripheral.on('disconnect', handler);
      return () => {
        peripheral.removeListener('disconnect', handler);
      };
    },
  };
}

function adaptPeripheral(
  peripheral: NoblePeripheral,
  logger: Logger,
): BLEPeripheral {
  return {
    // macOS hides MAC addresses; noble reports an empty address there
    address: peripheral.address || peripheral.id,
    async connect(): Promise<BLEConnectedSession> {
      await peripheral.connectAsync();
      return createSession(peripheral, logger);
    },
  };
}

export interface NobleAdapterOptions {
  /**
   * How long to wait for the adapter to report `poweredOn`.
   * @default 10000
   */
  poweredOnTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Creates a BLE adapter backed by `@abandonware/noble`.
 *
 * @example
 * ```typescript
 * const discovery = createDeviceDiscovery({ ble: createNobleAdapter() });
 * const devices = await discovery.scan();
 * ```
 */
export function createNobleAdapter(
  options: NobleAdapterOptions = {},
): BLEAdapter {
  const logger = createTaggedLogger('NobleAdapter', options.logger);
  const poweredOnTimeoutMs =
    options.poweredOnTimeoutMs ?? BLE_POWER_ON_TIMEOUT_MS;

  let loading: Promise<NobleModule> | null = null;
  let discoverListener: DiscoverListener | null = null;

  function getNoble(): Promise<NobleModule> {
    if (!loading) {
      loading = loadNoble();
    }
    return loading;
  }

  function removeDiscoverListener(noble: NobleModule): void {
    if (discoverListener) {
      noble.removeListener('discover', discoverListener);
      discoverListener = null;
    }
  }

  return {
    async startScan(
      onAdvertisement: (advertisement: BLEAdvertisement) => void,
    ): Promise<void> {
      const noble = await getNoble();
      await waitForPoweredOn(noble, poweredOnTimeoutMs);

      removeDiscoverListener(noble);
      const listener: DiscoverListener = (peripheral) => {
        const adapted = adaptPeripheral(peripheral, logger);
        onAdvertisement({
          address: adapted.address,
          name: peripheral.advertisement.localName ?? '',
          peripheral: adapted,
        });
      };
      discoverListener = listener;
      noble.on('discover', listener);

      try {
        await noble.startScanningAsync([], false);
      } catch (err) {
        removeDiscoverListener(noble);
        throw err;
      }
      logger.debug?.('Scanning started');
    },

    async stopScan(): Promise<void> {
      if (!loading) return;
      const noble = await loading;
      removeDiscoverListener(noble);
      await noble.stopScanningAsync();
      logger.debug?.('Scanning stopped');
    },
  };
}

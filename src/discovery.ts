import { BLE_SCAN_TIMEOUT_MS } from './constants';
import { createEventEmitter, type TypedEventEmitter } from './event-emitter';
import { createTaggedLogger, type Logger } from './logger';
import type {
  BLEAdapter,
  BLEAdvertisement,
  ClassicAdapter,
  ClassicBondedDevice,
  DeviceDescriptor,
} from './types';

/**
 * Events emitted during discovery.
 */
export type DiscoveryEvents = {
  /** Snapshot of the catalog after every insertion */
  devices: readonly DeviceDescriptor[];
  scanStateChange: { scanning: boolean };
};

export interface DeviceDiscoveryOptions {
  /** BLE backend. Without it only bonded classic devices are listed. */
  ble?: BLEAdapter;
  /** Classic backend. Without it only BLE advertisements are listed. */
  classic?: ClassicAdapter;
  /**
   * Length of the active BLE scan window.
   * @default 10000
   */
  scanTimeoutMs?: number;
  logger?: Logger;
}

export interface DeviceDiscovery {
  /**
   * Clears the catalog and runs both enumeration strategies.
   * Resolves with the final catalog once the BLE window closes (timeout or
   * `stopScan()`) and the bonded-device query has settled. Calling it
   * while a scan is running returns the running scan.
   */
  scan(): Promise<readonly DeviceDescriptor[]>;

  /**
   * Stops the BLE radio scan and closes the scan window.
   * Safe to call when no scan is running; never touches connections.
   */
  stopScan(): Promise<void>;

  isScanning(): boolean;

  /** Current catalog, in first-seen order. */
  getDevices(): readonly DeviceDescriptor[];

  readonly events: TypedEventEmitter<DiscoveryEvents>;
}

/**
 * Creates a discovery service merging BLE advertisements and bonded
 * classic devices into one catalog, de-duplicated by address. When both
 * transports report the same address the first-seen entry wins.
 */
export function createDeviceDiscovery(
  options: DeviceDiscoveryOptions = {},
): DeviceDiscovery {
  const logger = createTaggedLogger('Discovery', options.logger);
  const scanTimeoutMs = options.scanTimeoutMs ?? BLE_SCAN_TIMEOUT_MS;
  const events = createEventEmitter<DiscoveryEvents>({
    logger: options.logger,
  });

  const catalog = new Map<string, DeviceDescriptor>();
  let inFlight: Promise<readonly DeviceDescriptor[]> | null = null;
  let bleScan: Promise<void> | null = null;
  let closeWindow: (() => void) | null = null;
  // Results are accepted only from the scan currently running
  let generation = 0;
  let activeGeneration: number | null = null;

  function snapshot(): readonly DeviceDescriptor[] {
    return [...catalog.values()];
  }

  function add(descriptor: DeviceDescriptor, scanGeneration: number): void {
    if (scanGeneration !== activeGeneration) return;
    if (catalog.has(descriptor.address)) return;
    catalog.set(descriptor.address, descriptor);
    logger.debug?.(
      `Found ${descriptor.kind} device ${descriptor.name} (${descriptor.address})`,
    );
    events.emit('devices', snapshot());
  }

  function onAdvertisement(
    ad: BLEAdvertisement,
    scanGeneration: number,
  ): void {
    if (ad.name.trim().length === 0) return;
    add(
      {
        kind: 'ble',
        name: ad.name,
        address: ad.address,
        handle: ad.peripheral,
      },
      scanGeneration,
    );
  }

  function onBonded(device: ClassicBondedDevice, scanGeneration: number): void {
    if (device.name === null || device.name.trim().length === 0) return;
    add(
      {
        kind: 'classic',
        name: device.name,
        address: device.address,
        handle: device.endpoint,
      },
      scanGeneration,
    );
  }

  async function scanBLE(adapter: BLEAdapter, scanGeneration: number): Promise<void> {
    const windowClosed = new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, scanTimeoutMs);
      closeWindow = () => {
        clearTimeout(timer);
        resolve();
      };
    });

    try {
      await adapter.startScan((ad) => onAdvertisement(ad, scanGeneration));
    } catch (e) {
      closeWindow?.();
      closeWindow = null;
      logger.warn('BLE scan failed:', e instanceof Error ? e.message : String(e));
      return;
    }

    await windowClosed;
    closeWindow = null;
    try {
      await adapter.stopScan();
    } catch (e) {
      logger.warn(
        'Error stopping BLE scan:',
        e instanceof Error ? e.message : String(e),
      );
    }
  }

  async function listBonded(
    adapter: ClassicAdapter,
    scanGeneration: number,
  ): Promise<void> {
    try {
      const bonded = await adapter.getBondedDevices();
      for (const device of bonded) {
        onBonded(device, scanGeneration);
      }
    } catch (e) {
      logger.warn(
        'Listing bonded devices failed:',
        e instanceof Error ? e.message : String(e),
      );
    }
  }

  async function runScan(): Promise<readonly DeviceDescriptor[]> {
    const scanGeneration = ++generation;
    activeGeneration = scanGeneration;
    catalog.clear();
    events.emit('devices', snapshot());
    events.emit('scanStateChange', { scanning: true });

    const tasks: Promise<void>[] = [];
    if (options.ble) {
      bleScan = scanBLE(options.ble, scanGeneration);
      tasks.push(bleScan);
    }
    if (options.classic) {
      tasks.push(listBonded(options.classic, scanGeneration));
    }

    try {
      await Promise.all(tasks);
    } finally {
      inFlight = null;
      bleScan = null;
      activeGeneration = null;
      events.emit('scanStateChange', { scanning: false });
    }
    return snapshot();
  }

  function scan(): Promise<readonly DeviceDescriptor[]> {
    if (!inFlight) {
      inFlight = runScan();
    }
    return inFlight;
  }

  async function stopScan(): Promise<void> {
    if (closeWindow) {
      // scanBLE stops the radio once its window closes
      closeWindow();
      closeWindow = null;
      await bleScan;
      return;
    }
    if (options.ble && !bleScan) {
      try {
        await options.ble.stopScan();
      } catch (e) {
        logger.warn(
          'Error stopping BLE scan:',
          e instanceof Error ? e.message : String(e),
        );
      }
    }
  }

  return {
    scan,
    stopScan,
    isScanning: () => inFlight !== null,
    getDevices: snapshot,
    events,
  };
}

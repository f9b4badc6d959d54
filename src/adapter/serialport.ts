import { CLASSIC_FALLBACK_NAME, SPP_DEFAULT_BAUD_RATE } from '../constants';
import { createTaggedLogger, type Logger } from '../logger';
import type {
  ClassicAdapter,
  ClassicBondedDevice,
  SPPEndpoint,
  SPPSocket,
} from '../types';

// The part of the serialport package this adapter relies on

type ErrorCallback = (error?: Error | null) => void;

interface SerialPortHandle {
  readonly isOpen: boolean;
  open(callback: ErrorCallback): void;
  write(data: Buffer, callback: (error: Error | null | undefined) => void): boolean;
  drain(callback: ErrorCallback): void;
  close(callback: ErrorCallback): void;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  removeListener(event: 'data', listener: (chunk: Buffer) => void): unknown;
  removeListener(event: 'close', listener: () => void): unknown;
}

/**
 * A serial port as listed by the operating system.
 */
export interface SerialPortInfo {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  pnpId?: string;
  locationId?: string;
  productId?: string;
  vendorId?: string;
}

interface SerialPortClass {
  new (options: {
    path: string;
    baudRate: number;
    autoOpen: boolean;
  }): SerialPortHandle;
  list(): Promise<SerialPortInfo[]>;
}

interface SerialPortModule {
  SerialPort: SerialPortClass;
}

async function loadSerialPort(): Promise<SerialPortClass> {
  const mod: SerialPortModule & { default?: SerialPortModule } = await import(
    'serialport'
  );
  return (mod.default ?? mod).SerialPort;
}

// Windows pnp ids of outgoing SPP ports end in `&<MAC>_C00000000`;
// incoming ports carry an all-zero address.
const BTHENUM_ADDRESS = /&([0-9A-F]{12})_/i;
const LINUX_RFCOMM = /^\/dev\/rfcomm\d+$/;
const MACOS_TTY = /^\/dev\/tty\.(.+)$/;
const MACOS_NON_SPP = /usb|Bluetooth-Incoming-Port|debug-console|wlan/i;

function formatAddress(hex: string): string {
  return hex.toUpperCase().match(/.{2}/g)?.join(':') ?? hex;
}

/**
 * Recognizes the ports the OS creates for paired SPP devices.
 * Returns `null` for any other port (USB adapters, incoming ports).
 */
export function identifyBluetoothPort(
  port: SerialPortInfo,
): { address: string; name: string | null } | null {
  if (port.pnpId?.toUpperCase().includes('BTHENUM')) {
    const mac = BTHENUM_ADDRESS.exec(port.pnpId)?.[1];
    if (!mac || /^0+$/.test(mac)) return null;
    return { address: formatAddress(mac), name: port.manufacturer ?? null };
  }

  if (LINUX_RFCOMM.test(port.path)) {
    return { address: port.path, name: port.manufacturer ?? null };
  }

  const tty = MACOS_TTY.exec(port.path);
  if (tty?.[1] && !MACOS_NON_SPP.test(tty[1])) {
    return { address: port.path, name: tty[1] };
  }

  return null;
}

export interface SerialPortAdapterOptions {
  /**
   * Baud rate of the SPP module.
   * @default 9600
   */
  baudRate?: number;
  logger?: Logger;
}

/**
 * Creates a classic Bluetooth adapter over the `serialport` package.
 * Bonded SPP devices appear as serial ports once paired (`/dev/rfcomm*`
 * bound with `rfcomm bind`, `COM` ports on Windows, `/dev/tty.*` on macOS).
 *
 * @example
 * ```typescript
 * const discovery = createDeviceDiscovery({
 *   classic: createSerialPortAdapter({ baudRate: 38400 }),
 * });
 * ```
 */
export function createSerialPortAdapter(
  options: SerialPortAdapterOptions = {},
): ClassicAdapter {
  const logger = createTaggedLogger('SerialPortAdapter', options.logger);
  const baudRate = options.baudRate ?? SPP_DEFAULT_BAUD_RATE;
  if (!Number.isInteger(baudRate) || baudRate <= 0) {
    throw new RangeError(`baudRate must be a positive integer, got ${baudRate}`);
  }

  let loading: Promise<SerialPortClass> | null = null;

  function getSerialPort(): Promise<SerialPortClass> {
    if (!loading) {
      loading = loadSerialPort();
    }
    return loading;
  }

  function openPort(port: SerialPortHandle): Promise<void> {
    return new Promise((resolve, reject) => {
      port.open((error) => (error ? reject(error) : resolve()));
    });
  }

  function createSocket(port: SerialPortHandle): SPPSocket {
    return {
      write(data: Uint8Array): Promise<void> {
        return new Promise((resolve, reject) => {
          port.write(Buffer.from(data), (error) => {
            if (error) {
              reject(error);
              return;
            }
            port.drain((drainError) =>
              drainError ? reject(drainError) : resolve(),
            );
          });
        });
      },
      onData(listener) {
        const handler = (chunk: Buffer): void => {
          listener(new Uint8Array(chunk));
        };
        port.on('data', handler);
        return () => {
          port.removeListener('data', handler);
        };
      },
      onClose(listener) {
        const handler = (): void => {
          listener();
        };
        port.on('close', handler);
        return () => {
          port.removeListener('close', handler);
        };
      },
      close(): Promise<void> {
        if (!port.isOpen) return Promise.resolve();
        return new Promise((resolve, reject) => {
          port.close((error) => (error ? reject(error) : resolve()));
        });
      },
    };
  }

  function createEndpoint(path: string, address: string): SPPEndpoint {
    return {
      address,
      async open(): Promise<SPPSocket> {
        const SerialPort = await getSerialPort();
        const port = new SerialPort({ path, baudRate, autoOpen: false });
        // An 'error' event without a listener would crash the process
        port.on('error', (error) => {
          logger.warn(`Port ${path} error:`, error.message);
        });
        await openPort(port);
        logger.debug?.(`Opened ${path} at ${baudRate} baud`);
        return createSocket(port);
      },
    };
  }

  return {
    async getBondedDevices(): Promise<ClassicBondedDevice[]> {
      const SerialPort = await getSerialPort();
      const ports = await SerialPort.list();
      const devices: ClassicBondedDevice[] = [];
      for (const port of ports) {
        const identified = identifyBluetoothPort(port);
        if (!identified) continue;
        devices.push({
          address: identified.address,
          name: identified.name ?? CLASSIC_FALLBACK_NAME,
          endpoint: createEndpoint(port.path, identified.address),
        });
      }
      return devices;
    },
  };
}

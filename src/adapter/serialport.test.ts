import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createSPPChannel } from '../spp-channel';
import { bytes, createMockLogger, flushPromises, text } from '../test-utils';
import type { ClassicBondedDevice } from '../types';
import {
  createSerialPortAdapter,
  identifyBluetoothPort,
  type SerialPortAdapterOptions,
  type SerialPortInfo,
} from './serialport';

const fake = vi.hoisted(() => {
  type Callback = (error?: Error | null) => void;
  type Listener = (...args: unknown[]) => void;

  const state: {
    ports: SerialPortInfo[];
    openError: Error | null;
    writeError: Error | null;
  } = { ports: [], openError: null, writeError: null };

  class FakePort {
    static instances: FakePort[] = [];
    static list = vi.fn(async () => state.ports);

    isOpen = false;
    closeCalls = 0;
    written: Buffer[] = [];
    private listeners = new Map<string, Set<Listener>>();

    constructor(
      readonly options: { path: string; baudRate: number; autoOpen: boolean },
    ) {
      FakePort.instances.push(this);
    }

    open(callback: Callback): void {
      if (state.openError) {
        callback(state.openError);
        return;
      }
      this.isOpen = true;
      callback(null);
    }

    write(data: Buffer, callback: (error: Error | null | undefined) => void) {
      if (state.writeError) {
        callback(state.writeError);
        return false;
      }
      this.written.push(data);
      callback(null);
      return true;
    }

    drain(callback: Callback): void {
      callback(null);
    }

    close(callback: Callback): void {
      this.closeCalls++;
      this.isOpen = false;
      callback(null);
      this.emit('close');
    }

    on(event: string, listener: Listener): this {
      let set = this.listeners.get(event);
      if (!set) {
        set = new Set();
        this.listeners.set(event, set);
      }
      set.add(listener);
      return this;
    }

    removeListener(event: string, listener: Listener): this {
      this.listeners.get(event)?.delete(listener);
      return this;
    }

    emit(event: string, ...args: unknown[]): void {
      for (const listener of [...(this.listeners.get(event) ?? [])]) {
        listener(...args);
      }
    }

    listenerCount(event: string): number {
      return this.listeners.get(event)?.size ?? 0;
    }
  }

  return { FakePort, state };
});

vi.mock('serialport', () => ({
  default: { SerialPort: fake.FakePort },
  SerialPort: fake.FakePort,
}));

const RFCOMM: SerialPortInfo = { path: '/dev/rfcomm0' };

async function openFirst(options: SerialPortAdapterOptions = {}) {
  fake.state.ports = [RFCOMM];
  const adapter = createSerialPortAdapter({
    logger: createMockLogger(),
    ...options,
  });
  const [device] = await adapter.getBondedDevices();
  if (!device) throw new Error('no bonded device');
  const socket = await device.endpoint.open();
  const port = fake.FakePort.instances.at(-1);
  if (!port) throw new Error('no port');
  return { device, socket, port };
}

beforeEach(() => {
  fake.FakePort.instances = [];
  fake.FakePort.list.mockClear();
  fake.state.ports = [];
  fake.state.openError = null;
  fake.state.writeError = null;
});

describe('identifyBluetoothPort', () => {
  it('reads the address from a Windows outgoing SPP port', () => {
    expect(
      identifyBluetoothPort({
        path: 'COM5',
        manufacturer: 'Microsoft',
        pnpId:
          'BTHENUM\\{00001101-0000-1000-8000-00805F9B34FB}_LOCALMFG&0002\\7&2A6B6A2A&0&98D331000001_C00000000',
      }),
    ).toEqual({ address: '98:D3:31:00:00:01', name: 'Microsoft' });
  });

  it('skips a Windows incoming port', () => {
    expect(
      identifyBluetoothPort({
        path: 'COM6',
        pnpId:
          'BTHENUM\\{00001101-0000-1000-8000-00805F9B34FB}_LOCALMFG&0000\\7&2A6B6A2A&0&000000000000_00000000',
      }),
    ).toBeNull();
  });

  it('accepts a Linux rfcomm device', () => {
    expect(identifyBluetoothPort(RFCOMM)).toEqual({
      address: '/dev/rfcomm0',
      name: null,
    });
  });

  it('names a macOS port after its device', () => {
    expect(identifyBluetoothPort({ path: '/dev/tty.HC-05-DevB' })).toEqual({
      address: '/dev/tty.HC-05-DevB',
      name: 'HC-05-DevB',
    });
  });

  it.each([
    '/dev/tty.Bluetooth-Incoming-Port',
    '/dev/tty.usbserial-1420',
    '/dev/tty.debug-console',
    '/dev/ttyUSB0',
    'COM3',
  ])('skips %s', (path) => {
    expect(identifyBluetoothPort({ path })).toBeNull();
  });
});

describe('createSerialPortAdapter', () => {
  it('rejects an invalid baud rate', () => {
    expect(() => createSerialPortAdapter({ baudRate: 0 })).toThrow(
      new RangeError('baudRate must be a positive integer, got 0'),
    );
  });

  describe('getBondedDevices', () => {
    it('lists only Bluetooth serial ports', async () => {
      fake.state.ports = [
        RFCOMM,
        { path: '/dev/ttyUSB0', manufacturer: 'FTDI' },
        { path: '/dev/tty.HC-06' },
      ];
      const adapter = createSerialPortAdapter();

      const devices = await adapter.getBondedDevices();

      expect(devices.map(({ address, name }) => ({ address, name }))).toEqual([
        { address: '/dev/rfcomm0', name: 'HC-05/06' },
        { address: '/dev/tty.HC-06', name: 'HC-06' },
      ]);
      expect(devices[0]?.endpoint.address).toBe('/dev/rfcomm0');
    });

    it('returns nothing without ports', async () => {
      const adapter = createSerialPortAdapter();
      await expect(adapter.getBondedDevices()).resolves.toEqual([]);
    });
  });

  describe('endpoint', () => {
    it('opens the port at the default baud rate', async () => {
      const { port } = await openFirst();

      expect(port.options).toEqual({
        path: '/dev/rfcomm0',
        baudRate: 9600,
        autoOpen: false,
      });
      expect(port.isOpen).toBe(true);
      expect(port.listenerCount('error')).toBe(1);
    });

    it('uses the configured baud rate', async () => {
      const { port } = await openFirst({ baudRate: 38400 });
      expect(port.options.baudRate).toBe(38400);
    });

    it('rejects when the port cannot be opened', async () => {
      fake.state.ports = [RFCOMM];
      fake.state.openError = new Error('Permission denied');
      const adapter = createSerialPortAdapter({ logger: createMockLogger() });
      const [device] = await adapter.getBondedDevices();

      await expect(device?.endpoint.open()).rejects.toThrow('Permission denied');
    });

    it('logs port errors', async () => {
      const logger = createMockLogger();
      const { port } = await openFirst({ logger });

      port.emit('error', new Error('Port disconnected'));

      expect(logger.entries).toContainEqual({
        level: 'warn',
        message: '[SerialPortAdapter] Port /dev/rfcomm0 error:',
        args: ['Port disconnected'],
      });
    });
  });

  describe('socket', () => {
    it('writes and drains', async () => {
      const { socket, port } = await openFirst();

      await socket.write(bytes('3\r\n'));

      expect(port.written.map((b) => b.toString())).toEqual(['3\r\n']);
    });

    it('rejects a failed write', async () => {
      const { socket } = await openFirst();
      fake.state.writeError = new Error('Write failed');

      await expect(socket.write(bytes('3\r\n'))).rejects.toThrow('Write failed');
    });

    it('delivers inbound data as Uint8Array until unsubscribed', async () => {
      const { socket, port } = await openFirst();
      const received: Uint8Array[] = [];

      const unsubscribe = socket.onData((data) => received.push(data));
      port.emit('data', Buffer.from('ST'));
      unsubscribe();
      port.emit('data', Buffer.from('$'));

      expect(received.map(text)).toEqual(['ST']);
      expect(port.listenerCount('data')).toBe(0);
    });

    it('reports a closed port', async () => {
      const { socket, port } = await openFirst();
      const closed = vi.fn();

      socket.onClose(closed);
      port.emit('close');

      expect(closed).toHaveBeenCalledTimes(1);
    });

    it('closes an open port once', async () => {
      const { socket, port } = await openFirst();

      await socket.close();
      await socket.close();

      expect(port.closeCalls).toBe(1);
    });
  });

  it('carries an SPP channel end to end', async () => {
    fake.state.ports = [RFCOMM];
    const adapter = createSerialPortAdapter({ logger: createMockLogger() });
    const [bonded]: ClassicBondedDevice[] = await adapter.getBondedDevices();
    if (!bonded) throw new Error('no bonded device');
    const channel = createSPPChannel({
      kind: 'classic',
      name: bonded.name ?? '',
      address: bonded.address,
      handle: bonded.endpoint,
    });

    await channel.connect();
    await channel.send('4');
    const port = fake.FakePort.instances[0];
    port?.emit('data', Buffer.from('ST$'));
    const chunks: string[] = [];
    const reading = (async () => {
      for await (const chunk of channel.receive()) {
        chunks.push(text(chunk));
      }
    })();
    await flushPromises();
    await channel.disconnect();
    await reading;

    expect(port?.written.map((b) => b.toString())).toEqual(['4\r\n']);
    expect(chunks).toEqual(['ST$']);
    expect(port?.closeCalls).toBe(1);
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  CharacteristicNotFoundError,
  ConnectFailedError,
  ConnectionError,
  ConnectTimeoutError,
  NoActiveConnectionError,
  NoActiveSessionError,
  normalizeError,
  NotConnectedError,
  SendError,
  SessionActiveError,
  StateViolationError,
  TicketFormatError,
  TimeoutError,
  withTimeout,
} from './errors';

describe('normalizeError', () => {
  it('passes Error instances through', () => {
    const err = new Error('Broken pipe');
    expect(normalizeError(err)).toBe(err);
  });

  it.each([
    ['socket closed', 'socket closed'],
    [-22, '-22'],
    [null, 'null'],
    [undefined, 'undefined'],
    [{ errno: 104, syscall: 'read' }, '{"errno":104,"syscall":"read"}'],
  ])('wraps %o', (value, message) => {
    const result = normalizeError(value);
    expect(result).toBeInstanceOf(Error);
    expect(result.message).toBe(message);
  });

  it('falls back to String() for values JSON cannot encode', () => {
    const link: Record<string, unknown> = { address: 'AA:BB:CC:DD:EE:01' };
    link['peer'] = link;
    expect(normalizeError(link).message).toBe('[object Object]');
  });
});

describe('withTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('settles with the wrapped promise when it wins', async () => {
    const write = withTimeout(Promise.resolve(3), 10000, 'BLE write');
    await expect(write).resolves.toBe(3);

    const refused = new Error('GATT operation failed');
    const failing = withTimeout(Promise.reject(refused), 10000, 'BLE write');
    await expect(failing).rejects.toBe(refused);
  });

  it('rejects with a labelled TimeoutError at the deadline', async () => {
    const stalled = withTimeout(new Promise<void>(() => {}), 15000, 'Connection');
    const caught = stalled.catch((e: unknown) => e);

    await vi.advanceTimersByTimeAsync(14999);
    expect(vi.getTimerCount()).toBe(1);
    await vi.advanceTimersByTimeAsync(1);

    const error = await caught;
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({
      operation: 'Connection',
      timeout: 15000,
      message: 'Connection timed out after 15000ms',
    });
  });

  it('leaves no timer behind once settled', async () => {
    await withTimeout(Promise.resolve(), 10000, 'BLE write');
    await withTimeout(Promise.reject(new Error('x')), 10000, 'BLE write').catch(
      () => undefined,
    );

    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('TimeoutError', () => {
  it('names itself and keeps the operation', () => {
    const err = new TimeoutError('BLE notification setup', 15000);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('TimeoutError');
    expect(err.operation).toBe('BLE notification setup');
    expect(err.timeout).toBe(15000);
  });
});

describe('ConnectionError family', () => {
  it('ConnectTimeoutError carries the address and timeout', () => {
    const err = new ConnectTimeoutError('AA:BB:CC:DD:EE:01', 15000);
    expect(err).toBeInstanceOf(ConnectionError);
    expect(err.name).toBe('ConnectTimeoutError');
    expect(err.address).toBe('AA:BB:CC:DD:EE:01');
    expect(err.timeout).toBe(15000);
    expect(err.message).toBe(
      'Connection to AA:BB:CC:DD:EE:01 timed out after 15000ms',
    );
  });

  it('CharacteristicNotFoundError names the missing UUIDs', () => {
    const err = new CharacteristicNotFoundError('AA:BB:CC:DD:EE:01');
    expect(err).toBeInstanceOf(ConnectionError);
    expect(err.name).toBe('CharacteristicNotFoundError');
    expect(err.message).toBe(
      'No UART characteristic (ffe0/ffe1) found on AA:BB:CC:DD:EE:01; module not supported',
    );
  });

  it('ConnectFailedError keeps the cause', () => {
    const cause = new Error('socket refused');
    const err = new ConnectFailedError('98:D3:31:00:00:01', cause);
    expect(err).toBeInstanceOf(ConnectionError);
    expect(err.name).toBe('ConnectFailedError');
    expect(err.cause).toBe(cause);
    expect(err.message).toBe(
      'Connection to 98:D3:31:00:00:01 failed: socket refused',
    );
  });

  it('ConnectFailedError accepts non-Error causes', () => {
    const err = new ConnectFailedError('98:D3:31:00:00:01', 'busy');
    expect(err.message).toBe('Connection to 98:D3:31:00:00:01 failed: busy');
  });
});

describe('SendError', () => {
  it('carries the command and cause', () => {
    const cause = new Error('Broken pipe');
    const err = new SendError('9', cause);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('SendError');
    expect(err.command).toBe('9');
    expect(err.cause).toBe(cause);
    expect(err.message).toBe("Failed to send '9': Broken pipe");
  });
});

describe('StateViolationError family', () => {
  it.each([
    [new NotConnectedError(), 'NotConnectedError', 'Not connected to device'],
    [
      new NoActiveConnectionError(),
      'NoActiveConnectionError',
      'No active Bluetooth connection',
    ],
    [
      new SessionActiveError(),
      'SessionActiveError',
      'A ticket session is already active',
    ],
    [
      new NoActiveSessionError(),
      'NoActiveSessionError',
      'No ticket session is active',
    ],
  ])('%s is a StateViolationError', (err, name, message) => {
    expect(err).toBeInstanceOf(StateViolationError);
    expect(err.name).toBe(name);
    expect(err.message).toBe(message);
  });
});

describe('TicketFormatError', () => {
  it('quotes the payload', () => {
    const err = new TicketFormatError('TICKET-ID-1');
    expect(err.name).toBe('TicketFormatError');
    expect(err.payload).toBe('TICKET-ID-1');
    expect(err.message).toBe("Invalid ticket payload: 'TICKET-ID-1'");
  });
});

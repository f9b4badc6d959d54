import { afterEach, describe, expect, it } from 'vitest';
import {
  ConnectionError,
  ConnectTimeoutError,
  createConnectionManager,
  createParkingTerminal,
  createProtocolDecoder,
  createSessionController,
  NoActiveConnectionError,
  resetLogger,
  setLogger,
} from './index';
import { createMockLogger } from './test-utils';

describe('createParkingTerminal', () => {
  it('starts idle without a Bluetooth backend', () => {
    const terminal = createParkingTerminal();

    expect(terminal.getConnectionState()).toBe('disconnected');
    expect(terminal.getSession()).toBeNull();
  });

  it('reports a missing connection through the exported error', async () => {
    const terminal = createParkingTerminal();

    await expect(terminal.scanTicket('PRECIO:5')).rejects.toBeInstanceOf(
      NoActiveConnectionError,
    );
  });
});

describe('components', () => {
  it('wire together without the terminal', () => {
    const connections = createConnectionManager({ connectTimeoutMs: 30000 });
    const sessions = createSessionController(connections);

    expect(connections.getActiveDevice()).toBeNull();
    expect(sessions.getSession()).toBeNull();
  });

  it('export the error hierarchy', () => {
    const error = new ConnectTimeoutError('AA:BB:CC:DD:EE:01', 15000);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error.message).toBe(
      'Connection to AA:BB:CC:DD:EE:01 timed out after 15000ms',
    );
  });
});

describe('setLogger', () => {
  afterEach(() => {
    resetLogger();
  });

  it('routes component logs to the custom logger', () => {
    const logger = createMockLogger();
    setLogger(logger);
    const decoder = createProtocolDecoder();

    decoder.push('P', { rateConfirmed: true, coinsReceived: 0, coinsRequired: 2 });

    expect(logger.messages('warn')).toEqual([
      '[ProtocolDecoder] Completion signal ignored: 0/2 coins',
    ]);
  });
});

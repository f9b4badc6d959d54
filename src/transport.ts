import {
  BLE_NOTIFICATION_TIMEOUT_MS,
  BLE_WRITE_TIMEOUT_MS,
  GATT_UART_CHARACTERISTIC_FRAGMENT,
  GATT_UART_SERVICE_FRAGMENT,
  LINE_TERMINATOR,
  uuidContains,
} from './constants';
import { CharacteristicNotFoundError, withTimeout } from './errors';
import { getLogger, type Logger } from './logger';
import type { BLEConnectedSession, BLEGATTCharacteristic } from './types';

/**
 * Locates the UART-emulation characteristic (`ffe1` inside service `ffe0`).
 * Disconnects the session before throwing when the module has none, so a
 * failed probe never leaves a dangling link.
 *
 * @throws {CharacteristicNotFoundError}
 */
export async function findUartCharacteristic(
  session: BLEConnectedSession,
  address: string,
): Promise<BLEGATTCharacteristic> {
  const services = await session.getPrimaryServices();

  for (const service of services) {
    if (!uuidContains(service.uuid, GATT_UART_SERVICE_FRAGMENT)) continue;
    const chars = await service.getCharacteristics();
    const match = chars.find((c) =>
      uuidContains(c.uuid, GATT_UART_CHARACTERISTIC_FRAGMENT),
    );
    if (match) return match;
  }

  await session.disconnect();
  throw new CharacteristicNotFoundError(address);
}

/**
 * Frames a command for the controller: ASCII text plus the line terminator.
 * Both backends send exactly these bytes.
 * @throws Error if the command is empty
 */
export function encodeCommand(command: string): Uint8Array {
  if (command.length === 0) {
    throw new Error('Empty command: nothing to send to the controller');
  }
  const framed = `${command}${LINE_TERMINATOR}`;
  const bytes = new Uint8Array(framed.length);
  for (let i = 0; i < framed.length; i++) {
    // Controller firmware only understands 7-bit ASCII
    bytes[i] = framed.charCodeAt(i) & 0x7f;
  }
  return bytes;
}

/**
 * Writes data to a characteristic with a timeout.
 * BLE writes can hang indefinitely, so every write goes through here.
 * @throws Error if data is empty
 */
export async function writeWithTimeout(
  char: BLEGATTCharacteristic,
  data: Uint8Array,
  timeoutMs: number = BLE_WRITE_TIMEOUT_MS,
): Promise<void> {
  if (data.byteLength === 0) {
    throw new Error(
      'Empty data: cannot write zero bytes to BLE characteristic',
    );
  }
  await withTimeout(char.writeValueWithResponse(data), timeoutMs, 'BLE write');
}

/**
 * Options for starting notifications.
 */
export interface StartNotificationsOptions {
  /** Timeout for starting notifications in milliseconds */
  timeoutMs?: number;
  /** Logger for error reporting. Falls back to global logger if not provided. */
  logger?: Logger;
}

/**
 * Starts notifications on a characteristic with timeout protection.
 * Returns a cleanup function that removes the listener first and then
 * stops notifications, so bytes delivered during teardown are never
 * forwarded.
 *
 * @param char - The characteristic to start notifications on
 * @param onData - Callback invoked when data is received
 * @throws TimeoutError if notification setup takes too long
 */
export async function startNotifications(
  char: BLEGATTCharacteristic,
  onData: (data: Uint8Array) => void,
  options: StartNotificationsOptions = {},
): Promise<() => Promise<void>> {
  const timeoutMs = options.timeoutMs ?? BLE_NOTIFICATION_TIMEOUT_MS;
  const logger = options.logger ?? getLogger();

  let active = true;
  const unsubscribe = char.onValueChanged((value) => {
    if (active && value.byteLength > 0) {
      onData(value);
    }
  });

  try {
    await withTimeout(
      char.startNotifications(),
      timeoutMs,
      'BLE notification setup',
    );
  } catch (err) {
    active = false;
    unsubscribe();
    throw err;
  }

  return async () => {
    if (!active) return;
    active = false;
    unsubscribe();
    try {
      await char.stopNotifications();
    } catch (e) {
      logger.warn(
        '[Transport] Error stopping notifications:',
        e instanceof Error ? e.message : String(e),
      );
    }
  };
}

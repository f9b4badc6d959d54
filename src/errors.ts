/**
 * Custom error class for timeout operations
 */
export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeout: number,
  ) {
    super(`${operation} timed out after ${timeout}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Base class for failures while establishing a link to a device.
 * The device stays selectable; callers may retry.
 */
export class ConnectionError extends Error {
  constructor(
    message: string,
    public readonly address: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class ConnectTimeoutError extends ConnectionError {
  constructor(
    address: string,
    public readonly timeout: number,
  ) {
    super(`Connection to ${address} timed out after ${timeout}ms`, address);
    this.name = 'ConnectTimeoutError';
  }
}

/**
 * Thrown when a BLE device exposes no UART-emulation characteristic.
 */
export class CharacteristicNotFoundError extends ConnectionError {
  constructor(address: string) {
    super(
      `No UART characteristic (ffe0/ffe1) found on ${address}; module not supported`,
      address,
    );
    this.name = 'CharacteristicNotFoundError';
  }
}

export class ConnectFailedError extends ConnectionError {
  constructor(address: string, cause: unknown) {
    super(
      `Connection to ${address} failed: ${normalizeError(cause).message}`,
      address,
      { cause },
    );
    this.name = 'ConnectFailedError';
  }
}

/**
 * Transport write failure. The session is left as it was so the
 * operator can retry.
 */
export class SendError extends Error {
  constructor(
    public readonly command: string,
    cause: unknown,
  ) {
    super(`Failed to send '${command}': ${normalizeError(cause).message}`, {
      cause,
    });
    this.name = 'SendError';
  }
}

/**
 * An operation was requested in a state that does not allow it.
 * Always rejected synchronously, never ignored.
 */
export class StateViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateViolationError';
  }
}

/**
 * Error thrown when a channel is asked to send without a live link.
 */
export class NotConnectedError extends StateViolationError {
  constructor() {
    super('Not connected to device');
    this.name = 'NotConnectedError';
  }
}

export class NoActiveConnectionError extends StateViolationError {
  constructor() {
    super('No active Bluetooth connection');
    this.name = 'NoActiveConnectionError';
  }
}

export class SessionActiveError extends StateViolationError {
  constructor() {
    super('A ticket session is already active');
    this.name = 'SessionActiveError';
  }
}

export class NoActiveSessionError extends StateViolationError {
  constructor() {
    super('No ticket session is active');
    this.name = 'NoActiveSessionError';
  }
}

/**
 * Error thrown when a scanned payload carries no usable price.
 */
export class TicketFormatError extends Error {
  constructor(public readonly payload: string) {
    super(`Invalid ticket payload: '${payload}'`);
    this.name = 'TicketFormatError';
  }
}

/**
 * Normalizes any thrown value into an Error instance.
 * Ensures consistent error handling throughout the codebase.
 */
export function normalizeError(e: unknown): Error {
  if (e instanceof Error) {
    return e;
  }

  if (e === null) {
    return new Error('null');
  }

  if (e === undefined) {
    return new Error('undefined');
  }

  if (typeof e === 'string') {
    return new Error(e);
  }

  if (typeof e === 'object') {
    try {
      return new Error(JSON.stringify(e));
    } catch {
      // Circular reference or other JSON error
      return new Error(String(e));
    }
  }

  return new Error(String(e));
}

/**
 * Wraps a promise with a timeout.
 * If the promise doesn't resolve/reject within the specified time,
 * rejects with a TimeoutError.
 *
 * **Important:** This does NOT cancel the underlying operation.
 * The original promise keeps running after the timeout fires, so a link
 * may still come up later. Callers that care must tear it down themselves.
 *
 * @param promise - The promise to wrap with a timeout
 * @param ms - Timeout duration in milliseconds
 * @param label - Descriptive label for the operation (used in error message)
 * @throws {TimeoutError} If the operation times out
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new TimeoutError(label, ms));
    }, ms);

    promise
      .then((value) => {
        clearTimeout(timeoutId);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}

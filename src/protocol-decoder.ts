import {
  PROTOCOL_BUFFER_CEILING,
  TOKEN_COIN,
  TOKEN_PAYMENT_COMPLETE,
  TOKEN_RATE_ACK,
} from './constants';
import { createTaggedLogger, type Logger } from './logger';

/**
 * A token recognized in the inbound stream.
 * - 'rate-confirmed': the coin acceptor acknowledged the coin count (`ST`)
 * - 'coin-received': one or more coins were inserted (`$` each)
 * - 'payment-complete': the acceptor reports the payment done (`P`)
 */
export type ProtocolEvent =
  | { type: 'rate-confirmed' }
  | { type: 'coin-received'; count: number }
  | { type: 'payment-complete' };

/**
 * Input the decoder could not act on. Anomalies are reported and
 * absorbed, never thrown.
 */
export type ProtocolAnomaly =
  | {
      type: 'premature-completion';
      coinsReceived: number;
      coinsRequired: number;
    }
  | { type: 'buffer-overflow'; length: number };

/**
 * Session facts the decoder needs to interpret a chunk.
 */
export interface DecodeContext {
  rateConfirmed: boolean;
  coinsReceived: number;
  coinsRequired: number;
}

export interface DecodeResult {
  /** Buffer to carry into the next chunk */
  buffer: string;
  events: ProtocolEvent[];
  anomalies: ProtocolAnomaly[];
}

function countOccurrences(text: string, token: string): number {
  let count = 0;
  let index = text.indexOf(token);
  while (index !== -1) {
    count++;
    index = text.indexOf(token, index + token.length);
  }
  return count;
}

/**
 * Appends a chunk to the buffer and extracts every complete token.
 *
 * Tokens are evaluated in a fixed order: `ST`, then `$`, then `P`. Coins
 * found in the same pass count towards a `P` in that pass. A buffer
 * longer than the ceiling after extraction is discarded.
 */
export function decodeChunk(
  buffer: string,
  chunk: string,
  context: DecodeContext,
): DecodeResult {
  let next = buffer + chunk;
  const events: ProtocolEvent[] = [];
  const anomalies: ProtocolAnomaly[] = [];

  if (next.includes(TOKEN_RATE_ACK)) {
    if (!context.rateConfirmed) {
      events.push({ type: 'rate-confirmed' });
    }
    next = next.replaceAll(TOKEN_RATE_ACK, '');
  }

  const coins = countOccurrences(next, TOKEN_COIN);
  if (coins > 0) {
    events.push({ type: 'coin-received', count: coins });
    next = next.replaceAll(TOKEN_COIN, '');
  }

  if (next.includes(TOKEN_PAYMENT_COMPLETE)) {
    const coinsReceived = context.coinsReceived + coins;
    if (context.coinsRequired > 0 && coinsReceived >= context.coinsRequired) {
      events.push({ type: 'payment-complete' });
    } else {
      anomalies.push({
        type: 'premature-completion',
        coinsReceived,
        coinsRequired: context.coinsRequired,
      });
    }
    next = next.replaceAll(TOKEN_PAYMENT_COMPLETE, '');
  }

  if (next.length > PROTOCOL_BUFFER_CEILING) {
    anomalies.push({ type: 'buffer-overflow', length: next.length });
    next = '';
  }

  return { buffer: next, events, anomalies };
}

export interface ProtocolDecoder {
  /**
   * Feeds one inbound chunk and returns the events it completed.
   * Bytes are decoded as a stream, so a character split across chunks is
   * reassembled.
   */
  push(chunk: Uint8Array | string, context: DecodeContext): ProtocolEvent[];
  /** Empties the buffer, e.g. when a new ticket session starts. */
  reset(): void;
  getBuffer(): string;
}

export interface ProtocolDecoderOptions {
  logger?: Logger;
}

/**
 * Creates a stateful decoder that owns the accumulation buffer.
 */
export function createProtocolDecoder(
  options: ProtocolDecoderOptions = {},
): ProtocolDecoder {
  const logger = createTaggedLogger('ProtocolDecoder', options.logger);
  let textDecoder = new TextDecoder();
  let buffer = '';

  function reportAnomaly(anomaly: ProtocolAnomaly): void {
    switch (anomaly.type) {
      case 'premature-completion':
        logger.warn(
          `Completion signal ignored: ${anomaly.coinsReceived}/${anomaly.coinsRequired} coins`,
        );
        break;
      case 'buffer-overflow':
        logger.warn(
          `Buffer cleared after reaching ${anomaly.length} characters`,
        );
        break;
    }
  }

  function push(
    chunk: Uint8Array | string,
    context: DecodeContext,
  ): ProtocolEvent[] {
    const text =
      typeof chunk === 'string'
        ? chunk
        : textDecoder.decode(chunk, { stream: true });
    const result = decodeChunk(buffer, text, context);
    buffer = result.buffer;
    logger.debug?.(`Received '${text}', buffer '${buffer}'`);
    for (const anomaly of result.anomalies) {
      reportAnomaly(anomaly);
    }
    return result.events;
  }

  function reset(): void {
    buffer = '';
    textDecoder = new TextDecoder();
  }

  return {
    push,
    reset,
    getBuffer: () => buffer,
  };
}

import {
  COIN_DENOMINATION,
  TICKET_FIELD_SEPARATOR,
  TICKET_ID_PREFIX,
  TICKET_MAX_COINS,
  TICKET_MAX_ID,
  TICKET_MIN_COINS,
  TICKET_PRICE_KEY,
} from './constants';
import { TicketFormatError } from './errors';

/**
 * A parking ticket as encoded in its QR payload.
 */
export interface Ticket {
  /** Numeric ticket id, `null` when the payload carries none */
  ticketId: number | null;
  /** Price in currency units */
  price: number;
}

const DIGITS = /^\d+$/;

function fields(payload: string): string[] {
  return payload.split(TICKET_FIELD_SEPARATOR).map((field) => field.trim());
}

/**
 * Number of coins needed to cover a price, rounding up.
 * @example coinsRequiredFor(42) // 9
 */
export function coinsRequiredFor(
  price: number,
  denomination: number = COIN_DENOMINATION,
): number {
  return Math.ceil(price / denomination);
}

/**
 * Extracts the price from a `TICKET-ID-<id>|PRECIO:<price>` payload.
 * Only the price field is required.
 * @throws {TicketFormatError} If no positive integer price is present
 */
export function parseTicketPrice(payload: string): number {
  const field = fields(payload).find((f) => f.startsWith(TICKET_PRICE_KEY));
  const value = field?.slice(TICKET_PRICE_KEY.length).trim() ?? '';
  if (!DIGITS.test(value)) {
    throw new TicketFormatError(payload);
  }
  const price = Number.parseInt(value, 10);
  if (price <= 0 || !Number.isSafeInteger(price)) {
    throw new TicketFormatError(payload);
  }
  return price;
}

/**
 * Parses a full ticket payload.
 * @throws {TicketFormatError} If no positive integer price is present
 */
export function parseTicket(payload: string): Ticket {
  const price = parseTicketPrice(payload);
  const idField = fields(payload).find((f) => f.startsWith(TICKET_ID_PREFIX));
  const idValue = idField?.slice(TICKET_ID_PREFIX.length) ?? '';
  const ticketId = DIGITS.test(idValue) ? Number.parseInt(idValue, 10) : null;
  return { ticketId, price };
}

/**
 * Formats a ticket as its QR payload.
 */
export function formatTicket(ticket: { ticketId: number; price: number }): string {
  return `${TICKET_ID_PREFIX}${ticket.ticketId}${TICKET_FIELD_SEPARATOR}${TICKET_PRICE_KEY}${ticket.price}`;
}

function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Issues a ticket with a random price of 1 to 9 coins.
 * @param random - Source of numbers in [0, 1)
 */
export function createTicket(
  random: () => number = Math.random,
): Ticket & { ticketId: number; payload: string } {
  const coins = randomInt(random, TICKET_MIN_COINS, TICKET_MAX_COINS);
  const price = coins * COIN_DENOMINATION;
  const ticketId = randomInt(random, 0, TICKET_MAX_ID);
  return { ticketId, price, payload: formatTicket({ ticketId, price }) };
}

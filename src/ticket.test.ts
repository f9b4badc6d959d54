import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { TicketFormatError } from './errors';
import {
  coinsRequiredFor,
  createTicket,
  formatTicket,
  parseTicket,
  parseTicketPrice,
} from './ticket';

function sequence(...values: number[]): () => number {
  let index = 0;
  return () => values[index++ % values.length] ?? 0;
}

describe('coinsRequiredFor', () => {
  it.each([
    [42, 9],
    [45, 9],
    [46, 10],
    [1, 1],
  ])('price %i needs %i coins', (price, coins) => {
    expect(coinsRequiredFor(price)).toBe(coins);
  });

  it('honors a custom denomination', () => {
    expect(coinsRequiredFor(45, 10)).toBe(5);
  });

  it('is the smallest coin count covering the price', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 1_000_000 }), (price) => {
        const coins = coinsRequiredFor(price);
        expect(coins * 5).toBeGreaterThanOrEqual(price);
        expect((coins - 1) * 5).toBeLessThan(price);
      }),
    );
  });
});

describe('parseTicketPrice', () => {
  it('reads the price field', () => {
    expect(parseTicketPrice('TICKET-ID-17|PRECIO:45')).toBe(45);
  });

  it('accepts fields in any order and surrounding spaces', () => {
    expect(parseTicketPrice('PRECIO:30|TICKET-ID-2')).toBe(30);
    expect(parseTicketPrice(' TICKET-ID-2 | PRECIO: 30 ')).toBe(30);
  });

  it('does not need a ticket id', () => {
    expect(parseTicketPrice('PRECIO:5')).toBe(5);
  });

  it.each([
    '',
    'TICKET-ID-17',
    'TICKET-ID-17|PRECIO:',
    'TICKET-ID-17|PRECIO:abc',
    'TICKET-ID-17|PRECIO:0',
    'TICKET-ID-17|PRECIO:-5',
    'TICKET-ID-17|PRECIO:4.5',
    'TICKET-ID-17|PRECIO:99999999999999999999',
  ])('rejects %j', (payload) => {
    expect(() => parseTicketPrice(payload)).toThrow(TicketFormatError);
  });

  it('quotes the payload in the error', () => {
    expect(() => parseTicketPrice('PRECIO:0')).toThrow(
      "Invalid ticket payload: 'PRECIO:0'",
    );
  });
});

describe('parseTicket', () => {
  it('reads the id and price', () => {
    expect(parseTicket('TICKET-ID-17|PRECIO:45')).toEqual({
      ticketId: 17,
      price: 45,
    });
  });

  it('leaves a missing or malformed id as null', () => {
    expect(parseTicket('PRECIO:45').ticketId).toBeNull();
    expect(parseTicket('TICKET-ID-x1|PRECIO:45').ticketId).toBeNull();
  });

  it('reads back every formatted ticket', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 9998 }),
        fc.integer({ min: 1, max: 9 }),
        (ticketId, coins) => {
          const price = coins * 5;
          expect(parseTicket(formatTicket({ ticketId, price }))).toEqual({
            ticketId,
            price,
          });
        },
      ),
    );
  });
});

describe('formatTicket', () => {
  it('writes the QR payload', () => {
    expect(formatTicket({ ticketId: 4999, price: 45 })).toBe(
      'TICKET-ID-4999|PRECIO:45',
    );
  });
});

describe('createTicket', () => {
  it('takes the lowest price and id from zeros', () => {
    expect(createTicket(sequence(0, 0))).toEqual({
      ticketId: 0,
      price: 5,
      payload: 'TICKET-ID-0|PRECIO:5',
    });
  });

  it('takes the highest price near one', () => {
    expect(createTicket(sequence(0.999, 0.5))).toEqual({
      ticketId: 4999,
      price: 45,
      payload: 'TICKET-ID-4999|PRECIO:45',
    });
  });

  it('always prices between 1 and 9 coins', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0, max: 1, maxExcluded: true, noNaN: true }),
        fc.double({ min: 0, max: 1, maxExcluded: true, noNaN: true }),
        (a, b) => {
          const ticket = createTicket(sequence(a, b));
          expect(ticket.price % 5).toBe(0);
          expect(ticket.price).toBeGreaterThanOrEqual(5);
          expect(ticket.price).toBeLessThanOrEqual(45);
          expect(ticket.ticketId).toBeGreaterThanOrEqual(0);
          expect(ticket.ticketId).toBeLessThanOrEqual(9998);
        },
      ),
    );
  });
});

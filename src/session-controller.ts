import { COIN_DENOMINATION } from './constants';
import {
  NoActiveSessionError,
  SessionActiveError,
  StateViolationError,
} from './errors';
import { createEventEmitter, type TypedEventEmitter } from './event-emitter';
import { createTaggedLogger, type Logger } from './logger';
import type { DecodeContext, ProtocolEvent } from './protocol-decoder';
import { createStateMachine, type TransitionTable } from './state-machine';
import { coinsRequiredFor } from './ticket';

/**
 * Phase of the payment session.
 * - 'idle': No ticket
 * - 'ticket-scanned': Session created, coin count not yet delivered
 * - 'rate-requested': Coin count delivered to the coin acceptor
 * - 'awaiting-coins': Coin acceptor acknowledged the count
 * - 'payment-complete': Paid; stays here until reset
 */
export type SessionPhase =
  | 'idle'
  | 'ticket-scanned'
  | 'rate-requested'
  | 'awaiting-coins'
  | 'payment-complete';

/**
 * Valid phase transitions. Acknowledgments and completion can overtake
 * the send confirmation, so 'ticket-scanned' may skip ahead.
 */
const SESSION_TRANSITIONS: TransitionTable<SessionPhase> = {
  idle: ['ticket-scanned'],
  'ticket-scanned': [
    'rate-requested',
    'awaiting-coins',
    'payment-complete',
    'idle',
  ],
  'rate-requested': ['awaiting-coins', 'payment-complete', 'idle'],
  'awaiting-coins': ['payment-complete', 'idle'],
  'payment-complete': ['idle'],
};

/**
 * Read-only view of the active ticket session.
 */
export interface SessionSnapshot {
  phase: SessionPhase;
  /** Ticket price in currency units */
  price: number;
  coinsRequired: number;
  coinsReceived: number;
  /** coinsReceived * denomination; the price once completed */
  amountPaid: number;
  coinsRemaining: number;
  rateConfirmed: boolean;
  completed: boolean;
}

/**
 * Events emitted by the session controller.
 */
export type SessionEvents = {
  /** Any change to the session, `null` after a reset */
  sessionChange: SessionSnapshot | null;
  rateConfirmed: SessionSnapshot;
  coinReceived: { count: number; session: SessionSnapshot };
  paymentComplete: SessionSnapshot;
};

/**
 * Outbound path for the coin-count command.
 */
export interface CommandSink {
  send(command: string): Promise<void>;
}

export interface SessionController {
  /**
   * Opens a session for a ticket and sends the coin count.
   * The phase reaches 'rate-requested' only once the send is flushed.
   * @throws {SessionActiveError} If a session is already active
   * @throws {RangeError} If the price is not a positive integer
   * @throws {SendError} If the command cannot be sent; the session stays in 'ticket-scanned'
   */
  startSession(price: number): Promise<SessionSnapshot>;

  /**
   * Sends the coin count again after a failed send.
   * @throws {NoActiveSessionError} If no session is active
   * @throws {StateViolationError} If the rate is already acknowledged
   */
  resendRate(): Promise<void>;

  /** Drops the session, paid or not. */
  cancel(): void;

  /**
   * Closes the session after payment and returns its final snapshot.
   * Returns `null` when no session is active.
   */
  finalize(): SessionSnapshot | null;

  /** Applies a decoded token. No-op without an active session. */
  onProtocolEvent(event: ProtocolEvent): void;

  getSession(): SessionSnapshot | null;
  getPhase(): SessionPhase;
  /** Counters the decoder needs to evaluate the next chunk */
  getDecodeContext(): DecodeContext;

  readonly events: TypedEventEmitter<SessionEvents>;
}

export interface SessionControllerOptions {
  /**
   * Value of one coin.
   * @default 5
   */
  denomination?: number;
  logger?: Logger;
}

interface TicketSession {
  price: number;
  coinsRequired: number;
  coinsReceived: number;
  rateConfirmed: boolean;
  completed: boolean;
}

/**
 * Creates the controller owning the ticket payment session.
 *
 * @example
 * ```typescript
 * const sessions = createSessionController(connections);
 * sessions.events.on('paymentComplete', () => openBarrier());
 * await sessions.startSession(45);
 * ```
 */
export function createSessionController(
  sink: CommandSink,
  options: SessionControllerOptions = {},
): SessionController {
  const denomination = options.denomination ?? COIN_DENOMINATION;
  const logger = createTaggedLogger('SessionController', options.logger);
  const events = createEventEmitter<SessionEvents>({ logger: options.logger });
  const phases = createStateMachine(SESSION_TRANSITIONS, 'idle', {
    name: 'SessionController',
    logger: options.logger,
  });

  let session: TicketSession | null = null;

  function transitionPhase(to: SessionPhase): void {
    if (phases.canTransition(to)) {
      phases.transition(to);
    }
  }

  function snapshotOf(s: TicketSession): SessionSnapshot {
    return {
      phase: phases.getState(),
      price: s.price,
      coinsRequired: s.coinsRequired,
      coinsReceived: s.coinsReceived,
      amountPaid: s.completed ? s.price : s.coinsReceived * denomination,
      coinsRemaining: Math.max(0, s.coinsRequired - s.coinsReceived),
      rateConfirmed: s.rateConfirmed,
      completed: s.completed,
    };
  }

  function getSession(): SessionSnapshot | null {
    return session ? snapshotOf(session) : null;
  }

  function emitChange(): void {
    events.emit('sessionChange', getSession());
  }

  async function sendRate(target: TicketSession): Promise<void> {
    await sink.send(String(target.coinsRequired));
    // The session may have been reset or overtaken while the send was pending
    if (session === target && phases.getState() === 'ticket-scanned') {
      transitionPhase('rate-requested');
      emitChange();
    }
    logger.debug?.(
      `Coin count ${target.coinsRequired} sent for price ${target.price}`,
    );
  }

  async function startSession(price: number): Promise<SessionSnapshot> {
    if (session) {
      throw new SessionActiveError();
    }
    if (!Number.isInteger(price) || price <= 0) {
      throw new RangeError(`price must be a positive integer, got ${price}`);
    }

    const created: TicketSession = {
      price,
      coinsRequired: coinsRequiredFor(price, denomination),
      coinsReceived: 0,
      rateConfirmed: false,
      completed: false,
    };
    session = created;
    transitionPhase('ticket-scanned');
    emitChange();
    logger.debug?.(
      `Session opened: price ${price}, ${created.coinsRequired} coins`,
    );

    try {
      await sendRate(created);
    } catch (err) {
      // Nothing reached the controller without a link, so the ticket is not taken
      if (err instanceof StateViolationError && session === created) {
        reset();
      }
      throw err;
    }
    return snapshotOf(created);
  }

  async function resendRate(): Promise<void> {
    if (!session) {
      throw new NoActiveSessionError();
    }
    const phase = phases.getState();
    if (phase !== 'ticket-scanned' && phase !== 'rate-requested') {
      throw new StateViolationError(
        `Cannot resend the coin count in phase '${phase}'`,
      );
    }
    await sendRate(session);
  }

  function reset(): void {
    session = null;
    transitionPhase('idle');
    emitChange();
  }

  function cancel(): void {
    if (!session) return;
    logger.debug?.('Session cancelled');
    reset();
  }

  function finalize(): SessionSnapshot | null {
    const final = getSession();
    if (!final) return null;
    if (!final.completed) {
      logger.warn(
        `Finalizing an unpaid session (${final.coinsReceived}/${final.coinsRequired} coins)`,
      );
    }
    reset();
    return final;
  }

  function onRateConfirmed(s: TicketSession): void {
    if (s.rateConfirmed) return;
    s.rateConfirmed = true;
    const phase = phases.getState();
    if (phase === 'ticket-scanned' || phase === 'rate-requested') {
      transitionPhase('awaiting-coins');
    }
    const snapshot = snapshotOf(s);
    events.emit('rateConfirmed', snapshot);
    events.emit('sessionChange', snapshot);
  }

  function onCoinReceived(s: TicketSession, count: number): void {
    if (s.completed) {
      logger.debug?.(`Ignoring ${count} coin(s) after completion`);
      return;
    }
    s.coinsReceived += count;
    const snapshot = snapshotOf(s);
    events.emit('coinReceived', { count, session: snapshot });
    events.emit('sessionChange', snapshot);
  }

  function onPaymentComplete(s: TicketSession): void {
    if (s.completed) return;
    if (s.coinsReceived < s.coinsRequired) {
      logger.warn(
        `Completion signal ignored: ${s.coinsReceived}/${s.coinsRequired} coins`,
      );
      return;
    }
    s.completed = true;
    transitionPhase('payment-complete');
    const snapshot = snapshotOf(s);
    events.emit('paymentComplete', snapshot);
    events.emit('sessionChange', snapshot);
  }

  function onProtocolEvent(event: ProtocolEvent): void {
    const s = session;
    if (!s) {
      logger.debug?.(`Ignoring '${event.type}' without a session`);
      return;
    }
    switch (event.type) {
      case 'rate-confirmed':
        onRateConfirmed(s);
        break;
      case 'coin-received':
        onCoinReceived(s, event.count);
        break;
      case 'payment-complete':
        onPaymentComplete(s);
        break;
    }
  }

  function getDecodeContext(): DecodeContext {
    if (!session) {
      return { rateConfirmed: false, coinsReceived: 0, coinsRequired: 0 };
    }
    return {
      rateConfirmed: session.rateConfirmed,
      coinsReceived: session.coinsReceived,
      coinsRequired: session.coinsRequired,
    };
  }

  return {
    startSession,
    resendRate,
    cancel,
    finalize,
    onProtocolEvent,
    getSession,
    getPhase: () => phases.getState(),
    getDecodeContext,
    events,
  };
}

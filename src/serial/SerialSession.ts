/**
 * Serial Session
 * Owns the connection to one robot and performs bounded write-then-read
 * exchanges over it.
 *
 * State machine:
 *   closed -> opening -> open -> (exchanging -> open)* -> closing -> closed
 *
 * Any failure while exchanging moves the session to `degraded`. A degraded
 * session refuses further exchanges until close() followed by open(). The
 * one exception is an exchange flagged as a retry of the call that just
 * failed; it runs, but leaves the session degraded. The session performs no
 * retries itself.
 */

import { logger } from '../logging/logger.js';
import {
  SERIAL_BAUD,
  HANDSHAKE_TIMEOUT_MS,
  HANDSHAKE_ATTEMPTS,
  OPEN_SETTLE_MS,
  REPLY_SETTLE_MS,
} from '../config/env.js';
import { OPCODE } from '../protocol/commands.js';
import { decodeReply, encodeCommand, expectedReplyLength, formatFrame } from '../protocol/FrameCodec.js';
import { ConnectionError, InvalidArgumentError, TimeoutError, errorMessage } from '../errors.js';
import { createNodeSerialLink } from './NodeSerialLink.js';
import type { SerialLink, SerialLinkFactory } from './SerialLink.js';

export type SessionState =
  | 'closed'
  | 'opening'
  | 'open'
  | 'exchanging'
  | 'degraded'
  | 'closing';

export interface ExchangeOptions {
  /** Repeat of an exchange that just timed out; allowed on a degraded session */
  retry?: boolean;
}

/**
 * The part of a session the dispatcher depends on.
 */
export interface ExchangeSession {
  readonly state: SessionState;
  exchange(
    frame: Uint8Array,
    expectedReplyLength: number,
    timeoutMs: number,
    options?: ExchangeOptions,
  ): Promise<Uint8Array>;
  markDegraded(reason: string): void;
}

export interface SerialSessionOptions {
  path: string;
  baudRate?: number;
  createLink?: SerialLinkFactory;
  handshakeTimeoutMs?: number;
  handshakeAttempts?: number;
  /** Delay between opening the port and the first ping */
  openSettleMs?: number;
  /** Quiet window after a full reply, to catch trailing bytes */
  replySettleMs?: number;
  onStateChange?: (state: SessionState, previous: SessionState) => void;
}

export interface SessionStats {
  state: SessionState;
  port: string;
  baud: number;
  degradedReason: string | null;
  exchanges: number;
  timeouts: number;
  rxBytes: number;
  txBytes: number;
  staleBytesDiscarded: number;
  /** Received bytes not yet consumed by an exchange */
  bufferedBytes: number;
  lastRxAt: number | null;
  lastTxAt: number | null;
  openedAt: number | null;
}

interface PendingRead {
  expected: number;
  resolve: (reply: Uint8Array) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
  settleTimer: NodeJS.Timeout | null;
}

// At most one session may hold a given device path at a time
const heldPaths = new Set<string>();

// Bytes kept between exchanges before older ones are dropped
const MAX_IDLE_BUFFER = 64;

export class SerialSession implements ExchangeSession {
  readonly path: string;
  readonly baudRate: number;
  
  private readonly createLink: SerialLinkFactory;
  private readonly handshakeTimeoutMs: number;
  private readonly handshakeAttempts: number;
  private readonly openSettleMs: number;
  private readonly replySettleMs: number;
  private readonly onStateChange?: (state: SessionState, previous: SessionState) => void;
  
  private link: SerialLink | null = null;
  private opening: Promise<void> | null = null;
  private _state: SessionState = 'closed';
  private rxBuffer: number[] = [];
  private pending: PendingRead | null = null;
  private linkFailure: Error | null = null;
  private degradedReason: string | null = null;
  
  // Stats
  private exchanges = 0;
  private timeouts = 0;
  private rxBytes = 0;
  private txBytes = 0;
  private staleBytesDiscarded = 0;
  private lastRxAt: number | null = null;
  private lastTxAt: number | null = null;
  private openedAt: number | null = null;
  
  constructor(options: SerialSessionOptions) {
    this.path = options.path;
    this.baudRate = options.baudRate ?? SERIAL_BAUD;
    this.createLink = options.createLink ?? createNodeSerialLink;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? HANDSHAKE_TIMEOUT_MS;
    this.handshakeAttempts = options.handshakeAttempts ?? HANDSHAKE_ATTEMPTS;
    this.openSettleMs = options.openSettleMs ?? OPEN_SETTLE_MS;
    this.replySettleMs = options.replySettleMs ?? REPLY_SETTLE_MS;
    this.onStateChange = options.onStateChange;
  }
  
  get state(): SessionState {
    return this._state;
  }
  
  get isOpen(): boolean {
    return this._state === 'open' || this._state === 'exchanging' || this._state === 'degraded';
  }
  
  private setState(newState: SessionState): void {
    if (this._state !== newState) {
      const oldState = this._state;
      this._state = newState;
      logger.log('session_state', { port: this.path, from: oldState, to: newState });
      logger.debug(`State: ${oldState} -> ${newState}`);
      this.onStateChange?.(newState, oldState);
    }
  }
  
  // ==========================================================================
  // Open / Close
  // ==========================================================================
  
  /**
   * Open the port and confirm the firmware answers a ping
   */
  async open(): Promise<void> {
    if (this._state !== 'closed') {
      throw new ConnectionError(`Cannot open: state is ${this._state}`, this.path);
    }
    if (heldPaths.has(this.path)) {
      throw new ConnectionError(`${this.path} is already open in another session`, this.path);
    }
    
    heldPaths.add(this.path);
    this.setState('opening');
    this.opening = this.connect();
    
    try {
      await this.opening;
    } finally {
      this.opening = null;
    }
  }
  
  private async connect(): Promise<void> {
    this.rxBuffer = [];
    this.linkFailure = null;
    this.degradedReason = null;
    
    let link: SerialLink;
    try {
      link = this.createLink(
        { path: this.path, baudRate: this.baudRate },
        {
          onData: (chunk) => this.handleData(chunk),
          onError: (error) => this.handleLinkError(error),
          onClose: () => this.handleLinkClose(),
        },
      );
    } catch (error) {
      heldPaths.delete(this.path);
      this.setState('closed');
      throw new ConnectionError(`Could not open ${this.path}: ${errorMessage(error)}`, this.path, { cause: error });
    }
    this.link = link;
    
    try {
      await link.open();
    } catch (error) {
      await this.abortOpen(link);
      throw new ConnectionError(`Could not open ${this.path}: ${errorMessage(error)}`, this.path, { cause: error });
    }
    
    try {
      if (this.openSettleMs > 0) {
        await this.sleep(this.openSettleMs);
      }
      await this.handshake();
    } catch (error) {
      await this.abortOpen(link);
      throw error;
    }
    
    this.openedAt = Date.now();
    this.setState('open');
  }
  
  /**
   * Release the port. Safe to call in any state, any number of times.
   * Closing during an exchange fails that exchange with ConnectionError.
   * Closing during open() fails the open and resolves once the port the
   * open acquired has been released.
   */
  async close(): Promise<void> {
    if (this._state === 'closed' || this._state === 'closing') {
      return;
    }
    
    const opening = this.opening;
    this.setState('closing');
    this.failPending(new ConnectionError('Session closed during exchange', this.path));
    
    if (opening) {
      // open() sees the state change, releases its own link and rejects to its caller
      await opening.catch(() => undefined);
      return;
    }
    
    const link = this.link;
    this.link = null;
    
    try {
      if (link) {
        await link.close();
      }
    } finally {
      heldPaths.delete(this.path);
      this.rxBuffer = [];
      this.openedAt = null;
      this.setState('closed');
    }
  }
  
  private async abortOpen(link: SerialLink): Promise<void> {
    if (this.link === link) {
      this.link = null;
    }
    this.failPending(new ConnectionError('Open aborted', this.path));
    
    try {
      if (link.isOpen) {
        await link.close();
      }
    } catch (error) {
      logger.warn('Failed to release port after open failure', { port: this.path, error: errorMessage(error) });
    } finally {
      heldPaths.delete(this.path);
      this.rxBuffer = [];
      this.setState('closed');
    }
  }
  
  private async handshake(): Promise<void> {
    const frame = encodeCommand({ kind: 'ping' });
    const expected = expectedReplyLength(OPCODE.PING);
    let lastError: unknown = null;
    
    for (let attempt = 1; attempt <= this.handshakeAttempts; attempt++) {
      if (this._state !== 'opening') {
        throw new ConnectionError(`Session ${this._state} while opening`, this.path);
      }
      
      logger.log('handshake_step', { step: 'ping', attempt });
      
      try {
        const reply = await this.transact(frame, expected, this.handshakeTimeoutMs);
        const response = decodeReply(OPCODE.PING, reply);
        if (response.status === 'success') {
          logger.log('handshake_step', { step: 'complete', attempts: attempt });
          return;
        }
        lastError = new Error(`Ping answered with status ${response.status}`);
      } catch (error) {
        lastError = error;
        if (error instanceof ConnectionError) {
          break;
        }
      }
      
      logger.warn(`Ping attempt ${attempt} failed`, { error: errorMessage(lastError) });
    }
    
    throw new ConnectionError(
      `Device on ${this.path} did not answer ping: ${errorMessage(lastError)}`,
      this.path,
      { cause: lastError },
    );
  }
  
  // ==========================================================================
  // Exchange
  // ==========================================================================
  
  /**
   * Write a frame and wait for a reply of `expectedReplyLength` bytes.
   *
   * Resolves with every byte received for this exchange, which may be more
   * than expected if the device sent trailing bytes; the decoder judges
   * that. Rejects with TimeoutError if the reply is not complete within
   * `timeoutMs`, or ConnectionError if the link is unusable or the session
   * is degraded and `options.retry` is not set.
   */
  async exchange(
    frame: Uint8Array,
    expectedReplyLength: number,
    timeoutMs: number,
    options: ExchangeOptions = {},
  ): Promise<Uint8Array> {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new InvalidArgumentError('timeoutMs must be a positive number', 'timeoutMs');
    }
    if (!Number.isInteger(expectedReplyLength) || expectedReplyLength < 1) {
      throw new InvalidArgumentError('expectedReplyLength must be a positive integer', 'expectedReplyLength');
    }
    if (this._state === 'exchanging') {
      throw new ConnectionError('Exchange already in progress; callers must serialize access', this.path);
    }
    if (this._state !== 'open' && this._state !== 'degraded') {
      throw new ConnectionError(`Cannot exchange: session is ${this._state}`, this.path);
    }
    if (this.linkFailure || !this.link || !this.link.isOpen) {
      throw new ConnectionError(
        `Link to ${this.path} is down: ${this.linkFailure ? this.linkFailure.message : 'port closed'}`,
        this.path,
        { cause: this.linkFailure ?? undefined },
      );
    }
    if (this._state === 'degraded' && !options.retry) {
      throw new ConnectionError(
        `Session on ${this.path} is degraded (${this.degradedReason ?? 'unknown'}); close and reopen it`,
        this.path,
      );
    }
    
    const resumeState = this._state;
    this.setState('exchanging');
    this.exchanges++;
    
    try {
      const reply = await this.transact(frame, expectedReplyLength, timeoutMs);
      if (this.state === 'exchanging') {
        this.setState(resumeState);
      }
      return reply;
    } catch (error) {
      if (this.state === 'exchanging') {
        this.markDegraded(errorMessage(error));
      }
      throw error;
    }
  }
  
  /**
   * Flag the link as being in an unknown state, e.g. after a malformed reply
   */
  markDegraded(reason: string): void {
    if (this._state !== 'open' && this._state !== 'exchanging' && this._state !== 'degraded') {
      return;
    }
    this.degradedReason = reason;
    if (this._state !== 'degraded') {
      logger.warn(`Session degraded: ${reason}`, { port: this.path });
    }
    this.setState('degraded');
  }
  
  private transact(frame: Uint8Array, expected: number, timeoutMs: number): Promise<Uint8Array> {
    const link = this.link;
    if (!link) {
      return Promise.reject(new ConnectionError('No link', this.path));
    }
    
    // Anything already buffered belongs to no exchange
    if (this.rxBuffer.length > 0) {
      logger.log('stale_bytes', { port: this.path, bytes: formatFrame(Uint8Array.from(this.rxBuffer)) });
      this.staleBytesDiscarded += this.rxBuffer.length;
      this.rxBuffer = [];
    }
    
    return new Promise<Uint8Array>((resolve, reject) => {
      const timer = setTimeout(() => this.handleTimeout(timeoutMs), timeoutMs);
      const pending: PendingRead = { expected, resolve, reject, timer, settleTimer: null };
      this.pending = pending;
      
      logger.log('tx_frame', { port: this.path, frame: formatFrame(frame), expected });
      this.txBytes += frame.length;
      this.lastTxAt = Date.now();
      
      link.write(frame).catch((error: unknown) => {
        if (this.pending === pending) {
          this.failPending(new ConnectionError(
            `Write to ${this.path} failed: ${errorMessage(error)}`,
            this.path,
            { cause: error },
          ));
        }
      });
    });
  }
  
  private handleData(chunk: Uint8Array): void {
    this.rxBytes += chunk.length;
    this.lastRxAt = Date.now();
    logger.log('rx_bytes', { port: this.path, bytes: formatFrame(chunk) });
    
    this.rxBuffer.push(...chunk);
    
    const pending = this.pending;
    if (!pending) {
      // Unsolicited; only the tail is kept for the next exchange's stale report
      if (this.rxBuffer.length > MAX_IDLE_BUFFER) {
        const dropped = this.rxBuffer.length - MAX_IDLE_BUFFER;
        this.staleBytesDiscarded += dropped;
        this.rxBuffer.splice(0, dropped);
      }
      return;
    }
    if (this.rxBuffer.length < pending.expected) {
      return;
    }
    
    if (this.replySettleMs === 0) {
      this.completePending();
    } else if (!pending.settleTimer) {
      pending.settleTimer = setTimeout(() => this.completePending(), this.replySettleMs);
    }
  }
  
  private handleTimeout(timeoutMs: number): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    
    // Full reply already in, only the settle window was still running
    if (this.rxBuffer.length >= pending.expected) {
      this.completePending();
      return;
    }
    
    const received = this.rxBuffer.length;
    this.rxBuffer = [];
    this.timeouts++;
    logger.log('exchange_timeout', { port: this.path, timeoutMs, expected: pending.expected, received });
    this.failPending(new TimeoutError(timeoutMs, pending.expected, received));
  }
  
  private completePending(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    
    this.clearPending(pending);
    const reply = Uint8Array.from(this.rxBuffer);
    this.rxBuffer = [];
    pending.resolve(reply);
  }
  
  private failPending(error: Error): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    
    this.clearPending(pending);
    pending.reject(error);
  }
  
  private clearPending(pending: PendingRead): void {
    clearTimeout(pending.timer);
    if (pending.settleTimer) {
      clearTimeout(pending.settleTimer);
    }
    this.pending = null;
  }
  
  // ==========================================================================
  // Link events
  // ==========================================================================
  
  private handleLinkError(error: Error): void {
    logger.error('Serial link error', { port: this.path, error: error.message });
    this.linkFailure = error;
    this.failPending(new ConnectionError(`Serial link error: ${error.message}`, this.path, { cause: error }));
    this.markDegraded(`link error: ${error.message}`);
  }
  
  private handleLinkClose(): void {
    if (this._state === 'closing' || this._state === 'closed') {
      return;
    }
    
    this.linkFailure ??= new Error('port closed unexpectedly');
    this.failPending(new ConnectionError(`${this.path} closed unexpectedly`, this.path));
    this.markDegraded('port closed unexpectedly');
  }
  
  /**
   * Get session statistics
   */
  getStats(): SessionStats {
    return {
      state: this._state,
      port: this.path,
      baud: this.baudRate,
      degradedReason: this.degradedReason,
      exchanges: this.exchanges,
      timeouts: this.timeouts,
      rxBytes: this.rxBytes,
      txBytes: this.txBytes,
      staleBytesDiscarded: this.staleBytesDiscarded,
      bufferedBytes: this.rxBuffer.length,
      lastRxAt: this.lastRxAt,
      lastTxAt: this.lastTxAt,
      openedAt: this.openedAt,
    };
  }
  
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

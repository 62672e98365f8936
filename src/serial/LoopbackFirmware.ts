/**
 * Loopback Firmware
 * Implements the SerialLink interface with a virtual MiiA.bit instead of a
 * real serial port. This allows exercising the full host stack without
 * hardware.
 *
 * Behavior:
 * - Parses incoming bytes into fixed-width frames by opcode
 * - Replies [opcode, 0x00] to actuator commands and PING
 * - Replies [209, 0x00, button, dist_hi, dist_lo] to SENSORS
 * - Replies [opcode, 0x01] to an unknown opcode and drops that byte
 * - Tests can inject firmware faults, silence, or arbitrary replies
 */

import { logger } from '../logging/logger.js';
import {
  OPCODE,
  COMMAND_FRAME_LENGTH,
  MOTOR_DIRECTIONS,
  STATUS_OK,
  isOpcode,
  type MotorDirection,
  type MotorId,
  type Opcode,
} from '../protocol/commands.js';
import type { SerialLink, SerialLinkEvents, SerialLinkFactory, SerialLinkOptions } from './SerialLink.js';

export const LOOPBACK_PATH = 'LOOPBACK';

const ERR_UNKNOWN_OPCODE = 0x01;

/**
 * Returns the bytes to send back for a frame, or null to stay silent.
 * `reply` is what the virtual firmware would have sent on its own.
 */
export type LoopbackResponder = (frame: Uint8Array, reply: Uint8Array) => Uint8Array | null;

export interface LoopbackFirmwareOptions {
  replyDelayMs?: number;
  buttonPressed?: boolean;
  distanceCm?: number;
}

export interface MotorState {
  direction: MotorDirection;
  speed: number;
}

export class LoopbackFirmware implements SerialLink {
  private events: SerialLinkEvents | null = null;
  private _path = LOOPBACK_PATH;
  private _isOpen = false;
  private rxBuffer: number[] = [];
  private replyDelayMs: number;
  private responder: LoopbackResponder | null = null;
  private pendingFaults = new Map<Opcode, number>();
  private openError: Error | null = null;
  private timers = new Set<NodeJS.Timeout>();
  
  // Virtual hardware
  buttonPressed: boolean;
  distanceCm: number;
  led: { red: number; green: number; blue: number } = { red: 0, green: 0, blue: 0 };
  servoPosition: number | null = null;
  buzzerOn = false;
  motors: Record<MotorId, MotorState> = {
    a: { direction: 'stop', speed: 0 },
    b: { direction: 'stop', speed: 0 },
  };
  
  // Every complete frame the firmware has received, in order
  readonly frames: Uint8Array[] = [];
  
  constructor(options: LoopbackFirmwareOptions = {}) {
    this.replyDelayMs = options.replyDelayMs ?? 1;
    this.buttonPressed = options.buttonPressed ?? false;
    this.distanceCm = options.distanceCm ?? 0;
  }
  
  /**
   * Link factory for SerialSession; binds this firmware to the session's events
   */
  readonly createLink: SerialLinkFactory = (options: SerialLinkOptions, events: SerialLinkEvents) => {
    this._path = options.path;
    this.events = events;
    return this;
  };
  
  get path(): string {
    return this._path;
  }
  
  get isOpen(): boolean {
    return this._isOpen;
  }
  
  async open(): Promise<void> {
    if (this.openError) {
      const error = this.openError;
      this.openError = null;
      throw error;
    }
    this._isOpen = true;
    this.rxBuffer = [];
  }
  
  async close(): Promise<void> {
    this.clearTimers();
    this._isOpen = false;
  }
  
  async write(data: Uint8Array): Promise<void> {
    if (!this._isOpen) {
      throw new Error('Loopback link is not open');
    }
    
    this.rxBuffer.push(...data);
    this.schedule(() => this.processInput());
  }
  
  // ==========================================================================
  // Fault injection
  // ==========================================================================
  
  /** Replace the firmware's replies; pass null to restore normal behavior */
  setResponder(responder: LoopbackResponder | null): void {
    this.responder = responder;
  }
  
  /** Never reply to anything */
  goSilent(): void {
    this.responder = () => null;
  }
  
  /** Reply to the next frame with this opcode using a non-zero status */
  failNext(opcode: Opcode, errorCode: number): void {
    this.pendingFaults.set(opcode, errorCode);
  }
  
  /** Make the next open() reject */
  failOpen(error: Error): void {
    this.openError = error;
  }
  
  /** Emit unsolicited bytes, as a noisy or resetting device would */
  emit(bytes: Uint8Array): void {
    this.events?.onData(bytes);
  }
  
  /** Simulate the cable being pulled */
  unplug(): void {
    this.clearTimers();
    this._isOpen = false;
    this.events?.onClose();
  }
  
  // ==========================================================================
  // Virtual firmware
  // ==========================================================================
  
  private processInput(): void {
    while (this.rxBuffer.length > 0) {
      const first = this.rxBuffer[0];
      
      if (!isOpcode(first)) {
        this.rxBuffer.shift();
        logger.debug(`[Loopback] Unknown opcode ${first}`);
        this.reply(Uint8Array.of(first), Uint8Array.of(first, ERR_UNKNOWN_OPCODE));
        continue;
      }
      
      const length = COMMAND_FRAME_LENGTH[first];
      if (this.rxBuffer.length < length) {
        // Wait for the rest of the frame
        return;
      }
      
      const frame = Uint8Array.from(this.rxBuffer.splice(0, length));
      this.frames.push(frame);
      this.reply(frame, this.handleFrame(first, frame));
    }
  }
  
  private handleFrame(opcode: Opcode, frame: Uint8Array): Uint8Array {
    const fault = this.pendingFaults.get(opcode);
    if (fault !== undefined) {
      this.pendingFaults.delete(opcode);
      return opcode === OPCODE.SENSORS
        ? Uint8Array.of(opcode, fault, 0, 0, 0)
        : Uint8Array.of(opcode, fault);
    }
    
    switch (opcode) {
      case OPCODE.PING:
        break;
      case OPCODE.BUZZER:
        this.buzzerOn = frame[1] === 1;
        break;
      case OPCODE.MOTOR_A:
      case OPCODE.MOTOR_B:
        this.motors[opcode === OPCODE.MOTOR_A ? 'a' : 'b'] = {
          direction: directionFromByte(frame[1]),
          speed: frame[2],
        };
        break;
      case OPCODE.RGB_LED:
        this.led = { red: frame[1], green: frame[3], blue: frame[5] };
        break;
      case OPCODE.SERVO:
        this.servoPosition = frame[1];
        break;
      case OPCODE.SENSORS: {
        const distance = Math.max(0, Math.min(0xffff, Math.round(this.distanceCm)));
        return Uint8Array.of(
          opcode,
          STATUS_OK,
          this.buttonPressed ? 1 : 0,
          (distance >> 8) & 0xff,
          distance & 0xff,
        );
      }
    }
    
    return Uint8Array.of(opcode, STATUS_OK);
  }
  
  private reply(frame: Uint8Array, reply: Uint8Array): void {
    const bytes = this.responder ? this.responder(frame, reply) : reply;
    if (bytes === null) {
      return;
    }
    this.schedule(() => {
      if (this._isOpen) {
        this.events?.onData(bytes);
      }
    });
  }
  
  private schedule(fn: () => void): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, this.replyDelayMs);
    this.timers.add(timer);
  }
  
  private clearTimers(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}

function directionFromByte(byte: number): MotorDirection {
  if (byte === MOTOR_DIRECTIONS.forward) return 'forward';
  if (byte === MOTOR_DIRECTIONS.reverse) return 'reverse';
  return 'stop';
}

/**
 * MiiaBit
 * Caller-facing handle for one robot: the dispatcher's operations plus the
 * latest sensor readings as plain properties.
 *
 *   const robot = await MiiaBit.connect({ path: '/dev/ttyACM0' });
 *   await robot.controlRgbLed(12, 0, 90);
 *   await robot.getDataFromSensors();
 *   console.log(robot.distanceSensor);
 *   await robot.close();
 */

import { SERIAL_PORT, SERIAL_BAUD, LOOPBACK_MODE } from './config/env.js';
import { logger } from './logging/logger.js';
import { SerialSession, type SessionState, type SessionStats } from './serial/SerialSession.js';
import { LoopbackFirmware, LOOPBACK_PATH } from './serial/LoopbackFirmware.js';
import { resolveSerialPort } from './serial/portDiscovery.js';
import type { SerialLinkFactory } from './serial/SerialLink.js';
import { CommandDispatcher, type CommandAck, type CommandDispatcherOptions } from './dispatcher/CommandDispatcher.js';
import { SensorStateCache, type SensorSnapshot } from './state/SensorStateCache.js';

export interface MiiaBitOptions extends CommandDispatcherOptions {
  /** Serial device; auto-detected when omitted */
  path?: string;
  baudRate?: number;
  motorACalibration?: number;
  motorBCalibration?: number;
  /** Use the in-process virtual firmware instead of a serial port */
  loopback?: boolean;
  createLink?: SerialLinkFactory;
  handshakeTimeoutMs?: number;
  handshakeAttempts?: number;
  openSettleMs?: number;
  replySettleMs?: number;
}

export class MiiaBit {
  private readonly session: SerialSession;
  private readonly dispatcher: CommandDispatcher;
  
  private constructor(session: SerialSession, dispatcher: CommandDispatcher) {
    this.session = session;
    this.dispatcher = dispatcher;
  }
  
  /**
   * Open the serial link, confirm the firmware answers, and apply any
   * motor calibration given.
   */
  static async connect(options: MiiaBitOptions = {}): Promise<MiiaBit> {
    const loopback = options.loopback ?? LOOPBACK_MODE;
    let createLink = options.createLink;
    let path = options.path;
    
    if (loopback && !createLink) {
      createLink = new LoopbackFirmware().createLink;
      path ??= LOOPBACK_PATH;
    }
    path ??= await resolveSerialPort(SERIAL_PORT);
    
    const session = new SerialSession({
      path,
      baudRate: options.baudRate ?? SERIAL_BAUD,
      createLink,
      handshakeTimeoutMs: options.handshakeTimeoutMs,
      handshakeAttempts: options.handshakeAttempts,
      openSettleMs: options.openSettleMs,
      replySettleMs: options.replySettleMs,
    });
    const dispatcher = new CommandDispatcher(session, new SensorStateCache(), options);
    
    // Validate calibration before touching the port
    dispatcher.setMotorCalibration('a', options.motorACalibration ?? 0);
    dispatcher.setMotorCalibration('b', options.motorBCalibration ?? 0);
    
    await session.open();
    logger.info(`Connected to ${path}`, { baud: session.baudRate });
    
    return new MiiaBit(session, dispatcher);
  }
  
  // ==========================================================================
  // Sensor readings (null until the first successful refresh)
  // ==========================================================================
  
  get inputButtonState(): boolean | null {
    return this.dispatcher.sensors.snapshot?.inputButtonState ?? null;
  }
  
  get distanceSensor(): number | null {
    return this.dispatcher.sensors.snapshot?.distanceSensor ?? null;
  }
  
  get snapshot(): SensorSnapshot | null {
    return this.dispatcher.sensors.snapshot;
  }
  
  get state(): SessionState {
    return this.session.state;
  }
  
  get port(): string {
    return this.session.path;
  }
  
  // ==========================================================================
  // Operations
  // ==========================================================================
  
  /** Each channel 0-255; all zero turns the LED off */
  controlRgbLed(red = 0, green = 0, blue = 0): Promise<CommandAck> {
    return this.dispatcher.setRgbLed(red, green, blue);
  }
  
  /** Position 0-100, mapped onto 0-180 degrees */
  controlServoMotor(position: number): Promise<CommandAck> {
    return this.dispatcher.setServoAngle(position);
  }
  
  /** motor 'a' | 'b', direction 'forward' | 'reverse' | 'stop', speed 0-100 */
  controlMotor(motor: string, direction: string, speed: number): Promise<CommandAck> {
    return this.dispatcher.setMotor(motor, direction, speed);
  }
  
  controlBuzzer(state: string): Promise<CommandAck> {
    return this.dispatcher.setBuzzer(state);
  }
  
  setMotorCalibration(motor: string, factor = 0): void {
    this.dispatcher.setMotorCalibration(motor, factor);
  }
  
  getDataFromSensors(): Promise<SensorSnapshot> {
    return this.dispatcher.refreshSensors();
  }
  
  ping(): Promise<CommandAck> {
    return this.dispatcher.ping();
  }
  
  /**
   * Close and reopen the port; the only way out of a degraded session
   */
  async reconnect(): Promise<void> {
    await this.session.close();
    await this.session.open();
  }
  
  close(): Promise<void> {
    return this.session.close();
  }
  
  getStats(): SessionStats {
    return this.session.getStats();
  }
}

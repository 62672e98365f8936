/**
 * Command Dispatcher
 * The operations a caller performs on the robot. Each one validates its
 * arguments, encodes a frame, runs one exchange on the session, and decodes
 * the reply.
 *
 * Retry policy:
 * - Actuator commands are retried once on TimeoutError, never on any other
 *   failure
 * - Sensor queries and pings are never retried
 * - The retry is the only exchange a degraded session accepts; after that
 *   the session has to be reopened
 *
 * Operations on one dispatcher run one at a time; a call issued while another
 * is in flight waits for it (including its retry) to finish.
 */

import { logger } from '../logging/logger.js';
import { COMMAND_TIMEOUT_MS, SENSOR_TIMEOUT_MS } from '../config/env.js';
import {
  OPCODE,
  OPCODE_NAMES,
  RANGE,
  MotorIdSchema,
  MotorDirectionSchema,
  BuzzerStateSchema,
  CalibrationSchema,
  opcodeFor,
  type Command,
  type MotorId,
  type Opcode,
} from '../protocol/commands.js';
import {
  decodeReply,
  decodeSensorPayload,
  encodeCommand,
  expectedReplyLength,
  formatFrame,
  validateCommand,
  type SuccessResponse,
} from '../protocol/FrameCodec.js';
import {
  FirmwareError,
  InvalidArgumentError,
  MalformedResponseError,
  TimeoutError,
} from '../errors.js';
import type { ExchangeOptions, ExchangeSession } from '../serial/SerialSession.js';
import type { SensorReader, SensorSnapshot, SensorStateCache } from '../state/SensorStateCache.js';

export interface CommandAck {
  opcode: Opcode;
  /** 1, or 2 if the first attempt timed out */
  attempts: number;
  timingMs: number;
}

export interface CommandDispatcherOptions {
  commandTimeoutMs?: number;
  sensorTimeoutMs?: number;
  /** Extra attempts for actuator commands after a timeout */
  actuatorRetries?: number;
}

export class CommandDispatcher {
  private readonly session: ExchangeSession;
  private readonly cache: SensorStateCache;
  private readonly commandTimeoutMs: number;
  private readonly sensorTimeoutMs: number;
  private readonly actuatorRetries: number;
  private readonly calibration: Record<MotorId, number> = { a: 0, b: 0 };
  private tail: Promise<void> = Promise.resolve();
  
  constructor(session: ExchangeSession, cache: SensorStateCache, options: CommandDispatcherOptions = {}) {
    this.session = session;
    this.cache = cache;
    this.commandTimeoutMs = options.commandTimeoutMs ?? COMMAND_TIMEOUT_MS;
    this.sensorTimeoutMs = options.sensorTimeoutMs ?? SENSOR_TIMEOUT_MS;
    this.actuatorRetries = options.actuatorRetries ?? 1;
  }
  
  get sensors(): SensorReader {
    return this.cache;
  }
  
  // ==========================================================================
  // Actuators
  // ==========================================================================
  
  setRgbLed(red: number, green: number, blue: number): Promise<CommandAck> {
    return this.runActuator({ kind: 'rgbLed', red, green, blue });
  }
  
  /**
   * @param position 0-100, mapped by the firmware onto the servo's 0-180 degree travel
   */
  setServoAngle(position: number): Promise<CommandAck> {
    return this.runActuator({ kind: 'servo', position });
  }
  
  /**
   * Drive one motor. The motor's calibration offset is added to `speed`
   * and the result clamped to the valid speed range.
   */
  setMotor(motor: string, direction: string, speed: number): Promise<CommandAck> {
    const motorId = MotorIdSchema.safeParse(motor);
    if (!motorId.success) {
      return Promise.reject(new InvalidArgumentError(`motor: expected one of ${MotorIdSchema.options.join(', ')}, got '${motor}'`, 'motor'));
    }
    const dir = MotorDirectionSchema.safeParse(direction);
    if (!dir.success) {
      return Promise.reject(new InvalidArgumentError(`direction: expected one of ${MotorDirectionSchema.options.join(', ')}, got '${direction}'`, 'direction'));
    }
    
    // Range-check the speed the caller gave, before calibration moves it
    try {
      validateCommand({ kind: 'motor', motor: motorId.data, direction: dir.data, speed });
    } catch (error) {
      return Promise.reject(error);
    }
    
    return this.runActuator({
      kind: 'motor',
      motor: motorId.data,
      direction: dir.data,
      speed: dir.data === 'stop' ? 0 : this.calibrated(motorId.data, speed),
    });
  }
  
  setBuzzer(state: string): Promise<CommandAck> {
    const parsed = BuzzerStateSchema.safeParse(state);
    if (!parsed.success) {
      return Promise.reject(new InvalidArgumentError(`state: expected one of ${BuzzerStateSchema.options.join(', ')}, got '${state}'`, 'state'));
    }
    return this.runActuator({ kind: 'buzzer', state: parsed.data });
  }
  
  /**
   * Set the speed offset for one motor (-50 to 50). Host-side only; nothing is sent.
   */
  setMotorCalibration(motor: string, factor: number): void {
    const motorId = MotorIdSchema.safeParse(motor);
    if (!motorId.success) {
      throw new InvalidArgumentError(`motor: expected one of ${MotorIdSchema.options.join(', ')}, got '${motor}'`, 'motor');
    }
    if (!CalibrationSchema.safeParse(factor).success) {
      throw new InvalidArgumentError(
        `calibration: must be an integer from ${RANGE.MOTOR_CALIBRATION.min} to ${RANGE.MOTOR_CALIBRATION.max}`,
        'calibration',
      );
    }
    this.calibration[motorId.data] = factor;
  }
  
  getMotorCalibration(motor: MotorId): number {
    return this.calibration[motor];
  }
  
  // ==========================================================================
  // Sensors
  // ==========================================================================
  
  /**
   * Query the sensors and replace the cached snapshot. On any failure the
   * previous snapshot stays in place and the error is rethrown.
   */
  refreshSensors(): Promise<SensorSnapshot> {
    const frame = encodeCommand({ kind: 'sensors' });
    
    return this.withLock(async () => {
      const response = await this.exchangeAndDecode(OPCODE.SENSORS, frame, this.sensorTimeoutMs);
      const snapshot = this.cache.replace(decodeSensorPayload(response.payload));
      logger.log('sensor_snapshot', {
        button: snapshot.inputButtonState,
        distance: snapshot.distanceSensor,
        sequence: snapshot.sequence,
      });
      return snapshot;
    });
  }
  
  /**
   * Liveness check; not retried
   */
  ping(): Promise<CommandAck> {
    const frame = encodeCommand({ kind: 'ping' });
    
    return this.withLock(async () => {
      const startedAt = Date.now();
      await this.exchangeAndDecode(OPCODE.PING, frame, this.commandTimeoutMs);
      return { opcode: OPCODE.PING, attempts: 1, timingMs: Date.now() - startedAt };
    });
  }
  
  // ==========================================================================
  // Internals
  // ==========================================================================
  
  private calibrated(motor: MotorId, speed: number): number {
    const adjusted = speed + this.calibration[motor];
    return Math.max(RANGE.MOTOR_SPEED.min, Math.min(RANGE.MOTOR_SPEED.max, adjusted));
  }
  
  private runActuator(command: Command): Promise<CommandAck> {
    let frame: Uint8Array;
    try {
      frame = encodeCommand(command);
    } catch (error) {
      return Promise.reject(error);
    }
    
    const opcode = opcodeFor(command);
    
    return this.withLock(async () => {
      const startedAt = Date.now();
      let attempts = 0;
      
      for (;;) {
        attempts++;
        try {
          await this.exchangeAndDecode(opcode, frame, this.commandTimeoutMs, { retry: attempts > 1 });
          return { opcode, attempts, timingMs: Date.now() - startedAt };
        } catch (error) {
          if (error instanceof TimeoutError && attempts <= this.actuatorRetries) {
            logger.log('exchange_retry', { op: OPCODE_NAMES[opcode], attempt: attempts + 1 });
            continue;
          }
          throw error;
        }
      }
    });
  }
  
  private async exchangeAndDecode(
    opcode: Opcode,
    frame: Uint8Array,
    timeoutMs: number,
    options: ExchangeOptions = { retry: false },
  ): Promise<SuccessResponse> {
    const reply = await this.session.exchange(frame, expectedReplyLength(opcode), timeoutMs, options);
    const response = decodeReply(opcode, reply);
    
    switch (response.status) {
      case 'success':
        return response;
      
      case 'firmware-error':
        logger.log('firmware_error', { op: OPCODE_NAMES[opcode], code: response.errorCode });
        throw new FirmwareError(opcode, response.errorCode, response.description);
      
      case 'malformed':
        logger.log('malformed_reply', { op: OPCODE_NAMES[opcode], reason: response.reason, raw: formatFrame(reply) });
        this.session.markDegraded(`malformed reply to ${OPCODE_NAMES[opcode]}: ${response.reason}`);
        throw new MalformedResponseError(`Malformed reply: ${response.reason}`, opcode, reply);
    }
  }
  
  private withLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The queue only tracks completion; failures reach the caller through `run`
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }
}

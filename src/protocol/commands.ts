/**
 * MiiA.bit Command Set
 * Opcodes, argument ranges, and zod schemas for every host-issued command
 *
 * Command frames are fixed-width: [opcode, args...]
 * Replies are fixed-width:        [opcode echo, status, payload...]
 */

import { z } from 'zod';

// ============================================================================
// Opcodes
// ============================================================================

export const OPCODE = {
  PING: 0,
  BUZZER: 201,
  MOTOR_A: 202,
  MOTOR_B: 203,
  RGB_LED: 204,
  SERVO: 208,
  SENSORS: 209,
} as const;

export type Opcode = typeof OPCODE[keyof typeof OPCODE];

// The LED frame carries one sub-opcode per colour channel
export const RGB_CHANNEL = {
  RED: 204,
  GREEN: 205,
  BLUE: 206,
} as const;

export const OPCODE_NAMES: Record<Opcode, string> = {
  [OPCODE.PING]: 'ping',
  [OPCODE.BUZZER]: 'buzzer',
  [OPCODE.MOTOR_A]: 'motor_a',
  [OPCODE.MOTOR_B]: 'motor_b',
  [OPCODE.RGB_LED]: 'rgb_led',
  [OPCODE.SERVO]: 'servo',
  [OPCODE.SENSORS]: 'sensors',
};

// ============================================================================
// Argument Ranges
// ============================================================================

export const RANGE = {
  RGB_CHANNEL: { min: 0, max: 255 },
  SERVO_POSITION: { min: 0, max: 100 },
  MOTOR_SPEED: { min: 0, max: 100 },
  MOTOR_CALIBRATION: { min: -50, max: 50 },
} as const;

export const MOTOR_IDS = ['a', 'b'] as const;
export type MotorId = typeof MOTOR_IDS[number];

export const MotorIdSchema = z.enum(MOTOR_IDS);
export const MotorDirectionSchema = z.enum(['forward', 'reverse', 'stop']);
export type MotorDirection = z.infer<typeof MotorDirectionSchema>;

export const MOTOR_DIRECTIONS: Record<MotorDirection, number> = {
  forward: 0,
  reverse: 1,
  stop: 2,
};

export const BuzzerStateSchema = z.enum(['off', 'on']);
export type BuzzerState = z.infer<typeof BuzzerStateSchema>;

export const BUZZER_STATES: Record<BuzzerState, number> = {
  off: 0,
  on: 1,
};

export const MOTOR_OPCODES: Record<MotorId, Opcode> = {
  a: OPCODE.MOTOR_A,
  b: OPCODE.MOTOR_B,
};

// ============================================================================
// Command Schemas
// ============================================================================

function ranged(range: { min: number; max: number }) {
  return z.number().int().min(range.min).max(range.max);
}

export const CalibrationSchema = ranged(RANGE.MOTOR_CALIBRATION);

export const CommandSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ping') }),
  z.object({ kind: z.literal('buzzer'), state: BuzzerStateSchema }),
  z.object({
    kind: z.literal('motor'),
    motor: MotorIdSchema,
    direction: MotorDirectionSchema,
    speed: ranged(RANGE.MOTOR_SPEED),
  }),
  z.object({
    kind: z.literal('rgbLed'),
    red: ranged(RANGE.RGB_CHANNEL),
    green: ranged(RANGE.RGB_CHANNEL),
    blue: ranged(RANGE.RGB_CHANNEL),
  }),
  z.object({ kind: z.literal('servo'), position: ranged(RANGE.SERVO_POSITION) }),
  z.object({ kind: z.literal('sensors') }),
]);

export type Command = z.infer<typeof CommandSchema>;
export type CommandKind = Command['kind'];

export function opcodeFor(command: Command): Opcode {
  switch (command.kind) {
    case 'ping': return OPCODE.PING;
    case 'buzzer': return OPCODE.BUZZER;
    case 'motor': return MOTOR_OPCODES[command.motor];
    case 'rgbLed': return OPCODE.RGB_LED;
    case 'servo': return OPCODE.SERVO;
    case 'sensors': return OPCODE.SENSORS;
  }
}

// ============================================================================
// Frame Layout
// ============================================================================

export const COMMAND_FRAME_LENGTH: Record<Opcode, number> = {
  [OPCODE.PING]: 1,
  [OPCODE.BUZZER]: 2,
  [OPCODE.MOTOR_A]: 3,
  [OPCODE.MOTOR_B]: 3,
  [OPCODE.RGB_LED]: 6,
  [OPCODE.SERVO]: 2,
  [OPCODE.SENSORS]: 1,
};

export const REPLY_HEADER_LENGTH = 2;

export const REPLY_PAYLOAD_LENGTH: Record<Opcode, number> = {
  [OPCODE.PING]: 0,
  [OPCODE.BUZZER]: 0,
  [OPCODE.MOTOR_A]: 0,
  [OPCODE.MOTOR_B]: 0,
  [OPCODE.RGB_LED]: 0,
  [OPCODE.SERVO]: 0,
  [OPCODE.SENSORS]: 3,
};

export const STATUS_OK = 0x00;

export const FIRMWARE_ERROR_CODES: Record<number, string> = {
  0x01: 'unknown opcode',
  0x02: 'argument rejected',
  0x03: 'actuator busy',
  0x04: 'sensor fault',
};

export function describeFirmwareError(code: number): string {
  return FIRMWARE_ERROR_CODES[code] ?? 'unrecognized error code';
}

export function isOpcode(value: number): value is Opcode {
  return Object.values(OPCODE).some(op => op === value);
}

/**
 * Frame Codec
 * Encodes validated commands into fixed-width byte frames and decodes the
 * firmware's fixed-width replies.
 *
 * There is no checksum or terminator on the wire; a reply is recognised as
 * malformed by its length, its opcode echo, and payload sanity checks.
 */

import {
  CommandSchema,
  OPCODE,
  RGB_CHANNEL,
  MOTOR_DIRECTIONS,
  BUZZER_STATES,
  COMMAND_FRAME_LENGTH,
  REPLY_HEADER_LENGTH,
  REPLY_PAYLOAD_LENGTH,
  STATUS_OK,
  describeFirmwareError,
  opcodeFor,
  type Command,
  type Opcode,
} from './commands.js';
import { InvalidArgumentError, MalformedResponseError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

export interface SensorReadings {
  inputButtonState: boolean;
  /** Centimetres, as reported by the ultrasonic sensor */
  distanceSensor: number;
}

export interface SuccessResponse {
  status: 'success';
  opcode: Opcode;
  payload: Uint8Array;
}

export interface FirmwareErrorResponse {
  status: 'firmware-error';
  opcode: Opcode;
  errorCode: number;
  description: string;
  payload: Uint8Array;
}

export interface MalformedResponse {
  status: 'malformed';
  opcode: Opcode;
  reason: string;
  raw: Uint8Array;
}

export type Response = SuccessResponse | FirmwareErrorResponse | MalformedResponse;

// ============================================================================
// Validation
// ============================================================================

/**
 * Checks a command against its opcode's arity and ranges.
 * Throws InvalidArgumentError naming the first offending argument.
 */
export function validateCommand(input: unknown): Command {
  const result = CommandSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  
  const issue = result.error.issues[0];
  const argument = issue && issue.path.length > 0 ? issue.path.join('.') : 'command';
  const message = issue ? issue.message : 'Invalid command';
  throw new InvalidArgumentError(`${argument}: ${message}`, argument);
}

// ============================================================================
// Encoding
// ============================================================================

function frameBytes(command: Command, opcode: Opcode): number[] {
  switch (command.kind) {
    case 'ping':
    case 'sensors':
      return [opcode];
    case 'buzzer':
      return [opcode, BUZZER_STATES[command.state]];
    case 'motor':
      return [
        opcode,
        MOTOR_DIRECTIONS[command.direction],
        command.direction === 'stop' ? 0 : command.speed,
      ];
    case 'rgbLed':
      return [
        RGB_CHANNEL.RED, command.red,
        RGB_CHANNEL.GREEN, command.green,
        RGB_CHANNEL.BLUE, command.blue,
      ];
    case 'servo':
      return [opcode, command.position];
  }
}

export function encodeCommand(input: Command): Uint8Array {
  const command = validateCommand(input);
  const opcode = opcodeFor(command);
  const bytes = frameBytes(command, opcode);
  
  if (bytes.length !== COMMAND_FRAME_LENGTH[opcode]) {
    throw new Error(`Frame for opcode ${opcode} has ${bytes.length} bytes, expected ${COMMAND_FRAME_LENGTH[opcode]}`);
  }
  
  return Uint8Array.from(bytes);
}

// ============================================================================
// Decoding
// ============================================================================

export function expectedReplyLength(opcode: Opcode): number {
  return REPLY_HEADER_LENGTH + REPLY_PAYLOAD_LENGTH[opcode];
}

/**
 * Decode a reply to the outstanding opcode. Never throws: protocol
 * violations come back as `status: 'malformed'`.
 */
export function decodeReply(opcode: Opcode, bytes: Uint8Array): Response {
  const expected = expectedReplyLength(opcode);
  const malformed = (reason: string): MalformedResponse => ({
    status: 'malformed',
    opcode,
    reason,
    raw: bytes,
  });
  
  if (bytes.length !== expected) {
    return malformed(`expected ${expected} bytes, got ${bytes.length}`);
  }
  
  if (bytes[0] !== opcode) {
    return malformed(`opcode echo 0x${bytes[0].toString(16)} does not match 0x${opcode.toString(16)}`);
  }
  
  const status = bytes[1];
  const payload = bytes.slice(REPLY_HEADER_LENGTH);
  
  if (status !== STATUS_OK) {
    return {
      status: 'firmware-error',
      opcode,
      errorCode: status,
      description: describeFirmwareError(status),
      payload,
    };
  }
  
  if (opcode === OPCODE.SENSORS && payload[0] > 1) {
    return malformed(`button byte 0x${payload[0].toString(16)} is not 0 or 1`);
  }
  
  return { status: 'success', opcode, payload };
}

/**
 * Like decodeReply, but throws MalformedResponseError instead of returning
 * a malformed response. Firmware errors are still returned, not thrown.
 */
export function decode(opcode: Opcode, bytes: Uint8Array): SuccessResponse | FirmwareErrorResponse {
  const response = decodeReply(opcode, bytes);
  if (response.status === 'malformed') {
    throw new MalformedResponseError(`Malformed reply: ${response.reason}`, opcode, bytes);
  }
  return response;
}

export function decodeSensorPayload(payload: Uint8Array): SensorReadings {
  if (payload.length !== REPLY_PAYLOAD_LENGTH[OPCODE.SENSORS]) {
    throw new MalformedResponseError(
      `Sensor payload must be ${REPLY_PAYLOAD_LENGTH[OPCODE.SENSORS]} bytes, got ${payload.length}`,
      OPCODE.SENSORS,
      payload,
    );
  }
  
  return {
    inputButtonState: payload[0] === 1,
    distanceSensor: (payload[1] << 8) | payload[2],
  };
}

export function formatFrame(bytes: Uint8Array): string {
  return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join(' ');
}

/**
 * MiiA.bit host library
 *
 * Drives the robot's RGB LED, servo, motors and buzzer and reads its push
 * button and distance sensor over a USB serial link.
 */

export { MiiaBit, type MiiaBitOptions } from './MiiaBit.js';
export {
  CommandDispatcher,
  type CommandAck,
  type CommandDispatcherOptions,
} from './dispatcher/CommandDispatcher.js';
export {
  SerialSession,
  type ExchangeOptions,
  type ExchangeSession,
  type SerialSessionOptions,
  type SessionState,
  type SessionStats,
} from './serial/SerialSession.js';
export type { SerialLink, SerialLinkEvents, SerialLinkFactory, SerialLinkOptions } from './serial/SerialLink.js';
export { NodeSerialLink, createNodeSerialLink } from './serial/NodeSerialLink.js';
export { LoopbackFirmware, LOOPBACK_PATH, type LoopbackFirmwareOptions, type LoopbackResponder } from './serial/LoopbackFirmware.js';
export { pickRobotPort, resolveSerialPort } from './serial/portDiscovery.js';
export { SensorStateCache, type SensorReader, type SensorSnapshot } from './state/SensorStateCache.js';
export {
  decode,
  decodeReply,
  decodeSensorPayload,
  encodeCommand,
  expectedReplyLength,
  validateCommand,
  type Response,
  type SensorReadings,
} from './protocol/FrameCodec.js';
export {
  OPCODE,
  RANGE,
  MOTOR_IDS,
  type Command,
  type MotorId,
  type MotorDirection,
  type BuzzerState,
  type Opcode,
} from './protocol/commands.js';
export {
  RobotLinkError,
  InvalidArgumentError,
  ConnectionError,
  TimeoutError,
  MalformedResponseError,
  FirmwareError,
  type RobotErrorKind,
} from './errors.js';

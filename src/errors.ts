/**
 * Error taxonomy for the MiiA.bit serial link.
 *
 * Every failure surfaced to callers is one of these classes, distinguishable
 * by `instanceof` or by the `kind` discriminant.
 */

export type RobotErrorKind =
  | 'invalid-argument'
  | 'connection'
  | 'timeout'
  | 'malformed-response'
  | 'firmware';

export abstract class RobotLinkError extends Error {
  abstract readonly kind: RobotErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller-supplied value out of range or not a known enumeration member. Raised before any I/O. */
export class InvalidArgumentError extends RobotLinkError {
  readonly kind = 'invalid-argument';

  constructor(
    message: string,
    readonly argument: string,
  ) {
    super(message);
  }
}

export class ConnectionError extends RobotLinkError {
  readonly kind = 'connection';

  constructor(
    message: string,
    readonly port: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** No reply, or an incomplete one, within the exchange bound. */
export class TimeoutError extends RobotLinkError {
  readonly kind = 'timeout';

  constructor(
    readonly timeoutMs: number,
    readonly expectedBytes: number,
    readonly receivedBytes: number,
  ) {
    super(`No complete reply within ${timeoutMs}ms (received ${receivedBytes}/${expectedBytes} bytes)`);
  }
}

export class MalformedResponseError extends RobotLinkError {
  readonly kind = 'malformed-response';

  constructor(
    message: string,
    readonly opcode: number,
    readonly raw: Uint8Array,
  ) {
    super(message);
  }
}

export class FirmwareError extends RobotLinkError {
  readonly kind = 'firmware';

  constructor(
    readonly opcode: number,
    readonly errorCode: number,
    readonly description: string,
  ) {
    super(`Firmware rejected opcode ${opcode} with code 0x${errorCode.toString(16).padStart(2, '0')} (${description})`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

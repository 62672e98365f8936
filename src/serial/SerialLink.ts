/**
 * Byte-stream contract between the session and whatever carries the bytes:
 * a real serial port or the in-process loopback firmware.
 */

export interface SerialLinkEvents {
  onData: (chunk: Uint8Array) => void;
  onError: (error: Error) => void;
  onClose: () => void;
}

export interface SerialLinkOptions {
  path: string;
  baudRate: number;
}

export interface SerialLink {
  readonly path: string;
  readonly isOpen: boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  write(data: Uint8Array): Promise<void>;
}

export type SerialLinkFactory = (options: SerialLinkOptions, events: SerialLinkEvents) => SerialLink;

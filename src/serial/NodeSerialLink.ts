/**
 * Serial link over a USB serial device, backed by the serialport package.
 */

import { SerialPort } from 'serialport';
import { logger } from '../logging/logger.js';
import type { SerialLink, SerialLinkEvents, SerialLinkOptions } from './SerialLink.js';

export class NodeSerialLink implements SerialLink {
  private port: SerialPort | null = null;
  private readonly options: SerialLinkOptions;
  private readonly events: SerialLinkEvents;
  
  constructor(options: SerialLinkOptions, events: SerialLinkEvents) {
    this.options = options;
    this.events = events;
  }
  
  get path(): string {
    return this.options.path;
  }
  
  get isOpen(): boolean {
    return this.port !== null && this.port.isOpen;
  }
  
  async open(): Promise<void> {
    const port = new SerialPort({
      path: this.options.path,
      baudRate: this.options.baudRate,
      autoOpen: false,
      // Try to minimize DTR toggling (may not work on all platforms)
      hupcl: false,
    });
    
    port.on('data', (data: Buffer) => {
      this.events.onData(new Uint8Array(data));
    });
    
    port.on('error', (error: Error) => {
      logger.log('serial_error', { port: this.options.path, error: error.message });
      this.events.onError(error);
    });
    
    port.on('close', () => {
      logger.log('serial_close', { port: this.options.path });
      this.events.onClose();
    });
    
    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
    
    this.port = port;
    logger.log('serial_open', { port: this.options.path, baud: this.options.baudRate });
  }
  
  async close(): Promise<void> {
    const port = this.port;
    this.port = null;
    
    if (!port || !port.isOpen) {
      return;
    }
    
    await new Promise<void>((resolve, reject) => {
      port.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
  
  async write(data: Uint8Array): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) {
      throw new Error(`Port ${this.options.path} is not open`);
    }
    
    await new Promise<void>((resolve, reject) => {
      port.write(Buffer.from(data), (err) => {
        if (err) {
          reject(err);
          return;
        }
        // Wait until the OS has taken the bytes before the read window starts
        port.drain((drainErr) => {
          if (drainErr) {
            reject(drainErr);
          } else {
            resolve();
          }
        });
      });
    });
  }
}

export function createNodeSerialLink(options: SerialLinkOptions, events: SerialLinkEvents): SerialLink {
  return new NodeSerialLink(options, events);
}

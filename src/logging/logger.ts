/**
 * NDJSON Logger
 * Non-blocking logging to file with structured events
 */

import fs from 'fs';
import path from 'path';
import { LOG_PATH, LOG_CONSOLE, DEBUG } from '../config/env.js';

export type LogEvent =
  | 'serial_open'
  | 'serial_close'
  | 'serial_error'
  | 'session_state'
  | 'handshake_step'
  | 'tx_frame'
  | 'rx_bytes'
  | 'stale_bytes'
  | 'exchange_timeout'
  | 'exchange_retry'
  | 'malformed_reply'
  | 'firmware_error'
  | 'sensor_snapshot'
  | 'error';

export interface LogEntry {
  timestamp: number;
  event: LogEvent;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  logPath: string;
  console: boolean;
  debug: boolean;
}

export class Logger {
  private fd: number | null = null;
  private queue: string[] = [];
  private writing = false;
  private onDrained: (() => void) | null = null;
  private readonly options: LoggerOptions;
  
  constructor(options: LoggerOptions) {
    this.options = options;
    if (options.logPath) {
      this.ensureDir(options.logPath);
      this.open(options.logPath);
    }
  }
  
  private ensureDir(logPath: string): void {
    const dir = path.dirname(logPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
  
  private open(logPath: string): void {
    try {
      this.fd = fs.openSync(logPath, 'a');
    } catch (err) {
      console.error('[Logger] Failed to open log file:', err);
    }
  }
  
  log(event: LogEvent, data?: Record<string, unknown>): void {
    // Verbose rx_bytes only in DEBUG mode
    if (event === 'rx_bytes' && !this.options.debug) {
      return;
    }
    
    const entry: LogEntry = {
      timestamp: Date.now(),
      event,
      data,
    };
    
    if (this.fd === null) {
      return;
    }
    
    this.queue.push(JSON.stringify(entry) + '\n');
    
    // Non-blocking write
    if (!this.writing) {
      this.flush();
    }
  }
  
  private flush(): void {
    if (this.fd === null || this.queue.length === 0) {
      this.writing = false;
      return;
    }
    
    this.writing = true;
    const batch = this.queue.splice(0, 100).join('');
    
    fs.write(this.fd, batch, (err) => {
      if (err) {
        console.error('[Logger] Write error:', err);
      }
      if (this.queue.length > 0) {
        setImmediate(() => this.flush());
      } else {
        this.writing = false;
        this.onDrained?.();
      }
    });
  }
  
  /**
   * Wait for the write in flight, flush the rest synchronously and close the file
   */
  close(): Promise<void> {
    return new Promise(resolve => {
      const finish = (): void => {
        this.onDrained = null;
        if (this.fd !== null) {
          if (this.queue.length > 0) {
            fs.writeSync(this.fd, this.queue.join(''));
            this.queue = [];
          }
          fs.closeSync(this.fd);
          this.fd = null;
        }
        resolve();
      };
      
      if (this.writing) {
        this.onDrained = finish;
      } else {
        finish();
      }
    });
  }
  
  // Console logging helpers
  info(msg: string, data?: Record<string, unknown>): void {
    if (this.options.console) {
      console.log(`[MiiaBit] ${msg}`, data ? JSON.stringify(data) : '');
    }
  }
  
  warn(msg: string, data?: Record<string, unknown>): void {
    if (this.options.console) {
      console.warn(`[MiiaBit] WARN ${msg}`, data ? JSON.stringify(data) : '');
    }
  }
  
  error(msg: string, data?: Record<string, unknown>): void {
    if (this.options.console) {
      console.error(`[MiiaBit] ERROR ${msg}`, data ? JSON.stringify(data) : '');
    }
    this.log('error', { message: msg, ...data });
  }
  
  debug(msg: string, data?: Record<string, unknown>): void {
    if (this.options.console && this.options.debug) {
      console.log(`[MiiaBit] DEBUG ${msg}`, data ? JSON.stringify(data) : '');
    }
  }
}

export const logger = new Logger({
  logPath: LOG_PATH,
  console: LOG_CONSOLE,
  debug: DEBUG,
});

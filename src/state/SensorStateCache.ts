/**
 * Sensor State Cache
 * Holds the most recent sensor snapshot. Snapshots are frozen and replaced
 * wholesale, so a reader never sees fields from two different exchanges.
 */

import type { SensorReadings } from '../protocol/FrameCodec.js';

export interface SensorSnapshot extends Readonly<SensorReadings> {
  /** Epoch ms when the reply was decoded */
  readonly receivedAt: number;
  /** Increments by one with every successful refresh */
  readonly sequence: number;
}

/**
 * Read-only view handed to callers.
 */
export interface SensorReader {
  readonly snapshot: SensorSnapshot | null;
}

export class SensorStateCache implements SensorReader {
  private current: SensorSnapshot | null = null;
  private sequence = 0;
  
  get snapshot(): SensorSnapshot | null {
    return this.current;
  }
  
  replace(readings: SensorReadings, receivedAt: number = Date.now()): SensorSnapshot {
    const next: SensorSnapshot = Object.freeze({
      inputButtonState: readings.inputButtonState,
      distanceSensor: readings.distanceSensor,
      receivedAt,
      sequence: this.sequence + 1,
    });
    
    this.sequence = next.sequence;
    this.current = next;
    return next;
  }
}

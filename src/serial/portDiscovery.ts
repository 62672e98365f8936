/**
 * Picks the serial device the robot is most likely attached to.
 */

import { SerialPort } from 'serialport';
import { logger } from '../logging/logger.js';
import { errorMessage } from '../errors.js';

// micro:bit interface chip (Arm mbed DAPLink)
const MICROBIT_VENDOR_ID = '0d28';

export interface PortCandidate {
  path: string;
  manufacturer?: string;
  vendorId?: string;
}

export function isLikelyRobotPort(port: PortCandidate): boolean {
  const manufacturer = port.manufacturer?.toLowerCase() ?? '';
  return (
    port.vendorId?.toLowerCase() === MICROBIT_VENDOR_ID ||
    manufacturer.includes('arm') ||
    manufacturer.includes('mbed') ||
    manufacturer.includes('micro:bit')
  );
}

export function defaultPortPath(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case 'win32': return 'COM3';
    case 'darwin': return '/dev/tty.usbmodem1102';
    default: return '/dev/ttyACM0';
  }
}

/**
 * Robot-looking port first, then the first listed port, then the
 * platform default.
 */
export function pickRobotPort(ports: PortCandidate[], platform: NodeJS.Platform = process.platform): string {
  const robot = ports.find(isLikelyRobotPort);
  if (robot) {
    return robot.path;
  }
  if (ports.length > 0) {
    return ports[0].path;
  }
  return defaultPortPath(platform);
}

export async function resolveSerialPort(configured?: string): Promise<string> {
  if (configured) {
    return configured;
  }
  
  try {
    const ports = await SerialPort.list();
    const path = pickRobotPort(ports);
    logger.info(`Auto-detected port: ${path}`, { candidates: ports.length });
    return path;
  } catch (error) {
    logger.warn('Could not auto-detect port', { error: errorMessage(error) });
    return defaultPortPath();
  }
}

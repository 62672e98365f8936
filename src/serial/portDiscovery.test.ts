import { describe, expect, it } from 'vitest';
import { defaultPortPath, isLikelyRobotPort, pickRobotPort } from './portDiscovery.js';

describe('pickRobotPort', () => {
  it('prefers the micro:bit interface by vendor id', () => {
    const path = pickRobotPort([
      { path: '/dev/ttyS0' },
      { path: '/dev/ttyUSB0', manufacturer: 'FTDI', vendorId: '0403' },
      { path: '/dev/ttyACM1', vendorId: '0D28' },
    ], 'linux');
    expect(path).toBe('/dev/ttyACM1');
  });

  it('matches mbed manufacturers', () => {
    expect(isLikelyRobotPort({ path: 'COM7', manufacturer: 'mbed' })).toBe(true);
    expect(isLikelyRobotPort({ path: 'COM4', manufacturer: 'wch.cn' })).toBe(false);
  });

  it('falls back to the first listed port', () => {
    expect(pickRobotPort([{ path: '/dev/ttyUSB3' }, { path: '/dev/ttyUSB4' }], 'linux')).toBe('/dev/ttyUSB3');
  });

  it('falls back to the platform default when nothing is listed', () => {
    expect(pickRobotPort([], 'win32')).toBe('COM3');
    expect(pickRobotPort([], 'linux')).toBe('/dev/ttyACM0');
    expect(defaultPortPath('darwin')).toBe('/dev/tty.usbmodem1102');
  });
});

import { afterEach, describe, expect, it } from 'vitest';
import { MiiaBit, type MiiaBitOptions } from './MiiaBit.js';
import { LoopbackFirmware } from './serial/LoopbackFirmware.js';
import { OPCODE } from './protocol/commands.js';
import { ConnectionError, FirmwareError, TimeoutError } from './errors.js';

let counter = 0;
const robots: MiiaBit[] = [];

async function connect(firmware: LoopbackFirmware, options: MiiaBitOptions = {}): Promise<MiiaBit> {
  const robot = await MiiaBit.connect({
    path: `LOOPBACK-robot-${++counter}`,
    createLink: firmware.createLink,
    handshakeTimeoutMs: 50,
    openSettleMs: 0,
    replySettleMs: 0,
    commandTimeoutMs: 30,
    sensorTimeoutMs: 30,
    ...options,
  });
  robots.push(robot);
  return robot;
}

afterEach(async () => {
  await Promise.all(robots.splice(0).map(r => r.close()));
});

describe('MiiaBit', () => {
  it('runs the LED, servo and sensor scenario end to end', async () => {
    const firmware = new LoopbackFirmware({ buttonPressed: false, distanceCm: 37 });
    const robot = await connect(firmware);
    expect(robot.state).toBe('open');

    await expect(robot.controlRgbLed(12, 0, 90)).resolves.toMatchObject({ opcode: OPCODE.RGB_LED, attempts: 1 });
    expect(firmware.led).toEqual({ red: 12, green: 0, blue: 90 });

    await expect(robot.controlServoMotor(85)).resolves.toMatchObject({ opcode: OPCODE.SERVO, attempts: 1 });
    expect(firmware.servoPosition).toBe(85);

    expect(robot.inputButtonState).toBeNull();
    expect(robot.distanceSensor).toBeNull();

    await robot.getDataFromSensors();
    expect(robot.inputButtonState).toBe(false);
    expect(robot.distanceSensor).toBe(37);

    await robot.close();
    expect(robot.state).toBe('closed');
  });

  it('drives motors with calibration from the connect options', async () => {
    const firmware = new LoopbackFirmware();
    const robot = await connect(firmware, { motorACalibration: 5 });

    await robot.controlMotor('a', 'forward', 50);
    await robot.controlMotor('b', 'reverse', 20);

    expect(firmware.motors).toEqual({
      a: { direction: 'forward', speed: 55 },
      b: { direction: 'reverse', speed: 20 },
    });

    await robot.controlMotor('a', 'stop', 0);
    expect(firmware.motors.a).toEqual({ direction: 'stop', speed: 0 });
  });

  it('switches the buzzer', async () => {
    const firmware = new LoopbackFirmware();
    const robot = await connect(firmware);

    await robot.controlBuzzer('on');
    expect(firmware.buzzerOn).toBe(true);
    await robot.controlBuzzer('off');
    expect(firmware.buzzerOn).toBe(false);
  });

  it('keeps the last readings when a refresh fails', async () => {
    const firmware = new LoopbackFirmware({ buttonPressed: true, distanceCm: 120 });
    const robot = await connect(firmware);
    await robot.getDataFromSensors();

    firmware.distanceCm = 15;
    firmware.failNext(OPCODE.SENSORS, 0x04);

    await expect(robot.getDataFromSensors()).rejects.toBeInstanceOf(FirmwareError);
    expect(robot.inputButtonState).toBe(true);
    expect(robot.distanceSensor).toBe(120);

    await robot.getDataFromSensors();
    expect(robot.distanceSensor).toBe(15);
  });

  it('sends an actuator command twice to a silent robot', async () => {
    const firmware = new LoopbackFirmware();
    const robot = await connect(firmware);
    firmware.goSilent();

    await expect(robot.controlServoMotor(40)).rejects.toBeInstanceOf(TimeoutError);
    expect(firmware.frames.slice(1)).toEqual([Uint8Array.of(208, 40), Uint8Array.of(208, 40)]);
    expect(robot.state).toBe('degraded');
  });

  it('sends a sensor query once to a silent robot', async () => {
    const firmware = new LoopbackFirmware();
    const robot = await connect(firmware);
    firmware.goSilent();

    await expect(robot.getDataFromSensors()).rejects.toBeInstanceOf(TimeoutError);
    expect(firmware.frames.slice(1)).toEqual([Uint8Array.of(209)]);
    expect(robot.state).toBe('degraded');
  });

  it('refuses every operation after a timeout until reconnected', async () => {
    const firmware = new LoopbackFirmware({ distanceCm: 42 });
    const robot = await connect(firmware);
    firmware.goSilent();
    await expect(robot.getDataFromSensors()).rejects.toBeInstanceOf(TimeoutError);
    firmware.setResponder(null);

    await expect(robot.controlRgbLed(1, 2, 3)).rejects.toBeInstanceOf(ConnectionError);
    await expect(robot.getDataFromSensors()).rejects.toBeInstanceOf(ConnectionError);
    await expect(robot.ping()).rejects.toBeInstanceOf(ConnectionError);
    expect(firmware.frames).toHaveLength(2);
    expect(firmware.led).toEqual({ red: 0, green: 0, blue: 0 });
    expect(robot.state).toBe('degraded');

    await robot.reconnect();
    await robot.getDataFromSensors();
    expect(robot.distanceSensor).toBe(42);
  });

  it('recovers from a degraded session by reconnecting', async () => {
    const firmware = new LoopbackFirmware();
    const robot = await connect(firmware);
    firmware.goSilent();
    await expect(robot.ping()).rejects.toBeInstanceOf(TimeoutError);
    expect(robot.state).toBe('degraded');

    firmware.setResponder(null);
    await robot.reconnect();

    expect(robot.state).toBe('open');
    await expect(robot.controlRgbLed(1, 2, 3)).resolves.toMatchObject({ attempts: 1 });
  });

  it('rejects invalid calibration before opening the port', async () => {
    const firmware = new LoopbackFirmware();

    await expect(connect(firmware, { motorBCalibration: 80 })).rejects.toMatchObject({ kind: 'invalid-argument' });
    expect(firmware.frames).toHaveLength(0);
  });

  it('connects to the built-in loopback firmware', async () => {
    const robot = await MiiaBit.connect({ loopback: true, openSettleMs: 0, replySettleMs: 0 });
    robots.push(robot);

    expect(robot.port).toBe('LOOPBACK');
    await robot.getDataFromSensors();
    expect(robot.distanceSensor).toBe(0);
  });
});

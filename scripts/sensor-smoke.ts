/**
 * Sensor Smoke Test Script
 * Walks the robot through LED, servo, motor and sensor commands and reports
 * each phase.
 *
 * SAFETY: motors run at low speed for short bursts and are stopped after
 * every movement.
 *
 * Usage:
 *   npm run smoke             # real robot (SERIAL_PORT or auto-detect)
 *   npm run smoke:loopback
 *
 * Both write the event log to ./data/smoke.log unless LOG_PATH says otherwise.
 */

import 'dotenv/config';
import { MiiaBit, RobotLinkError } from '../src/index.js';
import { logger } from '../src/logging/logger.js';

const SAFE_SPEED = 30;
const SAFE_DURATION_MS = 300;

interface PhaseResult {
  phase: string;
  passed: boolean;
}

function log(msg: string, data?: unknown): void {
  const ts = new Date().toISOString().split('T')[1].slice(0, 12);
  if (data !== undefined) {
    console.log(`[${ts}] ${msg}`, typeof data === 'string' ? data : JSON.stringify(data));
  } else {
    console.log(`[${ts}] ${msg}`);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function stopMotors(robot: MiiaBit): Promise<void> {
  await robot.controlMotor('a', 'stop', 0);
  await robot.controlMotor('b', 'stop', 0);
}

async function main(): Promise<void> {
  const results: PhaseResult[] = [];
  let robot: MiiaBit | null = null;
  
  try {
    robot = await MiiaBit.connect();
    log(`Connected to ${robot.port}`);
    const connected = robot;
    
    const phases: { name: string; run: () => Promise<void> }[] = [
      {
        name: 'RGB LED',
        run: async () => {
          await connected.controlRgbLed(12, 0, 90);
          await sleep(200);
          await connected.controlRgbLed(0, 0, 0);
        },
      },
      {
        name: 'Servo sweep',
        run: async () => {
          for (const position of [85, 20, 50]) {
            await connected.controlServoMotor(position);
            await sleep(250);
          }
        },
      },
      {
        name: 'Motors forward/reverse',
        run: async () => {
          await connected.controlMotor('a', 'forward', SAFE_SPEED);
          await connected.controlMotor('b', 'forward', SAFE_SPEED);
          await sleep(SAFE_DURATION_MS);
          await stopMotors(connected);
          await connected.controlMotor('a', 'reverse', SAFE_SPEED);
          await connected.controlMotor('b', 'reverse', SAFE_SPEED);
          await sleep(SAFE_DURATION_MS);
          await stopMotors(connected);
        },
      },
      {
        name: 'Buzzer',
        run: async () => {
          await connected.controlBuzzer('on');
          await sleep(100);
          await connected.controlBuzzer('off');
        },
      },
      {
        name: 'Sensors',
        run: async () => {
          for (let i = 0; i < 3; i++) {
            await connected.getDataFromSensors();
            log('Sensors:', { button: connected.inputButtonState, distance: connected.distanceSensor });
            await sleep(100);
          }
        },
      },
    ];
    
    for (const phase of phases) {
      log(`--- ${phase.name} ---`);
      try {
        await phase.run();
        log(`✓ ${phase.name}`);
        results.push({ phase: phase.name, passed: true });
      } catch (error) {
        const kind = error instanceof RobotLinkError ? error.kind : 'unexpected';
        log(`✗ ${phase.name} error (${kind}): ${error instanceof Error ? error.message : error}`);
        results.push({ phase: phase.name, passed: false });
        if (connected.state === 'degraded') {
          log('Session degraded, reconnecting');
          await connected.reconnect();
        }
      }
    }
    
    log('Session stats:', robot.getStats());
  } catch (error) {
    console.error('Smoke test failed:', error instanceof Error ? error.message : error);
    results.push({ phase: 'Connect', passed: false });
  } finally {
    if (robot) {
      await robot.close();
    }
    await logger.close();
  }
  
  const passed = results.filter(r => r.passed).length;
  console.log('');
  for (const r of results) {
    console.log(`  ${r.passed ? '✓' : '✗'} ${r.phase}`);
  }
  console.log(`Passed: ${passed}/${results.length}`);
  
  process.exitCode = passed === results.length ? 0 : 1;
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});

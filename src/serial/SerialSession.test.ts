import { afterEach, describe, expect, it } from 'vitest';
import { LoopbackFirmware } from './LoopbackFirmware.js';
import { SerialSession, type SerialSessionOptions, type SessionState } from './SerialSession.js';
import type { SerialLink, SerialLinkEvents } from './SerialLink.js';
import { ConnectionError, InvalidArgumentError, TimeoutError } from '../errors.js';

const SERVO_85 = Uint8Array.of(208, 85);

// A port whose open() completes only when the test says so
class SlowOpenLink implements SerialLink {
  isOpen = false;
  closeCalls = 0;
  private release: (() => void) | null = null;

  constructor(readonly path: string, private readonly events: SerialLinkEvents) {}

  open(): Promise<void> {
    return new Promise(resolve => {
      this.release = () => {
        this.isOpen = true;
        resolve();
      };
    });
  }

  finishOpen(): void {
    this.release?.();
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.isOpen = false;
  }

  async write(data: Uint8Array): Promise<void> {
    this.events.onData(Uint8Array.of(data[0], 0));
  }
}

let counter = 0;
const sessions: SerialSession[] = [];

function createSession(firmware: LoopbackFirmware, overrides: Partial<SerialSessionOptions> = {}): SerialSession {
  const session = new SerialSession({
    path: `LOOPBACK-session-${++counter}`,
    createLink: firmware.createLink,
    handshakeTimeoutMs: 30,
    handshakeAttempts: 2,
    openSettleMs: 0,
    replySettleMs: 0,
    ...overrides,
  });
  sessions.push(session);
  return session;
}

afterEach(async () => {
  await Promise.all(sessions.splice(0).map(s => s.close()));
});

describe('SerialSession open', () => {
  it('pings the firmware and becomes open', async () => {
    const firmware = new LoopbackFirmware();
    const states: SessionState[] = [];
    const session = createSession(firmware, { onStateChange: state => states.push(state) });

    await session.open();

    expect(session.state).toBe('open');
    expect(states).toEqual(['opening', 'open']);
    expect(firmware.frames).toEqual([Uint8Array.of(0)]);
  });

  it('fails with ConnectionError when the port cannot be opened', async () => {
    const firmware = new LoopbackFirmware();
    firmware.failOpen(new Error('ENOENT'));
    const session = createSession(firmware);

    await expect(session.open()).rejects.toBeInstanceOf(ConnectionError);
    expect(session.state).toBe('closed');

    // The path was released, so a later attempt can succeed
    await session.open();
    expect(session.state).toBe('open');
  });

  it('fails with ConnectionError when the firmware never answers the ping', async () => {
    const firmware = new LoopbackFirmware();
    firmware.goSilent();
    const session = createSession(firmware);

    await expect(session.open()).rejects.toBeInstanceOf(ConnectionError);
    expect(session.state).toBe('closed');
    expect(firmware.frames).toHaveLength(2);
  });

  it('refuses a second session on the same device', async () => {
    const first = createSession(new LoopbackFirmware(), { path: 'LOOPBACK-shared' });
    const second = createSession(new LoopbackFirmware(), { path: 'LOOPBACK-shared' });

    await first.open();
    await expect(second.open()).rejects.toThrow('LOOPBACK-shared is already open in another session');
    expect(first.state).toBe('open');
  });

  it('refuses to open twice', async () => {
    const session = createSession(new LoopbackFirmware());
    await session.open();
    await expect(session.open()).rejects.toThrow('Cannot open: state is open');
  });
});

describe('SerialSession exchange', () => {
  it('returns the reply bytes and goes back to open', async () => {
    const session = createSession(new LoopbackFirmware());
    await session.open();

    const reply = await session.exchange(SERVO_85, 2, 50);

    expect(reply).toEqual(Uint8Array.of(208, 0));
    expect(session.state).toBe('open');
    expect(session.getStats()).toMatchObject({ exchanges: 1, timeouts: 0, txBytes: 3, rxBytes: 4 });
  });

  it('refuses to exchange while closed', async () => {
    const session = createSession(new LoopbackFirmware());
    await expect(session.exchange(SERVO_85, 2, 50)).rejects.toBeInstanceOf(ConnectionError);
  });

  it('requires a positive finite timeout', async () => {
    const session = createSession(new LoopbackFirmware());
    await session.open();

    await expect(session.exchange(SERVO_85, 2, 0)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(session.exchange(SERVO_85, 2, Infinity)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(session.getStats().exchanges).toBe(0);
  });

  it('rejects an overlapping exchange', async () => {
    const session = createSession(new LoopbackFirmware());
    await session.open();

    const first = session.exchange(SERVO_85, 2, 50);
    await expect(session.exchange(SERVO_85, 2, 50)).rejects.toThrow('Exchange already in progress');
    await expect(first).resolves.toEqual(Uint8Array.of(208, 0));
  });

  it('times out and degrades when nothing comes back', async () => {
    const firmware = new LoopbackFirmware();
    const session = createSession(firmware);
    await session.open();
    firmware.goSilent();

    const error = await session.exchange(SERVO_85, 2, 20).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ timeoutMs: 20, expectedBytes: 2, receivedBytes: 0 });
    expect(session.state).toBe('degraded');
    expect(session.getStats().timeouts).toBe(1);
  });

  it('reports a partial reply as a timeout', async () => {
    const firmware = new LoopbackFirmware();
    const session = createSession(firmware);
    await session.open();
    firmware.setResponder((_frame, reply) => reply.slice(0, 1));

    await expect(session.exchange(SERVO_85, 2, 20)).rejects.toMatchObject({ kind: 'timeout', receivedBytes: 1 });
  });

  it('refuses exchanges while degraded until reopened', async () => {
    const firmware = new LoopbackFirmware();
    const session = createSession(firmware);
    await session.open();

    firmware.goSilent();
    await expect(session.exchange(SERVO_85, 2, 20)).rejects.toBeInstanceOf(TimeoutError);
    firmware.setResponder(null);

    const error = await session.exchange(SERVO_85, 2, 50).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ message: expect.stringContaining('is degraded') });
    expect(firmware.frames).toHaveLength(2);
    expect(session.state).toBe('degraded');

    await session.close();
    await session.open();
    expect(session.state).toBe('open');
    expect(session.getStats().degradedReason).toBeNull();
    await expect(session.exchange(SERVO_85, 2, 50)).resolves.toEqual(Uint8Array.of(208, 0));
  });

  it('lets a retry through a degraded session without restoring it', async () => {
    const firmware = new LoopbackFirmware();
    const session = createSession(firmware);
    await session.open();

    firmware.goSilent();
    await expect(session.exchange(SERVO_85, 2, 20)).rejects.toBeInstanceOf(TimeoutError);
    firmware.setResponder(null);

    await expect(session.exchange(SERVO_85, 2, 50, { retry: true })).resolves.toEqual(Uint8Array.of(208, 0));
    expect(session.state).toBe('degraded');
  });

  it('hands trailing bytes to the caller', async () => {
    const firmware = new LoopbackFirmware();
    const session = createSession(firmware);
    await session.open();
    firmware.setResponder((_frame, reply) => Uint8Array.of(...reply, 0x7a));

    await expect(session.exchange(SERVO_85, 2, 50)).resolves.toEqual(Uint8Array.of(208, 0, 0x7a));
  });

  it('collects trailing bytes that arrive within the settle window', async () => {
    const firmware = new LoopbackFirmware();
    const session = createSession(firmware, { replySettleMs: 30 });
    await session.open();
    firmware.setResponder((_frame, reply) => {
      setTimeout(() => firmware.emit(Uint8Array.of(0x63)), 5);
      return reply;
    });

    await expect(session.exchange(SERVO_85, 2, 200)).resolves.toEqual(Uint8Array.of(208, 0, 0x63));
  });

  it('discards bytes that arrived before the exchange', async () => {
    const firmware = new LoopbackFirmware();
    const session = createSession(firmware);
    await session.open();
    firmware.emit(Uint8Array.of(0x63, 0x01));

    await expect(session.exchange(SERVO_85, 2, 50)).resolves.toEqual(Uint8Array.of(208, 0));
    expect(session.getStats().staleBytesDiscarded).toBe(2);
  });

  it('keeps only the latest unsolicited bytes between exchanges', async () => {
    const firmware = new LoopbackFirmware();
    const session = createSession(firmware);
    await session.open();

    firmware.emit(new Uint8Array(100).fill(0x55));

    expect(session.getStats()).toMatchObject({ bufferedBytes: 64, staleBytesDiscarded: 36 });
    await expect(session.exchange(SERVO_85, 2, 50)).resolves.toEqual(Uint8Array.of(208, 0));
    expect(session.getStats()).toMatchObject({ bufferedBytes: 0, staleBytesDiscarded: 100 });
  });

  it('fails exchanges after the device is unplugged', async () => {
    const firmware = new LoopbackFirmware();
    const session = createSession(firmware);
    await session.open();

    firmware.unplug();

    expect(session.state).toBe('degraded');
    await expect(session.exchange(SERVO_85, 2, 50)).rejects.toThrow('is down');
  });
});

describe('SerialSession close', () => {
  it('abandons a hung exchange', async () => {
    const firmware = new LoopbackFirmware();
    const session = createSession(firmware);
    await session.open();
    firmware.goSilent();

    const hung = session.exchange(SERVO_85, 2, 5000).catch((e: unknown) => e);
    await session.close();

    const error = await hung;
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ message: 'Session closed during exchange' });
    expect(session.state).toBe('closed');
  });

  it('releases a port whose open completes after close()', async () => {
    const links: SlowOpenLink[] = [];
    const session = createSession(new LoopbackFirmware(), {
      path: 'LOOPBACK-slow-open',
      createLink: (options, events) => {
        const link = new SlowOpenLink(options.path, events);
        links.push(link);
        return link;
      },
    });

    const opened = session.open().catch((e: unknown) => e);
    const closed = session.close();

    const rival = createSession(new LoopbackFirmware(), { path: 'LOOPBACK-slow-open' });
    await expect(rival.open()).rejects.toThrow('LOOPBACK-slow-open is already open in another session');

    for (const link of links) {
      link.finishOpen();
    }
    await closed;

    expect(await opened).toBeInstanceOf(ConnectionError);
    expect(session.state).toBe('closed');
    expect(links.map(link => ({ isOpen: link.isOpen, closeCalls: link.closeCalls }))).toEqual([
      { isOpen: false, closeCalls: 1 },
    ]);

    await rival.open();
    expect(rival.state).toBe('open');
  });

  it('is idempotent', async () => {
    const session = createSession(new LoopbackFirmware());
    await session.open();

    await session.close();
    await session.close();

    expect(session.state).toBe('closed');
  });
});

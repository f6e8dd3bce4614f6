import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildRingConnection, connectWithRetries, createTransport, startNotifying } from '../../src/ble/shared.js';
import type { BleChar, BleDevice } from '../../src/ble/shared.js';
import { normalizeUuid } from '../../src/ble/types.js';
import {
  BIG_DATA_NOTIFY_UUID,
  BIG_DATA_WRITE_UUID,
  UART_NOTIFY_UUID,
  UART_WRITE_UUID,
} from '../../src/protocol/constants.js';

// Suppress log output during tests
beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Test helpers ────────────────────────────────────────────────────────────

interface MockBleChar extends BleChar {
  triggerData(data: Buffer): void;
  writtenData: Buffer[];
  stopCount: number;
}

function createMockChar(readValue = Buffer.alloc(0)): MockBleChar {
  let onDataCallback: ((data: Buffer) => void) | null = null;
  const char: MockBleChar = {
    writtenData: [],
    stopCount: 0,
    subscribe: vi.fn(async (onData: (data: Buffer) => void) => {
      onDataCallback = onData;
      return async () => {
        onDataCallback = null;
        char.stopCount++;
      };
    }),
    write: vi.fn(async (data: Buffer) => {
      char.writtenData.push(data);
    }),
    read: vi.fn(async () => readValue),
    triggerData: (data: Buffer) => {
      if (onDataCallback) onDataCallback(data);
    },
  };
  return char;
}

function createMockDevice(): BleDevice & { triggerDisconnect: () => void } {
  const callbacks: (() => void)[] = [];
  return {
    onDisconnect: (callback) => {
      callbacks.push(callback);
    },
    disconnect: vi.fn(async () => {}),
    triggerDisconnect: () => {
      for (const cb of callbacks) cb();
    },
  };
}

// ─── createTransport() ───────────────────────────────────────────────────────

describe('createTransport()', () => {
  it('writes without response', async () => {
    const writeChar = createMockChar();
    const transport = createTransport(writeChar, createMockChar(), 'uart');

    await transport.write(Buffer.of(1, 2));
    expect(writeChar.write).toHaveBeenCalledWith(Buffer.of(1, 2), false);
  });

  it('enables notifications once and fans frames out to every subscriber', async () => {
    const notifyChar = createMockChar();
    const transport = createTransport(createMockChar(), notifyChar, 'uart');
    const a: number[] = [];
    const b: number[] = [];

    const subA = await transport.subscribe((f) => a.push(f[0]));
    const subB = await transport.subscribe((f) => b.push(f[0]));
    expect(subA.id).not.toBe(subB.id);
    expect(notifyChar.subscribe).toHaveBeenCalledTimes(1);

    notifyChar.triggerData(Buffer.of(7));
    expect(a).toEqual([7]);
    expect(b).toEqual([7]);
  });

  it('disables notifications when the last subscriber leaves', async () => {
    const notifyChar = createMockChar();
    const transport = createTransport(createMockChar(), notifyChar, 'uart');
    const seen: number[] = [];

    const subA = await transport.subscribe((f) => seen.push(f[0]));
    const subB = await transport.subscribe(() => {});

    await transport.unsubscribe(subA);
    notifyChar.triggerData(Buffer.of(1));
    expect(seen).toEqual([]);
    expect(notifyChar.stopCount).toBe(0);

    await transport.unsubscribe(subB);
    expect(notifyChar.stopCount).toBe(1);

    // unknown or repeated handles are ignored
    await transport.unsubscribe(subB);
    expect(notifyChar.stopCount).toBe(1);
  });

  it('re-enables notifications for a later subscriber', async () => {
    const notifyChar = createMockChar();
    const transport = createTransport(createMockChar(), notifyChar, 'uart');

    await transport.unsubscribe(await transport.subscribe(() => {}));
    await transport.subscribe(() => {});
    expect(notifyChar.subscribe).toHaveBeenCalledTimes(2);
  });

  it('does not keep a handler when enabling notifications fails', async () => {
    const notifyChar = createMockChar();
    vi.mocked(notifyChar.subscribe).mockRejectedValueOnce(new Error('Notify not permitted'));
    const transport = createTransport(createMockChar(), notifyChar, 'uart');
    const seen: number[] = [];

    await expect(transport.subscribe((f) => seen.push(f[0]))).rejects.toThrow('Notify not permitted');
    await transport.subscribe(() => {});
    notifyChar.triggerData(Buffer.of(3));
    expect(seen).toEqual([]);
  });
});

// ─── startNotifying() ────────────────────────────────────────────────────────

describe('startNotifying()', () => {
  const hooks = () => {
    const calls: string[] = [];
    return {
      calls,
      attach: vi.fn(() => void calls.push('attach')),
      detach: vi.fn(() => void calls.push('detach')),
      start: vi.fn(async () => void calls.push('start')),
      stop: vi.fn(async () => void calls.push('stop')),
    };
  };

  it('removes the data listener when notifications fail to start', async () => {
    const h = hooks();
    h.start.mockRejectedValueOnce(new Error('CCCD write failed'));

    await expect(startNotifying(h)).rejects.toThrow('CCCD write failed');
    expect(h.calls).toEqual(['attach', 'detach']);
    expect(h.stop).not.toHaveBeenCalled();
  });

  it('returns an unsubscribe that detaches before stopping', async () => {
    const h = hooks();

    const unsubscribe = await startNotifying(h);
    expect(h.calls).toEqual(['attach', 'start']);

    await unsubscribe();
    expect(h.calls).toEqual(['attach', 'start', 'detach', 'stop']);
  });
});

// ─── buildRingConnection() ───────────────────────────────────────────────────

function ringCharMap(): Map<string, MockBleChar> {
  const map = new Map<string, MockBleChar>();
  for (const uuid of [UART_WRITE_UUID, UART_NOTIFY_UUID, BIG_DATA_WRITE_UUID, BIG_DATA_NOTIFY_UUID]) {
    map.set(normalizeUuid(uuid), createMockChar());
  }
  map.set(normalizeUuid('2a26'), createMockChar(Buffer.from('RY02_3.00.06_240105')));
  return map;
}

describe('buildRingConnection()', () => {
  it('routes uart and big-data traffic to their characteristics', async () => {
    const chars = ringCharMap();
    const conn = buildRingConnection(new Map<string, BleChar>(chars), createMockDevice(), 'R02_AB12', 'AA:BB:CC:DD:EE:FF');

    await conn.uart.write(Buffer.of(3));
    await conn.bigData.write(Buffer.of(0xbc));
    expect(chars.get(normalizeUuid(UART_WRITE_UUID))?.writtenData).toEqual([Buffer.of(3)]);
    expect(chars.get(normalizeUuid(BIG_DATA_WRITE_UUID))?.writtenData).toEqual([Buffer.of(0xbc)]);
    expect(conn.name).toBe('R02_AB12');
    expect(conn.address).toBe('AA:BB:CC:DD:EE:FF');
  });

  it('reads characteristics by short UUID', async () => {
    const conn = buildRingConnection(new Map<string, BleChar>(ringCharMap()), createMockDevice(), 'R02', 'addr');
    expect((await conn.read('2a26')).toString()).toBe('RY02_3.00.06_240105');
    await expect(conn.read('2a25')).rejects.toThrow('Characteristic 2a25 not found');
  });

  it('throws when a required characteristic is missing', () => {
    const chars = ringCharMap();
    chars.delete(normalizeUuid(BIG_DATA_NOTIFY_UUID));
    expect(() => buildRingConnection(new Map<string, BleChar>(chars), createMockDevice(), 'R02', 'addr')).toThrow(
      `Characteristic ${BIG_DATA_NOTIFY_UUID} not found`,
    );
  });

  it('disconnects once, and not after the ring dropped the link', async () => {
    const device = createMockDevice();
    const conn = buildRingConnection(new Map<string, BleChar>(ringCharMap()), device, 'R02', 'addr');

    await conn.disconnect();
    await conn.disconnect();
    expect(device.disconnect).toHaveBeenCalledTimes(1);

    const dropped = createMockDevice();
    const conn2 = buildRingConnection(new Map<string, BleChar>(ringCharMap()), dropped, 'R02', 'addr');
    dropped.triggerDisconnect();
    await conn2.disconnect();
    expect(dropped.disconnect).not.toHaveBeenCalled();
  });
});

// ─── connectWithRetries() ────────────────────────────────────────────────────

describe('connectWithRetries()', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resets and retries after a failed attempt', async () => {
    vi.useFakeTimers();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const connect = vi.fn<() => Promise<void>>().mockRejectedValueOnce(new Error('le-connection-abort')).mockResolvedValue();
    const reset = vi.fn(async () => {});

    const pending = connectWithRetries({ connect, reset }, 3);
    await vi.advanceTimersByTimeAsync(1000);
    await pending;

    expect(connect).toHaveBeenCalledTimes(2);
    expect(reset).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last retry', async () => {
    vi.useFakeTimers();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const connect = vi.fn(async () => {
      throw new Error('Device busy');
    });

    const pending = connectWithRetries({ connect, reset: async () => {} }, 1);
    const assertion = expect(pending).rejects.toThrow('Connection failed after 2 attempts: Device busy');
    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
  });

  it('stops waiting between attempts when aborted', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const ac = new AbortController();
    const connect = vi.fn(async () => {
      ac.abort(new Error('cancelled'));
      throw new Error('Device busy');
    });

    await expect(connectWithRetries({ connect, reset: async () => {} }, 3, ac.signal)).rejects.toThrow('cancelled');
    expect(connect).toHaveBeenCalledTimes(1);
  });
});

import { beforeEach, describe, expect, it, vi } from 'vitest';

const fake = vi.hoisted(() => {
  type Callback = (err: Error | null) => void;
  type Listener = (data: Buffer) => void;

  class FakeSerialPort {
    static instances: FakeSerialPort[] = [];
    static openError: Error | null = null;
    static reply: Buffer | null = null;

    options: Record<string, unknown>;
    isOpen = false;
    signals: Array<{ dtr?: boolean; rts?: boolean }> = [];
    written: Buffer[] = [];
    flushes = 0;
    private listeners = new Map<string, Listener[]>();

    constructor(options: Record<string, unknown>) {
      this.options = options;
      FakeSerialPort.instances.push(this);
    }

    open(callback: Callback): void {
      const error = FakeSerialPort.openError;
      if (!error) this.isOpen = true;
      setImmediate(() => callback(error));
    }

    close(callback: Callback): void {
      this.isOpen = false;
      setImmediate(() => {
        callback(null);
        this.emit('close', Buffer.alloc(0));
      });
    }

    set(signals: { dtr?: boolean; rts?: boolean }, callback: Callback): void {
      this.signals.push(signals);
      callback(null);
    }

    flush(callback: Callback): void {
      this.flushes++;
      callback(null);
    }

    write(data: Buffer, callback: Callback): boolean {
      this.written.push(data);
      const reply = FakeSerialPort.reply;
      if (reply) setTimeout(() => this.emit('data', reply), 5);
      callback(null);
      return true;
    }

    drain(callback: Callback): void {
      callback(null);
    }

    on(event: string, listener: Listener): this {
      this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener]);
      return this;
    }

    removeAllListeners(event: string): this {
      this.listeners.delete(event);
      return this;
    }

    emit(event: string, data: Buffer): void {
      for (const listener of this.listeners.get(event) ?? []) listener(data);
    }
  }

  return { FakeSerialPort };
});

vi.mock('serialport', () => ({ SerialPort: fake.FakeSerialPort }));

import Logger from '../src/logger.js';
import { SspConnectionError, SspNotConnectedError } from '../src/errors.js';
import { buildPacket } from '../src/packet-builder.js';
import { NodeSerialTransport } from '../src/transport/node-transports/node-serialport.js';
import { createTransport } from '../src/transport/factory.js';
import { toHex } from '../src/utils/utils.js';

const PATH = '/dev/ttyUSB0';
const noop = (): void => {};
const silent = new Logger({ debug: noop, info: noop, warn: noop, error: noop }).createLogger(
  'NodeSerialTransport'
);

function createLink(baudRate = 19200): NodeSerialTransport {
  return new NodeSerialTransport(PATH, { baudRate, readTimeout: 30, logger: silent });
}

function lastPort() {
  const port = fake.FakeSerialPort.instances[fake.FakeSerialPort.instances.length - 1];
  if (!port) throw new Error('no port was created');
  return port;
}

describe('NodeSerialTransport', () => {
  beforeEach(() => {
    fake.FakeSerialPort.instances = [];
    fake.FakeSerialPort.openError = null;
    fake.FakeSerialPort.reply = null;
  });

  it('opens the port as 8N1 at the requested baud rate', async () => {
    const link = createLink();

    await link.connect();

    expect(link.isOpen).toBe(true);
    expect(lastPort().options).toEqual({
      path: PATH,
      baudRate: 19200,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      autoOpen: false,
    });
    await link.disconnect();
  });

  it('drives DTR and RTS', async () => {
    const link = createLink();
    await link.connect();

    await link.setSignals({ dtr: true, rts: false });

    expect(lastPort().signals).toEqual([{ dtr: true, rts: false }]);
    await link.disconnect();
  });

  it('writes the packet and reads the reply', async () => {
    const reply = buildPacket(0xf0, 0x80);
    fake.FakeSerialPort.reply = Buffer.from(reply);
    const link = createLink();
    await link.connect();

    await link.write(buildPacket(0x11, 0x80));
    const data = await link.read(reply.length, 1000);

    expect(toHex(lastPort().written[0] ?? new Uint8Array(0))).toBe('7f800111a1ff');
    expect(toHex(data)).toBe(toHex(reply));
    await link.disconnect();
  });

  it('returns whatever arrived when the timeout passes', async () => {
    fake.FakeSerialPort.reply = Buffer.from([0x7f, 0x80]);
    const link = createLink();
    await link.connect();

    await link.write(buildPacket(0x11, 0x80));
    const data = await link.read(64, 40);

    expect(toHex(data)).toBe('7f80');
    await link.disconnect();
  });

  it('returns nothing when the device stays silent', async () => {
    const link = createLink();
    await link.connect();

    await link.write(buildPacket(0x11, 0x80));
    const data = await link.read(64);

    expect(data).toHaveLength(0);
    await link.disconnect();
  });

  it('drops buffered bytes on flush', async () => {
    fake.FakeSerialPort.reply = Buffer.from([0x01, 0x02, 0x03]);
    const link = createLink();
    await link.connect();
    await link.write(buildPacket(0x11, 0x80));
    await new Promise(resolve => setTimeout(resolve, 20));

    await link.flush();
    const data = await link.read(3, 20);

    expect(lastPort().flushes).toBe(1);
    expect(data).toHaveLength(0);
    await link.disconnect();
  });

  it('reports a permission problem on open with the port context', async () => {
    fake.FakeSerialPort.openError = new Error('Error: Permission denied, cannot open /dev/ttyUSB0');
    const link = createLink();

    await expect(link.connect()).rejects.toThrow(
      new SspConnectionError('Permission denied', { path: PATH, baudRate: 19200 })
    );
    expect(link.isOpen).toBe(false);
  });

  it('rejects baud rates the driver cannot use', async () => {
    const link = createLink(250000);

    await expect(link.connect()).rejects.toThrow('Invalid baud rate: 250000 (/dev/ttyUSB0, 250000 baud)');
    expect(fake.FakeSerialPort.instances).toHaveLength(0);
  });

  it('refuses to write before the port is open', async () => {
    const link = createLink();

    await expect(link.write(Uint8Array.from([0x7f]))).rejects.toBeInstanceOf(SspNotConnectedError);
  });

  it('closes the port on disconnect', async () => {
    const link = createLink();
    await link.connect();
    const port = lastPort();

    await link.disconnect();

    expect(link.isOpen).toBe(false);
    expect(port.isOpen).toBe(false);
  });
});

describe('createTransport', () => {
  it('builds a serial transport for a path', () => {
    expect(createTransport(PATH, { baudRate: 9600, logger: silent })).toBeInstanceOf(NodeSerialTransport);
  });

  it('refuses an empty path', () => {
    expect(() => createTransport('', {})).toThrow();
  });
});

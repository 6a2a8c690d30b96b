import { describe, expect, it, vi } from 'vitest';
import { ExitCode } from '../src/constants/constants.js';
import type { ProbeConfig } from '../src/config.js';
import { SspAccessDeniedError } from '../src/errors.js';
import { buildPacket } from '../src/packet-builder.js';
import { runProbe } from '../src/runner.js';
import type { ProbeDependencies } from '../src/runner.js';
import type { PortInfo } from '../src/types/ssp-types.js';
import { fail, ok } from '../src/utils/result.js';
import { createRecordingLogger, messages } from './helpers/logger.js';
import { SimulatedLink } from './helpers/simulated-link.js';
import type { LinkState } from './helpers/simulated-link.js';

const CONFIG: ProbeConfig = {
  target: { vendorId: 0x191c, productId: 0x4104 },
  baudRates: [9600, 19200, 38400, 115200],
  readTimeoutMs: 10,
  settleDelayMs: 0,
  commandDelayMs: 0,
  logLevel: 'info',
  ruleDirectory: '/tmp/rules',
  remediate: true,
  colors: false,
};

const PORTS: PortInfo[] = [
  { path: '/dev/ttyS0', vendorId: 0x1a86, productId: 0x7523 },
  {
    path: '/dev/ttyUSB0',
    vendorId: 0x191c,
    productId: 0x4104,
    manufacturer: 'Innovative Technology LTD',
    serialNumber: 'TEST-0001',
  },
];

const answersAt19200 = (packet: Uint8Array, state: LinkState): Uint8Array | null =>
  state.baudRate === 19200 && state.dtr === false && state.rts === false
    ? buildPacket(0xf0, packet[1] ?? 0x80)
    : null;

function createDeps(link: SimulatedLink, overrides: Partial<ProbeDependencies> = {}) {
  const { logger, records } = createRecordingLogger();
  const deps: ProbeDependencies = {
    listPorts: vi.fn(async () => PORTS),
    createTransport: vi.fn(link.factory),
    checkAccess: vi.fn(async () => ok(undefined)),
    remediator: { remediate: vi.fn(async () => {}) },
    writeRule: vi.fn(async () => '/tmp/rules/99-smarthopper.rules'),
    logger,
    ...overrides,
  };
  return { deps, records };
}

describe('runProbe', () => {
  it('finds the device, discovers 19200 8N1 with lines low and runs the sequence', async () => {
    const link = new SimulatedLink({ responder: answersAt19200 });
    const { deps } = createDeps(link);

    const report = await runProbe(CONFIG, deps);

    expect(report.exitCode).toBe(ExitCode.Success);
    expect(report.path).toBe('/dev/ttyUSB0');
    expect(report.link).toEqual({ path: '/dev/ttyUSB0', baudRate: 19200, dtr: false, rts: false });
    expect(report.outcomes?.map(o => `${o.name}:${o.responded}`)).toEqual([
      'SYNC:true',
      'SETUP_REQUEST:true',
      'ENABLE:true',
      'POLL:true',
      'POLL:true',
      'POLL:true',
      'POLL:true',
    ]);
    // 4 silent candidates at 9600 (SYNC + RESET each), the answered SYNC, then 7 commands
    expect(link.writes).toHaveLength(16);
    expect(link.openCount).toBe(0);
    expect(deps.writeRule).toHaveBeenCalledWith('/tmp/rules', CONFIG.target, expect.anything());
    expect(deps.checkAccess).toHaveBeenCalledWith('/dev/ttyUSB0');
    expect(deps.remediator?.remediate).not.toHaveBeenCalled();
  });

  it('exits with DeviceNotFound when no port matches', async () => {
    const link = new SimulatedLink();
    const { deps, records } = createDeps(link, { listPorts: vi.fn(async () => PORTS.slice(0, 1)) });

    const report = await runProbe(CONFIG, deps);

    expect(report.exitCode).toBe(ExitCode.DeviceNotFound);
    expect(deps.createTransport).not.toHaveBeenCalled();
    expect(deps.writeRule).not.toHaveBeenCalled();
    expect(messages(records, 'error')).toEqual([
      'No serial port with vendor 0x191c and product 0x4104',
    ]);
  });

  it('treats a failing port listing as no device', async () => {
    const link = new SimulatedLink();
    const { deps } = createDeps(link, {
      listPorts: vi.fn(async () => {
        throw new Error('udev unavailable');
      }),
    });

    const report = await runProbe(CONFIG, deps);

    expect(report.exitCode).toBe(ExitCode.DeviceNotFound);
  });

  it('uses a configured port without enumerating', async () => {
    const link = new SimulatedLink({ responder: answersAt19200 });
    const { deps } = createDeps(link);

    const report = await runProbe({ ...CONFIG, portPath: '/dev/ttyACM3' }, deps);

    expect(report.exitCode).toBe(ExitCode.Success);
    expect(report.path).toBe('/dev/ttyACM3');
    expect(deps.listPorts).not.toHaveBeenCalled();
  });

  it('exits with ConfigurationNotFound when the device never answers', async () => {
    const link = new SimulatedLink();
    const { deps } = createDeps(link);

    const report = await runProbe(CONFIG, deps);

    expect(report.exitCode).toBe(ExitCode.ConfigurationNotFound);
    expect(link.writes).toHaveLength(32);
    expect(report.link).toBeUndefined();
  });

  it('exits with TransportFault when the sequence breaks', async () => {
    // attempts 0-8 belong to discovery, 9 is the first command of the sequence
    const link = new SimulatedLink({
      responder: answersAt19200,
      failWrite: attempt => (attempt === 9 ? new Error('device unplugged') : null),
    });
    const { deps } = createDeps(link);

    const report = await runProbe(CONFIG, deps);

    expect(report.exitCode).toBe(ExitCode.TransportFault);
    expect(report.link).toEqual({ path: '/dev/ttyUSB0', baudRate: 19200, dtr: false, rts: false });
    expect(link.openCount).toBe(0);
  });

  it('asks the remediator for help on access denial and carries on', async () => {
    const link = new SimulatedLink({ responder: answersAt19200 });
    const remediate = vi.fn(async () => {
      throw new Error('sudo: a password is required');
    });
    const { deps, records } = createDeps(link, {
      checkAccess: vi.fn(async (path: string) => fail(new SspAccessDeniedError(path, 'EACCES'))),
      remediator: { remediate },
    });

    const report = await runProbe(CONFIG, deps);

    expect(remediate).toHaveBeenCalledWith('/dev/ttyUSB0');
    expect(report.exitCode).toBe(ExitCode.Success);
    expect(messages(records, 'error')).toEqual([
      'Access denied to /dev/ttyUSB0: EACCES',
      'Could not update permissions: sudo: a password is required',
    ]);
  });

  it('does not remediate when no remediator is given', async () => {
    const link = new SimulatedLink({ responder: answersAt19200 });
    const { deps } = createDeps(link, {
      checkAccess: vi.fn(async (path: string) => fail(new SspAccessDeniedError(path))),
    });
    delete deps.remediator;

    const report = await runProbe(CONFIG, deps);

    expect(report.exitCode).toBe(ExitCode.Success);
  });

  it('keeps going when the udev rule cannot be written', async () => {
    const link = new SimulatedLink({ responder: answersAt19200 });
    const { deps, records } = createDeps(link, {
      writeRule: vi.fn(async () => {
        throw new Error('EROFS');
      }),
    });

    const report = await runProbe(CONFIG, deps);

    expect(report.exitCode).toBe(ExitCode.Success);
    expect(messages(records, 'error')).toEqual(['Failed to write udev rule Error: EROFS']);
  });
});

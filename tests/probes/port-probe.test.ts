import { describe, it, expect, afterEach } from 'vitest';
import net from 'node:net';
import type { AddressInfo } from 'node:net';
import { COMMON_PORTS, analyzePorts, checkPort } from '../../src/probes/port-probe.js';
import type { OpenPort } from '../../src/probes/port-probe.js';

function open(...ports: number[]): OpenPort[] {
  return ports.map((port) => ({ port, service: COMMON_PORTS[port] ?? 'unknown', state: 'open' }));
}

describe('analyzePorts', () => {
  it('25 個の代表的なポートを対象にする', () => {
    expect(Object.keys(COMMON_PORTS)).toHaveLength(25);
  });

  it('危険なポートとデータベースポートを報告する', () => {
    const findings = analyzePorts(open(23, 443, 6379, 3306));

    expect(findings.map((f) => [f.severity, f.title])).toEqual([
      ['critical', 'Dangerous port open: 23'],
      ['critical', 'Database ports exposed'],
      ['info', '4 open ports detected'],
    ]);
    expect(findings[1]?.description).toBe('Database ports exposed to internet: 3306, 6379');
  });

  it('Web ポートが無ければ info を出す', () => {
    expect(analyzePorts(open(22)).map((f) => f.title)).toEqual(['No web services detected', '1 open ports detected']);
  });

  it('開いているポートが無い場合', () => {
    expect(analyzePorts([]).map((f) => f.title)).toEqual(['No web services detected']);
  });
});

describe('checkPort', () => {
  let server: net.Server | undefined;

  afterEach(async () => {
    const current = server;
    server = undefined;
    if (current?.listening === true) {
      await new Promise<void>((resolve) => current.close(() => resolve()));
    }
  });

  async function listen(): Promise<number> {
    const created = net.createServer((socket) => socket.destroy());
    server = created;
    await new Promise<void>((resolve) => created.listen(0, '127.0.0.1', () => resolve()));
    const address: AddressInfo | string | null = created.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server has no port');
    }
    return address.port;
  }

  it('待ち受けているポートは true', async () => {
    const port = await listen();
    expect(await checkPort('127.0.0.1', port, new AbortController().signal)).toBe(true);
  });

  it('閉じたポートは false', async () => {
    const port = await listen();
    const current = server;
    server = undefined;
    await new Promise<void>((resolve) => current?.close(() => resolve()));

    expect(await checkPort('127.0.0.1', port, new AbortController().signal)).toBe(false);
  });

  it('abort 済みの signal では接続しない', async () => {
    const controller = new AbortController();
    controller.abort();
    expect(await checkPort('127.0.0.1', 1, controller.signal)).toBe(false);
  });
});

/**
 * mimizuku — Port Probe
 *
 * 代表的な 25 ポートへ並列に TCP 接続を試みる。
 * 接続試行が多いため Runner のタイムアウトは長め（portScan タグ）。
 */

import net from 'node:net';
import type { CredentialLookup, Finding, Probe, ProbeContext, ProbePayload, Severity } from '../types/probe.js';
import { createFinding } from './base.js';
import { resolveAddress } from './resolver.js';

/** 接続試行 1 回あたりのタイムアウト（ms） */
const CONNECT_TIMEOUT_MS = 2000;

export const COMMON_PORTS: Readonly<Record<number, string>> = {
  20: 'FTP Data',
  21: 'FTP',
  22: 'SSH',
  23: 'Telnet',
  25: 'SMTP',
  53: 'DNS',
  80: 'HTTP',
  110: 'POP3',
  143: 'IMAP',
  443: 'HTTPS',
  445: 'SMB',
  465: 'SMTPS',
  587: 'SMTP Submission',
  993: 'IMAPS',
  995: 'POP3S',
  1433: 'MSSQL',
  1521: 'Oracle',
  3306: 'MySQL',
  3389: 'RDP',
  5432: 'PostgreSQL',
  5900: 'VNC',
  6379: 'Redis',
  8080: 'HTTP Proxy',
  8443: 'HTTPS Alt',
  27017: 'MongoDB',
};

const DANGEROUS_PORTS: ReadonlyArray<[number, string, Severity, string]> = [
  [21, 'FTP without encryption', 'high', 'Use SFTP or FTPS instead'],
  [23, 'Telnet - unencrypted remote access', 'critical', 'Use SSH instead'],
  [445, 'SMB exposed', 'high', 'Restrict SMB access, use VPN'],
  [3389, 'RDP exposed to internet', 'critical', 'Restrict RDP access, use VPN or jump host'],
  [5900, 'VNC exposed', 'high', 'Restrict VNC access, use strong authentication'],
];

const DATABASE_PORTS: ReadonlySet<number> = new Set([3306, 5432, 1433, 1521, 27017, 6379]);

export interface OpenPort {
  port: number;
  service: string;
  state: 'open';
}

export interface PortPayload extends ProbePayload {
  ipAddress?: string;
  openPorts: OpenPort[];
  error?: string;
}

/** 開いているポート一覧から Finding を導く。 */
export function analyzePorts(openPorts: readonly OpenPort[]): Finding[] {
  const findings: Finding[] = [];
  const numbers = new Set(openPorts.map((p) => p.port));

  for (const [port, description, severity, recommendation] of DANGEROUS_PORTS) {
    if (numbers.has(port)) {
      findings.push(createFinding(severity, `Dangerous port open: ${port}`, description, { recommendation }));
    }
  }

  const exposedDbs = [...numbers].filter((p) => DATABASE_PORTS.has(p)).sort((a, b) => a - b);
  if (exposedDbs.length > 0) {
    findings.push(
      createFinding('critical', 'Database ports exposed', `Database ports exposed to internet: ${exposedDbs.join(', ')}`, {
        recommendation: 'Database ports should not be publicly accessible. Use firewall rules or VPN',
      }),
    );
  }

  if (!numbers.has(80) && !numbers.has(443) && !numbers.has(8080)) {
    findings.push(
      createFinding('info', 'No web services detected', 'No common web server ports (80, 443, 8080) are open'),
    );
  }

  if (openPorts.length > 0) {
    findings.push(
      createFinding(
        'info',
        `${openPorts.length} open ports detected`,
        `Open ports: ${openPorts.map((p) => p.port).join(', ')}`,
        { data: openPorts },
      ),
    );
  }

  return findings;
}

/** 1 ポートへの接続試行。接続できれば true。abort 時はソケットを破棄して false。 */
export function checkPort(host: string, port: number, signal: AbortSignal, timeoutMs = CONNECT_TIMEOUT_MS): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }

    const socket = new net.Socket();
    const finish = (open: boolean): void => {
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
      resolve(open);
    };
    const onAbort = (): void => finish(false);

    signal.addEventListener('abort', onAbort, { once: true });
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
    socket.connect(port, host);
  });
}

export class PortProbe implements Probe {
  async scan(target: string, _credentials: CredentialLookup, { signal, logger }: ProbeContext): Promise<PortPayload> {
    const payload: PortPayload = { openPorts: [], findings: [] };

    let ip: string;
    try {
      ip = await resolveAddress(target, signal);
      payload.ipAddress = ip;
    } catch (err) {
      signal.throwIfAborted();
      payload.error = `Could not resolve hostname: ${err instanceof Error ? err.message : String(err)}`;
      return payload;
    }

    const ports = Object.keys(COMMON_PORTS).map(Number);
    logger.info(`Scanning ${ports.length} common ports...`);

    const results = await Promise.all(
      ports.map(async (port) => ({ port, open: await checkPort(ip, port, signal) })),
    );
    signal.throwIfAborted();

    for (const { port, open } of results) {
      if (open) {
        payload.openPorts.push({ port, service: COMMON_PORTS[port] ?? 'unknown', state: 'open' });
      }
    }

    payload.findings.push(...analyzePorts(payload.openPorts));
    return payload;
  }
}

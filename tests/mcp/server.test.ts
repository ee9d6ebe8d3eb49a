/**
 * mimizuku — MCP Server 統合テスト
 *
 * InMemoryTransport でサーバーとクライアントをインメモリ接続し、
 * 全ツール・リソースの動作を検証する。Probe はネットワークに触れないスタブ。
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { migrateDatabase } from '../../src/db/migrate.js';
import { ScanRepository } from '../../src/db/repository/scan-repository.js';
import { createCredentialLookup } from '../../src/engine/credential-gate.js';
import { createSilentLogger } from '../../src/logger.js';
import { createMcpServer } from '../../src/mcp/server.js';
import { requireCredential } from '../../src/probes/base.js';
import { descriptor, finding, returning } from '../helpers/stub-probes.js';
import { sampleReport, sampleResult } from '../helpers/scan-fixture.js';

const registry = [
  descriptor('dns', returning(finding('medium', 'No DMARC record')), { priority: 'critical' }),
  descriptor('ports', returning(finding('critical', 'Database ports exposed')), { priority: 'critical', portScan: true }),
  descriptor(
    'shodan',
    async (_target, creds) => {
      requireCredential(creds, 'shodan');
      return { findings: [] };
    },
    { priority: 'high', credential: 'shodan' },
  ),
];

/** ツール結果の最初のテキストを取り出す */
function firstText(result: unknown): string {
  if (typeof result !== 'object' || result === null || !('content' in result) || !Array.isArray(result.content)) {
    throw new Error('tool result has no content');
  }
  const first: unknown = result.content[0];
  if (typeof first !== 'object' || first === null || !('text' in first) || typeof first.text !== 'string') {
    throw new Error('tool result has no text');
  }
  return first.text;
}

function isErrorResult(result: unknown): boolean {
  return typeof result === 'object' && result !== null && 'isError' in result && result.isError === true;
}

describe('MCP Server', () => {
  let db: InstanceType<typeof Database>;
  let client: Client;

  beforeEach(async () => {
    db = new Database(':memory:');
    migrateDatabase(db);

    const server = createMcpServer({
      db,
      registry,
      credentials: createCredentialLookup({}),
      logger: createSilentLogger(),
      timeouts: { defaultMs: 1000, portScanMs: 2000 },
    });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    await server.connect(serverTransport);
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    db.close();
  });

  // =========================================================
  // 登録確認
  // =========================================================

  it('4 ツールが登録されている', async () => {
    const result = await client.listTools();
    expect(result.tools.map((t) => t.name).sort()).toEqual(['get_scan', 'list_probes', 'list_scans', 'run_scan']);
  });

  it('リソースが登録されている', async () => {
    const result = await client.listResources();
    expect(result.resources.map((r) => r.uri)).toEqual(['mimizuku://scans']);
  });

  // =========================================================
  // Scan ツール
  // =========================================================

  it('list_probes は Registry 順にタイムアウト付きで返す', async () => {
    const result = await client.callTool({ name: 'list_probes', arguments: {} });
    const probes: unknown = JSON.parse(firstText(result));

    expect(probes).toEqual([
      { name: 'dns', priority: 'critical', timeoutSeconds: 1, description: 'dns stub' },
      { name: 'ports', priority: 'critical', timeoutSeconds: 2, description: 'ports stub' },
      { name: 'shodan', priority: 'high', timeoutSeconds: 1, credential: 'shodan', description: 'shodan stub' },
    ]);
  });

  it('run_scan はスキャンを実行して履歴に保存する', async () => {
    const result = await client.callTool({ name: 'run_scan', arguments: { target: 'example.com' } });
    const body: unknown = JSON.parse(firstText(result));

    expect(body).toMatchObject({
      target: 'example.com',
      summary: { critical: 1, high: 0, medium: 1, low: 0, info: 0, total: 2 },
      probeStatus: {
        successful: [{ name: 'dns' }, { name: 'ports' }],
        failed: [],
        skipped: [{ name: 'shodan', reason: 'Missing capability: shodan credential is not configured' }],
      },
    });

    const stored = new ScanRepository(db).findAll();
    expect(stored).toHaveLength(1);
    expect(body).toMatchObject({ scanId: stored[0]?.id });
  });

  it('run_scan は probes で実行対象を絞れる', async () => {
    const result = await client.callTool({ name: 'run_scan', arguments: { target: 'example.com', probes: ['dns'] } });
    const body: unknown = JSON.parse(firstText(result));

    expect(body).toMatchObject({ probeStatus: { successful: [{ name: 'dns' }], skipped: [] } });
  });

  // =========================================================
  // History ツール
  // =========================================================

  it('list_scans は保存済みスキャンを返す', async () => {
    const repo = new ScanRepository(db);
    const result = sampleResult();
    const stored = repo.save(result, sampleReport(result), '2024-05-01T12:01:00.000Z');

    const listed: unknown = JSON.parse(firstText(await client.callTool({ name: 'list_scans', arguments: {} })));
    expect(listed).toEqual([stored]);

    const filtered: unknown = JSON.parse(
      firstText(await client.callTool({ name: 'list_scans', arguments: { target: 'example.org' } })),
    );
    expect(filtered).toEqual([]);
  });

  it('get_scan は Finding を重大度別に返す', async () => {
    const repo = new ScanRepository(db);
    const result = sampleResult();
    const stored = repo.save(result, sampleReport(result), '2024-05-01T12:01:00.000Z');

    const detail: unknown = JSON.parse(
      firstText(await client.callTool({ name: 'get_scan', arguments: { scanId: stored.id } })),
    );

    expect(detail).toMatchObject({
      id: stored.id,
      target: 'example.com',
      probeStatus: { failed: [{ name: 'ports', error: 'Could not resolve hostname' }] },
      findings: { high: [{ title: 'No HTTP to HTTPS redirect', probe: 'http' }] },
    });
  });

  it('get_scan は存在しない ID にエラーを返す', async () => {
    const result = await client.callTool({ name: 'get_scan', arguments: { scanId: 'no-such-id' } });

    expect(isErrorResult(result)).toBe(true);
    expect(firstText(result)).toBe('Scan not found: no-such-id');
  });

  // =========================================================
  // リソース
  // =========================================================

  it('mimizuku://scans は保存済みスキャンの一覧', async () => {
    const repo = new ScanRepository(db);
    const result = sampleResult();
    const stored = repo.save(result, sampleReport(result), '2024-05-01T12:01:00.000Z');

    const resource = await client.readResource({ uri: 'mimizuku://scans' });
    const content = resource.contents[0];
    const text = content !== undefined && 'text' in content && typeof content.text === 'string' ? content.text : '';

    expect(JSON.parse(text)).toEqual([stored]);
  });
});

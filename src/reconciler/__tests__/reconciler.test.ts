import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Reconciler, appLabel } from '../index.js';
import type { CatalogClient } from '../../splunkbase/client.js';
import { LOGIN_URL, SplunkbaseClient, downloadUrl, versionUrl } from '../../splunkbase/client.js';
import { FakeHttpClient, createHttpResponse, createMockLogger } from '../../__tests__/helpers.js';

const LEDGER = [
  { name: 'app1', uid: 'uid1', version: 'v1' },
  { name: 'app2', uid: 'uid2', version: 'v1' },
  { name: 'app3', uid: 'uid3', version: 'v1' },
];

describe('Reconciler', () => {
  let dir: string;
  let ledgerPath: string;
  let outputDir: string;
  let http: FakeHttpClient;
  let logger: ReturnType<typeof createMockLogger>;

  const makeClient = () =>
    new SplunkbaseClient({
      http,
      credentials: { username: 'alice', password: 'test-secret' },
      outputDir,
      logger,
    });

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'sbd-reconcile-'));
    ledgerPath = join(dir, 'apps.json');
    outputDir = join(dir, 'out');
    http = new FakeHttpClient().on(LOGIN_URL, createHttpResponse({ cookies: { sessionid: 'abc' } }));
    logger = createMockLogger();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('downloads outdated apps and skips current or unavailable ones', async () => {
    await fs.writeFile(ledgerPath, JSON.stringify(LEDGER, null, 4));
    http
      .on(versionUrl('uid1'), createHttpResponse({ body: '[{"name":"v1"}]' }))
      .on(versionUrl('uid2'), createHttpResponse({ body: '[{"name":"v2"},{"name":"v1"}]' }))
      .on(versionUrl('uid3'), createHttpResponse({ status: 503 }))
      .on(
        downloadUrl('uid2', 'v2'),
        createHttpResponse({ body: 'tgz-bytes', headers: { 'last-modified': 'Thu, 01 Jan 2026 00:00:00 GMT' } }),
      );
    const client = makeClient();
    await client.authenticate();

    const result = await new Reconciler({ client, ledgerPath, logger }).reconcile();

    expect(result).toEqual({
      downloaded: ['app2_uid2_v2'],
      skipped: ['app1_uid1_v1', 'app3_uid3_v1'],
    });
    expect(JSON.parse(await fs.readFile(ledgerPath, 'utf-8'))).toEqual([
      LEDGER[0],
      { name: 'app2', uid: 'uid2', version: 'v2', updated_time: 'Thu, 01 Jan 2026 00:00:00 GMT' },
      LEDGER[2],
    ]);
    expect(await fs.readFile(join(outputDir, 'app2_uid2_v2.tgz'), 'utf-8')).toBe('tgz-bytes');
    expect(logger.info).toHaveBeenCalledWith('Update available for uid2: v1 → v2');
    expect(logger.warn).toHaveBeenCalledWith('Could not retrieve latest version for uid3');
  });

  it('skips with the latest label when the archive is already on disk', async () => {
    await fs.writeFile(ledgerPath, JSON.stringify([LEDGER[1]]));
    await fs.mkdir(outputDir, { recursive: true });
    await fs.writeFile(join(outputDir, 'app2_uid2_v2.tgz'), 'cached');
    http.on(versionUrl('uid2'), createHttpResponse({ body: '[{"name":"v2"}]' }));
    const client = makeClient();
    await client.authenticate();

    const result = await new Reconciler({ client, ledgerPath, logger }).reconcile();

    expect(result).toEqual({ downloaded: [], skipped: ['app2_uid2_v2'] });
    expect(JSON.parse(await fs.readFile(ledgerPath, 'utf-8'))).toEqual([LEDGER[1]]);
  });

  it('returns empty results when not authenticated', async () => {
    await fs.writeFile(ledgerPath, JSON.stringify(LEDGER));

    const result = await new Reconciler({ client: makeClient(), ledgerPath, logger }).reconcile();

    expect(result).toEqual({ downloaded: [], skipped: [] });
    expect(http.requests).toHaveLength(0);
    expect(logger.error).toHaveBeenCalledWith('Not authenticated. Call authenticate() first.');
  });

  it('aborts on a malformed ledger and leaves it untouched', async () => {
    await fs.writeFile(ledgerPath, '[{"name": "app1"');
    const client = makeClient();
    await client.authenticate();

    const result = await new Reconciler({ client, ledgerPath, logger }).reconcile();

    expect(result).toEqual({ downloaded: [], skipped: [] });
    expect(await fs.readFile(ledgerPath, 'utf-8')).toBe('[{"name": "app1"');
    expect(http.requests).toHaveLength(1);
    expect(logger.error).toHaveBeenCalledWith(`Invalid JSON in '${ledgerPath}'`);
  });

  it('aborts when the ledger is missing', async () => {
    const client = makeClient();
    await client.authenticate();

    const result = await new Reconciler({ client, ledgerPath, logger }).reconcile();

    expect(result).toEqual({ downloaded: [], skipped: [] });
    expect(logger.error).toHaveBeenCalledWith(`Apps file '${ledgerPath}' not found`);
  });

  it('aborts when no ledger path is configured', async () => {
    const client = makeClient();
    await client.authenticate();

    const result = await new Reconciler({ client, logger }).reconcile();

    expect(result).toEqual({ downloaded: [], skipped: [] });
    expect(logger.error).toHaveBeenCalledWith('No apps file configured');
  });

  it('processes entries sequentially and skips failed downloads', async () => {
    await fs.writeFile(ledgerPath, JSON.stringify(LEDGER));
    const calls: string[] = [];
    const client: CatalogClient = {
      isAuthenticated: () => true,
      getLatestVersion: vi.fn(async (uid: string) => {
        calls.push(`latest:${uid}`);
        return 'v9';
      }),
      downloadPackage: vi.fn(async (_name: string, uid: string) => {
        calls.push(`download:${uid}`);
        return uid === 'uid1' ? undefined : '2026-01-02T03:04:05.000Z';
      }),
    };

    const result = await new Reconciler({ client, ledgerPath, logger }).reconcile();

    expect(calls).toEqual([
      'latest:uid1',
      'download:uid1',
      'latest:uid2',
      'download:uid2',
      'latest:uid3',
      'download:uid3',
    ]);
    expect(result).toEqual({
      downloaded: ['app2_uid2_v9', 'app3_uid3_v9'],
      skipped: ['app1_uid1_v9'],
    });
    const persisted = JSON.parse(await fs.readFile(ledgerPath, 'utf-8'));
    expect(persisted[0]).toEqual(LEDGER[0]);
    expect(persisted[1].version).toBe('v9');
    expect(persisted[2].updated_time).toBe('2026-01-02T03:04:05.000Z');
  });
});

describe('appLabel', () => {
  it('joins name, uid and version', () => {
    expect(appLabel({ name: 'Splunk_TA_nix', uid: '833' }, '9.1.0')).toBe('Splunk_TA_nix_833_9.1.0');
  });
});

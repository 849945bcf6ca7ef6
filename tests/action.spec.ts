/**
 * Action runner tests
 *
 *   R1: private CA → bundle written to ca_file, resource written to output_file
 *   R2: default trust store suffices → no CA file, no override
 *   R3: integrity failure → run rejects, nothing written
 *   R4: hardware-backed machine token → bootstrap keyed by the unsealed
 *       token, resource via the hardware fetcher, reference never sent
 *   R5: one bootstrap per run: ca_checksum and checksum come from it
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { run } from '../src/action.js';
import { TokenScope } from '../src/config/token_scope.js';
import { TrustBootstrapError } from '../src/errors.js';
import type { BootstrapSettings } from '../src/config/settings.js';
import { hashBase64, hashHex } from '../src/hashing.js';
import { HardwareTokenResolver } from '../src/resolvers/hardware_resolver.js';
import { FakeHttpClientFactory, collectAudit, fakeServer } from './helpers/fake_http.js';

const TOKEN = 'test-action-token';
const CA_PEM = '-----BEGIN CERTIFICATE-----\nMIIBactionCA\n-----END CERTIFICATE-----\n';
const dir = mkdtempSync(join(tmpdir(), 'bootstrap-action-'));

function settings(overrides: Partial<BootstrapSettings>): BootstrapSettings {
  return {
    server: 'https://rancher.test',
    token: TOKEN,
    scope: TokenScope.MACHINE,
    path: '',
    ca_file: '',
    output_file: '',
    ...overrides
  };
}

test('R1: verified bundle and fetched resource are written', async () => {
  const caFile = join(dir, 'r1-ca.pem');
  const outputFile = join(dir, 'r1-agent.json');
  const factory = new FakeHttpClientFactory(fakeServer({
    token: TOKEN,
    cacerts: CA_PEM,
    resources: { '/v3/connect/agent': { status: 200, body: '{"ok":true}' } }
  }));
  const audit = collectAudit();

  const result = await run({
    settings: settings({ path: '/v3/connect/agent', ca_file: caFile, output_file: outputFile }),
    client_factory: factory,
    audit: audit.sink
  });

  assert.equal(result.ca_override, true);
  assert.equal(result.ca_file_written, true);
  assert.equal(result.fetched_bytes, 11);
  assert.match(result.ca_checksum, /^[0-9a-f]{64}$/);
  assert.equal(readFileSync(caFile, 'utf8'), CA_PEM);
  assert.equal(readFileSync(outputFile, 'utf8'), '{"ok":true}');
  assert.equal(factory.closed, factory.created);
  assert.equal(factory.requests.length, 3);

  const fetchReq = factory.requests.find((r) => r.trust.kind === 'pinned');
  assert.equal(fetchReq?.headers['Authorization'], `Bearer ${Buffer.from(TOKEN, 'utf8').toString('base64')}`);
});

test('R2: publicly trusted server → no override, no CA file', async () => {
  const caFile = join(dir, 'r2-ca.pem');
  const factory = new FakeHttpClientFactory(fakeServer({ token: TOKEN, cacerts: CA_PEM, publicly_trusted: true }));

  const result = await run({
    settings: settings({ ca_file: caFile }),
    client_factory: factory,
    audit: () => undefined
  });

  assert.deepEqual(result, { ca_override: false, ca_checksum: '', ca_file_written: false, fetched_bytes: null });
  assert.equal(existsSync(caFile), false);
});

test('R3: integrity failure → rejects, nothing written', async () => {
  const caFile = join(dir, 'r3-ca.pem');
  const factory = new FakeHttpClientFactory(fakeServer({ token: TOKEN, cacerts: CA_PEM, sign_with_token: 'impostor' }));

  await assert.rejects(
    () => run({ settings: settings({ ca_file: caFile }), client_factory: factory, audit: () => undefined }),
    (err: unknown) => err instanceof TrustBootstrapError && err.error_type === 'INTEGRITY_MISMATCH'
  );
  assert.equal(existsSync(caFile), false);
});

test('R4: hardware-backed machine token → unsealed token keys the bootstrap', async () => {
  const caFile = join(dir, 'r4-ca.pem');
  const factory = new FakeHttpClientFactory(fakeServer({ token: 'unsealed', cacerts: CA_PEM }));
  const hardwareCalls: { bundle: Buffer | null; url: string }[] = [];

  const result = await run({
    settings: settings({ token: 'tpm://ek', path: '/v3/connect/agent', ca_file: caFile }),
    client_factory: factory,
    resolver: new HardwareTokenResolver({ unseal: async () => 'unsealed' }),
    hardware_fetcher: {
      get: async (bundle, url) => {
        hardwareCalls.push({ bundle, url });
        return Buffer.from('plan', 'utf8');
      }
    },
    audit: () => undefined
  });

  assert.equal(result.ca_override, true);
  assert.equal(result.ca_checksum, hashHex(CA_PEM));
  assert.equal(result.fetched_bytes, 4);
  assert.equal(readFileSync(caFile, 'utf8'), CA_PEM);
  assert.equal(hardwareCalls.length, 1);
  assert.equal(hardwareCalls[0]?.url, 'https://rancher.test/v3/connect/agent');
  assert.equal(hardwareCalls[0]?.bundle?.toString('utf8'), CA_PEM);

  const bootstrapReqs = factory.requests.filter((r) => r.trust.kind === 'insecure');
  assert.equal(bootstrapReqs.length, 1);
  assert.equal(bootstrapReqs[0]?.headers['Authorization'], `Bearer ${hashBase64('unsealed')}`);
  for (const req of factory.requests) {
    assert.equal(JSON.stringify(req.headers).includes('tpm://'), false);
  }
});

test('R5: cluster token with a path → a single bootstrap feeds every output', async () => {
  let nonces = 0;
  const server = fakeServer({
    token: TOKEN,
    cacerts: CA_PEM,
    resources: { '/v3/settings/cacerts': { status: 200, body: 'value' } }
  });
  const factory = new FakeHttpClientFactory((req) => {
    if (req.headers['X-Cattle-Nonce'] !== undefined) nonces++;
    return server(req);
  });

  const result = await run({
    settings: settings({ scope: TokenScope.CLUSTER, path: '/v3/settings/cacerts', ca_file: join(dir, 'r5-ca.pem') }),
    client_factory: factory,
    audit: () => undefined
  });

  assert.equal(nonces, 1);
  assert.deepEqual(factory.requests.map((r) => r.trust.kind), ['system', 'insecure', 'pinned']);
  assert.equal(result.ca_checksum, hashHex(CA_PEM));
  assert.equal(result.fetched_bytes, 5);
  assert.deepEqual(factory.requests[2]?.headers, {});
});

/**
 * Cluster client secret sync tests
 *
 *   S1: both settings present → apiServerURL/apiServerCA written, other keys kept
 *   S2: an empty setting → CONFIGURATION_ERROR, secret untouched
 *   S3: missing setting / secret → store error propagates
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { updateClientSecret } from '../src/cluster_secret.js';
import { MemoryClusterStore } from '../src/stores/memory_cluster_store.js';
import { TrustBootstrapError } from '../src/errors.js';
import { collectAudit } from './helpers/fake_http.js';

const CA_PEM = '-----BEGIN CERTIFICATE-----\nMIIBinternal\n-----END CERTIFICATE-----\n';

function seededStore(serverUrl: string, cacerts: string): MemoryClusterStore {
  const store = new MemoryClusterStore();
  store.setSetting('internal-server-url', serverUrl);
  store.setSetting('internal-cacerts', cacerts);
  store.putSecret('fleet-local', 'local-kubeconfig', {
    value: Buffer.from('apiVersion: v1\nkind: Config\n', 'utf8'),
    apiServerURL: Buffer.from('https://stale.test', 'utf8')
  });
  return store;
}

test('S1: settings copied into fleet-local/local-kubeconfig', async () => {
  const store = seededStore('https://rancher.internal:443', CA_PEM);
  const audit = collectAudit();

  await updateClientSecret(store, store, audit.sink);

  const data = await store.getSecretData('fleet-local', 'local-kubeconfig');
  assert.equal(data['apiServerURL']?.toString('utf8'), 'https://rancher.internal:443');
  assert.equal(data['apiServerCA']?.toString('utf8'), CA_PEM);
  assert.equal(data['value']?.toString('utf8'), 'apiVersion: v1\nkind: Config\n');

  assert.equal(audit.entries.length, 1);
  assert.equal(audit.entries[0]?.event, 'CLIENT_SECRET_UPDATED');
  assert.equal(audit.entries[0]?.secret, 'fleet-local/local-kubeconfig');
});

test('S2: empty setting → CONFIGURATION_ERROR, secret untouched', async () => {
  const store = seededStore('https://rancher.internal:443', '');

  await assert.rejects(
    () => updateClientSecret(store, store, () => undefined),
    (err: unknown) => {
      assert.ok(err instanceof TrustBootstrapError);
      assert.equal(err.error_type, 'CONFIGURATION_ERROR');
      assert.equal(err.message, "Both 'internal-server-url' and 'internal-cacerts' settings must be configured");
      return true;
    }
  );
  const data = await store.getSecretData('fleet-local', 'local-kubeconfig');
  assert.equal(data['apiServerURL']?.toString('utf8'), 'https://stale.test');
  assert.equal(data['apiServerCA'], undefined);
});

test('S3: missing setting or secret propagates the store error', async () => {
  const noSettings = new MemoryClusterStore();
  await assert.rejects(
    () => updateClientSecret(noSettings, noSettings, () => undefined),
    { message: 'settings.management.cattle.io "internal-server-url" not found' }
  );

  const noSecret = new MemoryClusterStore();
  noSecret.setSetting('internal-server-url', 'https://rancher.internal');
  noSecret.setSetting('internal-cacerts', CA_PEM);
  await assert.rejects(
    () => updateClientSecret(noSecret, noSecret, () => undefined),
    { message: 'secrets "local-kubeconfig" not found in namespace "fleet-local"' }
  );
});

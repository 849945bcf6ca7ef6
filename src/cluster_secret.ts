/**
 * Cluster client secret sync: copy the server's internal URL and CA into the
 * local cluster's kubeconfig secret so the local agent can reach it.
 *
 *   setting internal-server-url → secret fleet-local/local-kubeconfig .data.apiServerURL
 *   setting internal-cacerts    → secret fleet-local/local-kubeconfig .data.apiServerCA
 *
 * Both settings must be non-empty. Other secret keys are left untouched.
 */

import { TrustBootstrapError } from './errors.js';
import { emitAuditLog, type AuditSink } from './audit_log.js';
import { hashHex } from './hashing.js';
import type { ISecretStore, ISettingsReader } from './interfaces/cluster_store.js';

export const INTERNAL_SERVER_URL_SETTING = 'internal-server-url';
export const INTERNAL_CACERTS_SETTING = 'internal-cacerts';
export const CLIENT_SECRET_NAMESPACE = 'fleet-local';
export const CLIENT_SECRET_NAME = 'local-kubeconfig';

export async function updateClientSecret(
  settings: ISettingsReader,
  secrets: ISecretStore,
  audit: AuditSink = emitAuditLog
): Promise<void> {
  const internalServerUrl = await settings.getSetting(INTERNAL_SERVER_URL_SETTING);
  const internalCACerts = await settings.getSetting(INTERNAL_CACERTS_SETTING);

  if (!internalServerUrl || !internalCACerts) {
    throw new TrustBootstrapError(
      'CONFIGURATION_ERROR',
      `Both '${INTERNAL_SERVER_URL_SETTING}' and '${INTERNAL_CACERTS_SETTING}' settings must be configured`
    );
  }

  const data = await secrets.getSecretData(CLIENT_SECRET_NAMESPACE, CLIENT_SECRET_NAME);
  await secrets.updateSecretData(CLIENT_SECRET_NAMESPACE, CLIENT_SECRET_NAME, {
    ...data,
    apiServerURL: Buffer.from(internalServerUrl, 'utf8'),
    apiServerCA: Buffer.from(internalCACerts, 'utf8')
  });

  audit({
    event: 'CLIENT_SECRET_UPDATED',
    secret: `${CLIENT_SECRET_NAMESPACE}/${CLIENT_SECRET_NAME}`,
    api_server_url: internalServerUrl,
    api_server_ca_checksum: hashHex(internalCACerts)
  });
}

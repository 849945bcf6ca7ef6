/**
 * Provisioning artifacts: plain descriptors for the external execution agent.
 *
 * Nothing here executes anything. Field names follow the agent's plan format
 * (camelCase), not this project's snake_case.
 */

import { TokenScope } from './config/token_scope.js';
import type { TrustBootstrapper } from './trust_bootstrapper.js';

export const UPDATE_CA_CERTIFICATES = 'update-ca-certificates';
export const ADDITIONAL_CA_PATH = '/etc/pki/trust/anchors/additional-ca.pem';
export const ADDITIONAL_CA_PERMISSIONS = '0644';

export interface Instruction {
  name: string;
  saveOutput: boolean;
  command: string;
}

export interface FileArtifact {
  /** base64 of the file bytes */
  content: string;
  /** absolute path */
  path: string;
  /** POSIX mode as an octal string */
  permissions: string;
}

/** Refresh the node trust store after the CA file is written. */
export function toUpdateCACertificatesInstruction(): Instruction {
  return {
    name: UPDATE_CA_CERTIFICATES,
    saveOutput: true,
    command: UPDATE_CA_CERTIFICATES
  };
}

/**
 * Write the verified cluster CA bundle to the trust anchors directory.
 * An empty content string means no override was needed.
 */
export async function toFile(
  bootstrapper: TrustBootstrapper,
  server: string,
  token: string
): Promise<FileArtifact> {
  const { bundle } = await bootstrapper.caCerts(server, token, TokenScope.CLUSTER);
  return {
    content: bundle ? bundle.toString('base64') : '',
    path: ADDITIONAL_CA_PATH,
    permissions: ADDITIONAL_CA_PERMISSIONS
  };
}

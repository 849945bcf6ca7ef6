/**
 * Cluster store ports: the two reads/writes the client secret sync needs.
 *
 * Implementations:
 *   - MemoryClusterStore (src/stores/memory_cluster_store.ts): in-process
 *   - a Kubernetes-backed store lives with the caller (kubeconfig loading is
 *     not part of this package)
 */

/** Reads management.cattle.io/v3 Setting values by name. */
export interface ISettingsReader {
  /** Returns the setting value ('' when set but empty). Throws when the setting is missing. */
  getSetting(name: string): Promise<string>;
}

/** Reads and replaces the data map of a namespaced Secret. */
export interface ISecretStore {
  getSecretData(namespace: string, name: string): Promise<Record<string, Buffer>>;
  updateSecretData(namespace: string, name: string, data: Record<string, Buffer>): Promise<void>;
}

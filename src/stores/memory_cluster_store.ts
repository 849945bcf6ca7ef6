/**
 * MemoryClusterStore: in-memory ISettingsReader + ISecretStore.
 *
 * Holds settings and secrets for the current process only. Missing
 * settings and secrets throw, the way an API "not found" would.
 */

import type { ISecretStore, ISettingsReader } from '../interfaces/cluster_store.js';

function secretKey(namespace: string, name: string): string {
  return `${namespace}/${name}`;
}

export class MemoryClusterStore implements ISettingsReader, ISecretStore {
  private readonly _settings = new Map<string, string>();
  private readonly _secrets = new Map<string, Record<string, Buffer>>();

  setSetting(name: string, value: string): void {
    this._settings.set(name, value);
  }

  putSecret(namespace: string, name: string, data: Record<string, Buffer>): void {
    this._secrets.set(secretKey(namespace, name), { ...data });
  }

  async getSetting(name: string): Promise<string> {
    const value = this._settings.get(name);
    if (value === undefined) throw new Error(`settings.management.cattle.io "${name}" not found`);
    return value;
  }

  async getSecretData(namespace: string, name: string): Promise<Record<string, Buffer>> {
    const data = this._secrets.get(secretKey(namespace, name));
    if (!data) throw new Error(`secrets "${name}" not found in namespace "${namespace}"`);
    return { ...data };
  }

  async updateSecretData(namespace: string, name: string, data: Record<string, Buffer>): Promise<void> {
    const key = secretKey(namespace, name);
    if (!this._secrets.has(key)) throw new Error(`secrets "${name}" not found in namespace "${namespace}"`);
    this._secrets.set(key, { ...data });
  }
}

/**
 * Action runner: settings → CA bundle → (optional) protected fetch.
 *
 * Outputs:
 *   ca_override  'true' when a verified bundle overrides the default trust store
 *   ca_checksum  hex sha256 of the bundle ('' when no override)
 *   checksum     CA checksum used for the fetch (only when path is set)
 *   body         fetched resource, utf8 (only when path is set and no output_file)
 *
 * The trust bootstrap runs once per run, always with the resolved token.
 * Throws TrustBootstrapError; index.ts turns it into a failed run.
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import { loadSettings, type BootstrapSettings } from './config/settings.js';
import { TrustBootstrapper } from './trust_bootstrapper.js';
import { TrustedFetcher, type FetchResult } from './trusted_fetcher.js';
import type { IHttpClientFactory } from './interfaces/http_client.js';
import type { IHardwareFetcher, ITokenResolver } from './interfaces/token_resolver.js';
import type { AuditSink } from './audit_log.js';

export interface ActionDeps {
  settings?: BootstrapSettings;
  client_factory?: IHttpClientFactory;
  resolver?: ITokenResolver;
  hardware_fetcher?: IHardwareFetcher;
  audit?: AuditSink;
}

export interface ActionResult {
  ca_override: boolean;
  ca_checksum: string;
  ca_file_written: boolean;
  fetched_bytes: number | null;
}

export async function run(deps: ActionDeps = {}): Promise<ActionResult> {
  const settings = deps.settings ?? loadSettings();
  core.setSecret(settings.token);

  const fetcher = new TrustedFetcher({
    bootstrapper: new TrustBootstrapper({ client_factory: deps.client_factory, audit: deps.audit }),
    client_factory: deps.client_factory,
    resolver: deps.resolver,
    hardware_fetcher: deps.hardware_fetcher,
    audit: deps.audit
  });

  // One bootstrap per run: with a path the fetch carries the bundle it trusted.
  let bundle: Buffer | null;
  let checksum: string;
  let fetched: FetchResult | null = null;
  if (settings.path) {
    fetched = await fetcher.get(settings.server, settings.token, settings.path, settings.scope);
    ({ bundle, checksum } = fetched);
  } else {
    ({ bundle, checksum } = await fetcher.caCerts(settings.server, settings.token, settings.scope));
  }

  core.setOutput('ca_override', bundle ? 'true' : 'false');
  core.setOutput('ca_checksum', checksum);

  let caFileWritten = false;
  if (bundle && settings.ca_file) {
    fs.writeFileSync(settings.ca_file, bundle, { mode: 0o644 });
    caFileWritten = true;
    core.info(`CA bundle written to ${settings.ca_file} (sha256 ${checksum})`);
  } else if (!bundle) {
    core.info(`Default trust store verifies ${settings.server}; no CA bundle override needed`);
  }

  if (fetched) {
    core.setOutput('checksum', fetched.checksum);
    if (settings.output_file) {
      fs.writeFileSync(settings.output_file, fetched.body);
      core.info(`${settings.path} written to ${settings.output_file} (${fetched.body.length} bytes)`);
    } else {
      core.setOutput('body', fetched.body.toString('utf8'));
    }
  }

  return {
    ca_override: bundle !== null,
    ca_checksum: checksum,
    ca_file_written: caFileWritten,
    fetched_bytes: fetched ? fetched.body.length : null
  };
}

/**
 * Trusted Fetcher: bootstrap trust → pinned client → protected GET
 *
 * Orchestrates:
 *   1. MACHINE scope: resolve the token (passthrough or hardware unseal)
 *   2. TrustBootstrapper.caCerts() with the resolved token
 *   3. Hardware-backed token → hardware fetcher with the verified bundle (done)
 *   4. Client pinned to the bundle (or default trust store when bundle is null)
 *   5. GET server{path}; MACHINE scope adds Authorization: Bearer base64(token)
 *   6. Status must be 200 → { body, bundle, checksum of the CA bundle }
 *
 * Steps 1-2 are also exposed alone as caCerts(), so callers that need only the
 * bundle never bootstrap with an unresolved token reference.
 *
 * The bearer here is base64 of the raw token (resource-access credential).
 * It is NOT the sha256 form used during bootstrap.
 *
 * Nothing is cached between calls; every call builds and closes its own client.
 */

import { TrustBootstrapError, errorMessage } from './errors.js';
import { TokenScope, parseServerUrl } from './config/token_scope.js';
import { DEFAULT_TIMEOUT_MS, TrustBootstrapper, truncateBody, type CACertsResult } from './trust_bootstrapper.js';
import { HardwareTokenResolver } from './resolvers/hardware_resolver.js';
import { emitAuditLog, type AuditSink } from './audit_log.js';
import { nodeHttpClientFactory } from './transports/node_http_client.js';
import type { HttpResponse, IHttpClientFactory, TlsTrust } from './interfaces/http_client.js';
import type { IHardwareFetcher, ITokenResolver, ResolvedToken } from './interfaces/token_resolver.js';

export interface FetchResult {
  body: Buffer;
  /** The verified CA bundle this call trusted (null when no override). */
  bundle: Buffer | null;
  /** Checksum of the CA bundle used for this call ('' when no override). */
  checksum: string;
}

export interface TrustedFetcherOptions {
  /** Defaults to a TrustBootstrapper sharing client_factory, timeout_ms and audit. */
  bootstrapper?: TrustBootstrapper;
  /** Defaults to a HardwareTokenResolver with no source: tpm:// references are rejected. */
  resolver?: ITokenResolver;
  hardware_fetcher?: IHardwareFetcher;
  client_factory?: IHttpClientFactory;
  timeout_ms?: number;
  audit?: AuditSink;
}

/** Server URL with its path replaced by path. */
export function resourceUrl(server: string, path: string): string {
  const url = parseServerUrl(server);
  url.pathname = path;
  return url.toString();
}

export class TrustedFetcher {
  private readonly _bootstrapper: TrustBootstrapper;
  private readonly _resolver: ITokenResolver;
  private readonly _hardware: IHardwareFetcher | undefined;
  private readonly _clients: IHttpClientFactory;
  private readonly _timeoutMs: number;
  private readonly _audit: AuditSink;

  constructor(options: TrustedFetcherOptions = {}) {
    this._clients = options.client_factory ?? nodeHttpClientFactory;
    this._timeoutMs = options.timeout_ms ?? DEFAULT_TIMEOUT_MS;
    this._audit = options.audit ?? emitAuditLog;
    this._resolver = options.resolver ?? new HardwareTokenResolver();
    this._hardware = options.hardware_fetcher;
    this._bootstrapper = options.bootstrapper ?? new TrustBootstrapper({
      client_factory: this._clients,
      timeout_ms: this._timeoutMs,
      audit: this._audit
    });
  }

  /** Cluster-scoped token: no resolution, no bearer header. */
  clusterGet(server: string, token: string, path: string): Promise<FetchResult> {
    return this.get(server, token, path, TokenScope.CLUSTER);
  }

  /** Machine-scoped token: resolved first, may take the hardware path. */
  machineGet(server: string, token: string, path: string): Promise<FetchResult> {
    return this.get(server, token, path, TokenScope.MACHINE);
  }

  /**
   * Verified CA bundle for server, bootstrapped with the resolved token.
   * @throws TrustBootstrapError on any failure.
   */
  async caCerts(server: string, token: string, scope: TokenScope): Promise<CACertsResult> {
    const { trust } = await this._establish(server, token, scope);
    return trust;
  }

  /**
   * @throws TrustBootstrapError on any failure.
   */
  async get(server: string, token: string, path: string, scope: TokenScope): Promise<FetchResult> {
    const url = resourceUrl(server, path);

    // Steps 1-2: Token resolution + trust bootstrap
    const { resolved, trust: { bundle, checksum } } = await this._establish(server, token, scope);

    // Step 3: Hardware-backed retrieval
    if (resolved.hardware_backed) {
      return this._hardwareGet(bundle, url, checksum);
    }

    // Step 4-5: Pinned client + GET
    const headers: Record<string, string> = {};
    if (scope === TokenScope.MACHINE) {
      headers['Authorization'] = `Bearer ${Buffer.from(resolved.token, 'utf8').toString('base64')}`;
    }

    const tls: TlsTrust = bundle ? { kind: 'pinned', ca: bundle } : { kind: 'system' };
    const client = this._clients.create({ trust: tls, timeout_ms: this._timeoutMs });
    let res: HttpResponse;
    try {
      res = await client.get({ url, headers });
    } catch (err) {
      throw this._fail(url, new TrustBootstrapError('TRANSPORT_ERROR', `GET ${url}: ${errorMessage(err)}`, err));
    } finally {
      client.close();
    }

    // Step 6: Status
    if (res.status !== 200) {
      throw this._fail(
        url,
        new TrustBootstrapError('BAD_STATUS', `GET ${url}: ${res.status} ${res.status_text}: ${truncateBody(res.body)}`),
        res.status
      );
    }

    this._audit({ event: 'FETCH_OK', url, scope, pinned: tls.kind === 'pinned', checksum, bytes: res.body.length });
    return { body: res.body, bundle, checksum };
  }

  private async _establish(
    server: string,
    token: string,
    scope: TokenScope
  ): Promise<{ resolved: ResolvedToken; trust: CACertsResult }> {
    // Machine scope only; a cluster token is always used as given.
    const resolved: ResolvedToken = scope === TokenScope.MACHINE
      ? await this._resolve(token)
      : { hardware_backed: false, token };
    const trust = await this._bootstrapper.caCerts(server, resolved.token, scope);
    return { resolved, trust };
  }

  private async _resolve(token: string): Promise<ResolvedToken> {
    try {
      return await this._resolver.resolve(token);
    } catch (err) {
      if (err instanceof TrustBootstrapError) throw err;
      throw new TrustBootstrapError('TOKEN_RESOLUTION_FAILED', `Token resolution failed: ${errorMessage(err)}`, err);
    }
  }

  private async _hardwareGet(bundle: Buffer | null, url: string, checksum: string): Promise<FetchResult> {
    if (!this._hardware) {
      throw new TrustBootstrapError(
        'CONFIGURATION_ERROR',
        'Token is hardware-backed but no hardware fetcher is configured'
      );
    }

    let body: Buffer;
    try {
      body = await this._hardware.get(bundle, url);
    } catch (err) {
      throw this._fail(
        url,
        new TrustBootstrapError('HARDWARE_FETCH_FAILED', `Hardware-backed GET ${url}: ${errorMessage(err)}`, err)
      );
    }

    this._audit({ event: 'FETCH_HARDWARE', url, checksum, bytes: body.length });
    return { body, bundle, checksum };
  }

  private _fail(url: string, err: TrustBootstrapError, status?: number): TrustBootstrapError {
    this._audit({
      event: 'FETCH_FAILED',
      url,
      error_type: err.error_type,
      reason: err.message,
      ...(status !== undefined ? { status } : {})
    });
    return err;
  }
}

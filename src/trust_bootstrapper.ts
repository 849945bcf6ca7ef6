/**
 * Trust Bootstrapper: obtain a verified CA bundle using only the join token.
 *
 * SECURITY CONTRACT:
 *   Remote bytes become a CA bundle ONLY after the HMAC check in step 5.
 *   The probe path (step 2) returns no bytes at all: it only reports that
 *   the host's default trust store already verifies the server.
 *
 * Steps (fail-closed, single attempt, no retry):
 *   1. Fresh nonce
 *   2. Probe: GET cacerts endpoint with the default trust store.
 *      Any HTTP response → { bundle: null, checksum: '' } (no override needed)
 *   3. Bootstrap: GET cacerts endpoint WITHOUT TLS verification, sending
 *        X-Cattle-Nonce: <nonce>
 *        Authorization: Bearer base64(sha256(token))
 *   4. Status must be 200
 *   5. X-Cattle-Hash must equal base64(HMAC-SHA512(token, nonce‖0‖body‖0))
 *   6. Empty body → no override; otherwise bundle + hex(sha256(bundle))
 *
 * Known sharp edge: step 2 treats ANY response as proof of trust, including
 * redirects and non-200 statuses. The body is not inspected.
 */

import { TrustBootstrapError, errorMessage } from './errors.js';
import { TokenScope, cacertsUrl } from './config/token_scope.js';
import { hashBase64, hashHex, verifyResponseHash } from './hashing.js';
import { generateNonce, type NonceGenerator } from './nonce.js';
import { emitAuditLog, type AuditSink } from './audit_log.js';
import { nodeHttpClientFactory } from './transports/node_http_client.js';
import type { HttpResponse, IHttpClientFactory } from './interfaces/http_client.js';

export const DEFAULT_TIMEOUT_MS = 5000;
const ERROR_BODY_LIMIT = 512;

// Canonical spelling for both. Response header names arrive lower-cased from
// the transport, so HASH_HEADER is looked up through toLowerCase().
export const NONCE_HEADER = 'X-Cattle-Nonce';
export const HASH_HEADER = 'X-Cattle-Hash';

export interface CACertsResult {
  /** PEM bundle, or null when the default trust store already suffices. */
  bundle: Buffer | null;
  /** hex(sha256(bundle)), '' when bundle is null. */
  checksum: string;
}

export interface TrustBootstrapperOptions {
  client_factory?: IHttpClientFactory;
  nonce?: NonceGenerator;
  timeout_ms?: number;
  audit?: AuditSink;
}

const NO_OVERRIDE: CACertsResult = { bundle: null, checksum: '' };

export function truncateBody(body: Buffer): string {
  const text = body.toString('utf8');
  return text.length > ERROR_BODY_LIMIT ? `${text.slice(0, ERROR_BODY_LIMIT)}...` : text;
}

export class TrustBootstrapper {
  private readonly _clients: IHttpClientFactory;
  private readonly _nonce: NonceGenerator;
  private readonly _timeoutMs: number;
  private readonly _audit: AuditSink;

  constructor(options: TrustBootstrapperOptions = {}) {
    this._clients = options.client_factory ?? nodeHttpClientFactory;
    this._nonce = options.nonce ?? generateNonce;
    this._timeoutMs = options.timeout_ms ?? DEFAULT_TIMEOUT_MS;
    this._audit = options.audit ?? emitAuditLog;
  }

  /**
   * Fetch and verify the server's CA bundle.
   * @throws TrustBootstrapError on any failure. No bundle bytes are returned on failure.
   */
  async caCerts(server: string, token: string, scope: TokenScope = TokenScope.CLUSTER): Promise<CACertsResult> {

    // --- Step 1: Nonce ---
    let nonce: string;
    try {
      nonce = this._nonce();
    } catch (err) {
      throw new TrustBootstrapError('CONFIGURATION_ERROR', `Nonce generation failed: ${errorMessage(err)}`, err);
    }

    const requestUrl = cacertsUrl(server, scope);
    const auditBase = { url: requestUrl, scope };

    // --- Step 2: Probe with the default trust store ---
    const probe = this._clients.create({ trust: { kind: 'system' }, timeout_ms: this._timeoutMs });
    try {
      const res = await probe.get({ url: requestUrl });
      this._audit({ ...auditBase, event: 'PROBE_TRUSTED', status: res.status });
      return NO_OVERRIDE;
    } catch (err) {
      this._audit({ ...auditBase, event: 'PROBE_UNTRUSTED', reason: errorMessage(err) });
    } finally {
      probe.close();
    }

    // --- Step 3: Insecure bootstrap request ---
    const insecure = this._clients.create({ trust: { kind: 'insecure' }, timeout_ms: this._timeoutMs });
    let res: HttpResponse;
    try {
      res = await insecure.get({
        url: requestUrl,
        headers: {
          [NONCE_HEADER]: nonce,
          Authorization: `Bearer ${hashBase64(token)}`
        }
      });
    } catch (err) {
      throw this._fail(
        auditBase,
        new TrustBootstrapError(
          'TRANSPORT_ERROR',
          `insecure cacerts download from ${requestUrl}: ${errorMessage(err)}`,
          err
        )
      );
    } finally {
      insecure.close();
    }

    // --- Step 4: Status ---
    if (res.status !== 200) {
      throw this._fail(
        auditBase,
        new TrustBootstrapError(
          'BAD_STATUS',
          `response ${res.status}: ${res.status_text} getting cacerts: ${truncateBody(res.body)}`
        ),
        res.status
      );
    }

    // --- Step 5: Integrity (HMAC keyed by the raw token) ---
    const received = res.headers[HASH_HEADER.toLowerCase()];
    if (!verifyResponseHash(token, nonce, res.body, received)) {
      throw this._fail(
        auditBase,
        new TrustBootstrapError(
          'INTEGRITY_MISMATCH',
          `response hash (${received ?? 'missing'}) does not match the value computed for nonce ${nonce}`
        ),
        res.status
      );
    }

    // --- Step 6: Verified ---
    if (res.body.length === 0) {
      this._audit({ ...auditBase, event: 'BOOTSTRAP_EMPTY' });
      return NO_OVERRIDE;
    }

    const checksum = hashHex(res.body);
    this._audit({ ...auditBase, event: 'BOOTSTRAP_VERIFIED', checksum, bytes: res.body.length });
    return { bundle: res.body, checksum };
  }

  private _fail(
    auditBase: Record<string, unknown>,
    err: TrustBootstrapError,
    status?: number
  ): TrustBootstrapError {
    this._audit({
      ...auditBase,
      event: 'BOOTSTRAP_FAILED',
      error_type: err.error_type,
      reason: err.message,
      ...(status !== undefined ? { status } : {})
    });
    return err;
  }
}

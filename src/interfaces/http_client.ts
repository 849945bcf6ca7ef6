/**
 * IHttpClient: Interface contract for the transport used by the bootstrap
 * and fetch steps.
 *
 * Implementations:
 *   - NodeHttpClient (src/transports/node_http_client.ts): node:https agents
 *   - in-process fakes in tests
 *
 * A client lives for exactly one call. Callers create it, use it, and
 * close() it in a finally block so idle connections never outlive the call.
 */

/**
 * How the client validates the server certificate.
 *   system  : host's default trust store
 *   insecure: no verification (bootstrap step only; the HMAC check is the authority)
 *   pinned  : the CA bundle is the sole trust root
 */
export type TlsTrust =
  | { kind: 'system' }
  | { kind: 'insecure' }
  | { kind: 'pinned'; ca: Buffer };

export interface HttpClientOptions {
  trust: TlsTrust;
  /** Deadline for one full round trip, body included. */
  timeout_ms: number;
}

export interface HttpRequest {
  url: string;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  status_text: string;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  body: Buffer;
}

export interface IHttpClient {
  /** Resolves for any HTTP status. Rejects only on transport failure. */
  get(request: HttpRequest): Promise<HttpResponse>;

  /** Release pooled connections. Safe to call more than once. */
  close(): void;
}

export interface IHttpClientFactory {
  create(options: HttpClientOptions): IHttpClient;
}

/**
 * NodeHttpClient: IHttpClient on node:https / node:http keep-alive agents.
 *
 * Each instance owns its agents. close() destroys them, which drops every
 * pooled socket, so a client never outlives the call that created it.
 *
 * TLS trust mapping:
 *   system   → rejectUnauthorized, default roots
 *   insecure → rejectUnauthorized: false
 *   pinned   → ca = bundle (replaces the default roots), rejectUnauthorized
 *
 * The timeout is a deadline over the whole request, body included.
 */

import http from 'http';
import https from 'https';
import type { IncomingHttpHeaders } from 'http';
import type {
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  IHttpClient,
  IHttpClientFactory,
  TlsTrust
} from '../interfaces/http_client.js';

export function tlsAgentOptions(trust: TlsTrust): https.AgentOptions {
  switch (trust.kind) {
    case 'system':
      return { rejectUnauthorized: true };
    case 'insecure':
      return { rejectUnauthorized: false };
    case 'pinned':
      return { rejectUnauthorized: true, ca: trust.ca.toString('utf8') };
  }
}

function normalizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    out[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return out;
}

export class NodeHttpClient implements IHttpClient {
  private readonly _httpsAgent: https.Agent;
  private readonly _httpAgent: http.Agent;
  private readonly _timeoutMs: number;

  constructor(options: HttpClientOptions) {
    this._httpsAgent = new https.Agent({ keepAlive: true, ...tlsAgentOptions(options.trust) });
    this._httpAgent = new http.Agent({ keepAlive: true });
    this._timeoutMs = options.timeout_ms;
  }

  get(request: HttpRequest): Promise<HttpResponse> {
    const url = new URL(request.url);
    const secure = url.protocol === 'https:';
    const options: http.RequestOptions = {
      method: 'GET',
      headers: request.headers ?? {},
      agent: secure ? this._httpsAgent : this._httpAgent
    };

    return new Promise<HttpResponse>((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage): void => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', (err) => {
          clearTimeout(deadline);
          reject(err);
        });
        res.on('end', () => {
          clearTimeout(deadline);
          resolve({
            status: res.statusCode ?? 0,
            status_text: res.statusMessage ?? '',
            headers: normalizeHeaders(res.headers),
            body: Buffer.concat(chunks)
          });
        });
      };

      const req = secure ? https.request(url, options, onResponse) : http.request(url, options, onResponse);

      const deadline = setTimeout(() => {
        req.destroy(new Error(`GET ${url.origin}${url.pathname} timed out after ${this._timeoutMs}ms`));
      }, this._timeoutMs);

      req.on('error', (err) => {
        clearTimeout(deadline);
        reject(err);
      });
      req.end();
    });
  }

  close(): void {
    this._httpsAgent.destroy();
    this._httpAgent.destroy();
  }
}

export const nodeHttpClientFactory: IHttpClientFactory = {
  create: (options) => new NodeHttpClient(options)
};

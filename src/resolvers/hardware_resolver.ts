/**
 * HardwareTokenResolver: unseals tpm:// token references.
 *
 * tpm://<reference> → hardware source unseals <reference>, result is
 *                     flagged hardware_backed (fetch goes through the
 *                     hardware fetcher, not the bearer flow)
 * anything else     → passed through unchanged
 *
 * Without a source every tpm:// reference fails with TOKEN_RESOLUTION_FAILED,
 * so a reference is never sent to the server as if it were a token.
 * The unresolved reference is never returned as a usable token.
 */

import { TrustBootstrapError, errorMessage } from '../errors.js';
import type { IHardwareTokenSource, ITokenResolver, ResolvedToken } from '../interfaces/token_resolver.js';

export const HARDWARE_TOKEN_PREFIX = 'tpm://';

export class HardwareTokenResolver implements ITokenResolver {
  private readonly _source: IHardwareTokenSource | undefined;
  private readonly _prefix: string;

  constructor(source?: IHardwareTokenSource, prefix: string = HARDWARE_TOKEN_PREFIX) {
    this._source = source;
    this._prefix = prefix;
  }

  async resolve(token: string): Promise<ResolvedToken> {
    if (!token.startsWith(this._prefix)) {
      return { hardware_backed: false, token };
    }

    if (!this._source) {
      throw new TrustBootstrapError(
        'TOKEN_RESOLUTION_FAILED',
        `Token is a ${this._prefix} reference but no hardware token source is configured`
      );
    }

    const reference = token.slice(this._prefix.length);
    let unsealed: string;
    try {
      unsealed = await this._source.unseal(reference);
    } catch (err) {
      throw new TrustBootstrapError(
        'TOKEN_RESOLUTION_FAILED',
        `Could not unseal hardware-backed token: ${errorMessage(err)}`,
        err
      );
    }

    if (!unsealed) {
      throw new TrustBootstrapError('TOKEN_RESOLUTION_FAILED', 'Hardware source returned an empty token');
    }
    return { hardware_backed: true, token: unsealed };
  }
}

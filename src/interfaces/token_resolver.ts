/**
 * ITokenResolver: turns a machine token (or a reference to a hardware-sealed
 * one) into the token used for bootstrap and fetch.
 *
 * HardwareTokenResolver is the implementation: plain tokens pass through,
 * tpm:// references are unsealed by a hardware source (or rejected when no
 * source is configured).
 *
 * The fetcher branches once on hardware_backed. It never inspects the token
 * format itself.
 */

export interface ResolvedToken {
  hardware_backed: boolean;
  token: string;
}

export interface ITokenResolver {
  resolve(token: string): Promise<ResolvedToken>;
}

/** Unseals a hardware-backed credential from its reference. */
export interface IHardwareTokenSource {
  unseal(reference: string): Promise<string>;
}

/**
 * Retrieves a protected resource through the hardware-backed path.
 * bundle is the verified CA bundle, or null when the default trust store suffices.
 */
export interface IHardwareFetcher {
  get(bundle: Buffer | null, url: string): Promise<Buffer>;
}

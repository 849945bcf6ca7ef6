/**
 * Nonce Generator: one fresh value per bootstrap attempt.
 *
 * 54 characters drawn from a 27-symbol alphabet (no vowels, no look-alike
 * digits), ~256 bits of entropy. Every character comes from the CSPRNG;
 * randomInt() rejects biased draws internally.
 */

import { randomInt } from 'crypto';

const NONCE_ALPHABET = 'bcdfghjklmnpqrstvwxz2456789';
const NONCE_LENGTH = 54;

export type NonceGenerator = () => string;

export function generateNonce(): string {
  let nonce = '';
  for (let i = 0; i < NONCE_LENGTH; i++) {
    nonce += NONCE_ALPHABET[randomInt(NONCE_ALPHABET.length)];
  }
  return nonce;
}

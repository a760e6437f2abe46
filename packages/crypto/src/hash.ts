import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import { keccak_256 as nobleKeccak256 } from '@noble/hashes/sha3';

import type { Digest } from './types';

/**
 * SHA-256 digest of arbitrary bytes.
 *
 * @example
 * ```typescript
 * toHex(sha256(utf8ToBytes('abc')));
 * // 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
 * ```
 */
export function sha256(data: Uint8Array): Digest {
  return nobleSha256(data);
}

/**
 * Keccak-256 digest of arbitrary bytes (the pre-standard SHA-3 padding used
 * by Ethereum, not FIPS-202 SHA3-256).
 */
export function keccak256(data: Uint8Array): Digest {
  return nobleKeccak256(data);
}

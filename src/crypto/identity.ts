/**
 * Human-readable identities
 *
 * 60 uppercase letters: each of the four 64-bit little-endian fragments of
 * the public key becomes 14 base-26 digits (least significant first),
 * followed by a 4-letter checksum taken from the low 18 bits of
 * K12(publicKey) truncated to 3 bytes.
 */

import { k12Short } from "./hash";
import { PreconditionError } from "../errors";
import { asPublicKey, PUBLIC_KEY_SIZE, type PublicKey } from "../types/brands";

export const IDENTITY_LENGTH = 60;

const FRAGMENT_LETTERS = 14;
const CHECKSUM_LETTERS = 4;
const U64_MAX = (1n << 64n) - 1n;

const checksumOf = (publicKey: Uint8Array): number => {
  const h = k12Short(publicKey, 3);
  return (h[0] | (h[1] << 8) | (h[2] << 16)) & 0x3ffff;
};

export const identityFromPublicKey = (publicKey: Uint8Array, lowerCase = false): string => {
  const pk = asPublicKey(publicKey);
  const view = new DataView(pk.buffer, pk.byteOffset, PUBLIC_KEY_SIZE);
  const base = lowerCase ? 97 : 65;
  let out = "";

  for (let i = 0; i < 4; i++) {
    let fragment = view.getBigUint64(i * 8, true);
    for (let j = 0; j < FRAGMENT_LETTERS; j++) {
      out += String.fromCharCode(base + Number(fragment % 26n));
      fragment /= 26n;
    }
  }

  let checksum = checksumOf(pk);
  for (let j = 0; j < CHECKSUM_LETTERS; j++) {
    out += String.fromCharCode(base + (checksum % 26));
    checksum = Math.floor(checksum / 26);
  }
  return out;
};

export const publicKeyFromIdentity = (identity: string): PublicKey => {
  if (identity.length !== IDENTITY_LENGTH) {
    throw new PreconditionError(
      `identity must be ${IDENTITY_LENGTH} letters, got ${identity.length}`,
    );
  }
  if (!/^[A-Z]+$/.test(identity)) {
    throw new PreconditionError("identity must contain only letters A-Z");
  }

  const pk = new Uint8Array(PUBLIC_KEY_SIZE);
  const view = new DataView(pk.buffer);
  for (let i = 0; i < 4; i++) {
    let fragment = 0n;
    for (let j = FRAGMENT_LETTERS - 1; j >= 0; j--) {
      fragment = fragment * 26n + BigInt(identity.charCodeAt(i * FRAGMENT_LETTERS + j) - 65);
    }
    if (fragment > U64_MAX) {
      throw new PreconditionError(`identity fragment ${i} overflows 64 bits`);
    }
    view.setBigUint64(i * 8, fragment, true);
  }

  if (identityFromPublicKey(pk) !== identity) {
    throw new PreconditionError("identity checksum mismatch");
  }
  return asPublicKey(pk);
};

export const isValidIdentity = (identity: string): boolean => {
  try {
    publicKeyFromIdentity(identity);
    return true;
  } catch (err) {
    if (err instanceof PreconditionError) return false;
    throw err;
  }
};

/** Identity string or raw key to a public key. */
export const toPublicKey = (subject: string | Uint8Array): PublicKey =>
  typeof subject === "string" ? publicKeyFromIdentity(subject) : asPublicKey(subject);

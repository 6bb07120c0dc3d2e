/**
 * Signing keys
 *
 * `KeyPair` is the only thing the transaction signer needs; any scheme the
 * network accepts can sit behind it. `Ed25519KeyPair` is the bundled one:
 * the secret scalar seed is K12 of a 55-letter lowercase seed phrase.
 */

import { ed25519 } from "@noble/curves/ed25519";
import { randomBytes } from "@noble/hashes/utils";
import { inspect } from "node:util";
import { digest } from "./hash";
import { identityFromPublicKey } from "./identity";
import { PreconditionError } from "../errors";

export interface KeyPair {
  publicIdentity(): Uint8Array;
  sign(digest: Uint8Array): Uint8Array | Promise<Uint8Array>;
}

export type Verifier = (
  signature: Uint8Array,
  message: Uint8Array,
  publicKey: Uint8Array,
) => boolean;

export const SEED_LENGTH = 55;
const SEED_PATTERN = /^[a-z]{55}$/;

export const randomSeed = (): string =>
  Array.from(randomBytes(SEED_LENGTH), (b) => String.fromCharCode(97 + (b % 26))).join("");

export class Ed25519KeyPair implements KeyPair {
  readonly #secret: Uint8Array;
  readonly #publicKey: Uint8Array;

  private constructor(secret: Uint8Array) {
    this.#secret = secret;
    this.#publicKey = ed25519.getPublicKey(secret);
  }

  static generate(): Ed25519KeyPair {
    return Ed25519KeyPair.fromSeed(randomSeed());
  }

  static fromSeed(seed: string): Ed25519KeyPair {
    if (!SEED_PATTERN.test(seed)) {
      throw new PreconditionError(`seed must be ${SEED_LENGTH} lowercase letters a-z`);
    }
    return new Ed25519KeyPair(digest(new TextEncoder().encode(seed)));
  }

  publicIdentity(): Uint8Array {
    return this.#publicKey.slice();
  }

  sign(message: Uint8Array): Uint8Array {
    return ed25519.sign(message, this.#secret);
  }

  toJSON(): { publicKey: string } {
    return { publicKey: identityFromPublicKey(this.#publicKey) };
  }

  [inspect.custom](): string {
    return `Ed25519KeyPair(${identityFromPublicKey(this.#publicKey)})`;
  }
}

export const verifyEd25519: Verifier = (signature, message, publicKey) => {
  try {
    return ed25519.verify(signature, message, publicKey);
  } catch (err) {
    // malformed points are a failed verification, not a fault
    if (err instanceof Error) return false;
    throw err;
  }
};

// Transaction signing: K12 digest, KeyPair signature, verification and ids.

import { encodeTransaction, encodeUnsignedTransaction } from "../codec/transaction";
import { fieldsOf } from "../core/transaction";
import type { SignedTransaction, Transaction } from "../core/types";
import { PreconditionError, SigningError } from "../errors";
import { asSignature, PUBLIC_KEY_SIZE, SIGNATURE_SIZE, type Digest } from "../types/brands";
import { digest } from "./hash";
import { identityFromPublicKey } from "./identity";
import type { KeyPair, Verifier } from "./keypair";

/** K12 over the unsigned encoding. */
export const transactionDigest = (tx: Transaction): Digest =>
  digest(encodeUnsignedTransaction(tx));

const sameBytes = (a: Uint8Array, b: Uint8Array): boolean =>
  a.length === b.length && a.every((v, i) => v === b[i]);

const publicKeyOf = (keyPair: KeyPair): Uint8Array => {
  let pk: unknown;
  try {
    pk = keyPair.publicIdentity();
  } catch (err) {
    throw new SigningError("key pair failed to report its public key", { cause: err });
  }
  if (!(pk instanceof Uint8Array) || pk.length !== PUBLIC_KEY_SIZE) {
    throw new SigningError(`key pair public key must be ${PUBLIC_KEY_SIZE} bytes`);
  }
  return pk;
};

export const signTransaction = async (
  tx: Transaction,
  keyPair: KeyPair | null | undefined,
): Promise<SignedTransaction> => {
  if (tx.state === "signed") {
    throw new PreconditionError("transaction is already signed; sign an unsignedCopy instead");
  }
  if (
    keyPair === null ||
    keyPair === undefined ||
    typeof keyPair.publicIdentity !== "function" ||
    typeof keyPair.sign !== "function"
  ) {
    throw new SigningError("a key pair with publicIdentity() and sign() is required");
  }
  if (!sameBytes(publicKeyOf(keyPair), tx.sourcePublicKey)) {
    throw new SigningError("key pair does not match the transaction source");
  }

  let signature: unknown;
  try {
    signature = await keyPair.sign(transactionDigest(tx));
  } catch (err) {
    throw new SigningError("key pair failed to sign", { cause: err });
  }
  if (!(signature instanceof Uint8Array) || signature.length !== SIGNATURE_SIZE) {
    throw new SigningError(`signature must be ${SIGNATURE_SIZE} bytes`);
  }

  return Object.freeze({
    ...fieldsOf(tx),
    state: "signed",
    signature: asSignature(signature.slice()),
  });
};

export const verifyTransaction = (tx: SignedTransaction, verify: Verifier): boolean =>
  verify(tx.signature, transactionDigest(tx), tx.sourcePublicKey);

/** Lowercase identity of K12 over the signed encoding. */
export const transactionId = (tx: SignedTransaction): string =>
  identityFromPublicKey(digest(encodeTransaction(tx)), true);

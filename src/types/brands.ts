import { FieldOverflow } from "../errors";

// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export const PUBLIC_KEY_SIZE = 32;
export const SIGNATURE_SIZE = 64;
export const DIGEST_SIZE = 32;

export type PublicKey = Brand<Uint8Array, "PublicKey">;
export type Signature = Brand<Uint8Array, "Signature">;
export type Digest = Brand<Uint8Array, "Digest">;

const exactly = (bytes: Uint8Array, width: number, what: string): void => {
  if (bytes.length !== width) {
    throw new FieldOverflow(what, `expected ${width} bytes, got ${bytes.length}`);
  }
};

export const asPublicKey = (b: Uint8Array): PublicKey => {
  exactly(b, PUBLIC_KEY_SIZE, "publicKey");
  return b as PublicKey;
};

export const asSignature = (b: Uint8Array): Signature => {
  exactly(b, SIGNATURE_SIZE, "signature");
  return b as Signature;
};

export const asDigest = (b: Uint8Array): Digest => {
  exactly(b, DIGEST_SIZE, "digest");
  return b as Digest;
};

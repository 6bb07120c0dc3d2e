import { ByteReader, ByteWriter } from "./cursor";
import { NUMBER_OF_COMPUTORS } from "../core/constants";
import type { Computors } from "../core/types";
import { asPublicKey, PUBLIC_KEY_SIZE, SIGNATURE_SIZE } from "../types/brands";

export const COMPUTORS_SIZE = 2 + NUMBER_OF_COMPUTORS * PUBLIC_KEY_SIZE + SIGNATURE_SIZE;

export const encodeComputors = (c: Computors): Buffer =>
  new ByteWriter(COMPUTORS_SIZE, "computors")
    .u16(c.epoch, "epoch")
    .array(c.publicKeys, NUMBER_OF_COMPUTORS, PUBLIC_KEY_SIZE, "publicKeys")
    .bytes(c.signature, SIGNATURE_SIZE, "signature")
    .finish();

export const decodeComputors = (bytes: Uint8Array): Computors => {
  const r = new ByteReader(bytes, "computors");
  const computors: Computors = {
    epoch: r.u16(),
    publicKeys: r.array(NUMBER_OF_COMPUTORS, PUBLIC_KEY_SIZE).map(asPublicKey),
    signature: r.signature(),
  };
  r.finish();
  return computors;
};

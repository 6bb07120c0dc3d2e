import { k12 } from "@noble/hashes/sha3-addons";
import { asDigest, DIGEST_SIZE, type Digest } from "../types/brands";

/** KangarooTwelve, 256-bit output. */
export const digest = (msg: Uint8Array): Digest => asDigest(k12(msg, { dkLen: DIGEST_SIZE }));

export const k12Short = (msg: Uint8Array, dkLen: number): Uint8Array => k12(msg, { dkLen });

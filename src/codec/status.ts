import { ByteReader, ByteWriter } from "./cursor";
import { MalformedMessage } from "../errors";
import type { TransactionStatus } from "../core/types";
import { DIGEST_SIZE } from "../types/brands";

const MONEY_FLEW_SIZE = 128;
const FIXED_SIZE = 4 + 4 + 4 + MONEY_FLEW_SIZE;

export const encodeTransactionStatus = (s: TransactionStatus): Buffer =>
  new ByteWriter(FIXED_SIZE + s.transactionDigests.length * DIGEST_SIZE, "transactionStatus")
    .u32(s.currentTickOfNode, "currentTickOfNode")
    .u32(s.tick, "tick")
    .u32(s.transactionDigests.length, "txCount")
    .bytes(s.moneyFlew, MONEY_FLEW_SIZE, "moneyFlew")
    .array(s.transactionDigests, s.transactionDigests.length, DIGEST_SIZE, "transactionDigests")
    .finish();

export const decodeTransactionStatus = (bytes: Uint8Array): TransactionStatus => {
  const r = new ByteReader(bytes, "transactionStatus");
  const currentTickOfNode = r.u32();
  const tick = r.u32();
  const txCount = r.u32();
  const moneyFlew = r.bytes(MONEY_FLEW_SIZE);
  if (r.remaining !== txCount * DIGEST_SIZE) {
    throw new MalformedMessage(
      `transactionStatus: txCount ${txCount} disagrees with ${r.remaining} remaining bytes`,
    );
  }
  const status: TransactionStatus = {
    currentTickOfNode,
    tick,
    moneyFlew,
    transactionDigests: r.array(txCount, DIGEST_SIZE),
  };
  r.finish();
  return status;
};

/** Whether the `index`-th transaction of the tick moved funds. */
export const moneyFlewAt = (s: TransactionStatus, index: number): boolean =>
  ((s.moneyFlew[index >> 3] ?? 0) & (1 << (index & 7))) !== 0;

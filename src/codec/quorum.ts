import { ByteReader, ByteWriter } from "./cursor";
import type { QuorumTickVote } from "../core/types";
import { DIGEST_SIZE, SIGNATURE_SIZE } from "../types/brands";

export const QUORUM_TICK_VOTE_SIZE = 16 + 4 * 4 + 8 * DIGEST_SIZE + SIGNATURE_SIZE;

// A tick is final once this many computors agree.
export const QUORUM = 451;

export const encodeQuorumTickVote = (v: QuorumTickVote): Buffer =>
  new ByteWriter(QUORUM_TICK_VOTE_SIZE, "quorumTickVote")
    .u16(v.computorIndex, "computorIndex")
    .u16(v.epoch, "epoch")
    .u32(v.tick, "tick")
    .u16(v.millisecond, "millisecond")
    .u8(v.second, "second")
    .u8(v.minute, "minute")
    .u8(v.hour, "hour")
    .u8(v.day, "day")
    .u8(v.month, "month")
    .u8(v.year, "year")
    .u32(v.previousResourceTestingDigest, "previousResourceTestingDigest")
    .u32(v.saltedResourceTestingDigest, "saltedResourceTestingDigest")
    .u32(v.previousTransactionBodyDigest, "previousTransactionBodyDigest")
    .u32(v.saltedTransactionBodyDigest, "saltedTransactionBodyDigest")
    .bytes(v.previousSpectrumDigest, DIGEST_SIZE, "previousSpectrumDigest")
    .bytes(v.previousUniverseDigest, DIGEST_SIZE, "previousUniverseDigest")
    .bytes(v.previousComputerDigest, DIGEST_SIZE, "previousComputerDigest")
    .bytes(v.saltedSpectrumDigest, DIGEST_SIZE, "saltedSpectrumDigest")
    .bytes(v.saltedUniverseDigest, DIGEST_SIZE, "saltedUniverseDigest")
    .bytes(v.saltedComputerDigest, DIGEST_SIZE, "saltedComputerDigest")
    .bytes(v.transactionDigest, DIGEST_SIZE, "transactionDigest")
    .bytes(v.expectedNextTickTransactionDigest, DIGEST_SIZE, "expectedNextTickTransactionDigest")
    .bytes(v.signature, SIGNATURE_SIZE, "signature")
    .finish();

export const decodeQuorumTickVote = (bytes: Uint8Array): QuorumTickVote => {
  const r = new ByteReader(bytes, "quorumTickVote");
  const vote: QuorumTickVote = {
    computorIndex: r.u16(),
    epoch: r.u16(),
    tick: r.u32(),
    millisecond: r.u16(),
    second: r.u8(),
    minute: r.u8(),
    hour: r.u8(),
    day: r.u8(),
    month: r.u8(),
    year: r.u8(),
    previousResourceTestingDigest: r.u32(),
    saltedResourceTestingDigest: r.u32(),
    previousTransactionBodyDigest: r.u32(),
    saltedTransactionBodyDigest: r.u32(),
    previousSpectrumDigest: r.bytes(DIGEST_SIZE),
    previousUniverseDigest: r.bytes(DIGEST_SIZE),
    previousComputerDigest: r.bytes(DIGEST_SIZE),
    saltedSpectrumDigest: r.bytes(DIGEST_SIZE),
    saltedUniverseDigest: r.bytes(DIGEST_SIZE),
    saltedComputerDigest: r.bytes(DIGEST_SIZE),
    transactionDigest: r.bytes(DIGEST_SIZE),
    expectedNextTickTransactionDigest: r.bytes(DIGEST_SIZE),
    signature: r.signature(),
  };
  r.finish();
  return vote;
};

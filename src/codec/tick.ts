import { ByteReader, ByteWriter } from "./cursor";
import { FieldOverflow } from "../errors";
import { NUMBER_OF_TRANSACTIONS_PER_TICK } from "../core/constants";
import type { TickData, TickInfo } from "../core/types";
import { DIGEST_SIZE, SIGNATURE_SIZE } from "../types/brands";
import { isZero } from "../utils/bytes";

export const TICK_INFO_SIZE = 16;
export const TICK_DATA_SIZE =
  16 + 32 + NUMBER_OF_TRANSACTIONS_PER_TICK * DIGEST_SIZE + NUMBER_OF_TRANSACTIONS_PER_TICK * 8 + SIGNATURE_SIZE;

/* ── tick info ───────────────────────────────────────────── */

export const encodeTickInfo = (info: TickInfo): Buffer =>
  new ByteWriter(TICK_INFO_SIZE, "tickInfo")
    .u16(info.tickDuration, "tickDuration")
    .u16(info.epoch, "epoch")
    .u32(info.tick, "tick")
    .u16(info.numberOfAlignedVotes, "numberOfAlignedVotes")
    .u16(info.numberOfMisalignedVotes, "numberOfMisalignedVotes")
    .u32(info.initialTick, "initialTick")
    .finish();

export const decodeTickInfo = (bytes: Uint8Array): TickInfo => {
  const r = new ByteReader(bytes, "tickInfo");
  const info: TickInfo = {
    tickDuration: r.u16(),
    epoch: r.u16(),
    tick: r.u32(),
    numberOfAlignedVotes: r.u16(),
    numberOfMisalignedVotes: r.u16(),
    initialTick: r.u32(),
  };
  r.finish();
  return info;
};

/* ── tick data ───────────────────────────────────────────── */

export const encodeTickData = (data: TickData): Buffer => {
  const w = new ByteWriter(TICK_DATA_SIZE, "tickData")
    .u16(data.computorIndex, "computorIndex")
    .u16(data.epoch, "epoch")
    .u32(data.tick, "tick")
    .u16(data.millisecond, "millisecond")
    .u8(data.second, "second")
    .u8(data.minute, "minute")
    .u8(data.hour, "hour")
    .u8(data.day, "day")
    .u8(data.month, "month")
    .u8(data.year, "year")
    .bytes(data.timelock, 32, "timelock")
    .array(data.transactionDigests, NUMBER_OF_TRANSACTIONS_PER_TICK, DIGEST_SIZE, "transactionDigests");
  if (data.contractFees.length !== NUMBER_OF_TRANSACTIONS_PER_TICK) {
    throw new FieldOverflow(
      "tickData.contractFees",
      `expected ${NUMBER_OF_TRANSACTIONS_PER_TICK} entries, got ${data.contractFees.length}`,
    );
  }
  data.contractFees.forEach((fee, i) => w.i64(fee, `contractFees[${i}]`));
  return w.bytes(data.signature, SIGNATURE_SIZE, "signature").finish();
};

export const decodeTickData = (bytes: Uint8Array): TickData => {
  const r = new ByteReader(bytes, "tickData");
  const data: TickData = {
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
    timelock: r.bytes(32),
    transactionDigests: r.array(NUMBER_OF_TRANSACTIONS_PER_TICK, DIGEST_SIZE),
    contractFees: Array.from({ length: NUMBER_OF_TRANSACTIONS_PER_TICK }, () => r.i64()),
    signature: r.signature(),
  };
  r.finish();
  return data;
};

/** Digests the node left empty are all-zero slots. */
export const nonEmptyDigests = (data: TickData): Uint8Array[] =>
  data.transactionDigests.filter((d) => !isZero(d));

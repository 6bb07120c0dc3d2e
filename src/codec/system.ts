import { ByteReader, ByteWriter } from "./cursor";
import { FieldOverflow } from "../errors";
import type { SystemInfo } from "../core/types";

export const SYSTEM_INFO_SIZE = 128;
const RESERVED_WORDS = 5;

export const encodeSystemInfo = (info: SystemInfo): Buffer => {
  const w = new ByteWriter(SYSTEM_INFO_SIZE, "systemInfo")
    .i16(info.version, "version")
    .u16(info.epoch, "epoch")
    .u32(info.tick, "tick")
    .u32(info.initialTick, "initialTick")
    .u32(info.latestCreatedTick, "latestCreatedTick")
    .u16(info.initialMillisecond, "initialMillisecond")
    .u8(info.initialSecond, "initialSecond")
    .u8(info.initialMinute, "initialMinute")
    .u8(info.initialHour, "initialHour")
    .u8(info.initialDay, "initialDay")
    .u8(info.initialMonth, "initialMonth")
    .u8(info.initialYear, "initialYear")
    .u32(info.numberOfEntities, "numberOfEntities")
    .u32(info.numberOfTransactions, "numberOfTransactions")
    .bytes(info.randomMiningSeed, 32, "randomMiningSeed")
    .i32(info.solutionThreshold, "solutionThreshold")
    .u64(info.totalSpectrumAmount, "totalSpectrumAmount")
    .u64(info.currentEntityBalanceDustThreshold, "currentEntityBalanceDustThreshold")
    .u32(info.targetTickVoteSignature, "targetTickVoteSignature");
  if (info.reserved.length !== RESERVED_WORDS) {
    throw new FieldOverflow(
      "systemInfo.reserved",
      `expected ${RESERVED_WORDS} entries, got ${info.reserved.length}`,
    );
  }
  info.reserved.forEach((word, i) => w.u64(word, `reserved[${i}]`));
  return w.finish();
};

export const decodeSystemInfo = (bytes: Uint8Array): SystemInfo => {
  const r = new ByteReader(bytes, "systemInfo");
  const info: SystemInfo = {
    version: r.i16(),
    epoch: r.u16(),
    tick: r.u32(),
    initialTick: r.u32(),
    latestCreatedTick: r.u32(),
    initialMillisecond: r.u16(),
    initialSecond: r.u8(),
    initialMinute: r.u8(),
    initialHour: r.u8(),
    initialDay: r.u8(),
    initialMonth: r.u8(),
    initialYear: r.u8(),
    numberOfEntities: r.u32(),
    numberOfTransactions: r.u32(),
    randomMiningSeed: r.bytes(32),
    solutionThreshold: r.i32(),
    totalSpectrumAmount: r.u64(),
    currentEntityBalanceDustThreshold: r.u64(),
    targetTickVoteSignature: r.u32(),
    reserved: Array.from({ length: RESERVED_WORDS }, () => r.u64()),
  };
  r.finish();
  return info;
};

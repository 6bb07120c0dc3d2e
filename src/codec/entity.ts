import { ByteReader, ByteWriter } from "./cursor";
import { SPECTRUM_DEPTH } from "../core/constants";
import type { EntityRecord } from "../core/types";
import { DIGEST_SIZE, PUBLIC_KEY_SIZE } from "../types/brands";

// entity(64) + tick + spectrumIndex + siblings
export const ENTITY_SIZE = 64 + 4 + 4 + SPECTRUM_DEPTH * DIGEST_SIZE;

export const encodeEntity = (e: EntityRecord): Buffer =>
  new ByteWriter(ENTITY_SIZE, "entity")
    .bytes(e.publicKey, PUBLIC_KEY_SIZE, "publicKey")
    .i64(e.incomingAmount, "incomingAmount")
    .i64(e.outgoingAmount, "outgoingAmount")
    .u32(e.numberOfIncomingTransfers, "numberOfIncomingTransfers")
    .u32(e.numberOfOutgoingTransfers, "numberOfOutgoingTransfers")
    .u32(e.latestIncomingTransferTick, "latestIncomingTransferTick")
    .u32(e.latestOutgoingTransferTick, "latestOutgoingTransferTick")
    .u32(e.tick, "tick")
    .i32(e.spectrumIndex, "spectrumIndex")
    .array(e.siblings, SPECTRUM_DEPTH, DIGEST_SIZE, "siblings")
    .finish();

export const decodeEntity = (bytes: Uint8Array): EntityRecord => {
  const r = new ByteReader(bytes, "entity");
  const entity: EntityRecord = {
    publicKey: r.publicKey(),
    incomingAmount: r.i64(),
    outgoingAmount: r.i64(),
    numberOfIncomingTransfers: r.u32(),
    numberOfOutgoingTransfers: r.u32(),
    latestIncomingTransferTick: r.u32(),
    latestOutgoingTransferTick: r.u32(),
    tick: r.u32(),
    spectrumIndex: r.i32(),
    siblings: r.array(SPECTRUM_DEPTH, DIGEST_SIZE),
  };
  r.finish();
  return entity;
};

export const balanceOf = (e: EntityRecord): bigint => e.incomingAmount - e.outgoingAmount;

/**
 * Universe records and the responses that carry them.
 *
 * Every record occupies 48 bytes; the proof that follows issued / owned /
 * possessed responses is the Merkle path of the last record in the message.
 */

import { ByteReader, ByteWriter } from "./cursor";
import { MalformedMessage } from "../errors";
import {
  ASSET_NAME_SIZE,
  ASSETS_DEPTH,
  UNIT_OF_MEASUREMENT_SIZE,
} from "../core/constants";
import type {
  Asset,
  AssetEntry,
  AssetProof,
  IssuanceRecord,
  IssuedAsset,
  OwnedAsset,
  OwnershipRecord,
  PossessedAsset,
  PossessionRecord,
} from "../core/types";
import { DIGEST_SIZE, PUBLIC_KEY_SIZE } from "../types/brands";

export enum AssetRecordType {
  EMPTY = 0,
  ISSUANCE = 1,
  OWNERSHIP = 2,
  POSSESSION = 3,
}

export const ASSET_RECORD_SIZE = 48;
export const ASSET_PROOF_SIZE = 4 + 4 + ASSETS_DEPTH * DIGEST_SIZE;
export const ISSUED_ASSET_SIZE = ASSET_RECORD_SIZE + ASSET_PROOF_SIZE;
export const OWNED_ASSET_SIZE = 2 * ASSET_RECORD_SIZE + ASSET_PROOF_SIZE;
export const POSSESSED_ASSET_SIZE = 3 * ASSET_RECORD_SIZE + ASSET_PROOF_SIZE;
export const ASSET_ENTRY_SIZE = ASSET_RECORD_SIZE + 4 + 4;

/* ── records ─────────────────────────────────────────────── */

const writeIssuance = (w: ByteWriter, rec: IssuanceRecord): ByteWriter =>
  w
    .bytes(rec.publicKey, PUBLIC_KEY_SIZE, "issuance.publicKey")
    .u8(rec.type, "issuance.type")
    .text(rec.name, ASSET_NAME_SIZE, "issuance.name")
    .i8(rec.numberOfDecimalPlaces, "issuance.numberOfDecimalPlaces")
    .bytes(rec.unitOfMeasurement, UNIT_OF_MEASUREMENT_SIZE, "issuance.unitOfMeasurement");

const readIssuance = (r: ByteReader): IssuanceRecord => ({
  publicKey: r.publicKey(),
  type: r.u8(),
  name: r.text(ASSET_NAME_SIZE),
  numberOfDecimalPlaces: r.i8(),
  unitOfMeasurement: r.bytes(UNIT_OF_MEASUREMENT_SIZE),
});

const writeOwnership = (w: ByteWriter, rec: OwnershipRecord): ByteWriter =>
  w
    .bytes(rec.publicKey, PUBLIC_KEY_SIZE, "ownership.publicKey")
    .u8(rec.type, "ownership.type")
    .zeros(1)
    .u16(rec.managingContractIndex, "ownership.managingContractIndex")
    .u32(rec.issuanceIndex, "ownership.issuanceIndex")
    .i64(rec.numberOfUnits, "ownership.numberOfUnits");

const readOwnership = (r: ByteReader): OwnershipRecord => {
  const publicKey = r.publicKey();
  const type = r.u8();
  r.skip(1);
  return {
    publicKey,
    type,
    managingContractIndex: r.u16(),
    issuanceIndex: r.u32(),
    numberOfUnits: r.i64(),
  };
};

const writePossession = (w: ByteWriter, rec: PossessionRecord): ByteWriter =>
  w
    .bytes(rec.publicKey, PUBLIC_KEY_SIZE, "possession.publicKey")
    .u8(rec.type, "possession.type")
    .zeros(1)
    .u16(rec.managingContractIndex, "possession.managingContractIndex")
    .u32(rec.ownershipIndex, "possession.ownershipIndex")
    .i64(rec.numberOfUnits, "possession.numberOfUnits");

const readPossession = (r: ByteReader): PossessionRecord => {
  const publicKey = r.publicKey();
  const type = r.u8();
  r.skip(1);
  return {
    publicKey,
    type,
    managingContractIndex: r.u16(),
    ownershipIndex: r.u32(),
    numberOfUnits: r.i64(),
  };
};

const writeProof = (w: ByteWriter, proof: AssetProof): ByteWriter =>
  w
    .u32(proof.tick, "proof.tick")
    .u32(proof.universeIndex, "proof.universeIndex")
    .array(proof.siblings, ASSETS_DEPTH, DIGEST_SIZE, "proof.siblings");

const readProof = (r: ByteReader): AssetProof => ({
  tick: r.u32(),
  universeIndex: r.u32(),
  siblings: r.array(ASSETS_DEPTH, DIGEST_SIZE),
});

/* ── RESPOND_ISSUED / OWNED / POSSESSED_ASSETS ───────────── */

export const encodeIssuedAsset = (a: IssuedAsset): Buffer =>
  writeProof(writeIssuance(new ByteWriter(ISSUED_ASSET_SIZE, "issuedAsset"), a.issuance), a.proof).finish();

export const decodeIssuedAsset = (bytes: Uint8Array): IssuedAsset => {
  const r = new ByteReader(bytes, "issuedAsset");
  const asset: IssuedAsset = { issuance: readIssuance(r), proof: readProof(r) };
  r.finish();
  return asset;
};

export const encodeOwnedAsset = (a: OwnedAsset): Buffer => {
  const w = new ByteWriter(OWNED_ASSET_SIZE, "ownedAsset");
  writeOwnership(w, a.ownership);
  writeIssuance(w, a.issuance);
  return writeProof(w, a.proof).finish();
};

export const decodeOwnedAsset = (bytes: Uint8Array): OwnedAsset => {
  const r = new ByteReader(bytes, "ownedAsset");
  const asset: OwnedAsset = {
    ownership: readOwnership(r),
    issuance: readIssuance(r),
    proof: readProof(r),
  };
  r.finish();
  return asset;
};

export const encodePossessedAsset = (a: PossessedAsset): Buffer => {
  const w = new ByteWriter(POSSESSED_ASSET_SIZE, "possessedAsset");
  writePossession(w, a.possession);
  writeOwnership(w, a.ownership);
  writeIssuance(w, a.issuance);
  return writeProof(w, a.proof).finish();
};

export const decodePossessedAsset = (bytes: Uint8Array): PossessedAsset => {
  const r = new ByteReader(bytes, "possessedAsset");
  const asset: PossessedAsset = {
    possession: readPossession(r),
    ownership: readOwnership(r),
    issuance: readIssuance(r),
    proof: readProof(r),
  };
  r.finish();
  return asset;
};

/** Flattened view of an owned asset. */
export const toAsset = (owned: OwnedAsset): Asset => ({
  ownerPublicKey: owned.ownership.publicKey,
  issuerPublicKey: owned.issuance.publicKey,
  assetName: owned.issuance.name,
  quantity: owned.ownership.numberOfUnits,
  managingContractIndex: owned.ownership.managingContractIndex,
});

/* ── RESPOND_ASSETS ──────────────────────────────────────── */

export type RecordCodec<R extends { type: number }> = {
  kind: AssetRecordType;
  write: (w: ByteWriter, rec: R) => ByteWriter;
  read: (r: ByteReader) => R;
};

export const issuanceCodec: RecordCodec<IssuanceRecord> = {
  kind: AssetRecordType.ISSUANCE,
  write: writeIssuance,
  read: readIssuance,
};
export const ownershipCodec: RecordCodec<OwnershipRecord> = {
  kind: AssetRecordType.OWNERSHIP,
  write: writeOwnership,
  read: readOwnership,
};
export const possessionCodec: RecordCodec<PossessionRecord> = {
  kind: AssetRecordType.POSSESSION,
  write: writePossession,
  read: readPossession,
};

export const encodeAssetEntry = <R extends { type: number }>(
  codec: RecordCodec<R>,
  entry: AssetEntry<R>,
): Buffer =>
  codec
    .write(new ByteWriter(ASSET_ENTRY_SIZE, "assetEntry"), entry.record)
    .u32(entry.tick, "tick")
    .u32(entry.universeIndex, "universeIndex")
    .finish();

/** A record of another kind (e.g. at a universe index) is rejected. */
export const decodeAssetEntry = <R extends { type: number }>(
  codec: RecordCodec<R>,
  bytes: Uint8Array,
): AssetEntry<R> => {
  const r = new ByteReader(bytes, "assetEntry");
  const entry: AssetEntry<R> = { record: codec.read(r), tick: r.u32(), universeIndex: r.u32() };
  r.finish();
  if (entry.record.type !== codec.kind) {
    throw new MalformedMessage(
      `assetEntry: expected ${AssetRecordType[codec.kind]} record, got type ${entry.record.type}`,
    );
  }
  return entry;
};

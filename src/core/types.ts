import type { MessageType } from "./constants";
import type { PublicKey, Signature } from "../types/brands";

/* ── wire envelope ───────────────────────────────────────── */
export type MessageHeader = {
  size: number; // total bytes, header included (24-bit)
  type: MessageType | number; // inbound traffic may carry types we do not model
  dejavu: number; // correlation token, 0 for broadcasts
};

export type WireMessage = {
  header: MessageHeader;
  body: Buffer;
};

/* ── network state ───────────────────────────────────────── */
export type TickInfo = {
  tickDuration: number;
  epoch: number;
  tick: number;
  numberOfAlignedVotes: number;
  numberOfMisalignedVotes: number;
  initialTick: number;
};

export type SystemInfo = {
  version: number;
  epoch: number;
  tick: number;
  initialTick: number;
  latestCreatedTick: number;
  initialMillisecond: number;
  initialSecond: number;
  initialMinute: number;
  initialHour: number;
  initialDay: number;
  initialMonth: number;
  initialYear: number;
  numberOfEntities: number;
  numberOfTransactions: number;
  randomMiningSeed: Uint8Array;
  solutionThreshold: number;
  totalSpectrumAmount: bigint;
  currentEntityBalanceDustThreshold: bigint;
  targetTickVoteSignature: number;
  reserved: readonly bigint[];
};

export type EntityRecord = {
  publicKey: PublicKey;
  incomingAmount: bigint;
  outgoingAmount: bigint;
  numberOfIncomingTransfers: number;
  numberOfOutgoingTransfers: number;
  latestIncomingTransferTick: number;
  latestOutgoingTransferTick: number;
  tick: number;
  spectrumIndex: number;
  siblings: Uint8Array[];
};

export type Computors = {
  epoch: number;
  publicKeys: PublicKey[];
  signature: Signature;
};

/* ── assets ──────────────────────────────────────────────── */
export type IssuanceRecord = {
  publicKey: PublicKey; // issuer
  type: number;
  name: string;
  numberOfDecimalPlaces: number;
  unitOfMeasurement: Uint8Array;
};

export type OwnershipRecord = {
  publicKey: PublicKey; // owner
  type: number;
  managingContractIndex: number;
  issuanceIndex: number;
  numberOfUnits: bigint;
};

export type PossessionRecord = {
  publicKey: PublicKey; // possessor
  type: number;
  managingContractIndex: number;
  ownershipIndex: number;
  numberOfUnits: bigint;
};

/** Merkle inclusion proof of a universe entry. */
export type AssetProof = {
  tick: number;
  universeIndex: number;
  siblings: Uint8Array[];
};

export type IssuedAsset = { issuance: IssuanceRecord; proof: AssetProof };

export type OwnedAsset = {
  ownership: OwnershipRecord;
  issuance: IssuanceRecord;
  proof: AssetProof;
};

export type PossessedAsset = {
  possession: PossessionRecord;
  ownership: OwnershipRecord;
  issuance: IssuanceRecord;
  proof: AssetProof;
};

/** Universe entry as answered to REQUEST_ASSETS. */
export type AssetEntry<R> = { record: R; tick: number; universeIndex: number };

/** Flattened view of an owned asset. */
export type Asset = {
  ownerPublicKey: PublicKey;
  issuerPublicKey: PublicKey;
  assetName: string;
  quantity: bigint;
  managingContractIndex: number;
};

/* ── ticks ───────────────────────────────────────────────── */
export type TickData = {
  computorIndex: number;
  epoch: number;
  tick: number;
  millisecond: number;
  second: number;
  minute: number;
  hour: number;
  day: number;
  month: number;
  year: number;
  timelock: Uint8Array;
  transactionDigests: Uint8Array[];
  contractFees: bigint[];
  signature: Signature;
};

export type QuorumTickVote = {
  computorIndex: number;
  epoch: number;
  tick: number;
  millisecond: number;
  second: number;
  minute: number;
  hour: number;
  day: number;
  month: number;
  year: number;
  previousResourceTestingDigest: number;
  saltedResourceTestingDigest: number;
  previousTransactionBodyDigest: number;
  saltedTransactionBodyDigest: number;
  previousSpectrumDigest: Uint8Array;
  previousUniverseDigest: Uint8Array;
  previousComputerDigest: Uint8Array;
  saltedSpectrumDigest: Uint8Array;
  saltedUniverseDigest: Uint8Array;
  saltedComputerDigest: Uint8Array;
  transactionDigest: Uint8Array;
  expectedNextTickTransactionDigest: Uint8Array;
  signature: Signature;
};

export type TransactionStatus = {
  currentTickOfNode: number;
  tick: number;
  moneyFlew: Uint8Array;
  transactionDigests: Uint8Array[];
};

/* ── transactions ────────────────────────────────────────── */
export type TransactionFields = {
  readonly sourcePublicKey: PublicKey;
  readonly destinationPublicKey: PublicKey;
  readonly amount: bigint;
  readonly tick: number;
  readonly inputType: number;
  readonly inputSize: number; // always payload.length
  readonly payload: Uint8Array;
};

export type UnsignedTransaction = TransactionFields & { readonly state: "unsigned" };

export type SignedTransaction = TransactionFields & {
  readonly state: "signed";
  readonly signature: Signature;
};

export type Transaction = UnsignedTransaction | SignedTransaction;

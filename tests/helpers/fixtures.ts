import {
  ASSETS_DEPTH,
  NUMBER_OF_COMPUTORS,
  NUMBER_OF_TRANSACTIONS_PER_TICK,
  SPECTRUM_DEPTH,
} from "../../src/core/constants";
import type {
  AssetProof,
  Computors,
  EntityRecord,
  IssuanceRecord,
  OwnedAsset,
  OwnershipRecord,
  PossessionRecord,
  QuorumTickVote,
  SystemInfo,
  TickData,
  TickInfo,
} from "../../src/core/types";
import { AssetRecordType } from "../../src/codec/assets";
import {
  asPublicKey,
  asSignature,
  type PublicKey,
  type Signature,
} from "../../src/types/brands";

export const filled = (width: number, value: number): Uint8Array =>
  new Uint8Array(width).fill(value);

export const mkKey = (value: number): PublicKey => asPublicKey(filled(32, value));
export const mkSig = (value: number): Signature => asSignature(filled(64, value));
const digests = (count: number, value: number): Uint8Array[] =>
  Array.from({ length: count }, () => filled(32, value));

export const mkTickInfo = (over: Partial<TickInfo> = {}): TickInfo => ({
  tickDuration: 2,
  epoch: 150,
  tick: 12345678,
  numberOfAlignedVotes: 451,
  numberOfMisalignedVotes: 3,
  initialTick: 12300000,
  ...over,
});

export const mkSystemInfo = (over: Partial<SystemInfo> = {}): SystemInfo => ({
  version: 219,
  epoch: 150,
  tick: 12345678,
  initialTick: 12300000,
  latestCreatedTick: 12345677,
  initialMillisecond: 0,
  initialSecond: 0,
  initialMinute: 0,
  initialHour: 12,
  initialDay: 19,
  initialMonth: 10,
  initialYear: 26,
  numberOfEntities: 500000,
  numberOfTransactions: 1200,
  randomMiningSeed: filled(32, 7),
  solutionThreshold: 321,
  totalSpectrumAmount: 1_000_000_000_000n,
  currentEntityBalanceDustThreshold: 10n,
  targetTickVoteSignature: 0x1234,
  reserved: [0n, 0n, 0n, 0n, 0n],
  ...over,
});

export const mkEntity = (over: Partial<EntityRecord> = {}): EntityRecord => ({
  publicKey: mkKey(1),
  incomingAmount: 5000n,
  outgoingAmount: 1200n,
  numberOfIncomingTransfers: 4,
  numberOfOutgoingTransfers: 2,
  latestIncomingTransferTick: 12345000,
  latestOutgoingTransferTick: 12345100,
  tick: 12345678,
  spectrumIndex: 42,
  siblings: digests(SPECTRUM_DEPTH, 9),
  ...over,
});

export const mkIssuance = (over: Partial<IssuanceRecord> = {}): IssuanceRecord => ({
  publicKey: mkKey(2),
  type: AssetRecordType.ISSUANCE,
  name: "TOKEN",
  numberOfDecimalPlaces: 0,
  unitOfMeasurement: filled(7, 0),
  ...over,
});

export const mkOwnership = (over: Partial<OwnershipRecord> = {}): OwnershipRecord => ({
  publicKey: mkKey(1),
  type: AssetRecordType.OWNERSHIP,
  managingContractIndex: 1,
  issuanceIndex: 77,
  numberOfUnits: 250n,
  ...over,
});

export const mkPossession = (over: Partial<PossessionRecord> = {}): PossessionRecord => ({
  publicKey: mkKey(1),
  type: AssetRecordType.POSSESSION,
  managingContractIndex: 1,
  ownershipIndex: 78,
  numberOfUnits: 250n,
  ...over,
});

export const mkProof = (over: Partial<AssetProof> = {}): AssetProof => ({
  tick: 12345678,
  universeIndex: 79,
  siblings: digests(ASSETS_DEPTH, 3),
  ...over,
});

export const mkOwnedAsset = (over: Partial<OwnedAsset> = {}): OwnedAsset => ({
  ownership: mkOwnership(),
  issuance: mkIssuance(),
  proof: mkProof(),
  ...over,
});

export const mkTickData = (over: Partial<TickData> = {}): TickData => ({
  computorIndex: 5,
  epoch: 150,
  tick: 12345670,
  millisecond: 250,
  second: 30,
  minute: 15,
  hour: 12,
  day: 19,
  month: 10,
  year: 26,
  timelock: filled(32, 4),
  transactionDigests: Array.from({ length: NUMBER_OF_TRANSACTIONS_PER_TICK }, (_, i) =>
    filled(32, i < 2 ? 0xaa + i : 0),
  ),
  contractFees: Array.from({ length: NUMBER_OF_TRANSACTIONS_PER_TICK }, () => 0n),
  signature: mkSig(6),
  ...over,
});

export const mkQuorumVote = (over: Partial<QuorumTickVote> = {}): QuorumTickVote => ({
  computorIndex: 7,
  epoch: 150,
  tick: 12345670,
  millisecond: 0,
  second: 1,
  minute: 2,
  hour: 3,
  day: 19,
  month: 10,
  year: 26,
  previousResourceTestingDigest: 11,
  saltedResourceTestingDigest: 12,
  previousTransactionBodyDigest: 13,
  saltedTransactionBodyDigest: 14,
  previousSpectrumDigest: filled(32, 1),
  previousUniverseDigest: filled(32, 2),
  previousComputerDigest: filled(32, 3),
  saltedSpectrumDigest: filled(32, 4),
  saltedUniverseDigest: filled(32, 5),
  saltedComputerDigest: filled(32, 6),
  transactionDigest: filled(32, 7),
  expectedNextTickTransactionDigest: filled(32, 8),
  signature: mkSig(9),
  ...over,
});

export const mkComputors = (over: Partial<Computors> = {}): Computors => ({
  epoch: 150,
  publicKeys: Array.from({ length: NUMBER_OF_COMPUTORS }, (_, i) => mkKey(i % 256)),
  signature: mkSig(5),
  ...over,
});

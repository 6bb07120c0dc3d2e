// Request bodies sent to the node.

import { ByteWriter } from "./cursor";
import { PreconditionError } from "../errors";
import {
  ASSET_FILTER_NAME_SIZE,
  AssetRequestType,
  FLAG_ANY_ASSET_NAME,
  FLAG_ANY_ISSUER,
  FLAG_ANY_OWNER,
  FLAG_ANY_OWNER_CONTRACT,
  FLAG_ANY_POSSESSOR,
  FLAG_ANY_POSSESSOR_CONTRACT,
  NUMBER_OF_COMPUTORS,
  NUMBER_OF_TRANSACTIONS_PER_TICK,
} from "../core/constants";
import { PUBLIC_KEY_SIZE, type PublicKey } from "../types/brands";

export const TICK_TRANSACTIONS_FLAGS_SIZE = NUMBER_OF_TRANSACTIONS_PER_TICK / 8;
export const QUORUM_VOTE_FLAGS_SIZE = Math.ceil(NUMBER_OF_COMPUTORS / 8);
export const ASSETS_REQUEST_SIZE = 8 + 3 * PUBLIC_KEY_SIZE + ASSET_FILTER_NAME_SIZE;

const ZERO_KEY = new Uint8Array(PUBLIC_KEY_SIZE);

export const encodePublicKeyRequest = (publicKey: PublicKey): Buffer =>
  new ByteWriter(PUBLIC_KEY_SIZE, "request").bytes(publicKey, PUBLIC_KEY_SIZE, "publicKey").finish();

export const encodeTickRequest = (tick: number): Buffer =>
  new ByteWriter(4, "request").u32(tick, "tick").finish();

/** All-zero flags ask for every transaction of the tick. */
export const encodeTickTransactionsRequest = (tick: number): Buffer =>
  new ByteWriter(4 + TICK_TRANSACTIONS_FLAGS_SIZE, "request")
    .u32(tick, "tick")
    .zeros(TICK_TRANSACTIONS_FLAGS_SIZE)
    .finish();

/** All-zero flags ask for the votes of every computor. */
export const encodeQuorumTickRequest = (tick: number): Buffer =>
  new ByteWriter(4 + QUORUM_VOTE_FLAGS_SIZE, "request")
    .u32(tick, "tick")
    .zeros(QUORUM_VOTE_FLAGS_SIZE)
    .finish();

export const encodeContractFunctionRequest = (
  contractIndex: number,
  inputType: number,
  input: Uint8Array,
): Buffer =>
  new ByteWriter(8 + input.length, "request")
    .u32(contractIndex, "contractIndex")
    .u16(inputType, "inputType")
    .u16(input.length, "inputSize")
    .raw(input)
    .finish();

/* ── REQUEST_ASSETS ──────────────────────────────────────── */

export type IssuanceFilter = {
  issuer?: PublicKey;
  assetName?: string;
};

export type OwnershipFilter = {
  issuer?: PublicKey;
  assetName: string;
  owner?: PublicKey;
  ownershipContract?: number;
};

export type PossessionFilter = OwnershipFilter & {
  possessor?: PublicKey;
  possessionContract?: number;
};

export type UniverseIndexSelector = { universeIndex: number };

export type AssetSelector<F> = F | UniverseIndexSelector;

export const isUniverseIndexSelector = <F extends object>(
  selector: AssetSelector<F>,
): selector is UniverseIndexSelector => "universeIndex" in selector;

type FilterFields = {
  requestType: AssetRequestType;
  flags: number;
  ownershipContract: number;
  possessionContract: number;
  issuer: Uint8Array;
  assetName: string;
  owner: Uint8Array;
  possessor: Uint8Array;
};

const encodeFilter = (f: FilterFields): Buffer =>
  new ByteWriter(ASSETS_REQUEST_SIZE, "assetsRequest")
    .u16(f.requestType, "requestType")
    .u16(f.flags, "flags")
    .u16(f.ownershipContract, "ownershipContract")
    .u16(f.possessionContract, "possessionContract")
    .bytes(f.issuer, PUBLIC_KEY_SIZE, "issuer")
    .text(f.assetName, ASSET_FILTER_NAME_SIZE, "assetName")
    .bytes(f.owner, PUBLIC_KEY_SIZE, "owner")
    .bytes(f.possessor, PUBLIC_KEY_SIZE, "possessor")
    .finish();

const holderFlags = (
  holder: PublicKey | undefined,
  contract: number,
  anyHolder: number,
  anyContract: number,
): number => (holder === undefined ? anyHolder : 0) | (contract === 0 ? anyContract : 0);

const requireName = (assetName: string): void => {
  if (assetName === "") {
    throw new PreconditionError("assetName is required for ownership and possession filters");
  }
};

export const encodeIssuanceFilterRequest = (filter: IssuanceFilter): Buffer =>
  encodeFilter({
    requestType: AssetRequestType.ISSUANCE_RECORDS,
    flags:
      (filter.issuer === undefined ? FLAG_ANY_ISSUER : 0) |
      (filter.assetName === undefined || filter.assetName === "" ? FLAG_ANY_ASSET_NAME : 0),
    ownershipContract: 0,
    possessionContract: 0,
    issuer: filter.issuer ?? ZERO_KEY,
    assetName: filter.assetName ?? "",
    owner: ZERO_KEY,
    possessor: ZERO_KEY,
  });

export const encodeOwnershipFilterRequest = (filter: OwnershipFilter): Buffer => {
  requireName(filter.assetName);
  const ownershipContract = filter.ownershipContract ?? 0;
  return encodeFilter({
    requestType: AssetRequestType.OWNERSHIP_RECORDS,
    flags:
      holderFlags(filter.owner, ownershipContract, FLAG_ANY_OWNER, FLAG_ANY_OWNER_CONTRACT) |
      FLAG_ANY_POSSESSOR |
      FLAG_ANY_POSSESSOR_CONTRACT,
    ownershipContract,
    possessionContract: 0,
    issuer: filter.issuer ?? ZERO_KEY,
    assetName: filter.assetName,
    owner: filter.owner ?? ZERO_KEY,
    possessor: ZERO_KEY,
  });
};

export const encodePossessionFilterRequest = (filter: PossessionFilter): Buffer => {
  requireName(filter.assetName);
  const ownershipContract = filter.ownershipContract ?? 0;
  const possessionContract = filter.possessionContract ?? 0;
  return encodeFilter({
    requestType: AssetRequestType.POSSESSION_RECORDS,
    flags:
      holderFlags(filter.owner, ownershipContract, FLAG_ANY_OWNER, FLAG_ANY_OWNER_CONTRACT) |
      holderFlags(filter.possessor, possessionContract, FLAG_ANY_POSSESSOR, FLAG_ANY_POSSESSOR_CONTRACT),
    ownershipContract,
    possessionContract,
    issuer: filter.issuer ?? ZERO_KEY,
    assetName: filter.assetName,
    owner: filter.owner ?? ZERO_KEY,
    possessor: filter.possessor ?? ZERO_KEY,
  });
};

export const encodeUniverseIndexRequest = (universeIndex: number): Buffer =>
  new ByteWriter(ASSETS_REQUEST_SIZE, "assetsRequest")
    .u16(AssetRequestType.BY_UNIVERSE_INDEX, "requestType")
    .u16(0, "flags")
    .u32(universeIndex, "universeIndex")
    .zeros(ASSETS_REQUEST_SIZE - 8)
    .finish();

export { ProtocolEngine, withEngine } from "./core/engine";
export type { EngineStats, RequestOptions, UnsolicitedReason } from "./core/engine";
export { route } from "./core/catalog";
export type { Completion, Request, Route } from "./core/catalog";
export { MessageType, AssetRequestType, HEADER_SIZE, MAX_MESSAGE_SIZE, MAX_INPUT_SIZE } from "./core/constants";
export { buildTransaction, unsignedCopy } from "./core/transaction";
export type { TransactionDraft } from "./core/transaction";
export type * from "./core/types";

export { Connection, ConnectionState } from "./net/connection";
export type { CloseStats, ConnectOptions, ConnectionStats } from "./net/connection";

export { decodeMessage, encodeMessage } from "./codec/header";
export { AssetRecordType, toAsset } from "./codec/assets";
export { balanceOf } from "./codec/entity";
export { QUORUM } from "./codec/quorum";
export { moneyFlewAt } from "./codec/status";
export { nonEmptyDigests } from "./codec/tick";
export type {
  AssetSelector,
  IssuanceFilter,
  OwnershipFilter,
  PossessionFilter,
  UniverseIndexSelector,
} from "./codec/requests";

export {
  identityFromPublicKey,
  isValidIdentity,
  publicKeyFromIdentity,
  toPublicKey,
} from "./crypto/identity";
export { Ed25519KeyPair, randomSeed, verifyEd25519 } from "./crypto/keypair";
export type { KeyPair, Verifier } from "./crypto/keypair";
export { signTransaction, transactionDigest, transactionId, verifyTransaction } from "./crypto/signer";

export { DEFAULT_CONFIG, resolveConfig } from "./config";
export type { ClientConfig } from "./config";
export { makeLogger } from "./logging";
export type { ILogger } from "./logging";
export * from "./errors";
export { asPublicKey, asSignature } from "./types/brands";
export type { Digest, PublicKey, Signature } from "./types/brands";

/**
 * Request catalogue
 *
 * Maps every request the client can make to its wire type, its encoded
 * body and the rule that decides when the response is complete.
 */

import { MessageType } from "./constants";
import type { SignedTransaction } from "./types";
import { encodeTransaction } from "../codec/transaction";
import {
  encodeContractFunctionRequest,
  encodeIssuanceFilterRequest,
  encodeOwnershipFilterRequest,
  encodePossessionFilterRequest,
  encodePublicKeyRequest,
  encodeQuorumTickRequest,
  encodeTickRequest,
  encodeTickTransactionsRequest,
  encodeUniverseIndexRequest,
  isUniverseIndexSelector,
  type AssetSelector,
  type IssuanceFilter,
  type OwnershipFilter,
  type PossessionFilter,
} from "../codec/requests";
import type { PublicKey } from "../types/brands";

export type Request =
  | { kind: "tickInfo" }
  | { kind: "systemInfo" }
  | { kind: "entity"; publicKey: PublicKey }
  | { kind: "issuedAssets"; publicKey: PublicKey }
  | { kind: "ownedAssets"; publicKey: PublicKey }
  | { kind: "possessedAssets"; publicKey: PublicKey }
  | { kind: "assetIssuances"; selector: AssetSelector<IssuanceFilter> }
  | { kind: "assetOwnerships"; selector: AssetSelector<OwnershipFilter> }
  | { kind: "assetPossessions"; selector: AssetSelector<PossessionFilter> }
  | { kind: "tickData"; tick: number }
  | { kind: "tickTransactions"; tick: number }
  | { kind: "quorumVotes"; tick: number }
  | { kind: "transactionStatus"; tick: number }
  | { kind: "computors" }
  | { kind: "contractFunction"; contractIndex: number; inputType: number; input: Uint8Array }
  | { kind: "broadcastTransaction"; transaction: SignedTransaction };

/**
 * - none:   fire-and-forget, complete once written (token 0)
 * - single: first message of `responseType`, or END_RESPONSE
 * - stream: every `responseType` message until END_RESPONSE
 */
export type Completion =
  | { kind: "none" }
  | { kind: "single"; responseType: MessageType }
  | { kind: "stream"; responseType: MessageType };

export type Route = {
  type: MessageType;
  body: Buffer;
  completion: Completion;
};

const single = (responseType: MessageType): Completion => ({ kind: "single", responseType });
const stream = (responseType: MessageType): Completion => ({ kind: "stream", responseType });

const assertNever = (x: never): never => {
  throw new Error(`unhandled request: ${JSON.stringify(x)}`);
};

/** Encoding errors surface here, before any I/O. */
export const route = (req: Request): Route => {
  switch (req.kind) {
    case "tickInfo":
      return {
        type: MessageType.REQUEST_CURRENT_TICK_INFO,
        body: Buffer.alloc(0),
        completion: single(MessageType.RESPOND_CURRENT_TICK_INFO),
      };
    case "systemInfo":
      return {
        type: MessageType.REQUEST_SYSTEM_INFO,
        body: Buffer.alloc(0),
        completion: single(MessageType.RESPOND_SYSTEM_INFO),
      };
    case "entity":
      return {
        type: MessageType.REQUEST_ENTITY,
        body: encodePublicKeyRequest(req.publicKey),
        completion: single(MessageType.RESPOND_ENTITY),
      };
    case "issuedAssets":
      return {
        type: MessageType.REQUEST_ISSUED_ASSETS,
        body: encodePublicKeyRequest(req.publicKey),
        completion: stream(MessageType.RESPOND_ISSUED_ASSETS),
      };
    case "ownedAssets":
      return {
        type: MessageType.REQUEST_OWNED_ASSETS,
        body: encodePublicKeyRequest(req.publicKey),
        completion: stream(MessageType.RESPOND_OWNED_ASSETS),
      };
    case "possessedAssets":
      return {
        type: MessageType.REQUEST_POSSESSED_ASSETS,
        body: encodePublicKeyRequest(req.publicKey),
        completion: stream(MessageType.RESPOND_POSSESSED_ASSETS),
      };
    case "assetIssuances":
      return {
        type: MessageType.REQUEST_ASSETS,
        body: isUniverseIndexSelector(req.selector)
          ? encodeUniverseIndexRequest(req.selector.universeIndex)
          : encodeIssuanceFilterRequest(req.selector),
        completion: stream(MessageType.RESPOND_ASSETS),
      };
    case "assetOwnerships":
      return {
        type: MessageType.REQUEST_ASSETS,
        body: isUniverseIndexSelector(req.selector)
          ? encodeUniverseIndexRequest(req.selector.universeIndex)
          : encodeOwnershipFilterRequest(req.selector),
        completion: stream(MessageType.RESPOND_ASSETS),
      };
    case "assetPossessions":
      return {
        type: MessageType.REQUEST_ASSETS,
        body: isUniverseIndexSelector(req.selector)
          ? encodeUniverseIndexRequest(req.selector.universeIndex)
          : encodePossessionFilterRequest(req.selector),
        completion: stream(MessageType.RESPOND_ASSETS),
      };
    case "tickData":
      return {
        type: MessageType.REQUEST_TICK_DATA,
        body: encodeTickRequest(req.tick),
        completion: single(MessageType.BROADCAST_FUTURE_TICK_DATA),
      };
    case "tickTransactions":
      return {
        type: MessageType.REQUEST_TICK_TRANSACTIONS,
        body: encodeTickTransactionsRequest(req.tick),
        completion: stream(MessageType.BROADCAST_TRANSACTION),
      };
    case "quorumVotes":
      return {
        type: MessageType.REQUEST_QUORUM_TICK,
        body: encodeQuorumTickRequest(req.tick),
        completion: stream(MessageType.BROADCAST_TICK),
      };
    case "transactionStatus":
      return {
        type: MessageType.REQUEST_TX_STATUS,
        body: encodeTickRequest(req.tick),
        completion: single(MessageType.RESPOND_TX_STATUS),
      };
    case "computors":
      return {
        type: MessageType.REQUEST_COMPUTORS,
        body: Buffer.alloc(0),
        completion: single(MessageType.BROADCAST_COMPUTORS),
      };
    case "contractFunction":
      return {
        type: MessageType.REQUEST_CONTRACT_FUNCTION,
        body: encodeContractFunctionRequest(req.contractIndex, req.inputType, req.input),
        completion: single(MessageType.RESPOND_CONTRACT_FUNCTION),
      };
    case "broadcastTransaction":
      return {
        type: MessageType.BROADCAST_TRANSACTION,
        body: encodeTransaction(req.transaction),
        completion: { kind: "none" },
      };
    default:
      return assertNever(req);
  }
};

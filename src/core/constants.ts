/**
 * Protocol Constants
 *
 * Message types, structure sizes and request flags of the node protocol.
 */

// Header: size(3) + type(1) + dejavu(4)
export const HEADER_SIZE = 8;
export const MAX_MESSAGE_SIZE = 0xffffff;

export enum MessageType {
  EXCHANGE_PUBLIC_PEERS = 0,
  BROADCAST_COMPUTORS = 2,
  BROADCAST_TICK = 3,
  BROADCAST_FUTURE_TICK_DATA = 8,
  REQUEST_COMPUTORS = 11,
  REQUEST_QUORUM_TICK = 14,
  REQUEST_TICK_DATA = 16,
  BROADCAST_TRANSACTION = 24,
  REQUEST_CURRENT_TICK_INFO = 27,
  RESPOND_CURRENT_TICK_INFO = 28,
  REQUEST_TICK_TRANSACTIONS = 29,
  REQUEST_ENTITY = 31,
  RESPOND_ENTITY = 32,
  END_RESPONSE = 35,
  REQUEST_ISSUED_ASSETS = 36,
  RESPOND_ISSUED_ASSETS = 37,
  REQUEST_OWNED_ASSETS = 38,
  RESPOND_OWNED_ASSETS = 39,
  REQUEST_POSSESSED_ASSETS = 40,
  RESPOND_POSSESSED_ASSETS = 41,
  REQUEST_CONTRACT_FUNCTION = 42,
  RESPOND_CONTRACT_FUNCTION = 43,
  REQUEST_SYSTEM_INFO = 46,
  RESPOND_SYSTEM_INFO = 47,
  REQUEST_ASSETS = 52,
  RESPOND_ASSETS = 53,
  REQUEST_TX_STATUS = 201,
  RESPOND_TX_STATUS = 202,
}

export const NUMBER_OF_TRANSACTIONS_PER_TICK = 1024;
export const NUMBER_OF_COMPUTORS = 676;
export const ASSETS_DEPTH = 24;
export const SPECTRUM_DEPTH = 24;
export const MAX_INPUT_SIZE = 1024;

export const ASSET_NAME_SIZE = 7;
export const ASSET_FILTER_NAME_SIZE = 8;
export const UNIT_OF_MEASUREMENT_SIZE = 7;

// REQUEST_ASSETS request types
export enum AssetRequestType {
  ISSUANCE_RECORDS = 0,
  OWNERSHIP_RECORDS = 1,
  POSSESSION_RECORDS = 2,
  BY_UNIVERSE_INDEX = 3,
}

// REQUEST_ASSETS filter flags (bitmask)
export const FLAG_ANY_ISSUER = 0b0000010;
export const FLAG_ANY_ASSET_NAME = 0b0000100;
export const FLAG_ANY_OWNER = 0b0001000;
export const FLAG_ANY_OWNER_CONTRACT = 0b0010000;
export const FLAG_ANY_POSSESSOR = 0b0100000;
export const FLAG_ANY_POSSESSOR_CONTRACT = 0b1000000;

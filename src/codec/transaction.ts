/**
 * Transaction wire form
 *
 *   source(32) | destination(32) | amount i64 | tick u32 |
 *   inputType u16 | inputSize u16 | payload(inputSize) | signature(64)
 *
 * The unsigned encoding (everything before the signature) is what gets
 * digested and signed.
 */

import { ByteReader, ByteWriter } from "./cursor";
import { FieldOverflow, MalformedMessage } from "../errors";
import { MAX_INPUT_SIZE } from "../core/constants";
import type { SignedTransaction, TransactionFields } from "../core/types";
import { PUBLIC_KEY_SIZE, SIGNATURE_SIZE } from "../types/brands";

export const TRANSACTION_HEADER_SIZE = 2 * PUBLIC_KEY_SIZE + 8 + 4 + 2 + 2;

const writeFields = (w: ByteWriter, tx: TransactionFields): ByteWriter => {
  if (tx.inputSize !== tx.payload.length) {
    throw new FieldOverflow(
      "transaction.inputSize",
      `${tx.inputSize} disagrees with payload of ${tx.payload.length} bytes`,
    );
  }
  if (tx.payload.length > MAX_INPUT_SIZE) {
    throw new FieldOverflow(
      "transaction.payload",
      `${tx.payload.length} bytes exceeds ${MAX_INPUT_SIZE}`,
    );
  }
  return w
    .bytes(tx.sourcePublicKey, PUBLIC_KEY_SIZE, "sourcePublicKey")
    .bytes(tx.destinationPublicKey, PUBLIC_KEY_SIZE, "destinationPublicKey")
    .i64(tx.amount, "amount")
    .u32(tx.tick, "tick")
    .u16(tx.inputType, "inputType")
    .u16(tx.inputSize, "inputSize")
    .raw(tx.payload);
};

export const encodeUnsignedTransaction = (tx: TransactionFields): Buffer =>
  writeFields(new ByteWriter(TRANSACTION_HEADER_SIZE + tx.payload.length, "transaction"), tx).finish();

export const encodeTransaction = (tx: SignedTransaction): Buffer =>
  writeFields(
    new ByteWriter(TRANSACTION_HEADER_SIZE + tx.payload.length + SIGNATURE_SIZE, "transaction"),
    tx,
  )
    .bytes(tx.signature, SIGNATURE_SIZE, "signature")
    .finish();

export const decodeTransaction = (bytes: Uint8Array): SignedTransaction => {
  const r = new ByteReader(bytes, "transaction");
  const sourcePublicKey = r.publicKey();
  const destinationPublicKey = r.publicKey();
  const amount = r.i64();
  const tick = r.u32();
  const inputType = r.u16();
  const inputSize = r.u16();
  if (r.remaining !== inputSize + SIGNATURE_SIZE) {
    throw new MalformedMessage(
      `transaction: inputSize ${inputSize} disagrees with ${r.remaining} remaining bytes`,
    );
  }
  const payload = r.bytes(inputSize);
  const signature = r.signature();
  r.finish();
  return Object.freeze({
    state: "signed",
    sourcePublicKey,
    destinationPublicKey,
    amount,
    tick,
    inputType,
    inputSize,
    payload,
    signature,
  });
};

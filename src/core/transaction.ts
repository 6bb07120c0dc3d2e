/**
 * Transaction lifecycle
 *
 *   draft ──buildTransaction──▶ unsigned ──signTransaction──▶ signed
 *
 * Both states are frozen values. Signing (see crypto/signer) never mutates
 * its input; signing again requires an explicit `unsignedCopy`.
 */

import {
  bigint,
  check,
  instance,
  integer,
  number,
  object,
  optional,
  pipe,
  safeInteger,
  safeParse,
  string,
  union,
  getDotPath,
  type InferOutput,
} from "valibot";
import { encodeUnsignedTransaction } from "../codec/transaction";
import { toPublicKey } from "../crypto/identity";
import { PreconditionError } from "../errors";
import { asPublicKey, PUBLIC_KEY_SIZE, type PublicKey } from "../types/brands";
import type { Transaction, TransactionFields, UnsignedTransaction } from "./types";

/* ── draft ───────────────────────────────────────────────── */

const subject = union([
  string(),
  pipe(
    instance(Uint8Array),
    check((b) => b.length === PUBLIC_KEY_SIZE, `public key must be ${PUBLIC_KEY_SIZE} bytes`),
  ),
]);

const draftSchema = object({
  source: subject,
  destination: subject,
  amount: union([bigint(), pipe(number(), safeInteger())]),
  tick: pipe(number(), integer()),
  inputType: optional(pipe(number(), integer())),
  payload: optional(instance(Uint8Array)),
});

export type TransactionDraft = InferOutput<typeof draftSchema>;

const ownKey = (subject: string | Uint8Array): PublicKey => asPublicKey(toPublicKey(subject).slice());

const parseDraft = (draft: unknown): TransactionDraft => {
  const result = safeParse(draftSchema, draft);
  if (!result.success) {
    const details = result.issues
      .map((issue) => `${getDotPath(issue) ?? "draft"}: ${issue.message}`)
      .join("; ");
    throw new PreconditionError(`invalid transaction draft: ${details}`);
  }
  return result.output;
};

/**
 * Validates and freezes a draft. Out-of-range fields throw `FieldOverflow`
 * here rather than at broadcast time.
 */
export const buildTransaction = (draft: TransactionDraft): UnsignedTransaction => {
  const d = parseDraft(draft);
  const amount = typeof d.amount === "bigint" ? d.amount : BigInt(d.amount);
  if (amount < 0n) {
    throw new PreconditionError(`invalid transaction draft: amount must not be negative`);
  }
  const payload = (d.payload ?? new Uint8Array(0)).slice();
  const tx: UnsignedTransaction = Object.freeze({
    state: "unsigned",
    sourcePublicKey: ownKey(d.source),
    destinationPublicKey: ownKey(d.destination),
    amount,
    tick: d.tick,
    inputType: d.inputType ?? 0,
    inputSize: payload.length,
    payload,
  });
  encodeUnsignedTransaction(tx);
  return tx;
};

/** Field copy that shares no byte arrays with `tx`. */
export const fieldsOf = (tx: TransactionFields): TransactionFields => ({
  sourcePublicKey: ownKey(tx.sourcePublicKey),
  destinationPublicKey: ownKey(tx.destinationPublicKey),
  amount: tx.amount,
  tick: tx.tick,
  inputType: tx.inputType,
  inputSize: tx.inputSize,
  payload: tx.payload.slice(),
});

export const unsignedCopy = (tx: Transaction): UnsignedTransaction =>
  Object.freeze({ ...fieldsOf(tx), state: "unsigned" });

/**
 * Protocol Engine
 *
 * One request in flight per connection. Each request gets a fresh token;
 * anything that arrives with another token, or with a type the request does
 * not expect, is diverted to the `unsolicited` side channel. Frames that
 * arrive while no request holds the slot are diverted as soon as they land.
 */

import { EventEmitter } from "node:events";
import { route, type Completion, type Request } from "./catalog";
import { MessageType } from "./constants";
import { TokenIssuer } from "./tokens";
import { transactionId } from "../crypto/signer";
import type {
  Asset,
  AssetEntry,
  Computors,
  EntityRecord,
  IssuanceRecord,
  IssuedAsset,
  OwnedAsset,
  OwnershipRecord,
  PossessedAsset,
  PossessionRecord,
  QuorumTickVote,
  SignedTransaction,
  SystemInfo,
  TickData,
  TickInfo,
  Transaction,
  TransactionStatus,
  WireMessage,
} from "./types";
import {
  decodeAssetEntry,
  decodeIssuedAsset,
  decodeOwnedAsset,
  decodePossessedAsset,
  issuanceCodec,
  ownershipCodec,
  possessionCodec,
  toAsset,
} from "../codec/assets";
import { decodeComputors } from "../codec/computors";
import { decodeEntity } from "../codec/entity";
import { decodeMessage, encodeMessage } from "../codec/header";
import { decodeQuorumTickVote } from "../codec/quorum";
import type {
  AssetSelector,
  IssuanceFilter,
  OwnershipFilter,
  PossessionFilter,
} from "../codec/requests";
import { decodeTransactionStatus } from "../codec/status";
import { decodeSystemInfo } from "../codec/system";
import { decodeTickData, decodeTickInfo } from "../codec/tick";
import { decodeTransaction } from "../codec/transaction";
import { resolveConfig, type ClientConfig } from "../config";
import { toPublicKey } from "../crypto/identity";
import {
  ConnectionClosed,
  MalformedMessage,
  PreconditionError,
  TimeoutError,
} from "../errors";
import { makeLogger, type ILogger } from "../logging";
import { Connection, type ConnectionStats } from "../net/connection";
import { bytesToHex } from "../utils/bytes";
import { Mutex } from "../utils/mutex";

export type RequestOptions = { timeoutMs?: number };

export type UnsolicitedReason = "token-mismatch" | "unexpected-type";

export type EngineStats = {
  requests: number;
  unsolicited: number;
  waiting: number;
  connection: ConnectionStats;
};

type EngineEvents = {
  unsolicited: [message: WireMessage, reason: UnsolicitedReason];
};

type Subject = string | Uint8Array;

/** One deadline shared by every exchange of an operation. */
type Budget = { deadline: number; timeoutMs: number };

export class ProtocolEngine extends EventEmitter<EngineEvents> {
  private readonly lock = new Mutex();
  private readonly tokens: TokenIssuer;
  private closed = false;
  private requests = 0;
  private unsolicited = 0;

  constructor(
    private readonly connection: Connection,
    private readonly readTimeoutMs: number,
    private readonly log: ILogger,
    tokens: TokenIssuer = new TokenIssuer(),
  ) {
    super();
    this.tokens = tokens;
    connection.on("queued", () => this.drainIfIdle());
    connection.on("close", ({ reason }) => {
      this.lock.cancelAll(new ConnectionClosed(`connection closed: ${reason}`));
      this.drainIfIdle();
    });
  }

  static async connect(
    config: Partial<ClientConfig> = {},
    logger?: ILogger,
  ): Promise<ProtocolEngine> {
    const cfg = resolveConfig(config);
    const log = logger ?? makeLogger(cfg.logLevel, cfg.prettyLogs);
    const connection = await Connection.open({
      host: cfg.host,
      port: cfg.port,
      connectTimeoutMs: cfg.connectTimeoutMs,
      logger: log,
    });
    return new ProtocolEngine(connection, cfg.readTimeoutMs, log);
  }

  /* ── request / response ────────────────────────────────── */

  /**
   * Sends `req` and returns the response bodies: none for broadcasts, at
   * most one for single responses (none on END_RESPONSE), all for streams.
   * `timeoutMs` bounds the wait for the slot, the write and the response.
   */
  request(req: Request, opts: RequestOptions = {}): Promise<Buffer[]> {
    return this.exchange(req, this.budget(opts));
  }

  private budget(opts: RequestOptions = {}): Budget {
    const timeoutMs = opts.timeoutMs ?? this.readTimeoutMs;
    return { deadline: Date.now() + timeoutMs, timeoutMs };
  }

  private left({ deadline, timeoutMs }: Budget): number {
    const ms = deadline - Date.now();
    if (ms <= 0) {
      throw new TimeoutError(`request timed out after ${timeoutMs}ms`, timeoutMs);
    }
    return ms;
  }

  private async exchange(req: Request, budget: Budget): Promise<Buffer[]> {
    const { type, body, completion } = route(req);

    if (this.closed) {
      throw new ConnectionClosed("engine is closed");
    }

    const release = await this.lock.acquire(this.left(budget));
    const token = completion.kind === "none" ? 0 : this.tokens.issue();
    this.requests += 1;
    this.log.debug({ kind: req.kind, type, token }, "request");
    try {
      await this.connection.send(encodeMessage(type, token, body), this.left(budget));
      if (completion.kind === "none") return [];
      return await this.collect(token, completion, budget);
    } finally {
      if (token !== 0) this.tokens.retire(token);
      release();
      this.drainIfIdle();
    }
  }

  private async collect(
    token: number,
    completion: Exclude<Completion, { kind: "none" }>,
    budget: Budget,
  ): Promise<Buffer[]> {
    const bodies: Buffer[] = [];
    for (;;) {
      const message = decodeMessage(await this.connection.receiveOne(this.left(budget)));
      const { type, dejavu } = message.header;
      if (dejavu !== token) {
        this.divert(message, "token-mismatch");
        continue;
      }
      if (type === MessageType.END_RESPONSE) return bodies;
      if (type !== completion.responseType) {
        this.divert(message, "unexpected-type");
        continue;
      }
      bodies.push(message.body);
      if (completion.kind === "single") return bodies;
    }
  }

  /** Nobody holds the slot, so nothing queued can belong to a request. */
  private drainIfIdle(): void {
    if (this.lock.isLocked) return;
    for (let frame = this.connection.takeQueued(); frame !== undefined; frame = this.connection.takeQueued()) {
      this.divert(decodeMessage(frame), "token-mismatch");
    }
  }

  private divert(message: WireMessage, reason: UnsolicitedReason): void {
    this.unsolicited += 1;
    const { type, dejavu, size } = message.header;
    this.log.debug(
      { type, dejavu, size, reason, head: bytesToHex(message.body.subarray(0, 16)) },
      "unsolicited message",
    );
    this.emit("unsolicited", message, reason);
  }

  private async optional<T>(
    req: Request,
    decode: (body: Buffer) => T,
    budget: Budget,
  ): Promise<T | undefined> {
    const [body] = await this.exchange(req, budget);
    return body === undefined ? undefined : decode(body);
  }

  private async required<T>(
    req: Request,
    decode: (body: Buffer) => T,
    budget: Budget,
  ): Promise<T> {
    const value = await this.optional(req, decode, budget);
    if (value === undefined) {
      throw new MalformedMessage(`node ended the ${req.kind} response without data`);
    }
    return value;
  }

  private async many<T>(
    req: Request,
    decode: (body: Buffer) => T,
    budget: Budget,
  ): Promise<T[]> {
    return (await this.exchange(req, budget)).map(decode);
  }

  private async assertPastTick(tick: number, budget: Budget): Promise<void> {
    const info = await this.required({ kind: "tickInfo" }, decodeTickInfo, budget);
    if (tick > info.tick) {
      throw new PreconditionError(`tick ${tick} is in the future (node is at ${info.tick})`);
    }
  }

  /* ── network state ─────────────────────────────────────── */

  getTickInfo(opts?: RequestOptions): Promise<TickInfo> {
    return this.required({ kind: "tickInfo" }, decodeTickInfo, this.budget(opts));
  }

  getSystemInfo(opts?: RequestOptions): Promise<SystemInfo> {
    return this.required({ kind: "systemInfo" }, decodeSystemInfo, this.budget(opts));
  }

  getComputors(opts?: RequestOptions): Promise<Computors> {
    return this.required({ kind: "computors" }, decodeComputors, this.budget(opts));
  }

  getEntity(subject: Subject, opts?: RequestOptions): Promise<EntityRecord | undefined> {
    return this.optional({ kind: "entity", publicKey: toPublicKey(subject) }, decodeEntity, this.budget(opts));
  }

  /* ── assets ────────────────────────────────────────────── */

  getIssuedAssets(subject: Subject, opts?: RequestOptions): Promise<IssuedAsset[]> {
    return this.many({ kind: "issuedAssets", publicKey: toPublicKey(subject) }, decodeIssuedAsset, this.budget(opts));
  }

  getOwnedAssets(subject: Subject, opts?: RequestOptions): Promise<OwnedAsset[]> {
    return this.many({ kind: "ownedAssets", publicKey: toPublicKey(subject) }, decodeOwnedAsset, this.budget(opts));
  }

  getPossessedAssets(subject: Subject, opts?: RequestOptions): Promise<PossessedAsset[]> {
    return this.many(
      { kind: "possessedAssets", publicKey: toPublicKey(subject) },
      decodePossessedAsset,
      this.budget(opts),
    );
  }

  /** Owned assets of `subject`, flattened. */
  async getAssets(subject: Subject, opts?: RequestOptions): Promise<Asset[]> {
    return (await this.getOwnedAssets(subject, opts)).map(toAsset);
  }

  getAssetIssuances(
    selector: AssetSelector<IssuanceFilter>,
    opts?: RequestOptions,
  ): Promise<AssetEntry<IssuanceRecord>[]> {
    return this.many(
      { kind: "assetIssuances", selector },
      (body) => decodeAssetEntry(issuanceCodec, body),
      this.budget(opts),
    );
  }

  getAssetOwnerships(
    selector: AssetSelector<OwnershipFilter>,
    opts?: RequestOptions,
  ): Promise<AssetEntry<OwnershipRecord>[]> {
    return this.many(
      { kind: "assetOwnerships", selector },
      (body) => decodeAssetEntry(ownershipCodec, body),
      this.budget(opts),
    );
  }

  getAssetPossessions(
    selector: AssetSelector<PossessionFilter>,
    opts?: RequestOptions,
  ): Promise<AssetEntry<PossessionRecord>[]> {
    return this.many(
      { kind: "assetPossessions", selector },
      (body) => decodeAssetEntry(possessionCodec, body),
      this.budget(opts),
    );
  }

  /* ── ticks ─────────────────────────────────────────────── */

  async getTickData(tick: number, opts?: RequestOptions): Promise<TickData | undefined> {
    const budget = this.budget(opts);
    await this.assertPastTick(tick, budget);
    return this.optional({ kind: "tickData", tick }, decodeTickData, budget);
  }

  getTickTransactions(tick: number, opts?: RequestOptions): Promise<SignedTransaction[]> {
    return this.many({ kind: "tickTransactions", tick }, decodeTransaction, this.budget(opts));
  }

  async getQuorumVotes(tick: number, opts?: RequestOptions): Promise<QuorumTickVote[]> {
    const budget = this.budget(opts);
    await this.assertPastTick(tick, budget);
    return this.many({ kind: "quorumVotes", tick }, decodeQuorumTickVote, budget);
  }

  getTransactionStatus(
    tick: number,
    opts?: RequestOptions,
  ): Promise<TransactionStatus | undefined> {
    return this.optional({ kind: "transactionStatus", tick }, decodeTransactionStatus, this.budget(opts));
  }

  /* ── contracts & transactions ──────────────────────────── */

  querySmartContract(
    contractIndex: number,
    inputType: number,
    input: Uint8Array = new Uint8Array(0),
    opts?: RequestOptions,
  ): Promise<Uint8Array | undefined> {
    return this.optional(
      { kind: "contractFunction", contractIndex, inputType, input },
      (body) => new Uint8Array(body),
      this.budget(opts),
    );
  }

  /** Fire-and-forget; resolves with the transaction id once written. */
  async broadcastTransaction(tx: Transaction, opts?: RequestOptions): Promise<string> {
    if (tx.state !== "signed") {
      throw new PreconditionError("only a signed transaction can be broadcast");
    }
    await this.exchange({ kind: "broadcastTransaction", transaction: tx }, this.budget(opts));
    const id = transactionId(tx);
    this.log.info({ id, tick: tx.tick }, "transaction broadcast");
    return id;
  }

  /* ── lifecycle ─────────────────────────────────────────── */

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.lock.cancelAll(new ConnectionClosed("engine closed"));
    this.connection.close("engine closed");
  }

  getStats(): EngineStats {
    return {
      requests: this.requests,
      unsolicited: this.unsolicited,
      waiting: this.lock.pending,
      connection: this.connection.getStats(),
    };
  }
}

/** Connects, runs `fn`, and always closes. */
export const withEngine = async <T>(
  config: Partial<ClientConfig>,
  fn: (engine: ProtocolEngine) => Promise<T>,
  logger?: ILogger,
): Promise<T> => {
  const engine = await ProtocolEngine.connect(config, logger);
  try {
    return await fn(engine);
  } finally {
    engine.close();
  }
};

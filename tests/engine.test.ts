import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { encodeAssetEntry, encodeOwnedAsset, ownershipCodec, issuanceCodec } from "../src/codec/assets";
import { encodeComputors } from "../src/codec/computors";
import { encodeMessage } from "../src/codec/header";
import { encodeEntity } from "../src/codec/entity";
import { encodeQuorumTickVote } from "../src/codec/quorum";
import { encodeTransactionStatus } from "../src/codec/status";
import { encodeSystemInfo } from "../src/codec/system";
import { encodeTickData, encodeTickInfo } from "../src/codec/tick";
import { decodeTransaction, encodeTransaction } from "../src/codec/transaction";
import { MessageType } from "../src/core/constants";
import { ProtocolEngine, withEngine, type UnsolicitedReason } from "../src/core/engine";
import { buildTransaction } from "../src/core/transaction";
import type { TransactionStatus, WireMessage } from "../src/core/types";
import { verifyEd25519 } from "../src/crypto/keypair";
import { signTransaction, transactionId, verifyTransaction } from "../src/crypto/signer";
import {
  ConnectionClosed,
  MalformedMessage,
  PreconditionError,
  TimeoutError,
} from "../src/errors";
import { makeLogger } from "../src/logging";
import { ConnectionState } from "../src/net/connection";
import { asPublicKey } from "../src/types/brands";
import {
  filled,
  mkComputors,
  mkEntity,
  mkIssuance,
  mkOwnedAsset,
  mkOwnership,
  mkQuorumVote,
  mkSystemInfo,
  mkTickData,
  mkTickInfo,
} from "./helpers/fixtures";
import { alice, aliceId, bobId } from "./helpers/keys";
import { StubNode, type Reply } from "./helpers/stubNode";

type Responder = (token: number, reply: Reply, msg: WireMessage) => void;

const silent = makeLogger("silent");

const serve = (stub: StubNode, responders: Array<[MessageType, Responder]>): void => {
  const table = new Map<number, Responder>(responders);
  stub.onRequest((msg, reply) => table.get(msg.header.type)?.(msg.header.dejavu, reply, msg));
};

const tickInfoAt = (tick: number): [MessageType, Responder] => [
  MessageType.REQUEST_CURRENT_TICK_INFO,
  (token, reply) =>
    reply.send(MessageType.RESPOND_CURRENT_TICK_INFO, token, encodeTickInfo(mkTickInfo({ tick }))),
];

const signedTransfer = () =>
  signTransaction(buildTransaction({ source: aliceId, destination: bobId, amount: 1000n, tick: 999 }), alice);

describe("ProtocolEngine", () => {
  let stub: StubNode;
  let engine: ProtocolEngine;

  beforeEach(async () => {
    stub = await StubNode.start();
    engine = await ProtocolEngine.connect(
      { host: "127.0.0.1", port: stub.port, readTimeoutMs: 2000 },
      silent,
    );
  });

  afterEach(async () => {
    engine.close();
    await stub.close();
  });

  /* ── single responses ──────────────────────────────────── */

  it("reads the current tick", async () => {
    serve(stub, [tickInfoAt(12345678)]);
    const info = await engine.getTickInfo();
    expect(info.tick).toBe(12345678);
    expect(info.epoch).toBe(150);

    const [req] = stub.received;
    expect(req?.header.size).toBe(8);
    expect(req?.header.dejavu).not.toBe(0);
  });

  it("reads system info and computors", async () => {
    serve(stub, [
      [MessageType.REQUEST_SYSTEM_INFO, (t, r) => r.send(MessageType.RESPOND_SYSTEM_INFO, t, encodeSystemInfo(mkSystemInfo()))],
      [MessageType.REQUEST_COMPUTORS, (t, r) => r.send(MessageType.BROADCAST_COMPUTORS, t, encodeComputors(mkComputors()))],
    ]);
    expect(await engine.getSystemInfo()).toEqual(mkSystemInfo());
    expect(await engine.getComputors()).toEqual(mkComputors());
  });

  it("fails a required response that ends without data", async () => {
    serve(stub, [[MessageType.REQUEST_CURRENT_TICK_INFO, (t, r) => r.end(t)]]);
    await expect(engine.getTickInfo()).rejects.toThrow(
      "node ended the tickInfo response without data",
    );
  });

  it("returns undefined for an entity the node does not know", async () => {
    const entity = mkEntity({ publicKey: asPublicKey(alice.publicIdentity()) });
    let known = true;
    serve(stub, [
      [
        MessageType.REQUEST_ENTITY,
        (t, r) => (known ? r.send(MessageType.RESPOND_ENTITY, t, encodeEntity(entity)) : r.end(t)),
      ],
    ]);
    expect(await engine.getEntity(aliceId)).toEqual(entity);
    expect(new Uint8Array(stub.received[0]?.body ?? [])).toEqual(alice.publicIdentity());

    known = false;
    expect(await engine.getEntity(alice.publicIdentity())).toBeUndefined();
  });

  it("queries a contract function", async () => {
    let answer = true;
    serve(stub, [
      [
        MessageType.REQUEST_CONTRACT_FUNCTION,
        (t, r) => (answer ? r.send(MessageType.RESPOND_CONTRACT_FUNCTION, t, Uint8Array.from([9, 9])) : r.end(t)),
      ],
    ]);
    expect(await engine.querySmartContract(1, 2, Uint8Array.from([1, 2, 3]))).toEqual(Uint8Array.from([9, 9]));

    const body = stub.received[0]?.body ?? Buffer.alloc(0);
    expect(body.readUInt32LE(0)).toBe(1);
    expect(body.readUInt16LE(4)).toBe(2);
    expect(body.readUInt16LE(6)).toBe(3);
    expect([...body.subarray(8)]).toEqual([1, 2, 3]);

    answer = false;
    expect(await engine.querySmartContract(1, 2)).toBeUndefined();
  });

  it("reads a transaction status", async () => {
    const status: TransactionStatus = {
      currentTickOfNode: 12345678,
      tick: 12345670,
      moneyFlew: filled(128, 0).fill(1, 0, 1),
      transactionDigests: [filled(32, 0xaa)],
    };
    serve(stub, [
      [MessageType.REQUEST_TX_STATUS, (t, r) => r.send(MessageType.RESPOND_TX_STATUS, t, encodeTransactionStatus(status))],
    ]);
    expect(await engine.getTransactionStatus(12345670)).toEqual(status);
  });

  /* ── streams ───────────────────────────────────────────── */

  it("collects a stream until END_RESPONSE", async () => {
    const owned = mkOwnedAsset();
    serve(stub, [
      [
        MessageType.REQUEST_OWNED_ASSETS,
        (t, r) => {
          r.send(MessageType.RESPOND_OWNED_ASSETS, t, encodeOwnedAsset(owned));
          r.send(MessageType.RESPOND_OWNED_ASSETS, t, encodeOwnedAsset(owned));
          r.end(t);
        },
      ],
    ]);
    expect(await engine.getOwnedAssets(aliceId)).toEqual([owned, owned]);

    const assets = await engine.getAssets(aliceId);
    expect(assets).toHaveLength(2);
    expect(assets[0]?.assetName).toBe("TOKEN");
    expect(assets[0]?.quantity).toBe(250n);
  });

  it("returns an empty list for an empty stream", async () => {
    serve(stub, [[MessageType.REQUEST_ISSUED_ASSETS, (t, r) => r.end(t)]]);
    expect(await engine.getIssuedAssets(aliceId)).toEqual([]);
  });

  it("filters ownership records by name", async () => {
    const entry = { record: mkOwnership(), tick: 12345678, universeIndex: 80 };
    serve(stub, [
      [
        MessageType.REQUEST_ASSETS,
        (t, r) => {
          r.send(MessageType.RESPOND_ASSETS, t, encodeAssetEntry(ownershipCodec, entry));
          r.end(t);
        },
      ],
    ]);
    expect(await engine.getAssetOwnerships({ assetName: "QX" })).toEqual([entry]);

    const body = stub.received[0]?.body ?? Buffer.alloc(0);
    expect(body.readUInt16LE(0)).toBe(1);
    expect(body.readUInt16LE(2)).toBe(0b1111000);
  });

  it("requires a name before filtering ownerships", async () => {
    await expect(engine.getAssetOwnerships({ assetName: "" })).rejects.toBeInstanceOf(PreconditionError);
    expect(stub.bytesReceived).toBe(0);
  });

  it("rejects a record of another kind at a universe index", async () => {
    const entry = { record: mkIssuance(), tick: 12345678, universeIndex: 5 };
    serve(stub, [
      [
        MessageType.REQUEST_ASSETS,
        (t, r) => {
          r.send(MessageType.RESPOND_ASSETS, t, encodeAssetEntry(issuanceCodec, entry));
          r.end(t);
        },
      ],
    ]);
    expect(await engine.getAssetIssuances({ universeIndex: 5 })).toEqual([entry]);
    await expect(engine.getAssetOwnerships({ universeIndex: 5 })).rejects.toBeInstanceOf(MalformedMessage);
  });

  it("lists the transactions of a tick", async () => {
    const signed = await signedTransfer();
    serve(stub, [
      [
        MessageType.REQUEST_TICK_TRANSACTIONS,
        (t, r) => {
          r.send(MessageType.BROADCAST_TRANSACTION, t, encodeTransaction(signed));
          r.end(t);
        },
      ],
    ]);
    expect(await engine.getTickTransactions(999)).toEqual([signed]);
  });

  /* ── tick guards ───────────────────────────────────────── */

  it("reads tick data for a past tick", async () => {
    serve(stub, [
      tickInfoAt(12345678),
      [MessageType.REQUEST_TICK_DATA, (t, r) => r.send(MessageType.BROADCAST_FUTURE_TICK_DATA, t, encodeTickData(mkTickData()))],
    ]);
    expect(await engine.getTickData(12345670)).toEqual(mkTickData());
    expect(stub.received.map((m) => m.header.type)).toEqual([
      MessageType.REQUEST_CURRENT_TICK_INFO,
      MessageType.REQUEST_TICK_DATA,
    ]);
  });

  it("refuses tick data and votes for a future tick", async () => {
    serve(stub, [tickInfoAt(12345678)]);
    await expect(engine.getTickData(12345679)).rejects.toThrow(
      "tick 12345679 is in the future (node is at 12345678)",
    );
    await expect(engine.getQuorumVotes(12345679)).rejects.toBeInstanceOf(PreconditionError);
    expect(stub.received.map((m) => m.header.type)).toEqual([
      MessageType.REQUEST_CURRENT_TICK_INFO,
      MessageType.REQUEST_CURRENT_TICK_INFO,
    ]);
  });

  it("collects quorum votes", async () => {
    const votes = [mkQuorumVote({ computorIndex: 1 }), mkQuorumVote({ computorIndex: 2 })];
    serve(stub, [
      tickInfoAt(12345678),
      [
        MessageType.REQUEST_QUORUM_TICK,
        (t, r) => {
          for (const vote of votes) r.send(MessageType.BROADCAST_TICK, t, encodeQuorumTickVote(vote));
          r.end(t);
        },
      ],
    ]);
    expect(await engine.getQuorumVotes(12345670)).toEqual(votes);
  });

  /* ── broadcast ─────────────────────────────────────────── */

  it("broadcasts a signed transaction with token 0", async () => {
    const signed = await signedTransfer();
    const id = await engine.broadcastTransaction(signed);
    expect(id).toBe(transactionId(signed));

    const [msg] = await stub.waitForRequests(1);
    expect(msg?.header).toEqual({ size: 8 + 80 + 64, type: MessageType.BROADCAST_TRANSACTION, dejavu: 0 });
    const decoded = decodeTransaction(msg?.body ?? Buffer.alloc(0));
    expect(decoded).toEqual(signed);
    expect(verifyTransaction(decoded, verifyEd25519)).toBe(true);
  });

  it("refuses to broadcast an unsigned transaction", async () => {
    const unsigned = buildTransaction({ source: aliceId, destination: bobId, amount: 1000n, tick: 999 });
    await expect(engine.broadcastTransaction(unsigned)).rejects.toThrow(
      "only a signed transaction can be broadcast",
    );
    expect(engine.getStats().connection.bytesSent).toBe(0);
    expect(engine.getStats().requests).toBe(0);
  });

  /* ── correlation ───────────────────────────────────────── */

  it("diverts messages with another token or type", async () => {
    const diverted: Array<[number, UnsolicitedReason]> = [];
    engine.on("unsolicited", (msg, reason) => diverted.push([msg.header.type, reason]));
    serve(stub, [
      [
        MessageType.REQUEST_CURRENT_TICK_INFO,
        (t, r) => {
          const other = t === 7 ? 8 : 7;
          r.send(MessageType.BROADCAST_TICK, 0, filled(16, 1));
          r.send(MessageType.RESPOND_CURRENT_TICK_INFO, other, encodeTickInfo(mkTickInfo({ tick: 1 })));
          r.send(MessageType.RESPOND_SYSTEM_INFO, t, encodeSystemInfo(mkSystemInfo()));
          r.send(MessageType.RESPOND_CURRENT_TICK_INFO, t, encodeTickInfo(mkTickInfo()));
        },
      ],
    ]);
    expect((await engine.getTickInfo()).tick).toBe(12345678);
    expect(diverted).toEqual([
      [MessageType.BROADCAST_TICK, "token-mismatch"],
      [MessageType.RESPOND_CURRENT_TICK_INFO, "token-mismatch"],
      [MessageType.RESPOND_SYSTEM_INFO, "unexpected-type"],
    ]);
    expect(engine.getStats().unsolicited).toBe(3);
  });

  it("diverts messages pushed while no request is running", async () => {
    serve(stub, [tickInfoAt(12345678)]);
    await engine.getTickInfo();

    const kinds = new Set<string>();
    let seen = 0;
    const all = new Promise<void>((resolve) => {
      engine.on("unsolicited", (msg, reason) => {
        kinds.add(`${msg.header.type}/${msg.header.dejavu}/${reason}`);
        seen += 1;
        if (seen === 1000) resolve();
      });
    });
    const frame = encodeMessage(MessageType.BROADCAST_TICK, 0, filled(16, 1));
    stub.push(Buffer.concat(Array.from({ length: 1000 }, () => frame)));
    await all;

    expect([...kinds]).toEqual([`${MessageType.BROADCAST_TICK}/0/token-mismatch`]);
    expect(engine.getStats().unsolicited).toBe(1000);
    expect(engine.getStats().connection.queuedMessages).toBe(0);
    expect((await engine.getTickInfo()).tick).toBe(12345678);
  });

  it("serializes concurrent callers and gives each its own token", async () => {
    serve(stub, [
      tickInfoAt(12345678),
      [MessageType.REQUEST_SYSTEM_INFO, (t, r) => r.send(MessageType.RESPOND_SYSTEM_INFO, t, encodeSystemInfo(mkSystemInfo()))],
    ]);
    const [a, b, c] = await Promise.all([engine.getTickInfo(), engine.getSystemInfo(), engine.getTickInfo()]);
    expect(a.tick).toBe(12345678);
    expect(b).toEqual(mkSystemInfo());
    expect(c.tick).toBe(12345678);

    const tokens = new Set(stub.received.map((m) => m.header.dejavu));
    expect(tokens.size).toBe(3);
    expect(tokens.has(0)).toBe(false);
    expect(engine.getStats()).toMatchObject({ requests: 3, waiting: 0 });
  });

  /* ── failures ──────────────────────────────────────────── */

  it("times out and keeps the engine usable", async () => {
    let calls = 0;
    serve(stub, [
      [
        MessageType.REQUEST_SYSTEM_INFO,
        (t, r) => {
          calls += 1;
          if (calls > 1) r.send(MessageType.RESPOND_SYSTEM_INFO, t, encodeSystemInfo(mkSystemInfo()));
        },
      ],
    ]);
    const started = Date.now();
    await expect(engine.getSystemInfo({ timeoutMs: 200 })).rejects.toBeInstanceOf(TimeoutError);
    expect(Date.now() - started).toBeLessThan(1000);

    expect(await engine.getSystemInfo()).toEqual(mkSystemInfo());
    expect(engine.getStats().connection.state).toBe(ConnectionState.OPEN);
  });

  it("gives up waiting for the slot at the caller's deadline", async () => {
    serve(stub, [
      [
        MessageType.REQUEST_CURRENT_TICK_INFO,
        (t, r) => {
          setTimeout(
            () => r.send(MessageType.RESPOND_CURRENT_TICK_INFO, t, encodeTickInfo(mkTickInfo())),
            300,
          );
        },
      ],
    ]);
    const first = engine.getTickInfo();
    await stub.waitForRequests(1);
    await expect(engine.getTickInfo({ timeoutMs: 50 })).rejects.toThrow(/^lock not acquired within \d+ms$/);
    expect(engine.getStats().waiting).toBe(0);

    expect((await first).tick).toBe(12345678);
    expect(stub.received).toHaveLength(1);
  });

  it("spends one deadline across the tick check and the tick data request", async () => {
    serve(stub, [
      [
        MessageType.REQUEST_CURRENT_TICK_INFO,
        (t, r) => {
          setTimeout(
            () => r.send(MessageType.RESPOND_CURRENT_TICK_INFO, t, encodeTickInfo(mkTickInfo())),
            200,
          );
        },
      ],
      [
        MessageType.REQUEST_TICK_DATA,
        (t, r) => {
          setTimeout(
            () => r.send(MessageType.BROADCAST_FUTURE_TICK_DATA, t, encodeTickData(mkTickData())),
            200,
          );
        },
      ],
    ]);
    await expect(engine.getTickData(12345670, { timeoutMs: 300 })).rejects.toBeInstanceOf(TimeoutError);
    expect(stub.received.map((m) => m.header.type)).toEqual([
      MessageType.REQUEST_CURRENT_TICK_INFO,
      MessageType.REQUEST_TICK_DATA,
    ]);
  });

  it("rejects in-flight and queued callers on close", async () => {
    const first = expect(engine.getTickInfo()).rejects.toBeInstanceOf(ConnectionClosed);
    const second = expect(engine.getTickInfo()).rejects.toBeInstanceOf(ConnectionClosed);
    await stub.waitForRequests(1);
    engine.close();
    await first;
    await second;
    expect(stub.received).toHaveLength(1);
    await expect(engine.getTickInfo()).rejects.toThrow("engine is closed");
  });

  it("fails the request when the node hangs up", async () => {
    serve(stub, [[MessageType.REQUEST_CURRENT_TICK_INFO, (_, r) => r.destroy()]]);
    await expect(engine.getTickInfo()).rejects.toBeInstanceOf(ConnectionClosed);
    await expect(engine.getTickInfo()).rejects.toBeInstanceOf(ConnectionClosed);
  });
});

describe("withEngine", () => {
  it("closes the engine after the callback", async () => {
    const stub = await StubNode.start();
    serve(stub, [tickInfoAt(12345678)]);
    const cfg = { host: "127.0.0.1", port: stub.port, readTimeoutMs: 2000 };

    const { engine, info } = await withEngine(
      cfg,
      async (e) => ({ engine: e, info: await e.getTickInfo() }),
      silent,
    );
    expect(info.tick).toBe(12345678);
    expect(engine.getStats().connection.state).toBe(ConnectionState.CLOSED);

    const seen: ProtocolEngine[] = [];
    await expect(
      withEngine(
        cfg,
        async (e) => {
          seen.push(e);
          throw new Error("boom");
        },
        silent,
      ),
    ).rejects.toThrow("boom");
    expect(seen[0]?.getStats().connection.state).toBe(ConnectionState.CLOSED);

    await stub.close();
  });
});

import { createConnection, type Socket } from "node:net";
import { EventEmitter } from "node:events";
import { readMessageSize } from "../codec/header";
import { HEADER_SIZE } from "../core/constants";
import {
  ConnectionClosed,
  ConnectionError,
  MalformedMessage,
  TimeoutError,
} from "../errors";
import { makeLogger, type ILogger } from "../logging";

export enum ConnectionState {
  OPEN = "OPEN",
  CLOSED = "CLOSED",
}

export type ConnectOptions = {
  host: string;
  port: number;
  connectTimeoutMs: number;
  logger?: ILogger;
};

export type CloseStats = {
  reason: string;
  bytesSent: number;
  bytesReceived: number;
};

export type ConnectionStats = {
  state: ConnectionState;
  bytesSent: number;
  bytesReceived: number;
  bufferSize: number;
  queuedMessages: number;
};

type ConnectionEvents = {
  close: [stats: CloseStats];
  /** A frame arrived with no `receiveOne` caller waiting; it sits in the inbox. */
  queued: [];
};

type ReceiveWaiter = {
  resolve: (frame: Buffer) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

/**
 * One TCP connection to a node.
 *
 * Responsibilities:
 * - Incremental framing (fragmented and coalesced chunks)
 * - Handing complete messages to `receiveOne` callers in arrival order
 * - Releasing the socket exactly once
 *
 * Does NOT interpret message types or tokens.
 */
export class Connection extends EventEmitter<ConnectionEvents> {
  private state = ConnectionState.OPEN;
  private recvBuffer: Buffer = Buffer.alloc(0);
  private readonly inbox: Buffer[] = [];
  private readonly waiters: ReceiveWaiter[] = [];
  private closeReason = "";
  private closeCause: Error | undefined;

  private bytesSent = 0;
  private bytesReceived = 0;

  private constructor(
    private readonly socket: Socket,
    private readonly log: ILogger,
    readonly remote: string,
  ) {
    super();
    this.wireSocket();
  }

  static open(opts: ConnectOptions): Promise<Connection> {
    const { host, port, connectTimeoutMs } = opts;
    const log = opts.logger ?? makeLogger("silent");
    const remote = `${host}:${port}`;

    return new Promise((resolve, reject) => {
      const socket = createConnection({ host, port });

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new ConnectionError(`connect to ${remote} timed out after ${connectTimeoutMs}ms`));
      }, connectTimeoutMs);

      const onError = (err: Error): void => {
        clearTimeout(timer);
        socket.destroy();
        reject(new ConnectionError(`connect to ${remote} failed: ${err.message}`, { cause: err }));
      };

      socket.once("error", onError);
      socket.once("connect", () => {
        clearTimeout(timer);
        socket.off("error", onError);
        socket.setNoDelay(true);
        log.debug({ remote }, "connected");
        resolve(new Connection(socket, log, remote));
      });
    });
  }

  private wireSocket(): void {
    this.socket.on("data", (chunk: Buffer) => {
      if (this.state === ConnectionState.CLOSED) return;
      this.bytesReceived += chunk.length;
      this.onData(chunk);
    });

    this.socket.on("error", (err) => {
      this.shutdown(new ConnectionError(`socket error: ${err.message}`, { cause: err }), "socket error");
    });

    this.socket.on("close", () => {
      const partial = this.recvBuffer.length;
      const message =
        partial > 0
          ? `peer closed the connection with ${partial} bytes of an incomplete message buffered`
          : "peer closed the connection";
      this.shutdown(new ConnectionClosed(message), "peer closed");
    });
  }

  /* ── framing ───────────────────────────────────────────── */

  private onData(chunk: Buffer): void {
    this.recvBuffer = Buffer.concat([this.recvBuffer, chunk]);

    while (this.recvBuffer.length >= 3) {
      const size = readMessageSize(this.recvBuffer);
      if (size < HEADER_SIZE) {
        this.shutdown(
          new MalformedMessage(`header: declared size ${size} is below ${HEADER_SIZE}`),
          "malformed header",
        );
        return;
      }
      if (this.recvBuffer.length < size) return;

      const frame = Buffer.from(this.recvBuffer.subarray(0, size));
      this.recvBuffer = this.recvBuffer.subarray(size);
      this.deliver(frame);
    }
  }

  private deliver(frame: Buffer): void {
    const waiter = this.waiters.shift();
    if (waiter === undefined) {
      this.inbox.push(frame);
      this.emit("queued");
      return;
    }
    clearTimeout(waiter.timer);
    waiter.resolve(frame);
  }

  /* ── I/O ───────────────────────────────────────────────── */

  private closedError(): ConnectionClosed {
    return new ConnectionClosed(`connection to ${this.remote} is closed (${this.closeReason})`, {
      cause: this.closeCause,
    });
  }

  /** Resolves once the whole buffer is handed to the OS. */
  send(bytes: Uint8Array, timeoutMs?: number): Promise<void> {
    if (this.state === ConnectionState.CLOSED) {
      return Promise.reject(this.closedError());
    }

    return new Promise((resolve, reject) => {
      let settled = false;
      const timer =
        timeoutMs === undefined
          ? undefined
          : setTimeout(() => {
              if (settled) return;
              settled = true;
              // framing state is unknown once a write stalls
              const err = new TimeoutError(`write not completed within ${timeoutMs}ms`, timeoutMs);
              this.shutdown(err, "write timeout");
              reject(err);
            }, timeoutMs);

      this.socket.write(bytes, (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) {
          const failure = new ConnectionError(`write failed: ${err.message}`, { cause: err });
          this.shutdown(failure, "write failed");
          reject(failure);
          return;
        }
        this.bytesSent += bytes.length;
        resolve();
      });
    });
  }

  /** Exactly one complete message, header included. */
  receiveOne(timeoutMs: number): Promise<Buffer> {
    const queued = this.inbox.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.state === ConnectionState.CLOSED) {
      return Promise.reject(this.closedError());
    }

    return new Promise((resolve, reject) => {
      const waiter: ReceiveWaiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const at = this.waiters.indexOf(waiter);
          if (at !== -1) this.waiters.splice(at, 1);
          reject(new TimeoutError(`no message within ${timeoutMs}ms`, timeoutMs));
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /** Next queued frame without waiting, or undefined. */
  takeQueued(): Buffer | undefined {
    return this.inbox.shift();
  }

  /* ── lifecycle ─────────────────────────────────────────── */

  close(reason = "closed by caller"): void {
    this.shutdown(new ConnectionClosed(`connection to ${this.remote} closed: ${reason}`), reason);
  }

  private shutdown(err: Error, reason: string): void {
    if (this.state === ConnectionState.CLOSED) return;
    this.state = ConnectionState.CLOSED;
    this.closeReason = reason;
    this.closeCause = err;
    this.socket.destroy();

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(err);
    }

    const stats: CloseStats = {
      reason,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
    };
    this.log.debug({ remote: this.remote, ...stats }, "connection closed");
    this.emit("close", stats);
  }

  getState(): ConnectionState {
    return this.state;
  }

  getStats(): ConnectionStats {
    return {
      state: this.state,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      bufferSize: this.recvBuffer.length,
      queuedMessages: this.inbox.length,
    };
  }
}

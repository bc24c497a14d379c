import { WebSocketServer, type RawData } from "ws";
import type { IncomingMessage } from "http";
import type { Duplex } from "stream";
import { AsyncQueue, type ObserverChannel, type Received } from "@sensorcast/core";
import type { Adapter, ObserverHandler } from "../types";

const CONNECTING = 0;
const OPEN = 1;

/** The part of a `ws` socket the channel uses. */
export interface SocketLike {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export type WsChannelOptions = {
  /** Refuse further sends while more than this many bytes are queued on the socket. */
  maxBufferedBytes?: number;
};

export class WsChannel implements ObserverChannel {
  private readonly inbox = new AsyncQueue<string>();
  private ended: { code?: number; reason?: string } | null = null;
  private readonly maxBufferedBytes: number;

  constructor(
    private readonly socket: SocketLike,
    opts: WsChannelOptions = {},
  ) {
    this.maxBufferedBytes = opts.maxBufferedBytes ?? 1024 * 1024;
    socket.on("message", (data, isBinary) => {
      // text frames only
      if (!isBinary) this.inbox.push(rawToString(data));
    });
    socket.on("close", (code, reason) => this.end(code, reason.toString()));
    socket.on("error", err => this.end(1006, err.message));
  }

  send(message: string): Promise<void> {
    if (this.ended || this.socket.readyState !== OPEN) {
      return Promise.reject(new Error("socket is not open"));
    }
    if (this.socket.bufferedAmount > this.maxBufferedBytes) {
      return Promise.reject(new Error(`send buffer above ${this.maxBufferedBytes} bytes`));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(message, err => (err ? reject(err) : resolve()));
    });
  }

  async receive(): Promise<Received> {
    const next = await this.inbox.next();
    if (!next.done) return { kind: "message", data: next.value };
    return { kind: "closed", code: this.ended?.code, reason: this.ended?.reason };
  }

  close(code = 1000, reason = ""): void {
    if (this.ended) return;
    this.end(code, reason);
    if (this.socket.readyState === CONNECTING || this.socket.readyState === OPEN) {
      this.socket.close(code, reason);
    }
  }

  private end(code: number, reason: string): void {
    if (this.ended) return;
    this.ended = { code, reason };
    this.inbox.close();
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/** Accepts upgrades on `/ws/:deviceId` and hands each socket to the host. */
export class WsTransport implements Adapter {
  public readonly name = "ws";
  private readonly wss = new WebSocketServer({ noServer: true });

  constructor(
    private readonly handle: ObserverHandler,
    private readonly opts: WsChannelOptions = {},
  ) {}

  upgrade(req: IncomingMessage, socket: Duplex, head: Buffer, deviceId: string): void {
    this.wss.handleUpgrade(req, socket, head, ws => {
      void this.serve(deviceId, ws);
    });
  }

  /** Resolves once the observer is gone and cleaned up. */
  serve(deviceId: string, socket: SocketLike): Promise<void> {
    return this.handle(deviceId, new WsChannel(socket, this.opts));
  }

  async health(): Promise<{ ok: boolean }> {
    return { ok: true };
  }

  async drain(): Promise<void> {
    await new Promise<void>(resolve => this.wss.close(() => resolve()));
  }
}

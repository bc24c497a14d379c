import { AsyncQueue, type ObserverChannel, type Received } from "@sensorcast/core";
import type { Adapter, ObserverHandler } from "../types";

/** The part of `http.ServerResponse` the stream writes to. */
export interface ResLike {
  setHeader(name: string, value: string): unknown;
  writeHead(status: number): unknown;
  write(chunk: string): boolean;
  end(): unknown;
  flushHeaders?(): void;
  on?(ev: "close" | "finish", cb: () => void): unknown;
  readonly writableLength?: number;
}

export type SseChannelOptions = {
  heartbeatMs?: number;
  maxBufferedBytes?: number;
};

/**
 * Server-sent events as a one-way observer channel. The client cannot send
 * commands; `receive()` only ever reports the stream closing.
 */
export class SseChannel implements ObserverChannel {
  private readonly done = new AsyncQueue<never>();
  private ended: { code?: number; reason?: string } | null = null;
  private readonly heartbeat: NodeJS.Timeout;
  private readonly maxBufferedBytes: number;

  constructor(
    private readonly res: ResLike,
    opts: SseChannelOptions = {},
  ) {
    this.maxBufferedBytes = opts.maxBufferedBytes ?? 1024 * 1024;
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.writeHead(200);
    res.flushHeaders?.();
    res.write("retry: 2000\n\n");
    // initial comment for intermediates
    res.write(": connected\n\n");
    this.heartbeat = setInterval(() => {
      try {
        res.write(":\n\n");
      } catch (err) {
        this.end(1006, String(err));
      }
    }, opts.heartbeatMs ?? 15000);
    const onGone = () => this.end(1001, "client disconnected");
    res.on?.("close", onGone);
    res.on?.("finish", onGone);
  }

  async send(message: string): Promise<void> {
    if (this.ended) throw new Error("stream is closed");
    if ((this.res.writableLength ?? 0) > this.maxBufferedBytes) {
      throw new Error(`send buffer above ${this.maxBufferedBytes} bytes`);
    }
    this.res.write(`data: ${message}\n\n`);
  }

  async receive(): Promise<Received> {
    await this.done.next();
    return { kind: "closed", code: this.ended?.code, reason: this.ended?.reason };
  }

  close(code = 1000, reason = ""): void {
    if (this.ended) return;
    this.end(code, reason);
    this.res.end();
  }

  private end(code: number, reason: string): void {
    if (this.ended) return;
    this.ended = { code, reason };
    clearInterval(this.heartbeat);
    this.done.close();
  }
}

/** `GET /stream/:deviceId`. */
export class SseTransport implements Adapter {
  public readonly name = "sse";

  constructor(
    private readonly handle: ObserverHandler,
    private readonly opts: SseChannelOptions = {},
  ) {}

  // Example usage with Node http:
  //   http.createServer((_req, res) => void sse.serve(res, "sensor-1")).listen(8080)
  serve(res: ResLike, deviceId: string): Promise<void> {
    return this.handle(deviceId, new SseChannel(res, this.opts));
  }

  async health(): Promise<{ ok: boolean }> {
    return { ok: true };
  }
}

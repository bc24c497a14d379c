import http from "http";
import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "http";
import { errorMessage } from "@sensorcast/core";
import { bootstrap, type App, type BootstrapOptions } from "../bootstrap";
import type { Config } from "../config";
import type { ResLike } from "../../adapters/sse";
import { describeIssues, fromInput, readingInputSchema, toWire } from "../../adapters/wire";
import type { PageCursor } from "../../adapters/sqlite";
import type { Adapter, DeviceReading } from "../../adapters/types";

export interface RequestLike extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

export interface ResponseLike extends ResLike {
  writeHead(status: number, headers?: OutgoingHttpHeaders): unknown;
  end(body?: string): unknown;
  readonly headersSent: boolean;
}

const MAX_BODY_BYTES = 1024 * 1024;
const DEFAULT_PAGE = 100;
const MAX_PAGE = 1000;
const ENDPOINTS = ["/data", "/data/:deviceId", "/ws/:deviceId", "/stream/:deviceId", "/health", "/metrics", "/status.json"];

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

const started = Date.now();

/** Request handler over an already wired app. Exported for tests. */
export function createHandler(app: App) {
  return async (req: RequestLike, res: ResponseLike): Promise<void> => {
    try {
      const url = new URL(req.url ?? "/", "http://localhost");
      const path = url.pathname;
      if (req.method === "POST" && path === "/data") {
        return await postData(app, req, res);
      }
      if (req.method === "GET" && (path === "/data" || path.startsWith("/data/"))) {
        const deviceId = path === "/data" ? undefined : deviceIdFromPath("/data/", path);
        if (deviceId === null) return notFound(res);
        return getData(app, url.searchParams, res, deviceId);
      }
      if (req.method === "GET" && path.startsWith("/stream/")) {
        const deviceId = deviceIdFromPath("/stream/", path);
        if (deviceId === null) return notFound(res);
        return await app.sse.serve(res, deviceId);
      }
      if (req.method === "GET" && path === "/health") {
        const notifier = app.host.notifier.state;
        return json(res, app.host.healthy ? 200 : 503, { ok: app.host.healthy, notifier });
      }
      if (req.method === "GET" && path === "/metrics") {
        res.writeHead(200, { "content-type": "text/plain; version=0.0.4" });
        res.end(app.metrics.render());
        return;
      }
      if (req.method === "GET" && path === "/status.json") {
        return json(res, 200, await collectStatus(app));
      }
      notFound(res);
    } catch (err) {
      if (err instanceof HttpError) return json(res, err.status, { status: "failed", error: err.message });
      app.log.error(`[server] ${req.method} ${req.url} failed: ${errorMessage(err)}`);
      if (res.headersSent) {
        res.end();
        return;
      }
      json(res, 500, { ok: false, error: errorMessage(err) });
    }
  };
}

async function postData(app: App, req: RequestLike, res: ResponseLike): Promise<void> {
  const body = await readJson(req);
  const parsed = readingInputSchema.safeParse(body);
  if (!parsed.success) throw new HttpError(422, describeIssues(parsed.error));
  let reading: DeviceReading;
  try {
    reading = app.store.insert(fromInput(parsed.data));
  } catch (err) {
    app.log.error(`[server] insert for ${parsed.data.device_id} failed: ${errorMessage(err)}`);
    return json(res, 500, { status: "failed", error: errorMessage(err) });
  }
  app.metrics.inc("readings_ingested");
  json(res, 200, { status: "success", message: "Data inserted into the database", reading: toWire(reading) });
}

function getData(app: App, params: URLSearchParams, res: ResponseLike, deviceId?: string): void {
  const limit = parseLimit(params.get("limit"));
  const before = parseCursor(params.get("before"));
  const page = app.store.page({ deviceId, before, limit });
  json(res, 200, {
    data: page.readings.map(toWire),
    next_before: page.next ? formatCursor(page.next) : null,
  });
}

/** Device id after `prefix`, URL-decoded; null when missing or nested. */
export function deviceIdFromPath(prefix: string, path: string): string | null {
  if (!path.startsWith(prefix)) return null;
  const raw = path.slice(prefix.length);
  if (!raw || raw.includes("/")) return null;
  try {
    return decodeURIComponent(raw);
  } catch {
    return null;
  }
}

export function parseLimit(raw: string | null): number {
  if (raw === null) return DEFAULT_PAGE;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1 || n > MAX_PAGE) {
    throw new HttpError(400, `limit must be an integer between 1 and ${MAX_PAGE}`);
  }
  return n;
}

/** Cursors look like `<recorded_at>_<id>`. */
export function formatCursor(c: PageCursor): string {
  return `${c.recordedAt}_${c.id}`;
}

export function parseCursor(raw: string | null): PageCursor | undefined {
  if (raw === null) return undefined;
  const sep = raw.lastIndexOf("_");
  const recordedAt = raw.slice(0, sep);
  const id = Number(raw.slice(sep + 1));
  if (sep <= 0 || !Number.isInteger(id) || Number.isNaN(Date.parse(recordedAt))) {
    throw new HttpError(400, "before must be a cursor returned as next_before");
  }
  return { recordedAt, id };
}

async function readJson(req: RequestLike): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new HttpError(413, "body too large");
    chunks.push(buf);
  }
  const s = Buffer.concat(chunks).toString("utf8");
  if (!s) throw new HttpError(422, "body is empty");
  try {
    return JSON.parse(s);
  } catch {
    throw new HttpError(422, "body is not valid JSON");
  }
}

async function collectStatus(app: App) {
  const adapters: Adapter[] = [app.ws, app.sse, app.store];
  const health = await Promise.all(
    adapters.map(async a => {
      try {
        return [a.name, (await a.health?.()) ?? { ok: true }] as const;
      } catch (err) {
        return [a.name, { ok: false, detail: errorMessage(err) }] as const;
      }
    }),
  );
  return {
    ok: app.host.healthy && health.every(([, h]) => h.ok),
    node: process.version,
    pid: process.pid,
    uptimeSec: Math.round((Date.now() - started) / 1000),
    time: new Date().toISOString(),
    endpoints: ENDPOINTS,
    live: app.host.stats(),
    adapters: Object.fromEntries(health),
    metrics: app.metrics.render(),
  };
}

function json(res: ResponseLike, status: number, body: unknown): void {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
}

function notFound(res: ResponseLike): void {
  res.writeHead(404, { "content-type": "text/plain" });
  res.end("Not Found");
}

export function startServer(config: Config, opts: BootstrapOptions = {}) {
  const app = bootstrap(config, opts);
  const handle = createHandler(app);
  const server = http.createServer((req, res) => {
    void handle(req, res);
  });
  server.on("upgrade", (req, socket, head: Buffer) => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    const deviceId = deviceIdFromPath("/ws/", path);
    if (deviceId === null) {
      socket.write("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
      socket.destroy();
      return;
    }
    app.ws.upgrade(req, socket, head, deviceId);
  });
  app.host.start();
  server.listen(config.port, config.host);

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> =>
    (stopping ??= (async () => {
      try {
        await app.host.shutdown();
      } finally {
        server.close();
      }
    })());
  const onSignal = () => {
    stop().catch((err: unknown) => app.log.error(`[server] shutdown failed: ${errorMessage(err)}`));
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return { server, app, stop };
}

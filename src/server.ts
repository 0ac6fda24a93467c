// Node HTTP adapter for TrackRelay.
//
// IncomingMessage → Request → relay.handle() → Response → ServerResponse.
// The body is piped through writableSink(), which honours res.write()
// backpressure. A client disconnect aborts the pipe, which cancels the
// rewriter and with it the upstream object fetch.

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { Writable } from "node:stream";
import type { Logger } from "@adviser/cement";
import { RelayError, RelayErrorKind } from "./errors.js";
import type { TrackRelay } from "./relay.js";

export function createRelayServer(relay: TrackRelay, logger: Logger): Server {
  const log = logger.With().Module("server").Logger();
  return createServer((req, res) => {
    handleNodeRequest(relay, req, res, log).catch((err: unknown) => {
      log.Error().Err(err).Str("url", req.url ?? "").Msg("request handler failed");
      res.destroy();
    });
  });
}

export async function handleNodeRequest(
  relay: TrackRelay,
  req: IncomingMessage,
  res: ServerResponse,
  log: Logger,
): Promise<void> {
  const abort = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) abort.abort(new RelayError(RelayErrorKind.SINK, "client disconnected"));
  });

  const request = toRequest(req, abort.signal);
  const response = request
    ? await relay.handle(request)
    : new Response("Method Not Allowed", { status: 405, headers: { allow: "GET" } });

  res.statusCode = response.status;
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  if (!response.body) {
    res.end();
    return;
  }

  try {
    await response.body.pipeTo(writableSink(res), { signal: abort.signal });
  } catch (err) {
    log.Error().Err(err).Str("url", req.url ?? "").Msg("response aborted after streaming started");
    res.destroy();
  }
}

// Returns undefined for methods the fetch API refuses to model (CONNECT, TRACE).
export function toRequest(req: IncomingMessage, signal?: AbortSignal): Request | undefined {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  try {
    return new Request(url, { method: req.method ?? "GET", signal });
  } catch (err) {
    if (err instanceof TypeError) return undefined;
    throw err;
  }
}

// ── Sink ──────────────────────────────────────────────────────────────────────

export function writableSink(out: Writable): WritableStream<Uint8Array> {
  return new WritableStream<Uint8Array>({
    async write(chunk): Promise<void> {
      if (out.destroyed || out.writableEnded) {
        throw new RelayError(RelayErrorKind.SINK, "sink closed before write");
      }
      if (!out.write(chunk)) await drained(out);
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        out.once("error", reject);
        out.end(() => {
          out.off("error", reject);
          resolve();
        });
      });
    },
    abort(reason: unknown): void {
      out.destroy(reason instanceof Error ? reason : new RelayError(RelayErrorKind.SINK, String(reason)));
    },
  });
}

function drained(out: Writable): Promise<void> {
  return new Promise((resolve, reject) => {
    const cleanup = (): void => {
      out.off("drain", onDrain);
      out.off("close", onClose);
      out.off("error", onError);
    };
    const onDrain = (): void => {
      cleanup();
      resolve();
    };
    const onClose = (): void => {
      cleanup();
      reject(new RelayError(RelayErrorKind.SINK, "sink closed while waiting for drain"));
    };
    const onError = (err: Error): void => {
      cleanup();
      reject(new RelayError(RelayErrorKind.SINK, "sink failed", { cause: err }));
    };
    out.on("drain", onDrain);
    out.on("close", onClose);
    out.on("error", onError);
  });
}

// TrackRelay — serves GET /track/{uuid}.flac as a fetch-style handler.
//
//   path match        → NotFound
//   catalog lookup    → TrackRecord → RewritePlan
//   object fetch      → raw FLAC body
//   rewriteContainer  → tag-rewritten body
//
// The first output chunk (the validated signature) is pulled before the
// Response is built, so a bad object still gets an error status. After that
// the status is committed: later failures are logged and error the body
// stream, which aborts the connection.

import { LoggerImpl, type Logger } from "@adviser/cement";
import { CatalogClient } from "./catalog/client.js";
import { planForTrack } from "./catalog/track-record.js";
import type { RelayConfig } from "./config.js";
import { blockTypeName } from "./block-header.js";
import { rewriteContainer } from "./container/walker.js";
import { RelayError, RelayErrorKind, statusForError } from "./errors.js";
import { globalFetch, type FetchFn } from "./fetch.js";
import { ObjectStoreClient } from "./store/client.js";

const TRACK_PATH = /^\/track\/([a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12})\.flac$/;

export const FLAC_CONTENT_TYPE = "audio/flac";

export function matchTrackPath(pathname: string): string | undefined {
  return TRACK_PATH.exec(pathname)?.[1];
}

export interface TrackRelayOptions {
  fetch?: FetchFn;
  logger?: Logger;
  /** Passthrough slice size for the container walker. */
  chunkSize?: number;
}

export class TrackRelay {
  readonly catalog: CatalogClient;
  readonly store: ObjectStoreClient;
  readonly #logger: Logger;
  readonly #chunkSize?: number;

  constructor(config: RelayConfig, opts?: TrackRelayOptions) {
    const fetchFn = opts?.fetch ?? globalFetch;
    this.catalog = new CatalogClient(config.catalog, fetchFn);
    this.store = new ObjectStoreClient(config.store, fetchFn);
    this.#logger = (opts?.logger ?? new LoggerImpl()).With().Module("relay").Logger();
    this.#chunkSize = opts?.chunkSize;
  }

  async handle(req: Request): Promise<Response> {
    try {
      return await this.#serve(req);
    } catch (err) {
      const { status, message } = statusForError(err);
      this.#logger.Warn().Str("method", req.method).Str("url", req.url).Int("status", status).Err(err).Msg("request failed");
      const headers: Record<string, string> = { "content-type": "text/plain; charset=utf-8" };
      if (status === 405) headers.allow = "GET";
      return new Response(message, { status, headers });
    }
  }

  async #serve(req: Request): Promise<Response> {
    if (req.method !== "GET") {
      throw new RelayError(RelayErrorKind.METHOD_NOT_ALLOWED, `method ${req.method} not allowed`);
    }
    const trackId = matchTrackPath(new URL(req.url).pathname);
    if (!trackId) throw new RelayError(RelayErrorKind.NOT_FOUND, `no track route for ${req.url}`);

    const track = await this.catalog.lookup(trackId);
    const plan = planForTrack(track);
    const source = await this.store.fetchObject(track.holding_id, track.file_path, req.signal);

    const log = this.#logger.With().Str("trackId", trackId).Logger();
    const rewritten = rewriteContainer(source, plan, {
      chunkSize: this.#chunkSize,
      onBlock: ({ header, action, delta }) => {
        log
          .Debug()
          .Str("block", blockTypeName(header.type))
          .Str("action", action)
          .Uint64("length", header.length)
          .Bool("last", header.lastBlock)
          .Any("delta", delta)
          .Msg("metadata block");
      },
    });
    const body = await primeStream(rewritten, (err) => {
      log.Error().Err(err).Msg("stream failed after response was committed");
    });

    log.Info().Str("holding", track.holding_id).Str("path", track.file_path).Msg("streaming track");
    return new Response(body, { status: 200, headers: { "content-type": FLAC_CONTENT_TYPE } });
  }
}

// Pulls the first chunk so validation errors surface before the status is
// sent, then replays it ahead of the rest of the stream.
export async function primeStream(
  stream: ReadableStream<Uint8Array>,
  onLateError: (err: unknown) => void,
): Promise<ReadableStream<Uint8Array>> {
  const reader = stream.getReader();
  const first = await reader.read();
  let pending = first.done ? undefined : first.value;
  let ended = first.done;

  return new ReadableStream<Uint8Array>({
    async pull(ctrl): Promise<void> {
      if (pending) {
        ctrl.enqueue(pending);
        pending = undefined;
        return;
      }
      if (ended) {
        ctrl.close();
        return;
      }
      try {
        const { done, value } = await reader.read();
        if (done) {
          ended = true;
          ctrl.close();
          return;
        }
        ctrl.enqueue(value);
      } catch (err) {
        onLateError(err);
        ctrl.error(err);
      }
    },
    async cancel(reason): Promise<void> {
      await reader.cancel(reason);
    },
  });
}

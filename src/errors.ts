// Error taxonomy shared by the container walker, the upstream clients and the
// HTTP surface.
//
// Every failure the relay raises on purpose is a RelayError carrying one of the
// RelayErrorKind values. statusForError() maps a kind to the HTTP status used
// when the failure happens before the first response byte is committed; after
// that point the kind is only logged.

export const RelayErrorKind = {
  NOT_FOUND: "NotFound",
  METHOD_NOT_ALLOWED: "MethodNotAllowed",
  UPSTREAM_FETCH: "UpstreamFetchError",
  INVALID_CONTAINER: "InvalidContainer",
  MALFORMED_HEADER: "MalformedHeader",
  MALFORMED_TAG_BLOCK: "MalformedTagBlock",
  SINK: "SinkError",
} as const;

export type RelayErrorKindValue = (typeof RelayErrorKind)[keyof typeof RelayErrorKind];

export class RelayError extends Error {
  readonly kind: RelayErrorKindValue;

  constructor(kind: RelayErrorKindValue, message: string, opts?: { cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = kind;
    this.kind = kind;
  }
}

export function isRelayError(e: unknown, kind?: RelayErrorKindValue): e is RelayError {
  return e instanceof RelayError && (kind === undefined || e.kind === kind);
}

/** Builds a factory usable as the ByteReader truncation error. */
export function truncated(kind: RelayErrorKindValue, what: string): (missing: number) => RelayError {
  return (missing) => new RelayError(kind, `${what}: unexpected end of stream (${missing} bytes missing)`);
}

// ── HTTP mapping ──────────────────────────────────────────────────────────────

export interface ErrorStatus {
  readonly status: number;
  readonly message: string;
}

export function statusForError(e: unknown): ErrorStatus {
  if (!isRelayError(e)) return { status: 500, message: "Internal Server Error" };
  switch (e.kind) {
    case RelayErrorKind.NOT_FOUND:
      return { status: 404, message: "Not Found" };
    case RelayErrorKind.METHOD_NOT_ALLOWED:
      return { status: 405, message: "Method Not Allowed" };
    case RelayErrorKind.UPSTREAM_FETCH:
    case RelayErrorKind.INVALID_CONTAINER:
    case RelayErrorKind.MALFORMED_HEADER:
    case RelayErrorKind.MALFORMED_TAG_BLOCK:
      return { status: 502, message: "Bad Gateway" };
    default:
      return { status: 500, message: "Internal Server Error" };
  }
}

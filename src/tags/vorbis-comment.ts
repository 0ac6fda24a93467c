// VORBIS_COMMENT block body
//
//   [vendor_length: u32 LE][vendor: UTF-8]
//   [comment_count: u32 LE]
//   comment_count × ([length: u32 LE][KEY=VALUE: UTF-8])
//
// The integers here are little-endian, unlike the big-endian block header that
// frames the body. Parsed comments keep their raw bytes and are serialized from
// them, so entries the rewrite does not touch come out byte-for-byte.

import { MAX_BLOCK_LENGTH } from "../block-header.js";
import { RelayError, RelayErrorKind } from "../errors.js";
import { foldKey, planKeys, type RewritePlan, type TagEntry } from "./rewrite-plan.js";

export interface TagComment extends TagEntry {
  readonly raw: Uint8Array;
}

export interface TagBlockBody {
  readonly vendor: string;
  readonly vendorBytes: Uint8Array;
  readonly comments: readonly TagComment[];
  /** Bytes after the last declared comment, re-emitted verbatim. */
  readonly trailer: Uint8Array;
}

const utf8 = new TextDecoder();
const encoder = new TextEncoder();

// ── Parse ─────────────────────────────────────────────────────────────────────

export function parseTagBlock(buf: Uint8Array): TagBlockBody {
  const dv = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  let o = 0;

  const u32 = (what: string): number => {
    if (buf.byteLength - o < 4) {
      throw new RelayError(RelayErrorKind.MALFORMED_TAG_BLOCK, `tag block: ${what} needs 4 bytes, ${buf.byteLength - o} left`);
    }
    const v = dv.getUint32(o, true);
    o += 4;
    return v;
  };
  const bytes = (n: number, what: string): Uint8Array => {
    if (buf.byteLength - o < n) {
      throw new RelayError(
        RelayErrorKind.MALFORMED_TAG_BLOCK,
        `tag block: ${what} declares ${n} bytes, ${buf.byteLength - o} left`,
      );
    }
    const out = buf.slice(o, o + n);
    o += n;
    return out;
  };

  const vendorBytes = bytes(u32("vendor length"), "vendor string");
  const count = u32("comment count");
  const comments: TagComment[] = [];
  for (let i = 0; i < count; i++) {
    const raw = bytes(u32(`comment ${i} length`), `comment ${i}`);
    comments.push(commentFromRaw(raw));
  }

  return { vendor: utf8.decode(vendorBytes), vendorBytes, comments, trailer: buf.slice(o) };
}

function commentFromRaw(raw: Uint8Array): TagComment {
  const text = utf8.decode(raw);
  const eq = text.indexOf("=");
  return eq === -1 ? { key: text, value: "", raw } : { key: text.slice(0, eq), value: text.slice(eq + 1), raw };
}

// ── Build / serialize ─────────────────────────────────────────────────────────

export function makeComment(entry: TagEntry): TagComment {
  return { key: entry.key, value: entry.value, raw: encoder.encode(`${entry.key}=${entry.value}`) };
}

export function createTagBlock(vendor: string, entries: readonly TagEntry[]): TagBlockBody {
  return { vendor, vendorBytes: encoder.encode(vendor), comments: entries.map(makeComment), trailer: new Uint8Array(0) };
}

export function tagBlockLength(body: TagBlockBody): number {
  return (
    8 + body.vendorBytes.byteLength + body.comments.reduce((s, c) => s + 4 + c.raw.byteLength, 0) + body.trailer.byteLength
  );
}

export function serializeTagBlock(body: TagBlockBody): Uint8Array {
  const out = new Uint8Array(tagBlockLength(body));
  const dv = new DataView(out.buffer);
  let o = 0;
  dv.setUint32(o, body.vendorBytes.byteLength, true);
  o += 4;
  out.set(body.vendorBytes, o);
  o += body.vendorBytes.byteLength;
  dv.setUint32(o, body.comments.length, true);
  o += 4;
  for (const c of body.comments) {
    dv.setUint32(o, c.raw.byteLength, true);
    o += 4;
    out.set(c.raw, o);
    o += c.raw.byteLength;
  }
  out.set(body.trailer, o);
  return out;
}

export function tagBlockEntries(body: TagBlockBody): TagEntry[] {
  return body.comments.map(({ key, value }) => ({ key, value }));
}

// ── Rewrite ───────────────────────────────────────────────────────────────────

// Drops every comment whose key matches a plan key (case-insensitive), then
// appends the plan entries in plan order. Re-applying the same plan yields the
// same comments.
export function applyRewritePlan(body: TagBlockBody, plan: RewritePlan): TagBlockBody {
  const replaced = planKeys(plan);
  const kept = body.comments.filter((c) => !replaced.has(foldKey(c.key)));
  return { ...body, comments: [...kept, ...plan.map(makeComment)] };
}

export function synthesizeTagBlock(plan: RewritePlan): TagBlockBody {
  return createTagBlock("", plan);
}

export interface RewrittenTagBlock {
  readonly body: TagBlockBody;
  readonly bytes: Uint8Array;
}

export function encodeTagBlockBody(body: TagBlockBody): RewrittenTagBlock {
  const bytes = serializeTagBlock(body);
  if (bytes.byteLength > MAX_BLOCK_LENGTH) {
    throw new RelayError(
      RelayErrorKind.MALFORMED_TAG_BLOCK,
      `tag block of ${bytes.byteLength} bytes exceeds the ${MAX_BLOCK_LENGTH} byte block limit`,
    );
  }
  return { body, bytes };
}

export function rewriteTagBlock(buf: Uint8Array, plan: RewritePlan): RewrittenTagBlock {
  return encodeTagBlockBody(applyRewritePlan(parseTagBlock(buf), plan));
}

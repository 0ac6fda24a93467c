// MetadataBlock — the closed set of block shapes the relay distinguishes.
//
//   streaminfo  fixed 34-byte body, never mutated
//   padding     zero filler, only its length matters
//   tags        parsed VORBIS_COMMENT body
//   opaque      every other type, body kept as raw bytes
//
// encodeContainer / decodeContainer work on whole in-memory buffers; they back
// fixtures, the CLI and tests. The request path uses the streaming walker.

import {
  BLOCK_HEADER_SIZE,
  BlockType,
  decodeBlockHeader,
  encodeBlockHeader,
  type BlockHeader,
} from "../block-header.js";
import { RelayError, RelayErrorKind } from "../errors.js";
import { parseTagBlock, serializeTagBlock, type TagBlockBody } from "../tags/vorbis-comment.js";
import { FLAC_SIGNATURE } from "./walker.js";

export type MetadataBlock =
  | { readonly kind: "streaminfo"; readonly lastBlock: boolean; readonly body: Uint8Array }
  | { readonly kind: "padding"; readonly lastBlock: boolean; readonly length: number }
  | { readonly kind: "tags"; readonly lastBlock: boolean; readonly tags: TagBlockBody }
  | { readonly kind: "opaque"; readonly lastBlock: boolean; readonly type: number; readonly body: Uint8Array };

export function blockFromBody(header: BlockHeader, body: Uint8Array): MetadataBlock {
  const { lastBlock } = header;
  switch (header.type) {
    case BlockType.STREAMINFO:
      return { kind: "streaminfo", lastBlock, body };
    case BlockType.PADDING:
      return { kind: "padding", lastBlock, length: body.byteLength };
    case BlockType.VORBIS_COMMENT:
      return { kind: "tags", lastBlock, tags: parseTagBlock(body) };
    default:
      return { kind: "opaque", lastBlock, type: header.type, body };
  }
}

export function blockBody(block: MetadataBlock): Uint8Array {
  switch (block.kind) {
    case "streaminfo":
    case "opaque":
      return block.body;
    case "padding":
      return new Uint8Array(block.length);
    case "tags":
      return serializeTagBlock(block.tags);
  }
}

export function blockType(block: MetadataBlock): number {
  switch (block.kind) {
    case "streaminfo":
      return BlockType.STREAMINFO;
    case "padding":
      return BlockType.PADDING;
    case "tags":
      return BlockType.VORBIS_COMMENT;
    case "opaque":
      return block.type;
  }
}

export function encodeBlock(block: MetadataBlock): Uint8Array {
  const body = blockBody(block);
  const header = encodeBlockHeader({ lastBlock: block.lastBlock, type: blockType(block), length: body.byteLength });
  const out = new Uint8Array(BLOCK_HEADER_SIZE + body.byteLength);
  out.set(header, 0);
  out.set(body, BLOCK_HEADER_SIZE);
  return out;
}

// ── Whole-file codec ──────────────────────────────────────────────────────────

export function encodeContainer(blocks: readonly MetadataBlock[], frames: Uint8Array = new Uint8Array(0)): Uint8Array {
  const parts = [FLAC_SIGNATURE, ...blocks.map(encodeBlock), frames];
  const out = new Uint8Array(parts.reduce((s, p) => s + p.byteLength, 0));
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.byteLength;
  }
  return out;
}

export interface DecodedContainer {
  readonly blocks: MetadataBlock[];
  /** Offset of the first audio frame byte. */
  readonly frameOffset: number;
  readonly frames: Uint8Array;
}

export function decodeContainer(buf: Uint8Array): DecodedContainer {
  if (buf.byteLength < FLAC_SIGNATURE.byteLength || !FLAC_SIGNATURE.every((b, i) => buf[i] === b)) {
    throw new RelayError(RelayErrorKind.INVALID_CONTAINER, "missing fLaC signature");
  }
  const blocks: MetadataBlock[] = [];
  let o = FLAC_SIGNATURE.byteLength;
  while (true) {
    const header = decodeBlockHeader(buf, o);
    o += BLOCK_HEADER_SIZE;
    if (header.type === BlockType.INVALID) {
      throw new RelayError(RelayErrorKind.MALFORMED_HEADER, `block at ${o - BLOCK_HEADER_SIZE} has invalid type 127`);
    }
    if (buf.byteLength - o < header.length) {
      const kind = header.type === BlockType.VORBIS_COMMENT ? RelayErrorKind.MALFORMED_TAG_BLOCK : RelayErrorKind.MALFORMED_HEADER;
      throw new RelayError(kind, `block at ${o - BLOCK_HEADER_SIZE} declares ${header.length} bytes, ${buf.byteLength - o} left`);
    }
    blocks.push(blockFromBody(header, buf.slice(o, o + header.length)));
    o += header.length;
    if (header.lastBlock) break;
  }
  return { blocks, frameOffset: o, frames: buf.slice(o) };
}

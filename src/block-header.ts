// FLAC METADATA_BLOCK_HEADER codec
//
// Each metadata block starts with 4 bytes, packed most-significant bit first:
//
//   [last: 1 bit][type: 7 bits][length: 24 bits, big-endian]
//
// length counts the body bytes that follow the header. Range checks on the
// type (127 is invalid) belong to the walker; decode only needs 4 bytes.
//
// Block types:
//   0    STREAMINFO      — fixed 34-byte body, always first
//   1    PADDING         — zero filler
//   2    APPLICATION
//   3    SEEKTABLE
//   4    VORBIS_COMMENT  — the tag block
//   5    CUESHEET
//   6    PICTURE
//   127  invalid

import { RelayError, RelayErrorKind } from "./errors.js";

export const BlockType = {
  STREAMINFO: 0,
  PADDING: 1,
  APPLICATION: 2,
  SEEKTABLE: 3,
  VORBIS_COMMENT: 4,
  CUESHEET: 5,
  PICTURE: 6,
  INVALID: 127,
} as const;

export type BlockTypeValue = (typeof BlockType)[keyof typeof BlockType];

export const BLOCK_HEADER_SIZE = 4;
export const STREAMINFO_LENGTH = 34;
export const MAX_BLOCK_LENGTH = 0xff_ffff;

export interface BlockHeader {
  readonly lastBlock: boolean;
  readonly type: number;
  readonly length: number;
}

export function blockTypeName(type: number): string {
  return Object.entries(BlockType).find(([, v]) => v === type)?.[0] ?? `TYPE_${type}`;
}

// ── Encode ────────────────────────────────────────────────────────────────────

export function encodeBlockHeader(header: BlockHeader): Uint8Array {
  if (!Number.isInteger(header.type) || header.type < 0 || header.type > 0x7f) {
    throw new RangeError(`block type must fit in 7 bits, got ${header.type}`);
  }
  if (!Number.isInteger(header.length) || header.length < 0 || header.length > MAX_BLOCK_LENGTH) {
    throw new RangeError(`block length must fit in 24 bits, got ${header.length}`);
  }
  const out = new Uint8Array(BLOCK_HEADER_SIZE);
  out[0] = (header.lastBlock ? 0x80 : 0) | header.type;
  out[1] = (header.length >>> 16) & 0xff;
  out[2] = (header.length >>> 8) & 0xff;
  out[3] = header.length & 0xff;
  return out;
}

// ── Decode ────────────────────────────────────────────────────────────────────

export function decodeBlockHeader(buf: Uint8Array, offset = 0): BlockHeader {
  if (buf.byteLength - offset < BLOCK_HEADER_SIZE) {
    throw new RelayError(
      RelayErrorKind.MALFORMED_HEADER,
      `block header needs ${BLOCK_HEADER_SIZE} bytes, got ${Math.max(0, buf.byteLength - offset)}`,
    );
  }
  const first = buf[offset];
  return {
    lastBlock: (first & 0x80) !== 0,
    type: first & 0x7f,
    length: (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3],
  };
}

export function withLength(header: BlockHeader, length: number): BlockHeader {
  return { lastBlock: header.lastBlock, type: header.type, length };
}

export function withLastBlock(header: BlockHeader, lastBlock: boolean): BlockHeader {
  return { lastBlock, type: header.type, length: header.length };
}

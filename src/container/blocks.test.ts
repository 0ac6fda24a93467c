import { describe, it, expect } from "vitest";
import { isRelayError, RelayErrorKind } from "../errors.js";
import { ascii, concat, frames, opaque, padding, streaminfo, tags } from "../testing/flac-fixtures.js";
import { decodeContainer, encodeBlock, encodeContainer, type MetadataBlock } from "./blocks.js";

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

describe("container codec", () => {
  it("encodes a block as header + body", () => {
    expect(encodeBlock(padding(3, true))).toEqual(new Uint8Array([0x81, 0, 0, 3, 0, 0, 0]));
  });

  it("starts with the fLaC signature", () => {
    expect(encodeContainer([streaminfo(true)]).slice(0, 4)).toEqual(ascii("fLaC"));
  });

  it("roundtrips every block kind", () => {
    const blocks: MetadataBlock[] = [
      streaminfo(),
      opaque(3, new Uint8Array(18).fill(0x11)),
      tags([{ key: "TITLE", value: "Song" }], { vendor: "ref" }),
      opaque(6, new Uint8Array([1, 2, 3])),
      opaque(42, new Uint8Array(0)),
      padding(16, true),
    ];
    const audio = frames(50);
    const decoded = decodeContainer(encodeContainer(blocks, audio));
    expect(decoded.blocks).toEqual(blocks);
    expect(decoded.frames).toEqual(audio);
  });

  it("reports the first frame offset", () => {
    const buf = encodeContainer([streaminfo(), padding(10, true)], frames(5));
    // 4 signature + (4 + 34) streaminfo + (4 + 10) padding
    expect(decodeContainer(buf).frameOffset).toBe(56);
  });

  it("rejects a wrong signature", () => {
    const err = caught(() => decodeContainer(concat(ascii("OggS"), encodeBlock(streaminfo(true)))));
    expect(isRelayError(err, RelayErrorKind.INVALID_CONTAINER)).toBe(true);
  });

  it("rejects block type 127", () => {
    const buf = concat(ascii("fLaC"), encodeBlock(streaminfo()), new Uint8Array([0xff, 0, 0, 0]));
    expect(isRelayError(caught(() => decodeContainer(buf)), RelayErrorKind.MALFORMED_HEADER)).toBe(true);
  });

  it("rejects a body longer than the buffer", () => {
    const buf = concat(ascii("fLaC"), encodeBlock(streaminfo()), new Uint8Array([0x82, 0, 0, 40]), new Uint8Array(10));
    expect(isRelayError(caught(() => decodeContainer(buf)), RelayErrorKind.MALFORMED_HEADER)).toBe(true);
  });

  it("reports a truncated tag block as MalformedTagBlock", () => {
    const buf = concat(ascii("fLaC"), encodeBlock(streaminfo()), new Uint8Array([0x84, 0, 0, 40]), new Uint8Array(10));
    expect(isRelayError(caught(() => decodeContainer(buf)), RelayErrorKind.MALFORMED_TAG_BLOCK)).toBe(true);
  });

  it("rejects a header region without a last block", () => {
    const buf = encodeContainer([streaminfo(), padding(4)]);
    expect(isRelayError(caught(() => decodeContainer(buf)), RelayErrorKind.MALFORMED_HEADER)).toBe(true);
  });
});

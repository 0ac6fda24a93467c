import { describe, it, expect, vi } from "vitest";
import { isRelayError, RelayErrorKind } from "../errors.js";
import { tagBlockEntries } from "../tags/vorbis-comment.js";
import { ascii, frames, opaque, padding, streaminfo, tags, toStream } from "../testing/flac-fixtures.js";
import { encodeContainer } from "./blocks.js";
import { readMetadata } from "./inspect.js";

describe("readMetadata", () => {
  it("lists the blocks and the first tag block", async () => {
    const input = encodeContainer(
      [streaminfo(), tags([{ key: "TITLE", value: "Song" }], { vendor: "ref" }), padding(8, true)],
      frames(100),
    );
    const meta = await readMetadata(toStream(input, 9));
    expect(meta.blocks.map((b) => b.kind)).toEqual(["streaminfo", "tags", "padding"]);
    expect(meta.tags?.vendor).toBe("ref");
    expect(meta.tags && tagBlockEntries(meta.tags)).toEqual([{ key: "TITLE", value: "Song" }]);
    // 4 + 38 + (4 + 25) + 12
    expect(meta.headerRegionLength).toBe(83);
  });

  it("leaves tags undefined when there is no tag block", async () => {
    const meta = await readMetadata(toStream(encodeContainer([streaminfo(), opaque(2, ascii("app"), true)])));
    expect(meta.tags).toBeUndefined();
    expect(meta.blocks[1]).toEqual(opaque(2, ascii("app"), true));
  });

  it("stops reading at the first audio byte", async () => {
    const header = encodeContainer([streaminfo(true)]);
    const cancel = vi.fn();
    let served = false;
    const source = new ReadableStream<Uint8Array>(
      {
        pull(ctrl): void {
          if (served) throw new Error("frames were requested");
          served = true;
          ctrl.enqueue(header);
        },
        cancel,
      },
      { highWaterMark: 0 },
    );
    const meta = await readMetadata(source);
    expect(meta.headerRegionLength).toBe(header.byteLength);
    expect(cancel).toHaveBeenCalledOnce();
  });

  it("rejects a stream that is not FLAC", async () => {
    await expect(readMetadata(toStream(ascii("RIFF....WAVE")))).rejects.toSatisfy((e: unknown) =>
      isRelayError(e, RelayErrorKind.INVALID_CONTAINER),
    );
  });

  it("rejects a truncated tag block", async () => {
    const input = encodeContainer([streaminfo(), tags([{ key: "A", value: "b" }], { lastBlock: true })]);
    await expect(readMetadata(toStream(input.slice(0, input.byteLength - 2)))).rejects.toSatisfy((e: unknown) =>
      isRelayError(e, RelayErrorKind.MALFORMED_TAG_BLOCK),
    );
  });
});

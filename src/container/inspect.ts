// readMetadata — reads the header region of a FLAC stream and stops at the
// first audio byte. The source is cancelled once the last block is parsed, so
// inspecting a remote object never downloads the frames.

import { ByteReader } from "../byte-reader.js";
import { BLOCK_HEADER_SIZE, BlockType, decodeBlockHeader } from "../block-header.js";
import { RelayError, RelayErrorKind, truncated } from "../errors.js";
import type { TagBlockBody } from "../tags/vorbis-comment.js";
import { blockFromBody, type MetadataBlock } from "./blocks.js";
import { FLAC_SIGNATURE } from "./walker.js";

export interface ContainerMetadata {
  readonly blocks: MetadataBlock[];
  /** Body of the first tag block, if any. */
  readonly tags?: TagBlockBody;
  /** Bytes from the signature up to the first audio frame. */
  readonly headerRegionLength: number;
}

export async function readMetadata(source: ReadableStream<Uint8Array>): Promise<ContainerMetadata> {
  const br = new ByteReader(source);
  try {
    const invalid = (): RelayError => new RelayError(RelayErrorKind.INVALID_CONTAINER, "missing fLaC signature");
    const sig = await br.readExact(FLAC_SIGNATURE.byteLength, invalid);
    if (!sig || !sig.every((b, i) => b === FLAC_SIGNATURE[i])) throw invalid();

    const blocks: MetadataBlock[] = [];
    while (true) {
      const raw = await br.readExact(BLOCK_HEADER_SIZE, truncated(RelayErrorKind.MALFORMED_HEADER, "block header"));
      if (!raw) throw new RelayError(RelayErrorKind.MALFORMED_HEADER, "stream ends before the last metadata block");
      const header = decodeBlockHeader(raw);
      if (header.type === BlockType.INVALID) {
        throw new RelayError(RelayErrorKind.MALFORMED_HEADER, "block type 127 is invalid");
      }
      const kind = header.type === BlockType.VORBIS_COMMENT ? RelayErrorKind.MALFORMED_TAG_BLOCK : RelayErrorKind.MALFORMED_HEADER;
      const onShort = truncated(kind, "block body");
      const body = await br.readExact(header.length, onShort);
      if (!body) throw onShort(header.length);
      blocks.push(blockFromBody(header, body));
      if (header.lastBlock) break;
    }

    const tags = blocks.find((b) => b.kind === "tags");
    return {
      blocks,
      ...(tags?.kind === "tags" ? { tags: tags.tags } : {}),
      headerRegionLength: br.position,
    };
  } finally {
    await br.cancel();
  }
}

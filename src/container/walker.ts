// Streaming FLAC metadata rewriter.
//
// rewriteContainer(source, plan) → ReadableStream<Uint8Array>
//
// The walker is a pull-driven state machine: every pull() of the output runs
// steps until at least one chunk was enqueued, so the consumer's backpressure
// reaches all the way back to the upstream read.
//
//   ExpectSignature  — "fLaC", else InvalidContainer
//   ExpectFixedInfo  — STREAMINFO header + 34-byte body, copied through
//   WalkBlocks       — one header per step:
//                        VORBIS_COMMENT → read whole body, rewrite, emit new length
//                        PADDING right after a rewritten tag block → reconcile
//                        anything else → copied in chunkSize slices
//                      A last block seen before any tag block is emitted with
//                      the flag cleared and followed by a synthesized tag block.
//   StreamFrames     — audio frames copied verbatim until EOF
//   Done / Failed
//
// Only the tag block body is ever held whole; every other body moves through in
// bounded slices.

import { ByteReader } from "../byte-reader.js";
import {
  BLOCK_HEADER_SIZE,
  BlockType,
  STREAMINFO_LENGTH,
  blockTypeName,
  decodeBlockHeader,
  encodeBlockHeader,
  withLastBlock,
  withLength,
  type BlockHeader,
} from "../block-header.js";
import { RelayError, RelayErrorKind, truncated } from "../errors.js";
import type { RewritePlan } from "../tags/rewrite-plan.js";
import { encodeTagBlockBody, rewriteTagBlock, synthesizeTagBlock } from "../tags/vorbis-comment.js";
import { reconcilePadding } from "./padding.js";

export const FLAC_SIGNATURE = new Uint8Array([0x66, 0x4c, 0x61, 0x43]); // "fLaC"

export const WalkerState = {
  EXPECT_SIGNATURE: "ExpectSignature",
  EXPECT_FIXED_INFO: "ExpectFixedInfo",
  WALK_BLOCKS: "WalkBlocks",
  STREAM_FRAMES: "StreamFrames",
  DONE: "Done",
  FAILED: "Failed",
} as const;

export type WalkerStateValue = (typeof WalkerState)[keyof typeof WalkerState];

export type BlockAction = "copied" | "rewritten" | "synthesized" | "reconciled";

export interface BlockEvent {
  /** The header as emitted. */
  readonly header: BlockHeader;
  readonly action: BlockAction;
  /** Emitted length minus source length; 0 for copied blocks. */
  readonly delta: number;
}

export interface RewriteOptions {
  onBlock?: (evt: BlockEvent) => void;
  /** Upper bound for passthrough slices, defaults to 64 KiB. */
  chunkSize?: number;
}

const DEFAULT_CHUNK_SIZE = 64 * 1024;

// A body in transit: `copy` bytes forwarded, then `skip` bytes dropped, then
// `zero` bytes of filler emitted.
interface BodyTransfer {
  copy: number;
  skip: number;
  zero: number;
  readonly onShort: (missing: number) => RelayError;
}

export function rewriteContainer(
  source: ReadableStream<Uint8Array>,
  plan: RewritePlan,
  opts?: RewriteOptions,
): ReadableStream<Uint8Array> {
  const walker = new ContainerWalker(new ByteReader(source), plan, opts);
  return new ReadableStream<Uint8Array>({
    async pull(ctrl): Promise<void> {
      await walker.pull(ctrl);
    },
    async cancel(reason): Promise<void> {
      await walker.cancel(reason);
    },
  });
}

class ContainerWalker {
  readonly #src: ByteReader;
  readonly #plan: RewritePlan;
  readonly #onBlock?: (evt: BlockEvent) => void;
  readonly #chunkSize: number;

  #state: WalkerStateValue = WalkerState.EXPECT_SIGNATURE;
  #body: BodyTransfer | undefined;
  #tagsSeen = false;
  // Set while the block in transit is the one carrying the last flag.
  #endsRegion = false;
  #synthesizeAfter = false;
  // Size change of the tag block just emitted, until the next header is read.
  #tagDelta: number | undefined;

  constructor(src: ByteReader, plan: RewritePlan, opts?: RewriteOptions) {
    this.#src = src;
    this.#plan = plan;
    this.#onBlock = opts?.onBlock;
    this.#chunkSize = opts?.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(this.#chunkSize) || this.#chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${this.#chunkSize}`);
    }
  }

  async pull(ctrl: ReadableStreamDefaultController<Uint8Array>): Promise<void> {
    let emitted = 0;
    const emit = (chunk: Uint8Array): void => {
      ctrl.enqueue(chunk);
      emitted++;
    };
    try {
      while (emitted === 0) {
        if (this.#state === WalkerState.DONE) {
          ctrl.close();
          return;
        }
        await this.#step(emit);
      }
    } catch (err) {
      this.#state = WalkerState.FAILED;
      ctrl.error(err);
      await this.#src.cancel(err);
    }
  }

  async cancel(reason: unknown): Promise<void> {
    this.#state = WalkerState.FAILED;
    await this.#src.cancel(reason);
  }

  async #step(emit: (chunk: Uint8Array) => void): Promise<void> {
    if (this.#body) {
      await this.#transferBody(this.#body, emit);
      return;
    }

    switch (this.#state) {
      case WalkerState.EXPECT_SIGNATURE:
        await this.#expectSignature(emit);
        return;
      case WalkerState.EXPECT_FIXED_INFO:
        await this.#expectFixedInfo(emit);
        return;
      case WalkerState.WALK_BLOCKS:
        await this.#walkBlock(emit);
        return;
      case WalkerState.STREAM_FRAMES: {
        const chunk = await this.#src.readSome(this.#chunkSize);
        if (!chunk) {
          this.#state = WalkerState.DONE;
          return;
        }
        emit(chunk);
        return;
      }
      default:
        throw new Error(`walker stepped in state ${this.#state}`);
    }
  }

  // ── States ──────────────────────────────────────────────────────────────────

  async #expectSignature(emit: (chunk: Uint8Array) => void): Promise<void> {
    const invalid = (): RelayError => new RelayError(RelayErrorKind.INVALID_CONTAINER, "missing fLaC signature");
    const sig = await this.#src.readExact(FLAC_SIGNATURE.byteLength, invalid);
    if (!sig || !sig.every((b, i) => b === FLAC_SIGNATURE[i])) throw invalid();
    emit(sig);
    this.#state = WalkerState.EXPECT_FIXED_INFO;
  }

  async #expectFixedInfo(emit: (chunk: Uint8Array) => void): Promise<void> {
    const header = await this.#readHeader();
    if (!header) throw new RelayError(RelayErrorKind.INVALID_CONTAINER, "stream ends before STREAMINFO");
    if (header.type !== BlockType.STREAMINFO || header.length !== STREAMINFO_LENGTH) {
      throw new RelayError(
        RelayErrorKind.INVALID_CONTAINER,
        `first block must be STREAMINFO of ${STREAMINFO_LENGTH} bytes, got ${blockTypeName(header.type)} of ${header.length}`,
      );
    }
    this.#state = WalkerState.WALK_BLOCKS;
    this.#passThrough(header, emit);
  }

  async #walkBlock(emit: (chunk: Uint8Array) => void): Promise<void> {
    const header = await this.#readHeader();
    if (!header) {
      throw new RelayError(RelayErrorKind.MALFORMED_HEADER, "stream ends before the last metadata block");
    }
    if (header.type === BlockType.INVALID) {
      throw new RelayError(RelayErrorKind.MALFORMED_HEADER, "block type 127 is invalid");
    }

    const tagDelta = this.#tagDelta;
    this.#tagDelta = undefined;

    if (header.type === BlockType.VORBIS_COMMENT) {
      await this.#rewriteTags(header, emit);
      return;
    }

    if (header.type === BlockType.PADDING && tagDelta !== undefined && tagDelta !== 0) {
      const { header: reconciled, changed } = reconcilePadding(header, tagDelta);
      if (changed) {
        this.#endsRegion = reconciled.lastBlock;
        emit(encodeBlockHeader(reconciled));
        this.#onBlock?.({ header: reconciled, action: "reconciled", delta: reconciled.length - header.length });
        this.#body = {
          copy: Math.min(header.length, reconciled.length),
          skip: Math.max(0, header.length - reconciled.length),
          zero: Math.max(0, reconciled.length - header.length),
          onShort: truncated(RelayErrorKind.MALFORMED_HEADER, `${blockTypeName(header.type)} body`),
        };
        this.#finishIfDrained(emit);
        return;
      }
    }

    this.#passThrough(header, emit);
  }

  // ── Blocks ──────────────────────────────────────────────────────────────────

  // Copies header and body; a last block that precedes any tag block loses its
  // flag here so the synthesized tag block can take it.
  #passThrough(header: BlockHeader, emit: (chunk: Uint8Array) => void): void {
    const synthesize = header.lastBlock && !this.#tagsSeen;
    const out = synthesize ? withLastBlock(header, false) : header;
    this.#endsRegion = header.lastBlock;
    this.#synthesizeAfter = synthesize;
    emit(encodeBlockHeader(out));
    this.#onBlock?.({ header: out, action: "copied", delta: 0 });
    this.#body = {
      copy: header.length,
      skip: 0,
      zero: 0,
      onShort: truncated(RelayErrorKind.MALFORMED_HEADER, `${blockTypeName(header.type)} body`),
    };
    if (header.length === 0) this.#finishBlock(emit);
  }

  async #rewriteTags(header: BlockHeader, emit: (chunk: Uint8Array) => void): Promise<void> {
    const onShort = truncated(RelayErrorKind.MALFORMED_TAG_BLOCK, "tag block");
    const body = await this.#src.readExact(header.length, onShort);
    if (!body) throw onShort(header.length);

    const rewritten = rewriteTagBlock(body, this.#plan);
    const out = withLength(header, rewritten.bytes.byteLength);
    const delta = out.length - header.length;
    emit(encodeBlockHeader(out));
    emit(rewritten.bytes);
    this.#onBlock?.({ header: out, action: "rewritten", delta });

    this.#tagsSeen = true;
    this.#tagDelta = delta;
    if (header.lastBlock) this.#state = WalkerState.STREAM_FRAMES;
  }

  #emitSynthesized(emit: (chunk: Uint8Array) => void): void {
    const { bytes } = encodeTagBlockBody(synthesizeTagBlock(this.#plan));
    const header: BlockHeader = { lastBlock: true, type: BlockType.VORBIS_COMMENT, length: bytes.byteLength };
    emit(encodeBlockHeader(header));
    emit(bytes);
    this.#onBlock?.({ header, action: "synthesized", delta: BLOCK_HEADER_SIZE + bytes.byteLength });
    this.#tagsSeen = true;
  }

  // ── Body transfer ───────────────────────────────────────────────────────────

  async #transferBody(body: BodyTransfer, emit: (chunk: Uint8Array) => void): Promise<void> {
    if (body.copy > 0) {
      const chunk = await this.#src.readSome(Math.min(body.copy, this.#chunkSize));
      if (!chunk) throw body.onShort(body.copy + body.skip);
      body.copy -= chunk.byteLength;
      emit(chunk);
    } else if (body.skip > 0) {
      await this.#src.skip(body.skip, body.onShort);
      body.skip = 0;
    } else if (body.zero > 0) {
      const n = Math.min(body.zero, this.#chunkSize);
      body.zero -= n;
      emit(new Uint8Array(n));
    }
    this.#finishIfDrained(emit);
  }

  #finishIfDrained(emit: (chunk: Uint8Array) => void): void {
    const body = this.#body;
    if (body && body.copy === 0 && body.skip === 0 && body.zero === 0) this.#finishBlock(emit);
  }

  #finishBlock(emit: (chunk: Uint8Array) => void): void {
    this.#body = undefined;
    if (this.#synthesizeAfter) {
      this.#synthesizeAfter = false;
      this.#emitSynthesized(emit);
    }
    if (this.#endsRegion) {
      this.#endsRegion = false;
      this.#state = WalkerState.STREAM_FRAMES;
    }
  }

  async #readHeader(): Promise<BlockHeader | null> {
    const bytes = await this.#src.readExact(BLOCK_HEADER_SIZE, truncated(RelayErrorKind.MALFORMED_HEADER, "block header"));
    return bytes ? decodeBlockHeader(bytes) : null;
  }
}

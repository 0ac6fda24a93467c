export { RelayError, RelayErrorKind, isRelayError, statusForError } from "./errors.js";
export type { RelayErrorKindValue, ErrorStatus } from "./errors.js";
export {
  BlockType,
  BLOCK_HEADER_SIZE,
  STREAMINFO_LENGTH,
  MAX_BLOCK_LENGTH,
  blockTypeName,
  encodeBlockHeader,
  decodeBlockHeader,
  withLength,
  withLastBlock,
} from "./block-header.js";
export type { BlockHeader, BlockTypeValue } from "./block-header.js";
export { ByteReader } from "./byte-reader.js";
export type { ShortReadError } from "./byte-reader.js";
export { TagEntry, createRewritePlan, foldKey, isTagEntry, parseTagAssignment, planKeys } from "./tags/rewrite-plan.js";
export type { RewritePlan } from "./tags/rewrite-plan.js";
export {
  parseTagBlock,
  serializeTagBlock,
  applyRewritePlan,
  rewriteTagBlock,
  synthesizeTagBlock,
  createTagBlock,
  makeComment,
  tagBlockEntries,
  tagBlockLength,
  encodeTagBlockBody,
} from "./tags/vorbis-comment.js";
export type { TagBlockBody, TagComment, RewrittenTagBlock } from "./tags/vorbis-comment.js";
export { reconcilePadding } from "./container/padding.js";
export type { PaddingReconciliation } from "./container/padding.js";
export { rewriteContainer, FLAC_SIGNATURE, WalkerState } from "./container/walker.js";
export type { RewriteOptions, BlockEvent, BlockAction, WalkerStateValue } from "./container/walker.js";
export { encodeContainer, decodeContainer, encodeBlock, blockFromBody, blockBody, blockType } from "./container/blocks.js";
export type { MetadataBlock, DecodedContainer } from "./container/blocks.js";
export { readMetadata } from "./container/inspect.js";
export type { ContainerMetadata } from "./container/inspect.js";
export { CatalogConfig, StoreConfig, RelayConfig, ServerConfig, parseRelayConfig, parseServerConfig, baseUrl } from "./config.js";
export { TrackRecord, ProtectedTag, isTrackRecord, planForTrack } from "./catalog/track-record.js";
export { CatalogClient } from "./catalog/client.js";
export { ObjectStoreClient } from "./store/client.js";
export type { FetchFn } from "./fetch.js";
export { TrackRelay, matchTrackPath, primeStream, FLAC_CONTENT_TYPE } from "./relay.js";
export type { TrackRelayOptions } from "./relay.js";
export { createRelayServer, handleNodeRequest, toRequest, writableSink } from "./server.js";

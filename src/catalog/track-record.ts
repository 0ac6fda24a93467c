// Catalog track record as returned by GET /api/v1/tracks/{id}, and the mapping
// from it to the tags the relay overwrites.
//
// Only the fields the relay needs are required; everything else is optional and
// unknown keys are ignored.

import { type } from "arktype";
import { createRewritePlan, type RewritePlan } from "../tags/rewrite-plan.js";

export const TrackRecord = type({
  title: "string",
  artist: "string",
  holding_id: "string",
  file_path: "string",
  "id?": "string | null",
  "album?": "string | null",
  "label?": "string | null",
  "added_at?": "string | null",
  "added_by?": "string | null",
  "disc_num?": "number | null",
  "track_num?": "number | null",
  "recording_mbid?": "string | null",
  "track_mbid?": "string | null",
  "has_fcc?": "string | null",
});
export type TrackRecord = typeof TrackRecord.infer;

export function isTrackRecord(x: unknown): x is TrackRecord {
  return !(TrackRecord(x) instanceof type.errors);
}

/** The Vorbis comment keys overwritten from the catalog. */
export const ProtectedTag = {
  TITLE: "TITLE",
  ARTIST: "ARTIST",
  ALBUM: "ALBUM",
  LABEL: "ORGANIZATION",
} as const;

// A key is planned only when the catalog has a value for it; the file's own
// tag survives otherwise.
export function planForTrack(track: TrackRecord): RewritePlan {
  return createRewritePlan({
    [ProtectedTag.TITLE]: track.title,
    [ProtectedTag.ARTIST]: track.artist,
    [ProtectedTag.ALBUM]: track.album ?? undefined,
    [ProtectedTag.LABEL]: track.label ?? undefined,
  });
}

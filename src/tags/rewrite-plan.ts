// RewritePlan — the authoritative tag values applied to a VORBIS_COMMENT block.
//
// Keys are normalised to upper case and unique within a plan; a later entry for
// the same key replaces the value of an earlier one but keeps its position.
// Field names follow the Vorbis comment rules: printable ASCII 0x20..0x7D
// excluding '='.

import { type } from "arktype";

export const TagEntry = type({
  key: /^[\x20-\x3C\x3E-\x7D]+$/,
  value: "string",
});
export type TagEntry = typeof TagEntry.infer;

export type RewritePlan = readonly TagEntry[];

export function isTagEntry(x: unknown): x is TagEntry {
  return !(TagEntry(x) instanceof type.errors);
}

export function createRewritePlan(entries: Iterable<TagEntry> | Readonly<Record<string, string | undefined>>): RewritePlan {
  const list: Iterable<TagEntry> = isIterable(entries) ? entries : recordEntries(entries);
  const byKey = new Map<string, string>();
  for (const entry of list) {
    const checked = TagEntry(entry);
    if (checked instanceof type.errors) {
      throw new RangeError(`invalid tag entry ${JSON.stringify(entry.key)}: ${checked.summary}`);
    }
    byKey.set(foldKey(checked.key), checked.value);
  }
  return [...byKey].map(([key, value]) => ({ key, value }));
}

export function planKeys(plan: RewritePlan): ReadonlySet<string> {
  return new Set(plan.map((e) => foldKey(e.key)));
}

// ASCII-only upper casing; String#toUpperCase would also map ı, ſ and friends.
export function foldKey(key: string): string {
  return key.replace(/[a-z]/g, (c) => String.fromCharCode(c.charCodeAt(0) - 32));
}

// Parses the CLI form KEY=VALUE; the value may itself contain '='.
export function parseTagAssignment(text: string): TagEntry {
  const eq = text.indexOf("=");
  if (eq <= 0) throw new RangeError(`expected KEY=VALUE, got ${JSON.stringify(text)}`);
  return { key: text.slice(0, eq), value: text.slice(eq + 1) };
}

function isIterable(x: object): x is Iterable<TagEntry> {
  return Symbol.iterator in x;
}

function* recordEntries(rec: Readonly<Record<string, string | undefined>>): Generator<TagEntry> {
  for (const [key, value] of Object.entries(rec)) {
    if (value !== undefined) yield { key, value };
  }
}

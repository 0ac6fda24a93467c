import { describe, it, expect, vi } from "vitest";
import { MockLogger } from "@adviser/cement";
import { decodeContainer, encodeContainer, type MetadataBlock } from "./container/blocks.js";
import { matchTrackPath, primeStream, TrackRelay } from "./relay.js";
import { tagBlockEntries } from "./tags/vorbis-comment.js";
import { bytes, fakeFetch, json, loginOk, status, type FakeRoute } from "./testing/fake-fetch.js";
import { ascii, collectBytes, frames, padding, streaminfo, tags } from "./testing/flac-fixtures.js";

const TRACK_ID = "7d444840-9dc0-11d1-b245-5ffdce74fad2";
const LOGIN = "http://catalog.test/api/v1/login";
const TRACK = `http://catalog.test/api/v1/tracks/${TRACK_ID}`;
const OBJECT = "http://store.test/h-1/music/a%2Fb.flac";

const config = {
  catalog: { url: "http://catalog.test", username: "relay", password: "test-secret" },
  store: { url: "http://store.test/" },
};

const record = {
  id: TRACK_ID,
  title: "New Title",
  artist: "New Artist",
  album: "New Album",
  label: null,
  holding_id: "h-1",
  file_path: "a/b.flac",
};

const sourceFile = encodeContainer(
  [
    streaminfo(),
    tags(
      [
        { key: "TITLE", value: "Old Title" },
        { key: "GENRE", value: "Jazz" },
        { key: "ORGANIZATION", value: "Old Label" },
        { key: "ARTIST", value: "Old" },
      ],
      { vendor: "ref" },
    ),
    padding(64, true),
  ],
  frames(500),
);

function setup(routes: Partial<Record<string, FakeRoute>> = {}): {
  relay: TrackRelay;
  upstream: ReturnType<typeof fakeFetch>;
  log: ReturnType<typeof MockLogger>;
} {
  const all: Record<string, FakeRoute> = {
    [LOGIN]: loginOk("sid=abc; Path=/"),
    [TRACK]: json(record),
    [OBJECT]: bytes(sourceFile),
  };
  for (const [url, route] of Object.entries(routes)) {
    if (route) all[url] = route;
  }
  const upstream = fakeFetch(all);
  const log = MockLogger();
  const relay = new TrackRelay(config, { fetch: upstream.fetch, logger: log.logger, chunkSize: 32 });
  return { relay, upstream, log };
}

const get = (path: string, method = "GET"): Request => new Request(`http://relay.test${path}`, { method });

function tagsOf(block: MetadataBlock | undefined): { key: string; value: string }[] {
  if (block?.kind !== "tags") throw new Error(`expected a tags block, got ${block?.kind}`);
  return tagBlockEntries(block.tags);
}

describe("matchTrackPath", () => {
  it("extracts the track id", () => {
    expect(matchTrackPath(`/track/${TRACK_ID}.flac`)).toBe(TRACK_ID);
  });

  it("rejects other shapes", () => {
    expect(matchTrackPath(`/track/${TRACK_ID}`)).toBeUndefined();
    expect(matchTrackPath(`/track/${TRACK_ID}.mp3`)).toBeUndefined();
    expect(matchTrackPath(`/track/${TRACK_ID.toUpperCase()}.flac`)).toBeUndefined();
    expect(matchTrackPath(`/tracks/${TRACK_ID}.flac`)).toBeUndefined();
    expect(matchTrackPath("/track/not-a-uuid.flac")).toBeUndefined();
  });
});

describe("TrackRelay", () => {
  it("streams the stored file with the catalog tags", async () => {
    const { relay, upstream } = setup();
    const res = await relay.handle(get(`/track/${TRACK_ID}.flac`));

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("audio/flac");
    const decoded = decodeContainer(new Uint8Array(await res.arrayBuffer()));
    expect(tagsOf(decoded.blocks[1])).toEqual([
      { key: "GENRE", value: "Jazz" },
      { key: "ORGANIZATION", value: "Old Label" },
      { key: "TITLE", value: "New Title" },
      { key: "ARTIST", value: "New Artist" },
      { key: "ALBUM", value: "New Album" },
    ]);
    expect(decoded.frames).toEqual(frames(500));
    expect(upstream.calls.map((c) => c.url)).toEqual([LOGIN, TRACK, OBJECT]);
  });

  it("keeps the file size when the padding absorbs the change", async () => {
    const { relay } = setup();
    const res = await relay.handle(get(`/track/${TRACK_ID}.flac`));
    const out = new Uint8Array(await res.arrayBuffer());
    expect(out.byteLength).toBe(sourceFile.byteLength);
    expect(decodeContainer(out).frameOffset).toBe(decodeContainer(sourceFile).frameOffset);
  });

  it("passes the request signal to the object fetch", async () => {
    const { relay, upstream } = setup();
    const res = await relay.handle(get(`/track/${TRACK_ID}.flac`));
    await res.body?.cancel();
    expect(upstream.callsTo(OBJECT)[0].signal).toBeInstanceOf(AbortSignal);
  });

  it("serves the next request after the catalog expires an earlier session", async () => {
    let issued = 0;
    const { relay, upstream } = setup({
      [LOGIN]: () => {
        issued++;
        return new Response(null, { status: 200, headers: [["set-cookie", `sid=${issued}; Path=/`]] });
      },
      [TRACK]: (call) =>
        call.headers.get("cookie") === `sid=${issued}`
          ? new Response(JSON.stringify(record), { status: 200 })
          : new Response("expired", { status: 401 }),
    });
    const first = await relay.handle(get(`/track/${TRACK_ID}.flac`));
    await first.arrayBuffer();
    const second = await relay.handle(get(`/track/${TRACK_ID}.flac`));
    await second.arrayBuffer();
    expect([first.status, second.status]).toEqual([200, 200]);
    expect(upstream.callsTo(LOGIN)).toHaveLength(2);
  });

  it("answers 404 for an unknown track without touching the store", async () => {
    const { relay, upstream } = setup({ [TRACK]: status(404) });
    const res = await relay.handle(get(`/track/${TRACK_ID}.flac`));
    expect(res.status).toBe(404);
    expect(await res.text()).toBe("Not Found");
    expect(upstream.callsTo(OBJECT)).toHaveLength(0);
  });

  it("logs a failed request with its numeric status", async () => {
    const { relay, log } = setup({ [TRACK]: status(404) });
    await relay.handle(get(`/track/${TRACK_ID}.flac`));
    await log.logger.Flush();
    expect(log.logCollector.Logs()).toEqual([
      expect.objectContaining({ level: "warn", method: "GET", status: 404, msg: "request failed" }),
    ]);
  });

  it("answers 404 for a path that is not a track", async () => {
    const { relay, upstream } = setup();
    const res = await relay.handle(get("/track/abc.flac"));
    expect(res.status).toBe(404);
    expect(upstream.calls).toHaveLength(0);
  });

  it("answers 405 for other methods", async () => {
    const { relay, upstream } = setup();
    const res = await relay.handle(get(`/track/${TRACK_ID}.flac`, "POST"));
    expect(res.status).toBe(405);
    expect(res.headers.get("allow")).toBe("GET");
    expect(upstream.calls).toHaveLength(0);
  });

  it("answers 502 when the store fails", async () => {
    const { relay } = setup({ [OBJECT]: status(500) });
    const res = await relay.handle(get(`/track/${TRACK_ID}.flac`));
    expect(res.status).toBe(502);
    expect(await res.text()).toBe("Bad Gateway");
  });

  it("answers 502 when the stored object is not FLAC", async () => {
    const { relay } = setup({ [OBJECT]: bytes(ascii("ID3\u0004 not a flac file")) });
    expect((await relay.handle(get(`/track/${TRACK_ID}.flac`))).status).toBe(502);
  });

  it("answers 502 when the catalog login fails", async () => {
    const { relay, upstream } = setup({ [LOGIN]: status(401) });
    expect((await relay.handle(get(`/track/${TRACK_ID}.flac`))).status).toBe(502);
    expect(upstream.callsTo(TRACK)).toHaveLength(0);
  });

  it("streams a track whose catalog record has null in unused fields", async () => {
    const { relay } = setup({
      [TRACK]: json({ ...record, added_at: null, added_by: null, disc_num: null, track_num: null }),
    });
    const res = await relay.handle(get(`/track/${TRACK_ID}.flac`));
    expect(res.status).toBe(200);
    await res.body?.cancel();
  });

  it("answers 502 for a malformed catalog record", async () => {
    const { relay } = setup({ [TRACK]: json({ id: TRACK_ID, title: "x" }) });
    expect((await relay.handle(get(`/track/${TRACK_ID}.flac`))).status).toBe(502);
  });

  it("commits 200 and errors the body when the file breaks after the signature", async () => {
    const broken = encodeContainer([streaminfo(), padding(100, true)]).slice(0, 60);
    const { relay } = setup({ [OBJECT]: bytes(broken) });
    const res = await relay.handle(get(`/track/${TRACK_ID}.flac`));
    expect(res.status).toBe(200);
    await expect(res.arrayBuffer()).rejects.toThrow();
  });
});

describe("primeStream", () => {
  it("replays the first chunk ahead of the rest", async () => {
    const src = new ReadableStream<Uint8Array>({
      start(ctrl): void {
        ctrl.enqueue(ascii("ab"));
        ctrl.enqueue(ascii("cd"));
        ctrl.close();
      },
    });
    const onLateError = vi.fn();
    expect(await collectBytes(await primeStream(src, onLateError))).toEqual(ascii("abcd"));
    expect(onLateError).not.toHaveBeenCalled();
  });

  it("rejects when the first chunk fails", async () => {
    const boom = new Error("bad start");
    const src = new ReadableStream<Uint8Array>({
      pull(ctrl): void {
        ctrl.error(boom);
      },
    });
    await expect(primeStream(src, vi.fn())).rejects.toBe(boom);
  });

  it("reports a later failure and errors the stream", async () => {
    const late = new Error("late");
    let n = 0;
    const src = new ReadableStream<Uint8Array>({
      pull(ctrl): void {
        if (n++ === 0) ctrl.enqueue(ascii("ok"));
        else ctrl.error(late);
      },
    });
    const onLateError = vi.fn();
    const primed = await primeStream(src, onLateError);
    await expect(collectBytes(primed)).rejects.toBe(late);
    expect(onLateError).toHaveBeenCalledWith(late);
  });

  it("closes at once for an empty source", async () => {
    const src = new ReadableStream<Uint8Array>({
      start(ctrl): void {
        ctrl.close();
      },
    });
    expect(await collectBytes(await primeStream(src, vi.fn()))).toEqual(new Uint8Array(0));
  });

  it("forwards cancellation to the source", async () => {
    const cancel = vi.fn();
    const src = new ReadableStream<Uint8Array>({
      start(ctrl): void {
        ctrl.enqueue(ascii("x"));
      },
      cancel,
    });
    await (await primeStream(src, vi.fn())).cancel("gone");
    expect(cancel).toHaveBeenCalledWith("gone");
  });
});

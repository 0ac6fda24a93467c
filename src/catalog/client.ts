// CatalogClient — session-based lookup of track records.
//
//   GET {url}/api/v1/login         HTTP Basic credentials → session cookies
//   GET {url}/api/v1/tracks/{id}   with the session cookies → TrackRecord JSON
//
// Every lookup logs in on its own and the cookies live only for that lookup,
// so requests share no session state. Nothing is retried.

import { type } from "arktype";
import { baseUrl, type CatalogConfig } from "../config.js";
import { RelayError, RelayErrorKind } from "../errors.js";
import type { FetchFn } from "../fetch.js";
import { TrackRecord } from "./track-record.js";

export class CatalogClient {
  readonly #base: string;
  readonly #config: CatalogConfig;
  readonly #fetch: FetchFn;

  constructor(config: CatalogConfig, fetchFn: FetchFn) {
    this.#base = baseUrl(config.url);
    this.#config = config;
    this.#fetch = fetchFn;
  }

  async lookup(trackId: string): Promise<TrackRecord> {
    const cookie = await this.#openSession();
    const url = `${this.#base}/api/v1/tracks/${encodeURIComponent(trackId)}`;
    const res = await this.#get(url, { cookie }, "catalog lookup");

    if (res.status === 404) {
      await res.body?.cancel();
      throw new RelayError(RelayErrorKind.NOT_FOUND, `track not found: ${trackId}`);
    }
    if (res.status !== 200) {
      await res.body?.cancel();
      throw new RelayError(RelayErrorKind.UPSTREAM_FETCH, `catalog lookup for ${trackId} returned ${res.status}`);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new RelayError(RelayErrorKind.UPSTREAM_FETCH, `catalog lookup for ${trackId} returned invalid JSON`, { cause: err });
    }
    const record = TrackRecord(json);
    if (record instanceof type.errors) {
      throw new RelayError(RelayErrorKind.UPSTREAM_FETCH, `catalog record for ${trackId} is malformed: ${record.summary}`);
    }
    return record;
  }

  async #openSession(): Promise<string> {
    const { username, password } = this.#config;
    const credentials = Buffer.from(`${username}:${password}`, "utf8").toString("base64");
    const res = await this.#get(`${this.#base}/api/v1/login`, { authorization: `Basic ${credentials}` }, "catalog login");
    await res.body?.cancel();
    if (!res.ok) {
      throw new RelayError(RelayErrorKind.UPSTREAM_FETCH, `catalog login returned ${res.status}`);
    }
    return res.headers
      .getSetCookie()
      .map((c) => c.split(";", 1)[0].trim())
      .filter(Boolean)
      .join("; ");
  }

  async #get(url: string, headers: Record<string, string>, what: string): Promise<Response> {
    try {
      return await this.#fetch(url, { method: "GET", headers });
    } catch (err) {
      throw new RelayError(RelayErrorKind.UPSTREAM_FETCH, `${what} failed`, { cause: err });
    }
  }
}

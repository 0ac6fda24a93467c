// ObjectStoreClient — plain GET of a stored track file.
//
//   GET {url}/{holding_id}/music/{file_path}
//
// Both path parts are escaped as single segments. The body is returned as a
// live stream; nothing is buffered here.

import { baseUrl, type StoreConfig } from "../config.js";
import { RelayError, RelayErrorKind } from "../errors.js";
import type { FetchFn } from "../fetch.js";

export class ObjectStoreClient {
  readonly #base: string;
  readonly #fetch: FetchFn;

  constructor(config: StoreConfig, fetchFn: FetchFn) {
    this.#base = baseUrl(config.url);
    this.#fetch = fetchFn;
  }

  objectUrl(holdingId: string, filePath: string): string {
    return `${this.#base}/${encodeURIComponent(holdingId)}/music/${encodeURIComponent(filePath)}`;
  }

  async fetchObject(holdingId: string, filePath: string, signal?: AbortSignal): Promise<ReadableStream<Uint8Array>> {
    const url = this.objectUrl(holdingId, filePath);
    let res: Response;
    try {
      res = await this.#fetch(url, { method: "GET", signal });
    } catch (err) {
      throw new RelayError(RelayErrorKind.UPSTREAM_FETCH, `object fetch failed: ${url}`, { cause: err });
    }
    if (res.status !== 200) {
      await res.body?.cancel();
      throw new RelayError(RelayErrorKind.UPSTREAM_FETCH, `object store returned ${res.status} for ${url}`);
    }
    if (!res.body) {
      throw new RelayError(RelayErrorKind.UPSTREAM_FETCH, `object store returned no body for ${url}`);
    }
    return res.body;
  }
}

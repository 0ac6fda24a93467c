// ByteReader — pulls exact byte counts from a ReadableStream, reassembling
// partial chunks. Only forward reads exist; nothing is ever pushed back except
// the unread tail of the last upstream chunk.

export type ShortReadError = (missing: number) => Error;

const defaultShortRead: ShortReadError = (missing) => new Error(`unexpected end of stream (${missing} bytes missing)`);

export class ByteReader {
  readonly #reader: ReadableStreamDefaultReader<Uint8Array>;
  #pending: Uint8Array | undefined;
  #position = 0;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.#reader = stream.getReader();
  }

  /** Number of bytes handed out so far. */
  get position(): number {
    return this.#position;
  }

  // Read exactly n bytes. Returns null only at a clean EOF (zero bytes read).
  async readExact(n: number, onShort: ShortReadError = defaultShortRead): Promise<Uint8Array | null> {
    if (n === 0) return new Uint8Array(0);

    const parts: Uint8Array[] = [];
    let have = 0;
    while (have < n) {
      const chunk = await this.#next();
      if (!chunk) {
        if (have === 0) return null;
        throw onShort(n - have);
      }
      const take = Math.min(chunk.byteLength, n - have);
      parts.push(chunk.subarray(0, take));
      if (take < chunk.byteLength) this.#pending = chunk.subarray(take);
      have += take;
    }
    this.#position += n;

    if (parts.length === 1) return parts[0];
    const out = new Uint8Array(n);
    let o = 0;
    for (const p of parts) {
      out.set(p, o);
      o += p.byteLength;
    }
    return out;
  }

  // Read at most max bytes from a single upstream chunk. Returns null at EOF.
  async readSome(max: number): Promise<Uint8Array | null> {
    if (max <= 0) throw new RangeError(`readSome needs a positive size, got ${max}`);
    const chunk = await this.#next();
    if (!chunk) return null;
    if (chunk.byteLength > max) {
      this.#pending = chunk.subarray(max);
      this.#position += max;
      return chunk.subarray(0, max);
    }
    this.#position += chunk.byteLength;
    return chunk;
  }

  // Discard exactly n bytes without holding more than one chunk.
  async skip(n: number, onShort: ShortReadError = defaultShortRead): Promise<void> {
    let left = n;
    while (left > 0) {
      const chunk = await this.readSome(left);
      if (!chunk) throw onShort(left);
      left -= chunk.byteLength;
    }
  }

  async cancel(reason?: unknown): Promise<void> {
    this.#pending = undefined;
    await this.#reader.cancel(reason);
  }

  async #next(): Promise<Uint8Array | null> {
    if (this.#pending) {
      const p = this.#pending;
      this.#pending = undefined;
      return p;
    }
    while (true) {
      const { done, value } = await this.#reader.read();
      if (done) return null;
      if (value.byteLength > 0) return value;
    }
  }
}

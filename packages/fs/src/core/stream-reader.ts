import type { Readable } from "node:stream"

const EMPTY = new Uint8Array(0)

/**
 * Pull-based reader over a single-pass byte stream that fills caller buffers
 * completely.
 *
 * The stream's `error` event is observed from construction on, so a stream
 * that fails before the first read surfaces its error from `readFull()`.
 */
export class StreamReader {
  private readonly chunks: AsyncIterator<unknown>
  private pending: Uint8Array = EMPTY
  private ended = false
  private failure: Error | null = null

  constructor(private readonly source: Readable) {
    source.on("error", (err: Error) => {
      this.failure ??= err
    })
    this.chunks = source[Symbol.asyncIterator]()
  }

  /**
   * Copy bytes into `buffer` until it is full or the stream ends.
   *
   * @returns bytes copied; less than `buffer.length` only when the stream ended
   */
  async readFull(buffer: Uint8Array): Promise<number> {
    let filled = 0

    while (filled < buffer.length) {
      if (this.pending.length === 0) {
        const next = await this.nextChunk()
        if (next === null) break

        this.pending = next
        continue
      }

      const count = Math.min(this.pending.length, buffer.length - filled)
      buffer.set(this.pending.subarray(0, count), filled)

      this.pending = this.pending.subarray(count)
      filled += count
    }

    return filled
  }

  /** Release the stream. Later stream errors are still absorbed. */
  destroy(): void {
    this.source.destroy()
  }

  private async nextChunk(): Promise<Uint8Array | null> {
    if (this.failure) throw this.failure
    if (this.ended) return null

    const result = await this.chunks.next()

    if (result.done) {
      this.ended = true
      return null
    }

    return toBytes(result.value)
  }
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk
  if (typeof chunk === "string") return Buffer.from(chunk)

  throw new TypeError(`Unsupported stream chunk type: ${typeof chunk}`)
}

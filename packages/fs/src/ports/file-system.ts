import type { ByteRange } from "./byte-range"

/**
 * Origin for `File.seek()`, numbered like `SEEK_SET`, `SEEK_CUR` and `SEEK_END`.
 */
export const SeekWhence = {
  Start: 0,
  Current: 1,
  End: 2,
} as const

export type SeekWhence = (typeof SeekWhence)[keyof typeof SeekWhence]

/**
 * Immutable stat record of an opened file.
 */
export interface FileInfo {
  /** Base name of the file, without directory components. */
  readonly name: string

  /** Size in bytes as reported by the store. */
  readonly size: number

  readonly modTime: Date

  /** Permission bits, e.g. `0o644`. */
  readonly mode: number

  /** Platform-specific data. Always `null` for remote objects. */
  readonly sys: null

  isDirectory(): boolean
}

/**
 * A readable file handle, the contract generic static file servers consume.
 *
 * Handles are single-reader: do not call `read()` concurrently with another
 * `read()` or with `close()`.
 */
export interface File {
  /**
   * Fill `buffer` completely from the file's content.
   *
   * @returns the number of bytes read, always `buffer.length`
   * @throws FileSystemError `end_of_stream` when no byte was left, or
   * `unexpected_end_of_stream` when the content ended part way through
   */
  read(buffer: Uint8Array): Promise<number>

  /** Release the underlying stream. Call at most once. */
  close(): Promise<void>

  stat(): FileInfo

  /**
   * Bytes of the object this handle's content covers when the store served a
   * partial object, `null` when the content is the whole object.
   */
  contentRange(): ByteRange | null

  /**
   * Not supported: always resolves to position `0` and leaves the read
   * position where it was.
   */
  seek(offset: number, whence: SeekWhence): Promise<number>

  /** Always resolves to an empty listing. */
  readdir(count: number): Promise<FileInfo[]>
}

export interface FileSystem {
  /** Open `name` for reading. Rejects with `not_found` when it does not exist. */
  open(name: string): Promise<File>
}

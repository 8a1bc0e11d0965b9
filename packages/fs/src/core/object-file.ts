import type { Readable } from "node:stream"
import type { ByteRange } from "../ports/byte-range"
import type { File, FileInfo, SeekWhence } from "../ports/file-system"
import { FileSystemError } from "./errors/file-system-error"
import { StreamReader } from "./stream-reader"

export interface ObjectFileOptions {
  /** Bytes of the object the body carries, when it is a partial response. */
  contentRange?: ByteRange
}

/**
 * File handle over one remote content stream and its stat record.
 *
 * Pass a `StreamReader` already built over the body when the body must be
 * watched for errors before the handle exists.
 */
export class ObjectFile implements File {
  private readonly reader: StreamReader
  private closed = false

  constructor(
    private readonly info: FileInfo,
    body: Readable | StreamReader,
    private readonly options: ObjectFileOptions = {},
  ) {
    this.reader = body instanceof StreamReader ? body : new StreamReader(body)
  }

  async read(buffer: Uint8Array): Promise<number> {
    if (this.closed) throw FileSystemError.fileClosed(this.info.name)

    const bytesRead = await this.reader.readFull(buffer)

    if (bytesRead === buffer.length) return bytesRead
    if (bytesRead === 0) throw FileSystemError.endOfStream(this.info.name)

    throw FileSystemError.unexpectedEndOfStream(this.info.name, {
      bytesRead,
      requested: buffer.length,
    })
  }

  async close(): Promise<void> {
    if (this.closed) return

    this.closed = true
    this.reader.destroy()
  }

  stat(): FileInfo {
    return this.info
  }

  contentRange(): ByteRange | null {
    return this.options.contentRange ?? null
  }

  /**
   * Seeking would need the whole object buffered locally. Serve another
   * range by opening through a `RangedObjectFileSystem` built for it.
   */
  async seek(_offset: number, _whence: SeekWhence): Promise<number> {
    return 0
  }

  async readdir(_count: number): Promise<FileInfo[]> {
    return []
  }
}

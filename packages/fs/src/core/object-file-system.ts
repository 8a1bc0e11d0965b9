import type { ByteRange } from "../ports/byte-range"
import type { TimeSource } from "../ports/clock"
import type { File, FileSystem } from "../ports/file-system"
import type { Logger } from "../ports/logger"
import type {
  Bytes,
  ObjectStoreClient,
  RemoteObject,
  StorageBucket,
  StorageKey,
} from "../ports/object-store"
import { baseName } from "./base-name"
import { createByteRange, formatRangeHeader, parseContentRange } from "./byte-range"
import { FileSystemError } from "./errors/file-system-error"
import { ObjectFileInfo } from "./file-info"
import { ObjectFile } from "./object-file"
import { StreamReader } from "./stream-reader"

export interface ObjectFileSystemDeps {
  store: ObjectStoreClient
  clock: TimeSource
  logger: Logger
}

export interface ObjectFileSystemOptions {
  bucket: StorageBucket
}

/**
 * Serves every object of one bucket as a file, keyed by the base name of the
 * requested path. Stateless: each `open()` issues its own GET.
 */
export class ObjectFileSystem implements FileSystem {
  protected readonly logger: Logger

  constructor(
    protected readonly deps: ObjectFileSystemDeps,
    protected readonly options: ObjectFileSystemOptions,
  ) {
    this.logger = deps.logger.child({ module: "object-file-system", bucket: options.bucket })
  }

  async open(name: string): Promise<File> {
    const key = baseName(name)
    const object = await this.fetchObject(key)

    if (!object) {
      throw FileSystemError.notFound({ name, bucket: this.options.bucket, key })
    }

    // watch the body for errors while the size lookup is in flight
    const reader = new StreamReader(object.body)

    const info = new ObjectFileInfo({
      name: key,
      size: await this.resolveSize(key, object),
      modTime: object.lastModified ?? this.deps.clock.now(),
    })

    const contentRange = this.servedRange(object)

    return new ObjectFile(info, reader, { ...(contentRange && { contentRange }) })
  }

  protected fetchObject(key: StorageKey): Promise<RemoteObject | null> {
    this.logger.debug("Opening object", { key })

    return this.deps.store.getObject({ bucket: this.options.bucket, key })
  }

  protected async resolveSize(_key: StorageKey, object: RemoteObject): Promise<Bytes> {
    return object.contentLength
  }

  protected servedRange(_object: RemoteObject): ByteRange | null {
    return null
  }
}

export interface RangedObjectFileSystemOptions extends ObjectFileSystemOptions {
  range: ByteRange
}

/**
 * Serves one fixed byte range of each opened object while `stat().size`
 * reports the full object size.
 *
 * @remarks
 * The range belongs to the instance: build one `RangedObjectFileSystem` per
 * range to serve (typically one per HTTP request). Each `open()` issues the
 * ranged GET and then a HEAD for the total size. When the HEAD fails the
 * file still opens and reports size 0.
 */
export class RangedObjectFileSystem extends ObjectFileSystem {
  private readonly range: ByteRange

  constructor(deps: ObjectFileSystemDeps, options: RangedObjectFileSystemOptions) {
    super(deps, options)
    this.range = options.range
  }

  protected override fetchObject(key: StorageKey): Promise<RemoteObject | null> {
    this.logger.debug("Opening object range", { key, range: formatRangeHeader(this.range) })

    return this.deps.store.getObject({
      bucket: this.options.bucket,
      key,
      range: this.range,
    })
  }

  protected override async resolveSize(key: StorageKey): Promise<Bytes> {
    try {
      const metadata = await this.deps.store.headObject({ bucket: this.options.bucket, key })

      if (!metadata) {
        this.logger.warn("Size lookup found no object, reporting size 0", { key })
        return 0
      }

      return metadata.contentLength
    } catch (err) {
      this.logger.warn("Size lookup failed, reporting size 0", { key, err })
      return 0
    }
  }

  /**
   * Range the store actually returned: its `Content-Range` when reported,
   * otherwise the requested start plus the content length.
   */
  protected override servedRange(object: RemoteObject): ByteRange | null {
    const reported = object.contentRange ? parseContentRange(object.contentRange) : null
    if (reported) return reported

    if (object.contentLength <= 0) return null

    return createByteRange(this.range.start, this.range.start + object.contentLength - 1)
  }
}

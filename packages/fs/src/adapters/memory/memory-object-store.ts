import { createHash } from "node:crypto"
import { Readable } from "node:stream"
import { FileSystemError } from "../../core/errors/file-system-error"
import type { TimeSource } from "../../ports/clock"
import type {
  GetObjectInput,
  ObjectRef,
  ObjectStoreClient,
  RemoteObject,
  RemoteObjectMetadata,
  StorageBucket,
  StorageKey,
} from "../../ports/object-store"

interface StoredObject {
  data: Buffer
  contentType?: string
  lastModified: Date
}

export interface MemoryObjectStoreDeps {
  clock: TimeSource
}

export interface MemoryPutOptions {
  contentType?: string
  lastModified?: Date
}

/**
 * In-process object store with S3 range semantics: the range end is clamped
 * to the last byte, and a start at or past the end is rejected.
 */
export class MemoryObjectStore implements ObjectStoreClient {
  private readonly buckets = new Map<StorageBucket, Map<StorageKey, StoredObject>>()

  constructor(private readonly deps: MemoryObjectStoreDeps) {}

  put(ref: ObjectRef, data: Buffer | Uint8Array | string, options?: MemoryPutOptions): void {
    this.getOrCreateBucket(ref.bucket).set(ref.key, {
      data: typeof data === "string" ? Buffer.from(data) : Buffer.from(data),
      lastModified: options?.lastModified ?? this.deps.clock.now(),
      ...(options?.contentType && { contentType: options.contentType }),
    })
  }

  delete(ref: ObjectRef): void {
    this.buckets.get(ref.bucket)?.delete(ref.key)
  }

  async getObject(input: GetObjectInput): Promise<RemoteObject | null> {
    const stored = this.getStoredObject(input)
    if (!stored) return null

    if (!input.range) {
      return {
        ...this.toMetadata(stored),
        body: Readable.from([Buffer.from(stored.data)]),
      }
    }

    const size = stored.data.length
    if (input.range.start >= size) {
      throw FileSystemError.invalidRange(input.range, "range not satisfiable", { size })
    }

    const end = Math.min(input.range.end, size - 1)
    const slice = Buffer.from(stored.data.subarray(input.range.start, end + 1))

    return {
      ...this.toMetadata(stored),
      contentLength: slice.length,
      contentRange: `bytes ${input.range.start}-${end}/${size}`,
      body: Readable.from([slice]),
    }
  }

  async headObject(ref: ObjectRef): Promise<RemoteObjectMetadata | null> {
    const stored = this.getStoredObject(ref)
    if (!stored) return null

    return this.toMetadata(stored)
  }

  private getOrCreateBucket(bucket: StorageBucket): Map<StorageKey, StoredObject> {
    let bucketMap = this.buckets.get(bucket)
    if (!bucketMap) {
      bucketMap = new Map()
      this.buckets.set(bucket, bucketMap)
    }
    return bucketMap
  }

  private getStoredObject(ref: ObjectRef): StoredObject | undefined {
    return this.buckets.get(ref.bucket)?.get(ref.key)
  }

  private toMetadata(stored: StoredObject): RemoteObjectMetadata {
    return {
      contentLength: stored.data.length,
      lastModified: stored.lastModified,
      etag: `"${createHash("md5").update(stored.data).digest("hex")}"`,
      ...(stored.contentType && { contentType: stored.contentType }),
    }
  }
}

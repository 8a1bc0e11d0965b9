import type { Readable } from "node:stream"
import type { ByteRange } from "./byte-range"

export type Bytes = number

/** Name of a bucket (or container) in the object store. */
export type StorageBucket = string

/** Object key within a bucket. */
export type StorageKey = string

export interface ObjectRef {
  bucket: StorageBucket
  key: StorageKey
}

export interface GetObjectInput extends ObjectRef {
  /** Inclusive byte range to fetch. The full object is fetched when absent. */
  range?: ByteRange
}

export type RemoteObjectMetadata = {
  /** Length of the content carried by this response, not always the object size. */
  contentLength: Bytes
  lastModified?: Date
  contentType?: string
  etag?: string
}

export interface RemoteObject extends RemoteObjectMetadata {
  /** Single-pass content stream. */
  body: Readable

  /** Raw `Content-Range` value for ranged responses, e.g. `bytes 0-99/1046`. */
  contentRange?: string
}

/**
 * Read-only access to a remote object store.
 *
 * Implementations resolve `null` when the key does not exist and reject for
 * every other failure, unchanged.
 */
export interface ObjectStoreClient {
  /** Fetch an object's content, optionally restricted to a byte range. */
  getObject(input: GetObjectInput): Promise<RemoteObject | null>

  /** Fetch object metadata without content. */
  headObject(ref: ObjectRef): Promise<RemoteObjectMetadata | null>
}

import { Readable } from "node:stream"
import { GetObjectCommand, HeadObjectCommand, type S3Client } from "@aws-sdk/client-s3"
import { formatRangeHeader } from "../../core/byte-range"
import type {
  GetObjectInput,
  ObjectRef,
  ObjectStoreClient,
  RemoteObject,
  RemoteObjectMetadata,
  StorageKey,
} from "../../ports/object-store"

export interface S3ObjectStoreDeps {
  client: S3Client
}

export interface S3ObjectStoreOptions {
  /** Prepended to every key, e.g. `"public/"`. */
  keyspacePrefix?: string
}

type S3MetadataResponse = {
  ContentLength?: number | undefined
  LastModified?: Date | undefined
  ContentType?: string | undefined
  ETag?: string | undefined
}

export class S3ObjectStore implements ObjectStoreClient {
  constructor(
    readonly deps: S3ObjectStoreDeps,
    readonly options: S3ObjectStoreOptions = {},
  ) {}

  async getObject(input: GetObjectInput): Promise<RemoteObject | null> {
    try {
      const response = await this.deps.client.send(
        new GetObjectCommand({
          Bucket: input.bucket,
          Key: this.prefixKey(input.key),
          ...(input.range && { Range: formatRangeHeader(input.range) }),
        }),
      )

      return {
        ...this.toMetadata(response),
        body: this.toReadable(response.Body),
        ...(response.ContentRange && { contentRange: response.ContentRange }),
      }
    } catch (err) {
      if (this.isNotFoundError(err)) return null
      throw err
    }
  }

  async headObject(ref: ObjectRef): Promise<RemoteObjectMetadata | null> {
    try {
      const response = await this.deps.client.send(
        new HeadObjectCommand({
          Bucket: ref.bucket,
          Key: this.prefixKey(ref.key),
        }),
      )

      return this.toMetadata(response)
    } catch (err) {
      if (this.isNotFoundError(err)) return null
      throw err
    }
  }

  private prefixKey(key: StorageKey): StorageKey {
    const prefix = this.options.keyspacePrefix
    if (!prefix) return key

    return prefix.endsWith("/") ? `${prefix}${key}` : `${prefix}/${key}`
  }

  private toMetadata(response: S3MetadataResponse): RemoteObjectMetadata {
    return {
      contentLength: response.ContentLength ?? 0,
      ...(response.LastModified && { lastModified: response.LastModified }),
      ...(response.ContentType && { contentType: response.ContentType }),
      ...(response.ETag && { etag: response.ETag }),
    }
  }

  private toReadable(body: unknown): Readable {
    if (body instanceof Readable) return body
    if (body === undefined) return Readable.from([])

    throw new TypeError("S3 response body is not a Node.js Readable stream")
  }

  private isNotFoundError(err: unknown): boolean {
    if (!(err instanceof Error)) return false
    return err.name === "NoSuchKey" || err.name === "NotFound"
  }
}

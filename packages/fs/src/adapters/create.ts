import { S3Client } from "@aws-sdk/client-s3"
import type { FileSystemConfig } from "../config/schema"
import { ObjectFileSystem, RangedObjectFileSystem } from "../core/object-file-system"
import type { ByteRange } from "../ports/byte-range"
import type { TimeSource } from "../ports/clock"
import type { FileSystem } from "../ports/file-system"
import type { Logger } from "../ports/logger"
import type { ObjectStoreClient, StorageBucket } from "../ports/object-store"
import { SystemClock } from "./clock/system-clock"
import { createNullLogger } from "./logger/null-logger"
import { createPinoLogger } from "./logger/pino-logger"
import { S3ObjectStore } from "./s3/s3-object-store"

export interface CreateFileSystemOptions {
  store: ObjectStoreClient
  bucket: StorageBucket
  clock?: TimeSource
  logger?: Logger
}

export function createFileSystem(options: CreateFileSystemOptions): FileSystem {
  return new ObjectFileSystem(
    {
      store: options.store,
      clock: options.clock ?? new SystemClock(),
      logger: options.logger ?? createNullLogger(),
    },
    { bucket: options.bucket },
  )
}

export interface CreateRangedFileSystemOptions extends CreateFileSystemOptions {
  range: ByteRange
}

export function createRangedFileSystem(options: CreateRangedFileSystemOptions): FileSystem {
  return new RangedObjectFileSystem(
    {
      store: options.store,
      clock: options.clock ?? new SystemClock(),
      logger: options.logger ?? createNullLogger(),
    },
    { bucket: options.bucket, range: options.range },
  )
}

export interface CreateS3ClientOptions {
  region: string

  /** Custom endpoint for S3-compatible stores. Enables path-style addressing. */
  endpoint?: string
}

export function createS3Client(options: CreateS3ClientOptions): S3Client {
  return new S3Client({
    region: options.region,
    ...(options.endpoint && { endpoint: options.endpoint, forcePathStyle: true }),
  })
}

export interface CreateS3FileSystemOptions extends CreateS3ClientOptions {
  bucket: StorageBucket
  keyspacePrefix?: string

  /** Reuse an existing client instead of building one from region/endpoint. */
  client?: S3Client
  clock?: TimeSource
  logger?: Logger
}

export function createS3FileSystem(options: CreateS3FileSystemOptions): FileSystem {
  return createFileSystem({ ...options, store: createS3Store(options) })
}

export interface CreateRangedS3FileSystemOptions extends CreateS3FileSystemOptions {
  range: ByteRange
}

/**
 * Build one per range to serve. Pass a shared `client` when building one per
 * request.
 */
export function createRangedS3FileSystem(
  options: CreateRangedS3FileSystemOptions,
): FileSystem {
  return createRangedFileSystem({ ...options, store: createS3Store(options) })
}

function createS3Store(options: CreateS3FileSystemOptions): S3ObjectStore {
  return new S3ObjectStore(
    { client: options.client ?? createS3Client(options) },
    {
      ...(options.keyspacePrefix !== undefined && {
        keyspacePrefix: options.keyspacePrefix,
      }),
    },
  )
}

export interface CreateFileSystemFromConfigDeps {
  client?: S3Client
  clock?: TimeSource

  /** Defaults to a pino logger built from `config.logging`. */
  logger?: Logger
}

/**
 * Build the S3-backed file system a loaded config describes: ranged when the
 * config carries a range, plain otherwise.
 */
export function createFileSystemFromConfig(
  config: FileSystemConfig,
  deps: CreateFileSystemFromConfigDeps = {},
): FileSystem {
  const options: CreateS3FileSystemOptions = {
    bucket: config.s3.bucket,
    region: config.s3.region,
    keyspacePrefix: config.s3.keyPrefix,
    logger: deps.logger ?? createPinoLogger({}, config.logging, { service: "bucketfs" }),
    ...(config.s3.endpoint !== undefined && { endpoint: config.s3.endpoint }),
    ...(deps.client && { client: deps.client }),
    ...(deps.clock && { clock: deps.clock }),
  }

  return config.range
    ? createRangedS3FileSystem({ ...options, range: config.range })
    : createS3FileSystem(options)
}

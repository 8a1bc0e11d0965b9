import {
  type ByteRange,
  createFileSystemFromConfig,
  type FileSystemConfig,
  type Logger,
  type S3Client,
} from "@bucketfs/fs"
import type { Hono } from "hono"
import { createFileServer, type FileServerOptions } from "./file-server"

export interface FileServerFromConfigDeps {
  client: S3Client
  logger: Logger
}

/**
 * Serve the bucket a loaded config describes. A configured range pins every
 * response to it; otherwise each `Range` header gets its own ranged file
 * system.
 */
export function createFileServerFromConfig(
  config: FileSystemConfig,
  deps: FileServerFromConfigDeps,
  options: FileServerOptions = {},
): Hono {
  return createFileServer(
    {
      fileSystem: createFileSystemFromConfig(config, deps),
      logger: deps.logger,
      ...(!config.range && {
        rangedFileSystem: (range: ByteRange) =>
          createFileSystemFromConfig({ ...config, range }, deps),
      }),
    },
    options,
  )
}

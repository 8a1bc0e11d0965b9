import {
  type ByteRange,
  type Bytes,
  byteRangeLength,
  type File,
  type FileSystem,
  isFileSystemError,
  type Logger,
} from "@bucketfs/fs"
import { type Context, Hono } from "hono"
import { contentTypeFor } from "./content-type"
import { createFileStream } from "./file-stream"
import { parseRangeHeader } from "./range-header"

export const DEFAULT_CHUNK_SIZE: Bytes = 64 * 1024

export interface FileServerDeps {
  /**
   * Serves requests without a usable `Range` header. When it is itself ranged,
   * every response is a 206 for its fixed range.
   */
  fileSystem: FileSystem
  logger: Logger

  /**
   * Builds a file system serving one byte range. Called once per request that
   * carries a single closed `Range` header; without it Range is ignored.
   */
  rangedFileSystem?: (range: ByteRange) => FileSystem
}

export interface FileServerOptions {
  /** Size of each full-buffer read while streaming a body. */
  chunkSize?: Bytes
}

type ErrorStatus = 404 | 416 | 500

export type ErrorResponse = {
  error: {
    status: ErrorStatus
    code: string
    message: string
  }
}

/**
 * Static file server answering `GET` and `HEAD` for every path from a
 * `FileSystem`.
 */
export function createFileServer(deps: FileServerDeps, options: FileServerOptions = {}): Hono {
  const app = new Hono()
  const logger = deps.logger.child({ module: "file-server" })
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE

  app.get("/*", async (c) => {
    const ranged = deps.rangedFileSystem
    const requested = ranged ? parseRangeHeader(c.req.header("range")) : null
    const fileSystem = requested && ranged ? ranged(requested) : deps.fileSystem

    const file = await fileSystem.open(c.req.path)
    const info = file.stat()

    c.header("Content-Type", contentTypeFor(info.name))
    c.header("Last-Modified", info.modTime.toUTCString())
    if (ranged) c.header("Accept-Ranges", "bytes")

    const served = file.contentRange()

    if (!served) {
      c.header("Content-Length", String(info.size))
      return respond(c, file, 200)
    }

    // size 0 means the total is unknown: the size lookup failed
    const total = info.size > 0 ? String(info.size) : "*"
    c.header("Content-Range", `bytes ${served.start}-${served.end}/${total}`)
    c.header("Content-Length", String(byteRangeLength(served)))

    return respond(c, file, 206)
  })

  app.onError((err, c) => {
    const response = toErrorResponse(err)
    const meta = {
      method: c.req.method,
      path: c.req.path,
      status: response.error.status,
    }

    if (response.error.status >= 500) {
      logger.error("Request failed", { ...meta, err })
    } else {
      logger.info("Request failed", meta)
      logger.debug("Request failed details", { ...meta, err })
    }

    const size = rangeNotSatisfiableSize(err)
    if (size !== null) c.header("Content-Range", `bytes */${size}`)

    return c.json(response, response.error.status)
  })

  function respond(c: Context, file: File, status: 200 | 206): Promise<Response> | Response {
    if (c.req.method === "HEAD") {
      return file.close().then(() => c.body(null, status))
    }

    return c.body(createFileStream(file, chunkSize), status)
  }

  return app
}

function toErrorResponse(err: unknown): ErrorResponse {
  if (isFileSystemError(err, "not_found")) {
    return { error: { status: 404, code: err.code, message: "File not found" } }
  }

  if (isFileSystemError(err, "invalid_range") || isInvalidRangeFromStore(err)) {
    return {
      error: { status: 416, code: "invalid_range", message: "Range not satisfiable" },
    }
  }

  return {
    error: { status: 500, code: "internal_error", message: "An unexpected error occurred" },
  }
}

/** S3 rejects a range starting past the object's end with `InvalidRange`. */
function isInvalidRangeFromStore(err: unknown): boolean {
  return err instanceof Error && err.name === "InvalidRange"
}

function rangeNotSatisfiableSize(err: unknown): number | null {
  if (!isFileSystemError(err, "invalid_range")) return null

  const size = err.context.size
  return typeof size === "number" ? size : null
}

import type { ByteRange } from "../../ports/byte-range"
import type { Bytes, StorageBucket, StorageKey } from "../../ports/object-store"
import { type SerializedError, serializeError } from "./serialize-error"

export type FileSystemErrorCode =
  | "not_found"
  | "end_of_stream"
  | "unexpected_end_of_stream"
  | "file_closed"
  | "invalid_range"
  | "invalid_config"

/**
 * Structured metadata attached to errors.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type FileSystemErrorOptions<C extends FileSystemErrorCode = FileSystemErrorCode> =
  Readonly<{
    code: C
    context?: ErrorContext
    cause?: unknown
    isOperational?: boolean
  }>

export class FileSystemError<
  C extends FileSystemErrorCode = FileSystemErrorCode,
> extends Error {
  readonly code: C
  readonly context: ErrorContext

  /**
   * `true` for expected runtime failures (missing object, short content),
   * `false` for programmer errors such as a malformed range.
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  constructor(message: string, options: FileSystemErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = "FileSystemError"
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }

  static notFound(input: {
    name: string
    bucket: StorageBucket
    key: StorageKey
  }): FileSystemError<"not_found"> {
    return new FileSystemError(`File does not exist: ${input.name}`, {
      code: "not_found",
      context: { name: input.name, bucket: input.bucket, key: input.key },
    })
  }

  static endOfStream(name: string): FileSystemError<"end_of_stream"> {
    return new FileSystemError(`End of stream reached: ${name}`, {
      code: "end_of_stream",
      context: { name, bytesRead: 0 },
    })
  }

  static unexpectedEndOfStream(
    name: string,
    input: { bytesRead: Bytes; requested: Bytes },
  ): FileSystemError<"unexpected_end_of_stream"> {
    return new FileSystemError(
      `Stream ended after ${input.bytesRead} of ${input.requested} bytes: ${name}`,
      {
        code: "unexpected_end_of_stream",
        context: { name, bytesRead: input.bytesRead, requested: input.requested },
      },
    )
  }

  static fileClosed(name: string): FileSystemError<"file_closed"> {
    return new FileSystemError(`File already closed: ${name}`, {
      code: "file_closed",
      context: { name },
      isOperational: false,
    })
  }

  static invalidRange(
    range: ByteRange,
    reason: string,
    context?: ErrorContext,
  ): FileSystemError<"invalid_range"> {
    return new FileSystemError(`Invalid byte range ${range.start}-${range.end}: ${reason}`, {
      code: "invalid_range",
      context: { start: range.start, end: range.end, ...context },
      isOperational: false,
    })
  }

  static invalidConfig(details: string): FileSystemError<"invalid_config"> {
    return new FileSystemError(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      isOperational: false,
    })
  }
}

/**
 * Type guard for `FileSystemError`, optionally narrowed to one code.
 *
 * @example
 * ```ts
 * try {
 *   await fileSystem.open("report.csv")
 * } catch (err) {
 *   if (isFileSystemError(err, "not_found")) return null
 *   throw err
 * }
 * ```
 */
export function isFileSystemError<C extends FileSystemErrorCode>(
  err: unknown,
  code?: C,
): err is FileSystemError<C> {
  if (!(err instanceof FileSystemError)) return false
  return code === undefined || err.code === code
}

/** `true` when `err` reports a file that does not exist. */
export function isNotFoundError(err: unknown): err is FileSystemError<"not_found"> {
  return isFileSystemError(err, "not_found")
}

/**
 * Number of bytes a full-buffer read left in the buffer before the content
 * ended, or `null` when `err` is not an end-of-stream condition.
 */
export function bytesReadBeforeEnd(err: unknown): Bytes | null {
  if (isFileSystemError(err, "end_of_stream")) return 0
  if (!isFileSystemError(err, "unexpected_end_of_stream")) return null

  const bytesRead = err.context.bytesRead
  return typeof bytesRead === "number" ? bytesRead : 0
}

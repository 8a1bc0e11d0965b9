import type { ByteRange } from "../ports/byte-range"
import { FileSystemError } from "./errors/file-system-error"

export function createByteRange(start: number, end: number): ByteRange {
  const range = { start, end }

  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw FileSystemError.invalidRange(range, "offsets must be integers")
  }
  if (start < 0) {
    throw FileSystemError.invalidRange(range, "start must not be negative")
  }
  if (start > end) {
    throw FileSystemError.invalidRange(range, "start must not exceed end")
  }

  return Object.freeze(range)
}

/** Number of bytes covered by the range. */
export function byteRangeLength(range: ByteRange): number {
  return range.end - range.start + 1
}

/** HTTP `Range` request header value, e.g. `bytes=0-99`. */
export function formatRangeHeader(range: ByteRange): string {
  return `bytes=${range.start}-${range.end}`
}

const CONTENT_RANGE = /^bytes (\d+)-(\d+)\/(?:\d+|\*)$/i

/**
 * Bytes covered by a `Content-Range` response value such as
 * `bytes 0-99/1046`, or `null` when the value is not a satisfied range.
 */
export function parseContentRange(value: string): ByteRange | null {
  const match = CONTENT_RANGE.exec(value.trim())
  if (!match) return null

  const start = Number(match[1])
  const end = Number(match[2])

  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || start > end) return null

  return createByteRange(start, end)
}

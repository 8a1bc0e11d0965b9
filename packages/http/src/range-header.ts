import { type ByteRange, createByteRange } from "@bucketfs/fs"

const SINGLE_CLOSED_RANGE = /^bytes=(\d+)-(\d+)$/i

/**
 * Parse a `Range` request header holding one closed range (`bytes=0-499`).
 *
 * Suffix ranges, open-ended ranges and multi-range requests return `null`;
 * the caller then serves the whole object, which HTTP permits.
 */
export function parseRangeHeader(header: string | undefined): ByteRange | null {
  if (!header) return null

  const match = SINGLE_CLOSED_RANGE.exec(header.trim())
  if (!match) return null

  const start = Number(match[1])
  const end = Number(match[2])

  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || start > end) {
    return null
  }

  return createByteRange(start, end)
}

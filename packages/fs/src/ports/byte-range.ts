/**
 * Inclusive byte offsets into an object's content.
 *
 * Built through `createByteRange()`, which enforces `0 <= start <= end`.
 */
export type ByteRange = Readonly<{
  start: number
  end: number
}>

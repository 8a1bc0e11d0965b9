import { type Bytes, bytesReadBeforeEnd, type File } from "@bucketfs/fs"

/**
 * Adapt a `File` to a web `ReadableStream` using full-buffer reads of
 * `chunkSize` bytes. A short read ends the stream.
 *
 * The file is closed once the stream ends, errors or is cancelled.
 */
export function createFileStream(file: File, chunkSize: Bytes): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const buffer = new Uint8Array(chunkSize)

      try {
        await file.read(buffer)
        controller.enqueue(buffer)
      } catch (err) {
        const bytesRead = bytesReadBeforeEnd(err)
        await file.close()

        if (bytesRead === null) {
          controller.error(err)
          return
        }

        if (bytesRead > 0) controller.enqueue(buffer.subarray(0, bytesRead))
        controller.close()
      }
    },

    cancel: () => file.close(),
  })
}

import { Readable } from "node:stream"
import {
  GetObjectCommand,
  type GetObjectCommandInput,
  HeadObjectCommand,
  type HeadObjectCommandInput,
  NoSuchKey,
  NotFound,
  type S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3"

type FakeS3Object = {
  data: Buffer
  lastModified: Date
  contentType?: string
}

export type FakeS3 = {
  client: S3Client
  put(bucket: string, key: string, data: Buffer | string, lastModified?: Date): void
  /** Commands received by `send`, in order. */
  commands: unknown[]
}

const RANGE_HEADER = /^bytes=(\d+)-(\d+)$/

/**
 * In-process stand-in for `S3Client` answering GetObject and HeadObject the
 * way S3 does, including `Range` handling and not-found error names.
 */
export function createFakeS3Client(): FakeS3 {
  const objects = new Map<string, FakeS3Object>()
  const commands: unknown[] = []

  const find = (input: { Bucket?: string | undefined; Key?: string | undefined }) =>
    objects.get(`${input.Bucket}/${input.Key}`)

  const getObject = (input: GetObjectCommandInput) => {
    const stored = find(input)
    if (!stored) {
      throw new NoSuchKey({ message: "The specified key does not exist.", $metadata: {} })
    }

    const size = stored.data.length
    const match = input.Range ? RANGE_HEADER.exec(input.Range) : null

    if (!match) {
      return {
        Body: Readable.from([Buffer.from(stored.data)]),
        ContentLength: size,
        LastModified: stored.lastModified,
        ETag: '"fake-etag"',
      }
    }

    const start = Number(match[1])
    const end = Math.min(Number(match[2]), size - 1)

    if (start >= size) {
      throw new S3ServiceException({
        name: "InvalidRange",
        $fault: "client",
        $metadata: { httpStatusCode: 416 },
        message: "The requested range is not satisfiable",
      })
    }

    const slice = Buffer.from(stored.data.subarray(start, end + 1))

    return {
      Body: Readable.from([slice]),
      ContentLength: slice.length,
      ContentRange: `bytes ${start}-${end}/${size}`,
      LastModified: stored.lastModified,
      ETag: '"fake-etag"',
    }
  }

  const headObject = (input: HeadObjectCommandInput) => {
    const stored = find(input)
    if (!stored) {
      throw new NotFound({ message: "Not Found", $metadata: { httpStatusCode: 404 } })
    }

    return {
      ContentLength: stored.data.length,
      LastModified: stored.lastModified,
      ETag: '"fake-etag"',
    }
  }

  const client = {
    send: async (command: unknown) => {
      commands.push(command)

      if (command instanceof GetObjectCommand) return getObject(command.input)
      if (command instanceof HeadObjectCommand) return headObject(command.input)

      throw new Error("Unsupported command")
    },
    destroy: () => {},
  } as unknown as S3Client

  return {
    client,
    commands,
    put(bucket, key, data, lastModified = new Date("2024-01-01T00:00:00.000Z")) {
      objects.set(`${bucket}/${key}`, {
        data: typeof data === "string" ? Buffer.from(data) : Buffer.from(data),
        lastModified,
      })
    },
  }
}

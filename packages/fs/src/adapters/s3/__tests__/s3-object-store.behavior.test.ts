import { GetObjectCommand, HeadObjectCommand, type S3Client } from "@aws-sdk/client-s3"
import { vi } from "vitest"
import { createByteRange } from "../../../core/byte-range"
import { createFakeS3Client } from "../../../tests/utils/create-fake-s3-client"
import { readAll } from "../../../tests/utils/read-all"
import { S3ObjectStore } from "../s3-object-store"

const BUCKET = "test-bucket"

describe("S3ObjectStore (behavior)", () => {
  describe("request mapping", () => {
    it("sends a Range header built from the inclusive byte range", async () => {
      const fake = createFakeS3Client()
      fake.put(BUCKET, "movie.mp4", "x".repeat(64))

      const store = new S3ObjectStore({ client: fake.client })
      await store.getObject({ bucket: BUCKET, key: "movie.mp4", range: createByteRange(0, 15) })

      const [command] = fake.commands
      expect(command).toBeInstanceOf(GetObjectCommand)
      expect((command as GetObjectCommand).input).toEqual({
        Bucket: BUCKET,
        Key: "movie.mp4",
        Range: "bytes=0-15",
      })
    })

    it("omits the Range header for full reads", async () => {
      const fake = createFakeS3Client()
      fake.put(BUCKET, "a.txt", "abc")

      const store = new S3ObjectStore({ client: fake.client })
      await store.getObject({ bucket: BUCKET, key: "a.txt" })

      expect((fake.commands[0] as GetObjectCommand).input).toEqual({
        Bucket: BUCKET,
        Key: "a.txt",
      })
    })

    it("uses HeadObject for metadata lookups", async () => {
      const fake = createFakeS3Client()
      fake.put(BUCKET, "a.txt", "abc")

      const store = new S3ObjectStore({ client: fake.client })
      const meta = await store.headObject({ bucket: BUCKET, key: "a.txt" })

      expect(fake.commands[0]).toBeInstanceOf(HeadObjectCommand)
      expect(meta).toEqual({
        contentLength: 3,
        lastModified: new Date("2024-01-01T00:00:00.000Z"),
        etag: '"fake-etag"',
      })
    })
  })

  describe("keyspacePrefix", () => {
    it("prepends the prefix with a single separator", async () => {
      const fake = createFakeS3Client()
      fake.put(BUCKET, "public/a.txt", "prefixed")

      const withSlash = new S3ObjectStore({ client: fake.client }, { keyspacePrefix: "public/" })
      const withoutSlash = new S3ObjectStore({ client: fake.client }, { keyspacePrefix: "public" })

      const a = await withSlash.getObject({ bucket: BUCKET, key: "a.txt" })
      const b = await withoutSlash.getObject({ bucket: BUCKET, key: "a.txt" })

      expect((await readAll(a!.body)).toString()).toBe("prefixed")
      expect((await readAll(b!.body)).toString()).toBe("prefixed")
    })
  })

  describe("error mapping", () => {
    it("propagates errors other than not-found unchanged", async () => {
      const failure = Object.assign(new Error("Access Denied"), { name: "AccessDenied" })
      const client = {
        send: vi.fn(async () => {
          throw failure
        }),
        destroy: vi.fn(),
      } as unknown as S3Client

      const store = new S3ObjectStore({ client })

      await expect(store.getObject({ bucket: BUCKET, key: "a.txt" })).rejects.toBe(failure)
      await expect(store.headObject({ bucket: BUCKET, key: "a.txt" })).rejects.toBe(failure)
    })

    it("maps NoSuchKey and NotFound to null", async () => {
      const fake = createFakeS3Client()
      const store = new S3ObjectStore({ client: fake.client })

      expect(await store.getObject({ bucket: BUCKET, key: "nope" })).toBeNull()
      expect(await store.headObject({ bucket: BUCKET, key: "nope" })).toBeNull()
    })
  })

  describe("response mapping fallbacks", () => {
    it("uses size 0, no modification time and an empty body when fields are absent", async () => {
      const client = {
        send: vi.fn(async () => ({
          Body: undefined,
          ContentLength: undefined,
          LastModified: undefined,
        })),
        destroy: vi.fn(),
      } as unknown as S3Client

      const store = new S3ObjectStore({ client })
      const obj = await store.getObject({ bucket: BUCKET, key: "k" })

      expect(obj!.contentLength).toBe(0)
      expect(obj!.lastModified).toBeUndefined()
      expect((await readAll(obj!.body)).length).toBe(0)
    })

    it("rejects a body that is not a Node.js stream", async () => {
      const client = {
        send: vi.fn(async () => ({ Body: "not a stream", ContentLength: 12 })),
        destroy: vi.fn(),
      } as unknown as S3Client

      const store = new S3ObjectStore({ client })

      await expect(store.getObject({ bucket: BUCKET, key: "k" })).rejects.toThrow(
        "S3 response body is not a Node.js Readable stream",
      )
    })
  })
})

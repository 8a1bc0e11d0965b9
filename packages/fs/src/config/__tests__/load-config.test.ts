import { isFileSystemError } from "../../core/errors/file-system-error"
import { loadFileSystemConfig } from "../load-config"

function loadError(env: Record<string, string | undefined>): unknown {
  try {
    loadFileSystemConfig({ env })
  } catch (err) {
    return err
  }
  return undefined
}

describe("loadFileSystemConfig", () => {
  it("applies defaults", () => {
    const config = loadFileSystemConfig({ env: { BUCKETFS_BUCKET: "public-sample-data" } })

    expect(config).toEqual({
      s3: { bucket: "public-sample-data", region: "us-east-1", keyPrefix: "" },
      logging: { level: "info", prettify: false },
    })
  })

  it("maps every variable", () => {
    const config = loadFileSystemConfig({
      env: {
        BUCKETFS_BUCKET: "media",
        BUCKETFS_REGION: "eu-west-1",
        BUCKETFS_ENDPOINT: "http://localhost:9000",
        BUCKETFS_KEY_PREFIX: "public/",
        BUCKETFS_RANGE_START: "0",
        BUCKETFS_RANGE_END: "1023",
        LOG_LEVEL: "debug",
        LOG_PRETTY: "true",
      },
    })

    expect(config).toEqual({
      s3: {
        bucket: "media",
        region: "eu-west-1",
        endpoint: "http://localhost:9000",
        keyPrefix: "public/",
      },
      range: { start: 0, end: 1023 },
      logging: { level: "debug", prettify: true },
    })
  })

  it("lets overrides win over env", () => {
    const config = loadFileSystemConfig({
      env: { BUCKETFS_BUCKET: "from-env", LOG_PRETTY: "true" },
      overrides: { BUCKETFS_BUCKET: "from-flag", LOG_PRETTY: undefined },
    })

    expect(config.s3.bucket).toBe("from-flag")
    expect(config.logging.prettify).toBe(true)
  })

  it("parses LOG_PRETTY=false as false", () => {
    const config = loadFileSystemConfig({
      env: { BUCKETFS_BUCKET: "media", LOG_PRETTY: "false" },
    })

    expect(config.logging.prettify).toBe(false)
  })

  it("rejects a missing bucket", () => {
    const err = loadError({})

    expect(isFileSystemError(err, "invalid_config")).toBe(true)
    expect(err).toHaveProperty("message", expect.stringContaining("BUCKETFS_BUCKET"))
  })

  it("rejects an unknown log level", () => {
    const err = loadError({ BUCKETFS_BUCKET: "media", LOG_LEVEL: "verbose" })

    expect(err).toHaveProperty("message", expect.stringContaining("LOG_LEVEL"))
  })

  it("rejects a negative offset", () => {
    const err = loadError({
      BUCKETFS_BUCKET: "media",
      BUCKETFS_RANGE_START: "-1",
      BUCKETFS_RANGE_END: "10",
    })

    expect(isFileSystemError(err, "invalid_config")).toBe(true)
    expect(err).toHaveProperty("message", expect.stringContaining("BUCKETFS_RANGE_START"))
  })

  it("rejects a blank offset instead of reading it as 0", () => {
    const err = loadError({
      BUCKETFS_BUCKET: "media",
      BUCKETFS_RANGE_START: "",
      BUCKETFS_RANGE_END: "10",
    })

    expect(isFileSystemError(err, "invalid_config")).toBe(true)
    expect(err).toHaveProperty("message", expect.stringContaining("BUCKETFS_RANGE_START"))
  })

  it("requires both range bounds", () => {
    const err = loadError({ BUCKETFS_BUCKET: "media", BUCKETFS_RANGE_START: "10" })

    expect(isFileSystemError(err, "invalid_config")).toBe(true)
    expect(err).toHaveProperty(
      "message",
      "Configuration validation failed:\nBUCKETFS_RANGE_START and BUCKETFS_RANGE_END must be set together",
    )
  })

  it("rejects a range whose start exceeds its end", () => {
    const err = loadError({
      BUCKETFS_BUCKET: "media",
      BUCKETFS_RANGE_START: "10",
      BUCKETFS_RANGE_END: "5",
    })

    expect(isFileSystemError(err, "invalid_config")).toBe(true)
    expect(err).toHaveProperty("message", expect.stringContaining("start must not exceed end"))
  })
})

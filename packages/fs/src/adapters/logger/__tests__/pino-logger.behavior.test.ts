import { Writable } from "node:stream"
import { describe, expect, it } from "vitest"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON lines with bindings and meta", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "debug", prettify: false },
      { service: "bucketfs" },
    )

    logger.debug("Opening object", { bucket: "media", key: "a.mp4" })

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!)).toMatchObject({
      level: 20,
      msg: "Opening object",
      service: "bucketfs",
      bucket: "media",
      key: "a.mp4",
    })
  })

  it("child() inherits the sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "bucketfs" })
    const child = base.child({ module: "object-file-system" })

    child.info("ignored")
    child.warn("Size lookup failed, reporting size 0")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!)).toMatchObject({
      msg: "Size lookup failed, reporting size 0",
      service: "bucketfs",
      module: "object-file-system",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    logger.error("Request failed", {
      err: new Error("outer", { cause: new Error("inner") }),
    })

    const payload = JSON.parse(lines[0]!)
    expect(payload.err.message).toContain("outer")
    expect(payload.err.type).toBe("Error")
  })
})

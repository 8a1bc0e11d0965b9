import { z } from "zod"
import { createByteRange } from "../core/byte-range"
import { FileSystemError, isFileSystemError } from "../core/errors/file-system-error"
import type { ByteRange } from "../ports/byte-range"
import { type EnvConfig, envSchema, type FileSystemConfig } from "./schema"

export type LoadFileSystemConfigOptions = {
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>

  /** Applied on top of `env`, e.g. values parsed from CLI flags. */
  overrides?: Record<string, string | undefined>
}

export function loadFileSystemConfig(
  options: LoadFileSystemConfigOptions = {},
): FileSystemConfig {
  const merged: Record<string, string> = {}

  for (const source of [options.env ?? process.env, options.overrides ?? {}]) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = envSchema.safeParse(merged)

  if (!result.success) {
    throw FileSystemError.invalidConfig(z.prettifyError(result.error))
  }

  return mapEnvToConfig(result.data)
}

export function mapEnvToConfig(env: EnvConfig): FileSystemConfig {
  const range = toRange(env.BUCKETFS_RANGE_START, env.BUCKETFS_RANGE_END)

  return {
    s3: {
      bucket: env.BUCKETFS_BUCKET,
      region: env.BUCKETFS_REGION,
      keyPrefix: env.BUCKETFS_KEY_PREFIX,
      ...(env.BUCKETFS_ENDPOINT !== undefined && { endpoint: env.BUCKETFS_ENDPOINT }),
    },
    ...(range && { range }),
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

function toRange(start: number | undefined, end: number | undefined): ByteRange | null {
  if (start === undefined && end === undefined) return null

  if (start === undefined || end === undefined) {
    throw FileSystemError.invalidConfig(
      "BUCKETFS_RANGE_START and BUCKETFS_RANGE_END must be set together",
    )
  }

  try {
    return createByteRange(start, end)
  } catch (err) {
    if (isFileSystemError(err, "invalid_range")) {
      throw FileSystemError.invalidConfig(err.message)
    }
    throw err
  }
}

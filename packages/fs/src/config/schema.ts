import { z } from "zod"
import type { ByteRange } from "../ports/byte-range"
import { type LogLevelName, logLevelNames } from "../ports/log-level"

// blank values are rejected instead of coercing to 0
const offset = z.string().trim().min(1).pipe(z.coerce.number<string>().int().nonnegative())

export const envSchema = z.object({
  BUCKETFS_BUCKET: z.string().min(1),
  BUCKETFS_REGION: z.string().min(1).default("us-east-1"),
  BUCKETFS_ENDPOINT: z.url().optional(),
  BUCKETFS_KEY_PREFIX: z.string().default(""),

  BUCKETFS_RANGE_START: offset.optional(),
  BUCKETFS_RANGE_END: offset.optional(),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type FileSystemConfig = {
  s3: {
    bucket: string
    region: string
    endpoint?: string
    keyPrefix: string
  }

  /** Present when both range bounds are configured. */
  range?: ByteRange

  logging: {
    level: LogLevelName
    prettify: boolean
  }
}

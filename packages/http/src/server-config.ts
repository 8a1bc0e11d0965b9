import { FileSystemError } from "@bucketfs/fs"
import { z } from "zod"

export const serverEnvSchema = z.object({
  BUCKETFS_HOST: z.string().min(1).default("0.0.0.0"),
  BUCKETFS_PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  BUCKETFS_CHUNK_SIZE: z.coerce.number().int().positive().default(64 * 1024),
})

export type ServerConfig = {
  host: string
  port: number
  chunkSize: number
}

export function loadServerConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  const result = serverEnvSchema.safeParse(env)

  if (!result.success) {
    throw FileSystemError.invalidConfig(z.prettifyError(result.error))
  }

  return {
    host: result.data.BUCKETFS_HOST,
    port: result.data.BUCKETFS_PORT,
    chunkSize: result.data.BUCKETFS_CHUNK_SIZE,
  }
}

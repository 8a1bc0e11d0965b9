import {
  createPinoLogger,
  createS3Client,
  type Logger,
  loadFileSystemConfig,
} from "@bucketfs/fs"
import { createFileServerFromConfig } from "../from-config"
import { listen } from "../listen"
import { loadServerConfig } from "../server-config"

export async function run(): Promise<void> {
  const config = loadFileSystemConfig()
  const serverConfig = loadServerConfig()

  const logger: Logger = createPinoLogger({}, config.logging, { service: "bucketfs" })
  const client = createS3Client({
    region: config.s3.region,
    ...(config.s3.endpoint !== undefined && { endpoint: config.s3.endpoint }),
  })

  const app = createFileServerFromConfig(
    config,
    { client, logger },
    { chunkSize: serverConfig.chunkSize },
  )

  const server = listen(app, serverConfig, logger)

  const stop = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, closing server`)
    server.close((err) => {
      if (err) {
        logger.error("Failed to close server", { err })
        process.exitCode = 1
      }
    })
  }

  process.once("SIGINT", stop)
  process.once("SIGTERM", stop)
}

if (import.meta.url === `file://${process.argv[1]}`) {
  run().catch((err) => {
    console.error(err)
    process.exitCode = 1
  })
}

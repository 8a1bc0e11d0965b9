import type { Logger } from "@bucketfs/fs"
import { serve, type ServerType } from "@hono/node-server"
import type { Hono } from "hono"
import type { ServerConfig } from "./server-config"

export function listen(
  app: Hono,
  config: Pick<ServerConfig, "host" | "port">,
  logger: Logger,
): ServerType {
  const server = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  })

  logger.info(`File server listening on http://${config.host}:${config.port}`)

  return server
}

export { contentTypeFor, DEFAULT_CONTENT_TYPE } from "./content-type"
export {
  createFileServer,
  DEFAULT_CHUNK_SIZE,
  type ErrorResponse,
  type FileServerDeps,
  type FileServerOptions,
} from "./file-server"
export { createFileStream } from "./file-stream"
export { parseRangeHeader } from "./range-header"
export { listen } from "./listen"
export { loadServerConfig, type ServerConfig, serverEnvSchema } from "./server-config"
export { createFileServerFromConfig, type FileServerFromConfigDeps } from "./from-config"

export { S3Client } from "@aws-sdk/client-s3"
export { SystemClock } from "./adapters/clock/system-clock"
export {
  type CreateFileSystemFromConfigDeps,
  type CreateFileSystemOptions,
  type CreateRangedFileSystemOptions,
  type CreateRangedS3FileSystemOptions,
  type CreateS3ClientOptions,
  type CreateS3FileSystemOptions,
  createFileSystem,
  createFileSystemFromConfig,
  createRangedFileSystem,
  createRangedS3FileSystem,
  createS3Client,
  createS3FileSystem,
} from "./adapters/create"
export { createNullLogger, NullLogger } from "./adapters/logger/null-logger"
export {
  createPinoLogger,
  PinoLogger,
  type PinoLoggerDeps,
} from "./adapters/logger/pino-logger"
export {
  MemoryObjectStore,
  type MemoryObjectStoreDeps,
  type MemoryPutOptions,
} from "./adapters/memory/memory-object-store"
export {
  S3ObjectStore,
  type S3ObjectStoreDeps,
  type S3ObjectStoreOptions,
} from "./adapters/s3/s3-object-store"
export {
  type LoadFileSystemConfigOptions,
  loadFileSystemConfig,
  mapEnvToConfig,
} from "./config/load-config"
export { type EnvConfig, envSchema, type FileSystemConfig } from "./config/schema"
export { baseName } from "./core/base-name"
export {
  byteRangeLength,
  createByteRange,
  formatRangeHeader,
  parseContentRange,
} from "./core/byte-range"
export {
  bytesReadBeforeEnd,
  type ErrorContext,
  FileSystemError,
  type FileSystemErrorCode,
  isFileSystemError,
  isNotFoundError,
} from "./core/errors/file-system-error"
export { type SerializedError, serializeError } from "./core/errors/serialize-error"
export { DEFAULT_FILE_MODE, ObjectFileInfo } from "./core/file-info"
export { ObjectFile, type ObjectFileOptions } from "./core/object-file"
export {
  ObjectFileSystem,
  type ObjectFileSystemDeps,
  type ObjectFileSystemOptions,
  RangedObjectFileSystem,
  type RangedObjectFileSystemOptions,
} from "./core/object-file-system"
export { StreamReader } from "./core/stream-reader"
export type { ByteRange } from "./ports/byte-range"
export type { TimeSource } from "./ports/clock"
export { type File, type FileInfo, type FileSystem, SeekWhence } from "./ports/file-system"
export type { LogContext, LogContextPatch, LogMeta } from "./ports/log-context"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
export type {
  Bytes,
  GetObjectInput,
  ObjectRef,
  ObjectStoreClient,
  RemoteObject,
  RemoteObjectMetadata,
  StorageBucket,
  StorageKey,
} from "./ports/object-store"

/**
 * Serialized error shape for logging and transport. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

type ErrorLike = Error & {
  code?: unknown
  context?: unknown
  isOperational?: unknown
  timestamp?: unknown
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Serialize any thrown value to a consistent shape.
 *
 * Errors that carry a string `code` (our own, the AWS SDK's, Node's system
 * errors) keep it; everything else gets `"unknown"`.
 */
export function serializeError(
  err: unknown,
  options?: SerializeOptions,
): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof Error) {
    const e: ErrorLike = err
    const cause: unknown = err.cause

    return {
      name: e.name,
      code: typeof e.code === "string" ? e.code : "unknown",
      message: e.message,
      context: isRecord(e.context) ? { ...e.context } : {},
      isOperational: typeof e.isOperational === "boolean" ? e.isOperational : false,
      timestamp:
        e.timestamp instanceof Date
          ? e.timestamp.toISOString()
          : new Date().toISOString(),
      ...(cause !== undefined && { cause: serializeError(cause, options) }),
      ...(includeStack && e.stack !== undefined && { stack: e.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

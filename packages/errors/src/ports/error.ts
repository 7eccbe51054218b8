export type ErrorCode = Lowercase<string>

/**
 * Structured data carried by an error (argument names, offending values).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call could succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected failures caused by the caller (bad arguments),
   * `false` for broken invariants inside the library.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for log sinks.
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

import type { ErrorCode } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "../base-error"

/**
 * @example
 * ```ts
 * throw createError("invariant_violation", "victim() returned undefined while over capacity", {
 *   context: { size, capacity },
 *   isOperational: false,
 * })
 * ```
 */
export function createError<C extends ErrorCode>(
  code: C,
  message: string,
  options?: Omit<BaseErrorOptions<C>, "code">,
): BaseError<C> {
  return new BaseError(message, { code, ...options })
}

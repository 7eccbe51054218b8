import { BaseError } from "@tidemark/errors"

export type InvalidArgumentErrorCode = "invalid_argument"

export class InvalidArgumentError extends BaseError<InvalidArgumentErrorCode> {
  static capacity(value: unknown, issues: readonly string[]): InvalidArgumentError {
    return new InvalidArgumentError(`capacity must be a positive integer, got: ${String(value)}`, {
      code: "invalid_argument",
      context: { argument: "capacity", value, issues },
      isRetryable: false,
    })
  }

  static options(detail: string): InvalidArgumentError {
    return new InvalidArgumentError(`Invalid cache options:\n${detail}`, {
      code: "invalid_argument",
      context: { argument: "options" },
      isRetryable: false,
    })
  }

  static nonEmptyStore(size: number): InvalidArgumentError {
    return new InvalidArgumentError(`store must be empty, it holds ${size} entries`, {
      code: "invalid_argument",
      context: { argument: "store", size },
      isRetryable: false,
    })
  }
}

export type EvictionStalledErrorCode = "eviction_stalled"

type StalledDetail = {
  evicted: number
  size: number
  capacity: number
}

export class EvictionStalledError extends BaseError<EvictionStalledErrorCode> {
  static refilled(operation: "add" | "resize", detail: StalledDetail): EvictionStalledError {
    return new EvictionStalledError(
      `${operation} stopped after ${detail.evicted} evictions: listeners refilled the cache to ${detail.size}/${detail.capacity}`,
      {
        code: "eviction_stalled",
        context: { operation, ...detail },
        isRetryable: false,
      },
    )
  }
}

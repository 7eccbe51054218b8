import { z } from "zod"
import type { LruCacheOptions } from "../../ports/cache-options"
import { InvalidArgumentError } from "../errors/lru-cache.errors"

export const DEFAULT_CAPACITY = 5

/**
 * Coerces, so a string read from the environment or a JSON file passes.
 */
export const capacitySchema = z.coerce.number().int().positive().max(Number.MAX_SAFE_INTEGER)

export const lruCacheOptionsSchema = z.object({
  capacity: capacitySchema.default(DEFAULT_CAPACITY),
  name: z.string().min(1).optional(),
})

export function parseCapacity(value: unknown): number {
  const result = capacitySchema.safeParse(value)

  if (!result.success) {
    throw InvalidArgumentError.capacity(
      value,
      result.error.issues.map((issue) => issue.message),
    )
  }

  return result.data
}

/**
 * Validate raw options (e.g. `{ capacity: process.env.SESSION_CACHE_SIZE }`).
 *
 * @throws InvalidArgumentError listing every failing field
 */
export function parseLruCacheOptions(input: unknown): LruCacheOptions {
  const result = lruCacheOptionsSchema.safeParse(input ?? {})

  if (!result.success) {
    throw InvalidArgumentError.options(z.prettifyError(result.error))
  }

  return result.data
}

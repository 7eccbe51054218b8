import { Writable } from "node:stream"
import { isAppError } from "@tidemark/errors"
import { createPinoLogger } from "@tidemark/logger"
import { createLruCache, InvalidArgumentError, LruCache, parseLruCacheOptions } from ".."

describe("@tidemark/lru-cache public API", () => {
  it("keeps the two most recently touched keys", () => {
    const cache = createLruCache<string, string>(2)

    cache.add("key0", "value0")
    cache.add("key1", "value1")
    cache.get("key0")
    cache.add("key2", "value2")

    expect(cache.get("key1")).toEqual({ kind: "miss" })
    expect(cache.get("key0")).toEqual({ kind: "hit", value: "value0" })
    expect(cache.get("key2")).toEqual({ kind: "hit", value: "value2" })
  })

  it("builds a cache from parsed options", () => {
    const opts = parseLruCacheOptions({ capacity: "2", name: "sessions" })
    const cache = new LruCache<string, number>(opts)

    expect(cache.capacity).toBe(2)
  })

  it("throws an app error for a bad capacity", () => {
    let caught: unknown

    try {
      createLruCache(0)
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(InvalidArgumentError)
    expect(isAppError(caught)).toBe(true)
  })

  it("writes evictions through a pino logger", () => {
    const lines: Record<string, unknown>[] = []
    const destination = new Writable({
      write(chunk, _encoding, cb) {
        lines.push(JSON.parse(String(chunk)))
        cb()
      },
    })

    const cache = new LruCache<string, string>(
      { capacity: 1, name: "sessions" },
      { logger: createPinoLogger({ destination }, { level: "debug" }) },
    )

    cache.add("a", "1")
    cache.add("b", "2")

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      level: 20,
      msg: "evicted entry",
      module: "lru-cache",
      cache: "sessions",
      reason: "capacity",
    })
  })
})

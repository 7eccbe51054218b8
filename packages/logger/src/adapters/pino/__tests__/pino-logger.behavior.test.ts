import { Writable } from "node:stream"

import { LogLevels } from "../../../ports/log-level"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = String(chunk).trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("writes JSON lines to the given destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { service: "svc" })

    logger.info("capacity changed", { from: 4, to: 2 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({ msg: "capacity changed", service: "svc", from: 4, to: 2 })
    expect(typeof payload.time).toBe("number")
    expect(payload.level).toBe(LogLevels.Info)
  })

  it("child() shares the parent's sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const child = new PinoLogger({ destination }, { level: "warn" }).child({ module: "lru-cache" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ msg: "logged", module: "lru-cache" })
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info" })

    logger.error("listener failed", {
      err: new Error("outer", { cause: new Error("inner") }),
    })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err.message).toBe("outer")
    expect(payload.err.type).toBe("Error")
    expect(payload.err.cause.message).toBe("inner")
  })
})

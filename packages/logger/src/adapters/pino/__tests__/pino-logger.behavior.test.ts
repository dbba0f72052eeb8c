import { Writable } from "node:stream"
import { BaseError } from "@multiprobe/errors"
import { createLogger } from "../../../core/create-logger"
import { PinoLogger } from "../pino-logger"

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
  it("emits JSON lines with bound context and per-call meta", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { component: "cuckoo-table" })

    logger.debug("cuckoo table grown", { fromCapacity: 16, toCapacity: 32 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({
      msg: "cuckoo table grown",
      component: "cuckoo-table",
      fromCapacity: 16,
      toCapacity: 32,
      level: 20,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("emits an entry without meta", () => {
    const { lines, destination } = makeLineDestination()

    new PinoLogger({ destination }, { level: "info" }).info("ready")

    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ msg: "ready", level: 30 })
  })

  it("child() writes to the parent's sink at the parent's level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { component: "replicated-table" })
    const child = base.child({ table: "peers" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      msg: "logged",
      component: "replicated-table",
      table: "peers",
    })
  })

  it("serializes err with its code and cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "info" })
    const err = new BaseError("growth refused", {
      code: "capacity_exceeded",
      cause: new RangeError("Invalid array length"),
    })

    logger.error("insert failed", { err })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err).toMatchObject({
      type: "BaseError",
      message: "growth refused",
      code: "capacity_exceeded",
      cause: { type: "RangeError", message: "Invalid array length" },
    })
  })

  it("createLogger() builds a pino logger over the given destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createLogger({ level: "debug", destination, context: { service: "demo" } })

    logger.trace("hidden")
    logger.debug("shown")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ msg: "shown", service: "demo" })
  })
})

import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

function duck(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: "DuckError",
    message: "quack",
    code: "duck",
    context: { slot: 4 },
    isOperational: true,
    timestamp: new Date(),
    ...overrides,
  }
}

describe("isAppError", () => {
  describe("returns true", () => {
    it("for a BaseError", () => {
      expect(isAppError(new BaseError("test", { code: "test" }))).toBe(true)
    })

    it("for a subclass of BaseError", () => {
      class CapacityError extends BaseError<"capacity_exceeded"> {
        constructor() {
          super("too big", { code: "capacity_exceeded" })
        }
      }

      expect(isAppError(new CapacityError())).toBe(true)
    })

    it("for a duck-typed object with every field", () => {
      expect(isAppError(duck())).toBe(true)
    })
  })

  describe("returns false", () => {
    it.each([null, undefined, "error", 500])("for %s", (value) => {
      expect(isAppError(value)).toBe(false)
    })

    it("for a plain Error", () => {
      expect(isAppError(new Error("plain"))).toBe(false)
    })

    it.each(["code", "context", "isOperational", "timestamp", "message", "name"])(
      "when %s is missing",
      (field) => {
        const value = duck()
        delete value[field]

        expect(isAppError(value)).toBe(false)
      },
    )

    it("for an invalid timestamp", () => {
      expect(isAppError(duck({ timestamp: new Date("invalid") }))).toBe(false)
    })
  })
})

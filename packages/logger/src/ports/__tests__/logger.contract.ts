import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** An entry as its sink received it, with the message lifted out of the fields. */
export type LogLine = {
  level: LogLevelName
  message: string
  fields: Record<string, unknown>
}

export type CapturingLogger = {
  logger: Logger
  lines: () => LogLine[]
}

/** Runs the shared Logger behaviour against an adapter writing to memory. */
export function describeLoggerContract(
  name: string,
  capture: (level: LogLevelName) => CapturingLogger,
) {
  describe(`Logger contract: ${name}`, () => {
    it("child() inherits parent context and adds its own", () => {
      const { logger, lines } = capture("trace")

      logger.child({ module: "config" }).child({ configFile: "config.yml" }).info("loaded")

      expect(lines()).toHaveLength(1)
      expect(lines()[0]?.message).toBe("loaded")
      expect(lines()[0]?.fields).toMatchObject({ module: "config", configFile: "config.yml" })
    })

    it("child() does not mutate the parent", () => {
      const { logger, lines } = capture("trace")

      const parent = logger.child({ module: "config" })
      const child = parent.child({ pass: "regenerated" })

      parent.info("parent")
      child.info("child")

      expect(lines().map((line) => line.message)).toEqual(["parent", "child"])
      expect(lines()[0]?.fields).not.toHaveProperty("pass")
      expect(lines()[1]?.fields).toMatchObject({ module: "config", pass: "regenerated" })
    })

    it("a child's context overrides the parent's", () => {
      const { logger, lines } = capture("trace")

      logger.child({ pass: "initial" }).child({ pass: "regenerated" }).warn("archived")

      expect(lines()[0]?.fields).toMatchObject({ pass: "regenerated" })
    })

    it("per-call meta is included in the entry", () => {
      const { logger, lines } = capture("trace")

      logger.warn("repaired", { key: "transfer.command" })

      expect(lines()[0]).toMatchObject({
        level: "warn",
        message: "repaired",
        fields: { key: "transfer.command" },
      })
    })

    it("drops entries below the configured level", () => {
      const { logger, lines } = capture("warn")

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(lines().map((line) => line.level)).toEqual(["warn", "error"])
    })
  })
}

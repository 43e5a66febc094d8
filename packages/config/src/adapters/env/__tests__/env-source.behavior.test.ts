import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns every variable without a prefix", async () => {
    const source = new EnvSource({ env: { LOG_LEVEL: "debug", DATA_DIR: "./data" } })

    await expect(source.load()).resolves.toEqual({ LOG_LEVEL: "debug", DATA_DIR: "./data" })
  })

  it("keeps only prefixed variables and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "TALLY_",
      env: { TALLY_LOG_LEVEL: "warn", TALLY_DATA_DIR: "/var/tally", HOME: "/root" },
    })

    await expect(source.load()).resolves.toEqual({ LOG_LEVEL: "warn", DATA_DIR: "/var/tally" })
  })

  it("treats empty variables as unset", async () => {
    const source = new EnvSource({ env: { LOG_LEVEL: "", LOG_PRETTY: "true", OTHER: undefined } })

    await expect(source.load()).resolves.toEqual({ LOG_PRETTY: "true" })
  })
})

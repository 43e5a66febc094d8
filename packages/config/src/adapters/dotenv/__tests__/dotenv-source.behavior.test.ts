import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "tally-dotenv-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("is named after its file", () => {
    expect(new DotenvSource({ file: ".env.production", required: false }).name).toBe(
      "dotenv:.env.production",
    )
  })

  it("parses assignments, quotes and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# data\nDATA_DIR='./data dir'\nSERVICE_NAME=\"economy\"\nLOG_LEVEL=info\n",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).resolves.toEqual({
      DATA_DIR: "./data dir",
      SERVICE_NAME: "economy",
      LOG_LEVEL: "info",
    })
  })

  it("loads nothing from a missing optional file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: false, cwd })

    await expect(source.load()).resolves.toEqual({})
  })

  it("fails on a missing required file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })

  it("resolves the file against cwd", async () => {
    const nested = path.join(cwd, "deploy")
    await fs.mkdir(nested)
    await fs.writeFile(path.join(nested, ".env"), "APP_ENV=staging")

    const source = new DotenvSource({ file: ".env", required: true, cwd: nested })

    await expect(source.load()).resolves.toEqual({ APP_ENV: "staging" })
  })
})

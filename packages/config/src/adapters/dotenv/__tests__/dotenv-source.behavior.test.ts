import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "keyscope-dotenv-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("parses pairs, quotes and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# local redis\nREDIS_URL=redis://localhost:6380\nSERVICE_NAME='key browser'\nAPP_ENV=\"test\"\n",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(source.name).toBe("dotenv:.env")
    expect(await source.load()).toEqual({
      REDIS_URL: "redis://localhost:6380",
      SERVICE_NAME: "key browser",
      APP_ENV: "test",
    })
  })

  it("returns an empty object for a missing optional file", async () => {
    const source = new DotenvSource({ file: ".env.local", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("rejects for a missing required file", async () => {
    const source = new DotenvSource({ file: ".env.local", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })
})

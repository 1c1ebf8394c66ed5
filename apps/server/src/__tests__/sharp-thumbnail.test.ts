import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { loadServerConfig } from "@thumbspace/env"
import { createErrorLogger } from "@thumbspace/error-logger"
import { SharpImageResizer, SourceStore, VariantCache } from "@thumbspace/images"
import sharp from "sharp"
import { afterAll, beforeAll, describe, expect, it } from "vitest"
import { createApp } from "../app.js"

const silent = createErrorLogger({ sink: () => {} })

describe("thumbnails rendered with sharp", () => {
  let tempDir: string
  let app: ReturnType<typeof createApp>

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "thumbspace-sharp-test-"))
    const config = loadServerConfig({
      THUMBSPACE_SOURCE_DIR: path.join(tempDir, "source"),
      THUMBSPACE_THUMBNAIL_DIR: path.join(tempDir, "thumbnail"),
      NODE_ENV: "test",
    })
    const sources = new SourceStore({ basePath: config.sourceDir, logger: silent })
    const cache = new VariantCache({
      basePath: config.thumbnailDir,
      sources,
      resizer: new SharpImageResizer(),
      logger: silent,
    })
    app = createApp({ config, sources, cache, logger: silent })

    const image = await sharp({
      create: { width: 800, height: 400, channels: 3, background: { r: 30, g: 90, b: 160 } },
    })
      .png()
      .toBuffer()
    const res = await app.request("/source/banners/sky.png", { method: "PUT", body: image })
    expect(res.status).toBe(200)
  })

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  async function render(query: string) {
    const res = await app.request(`/thumbnail/banners/sky.png?${query}`)
    expect(res.status).toBe(200)
    expect(res.headers.get("content-type")).toBe("image/png")
    const { width, height } = await sharp(Buffer.from(await res.arrayBuffer())).metadata()
    return { width, height }
  }

  it("should fit inside the requested box", async () => {
    expect(await render("w=100&h=100&m=1")).toEqual({ width: 100, height: 50 })
  })

  it("should crop to cover the requested box", async () => {
    expect(await render("w=200&h=200&m=2")).toEqual({ width: 200, height: 200 })
  })

  it("should scale by width alone with the default size", async () => {
    expect(await render("")).toEqual({ width: 300, height: 150 })
  })

  it("should store the thumbnail under its derived name", async () => {
    await render("w=100&h=100&m=3")

    const stored = await sharp(path.join(tempDir, "thumbnail", "banners", "sky-w100-h100-m3.png")).metadata()
    expect({ width: stored.width, height: stored.height }).toEqual({ width: 100, height: 100 })
  })
})

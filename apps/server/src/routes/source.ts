/**
 * Source Routes
 *
 * PUT /source/<key> - Store a new original (never overwrites)
 * GET|HEAD /source/<key> - Serve an original verbatim
 */

import type { ServerConfig } from "@thumbspace/env"
import type { ErrorLogger } from "@thumbspace/error-logger"
import { formatSizeLimit, type SourceStore } from "@thumbspace/images"
import { Hono } from "hono"
import { errorResponse } from "../lib/http-errors.js"
import { requestBody } from "../lib/request-body.js"
import { serveFile } from "../lib/serve-file.js"
import { keyFromPath } from "./keys.js"

const PREFIX = "/source/"

export interface SourceRouteDeps {
  config: ServerConfig
  sources: SourceStore
  logger: ErrorLogger
}

export function sourceRoutes({ config, sources, logger }: SourceRouteDeps) {
  const app = new Hono()

  app.get("/*", async c => {
    const checked = keyFromPath(c.req.path, PREFIX, config.allowedExtensions, logger)
    if (checked.error) return errorResponse(c, checked.error)
    const key = checked.key

    const opened = await sources.open(key)
    if (opened.error) {
      if (opened.error.code !== "source:not-found") {
        logger.error("Failed to open source", opened.error.message, { key })
      }
      return errorResponse(c, opened.error)
    }

    logger.debug("Serve", { key, path: opened.data.path })
    return serveFile(c, opened.data, logger)
  })

  app.put("/*", async c => {
    const checked = keyFromPath(c.req.path, PREFIX, config.allowedExtensions, logger)
    if (checked.error) return errorResponse(c, checked.error)
    const key = checked.key

    // Refuse declared oversize bodies before touching the disk
    const declared = Number(c.req.header("content-length"))
    if (Number.isFinite(declared) && declared > config.maxUploadBytes) {
      return errorResponse(c, {
        message: `Upload too large. Maximum size: ${formatSizeLimit(config.maxUploadBytes)}`,
        code: "source:too-large",
      })
    }

    const created = await sources.create(key, requestBody(c.req.raw.body), { maxBytes: config.maxUploadBytes })
    if (created.error) {
      if (created.error.code === "io:error") {
        logger.error("Failed to write source", created.error.message, { key })
      }
      return errorResponse(c, created.error)
    }

    logger.info("Source stored", { key, size: created.data.bytesWritten, checksum: created.data.checksum })
    return c.json({ key, size: created.data.bytesWritten, checksum: created.data.checksum })
  })

  app.all("/*", c => errorResponse(c, { message: `Unsupported method: ${c.req.method}`, code: "method:unsupported" }))

  return app
}

/**
 * Thumbnail Routes
 *
 * GET|HEAD /thumbnail/<key>?w=&h=&m= - Serve a thumbnail, building it on first request
 */

import type { ServerConfig } from "@thumbspace/env"
import type { ErrorLogger } from "@thumbspace/error-logger"
import { parseVariantSpec, type VariantCache } from "@thumbspace/images"
import { Hono } from "hono"
import { errorResponse } from "../lib/http-errors.js"
import { serveFile } from "../lib/serve-file.js"
import { keyFromPath } from "./keys.js"

const PREFIX = "/thumbnail/"

export interface ThumbnailRouteDeps {
  config: ServerConfig
  cache: VariantCache
  logger: ErrorLogger
}

export function thumbnailRoutes({ config, cache, logger }: ThumbnailRouteDeps) {
  const app = new Hono()
  const cacheControl = `public, max-age=${config.thumbnailMaxAge}, immutable`

  app.get("/*", async c => {
    const checked = keyFromPath(c.req.path, PREFIX, config.allowedExtensions, logger)
    if (checked.error) return errorResponse(c, checked.error)
    const key = checked.key

    const parsed = parseVariantSpec(
      { w: c.req.query("w"), h: c.req.query("h"), m: c.req.query("m") },
      { defaultWidth: config.defaultThumbnailWidth, allowedSizes: config.allowedThumbnailSizes },
    )
    if (!parsed.valid) {
      return errorResponse(c, { message: parsed.error, code: "spec:invalid" })
    }

    // Not tied to the request: a disconnect leaves the shared build running
    const fetched = await cache.fetch(key, parsed.spec)
    if (fetched.error) {
      return errorResponse(c, fetched.error)
    }

    return serveFile(c, fetched.data, logger, { "cache-control": cacheControl })
  })

  app.all("/*", c => errorResponse(c, { message: `Unsupported method: ${c.req.method}`, code: "method:unsupported" }))

  return app
}

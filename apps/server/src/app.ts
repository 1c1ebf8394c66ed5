/**
 * Thumbspace HTTP app
 *
 * Serves originals under /source/ and on-demand thumbnails under /thumbnail/.
 * The app has no process state of its own; server.ts owns the listener.
 */

import * as Sentry from "@sentry/node"
import type { ServerConfig } from "@thumbspace/env"
import type { ErrorLogger } from "@thumbspace/error-logger"
import type { SourceStore, VariantCache } from "@thumbspace/images"
import { Hono } from "hono"
import { logger as requestLogger } from "hono/logger"
import { errorResponse } from "./lib/http-errors.js"
import { redirectTrailingSlash } from "./middleware/trailing-slash.js"
import { healthRoutes } from "./routes/health.js"
import { sourceRoutes } from "./routes/source.js"
import { thumbnailRoutes } from "./routes/thumbnail.js"

export interface AppDeps {
  config: ServerConfig
  sources: SourceStore
  cache: VariantCache
  logger: ErrorLogger
}

export function createApp({ config, sources, cache, logger }: AppDeps) {
  const app = new Hono()
  const httpLogger = logger.child("http")

  // Global middleware
  app.use("*", requestLogger((message, ...rest) => httpLogger.info([message, ...rest].join(" "))))
  app.use("*", redirectTrailingSlash())

  // Mount routes
  app.route("/", healthRoutes({ cache }))
  app.route("/source", sourceRoutes({ config, sources, logger: logger.child("source") }))
  app.route("/thumbnail", thumbnailRoutes({ config, cache, logger: logger.child("thumbnail") }))

  // 404 handler
  app.notFound(c => {
    return errorResponse(c, { message: "Not found", code: "route:not-found" })
  })

  // Global error handler
  app.onError((err, c) => {
    logger.error("Unhandled error", err, { method: c.req.method, path: c.req.path })
    Sentry.captureException(err)
    return errorResponse(c, { message: "Internal server error", code: "internal" })
  })

  return app
}

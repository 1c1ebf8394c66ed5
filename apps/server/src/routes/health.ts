/**
 * Health Route
 *
 * GET /health - Liveness plus the number of thumbnails being built
 */

import type { VariantCache } from "@thumbspace/images"
import { Hono } from "hono"

export function healthRoutes({ cache }: { cache: VariantCache }) {
  const app = new Hono()

  app.get("/health", c => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      pendingBuilds: cache.pendingBuilds(),
    })
  })

  return app
}

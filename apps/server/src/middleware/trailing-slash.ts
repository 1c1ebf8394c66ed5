import type { MiddlewareHandler } from "hono"

/**
 * 301 from `/a/b/` to `/a/b`, query string kept. `/` itself is left alone.
 */
export function redirectTrailingSlash(): MiddlewareHandler {
  return async (c, next) => {
    const { pathname, search } = new URL(c.req.url)
    if (pathname !== "/" && pathname.endsWith("/")) {
      const trimmed = pathname.replace(/\/+$/, "") || "/"
      return c.redirect(`${trimmed}${search}`, 301)
    }
    await next()
  }
}

import type { ErrorLogger } from "@thumbspace/error-logger"
import type { StoredFile } from "@thumbspace/images"
import type { Context } from "hono"
import { stream } from "hono/streaming"
import { getMimeType } from "hono/utils/mime"

/**
 * Whether `If-Modified-Since` covers a file modified at `modifiedAt`.
 * HTTP dates have one-second resolution, so sub-second mtimes are truncated.
 */
export function isNotModified(ifModifiedSince: string | undefined, modifiedAt: Date): boolean {
  if (!ifModifiedSince) return false

  const since = Date.parse(ifModifiedSince)
  if (Number.isNaN(since)) return false

  return Math.floor(modifiedAt.getTime() / 1000) * 1000 <= since
}

/**
 * Respond with an opened file and take ownership of its handle.
 *
 * HEAD gets the headers only, a GET covered by `If-Modified-Since` gets 304,
 * any other GET streams the body.
 */
export async function serveFile(
  c: Context,
  file: StoredFile,
  logger: ErrorLogger,
  headers: Record<string, string> = {},
): Promise<Response> {
  c.header("content-type", getMimeType(file.path) ?? "application/octet-stream")
  c.header("last-modified", file.modifiedAt.toUTCString())
  for (const [name, value] of Object.entries(headers)) {
    c.header(name, value)
  }

  if (c.req.method === "HEAD") {
    await file.handle.close()
    c.header("content-length", String(file.size))
    return c.body(null, 200)
  }

  if (isNotModified(c.req.header("if-modified-since"), file.modifiedAt)) {
    await file.handle.close()
    return c.body(null, 304)
  }

  c.header("content-length", String(file.size))
  // Closes the handle once read or destroyed
  const body = file.handle.createReadStream()

  return stream(
    c,
    async s => {
      s.onAbort(() => {
        body.destroy()
      })
      for await (const chunk of body) {
        await s.write(chunk)
      }
    },
    async error => {
      logger.error("Failed to stream file", error, { path: file.path })
      body.destroy()
    },
  )
}

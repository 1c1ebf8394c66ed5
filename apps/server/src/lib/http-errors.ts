import type { ErrorCode } from "@thumbspace/images"
import type { Context } from "hono"
import type { ContentfulStatusCode } from "hono/utils/http-status"

/**
 * Codes that only exist at the HTTP boundary
 */
export type HttpErrorCode = ErrorCode | "method:unsupported" | "route:not-found" | "internal"

export const STATUS_BY_CODE: Record<HttpErrorCode, ContentfulStatusCode> = {
  "key:invalid": 400,
  "spec:invalid": 400,
  "method:unsupported": 400,
  "source:not-found": 404,
  "variant:not-found": 404,
  "route:not-found": 404,
  "source:exists": 409,
  "source:too-large": 413,
  "build:failed": 500,
  "io:error": 500,
  internal: 500,
}

export type HttpError = { message: string; code: HttpErrorCode }

/**
 * JSON `{ error, code }` with the status for `code`.
 * Store results can be passed as they are.
 */
export function errorResponse(c: Context, { message, code }: HttpError) {
  return c.json({ error: message, code }, STATUS_BY_CODE[code])
}

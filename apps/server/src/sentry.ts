/**
 * Sentry initialization for the thumbnail server.
 *
 * Skipped entirely without a DSN; captureException is then a no-op.
 */

import * as Sentry from "@sentry/node"

export interface SentryOptions {
  dsn: string | undefined
  environment: string
  release?: string
}

export function initSentry({ dsn, environment, release }: SentryOptions): boolean {
  if (!dsn) {
    return false
  }

  Sentry.init({
    dsn,
    release: release ?? process.env.npm_package_version ?? "unknown",
    environment,
    serverName: "thumbspace",
    sampleRate: 1.0,
    tracesSampleRate: 0,
    sendDefaultPii: false,

    beforeSend(event) {
      if (event.environment === "test") {
        return null
      }
      return event
    },
  })
  return true
}

export { Sentry }

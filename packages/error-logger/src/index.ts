export type ErrorLogLevel = "debug" | "info" | "warn" | "error" | "fatal"

export interface ErrorLogContext {
  component?: string
  operation?: string
  requestId?: string
  key?: string
  path?: string
  [key: string]: unknown
}

export interface ErrorLogEntry {
  level: ErrorLogLevel
  message: string
  error?: unknown
  context?: ErrorLogContext
  timestamp: string
}

export type ErrorLogSink = (entry: ErrorLogEntry) => void | Promise<void>

export interface ErrorLoggerOptions {
  sink?: ErrorLogSink
  /** Entries below this level are dropped */
  minLevel?: ErrorLogLevel
  /** Attached to every entry as `context.component` */
  component?: string
}

export interface ErrorLogger {
  debug: (message: string, context?: ErrorLogContext) => void
  info: (message: string, context?: ErrorLogContext) => void
  warn: (message: string, error?: unknown, context?: ErrorLogContext) => void
  error: (message: string, error?: unknown, context?: ErrorLogContext) => void
  fatal: (message: string, error?: unknown, context?: ErrorLogContext) => void
  /** Logger for a sub-component; names nest as `parent.child` */
  child: (component: string) => ErrorLogger
  isLevelEnabled: (level: ErrorLogLevel) => boolean
}

const LEVEL_ORDER: Record<ErrorLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
}

function serializeError(error: unknown): unknown {
  if (!(error instanceof Error)) {
    return error
  }
  const code = "code" in error ? error.code : undefined
  return {
    name: error.name,
    message: error.message,
    ...(typeof code === "string" ? { code } : {}),
    stack: error.stack,
  }
}

function defaultSink(entry: ErrorLogEntry): void {
  const payload = {
    level: entry.level,
    message: entry.message,
    error: entry.error === undefined ? undefined : serializeError(entry.error),
    context: entry.context,
    timestamp: entry.timestamp,
  }
  console.error(JSON.stringify(payload))
}

export function createErrorLogger(options: ErrorLoggerOptions = {}): ErrorLogger {
  const sink = options.sink ?? defaultSink
  const minLevel = options.minLevel ?? "info"
  const component = options.component

  const isLevelEnabled = (level: ErrorLogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel]

  const log = (level: ErrorLogLevel, message: string, error?: unknown, context?: ErrorLogContext): void => {
    if (!isLevelEnabled(level)) return

    const entry: ErrorLogEntry = {
      level,
      message,
      error,
      context: component ? { component, ...context } : context,
      timestamp: new Date().toISOString(),
    }

    const pending = sink(entry)
    if (pending instanceof Promise) {
      // Async sinks must never take the caller down
      pending.catch(sinkError => {
        console.error("[error-logger] sink failed:", sinkError)
      })
    }
  }

  return {
    debug: (message, context) => log("debug", message, undefined, context),
    info: (message, context) => log("info", message, undefined, context),
    warn: (message, error, context) => log("warn", message, error, context),
    error: (message, error, context) => log("error", message, error, context),
    fatal: (message, error, context) => log("fatal", message, error, context),
    child: name =>
      createErrorLogger({
        sink,
        minLevel,
        component: component ? `${component}.${name}` : name,
      }),
    isLevelEnabled,
  }
}

export const errorLogger = createErrorLogger()

export type ErrorLogLevel = "debug" | "info" | "warn" | "error" | "fatal"

export interface ErrorLogContext {
  component?: string
  operation?: string
  tool?: string
  environment?: string
  projectId?: string
  deploymentId?: string
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

const REDACTED = "[redacted]"

// Bearer headers, signed preview URLs and credential-looking context keys
const SECRET_PATTERNS: Array<[RegExp, string]> = [
  [/Bearer\s+[^\s"',]+/gi, `Bearer ${REDACTED}`],
  [/([?&]eo_token=)[^&\s"']+/gi, `$1${REDACTED}`],
]

const SECRET_KEY = /token|secret|password|authorization|credential/i

export function redact(text: string): string {
  return SECRET_PATTERNS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text)
}

function redactValue(key: string, value: unknown): unknown {
  if (SECRET_KEY.test(key) && value !== undefined && value !== null && value !== "") {
    return REDACTED
  }
  if (typeof value === "string") {
    return redact(value)
  }
  return value
}

function redactContext(context?: ErrorLogContext): ErrorLogContext | undefined {
  if (!context) return undefined
  const out: ErrorLogContext = {}
  for (const [key, value] of Object.entries(context)) {
    out[key] = redactValue(key, value)
  }
  return out
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined
    return {
      name: error.name,
      message: redact(error.message),
      ...(typeof code === "string" && { code }),
    }
  }
  return typeof error === "string" ? redact(error) : error
}

// stderr: stdout belongs to MCP stdio transports
function defaultSink(entry: ErrorLogEntry): void {
  const payload = {
    level: entry.level,
    message: entry.message,
    error: serializeError(entry.error),
    context: entry.context,
    timestamp: entry.timestamp,
  }
  console.error("[edgeone-deploy]", JSON.stringify(payload))
}

export interface ErrorLogger {
  debug: (message: string, context?: ErrorLogContext) => Promise<void>
  info: (message: string, context?: ErrorLogContext) => Promise<void>
  warn: (message: string, error?: unknown, context?: ErrorLogContext) => Promise<void>
  error: (message: string, error?: unknown, context?: ErrorLogContext) => Promise<void>
  fatal: (message: string, error?: unknown, context?: ErrorLogContext) => Promise<void>
  /** Logger that merges `context` into every entry */
  withContext: (context: ErrorLogContext) => ErrorLogger
}

export function createErrorLogger(sink: ErrorLogSink = defaultSink, baseContext?: ErrorLogContext): ErrorLogger {
  const log = async (
    level: ErrorLogLevel,
    message: string,
    error?: unknown,
    context?: ErrorLogContext,
  ): Promise<void> => {
    const merged = baseContext || context ? { ...baseContext, ...context } : undefined
    await sink({
      level,
      message: redact(message),
      error,
      context: redactContext(merged),
      timestamp: new Date().toISOString(),
    })
  }

  return {
    debug: (message, context) => log("debug", message, undefined, context),
    info: (message, context) => log("info", message, undefined, context),
    warn: (message, error, context) => log("warn", message, error, context),
    error: (message, error, context) => log("error", message, error, context),
    fatal: (message, error, context) => log("fatal", message, error, context),
    withContext: context => createErrorLogger(sink, { ...baseContext, ...context }),
  }
}

export const errorLogger = createErrorLogger()

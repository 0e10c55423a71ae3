export type StatusLevel = "info" | "success" | "warning" | "error"

export interface StatusContext {
  step?: string
  [key: string]: unknown
}

export interface StatusEntry {
  level: StatusLevel
  message: string
  context?: StatusContext
  timestamp: string
}

export type StatusSink = (entry: StatusEntry) => void

export const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
} as const

const LABELS: Record<StatusLevel, { tag: string; color: string }> = {
  info: { tag: "[INFO]", color: COLORS.blue },
  success: { tag: "[SUCCESS]", color: COLORS.green },
  warning: { tag: "[WARNING]", color: COLORS.yellow },
  error: { tag: "[ERROR]", color: COLORS.red },
}

/**
 * Render one status line, e.g. `[SUCCESS] Docker services started`.
 * Colors are applied only when `color` is true.
 */
export function formatStatusLine(entry: StatusEntry, color = false): string {
  const { tag, color: tint } = LABELS[entry.level]
  return color ? `${tint}${tag}${COLORS.reset} ${entry.message}` : `${tag} ${entry.message}`
}

function consoleSink(entry: StatusEntry): void {
  const line = formatStatusLine(entry, process.stdout.isTTY === true)
  if (entry.level === "error") {
    console.error(line)
  } else {
    console.log(line)
  }
}

export function createStatusLogger(sink: StatusSink = consoleSink) {
  const log = (level: StatusLevel, message: string, context?: StatusContext): void => {
    sink({
      level,
      message,
      context,
      timestamp: new Date().toISOString(),
    })
  }

  return {
    info: (message: string, context?: StatusContext) => log("info", message, context),
    success: (message: string, context?: StatusContext) => log("success", message, context),
    warning: (message: string, context?: StatusContext) => log("warning", message, context),
    error: (message: string, context?: StatusContext) => log("error", message, context),
  }
}

export type StatusLogger = ReturnType<typeof createStatusLogger>

/**
 * Logger that keeps every entry in memory. Used by tests and by callers that
 * want to inspect what an operator would have seen.
 */
export function createMemoryStatusLogger(): { logger: StatusLogger; entries: StatusEntry[] } {
  const entries: StatusEntry[] = []
  return { logger: createStatusLogger(entry => entries.push(entry)), entries }
}

export const statusLogger = createStatusLogger()

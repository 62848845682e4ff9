import { Writable } from 'stream'
import type { LogFn } from 'pino'

declare module 'fastify' {
  interface FastifyBaseLogger {
    success: LogFn
  }
}

export const customLevels = {
  success: 25,
}

const levelMap: Record<number, string> = {
  10: 'trace',
  20: 'debug',
  25: 'success',
  30: 'info',
  40: 'warn',
  50: 'error',
  60: 'fatal',
}

// ============================================================================
// Recent log buffer - keeps the last entries that carry a [CATEGORY] prefix
// ============================================================================

export interface LogEntry {
  category: string
  level: string
  msg: string
  time: Date
  details: Record<string, unknown>
}

const MAX_ENTRIES = 500

const CATEGORY_PATTERN = /^(?:✓\s*)?\[([A-Z0-9]+)(?::[^\]]+)?\]\s*/

/**
 * Parse one pino JSON line. Returns null for lines without a category prefix.
 */
export function parseLogLine(line: string): LogEntry | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(line)
  } catch {
    return null
  }
  if (parsed === null || typeof parsed !== 'object') return null

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(parsed))
  const { level, msg, time, ...details } = record

  const message = typeof msg === 'string' ? msg : ''
  const categoryMatch = message.match(CATEGORY_PATTERN)
  if (!categoryMatch) {
    return null
  }

  return {
    category: categoryMatch[1],
    level: typeof level === 'number' ? levelMap[level] || String(level) : String(level),
    msg: message.replace(CATEGORY_PATTERN, ''),
    time: new Date(typeof time === 'number' || typeof time === 'string' ? time : Date.now()),
    details,
  }
}

export class LogBuffer {
  private entries: LogEntry[] = []

  constructor(private readonly capacity = MAX_ENTRIES) {}

  push(entry: LogEntry): void {
    this.entries.push(entry)
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity)
    }
  }

  /**
   * Newest first
   */
  query(filter: { category?: string[]; level?: string[]; limit: number }): LogEntry[] {
    return this.entries
      .filter(e => !filter.category || filter.category.includes(e.category))
      .filter(e => !filter.level || filter.level.includes(e.level))
      .reverse()
      .slice(0, filter.limit)
  }

  size(): number {
    return this.entries.length
  }
}

export const logBuffer = new LogBuffer()

// ============================================================================
// Writable Stream for Fastify
// ============================================================================

/**
 * Echo every line to `out` and keep categorised entries in `buffer`
 */
export function createLogStream(buffer: LogBuffer, out: NodeJS.WritableStream = process.stdout): Writable {
  return new Writable({
    write(chunk, encoding, callback) {
      const line = chunk.toString()
      out.write(line)

      const entry = parseLogLine(line)
      if (entry) {
        buffer.push(entry)
      }
      callback()
    },
  })
}

export const logStream = createLogStream(logBuffer)

/**
 * Diagnostic logger.
 *
 * Logs to `console.info/warn/error` with a `[Stanzakit]` prefix. Scoped
 * loggers add a second tag (`[Stanzakit] [stream]`) so the stream, the
 * dispatcher, the lifecycle manager and each service can be told apart.
 *
 * **Privacy**: Never pass message bodies or JID local parts to these
 * functions. Use `describeStanza()` from the dispatcher for stanza
 * synopses; it only keeps the element name, type, id and sender domain.
 *
 * @module Core/Logger
 */

const PREFIX = '[Stanzakit]'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export function logError(message: string): void {
  console.error(PREFIX, message)
}

/**
 * Create a logger whose lines carry a scope tag.
 *
 * @example
 * ```typescript
 * const log = createLogger('service:ping')
 * log.info('started') // [Stanzakit] [service:ping] started
 * ```
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`
  return {
    debug: (message) => console.debug(PREFIX, tag, message),
    info: (message) => console.info(PREFIX, tag, message),
    warn: (message) => console.warn(PREFIX, tag, message),
    error: (message) => console.error(PREFIX, tag, message),
  }
}

/** Render an unknown thrown value for a log line. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`
  return String(err)
}

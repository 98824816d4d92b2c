/**
 * Shared utility functions for connection management.
 *
 * Pure functions and cancellable waits used by the lifecycle manager and
 * the stanza stream, kept apart so they can be tested on their own.
 */
import { CancelledError, StanzakitError } from './errors'
import type { BackoffConfig, Endpoint } from './types'

/**
 * Exponential backoff delay before retry number `retry` (1-based), capped
 * at `maxDelayMs`, with up to `jitter` of it removed at random.
 *
 * @example
 * ```typescript
 * // initial 1s, multiplier 2, no jitter: 1000, 2000, 4000, ...
 * computeBackoffDelay(3, { initialDelayMs: 1000, multiplier: 2, maxDelayMs: 120_000, jitter: 0 })
 * // → 4000
 * ```
 */
export function computeBackoffDelay(retry: number, backoff: BackoffConfig, random: () => number = Math.random): number {
  const base = Math.min(backoff.initialDelayMs * Math.pow(backoff.multiplier, retry - 1), backoff.maxDelayMs)
  return Math.round(base * (1 - backoff.jitter * random()))
}

/**
 * The reason an aborted signal carries, as a typed error. A reason that is
 * not one (the AbortError DOMException of a bare `abort()`) becomes the
 * cause of a {@link CancelledError}.
 */
export function abortReason(signal: AbortSignal): StanzakitError {
  if (signal.reason instanceof StanzakitError) return signal.reason
  return new CancelledError('Operation cancelled', { cause: signal.reason })
}

/**
 * Wait `ms` milliseconds. Rejects with the signal's reason as soon as the
 * signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal))
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      if (signal) reject(abortReason(signal))
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Race a promise against a timeout. Resolves with void if the timeout fires first.
 * Used to bound a graceful close that can hang when the socket is already dead.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T | void> {
  let timer: ReturnType<typeof setTimeout> | undefined
  return Promise.race([
    promise,
    new Promise<void>((resolve) => {
      timer = setTimeout(resolve, ms)
    }),
  ]).finally(() => clearTimeout(timer))
}

/**
 * Settle with `promise`, or reject with the signal's reason once it aborts.
 * A value that arrives after the abort is handed to `onLate`, so it can be
 * released.
 */
export function raceSignal<T>(promise: Promise<T>, signal: AbortSignal, onLate?: (value: T) => void): Promise<T> {
  return new Promise((resolve, reject) => {
    let done = false
    const onAbort = () => {
      if (done) return
      done = true
      reject(abortReason(signal))
    }
    if (signal.aborted) {
      onAbort()
    } else {
      signal.addEventListener('abort', onAbort, { once: true })
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        if (done) {
          onLate?.(value)
          return
        }
        done = true
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        if (done) return
        done = true
        reject(err)
      }
    )
  })
}

/**
 * Abort `controller` when `parent` aborts, with the same reason.
 * @returns A function that removes the link
 */
export function linkSignal(parent: AbortSignal, controller: AbortController): () => void {
  if (parent.aborted) {
    controller.abort(parent.reason)
    return () => {}
  }
  const onAbort = () => controller.abort(parent.reason)
  parent.addEventListener('abort', onAbort, { once: true })
  return () => parent.removeEventListener('abort', onAbort)
}

/**
 * Parse the `location` a peer announces for resumption: `host`,
 * `host:port` or `[ipv6]:port`. The port defaults to `fallbackPort`.
 */
export function parseLocation(location: string, fallbackPort: number): Endpoint | null {
  const trimmed = location.trim()
  if (!trimmed) return null

  let host: string
  let portText: string | undefined
  if (trimmed.startsWith('[')) {
    const close = trimmed.indexOf(']')
    if (close < 0) return null
    host = trimmed.substring(1, close)
    const rest = trimmed.substring(close + 1)
    if (rest && !rest.startsWith(':')) return null
    portText = rest ? rest.substring(1) : undefined
  } else {
    const colon = trimmed.lastIndexOf(':')
    if (colon >= 0 && trimmed.indexOf(':') === colon) {
      host = trimmed.substring(0, colon)
      portText = trimmed.substring(colon + 1)
    } else {
      host = trimmed
    }
  }

  if (!host) return null
  if (portText === undefined) return { host, port: fallbackPort }
  const port = Number(portText)
  if (!Number.isInteger(port) || port <= 0 || port > 65535) return null
  return { host, port }
}

/** Endpoint list with `first` moved to the front (duplicates removed). */
export function preferEndpoint(endpoints: readonly Endpoint[], first: Endpoint): Endpoint[] {
  const rest = endpoints.filter((e) => e.host !== first.host || e.port !== first.port)
  const match = endpoints.find((e) => e.host === first.host && e.port === first.port)
  return [match ?? first, ...rest]
}

export function formatEndpoint(endpoint: Endpoint): string {
  const host = endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host
  return `${host}:${endpoint.port}`
}

/**
 * Default timing budgets and configuration resolution.
 *
 * The defaults are safety bounds for failure modes (dead sockets, stalled
 * negotiation, handlers ignoring cancellation), not expected steady-state
 * timings. Every manager and stream receives its own resolved copy; nothing
 * here is read implicitly at run time.
 */
import { ConfigurationError } from './errors'
import type { BackoffConfig, LifecycleConfig, StreamConfig } from './types'

/** Delay before the second pass over the candidate endpoints (ms) */
export const INITIAL_RECONNECT_DELAY = 1000

/** Maximum delay between passes (ms) */
export const MAX_RECONNECT_DELAY = 120_000

/** Multiplier for exponential backoff */
export const RECONNECT_MULTIPLIER = 2

/** Fraction of each delay that is randomised */
export const RECONNECT_JITTER = 0.2

/** Passes over the candidate list before a connect gives up */
export const DEFAULT_MAX_PASSES = 3

/** Timeout for opening one candidate and receiving its negotiation verdict (ms) */
export const CONNECT_ATTEMPT_TIMEOUT_MS = 30_000

/** Stream Management resumption window when the peer announces none (ms) */
export const SM_SESSION_TIMEOUT_MS = 10 * 60 * 1000

/** Timeout for the graceful close on disconnect (ms) */
export const CLIENT_STOP_TIMEOUT_MS = 2_000

/** Timeout for health verification (SM ack or ping fallback) (ms) */
export const VERIFY_CONNECTION_TIMEOUT_MS = 10_000

/** Timeout for the `<enable/>` and `<resume/>` round trips (ms) */
export const SM_NEGOTIATION_TIMEOUT_MS = 10_000

/** Coalescing window for `<r/>` after outbound stanzas (ms) */
export const SM_ACK_DEBOUNCE_MS = 250

/** Grace period for running handler tasks on teardown (ms) */
export const TASK_CANCEL_GRACE_MS = 2_000

export const DEFAULT_BACKOFF: Readonly<BackoffConfig> = {
  initialDelayMs: INITIAL_RECONNECT_DELAY,
  maxDelayMs: MAX_RECONNECT_DELAY,
  multiplier: RECONNECT_MULTIPLIER,
  jitter: RECONNECT_JITTER,
}

export const DEFAULT_LIFECYCLE_CONFIG: Readonly<LifecycleConfig> = {
  endpoints: [],
  resolveEndpoints: null,
  maxPasses: DEFAULT_MAX_PASSES,
  backoff: DEFAULT_BACKOFF,
  attemptTimeoutMs: CONNECT_ATTEMPT_TIMEOUT_MS,
  resumptionWindowMs: SM_SESSION_TIMEOUT_MS,
  stopTimeoutMs: CLIENT_STOP_TIMEOUT_MS,
  verifyTimeoutMs: VERIFY_CONNECTION_TIMEOUT_MS,
  random: Math.random,
}

export const DEFAULT_STREAM_CONFIG: Readonly<StreamConfig> = {
  streamManagement: true,
  requestResumption: true,
  negotiationTimeoutMs: SM_NEGOTIATION_TIMEOUT_MS,
  ackRequestDebounceMs: SM_ACK_DEBOUNCE_MS,
  taskCancelGraceMs: TASK_CANCEL_GRACE_MS,
}

/** Lifecycle configuration as accepted from callers: everything optional. */
export type LifecycleConfigInput = Partial<Omit<LifecycleConfig, 'backoff'>> & {
  backoff?: Partial<BackoffConfig>
}

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number, got ${value}`)
  }
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`)
  }
}

/**
 * Merge `input` over `base` and validate the result.
 *
 * @throws {ConfigurationError} on out-of-range values, or when there is
 *   neither a static endpoint list nor a resolver
 */
export function resolveLifecycleConfig(
  input: LifecycleConfigInput = {},
  base: Readonly<LifecycleConfig> = DEFAULT_LIFECYCLE_CONFIG
): LifecycleConfig {
  const config: LifecycleConfig = {
    ...base,
    ...input,
    endpoints: [...(input.endpoints ?? base.endpoints)],
    backoff: { ...base.backoff, ...input.backoff },
  }

  if (config.endpoints.length === 0 && !config.resolveEndpoints) {
    throw new ConfigurationError('No endpoints configured and no endpoint resolver given')
  }
  for (const endpoint of config.endpoints) {
    if (!endpoint.host) {
      throw new ConfigurationError('Endpoint host must not be empty')
    }
    if (!Number.isInteger(endpoint.port) || endpoint.port < 1 || endpoint.port > 65535) {
      throw new ConfigurationError(`Invalid port ${endpoint.port} for ${endpoint.host}`)
    }
  }
  requirePositiveInteger('maxPasses', config.maxPasses)
  requireNonNegative('backoff.initialDelayMs', config.backoff.initialDelayMs)
  requireNonNegative('backoff.maxDelayMs', config.backoff.maxDelayMs)
  if (!Number.isFinite(config.backoff.multiplier) || config.backoff.multiplier < 1) {
    throw new ConfigurationError(`backoff.multiplier must be at least 1, got ${config.backoff.multiplier}`)
  }
  if (!(config.backoff.jitter >= 0 && config.backoff.jitter <= 1)) {
    throw new ConfigurationError(`backoff.jitter must be between 0 and 1, got ${config.backoff.jitter}`)
  }
  requireNonNegative('attemptTimeoutMs', config.attemptTimeoutMs)
  requireNonNegative('resumptionWindowMs', config.resumptionWindowMs)
  requireNonNegative('stopTimeoutMs', config.stopTimeoutMs)
  requireNonNegative('verifyTimeoutMs', config.verifyTimeoutMs)

  return config
}

/**
 * Merge `input` over the stream defaults and validate the result.
 *
 * @throws {ConfigurationError} on out-of-range values
 */
export function resolveStreamConfig(input: Partial<StreamConfig> = {}): StreamConfig {
  const config: StreamConfig = { ...DEFAULT_STREAM_CONFIG, ...input }
  requireNonNegative('negotiationTimeoutMs', config.negotiationTimeoutMs)
  requireNonNegative('ackRequestDebounceMs', config.ackRequestDebounceMs)
  requireNonNegative('taskCancelGraceMs', config.taskCancelGraceMs)
  return config
}

/**
 * Connection lifecycle type definitions.
 *
 * @packageDocumentation
 * @module Types/Connection
 */
import type { Endpoint } from './transport'

/**
 * Current state of the connection lifecycle manager.
 *
 * @remarks
 * Transitions:
 * - `idle` → `connecting` → `established` | `failed`
 * - `established` → `suspended` → `resuming` → `established` (session resumed)
 * - `suspended` → `connecting` (session not resumable, fresh start)
 * - any state → `destroyed` (fatal error or caller disconnect)
 *
 * @category Connection
 */
export type LifecycleState =
  | 'idle'
  | 'connecting'
  | 'established'
  | 'suspended'
  | 'resuming'
  | 'failed'
  | 'destroyed'

/**
 * Exponential backoff between whole passes over the candidate list.
 *
 * @category Connection
 */
export interface BackoffConfig {
  /** Delay before the second pass (ms) */
  initialDelayMs: number
  /** Ceiling for any single delay (ms) */
  maxDelayMs: number
  /** Growth factor per pass */
  multiplier: number
  /** Fraction of the delay that is randomised, 0 (none) to 1 (full jitter) */
  jitter: number
}

/**
 * Explicit configuration of the lifecycle manager. There are no
 * process-wide defaults: every manager gets its own copy, replaced through
 * `reconfigure()`.
 *
 * @category Connection
 */
export interface LifecycleConfig {
  /** Static candidate endpoints, tried in order */
  endpoints: Endpoint[]
  /** Endpoint discovery; when set it is called once per pass instead of using `endpoints` */
  resolveEndpoints: ((signal: AbortSignal) => Promise<Endpoint[]>) | null
  /** Number of passes over the candidate list before giving up */
  maxPasses: number
  backoff: BackoffConfig
  /** Bound for opening one candidate and receiving its negotiation verdict (ms) */
  attemptTimeoutMs: number
  /** Resumption window used when the peer does not announce `max` (ms) */
  resumptionWindowMs: number
  /** Bound for the graceful close on disconnect (ms) */
  stopTimeoutMs: number
  /** Bound for verifyConnection() (ms) */
  verifyTimeoutMs: number
  /** Random source for jitter, in [0, 1) */
  random: () => number
}

/**
 * Configuration of the stanza stream.
 *
 * @category Connection
 */
export interface StreamConfig {
  /** Request Stream Management when the peer offers it */
  streamManagement: boolean
  /** Ask the peer to allow resumption when enabling Stream Management */
  requestResumption: boolean
  /** Bound for the `<enable/>` and `<resume/>` round trips (ms) */
  negotiationTimeoutMs: number
  /** Coalescing window for outbound `<r/>` requests after sends (ms) */
  ackRequestDebounceMs: number
  /** Grace period for running handler tasks on teardown (ms) */
  taskCancelGraceMs: number
}

/**
 * Lifecycle event definitions.
 *
 * These are the integration points application services need: they are
 * emitted by the connection manager and forwarded by the client, with
 * object payloads.
 *
 * @packageDocumentation
 * @module Types/Events
 */
import type { StanzakitError } from '../errors'
import type { LifecycleState } from './connection'
import type { Endpoint } from './transport'

/**
 * @category Events
 */
export interface LifecycleEventMap {
  /** A fresh stream is up (initial connect, or reconnect without resumption) */
  streamEstablished: { jid: string | null; streamManagement: boolean }
  /** The transport was lost; resumption or reconnection is pending */
  streamSuspended: { error: StanzakitError }
  /** The previous session was resumed; unacked stanzas were replayed */
  streamResumed: { jid: string | null }
  /** The session is gone; outstanding sends and requests have been settled */
  streamDestroyed: { reason: StanzakitError }
  stateChange: { state: LifecycleState; previous: LifecycleState }
  /** A candidate endpoint is about to be tried */
  attempt: { pass: number; endpoint: Endpoint }
  /** The next pass starts after `delayMs` */
  retryScheduled: { pass: number; delayMs: number }
  /** Connecting or recovering gave up; the manager is now `failed` or `destroyed` */
  connectionFailed: { error: StanzakitError }
  /** A non-fatal inconsistency, e.g. an ack count beyond what was sent */
  warning: { error: StanzakitError }
}

/**
 * Error taxonomy.
 *
 * Every error the core produces is a {@link StanzakitError} with a closed
 * `kind`. The lifecycle manager decides between retrying, halting and
 * surfacing by switching on the kind (see {@link classifyFailure}), never
 * on the identity of whatever was thrown.
 *
 * @module Core/Errors
 */
import { describeStanzaError, type StanzaErrorCondition, type StanzaErrorType } from '../utils/stanzaError'
import type { Endpoint, FailureKind } from './types'

export type ErrorKind =
  | 'transient-connectivity'
  | 'critical-security'
  | 'protocol-violation'
  | 'application-reject'
  | 'cancelled'
  | 'disconnected'
  | 'timeout'
  | 'attempts-exhausted'
  | 'configuration'
  | 'duplicate-handler'
  | 'service-state'
  | 'invalid-state'

export class StanzakitError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
    this.name = 'StanzakitError'
  }
}

/** Transport or IO failure. Retry-eligible. */
export class TransientConnectivityError extends StanzakitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transient-connectivity', message, options)
    this.name = 'TransientConnectivityError'
  }
}

/** Certificate or security-negotiation failure. Never retried. */
export class CriticalSecurityError extends StanzakitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('critical-security', message, options)
    this.name = 'CriticalSecurityError'
  }
}

/** The peer sent inconsistent accounting or malformed framing. */
export class ProtocolViolationError extends StanzakitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('protocol-violation', message, options)
    this.name = 'ProtocolViolationError'
  }
}

/** An IQ request was answered with a stanza error. */
export class ApplicationRejectError extends StanzakitError {
  readonly stanzaError: StanzaErrorCondition

  constructor(stanzaError: StanzaErrorCondition) {
    super('application-reject', describeStanzaError(stanzaError))
    this.stanzaError = stanzaError
    this.name = 'ApplicationRejectError'
  }

  get condition(): string {
    return this.stanzaError.condition
  }
}

/** The caller aborted the operation. */
export class CancelledError extends StanzakitError {
  constructor(message = 'Operation cancelled', options?: { cause?: unknown }) {
    super('cancelled', message, options)
    this.name = 'CancelledError'
  }
}

/**
 * The stream went away before the outcome was known. For stanza tokens
 * this means "unknown delivery outcome": neither failure nor success.
 */
export class DisconnectedError extends StanzakitError {
  constructor(message = 'Stream disconnected', options?: { cause?: unknown }) {
    super('disconnected', message, options)
    this.name = 'DisconnectedError'
  }
}

export class TimeoutError extends StanzakitError {
  constructor(message: string) {
    super('timeout', message)
    this.name = 'TimeoutError'
  }
}

export interface AttemptFailure {
  pass: number
  endpoint: Endpoint
  kind: FailureKind
  error: StanzakitError
}

/** Every candidate endpoint failed on every allowed pass. */
export class ConnectionAttemptsExhaustedError extends StanzakitError {
  readonly failures: readonly AttemptFailure[]

  constructor(failures: readonly AttemptFailure[]) {
    const passes = failures.length > 0 ? failures[failures.length - 1].pass : 0
    super('attempts-exhausted', `All candidate endpoints failed (${failures.length} attempts over ${passes} passes)`)
    this.failures = failures
    this.name = 'ConnectionAttemptsExhaustedError'
  }
}

export class ConfigurationError extends StanzakitError {
  constructor(message: string) {
    super('configuration', message)
    this.name = 'ConfigurationError'
  }
}

export class DuplicateHandlerError extends StanzakitError {
  constructor(message: string) {
    super('duplicate-handler', message)
    this.name = 'DuplicateHandlerError'
  }
}

/** A service tried to use the registrar outside its started window. */
export class ServiceStateError extends StanzakitError {
  constructor(message: string) {
    super('service-state', message)
    this.name = 'ServiceStateError'
  }
}

export class InvalidStateTransitionError extends StanzakitError {
  constructor(message: string) {
    super('invalid-state', message)
    this.name = 'InvalidStateTransitionError'
  }
}

/**
 * Thrown by an IQ request handler to answer with a stanza error instead
 * of a result.
 *
 * @example
 * ```typescript
 * registrar.registerIQHandler('set', NS_EXAMPLE, 'query', () => {
 *   throw new StanzaErrorReply('not-allowed', 'cancel', 'Read-only node')
 * })
 * ```
 */
export class StanzaErrorReply extends Error {
  readonly condition: string
  readonly type: StanzaErrorType
  readonly text?: string

  constructor(condition: string, type: StanzaErrorType = 'cancel', text?: string) {
    super(text ?? condition)
    this.condition = condition
    this.type = type
    this.text = text
    this.name = 'StanzaErrorReply'
  }
}

/**
 * Map an error raised while opening, negotiating or running a transport to
 * the retry decision the lifecycle manager takes for it.
 *
 * Anything that is not an explicit connectivity or security failure is
 * `fatal`: it points at a logic or configuration defect, not the network.
 */
export function classifyFailure(err: unknown): FailureKind {
  if (!(err instanceof StanzakitError)) return 'fatal'
  switch (err.kind) {
    case 'transient-connectivity':
    case 'timeout':
      return 'transient'
    case 'critical-security':
      return 'critical'
    default:
      return 'fatal'
  }
}

/** Wrap an unknown thrown value so it can travel through typed channels. */
export function toStanzakitError(err: unknown, fallback: (message: string, cause: unknown) => StanzakitError): StanzakitError {
  if (err instanceof StanzakitError) return err
  const message = err instanceof Error ? err.message : String(err)
  return fallback(message, err)
}

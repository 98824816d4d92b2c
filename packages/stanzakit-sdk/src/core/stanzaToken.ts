/**
 * Per-outbound-stanza lifecycle record.
 *
 * ## State Diagram
 *
 * ```
 *            ┌──────────────► aborted
 *            │
 * ┌────────┐ │  ┌──────┐      ┌───────┐
 * │ active │─┼─►│ sent │─────►│ acked │
 * └────────┘ │  └──┬───┘      └───────┘
 *            │     │              ▲
 *            │     ▼              │ (no Stream Management:
 *            └─► disconnected     │  acked on local write)
 *            └────────────────────┘
 * ```
 *
 * Transitions are monotonic: nothing leaves `acked`, `disconnected` or
 * `aborted`. `done` settles exactly once, when a terminal state is reached.
 *
 * @module Core/StanzaToken
 */
import type { Element } from '@xmpp/client'
import { CancelledError, InvalidStateTransitionError, type StanzakitError } from './errors'
import type { TokenState, TokenOutcome } from './types'
import { createDeferred, type Deferred } from '../utils/deferred'
import { describeError, logError } from './logger'

const TRANSITIONS: Record<TokenState, readonly TokenState[]> = {
  active: ['sent', 'acked', 'disconnected', 'aborted'],
  sent: ['acked', 'disconnected'],
  acked: [],
  disconnected: [],
  aborted: [],
}

export function isTerminalTokenState(state: TokenState): boolean {
  return TRANSITIONS[state].length === 0
}

export type TokenStateListener = (state: TokenState, error: StanzakitError | null) => void

/**
 * Handle to one outbound stanza.
 *
 * Callers read `state`, await `done` and may `abort()` while the stanza has
 * not been handed to the transport. Only the stanza stream moves the token
 * forward.
 *
 * @example
 * ```typescript
 * const token = client.send(xml('message', { to: 'peer@example.com', type: 'chat' }, xml('body', {}, 'hi')))
 * const outcome = await token.done
 * if (outcome.state === 'disconnected') {
 *   // delivery unknown: the stream went away before the peer acknowledged
 * }
 * ```
 *
 * @category Stanza
 */
export class StanzaToken {
  readonly id: string
  readonly stanza: Element
  private _state: TokenState = 'active'
  private _error: StanzakitError | null = null
  private committed = false
  private listeners = new Set<TokenStateListener>()
  private outcome: Deferred<TokenOutcome> = createDeferred<TokenOutcome>()
  private onAbort: ((token: StanzaToken) => void) | null

  constructor(stanza: Element, id: string, onAbort?: (token: StanzaToken) => void) {
    this.stanza = stanza
    this.id = id
    this.onAbort = onAbort ?? null
  }

  get state(): TokenState {
    return this._state
  }

  /** Error attached to the last failure transition, if any. */
  get error(): StanzakitError | null {
    return this._error
  }

  /** Settles once with the terminal state. Never rejects. */
  get done(): Promise<TokenOutcome> {
    return this.outcome.promise
  }

  get isTerminal(): boolean {
    return isTerminalTokenState(this._state)
  }

  /**
   * Subscribe to state changes.
   * @returns A function to unsubscribe
   */
  onStateChange(listener: TokenStateListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Withdraw the stanza before it reaches the transport.
   *
   * @returns false when the stanza was already handed over (or finished)
   */
  abort(): boolean {
    if (this._state !== 'active' || this.committed) return false
    this.updateState('aborted', new CancelledError('Stanza aborted by caller'))
    this.onAbort?.(this)
    return true
  }

  /**
   * Mark the stanza as handed to the transport; `abort()` is refused from
   * here on.
   * @internal
   */
  commit(): void {
    this.committed = true
  }

  /**
   * Move to the next state.
   * @internal Called by the stanza stream and the SM ledger only.
   */
  updateState(next: TokenState, error?: StanzakitError): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new InvalidStateTransitionError(`Stanza token ${this.id}: ${this._state} → ${next} is not allowed`)
    }
    this._state = next
    if (error) this._error = error

    for (const listener of [...this.listeners]) {
      try {
        listener(next, this._error)
      } catch (err) {
        logError(`Stanza token listener threw: ${describeError(err)}`)
      }
    }

    switch (next) {
      case 'acked':
        this.outcome.resolve({ state: 'acked' })
        break
      case 'disconnected':
      case 'aborted':
        this.outcome.resolve({ state: next, error: this._error ?? new CancelledError() })
        break
    }
  }
}

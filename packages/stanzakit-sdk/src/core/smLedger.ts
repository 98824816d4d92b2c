/**
 * XEP-0198 Stream Management ledger.
 *
 * Keeps the outbound counter `O`, the inbound counter `I` and the ordered
 * queue of stanzas the peer has not acknowledged yet.
 *
 * ## Key Invariants
 *
 * 1. The unacked queue is sorted by ascending sequence and has no gaps
 * 2. When non-empty, `O === last.sequence + 1` and `first.sequence === lastAck`
 * 3. An ack lower than or equal to the highest one seen changes nothing
 * 4. An ack beyond `O` acknowledges everything sent and is reported, never applied
 * 5. Every decodable inbound stanza frame counts, including invalid ones
 *
 * Counts travel as unsigned 32-bit values and wrap to 0 after 2^32 - 1.
 * `I` is kept wrapped; `O` and the queue sequences are not, and a peer's
 * `h` is read as a distance forward from the last ack.
 *
 * All mutation is synchronous, so a call always runs to completion before
 * another sender or the inbound drain gets to touch the ledger.
 *
 * @module Core/SmLedger
 */
import { ProtocolViolationError, type DisconnectedError } from './errors'
import type { StanzaToken } from './stanzaToken'

/** Session parameters from `<enabled/>`. */
/** XEP-0198 counters wrap at this value. */
export const SM_COUNTER_MODULUS = 2 ** 32

export interface SmSession {
  id: string | null
  resumable: boolean
  /** Peer's preferred maximum resumption time (seconds), if announced */
  maxSeconds: number | null
  /** Peer's preferred reconnection address for resumption, if announced */
  location: string | null
}

/** Counter values to continue from, e.g. a session restored elsewhere. */
export interface SmCounters {
  inbound: number
  outbound: number
}

export interface UnackedEntry {
  sequence: number
  token: StanzaToken
}

export interface AckResult {
  /** Tokens that moved to `acked`, in sequence order */
  acked: StanzaToken[]
  /** Set when the peer acknowledged more stanzas than were ever sent */
  violation: ProtocolViolationError | null
}

export interface SmLedgerSnapshot {
  enabled: boolean
  id: string | null
  inbound: number
  outbound: number
  unacked: number
}

/**
 * @category Stream Management
 */
export class StreamManagementLedger {
  private _enabled = false
  private _session: SmSession | null = null
  private outbound = 0
  private inbound = 0
  private lastAck = 0
  private queue: UnackedEntry[] = []

  get enabled(): boolean {
    return this._enabled
  }

  get session(): SmSession | null {
    return this._session
  }

  /** `I`: stanzas received since Stream Management was enabled. */
  get inboundCount(): number {
    return this.inbound
  }

  /** `O`: stanzas handed to the transport since Stream Management was enabled. */
  get outboundCount(): number {
    return this.outbound
  }

  get unackedCount(): number {
    return this.queue.length
  }

  /** Highest acknowledgement applied so far. */
  get lastAcknowledged(): number {
    return this.lastAck
  }

  /**
   * Start counting for a new session, from zero unless `counters` says
   * otherwise. The queue must have been settled (acked, replayed or failed)
   * before.
   */
  enable(session: SmSession, counters: SmCounters = { inbound: 0, outbound: 0 }): void {
    this._enabled = true
    this._session = session
    this.outbound = counters.outbound
    this.inbound = counters.inbound % SM_COUNTER_MODULUS
    this.lastAck = counters.outbound
    this.queue = []
  }

  /**
   * Assign the next outbound sequence number and queue the token until the
   * peer acknowledges it. The token moves to `sent`.
   *
   * @returns The assigned sequence number
   */
  track(token: StanzaToken): number {
    const sequence = this.outbound
    this.queue.push({ sequence, token })
    this.outbound = sequence + 1
    token.updateState('sent')
    return sequence
  }

  /**
   * Apply an `<a h='N'/>` (or the `h` of `<resumed/>`/`<failed/>`): every
   * queued entry with sequence < N is acknowledged.
   */
  acknowledge(h: number): AckResult {
    // Half the counter space ahead counts as forward, the rest as stale
    const delta = (((h - this.lastAck) % SM_COUNTER_MODULUS) + SM_COUNTER_MODULUS) % SM_COUNTER_MODULUS
    if (delta === 0 || delta >= SM_COUNTER_MODULUS / 2) {
      return { acked: [], violation: null }
    }

    let violation: ProtocolViolationError | null = null
    let target = this.lastAck + delta
    if (target > this.outbound) {
      violation = new ProtocolViolationError(
        `Peer acknowledged ${h} stanzas but only ${this.outbound % SM_COUNTER_MODULUS} were sent`
      )
      target = this.outbound
    }

    const count = target - this.lastAck
    const removed = this.queue.splice(0, count)
    this.lastAck = target
    for (const entry of removed) {
      entry.token.updateState('acked')
    }
    return { acked: removed.map((entry) => entry.token), violation }
  }

  /**
   * Count one inbound stanza frame.
   *
   * Called for every frame the decoder could delimit as a stanza, valid or
   * not, so that `I` stays equal to what the peer believes it delivered.
   *
   * @returns The new value of `I`, or null when Stream Management is off
   */
  countInbound(): number | null {
    if (!this._enabled) return null
    this.inbound = (this.inbound + 1) % SM_COUNTER_MODULUS
    return this.inbound
  }

  /** Unacknowledged tokens in sequence order, for replay after resumption. */
  replayable(): StanzaToken[] {
    return this.queue.map((entry) => entry.token)
  }

  /** Sequence numbers currently queued. */
  unackedSequences(): number[] {
    return this.queue.map((entry) => entry.sequence)
  }

  /**
   * The session cannot be resumed: every queued token becomes
   * `disconnected` (delivery unknown) exactly once and the queue is emptied.
   *
   * @returns The tokens that were failed
   */
  fail(error: DisconnectedError): StanzaToken[] {
    const failed = this.queue.map((entry) => entry.token)
    this.queue = []
    for (const token of failed) {
      token.updateState('disconnected', error)
    }
    return failed
  }

  /** Turn Stream Management off. Any remaining queue must be failed first. */
  reset(): void {
    this._enabled = false
    this._session = null
    this.outbound = 0
    this.inbound = 0
    this.lastAck = 0
    this.queue = []
  }

  snapshot(): SmLedgerSnapshot {
    return {
      enabled: this._enabled,
      id: this._session?.id ?? null,
      inbound: this.inbound,
      outbound: this.outbound,
      unacked: this.queue.length,
    }
  }
}

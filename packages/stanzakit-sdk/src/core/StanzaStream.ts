/**
 * Stanza stream: binds one transport at a time to the SM ledger and the
 * dispatcher.
 *
 * The stream outlives transports. The lifecycle manager attaches a freshly
 * negotiated transport with {@link StanzaStream.start} (new session) or
 * {@link StanzaStream.resume} (previous session), detaches it with
 * {@link StanzaStream.suspend} when it is lost, and ends the session with
 * {@link StanzaStream.destroy}.
 *
 * ## Outbound path
 *
 * `send()` runs the outbound filters, then either writes the stanza right
 * away (stream running) or queues it as an `active` token until the next
 * session is up (stream suspended or negotiating). Under Stream Management
 * the ledger assigns the sequence number synchronously before the write,
 * and an `<r/>` is requested after a short debounce. Without it, the token
 * is `acked` once the write succeeds.
 *
 * ## Inbound path
 *
 * Every top-level element arrives through the transport's `element` event:
 * SM nonzas are handled here, stanzas are counted in the ledger and handed
 * to the dispatcher. Erroneous frames are counted too, then logged.
 *
 * @module Core/StanzaStream
 */
import { xml, type Element } from '@xmpp/client'
import {
  ApplicationRejectError,
  CancelledError,
  DisconnectedError,
  InvalidStateTransitionError,
  ProtocolViolationError,
  TimeoutError,
  TransientConnectivityError,
  type StanzakitError,
} from './errors'
import type { ErroneousFrame, SendIQOptions, StreamConfig, StreamFeatures, Transport } from './types'
import { StanzaToken } from './stanzaToken'
import { SM_COUNTER_MODULUS, StreamManagementLedger, type SmSession } from './smLedger'
import { describeStanza, type PendingReply, type StanzaDispatcher } from './dispatcher'
import { selectFilterChain, type StanzaFilters } from './stanzaFilters'
import { NS_PING, NS_SM } from './namespaces'
import { getDomain } from './jid'
import { abortReason } from './connectionUtils'
import { createLogger, describeError, type Logger } from './logger'
import { createDeferred, type Deferred } from '../utils/deferred'
import { generateStanzaId } from '../utils/stanzaId'

/** What a successful negotiation verdict carries into the stream. */
export interface NegotiatedStream {
  features: StreamFeatures
  jid: string | null
}

export interface StanzaStreamDeps {
  config: StreamConfig
  dispatcher: StanzaDispatcher
  filters: StanzaFilters
  ledger?: StreamManagementLedger
  log?: Logger
  /** Non-fatal inconsistencies, e.g. an ack beyond what was sent */
  onWarning?: (error: StanzakitError) => void
  /** Ledger counters changed */
  onLedgerChange?: () => void
}

interface NonzaWaiter {
  names: readonly string[]
  slot: Deferred<Element>
}

function isStanzaName(name: string): boolean {
  return name === 'message' || name === 'presence' || name === 'iq'
}

function parseCount(element: Element, attr: string): number | null {
  const raw = element.attrs[attr]
  if (raw === undefined) return null
  const value = Number(raw)
  return Number.isInteger(value) && value >= 0 && value < SM_COUNTER_MODULUS ? value : Number.NaN
}

/**
 * @category Stream
 */
export class StanzaStream {
  readonly ledger: StreamManagementLedger
  private readonly deps: StanzaStreamDeps
  private readonly log: Logger
  private transport: Transport | null = null
  private detachListeners: (() => void)[] = []
  private running = false
  private accepting = false
  private pendingSends: StanzaToken[] = []
  private waiters = new Set<NonzaWaiter>()
  private ackTimer: ReturnType<typeof setTimeout> | null = null
  private _jid: string | null = null
  private enablePending = false

  constructor(deps: StanzaStreamDeps) {
    this.deps = deps
    this.ledger = deps.ledger ?? new StreamManagementLedger()
    this.log = deps.log ?? createLogger('stream')
  }

  get config(): StreamConfig {
    return this.deps.config
  }

  /** Bound JID of the current session. */
  get jid(): string | null {
    return this._jid
  }

  /** A transport is attached and negotiated; sends are written right away. */
  get isRunning(): boolean {
    return this.running
  }

  /** Sends are accepted (written or queued) rather than failed. */
  get isAccepting(): boolean {
    return this.accepting
  }

  get smEnabled(): boolean {
    return this.ledger.enabled
  }

  /** The current session can be resumed after a transport loss. */
  get resumable(): boolean {
    const session = this.ledger.session
    return this.ledger.enabled && session !== null && session.resumable && session.id !== null
  }

  /** Sends queued until the next session is up. */
  get queuedCount(): number {
    return this.pendingSends.length
  }

  // ── Session lifecycle ────────────────────────────────────────────────────

  /** Start accepting sends; they queue until a session is running. */
  open(): void {
    this.accepting = true
  }

  /**
   * Run a fresh session on a negotiated transport: enable Stream
   * Management when both sides want it, then flush queued sends.
   *
   * @throws {TimeoutError} if the peer does not answer `<enable/>` in time
   */
  async start(transport: Transport, negotiated: NegotiatedStream, signal?: AbortSignal): Promise<void> {
    this.attach(transport)
    this._jid = negotiated.jid
    const leftover = this.ledger.fail(new DisconnectedError('A new session was started'))
    if (leftover.length > 0) {
      this.log.warn(`${leftover.length} unacknowledged stanza(s) dropped by a new session`)
    }
    this.ledger.reset()

    if (this.config.streamManagement && negotiated.features.streamManagement) {
      const attrs: Record<string, string> = { xmlns: NS_SM }
      if (this.config.requestResumption) attrs.resume = 'true'
      this.enablePending = true
      const reply = await this.exchange(transport, xml('enable', attrs), ['enabled', 'failed'], signal).finally(() => {
        this.enablePending = false
      })
      if (reply.name === 'enabled') {
        this.log.info(`Stream Management enabled${reply.attrs.resume === 'true' || reply.attrs.resume === '1' ? ' (resumable)' : ''}`)
      } else {
        this.log.warn('Peer refused to enable Stream Management')
      }
    }

    this.running = true
    this.flushPending()
    this.deps.onLedgerChange?.()
  }

  /**
   * Try to resume the previous session on a negotiated transport.
   *
   * On `<resumed/>` the unacked queue is replayed in order before queued
   * sends. On `<failed/>` only the acknowledgement it carries is applied;
   * the caller is expected to destroy the old session and {@link start} a
   * fresh one on the same transport.
   *
   * @returns Whether the session was resumed
   */
  async resume(transport: Transport, negotiated: NegotiatedStream, signal?: AbortSignal): Promise<boolean> {
    const session = this.ledger.session
    if (!this.resumable || !session?.id) {
      throw new InvalidStateTransitionError('No resumable Stream Management session')
    }

    this.attach(transport)
    const request = xml('resume', { xmlns: NS_SM, h: String(this.ledger.inboundCount), previd: session.id })
    const reply = await this.exchange(transport, request, ['resumed', 'failed'], signal)

    const h = parseCount(reply, 'h')
    if (h !== null) this.applyAck(h)

    if (reply.name === 'failed') {
      this.log.warn('Stream resumption failed')
      return false
    }

    if (negotiated.jid) this._jid = negotiated.jid
    const replay = this.ledger.replayable()
    this.running = true
    for (const token of replay) {
      this.write(transport, token.stanza)
    }
    this.log.info(`Stream resumed, replayed ${replay.length} stanza(s)`)
    this.flushPending()
    if (replay.length > 0) this.scheduleAckRequest()
    this.deps.onLedgerChange?.()
    return true
  }

  /**
   * The transport was lost. The ledger is kept for resumption and sends
   * queue until the next session.
   */
  suspend(): void {
    this.detach(new DisconnectedError('Transport lost'))
  }

  /**
   * End the session: tokens awaiting an ack become `disconnected`, pending
   * requests are rejected and handler tasks cancelled.
   *
   * Queued messages and presences survive a non-final destroy and go out
   * in the next session. A `final` destroy (caller disconnect or fatal
   * error) also fails them and stops accepting sends.
   */
  async destroy(reason: StanzakitError, options: { final: boolean }): Promise<void> {
    const error = reason instanceof DisconnectedError ? reason : new DisconnectedError(`Stream destroyed: ${reason.message}`, { cause: reason })
    this.detach(error)

    const unacked = this.ledger.fail(error)
    if (unacked.length > 0) {
      this.log.warn(`${unacked.length} stanza(s) were not acknowledged before the session ended`)
    }
    this.ledger.reset()

    if (options.final) {
      this.accepting = false
      this._jid = null
      this.failQueued(() => true, error)
    } else {
      // Their reply slots go away with the session
      this.failQueued((token) => token.stanza.name === 'iq', error)
    }

    this.deps.onLedgerChange?.()
    await this.deps.dispatcher.shutdown(error, this.config.taskCancelGraceMs)
  }

  /**
   * Send a final `<a/>` so the peer knows what was received before the
   * stream closes. Does nothing without Stream Management.
   */
  async sendFinalAck(): Promise<void> {
    const transport = this.transport
    if (!transport || !this.ledger.enabled) return
    try {
      await transport.write(xml('a', { xmlns: NS_SM, h: String(this.ledger.inboundCount) }))
    } catch (err) {
      this.log.debug(`Final ack not sent: ${describeError(err)}`)
    }
  }

  // ── Outbound ─────────────────────────────────────────────────────────────

  /**
   * Send a stanza. Always returns a token; failures are reported through
   * its state, never thrown. A stanza without an id gets one.
   */
  send(stanza: Element): StanzaToken {
    if (!stanza.attrs.id) stanza.attrs.id = generateStanzaId()
    const chain = selectFilterChain(this.deps.filters, 'outbound', stanza.name)
    const filtered = chain ? chain.apply(stanza) : stanza

    const token = new StanzaToken(filtered ?? stanza, stanza.attrs.id, (aborted) => this.dequeue(aborted))
    if (!filtered) {
      token.updateState('aborted', new CancelledError('Dropped by outbound filter'))
      return token
    }
    if (!this.accepting) {
      token.updateState('disconnected', new DisconnectedError('Stream is not connected'))
      return token
    }
    if (!this.running) {
      this.pendingSends.push(token)
      return token
    }
    this.transmit(token)
    return token
  }

  /**
   * Send an IQ get/set and wait for its reply.
   *
   * @returns The `result` IQ
   * @throws {ApplicationRejectError} when the peer answers with an error
   * @throws {DisconnectedError} when the session ends first
   * @throws {TimeoutError} / {CancelledError} per `options`
   */
  sendIQ(iq: Element, options: SendIQOptions = {}): Promise<Element> {
    const type = iq.attrs.type
    if (iq.name !== 'iq' || (type !== 'get' && type !== 'set')) {
      return Promise.reject(new InvalidStateTransitionError('sendIQ() takes an <iq/> of type get or set'))
    }
    if (!iq.attrs.id) iq.attrs.id = generateStanzaId()

    let reply: PendingReply
    try {
      reply = this.deps.dispatcher.expectReply(iq.attrs.to || undefined, iq.attrs.id, options)
    } catch (err) {
      return Promise.reject(err)
    }
    const token = this.send(iq)
    void token.done.then((outcome) => {
      if (outcome.state !== 'acked') reply.fail(outcome.error)
    })
    return reply.promise
  }

  /** Ask the peer for an ack now. */
  requestAck(): void {
    const transport = this.transport
    if (!transport || !this.running || !this.ledger.enabled) return
    this.write(transport, xml('r', { xmlns: NS_SM }))
  }

  /**
   * Check that the peer still answers: an SM ack round trip, or an
   * XEP-0199 ping to the server without Stream Management.
   *
   * @throws {TimeoutError} if no answer arrives within `timeoutMs`
   */
  async verify(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    const transport = this.transport
    if (!transport || !this.running) {
      throw new DisconnectedError('Stream is not running')
    }

    if (this.ledger.enabled) {
      await this.exchange(transport, xml('r', { xmlns: NS_SM }), ['a'], signal, timeoutMs)
      return
    }

    const to = this._jid ? getDomain(this._jid) : undefined
    const attrs: Record<string, string> = { type: 'get' }
    if (to) attrs.to = to
    try {
      await this.sendIQ(xml('iq', attrs, xml('ping', { xmlns: NS_PING })), { timeoutMs, signal })
    } catch (err) {
      // Any stanza error still proves the stream is alive
      if (!(err instanceof ApplicationRejectError)) throw err
    }
  }

  private transmit(token: StanzaToken): void {
    const transport = this.transport
    if (!transport) {
      this.pendingSends.push(token)
      return
    }

    token.commit()
    if (this.ledger.enabled) {
      this.ledger.track(token)
      this.write(transport, token.stanza)
      this.scheduleAckRequest()
      this.deps.onLedgerChange?.()
      return
    }

    void transport.write(token.stanza).then(
      () => token.updateState('acked'),
      (err: unknown) => token.updateState('disconnected', new DisconnectedError('Write failed', { cause: err }))
    )
  }

  /** Write without waiting; a failed write shows up as a transport close. */
  private write(transport: Transport, element: Element): void {
    transport.write(element).catch((err: unknown) => {
      this.log.debug(`Write of ${describeStanza(element)} failed: ${describeError(err)}`)
    })
  }

  private flushPending(): void {
    const queued = this.pendingSends
    this.pendingSends = []
    for (const token of queued) {
      if (token.state === 'active') this.transmit(token)
    }
  }

  private dequeue(token: StanzaToken): void {
    this.pendingSends = this.pendingSends.filter((t) => t !== token)
  }

  private failQueued(match: (token: StanzaToken) => boolean, error: DisconnectedError): void {
    const failed = this.pendingSends.filter(match)
    this.pendingSends = this.pendingSends.filter((token) => !match(token))
    for (const token of failed) {
      token.updateState('disconnected', error)
    }
  }

  private scheduleAckRequest(): void {
    const delay = this.config.ackRequestDebounceMs
    if (delay <= 0) {
      this.requestAck()
      return
    }
    if (this.ackTimer) return
    this.ackTimer = setTimeout(() => {
      this.ackTimer = null
      if (this.ledger.unackedCount > 0) this.requestAck()
    }, delay)
  }

  private cancelAckRequest(): void {
    if (this.ackTimer) {
      clearTimeout(this.ackTimer)
      this.ackTimer = null
    }
  }

  // ── Inbound ──────────────────────────────────────────────────────────────

  private attach(transport: Transport): void {
    this.detachListeners.forEach((off) => off())
    this.transport = transport
    this.detachListeners = [
      transport.on('element', (element) => this.handleElement(element)),
      transport.on('erroneous', (frame) => this.handleErroneous(frame)),
    ]
  }

  private detach(error: StanzakitError): void {
    this.detachListeners.forEach((off) => off())
    this.detachListeners = []
    this.transport = null
    this.running = false
    this.cancelAckRequest()
    for (const waiter of this.waiters) {
      waiter.slot.reject(error)
    }
    this.waiters.clear()
  }

  private handleElement(element: Element): void {
    if (element.attrs.xmlns === NS_SM) {
      this.handleNonza(element)
      return
    }
    if (isStanzaName(element.name)) {
      this.countInbound()
      this.deps.dispatcher.dispatch(element)
      return
    }
    this.log.debug(`Ignoring top-level element ${describeStanza(element)}`)
  }

  private handleErroneous(frame: ErroneousFrame): void {
    this.countInbound()
    this.deps.dispatcher.dispatchErroneous(frame)
  }

  private countInbound(): void {
    if (this.ledger.countInbound() !== null) this.deps.onLedgerChange?.()
  }

  private handleNonza(element: Element): void {
    switch (element.name) {
      // Counting starts with the element right after <enabled/>.
      case 'enabled':
        if (this.enablePending) {
          this.enablePending = false
          this.ledger.enable(this.parseSession(element))
          this.deps.onLedgerChange?.()
        }
        break
      case 'failed':
        this.enablePending = false
        break
      case 'r':
        if (this.ledger.enabled && this.transport) {
          this.write(this.transport, xml('a', { xmlns: NS_SM, h: String(this.ledger.inboundCount) }))
        }
        break
      case 'a': {
        const h = parseCount(element, 'h')
        this.applyAck(h ?? Number.NaN)
        break
      }
    }

    for (const waiter of [...this.waiters]) {
      if (waiter.names.includes(element.name)) {
        this.waiters.delete(waiter)
        waiter.slot.resolve(element)
      }
    }
  }

  private applyAck(h: number): void {
    if (Number.isNaN(h)) {
      this.warn(new ProtocolViolationError('Invalid ack count'))
      return
    }
    const result = this.ledger.acknowledge(h)
    if (result.violation) this.warn(result.violation)
    if (result.acked.length > 0) this.deps.onLedgerChange?.()
  }

  private warn(error: StanzakitError): void {
    this.log.warn(error.message)
    this.deps.onWarning?.(error)
  }

  private parseSession(enabled: Element): SmSession {
    const max = parseCount(enabled, 'max')
    return {
      id: enabled.attrs.id || null,
      resumable: enabled.attrs.resume === 'true' || enabled.attrs.resume === '1',
      maxSeconds: max === null || Number.isNaN(max) ? null : max,
      location: enabled.attrs.location || null,
    }
  }

  /**
   * Write `request` and wait for the first SM nonza named in `names`.
   * The waiter is registered before the write.
   */
  private exchange(
    transport: Transport,
    request: Element,
    names: readonly string[],
    signal?: AbortSignal,
    timeoutMs: number = this.config.negotiationTimeoutMs
  ): Promise<Element> {
    const waiter: NonzaWaiter = { names, slot: createDeferred<Element>() }
    this.waiters.add(waiter)

    const timer = setTimeout(() => {
      this.waiters.delete(waiter)
      waiter.slot.reject(new TimeoutError(`No <${names.join('/')}/> within ${timeoutMs}ms`))
    }, timeoutMs)
    const onAbort = () => {
      this.waiters.delete(waiter)
      if (signal) waiter.slot.reject(abortReason(signal))
    }
    if (signal?.aborted) {
      onAbort()
    } else {
      signal?.addEventListener('abort', onAbort, { once: true })
    }

    transport.write(request).catch((err: unknown) => {
      this.waiters.delete(waiter)
      waiter.slot.reject(new TransientConnectivityError(`Could not write <${request.name}/>`, { cause: err }))
    })

    return waiter.slot.promise.finally(() => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    })
  }
}

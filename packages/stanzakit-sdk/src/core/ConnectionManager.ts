import { createActor } from 'xstate'
import {
  CancelledError,
  ConnectionAttemptsExhaustedError,
  CriticalSecurityError,
  DisconnectedError,
  InvalidStateTransitionError,
  ProtocolViolationError,
  StanzakitError,
  TimeoutError,
  TransientConnectivityError,
  classifyFailure,
  toStanzakitError,
  type AttemptFailure,
} from './errors'
import type {
  Connector,
  Endpoint,
  FailureKind,
  LifecycleConfig,
  LifecycleEventMap,
  LifecycleState,
  Transport,
  TransportCloseInfo,
} from './types'
import { connectionMachine, getLifecycleState, type ConnectionActor, type ConnectionMachineEvent } from './connectionMachine'
import { resolveLifecycleConfig, type LifecycleConfigInput } from './config'
import {
  computeBackoffDelay,
  abortReason,
  formatEndpoint,
  linkSignal,
  parseLocation,
  preferEndpoint,
  raceSignal,
  sleep,
  withTimeout,
} from './connectionUtils'
import type { NegotiatedStream, StanzaStream } from './StanzaStream'
import { createLogger, describeError, type Logger } from './logger'
import { TypedEventEmitter } from '../utils/eventEmitter'

type EstablishMode = 'fresh' | 'resume'

export interface ConnectionManagerDeps {
  connector: Connector
  stream: StanzaStream
  config: LifecycleConfigInput
  log?: Logger
}

/** Turn what a transport reported into a typed error of the matching kind. */
function errorForFailure(kind: FailureKind, error: Error): StanzakitError {
  if (error instanceof StanzakitError && classifyFailure(error) === kind) return error
  switch (kind) {
    case 'transient':
      return new TransientConnectivityError(error.message, { cause: error })
    case 'critical':
      return new CriticalSecurityError(error.message, { cause: error })
    case 'fatal':
      return new ProtocolViolationError(error.message, { cause: error })
  }
}

/**
 * How giving up is recorded: running out of candidates leaves the manager
 * `failed` (a later connect() may succeed), anything else `destroyed`.
 */
function giveUpEvent(err: unknown): 'FATAL' | 'CONNECT_FAILED' {
  if (err instanceof ConnectionAttemptsExhaustedError) return 'CONNECT_FAILED'
  return classifyFailure(err) === 'fatal' ? 'FATAL' : 'CONNECT_FAILED'
}

/**
 * Connection lifecycle manager.
 *
 * Opens transports through the {@link Connector}, hands negotiated ones to
 * the {@link StanzaStream}, and recovers from transport loss by resuming
 * the Stream Management session or reconnecting fresh.
 *
 * Failures are classified by {@link classifyFailure}:
 * - `transient`: try the next candidate, then the next pass after backoff
 * - `critical`: try the remaining candidates but start no further pass; when
 *   the last candidate fails this way its error is thrown as-is
 * - `fatal`: stop at once
 *
 * @remarks
 * Configuration is explicit: each manager owns a resolved copy, replaced
 * only through {@link ConnectionManager.reconfigure}. Backoff sleeps and
 * in-flight attempts are cancelled immediately by
 * {@link ConnectionManager.disconnect}.
 *
 * @example
 * ```typescript
 * const manager = new ConnectionManager({ connector, stream, config: { endpoints } })
 * manager.on('streamSuspended', ({ error }) => console.log('lost:', error.message))
 * await manager.connect()
 * ```
 *
 * @category Connection
 */
export class ConnectionManager {
  private readonly actor: ConnectionActor
  private readonly events = new TypedEventEmitter<LifecycleEventMap>()
  private readonly connector: Connector
  private readonly stream: StanzaStream
  private readonly log: Logger
  private config: LifecycleConfig

  private transport: Transport | null = null
  private transportOff: (() => void) | null = null
  /** Aborted by disconnect(); spans one connect() until disconnect or giving up */
  private lifetime: AbortController | null = null
  private attemptController: AbortController | null = null
  /** The stream on `transport` is negotiated and running */
  private steady = false
  /** A session exists whose destruction has not been announced yet */
  private sessionOpen = false
  private suspendedAt: number | null = null
  private recovery: Promise<void> | null = null

  constructor(deps: ConnectionManagerDeps) {
    this.connector = deps.connector
    this.stream = deps.stream
    this.config = resolveLifecycleConfig(deps.config)
    this.log = deps.log ?? createLogger('lifecycle')

    this.actor = createActor(connectionMachine)
    let previous: LifecycleState = 'idle'
    this.actor.subscribe((snapshot) => {
      const state = getLifecycleState(this.actor)
      if (state === previous) return
      const from = previous
      previous = state
      this.log.debug(`${from} → ${state}${snapshot.context.lastError ? ` (${snapshot.context.lastError})` : ''}`)
      this.events.emit('stateChange', { state, previous: from })
    })
    this.actor.start()
  }

  get state(): LifecycleState {
    return getLifecycleState(this.actor)
  }

  /** Current pass over the candidates while connecting, else 0. */
  get pass(): number {
    return this.actor.getSnapshot().context.pass
  }

  get currentConfig(): Readonly<LifecycleConfig> {
    return this.config
  }

  /**
   * Subscribe to a lifecycle event.
   * @returns A function to unsubscribe
   */
  on<K extends keyof LifecycleEventMap>(event: K, handler: (payload: LifecycleEventMap[K]) => void): () => void {
    return this.events.on(event, handler)
  }

  /** Publish a non-fatal inconsistency as a `warning` event. */
  reportWarning(error: StanzakitError): void {
    this.log.warn(error.message)
    this.events.emit('warning', { error })
  }

  /**
   * Replace configuration values. They apply from the next attempt on.
   *
   * @throws {ConfigurationError} if the merged configuration is invalid
   */
  reconfigure(patch: LifecycleConfigInput): void {
    this.config = resolveLifecycleConfig(patch, this.config)
  }

  /**
   * Connect and negotiate a fresh stream.
   *
   * @throws {CriticalSecurityError} when the last candidate failed security negotiation
   * @throws {ConnectionAttemptsExhaustedError} when every pass failed otherwise
   * @throws {CancelledError} when {@link disconnect} interrupted the attempt
   * @throws {InvalidStateTransitionError} when already connected or connecting
   */
  async connect(): Promise<void> {
    const state = this.state
    if (state !== 'idle' && state !== 'failed' && state !== 'destroyed') {
      throw new InvalidStateTransitionError(`Cannot connect while ${state}`)
    }

    const lifetime = new AbortController()
    this.lifetime = lifetime
    this.send({ type: 'CONNECT' })
    this.stream.open()

    try {
      await this.establish('fresh', lifetime.signal)
    } catch (err) {
      if (lifetime.signal.aborted) {
        throw new CancelledError('Connection attempt cancelled', { cause: err })
      }
      const error = toStanzakitError(err, (message, cause) => new ProtocolViolationError(message, { cause }))
      await this.giveUp(error, giveUpEvent(err))
      throw err
    }
  }

  /**
   * Close the stream cleanly and stop any reconnection in progress.
   *
   * Sends a final Stream Management ack when enabled. Pending sends and
   * requests end with a {@link DisconnectedError}; an in-flight
   * {@link connect} rejects with a {@link CancelledError}.
   */
  async disconnect(): Promise<void> {
    const state = this.state
    if (state === 'idle' || state === 'destroyed') return

    this.lifetime?.abort(new CancelledError('Disconnected by caller'))
    this.lifetime = null

    const transport = this.transport
    const wasSteady = this.steady
    this.releaseTransport()
    if (transport) {
      if (wasSteady) await this.stream.sendFinalAck()
      await this.closeTransport(transport)
    }

    this.send({ type: 'DISCONNECT' })
    const reason = new DisconnectedError('Disconnected by caller')
    await this.stream.destroy(reason, { final: true })
    this.announceDestroyed(reason)

    const recovery = this.recovery
    if (recovery) await recovery
  }

  /**
   * Check that the established stream still answers (SM ack round trip, or
   * a ping without Stream Management). When it does not, the transport is
   * treated as lost and the normal recovery starts.
   *
   * @returns Whether the stream answered in time
   */
  async verifyConnection(): Promise<boolean> {
    const transport = this.transport
    if (this.state !== 'established' || !transport || !this.steady) return false

    try {
      await this.stream.verify(this.config.verifyTimeoutMs, this.lifetime?.signal)
      return true
    } catch (err) {
      if (transport !== this.transport || !this.steady) return false
      this.log.warn(`Connection verification failed: ${describeError(err)}`)
      const error =
        err instanceof StanzakitError && classifyFailure(err) === 'transient'
          ? err
          : new TimeoutError(`Connection verification failed: ${describeError(err)}`)
      void this.closeTransport(transport)
      this.handleClose(transport, { failure: { kind: 'transient', error } })
      return false
    }
  }

  /** Resolves once a background recovery started by a transport loss has finished. */
  async whenSettled(): Promise<void> {
    while (this.recovery) {
      await this.recovery
    }
  }

  // ── Connecting ───────────────────────────────────────────────────────────

  private async establish(initialMode: EstablishMode, signal: AbortSignal): Promise<void> {
    let mode = initialMode
    const failures: AttemptFailure[] = []
    const { maxPasses } = this.config

    for (let pass = 1; pass <= maxPasses; pass++) {
      if (signal.aborted) throw abortReason(signal)
      if (pass > 1) {
        const delayMs = computeBackoffDelay(pass - 1, this.config.backoff, this.config.random)
        this.log.info(`Retrying in ${delayMs}ms (pass ${pass}/${maxPasses})`)
        this.events.emit('retryScheduled', { pass, delayMs })
        await sleep(delayMs, signal)
      }

      if (mode === 'resume' && !this.withinResumptionWindow()) {
        this.log.info('Resumption window expired, starting a fresh session')
        await this.dropSession(new DisconnectedError('Stream Management resumption window expired'))
        this.send({ type: 'RECONNECT' })
        mode = 'fresh'
      }

      this.send({ type: 'PASS_STARTED', pass })
      const candidates = await this.candidates(mode, signal)
      let criticalSeen = false

      for (let i = 0; i < candidates.length; i++) {
        const endpoint = candidates[i]
        if (signal.aborted) throw abortReason(signal)
        this.events.emit('attempt', { pass, endpoint })
        try {
          const resumed = await this.attempt(endpoint, mode, signal)
          this.onEstablished(resumed)
          return
        } catch (err) {
          if (signal.aborted) throw err
          const kind = classifyFailure(err)
          if (kind === 'fatal' || !(err instanceof StanzakitError)) throw err

          failures.push({ pass, endpoint, kind, error: err })
          this.log.warn(`${formatEndpoint(endpoint)} failed (${kind}): ${err.message}`)
          if (kind === 'critical') {
            criticalSeen = true
            if (i === candidates.length - 1) throw err
          }
        }
      }

      if (criticalSeen) break
    }

    throw new ConnectionAttemptsExhaustedError(failures)
  }

  private async candidates(mode: EstablishMode, signal: AbortSignal): Promise<Endpoint[]> {
    const { resolveEndpoints, endpoints } = this.config
    const resolved = resolveEndpoints ? await raceSignal(resolveEndpoints(signal), signal) : endpoints

    const location = this.stream.ledger.session?.location
    if (mode === 'resume' && location) {
      const preferred = parseLocation(location, resolved[0]?.port ?? 5222)
      if (preferred) return preferEndpoint(resolved, preferred)
      this.log.warn(`Ignoring unusable resumption location '${location}'`)
    }
    return resolved
  }

  /**
   * Open one candidate, await its negotiation verdict and bring the stream
   * up on it.
   *
   * @returns Whether the previous session was resumed
   */
  private async attempt(endpoint: Endpoint, mode: EstablishMode, outer: AbortSignal): Promise<boolean> {
    const controller = new AbortController()
    const unlink = linkSignal(outer, controller)
    this.attemptController = controller
    const { attemptTimeoutMs } = this.config
    const timer = setTimeout(
      () => controller.abort(new TimeoutError(`No negotiation verdict from ${formatEndpoint(endpoint)} within ${attemptTimeoutMs}ms`)),
      attemptTimeoutMs
    )

    let transport: Transport | null = null
    try {
      transport = await raceSignal(this.connector.open(endpoint, controller.signal), controller.signal, (late) => {
        void this.closeTransport(late)
      })
      this.watchTransport(transport)
      const negotiated = await this.awaitVerdict(transport, controller.signal)
      clearTimeout(timer)

      let resumed = false
      if (mode === 'resume') {
        resumed = await this.stream.resume(transport, negotiated, controller.signal)
        if (!resumed) {
          await this.dropSession(new DisconnectedError('Stream Management session could not be resumed'))
          await this.stream.start(transport, negotiated, controller.signal)
        }
      } else {
        await this.stream.start(transport, negotiated, controller.signal)
      }

      this.steady = true
      this.log.info(`Stream ${resumed ? 'resumed' : 'established'} via ${formatEndpoint(endpoint)}`)
      return resumed
    } catch (err) {
      if (transport) {
        if (transport === this.transport) this.releaseTransport()
        void this.closeTransport(transport)
      }
      throw err
    } finally {
      clearTimeout(timer)
      unlink()
      if (this.attemptController === controller) this.attemptController = null
    }
  }

  private awaitVerdict(transport: Transport, signal: AbortSignal): Promise<NegotiatedStream> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        off()
        signal.removeEventListener('abort', onAbort)
      }
      const onAbort = () => {
        cleanup()
        reject(abortReason(signal))
      }
      const off = transport.on('negotiated', (result) => {
        cleanup()
        switch (result.verdict) {
          case 'success':
            resolve({ features: result.features, jid: result.jid })
            break
          case 'critical-failure':
            reject(errorForFailure('critical', result.error))
            break
          case 'transient-failure':
            reject(errorForFailure('transient', result.error))
            break
        }
      })
      if (signal.aborted) {
        onAbort()
      } else {
        signal.addEventListener('abort', onAbort, { once: true })
      }
    })
  }

  private onEstablished(resumed: boolean): void {
    this.suspendedAt = null
    this.sessionOpen = true
    this.send({ type: 'ESTABLISHED', resumed })
    if (resumed) {
      this.events.emit('streamResumed', { jid: this.stream.jid })
    } else {
      this.events.emit('streamEstablished', { jid: this.stream.jid, streamManagement: this.stream.smEnabled })
    }
  }

  // ── Transport loss and recovery ──────────────────────────────────────────

  private watchTransport(transport: Transport): void {
    this.releaseTransport()
    this.transport = transport
    this.transportOff = transport.on('close', (info) => this.handleClose(transport, info))
  }

  private releaseTransport(): void {
    this.transportOff?.()
    this.transportOff = null
    this.transport = null
    this.steady = false
  }

  private handleClose(transport: Transport, info: TransportCloseInfo): void {
    if (transport !== this.transport) return

    const kind = info.failure?.kind ?? 'transient'
    const error = info.failure ? errorForFailure(kind, info.failure.error) : new TransientConnectivityError('Stream closed by peer')

    if (!this.steady) {
      // Still negotiating: fail the attempt, establish() decides what next
      this.attemptController?.abort(error)
      return
    }

    this.releaseTransport()
    const recovery = this.recover(kind, error).finally(() => {
      if (this.recovery === recovery) this.recovery = null
    })
    this.recovery = recovery
  }

  private async recover(kind: FailureKind, error: StanzakitError): Promise<void> {
    const lifetime = this.lifetime
    if (!lifetime) return

    if (kind !== 'transient') {
      this.log.error(`Stream failed (${kind}): ${error.message}`)
      await this.giveUp(error, 'FATAL')
      return
    }

    this.log.warn(`Transport lost: ${error.message}`)
    this.suspendedAt = Date.now()
    this.send({ type: 'TRANSPORT_LOST', error: error.message })
    this.stream.suspend()
    this.events.emit('streamSuspended', { error })

    try {
      if (this.stream.resumable) {
        this.send({ type: 'RESUME' })
        await this.establish('resume', lifetime.signal)
      } else {
        await this.dropSession(error)
        this.send({ type: 'RECONNECT' })
        await this.establish('fresh', lifetime.signal)
      }
    } catch (err) {
      if (lifetime.signal.aborted) return
      const failure = toStanzakitError(err, (message, cause) => new ProtocolViolationError(message, { cause }))
      this.log.error(`Recovery failed: ${failure.message}`)
      await this.giveUp(failure, giveUpEvent(err))
    }
  }

  private withinResumptionWindow(): boolean {
    if (this.suspendedAt === null) return true
    const maxSeconds = this.stream.ledger.session?.maxSeconds
    const windowMs = maxSeconds != null ? maxSeconds * 1000 : this.config.resumptionWindowMs
    return Date.now() - this.suspendedAt <= windowMs
  }

  /** End the current session but keep accepting sends for the next one. */
  private async dropSession(reason: StanzakitError): Promise<void> {
    await this.stream.destroy(reason, { final: false })
    this.announceDestroyed(reason)
  }

  /** Stop for good: the stream is destroyed and the manager `failed` or `destroyed`. */
  private async giveUp(error: StanzakitError, event: 'FATAL' | 'CONNECT_FAILED'): Promise<void> {
    const transport = this.transport
    this.releaseTransport()
    if (transport) await this.closeTransport(transport)

    this.lifetime = null
    this.send({ type: event, error: error.message })
    await this.stream.destroy(error, { final: true })
    this.announceDestroyed(error)
    this.events.emit('connectionFailed', { error })
  }

  private announceDestroyed(reason: StanzakitError): void {
    if (!this.sessionOpen) return
    this.sessionOpen = false
    this.events.emit('streamDestroyed', { reason })
  }

  private async closeTransport(transport: Transport): Promise<void> {
    try {
      await withTimeout(transport.close(), this.config.stopTimeoutMs)
    } catch (err) {
      this.log.debug(`Transport close failed: ${describeError(err)}`)
    }
  }

  private send(event: ConnectionMachineEvent): void {
    this.actor.send(event)
  }
}

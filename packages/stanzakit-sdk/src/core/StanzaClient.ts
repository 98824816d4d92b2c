import type { Element } from '@xmpp/client'
import { ConnectionManager } from './ConnectionManager'
import { StanzaStream } from './StanzaStream'
import { StanzaDispatcher } from './dispatcher'
import { createStanzaFilters, type StanzaFilters } from './stanzaFilters'
import { ServiceRegistry, type ServiceHost } from './serviceRegistry'
import { PingService } from './services/PingService'
import { resolveStreamConfig, type LifecycleConfigInput } from './config'
import { InvalidStateTransitionError } from './errors'
import type { StanzaToken } from './stanzaToken'
import type {
  Connector,
  HandlerFilter,
  IQRequestHandler,
  IQRequestType,
  LifecycleEventMap,
  LifecycleState,
  SendIQOptions,
  Service,
  ServiceDescriptor,
  StanzaCategory,
  StanzaFilter,
  StanzaHandler,
  StreamConfig,
} from './types'
import { createLogger, describeError, type Logger } from './logger'
import { createSessionStore, type SessionStore } from '../stores/sessionStore'

/**
 * Client configuration: the connector, the lifecycle settings (endpoints,
 * backoff, timeouts) and stream settings.
 *
 * @category Core
 */
export type StanzaClientConfig = LifecycleConfigInput & {
  connector: Connector
  stream?: Partial<StreamConfig>
  /** Register the built-in XEP-0199 responder. Default: true */
  ping?: boolean
  log?: Logger
}

/**
 * Reliable XMPP messaging core.
 *
 * Wires the stanza stream, the dispatcher, the connection lifecycle
 * manager and the service registry together, and mirrors their state into
 * a {@link SessionStore}.
 *
 * @remarks
 * Services start before the first connection attempt and stop after
 * {@link StanzaClient.disconnect}, or when {@link StanzaClient.connect}
 * fails. They stay registered and are started again by the next connect.
 *
 * @example
 * ```typescript
 * const client = new StanzaClient({ connector, endpoints: [{ host: 'xmpp.example.com', port: 5222 }] })
 *
 * client.registerMessageHandler({ type: 'chat' }, (stanza) => {
 *   console.log('chat from', stanza.attrs.from)
 * })
 * client.on('streamSuspended', ({ error }) => console.warn('connection lost:', error.message))
 *
 * await client.connect()
 * const token = client.send(xml('message', { to: 'peer@example.com', type: 'chat' }, xml('body', {}, 'hi')))
 * const outcome = await token.done
 * ```
 *
 * @category Core
 */
export class StanzaClient {
  /** Observable session state (status, JID, retry state, ledger counters). */
  readonly session: SessionStore
  private readonly filters: StanzaFilters
  private readonly dispatcher: StanzaDispatcher
  private readonly stream: StanzaStream
  private readonly manager: ConnectionManager
  private readonly services: ServiceRegistry
  private readonly log: Logger

  constructor(config: StanzaClientConfig) {
    const { connector, stream: streamConfig, ping = true, log, ...lifecycle } = config
    this.log = log ?? createLogger('client')
    this.session = createSessionStore()
    this.filters = createStanzaFilters()
    this.dispatcher = new StanzaDispatcher({
      filters: this.filters,
      sendReply: (reply) => {
        this.stream.send(reply)
      },
      localJid: () => this.stream.jid,
    })
    this.stream = new StanzaStream({
      config: resolveStreamConfig(streamConfig),
      dispatcher: this.dispatcher,
      filters: this.filters,
      onWarning: (error) => this.manager.reportWarning(error),
      onLedgerChange: () => this.session.getState().setLedger(this.stream.ledger.snapshot()),
    })
    this.manager = new ConnectionManager({ connector, stream: this.stream, config: lifecycle })
    this.services = new ServiceRegistry()
    if (ping) this.services.register(PingService.descriptor)

    this.bindLifecycle()
  }

  /** Bound JID of the current session. */
  get jid(): string | null {
    return this.stream.jid
  }

  getState(): LifecycleState {
    return this.manager.state
  }

  /**
   * Subscribe to a lifecycle event.
   * @returns A function to unsubscribe
   */
  on<K extends keyof LifecycleEventMap>(event: K, handler: (payload: LifecycleEventMap[K]) => void): () => void {
    return this.manager.on(event, handler)
  }

  /**
   * Replace lifecycle settings (endpoints, backoff, timeouts). They apply
   * from the next attempt on.
   */
  reconfigure(patch: LifecycleConfigInput): void {
    this.manager.reconfigure(patch)
  }

  // ── Connection ───────────────────────────────────────────────────────────

  /**
   * Start the services, then connect.
   *
   * @throws {CriticalSecurityError} when the last candidate failed security negotiation
   * @throws {ConnectionAttemptsExhaustedError} when every pass failed
   * @throws {CancelledError} when {@link disconnect} interrupted the attempt
   */
  async connect(): Promise<void> {
    const state = this.manager.state
    if (state !== 'idle' && state !== 'failed' && state !== 'destroyed') {
      throw new InvalidStateTransitionError(`Cannot connect while ${state}`)
    }

    if (!this.services.isRunning) {
      await this.services.startAll(this.serviceHost())
    }
    try {
      await this.manager.connect()
    } catch (err) {
      this.log.warn(`Connect failed: ${describeError(err)}`)
      await this.services.stopAll()
      throw err
    }
  }

  /**
   * Close the stream and stop the services. Pending sends and requests
   * end with a {@link DisconnectedError}.
   */
  async disconnect(): Promise<void> {
    await this.manager.disconnect()
    await this.services.stopAll()
  }

  /**
   * Check that the stream still answers. A stream that does not is
   * treated as lost and recovery starts.
   */
  verifyConnection(): Promise<boolean> {
    return this.manager.verifyConnection()
  }

  /** Resolves once a background recovery has finished. */
  whenSettled(): Promise<void> {
    return this.manager.whenSettled()
  }

  // ── Stanzas ──────────────────────────────────────────────────────────────

  /**
   * Send a stanza. Never throws: the returned token reports whether the
   * stanza was acknowledged, lost with the stream, or dropped.
   */
  send(stanza: Element): StanzaToken {
    return this.stream.send(stanza)
  }

  /**
   * Send an IQ get/set and wait for the reply.
   *
   * @throws {ApplicationRejectError} when the peer answers with an error
   * @throws {DisconnectedError} when the session ends first
   */
  sendIQ(iq: Element, options?: SendIQOptions): Promise<Element> {
    return this.stream.sendIQ(iq, options)
  }

  /** @throws {DuplicateHandlerError} */
  registerMessageHandler(filter: HandlerFilter, handler: StanzaHandler): void {
    this.dispatcher.registerHandler('message', filter, handler)
  }

  /** @throws {DuplicateHandlerError} */
  registerPresenceHandler(filter: HandlerFilter, handler: StanzaHandler): void {
    this.dispatcher.registerHandler('presence', filter, handler)
  }

  /** @throws {DuplicateHandlerError} */
  registerIQHandler(type: IQRequestType, namespace: string, name: string, handler: IQRequestHandler): void {
    this.dispatcher.registerIQHandler(type, namespace, name, handler)
  }

  unregisterMessageHandler(filter: HandlerFilter): boolean {
    return this.dispatcher.unregisterHandler('message', filter)
  }

  unregisterPresenceHandler(filter: HandlerFilter): boolean {
    return this.dispatcher.unregisterHandler('presence', filter)
  }

  unregisterIQHandler(type: IQRequestType, namespace: string, name: string): boolean {
    return this.dispatcher.unregisterIQHandler(type, namespace, name)
  }

  /**
   * Add a stanza filter.
   * @returns A function that removes it again
   */
  registerFilter(direction: 'inbound' | 'outbound', category: StanzaCategory, filter: StanzaFilter, order = 0): () => void {
    const chains = {
      inbound: { message: this.filters.inboundMessage, presence: this.filters.inboundPresence },
      outbound: { message: this.filters.outboundMessage, presence: this.filters.outboundPresence },
    }
    return chains[direction][category].register(filter, order)
  }

  // ── Services ─────────────────────────────────────────────────────────────

  /**
   * Add a service. Only possible while services are stopped, i.e. before
   * connect() or after disconnect().
   *
   * @throws {ConfigurationError} on a duplicate name or a dependency loop
   * @throws {ServiceStateError} while services are running
   */
  registerService<S extends Service>(descriptor: ServiceDescriptor<S>): void {
    this.services.register(descriptor)
  }

  /** Instance of a running service, optionally checked against its class. */
  getService(name: string): Service | undefined
  getService<S extends Service>(name: string, type: new (...args: never[]) => S): S | undefined
  getService<S extends Service>(name: string, type?: new (...args: never[]) => S): Service | undefined {
    const instance = this.services.get(name)
    if (!type) return instance
    return instance instanceof type ? instance : undefined
  }

  private serviceHost(): ServiceHost {
    return {
      dispatcher: this.dispatcher,
      filters: this.filters,
      send: (stanza) => this.send(stanza),
      sendIQ: (iq, options) => this.sendIQ(iq, options),
    }
  }

  private bindLifecycle(): void {
    const session = () => this.session.getState()

    this.manager.on('stateChange', ({ state }) => {
      session().setStatus(state)
      if (state === 'established') {
        session().setRetryState(0, null)
        session().setError(null)
      }
    })
    this.manager.on('attempt', ({ pass }) => session().setRetryState(pass, null))
    this.manager.on('retryScheduled', ({ pass, delayMs }) => session().setRetryState(pass, Date.now() + delayMs))
    this.manager.on('connectionFailed', ({ error }) => session().setError(error.message))

    this.manager.on('streamEstablished', (payload) => {
      session().setJid(payload.jid)
      this.services.notify({ event: 'streamEstablished', payload })
    })
    this.manager.on('streamResumed', (payload) => {
      session().setJid(payload.jid)
      this.services.notify({ event: 'streamResumed', payload })
    })
    this.manager.on('streamSuspended', (payload) => {
      session().setError(payload.error.message)
      this.services.notify({ event: 'streamSuspended', payload })
    })
    this.manager.on('streamDestroyed', (payload) => {
      session().setJid(null)
      this.services.notify({ event: 'streamDestroyed', payload })
    })
  }
}

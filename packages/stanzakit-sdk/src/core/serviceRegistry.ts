/**
 * Service dependency scheduler.
 *
 * Keeps a flat list of {@link ServiceDescriptor}s and a stable topological
 * order over them, recomputed on every registration. Services start in that
 * order and stop in reverse; handlers and filters a service registered are
 * removed when it stops.
 *
 * ## Ordering
 *
 * `after: ['a']` puts `a` first and hands its instance to the factory.
 * `before: ['b']` puts `b` later, if `b` is registered at all. Services
 * without an edge between them keep registration order.
 *
 * @module Core/ServiceRegistry
 */
import type { Element } from '@xmpp/client'
import { ConfigurationError, ServiceStateError } from './errors'
import type {
  LifecycleEventMap,
  SendIQOptions,
  Service,
  ServiceContext,
  ServiceDescriptor,
  ServiceState,
} from './types'
import type { StanzaDispatcher } from './dispatcher'
import { removeFilterOwner, type StanzaFilters } from './stanzaFilters'
import type { StanzaToken } from './stanzaToken'
import { createLogger, describeError, type Logger } from './logger'

/** What the registry needs from the client to run services. */
export interface ServiceHost {
  dispatcher: StanzaDispatcher
  filters: StanzaFilters
  send(stanza: Element): StanzaToken
  sendIQ(iq: Element, options?: SendIQOptions): Promise<Element>
}

/** A lifecycle event delivered to every started service. */
export type ServiceNotification =
  | { event: 'streamEstablished'; payload: LifecycleEventMap['streamEstablished'] }
  | { event: 'streamResumed'; payload: LifecycleEventMap['streamResumed'] }
  | { event: 'streamSuspended'; payload: LifecycleEventMap['streamSuspended'] }
  | { event: 'streamDestroyed'; payload: LifecycleEventMap['streamDestroyed'] }

/** One start of a service; a restart gets a new run. */
interface ServiceRun {
  state: ServiceState
  instance: Service | null
}

interface ServiceEntry {
  descriptor: ServiceDescriptor
  run: ServiceRun | null
}

/**
 * Order services so that every edge is respected, breaking ties by
 * registration order (Kahn's algorithm, always taking the earliest ready
 * service).
 *
 * @throws {ConfigurationError} naming the services of a dependency loop
 */
export function orderServices(descriptors: readonly ServiceDescriptor[]): string[] {
  const index = new Map(descriptors.map((descriptor, i) => [descriptor.name, i]))
  const successors = descriptors.map(() => new Set<number>())

  descriptors.forEach((descriptor, i) => {
    for (const dependency of descriptor.after ?? []) {
      const j = index.get(dependency)
      if (j !== undefined) successors[j].add(i)
    }
    for (const later of descriptor.before ?? []) {
      const j = index.get(later)
      if (j !== undefined) successors[i].add(j)
    }
  })

  const indegree = descriptors.map(() => 0)
  for (const next of successors) {
    next.forEach((j) => indegree[j]++)
  }

  const placed = new Set<number>()
  const order: string[] = []
  while (order.length < descriptors.length) {
    const ready = indegree.findIndex((degree, i) => degree === 0 && !placed.has(i))
    if (ready < 0) {
      throw loopError(descriptors, successors, placed)
    }
    placed.add(ready)
    order.push(descriptors[ready].name)
    successors[ready].forEach((j) => indegree[j]--)
  }
  return order
}

function loopError(descriptors: readonly ServiceDescriptor[], successors: Set<number>[], placed: Set<number>): ConfigurationError {
  // Prefer the latest registration: it is the one that closed the loop
  for (let start = descriptors.length - 1; start >= 0; start--) {
    if (placed.has(start)) continue
    const path = findLoop(start, successors, placed)
    if (path) {
      const through = (path.length > 0 ? path : [start]).map((i) => descriptors[i].name)
      return new ConfigurationError(`dependency loop: ${descriptors[start].name} loops through ${through.join(', ')}`)
    }
  }
  return new ConfigurationError('dependency loop')
}

/** Nodes on a path from `start` back to itself, excluding `start`; null if there is none. */
function findLoop(start: number, successors: Set<number>[], placed: Set<number>): number[] | null {
  const path: number[] = []
  const visited = new Set<number>()
  const visit = (node: number): boolean => {
    for (const next of successors[node]) {
      if (next === start) return true
      if (visited.has(next) || placed.has(next)) continue
      visited.add(next)
      path.push(next)
      if (visit(next)) return true
      path.pop()
    }
    return false
  }
  return visit(start) ? path : null
}

function notifyService(service: Service, notification: ServiceNotification): void | Promise<void> {
  switch (notification.event) {
    case 'streamEstablished':
      return service.onStreamEstablished?.(notification.payload)
    case 'streamResumed':
      return service.onStreamResumed?.(notification.payload)
    case 'streamSuspended':
      return service.onStreamSuspended?.(notification.payload)
    case 'streamDestroyed':
      return service.onStreamDestroyed?.(notification.payload)
  }
}

/**
 * @category Services
 */
export class ServiceRegistry {
  private entries = new Map<string, ServiceEntry>()
  private order: string[] = []
  private host: ServiceHost | null = null
  private readonly log: Logger

  constructor(log: Logger = createLogger('services')) {
    this.log = log
  }

  /** Service names in start order. */
  get startOrder(): readonly string[] {
    return this.order
  }

  get isRunning(): boolean {
    return this.host !== null
  }

  has(name: string): boolean {
    return this.entries.has(name)
  }

  /** State of the current (or last) run of a service, undefined if unknown. */
  stateOf(name: string): ServiceState | undefined {
    const entry = this.entries.get(name)
    if (!entry) return undefined
    return entry.run?.state ?? 'registered'
  }

  /** Instance of a started service. */
  get(name: string): Service | undefined {
    const run = this.entries.get(name)?.run
    if (!run || (run.state !== 'starting' && run.state !== 'started')) return undefined
    return run.instance ?? undefined
  }

  /**
   * Add a service and recompute the start order. On error the registry is
   * left as it was.
   *
   * @throws {ConfigurationError} on a duplicate name or a dependency loop
   * @throws {ServiceStateError} while services are running
   */
  register(descriptor: ServiceDescriptor): void {
    const { name } = descriptor
    if (!name) {
      throw new ConfigurationError('Service name must not be empty')
    }
    if (this.entries.has(name)) {
      throw new ConfigurationError(`Service ${name} is already registered`)
    }
    if (this.host) {
      throw new ServiceStateError(`Cannot register service ${name} while services are running`)
    }

    const descriptors = [...this.entries.values()].map((entry) => entry.descriptor)
    const order = orderServices([...descriptors, descriptor])
    this.entries.set(name, { descriptor, run: null })
    this.order = order
  }

  /**
   * Create and start every service in order. When one fails, the ones
   * already started are stopped again and the error is rethrown.
   *
   * @throws {ConfigurationError} if a service depends on one that is not registered
   */
  async startAll(host: ServiceHost): Promise<void> {
    if (this.host) {
      throw new ServiceStateError('Services are already running')
    }
    for (const name of this.order) {
      for (const dependency of this.entry(name).descriptor.after ?? []) {
        if (!this.entries.has(dependency)) {
          throw new ConfigurationError(`Service ${name} depends on ${dependency}, which is not registered`)
        }
      }
    }

    this.host = host
    const started: ServiceEntry[] = []
    for (const name of this.order) {
      const entry = this.entry(name)
      try {
        await this.startEntry(entry, host)
      } catch (err) {
        this.log.error(`Service ${name} failed to start: ${describeError(err)}`)
        this.release(entry)
        for (const previous of started.reverse()) {
          await this.stopEntry(previous)
        }
        this.host = null
        throw err
      }
      started.push(entry)
    }
    this.log.debug(`Started ${started.length} service(s): ${this.order.join(', ')}`)
  }

  /** Stop every running service in reverse order. Errors are logged. */
  async stopAll(): Promise<void> {
    if (!this.host) return
    for (const name of [...this.order].reverse()) {
      await this.stopEntry(this.entry(name))
    }
    this.host = null
  }

  /**
   * Deliver a lifecycle event: established and resumed in start order,
   * suspended and destroyed in reverse. Hook failures are logged.
   */
  notify(notification: ServiceNotification): void {
    const forward = notification.event === 'streamEstablished' || notification.event === 'streamResumed'
    const names = forward ? this.order : [...this.order].reverse()

    for (const name of names) {
      const run = this.entries.get(name)?.run
      if (!run?.instance || run.state !== 'started') continue
      const report = (err: unknown) => this.log.error(`Service ${name} failed on ${notification.event}: ${describeError(err)}`)
      try {
        const result = notifyService(run.instance, notification)
        if (result instanceof Promise) void result.catch(report)
      } catch (err) {
        report(err)
      }
    }
  }

  private entry(name: string): ServiceEntry {
    const entry = this.entries.get(name)
    if (!entry) throw new ConfigurationError(`Service ${name} is not registered`)
    return entry
  }

  private async startEntry(entry: ServiceEntry, host: ServiceHost): Promise<void> {
    const run: ServiceRun = { state: 'starting', instance: null }
    entry.run = run
    const instance = entry.descriptor.create(this.createContext(entry.descriptor, run, host))
    run.instance = instance
    await instance.start?.()
    run.state = 'started'
  }

  private async stopEntry(entry: ServiceEntry): Promise<void> {
    const run = entry.run
    if (!run || (run.state !== 'starting' && run.state !== 'started')) return
    const { name } = entry.descriptor

    run.state = 'stopping'
    try {
      await run.instance?.stop?.()
    } catch (err) {
      this.log.error(`Service ${name} failed to stop: ${describeError(err)}`)
    }
    this.release(entry)
  }

  /** Drop everything the service registered and mark it stopped. */
  private release(entry: ServiceEntry): void {
    const { name } = entry.descriptor
    if (this.host) {
      this.host.dispatcher.removeOwner(name)
      removeFilterOwner(this.host.filters, name)
    }
    if (entry.run) {
      entry.run.state = 'stopped'
      entry.run.instance = null
    }
  }

  private createContext(descriptor: ServiceDescriptor, run: ServiceRun, host: ServiceHost): ServiceContext {
    const { name } = descriptor
    const requireRunning = (what: string) => {
      if (run.state !== 'starting' && run.state !== 'started') {
        throw new ServiceStateError(`Service ${name} cannot register ${what} while ${run.state}`)
      }
    }

    const dependencies = new Map<string, Service>()
    for (const dependency of descriptor.after ?? []) {
      const instance = this.get(dependency)
      if (instance) dependencies.set(dependency, instance)
    }

    const chains = {
      inbound: { message: host.filters.inboundMessage, presence: host.filters.inboundPresence },
      outbound: { message: host.filters.outboundMessage, presence: host.filters.outboundPresence },
    }

    return {
      name,
      logger: createLogger(`service:${name}`),
      dependencies,
      registrar: {
        registerMessageHandler: (filter, handler) => {
          requireRunning('a message handler')
          host.dispatcher.registerHandler('message', filter, handler, name)
        },
        registerPresenceHandler: (filter, handler) => {
          requireRunning('a presence handler')
          host.dispatcher.registerHandler('presence', filter, handler, name)
        },
        registerIQHandler: (type, namespace, payloadName, handler) => {
          requireRunning('an IQ handler')
          host.dispatcher.registerIQHandler(type, namespace, payloadName, handler, name)
        },
        registerFilter: (direction, category, filter, order = 0) => {
          requireRunning('a filter')
          return chains[direction][category].register(filter, order, name)
        },
      },
      send: (stanza) => host.send(stanza),
      sendIQ: (iq, options) => host.sendIQ(iq, options),
    }
  }
}

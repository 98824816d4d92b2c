/**
 * Service type definitions.
 *
 * A service is an extension (ping, roster, carbons...) riding on the core.
 * It is declared by a {@link ServiceDescriptor}: a name, ordering edges to
 * other services and a factory. The registry creates, starts and stops the
 * instances in dependency order.
 *
 * @packageDocumentation
 * @module Types/Service
 */
import type { Element } from '@xmpp/client'
import type { StanzaToken } from '../stanzaToken'
import type { Logger } from '../logger'
import type {
  HandlerFilter,
  IQRequestHandler,
  IQRequestType,
  SendIQOptions,
  StanzaCategory,
  StanzaFilter,
  StanzaHandler,
} from './stanza'
import type { LifecycleEventMap } from './events'

/**
 * A running service instance. Every hook is optional.
 *
 * Lifecycle hooks are called in start order for `onStreamEstablished` and
 * `onStreamResumed`, in reverse start order for `onStreamSuspended` and
 * `onStreamDestroyed`.
 *
 * @category Services
 */
export interface Service {
  start?(): void | Promise<void>
  stop?(): void | Promise<void>
  onStreamEstablished?(event: LifecycleEventMap['streamEstablished']): void | Promise<void>
  onStreamResumed?(event: LifecycleEventMap['streamResumed']): void | Promise<void>
  onStreamSuspended?(event: LifecycleEventMap['streamSuspended']): void | Promise<void>
  onStreamDestroyed?(event: LifecycleEventMap['streamDestroyed']): void | Promise<void>
}

/** @category Services */
export type ServiceLifecycleEvent = 'streamEstablished' | 'streamResumed' | 'streamSuspended' | 'streamDestroyed'

/**
 * Handler and filter registration for one service. Everything registered
 * here is owned by the service and removed when it stops.
 *
 * @throws {ServiceStateError} from every method while the service is not running
 * @category Services
 */
export interface ServiceRegistrar {
  registerMessageHandler(filter: HandlerFilter, handler: StanzaHandler): void
  registerPresenceHandler(filter: HandlerFilter, handler: StanzaHandler): void
  registerIQHandler(type: IQRequestType, namespace: string, name: string, handler: IQRequestHandler): void
  /** @returns A function that removes the filter again */
  registerFilter(direction: 'inbound' | 'outbound', category: StanzaCategory, filter: StanzaFilter, order?: number): () => void
}

/**
 * What a service factory receives.
 *
 * @category Services
 */
export interface ServiceContext {
  name: string
  logger: Logger
  /** Instances of the services named in `after`, by name */
  dependencies: ReadonlyMap<string, Service>
  registrar: ServiceRegistrar
  send(stanza: Element): StanzaToken
  sendIQ(iq: Element, options?: SendIQOptions): Promise<Element>
}

/**
 * Declaration of a service.
 *
 * @remarks
 * `after` names dependencies: they start earlier and their instances are
 * passed in. `before` only orders: the named services, if registered,
 * start later.
 *
 * @category Services
 */
export interface ServiceDescriptor<S extends Service = Service> {
  name: string
  after?: readonly string[]
  before?: readonly string[]
  create(context: ServiceContext): S
}

/** @category Services */
export type ServiceState = 'registered' | 'starting' | 'started' | 'stopping' | 'stopped'

/**
 * Core type definitions.
 *
 * Re-exports the public types used throughout the SDK, organized by domain.
 *
 * @packageDocumentation
 * @module Types
 */

export type {
  Endpoint,
  FailureKind,
  StreamFeatures,
  NegotiationResult,
  ErroneousFrame,
  TransportCloseInfo,
  TransportEventMap,
  Transport,
  Connector,
} from './transport'

export type {
  TokenState,
  TerminalTokenState,
  TokenOutcome,
  StanzaCategory,
  IQRequestType,
  HandlerFilter,
  HandlerContext,
  StanzaHandler,
  IQRequestContext,
  IQRequestHandler,
  StanzaFilter,
  SendIQOptions,
} from './stanza'

export type {
  LifecycleState,
  BackoffConfig,
  LifecycleConfig,
  StreamConfig,
} from './connection'

export type { LifecycleEventMap } from './events'

export type {
  Service,
  ServiceLifecycleEvent,
  ServiceRegistrar,
  ServiceContext,
  ServiceDescriptor,
  ServiceState,
} from './service'

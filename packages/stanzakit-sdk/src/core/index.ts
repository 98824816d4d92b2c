// Client
export { StanzaClient } from './StanzaClient'
export type { StanzaClientConfig } from './StanzaClient'

// Building blocks, for composing a client by hand
export { StanzaStream } from './StanzaStream'
export type { StanzaStreamDeps, NegotiatedStream } from './StanzaStream'
export { ConnectionManager } from './ConnectionManager'
export type { ConnectionManagerDeps } from './ConnectionManager'
export { StanzaDispatcher, describeStanza } from './dispatcher'
export type { DispatcherDeps, PendingReply } from './dispatcher'
export { FilterChain, createStanzaFilters } from './stanzaFilters'
export type { StanzaFilters, FilterDirection } from './stanzaFilters'
export { SM_COUNTER_MODULUS, StreamManagementLedger } from './smLedger'
export type { SmSession, SmCounters, SmLedgerSnapshot, UnackedEntry, AckResult } from './smLedger'
export { StanzaToken, isTerminalTokenState } from './stanzaToken'
export type { TokenStateListener } from './stanzaToken'

// Services
export { ServiceRegistry, orderServices } from './serviceRegistry'
export type { ServiceHost, ServiceNotification } from './serviceRegistry'
export { BaseService } from './services/BaseService'
export { PingService } from './services/PingService'

// Configuration
export {
  DEFAULT_BACKOFF,
  DEFAULT_LIFECYCLE_CONFIG,
  DEFAULT_STREAM_CONFIG,
  resolveLifecycleConfig,
  resolveStreamConfig,
} from './config'
export type { LifecycleConfigInput } from './config'
export { computeBackoffDelay, formatEndpoint, parseLocation } from './connectionUtils'

// Errors
export {
  StanzakitError,
  TransientConnectivityError,
  CriticalSecurityError,
  ProtocolViolationError,
  ApplicationRejectError,
  CancelledError,
  DisconnectedError,
  TimeoutError,
  ConnectionAttemptsExhaustedError,
  ConfigurationError,
  DuplicateHandlerError,
  ServiceStateError,
  InvalidStateTransitionError,
  StanzaErrorReply,
  classifyFailure,
} from './errors'
export type { ErrorKind, AttemptFailure } from './errors'

export { createLogger } from './logger'
export type { Logger } from './logger'
export { NS_CLIENT, NS_PING, NS_SM, NS_XMPP_STANZAS } from './namespaces'
export { getBareJid, getDomain } from './jid'

// Re-export xml builder from @xmpp/client for raw stanza construction
export { xml } from '@xmpp/client'
export type { Element } from '@xmpp/client'

// Types
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
  LifecycleState,
  BackoffConfig,
  LifecycleConfig,
  StreamConfig,
  LifecycleEventMap,
  Service,
  ServiceLifecycleEvent,
  ServiceRegistrar,
  ServiceContext,
  ServiceDescriptor,
  ServiceState,
} from './types'

/**
 * Transport boundary type definitions.
 *
 * The core never touches sockets, TLS or XML. A {@link Connector} opens a
 * {@link Transport} to one candidate endpoint; the transport reports the
 * verdict of its security/authentication negotiation, then delivers
 * decoded top-level elements until it closes.
 *
 * @packageDocumentation
 * @module Types/Transport
 */
import type { Element } from '@xmpp/client'

/**
 * One candidate address to connect to.
 *
 * @remarks
 * Endpoint discovery (SRV records, XEP-0156 host-meta) happens outside the
 * core; the lifecycle manager only iterates what it is given.
 *
 * @category Transport
 */
export interface Endpoint {
  host: string
  port: number
  /** Free-form hint for the connector, e.g. 'directtls', 'starttls', 'websocket' */
  method?: string
}

/**
 * Retry decision attached to a failure.
 *
 * - `transient`: transport/IO level, move on to the next candidate or retry later
 * - `critical`: security negotiation failed, never retried, surfaced as-is
 * - `fatal`: not a transport condition at all (logic or configuration defect), halt
 *
 * @category Transport
 */
export type FailureKind = 'transient' | 'critical' | 'fatal'

/**
 * Features the peer announced that the core cares about.
 *
 * @category Transport
 */
export interface StreamFeatures {
  /** The peer offered XEP-0198 Stream Management */
  streamManagement: boolean
}

/**
 * Outcome of the pluggable TLS/SASL/bind negotiation step.
 *
 * @category Transport
 */
export type NegotiationResult =
  | { verdict: 'success'; features: StreamFeatures; jid: string | null }
  | { verdict: 'critical-failure'; error: Error }
  | { verdict: 'transient-failure'; error: Error }

/**
 * A frame the decoder could delimit but not turn into a valid stanza.
 * `element` holds whatever could be decoded of it, if anything.
 *
 * @category Transport
 */
export interface ErroneousFrame {
  element?: Element
  error: Error
}

/**
 * Why a transport closed. A close without `failure` is a clean close by
 * the peer, handled as a transient loss.
 *
 * @category Transport
 */
export interface TransportCloseInfo {
  failure?: { kind: FailureKind; error: Error }
}

/**
 * Events emitted by a transport, keyed by name with object payloads.
 *
 * @category Transport
 */
export interface TransportEventMap {
  negotiated: NegotiationResult
  /** One decoded top-level element: a stanza or a stream-level nonza */
  element: Element
  erroneous: ErroneousFrame
  close: TransportCloseInfo
}

/**
 * @category Transport
 */
export interface Transport {
  /** Write one framed element. Rejects if the transport is no longer writable. */
  write(element: Element): Promise<void>
  /** Close the stream and the socket. Does not emit `close`. */
  close(): Promise<void>
  on<K extends keyof TransportEventMap>(event: K, handler: (payload: TransportEventMap[K]) => void): () => void
}

/**
 * Opens transports. Rejections should be {@link StanzakitError}s so the
 * lifecycle manager can classify them; anything else is treated as fatal.
 *
 * @category Transport
 */
export interface Connector {
  open(endpoint: Endpoint, signal: AbortSignal): Promise<Transport>
}

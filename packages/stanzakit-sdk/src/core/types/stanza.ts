/**
 * Stanza-level type definitions: token states, handler signatures and
 * handler filters.
 *
 * @packageDocumentation
 * @module Types/Stanza
 */
import type { Element } from '@xmpp/client'
import type { StanzakitError } from '../errors'

/**
 * Lifecycle of one outbound stanza.
 *
 * @remarks
 * - `active`: accepted, not yet handed to the transport
 * - `sent`: written under Stream Management, waiting for the peer's ack
 * - `acked`: acknowledged by the peer (or written, without Stream Management)
 * - `disconnected`: the stream went away first; delivery outcome unknown
 * - `aborted`: withdrawn before it reached the transport
 *
 * @category Stanza
 */
export type TokenState = 'active' | 'sent' | 'acked' | 'disconnected' | 'aborted'

/** @category Stanza */
export type TerminalTokenState = 'acked' | 'disconnected' | 'aborted'

/**
 * Resolution value of {@link StanzaToken.done}.
 *
 * @category Stanza
 */
export type TokenOutcome =
  | { state: 'acked' }
  | { state: 'disconnected' | 'aborted'; error: StanzakitError }

/** @category Stanza */
export type StanzaCategory = 'message' | 'presence'

/** @category Stanza */
export type IQRequestType = 'get' | 'set'

/**
 * Narrows message/presence handler routing. Omitted fields match anything.
 *
 * @category Stanza
 */
export interface HandlerFilter {
  /** Stanza type; messages default to 'normal', presences to 'available' */
  type?: string
  /** Sender address, full or bare */
  from?: string
}

/**
 * Passed to every handler invocation. The signal aborts when the stream is
 * torn down while the handler is still running.
 *
 * @category Stanza
 */
export interface HandlerContext {
  signal: AbortSignal
}

/** @category Stanza */
export type StanzaHandler = (stanza: Element, context: HandlerContext) => void | Promise<void>

/**
 * Context of an inbound IQ request.
 *
 * @category Stanza
 */
export interface IQRequestContext extends HandlerContext {
  /** The single payload child of the request */
  payload: Element
}

/**
 * Produces the reply payload of an IQ request: an element to wrap in the
 * result, or null for an empty result. Throw a {@link StanzaErrorReply} to
 * answer with an error instead.
 *
 * @category Stanza
 */
export type IQRequestHandler = (request: Element, context: IQRequestContext) => Element | null | Promise<Element | null>

/**
 * Rewrites or drops a stanza. Return null to drop it.
 *
 * @category Stanza
 */
export type StanzaFilter = (stanza: Element) => Element | null

/**
 * @category Stanza
 */
export interface SendIQOptions {
  /** Reject with a TimeoutError when no reply arrived in time */
  timeoutMs?: number
  /** Reject with a CancelledError and forget the request when aborted */
  signal?: AbortSignal
}

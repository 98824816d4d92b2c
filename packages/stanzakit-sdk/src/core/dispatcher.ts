/**
 * Stanza dispatch and IQ correlation.
 *
 * Routes every inbound stanza, already counted by the stream, to exactly
 * one destination:
 *
 * - `message` / `presence`: inbound filters, then the most specific
 *   registered handler for `(type, from)`
 * - `iq` get/set: the request handler for the payload's namespace and name,
 *   which produces exactly one reply
 * - `iq` result/error: the pending request with the same `(from, id)`
 *
 * Handler bodies run as tracked tasks so that teardown can cancel them.
 *
 * ## Handler lookup order
 *
 * For a stanza of type `t` from `f`:
 * `(t, f)`, `(t, bare(f))`, `(t, *)`, `(*, f)`, `(*, bare(f))`, `(*, *)`.
 * Messages without a type attribute are `normal`, presences `available`.
 *
 * @module Core/Dispatcher
 */
import { xml, type Element } from '@xmpp/client'
import {
  ApplicationRejectError,
  CancelledError,
  DuplicateHandlerError,
  StanzaErrorReply,
  TimeoutError,
  type StanzakitError,
} from './errors'
import type {
  ErroneousFrame,
  HandlerFilter,
  IQRequestHandler,
  IQRequestType,
  SendIQOptions,
  StanzaCategory,
  StanzaHandler,
} from './types'
import { createLogger, describeError, type Logger } from './logger'
import { TaskTracker } from './taskTracker'
import { selectFilterChain, type StanzaFilters } from './stanzaFilters'
import { getBareJid, getDomain, hasResource, isLocalServerAddress } from './jid'
import { buildErrorReply, readStanzaError } from '../utils/stanzaError'
import { createDeferred, type Deferred } from '../utils/deferred'

const DEFAULT_TYPES: Record<StanzaCategory, string> = {
  message: 'normal',
  presence: 'available',
}

/**
 * One-line synopsis of a stanza for log output. Keeps only the element
 * name, type, id and the sender's domain.
 */
export function describeStanza(stanza: Element | undefined): string {
  if (!stanza) return '<undecodable>'
  const parts = [stanza.name]
  if (stanza.attrs.type) parts.push(`type=${stanza.attrs.type}`)
  if (stanza.attrs.id) parts.push(`id=${stanza.attrs.id}`)
  if (stanza.attrs.from) parts.push(`from=${getDomain(stanza.attrs.from)}`)
  return `<${parts.join(' ')}>`
}

interface HandlerEntry<H> {
  handler: H
  owner: string | null
}

interface PendingEntry {
  key: string
  slot: Deferred<Element>
  dispose: () => void
}

/** Handle to a request awaiting its reply. */
export interface PendingReply {
  readonly promise: Promise<Element>
  /** Reject and forget the entry, e.g. because the request never left. */
  fail(error: StanzakitError): void
}

export interface DispatcherDeps {
  filters: StanzaFilters
  /** Writes an IQ reply produced by a request handler. */
  sendReply: (reply: Element) => void
  /** Bound JID of the current session, for matching replies from the local server. */
  localJid: () => string | null
  tasks?: TaskTracker
  log?: Logger
}

function handlerKey(category: StanzaCategory, type: string | null, from: string | null): string {
  return JSON.stringify([category, type, from])
}

function iqKey(type: IQRequestType, namespace: string, name: string): string {
  return JSON.stringify([type, namespace, name])
}

function pendingKey(to: string | undefined, id: string): string {
  return `${to ?? ''}\u0000${id}`
}

/**
 * @category Dispatch
 */
export class StanzaDispatcher {
  private handlers = new Map<string, HandlerEntry<StanzaHandler>>()
  private iqHandlers = new Map<string, HandlerEntry<IQRequestHandler>>()
  private pending = new Map<string, PendingEntry>()
  private readonly deps: DispatcherDeps
  private readonly tasks: TaskTracker
  private readonly log: Logger

  constructor(deps: DispatcherDeps) {
    this.deps = deps
    this.log = deps.log ?? createLogger('dispatch')
    this.tasks = deps.tasks ?? new TaskTracker(this.log)
  }

  get pendingCount(): number {
    return this.pending.size
  }

  get runningTasks(): number {
    return this.tasks.size
  }

  // ── Handler registry ─────────────────────────────────────────────────────

  /**
   * Register a message or presence handler.
   * @throws {DuplicateHandlerError} if a handler with the same filter exists
   */
  registerHandler(category: StanzaCategory, filter: HandlerFilter, handler: StanzaHandler, owner: string | null = null): void {
    const key = handlerKey(category, filter.type ?? null, filter.from ?? null)
    if (this.handlers.has(key)) {
      throw new DuplicateHandlerError(
        `A ${category} handler for type=${filter.type ?? '*'} from=${filter.from ?? '*'} is already registered`
      )
    }
    this.handlers.set(key, { handler, owner })
  }

  /**
   * Remove a message or presence handler. Removing one that is not
   * registered does nothing.
   * @returns Whether a handler was removed
   */
  unregisterHandler(category: StanzaCategory, filter: HandlerFilter): boolean {
    return this.handlers.delete(handlerKey(category, filter.type ?? null, filter.from ?? null))
  }

  /**
   * Register the handler for IQ requests of `type` whose payload is
   * `<name xmlns=namespace/>`.
   * @throws {DuplicateHandlerError} if one is already registered
   */
  registerIQHandler(type: IQRequestType, namespace: string, name: string, handler: IQRequestHandler, owner: string | null = null): void {
    const key = iqKey(type, namespace, name)
    if (this.iqHandlers.has(key)) {
      throw new DuplicateHandlerError(`An IQ ${type} handler for {${namespace}}${name} is already registered`)
    }
    this.iqHandlers.set(key, { handler, owner })
  }

  unregisterIQHandler(type: IQRequestType, namespace: string, name: string): boolean {
    return this.iqHandlers.delete(iqKey(type, namespace, name))
  }

  /** Remove every handler registered by `owner`. */
  removeOwner(owner: string): void {
    for (const [key, entry] of this.handlers) {
      if (entry.owner === owner) this.handlers.delete(key)
    }
    for (const [key, entry] of this.iqHandlers) {
      if (entry.owner === owner) this.iqHandlers.delete(key)
    }
  }

  // ── Reply correlation ────────────────────────────────────────────────────

  /**
   * Create the pending entry for a request about to be sent.
   *
   * @param to - The request's `to` attribute (absent means the own account)
   * @param id - The request's id
   * @throws {DuplicateHandlerError} if the same `(to, id)` is already awaited
   */
  expectReply(to: string | undefined, id: string, options: SendIQOptions = {}): PendingReply {
    const key = pendingKey(to, id)
    if (this.pending.has(key)) {
      throw new DuplicateHandlerError(`A reply to request ${id} is already awaited`)
    }

    const slot = createDeferred<Element>()
    const { signal, timeoutMs } = options
    let timer: ReturnType<typeof setTimeout> | undefined
    const onAbort = () => this.settle(key, new CancelledError(`Request ${id} cancelled`))

    const entry: PendingEntry = {
      key,
      slot,
      dispose: () => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
      },
    }
    this.pending.set(key, entry)

    if (signal?.aborted) {
      onAbort()
    } else {
      signal?.addEventListener('abort', onAbort, { once: true })
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => this.settle(key, new TimeoutError(`Request ${id} timed out after ${timeoutMs}ms`)), timeoutMs)
      }
    }

    return {
      promise: slot.promise,
      fail: (error) => this.settle(key, error),
    }
  }

  /** Whether a reply for `(to, id)` is still awaited. */
  isPending(to: string | undefined, id: string): boolean {
    return this.pending.has(pendingKey(to, id))
  }

  /**
   * Reject every pending request, e.g. because the stream was destroyed.
   * The entries are removed.
   */
  failPending(error: StanzakitError): void {
    for (const key of [...this.pending.keys()]) {
      this.settle(key, error)
    }
  }

  private settle(key: string, outcome: Element | StanzakitError): void {
    const entry = this.pending.get(key)
    if (!entry) return
    this.pending.delete(key)
    entry.dispose()
    if (outcome instanceof Error) {
      entry.slot.reject(outcome)
    } else {
      entry.slot.resolve(outcome)
    }
  }

  // ── Inbound routing ──────────────────────────────────────────────────────

  /** Route one inbound stanza. Accounting has already happened. */
  dispatch(stanza: Element): void {
    switch (stanza.name) {
      case 'iq':
        this.dispatchIQ(stanza)
        return
      case 'message':
      case 'presence':
        this.dispatchStanza(stanza.name, stanza)
        return
      default:
        this.log.warn(`Dropping unexpected element ${describeStanza(stanza)}`)
    }
  }

  /** A frame that could be counted but not validated: logged, never routed. */
  dispatchErroneous(frame: ErroneousFrame): void {
    this.log.warn(`Dropping erroneous stanza ${describeStanza(frame.element)}: ${frame.error.message}`)
  }

  private dispatchStanza(category: StanzaCategory, original: Element): void {
    const chain = selectFilterChain(this.deps.filters, 'inbound', category)
    const stanza = chain ? chain.apply(original) : original
    if (!stanza) {
      this.log.debug(`Inbound filter dropped ${describeStanza(original)}`)
      return
    }

    const type = stanza.attrs.type || DEFAULT_TYPES[category]
    const from = stanza.attrs.from || null
    const entry = this.findHandler(category, type, from)
    if (!entry) {
      this.log.debug(`No handler for ${describeStanza(stanza)}`)
      return
    }

    const handler = entry.handler
    this.tasks.spawn(`${category}:${type}`, (signal) => handler(stanza, { signal }))
  }

  private findHandler(category: StanzaCategory, type: string, from: string | null): HandlerEntry<StanzaHandler> | undefined {
    const senders: (string | null)[] = []
    if (from) {
      senders.push(from)
      if (hasResource(from)) senders.push(getBareJid(from))
    }
    senders.push(null)

    for (const t of [type, null]) {
      for (const f of senders) {
        const entry = this.handlers.get(handlerKey(category, t, f))
        if (entry) return entry
      }
    }
    return undefined
  }

  private dispatchIQ(stanza: Element): void {
    const type = stanza.attrs.type
    switch (type) {
      case 'get':
      case 'set':
        this.handleRequest(type, stanza)
        return
      case 'result':
      case 'error':
        this.handleResponse(stanza)
        return
      default:
        this.log.warn(`Dropping IQ with invalid type ${describeStanza(stanza)}`)
    }
  }

  private handleRequest(type: IQRequestType, request: Element): void {
    const payloads = request.children.filter((child): child is Element => typeof child !== 'string')
    if (payloads.length !== 1) {
      this.deps.sendReply(buildErrorReply(request, { type: 'modify', condition: 'bad-request' }))
      return
    }
    const payload = payloads[0]
    const namespace = payload.attrs.xmlns ?? ''
    const entry = this.iqHandlers.get(iqKey(type, namespace, payload.name))
    if (!entry) {
      this.deps.sendReply(buildErrorReply(request, { type: 'cancel', condition: 'service-unavailable' }))
      return
    }

    const handler = entry.handler
    this.tasks.spawn(`iq:${type}:${payload.name}`, async (signal) => {
      let reply: Element
      try {
        const result = await handler(request, { signal, payload })
        const attrs: Record<string, string> = { type: 'result', id: request.attrs.id }
        if (request.attrs.from) attrs.to = request.attrs.from
        reply = result ? xml('iq', attrs, result) : xml('iq', attrs)
      } catch (err) {
        if (err instanceof StanzaErrorReply) {
          reply = buildErrorReply(request, { type: err.type, condition: err.condition, text: err.text })
        } else {
          this.log.error(`IQ handler for ${describeStanza(request)} failed: ${describeError(err)}`)
          reply = buildErrorReply(request, { type: 'cancel', condition: 'internal-server-error' })
        }
      }
      if (signal.aborted) return
      this.deps.sendReply(reply)
    })
  }

  private handleResponse(stanza: Element): void {
    const id = stanza.attrs.id
    if (!id) {
      this.log.warn(`Dropping IQ response without id ${describeStanza(stanza)}`)
      return
    }

    const key = this.matchPending(stanza.attrs.from, id)
    if (!key) {
      this.log.warn(`Dropping unsolicited IQ response ${describeStanza(stanza)}`)
      return
    }

    if (stanza.attrs.type === 'error') {
      this.settle(key, new ApplicationRejectError(readStanzaError(stanza)))
    } else {
      this.settle(key, stanza)
    }
  }

  /**
   * A reply from `from` answers a request sent to `from`. A reply with no
   * `from`, or from the own bare JID or domain, also answers a request
   * sent without `to` (RFC 6120 §8.1.2.1).
   */
  private matchPending(from: string | undefined, id: string): string | null {
    const localJid = this.deps.localJid()
    const candidates: (string | undefined)[] = [from]
    if (!from) {
      if (localJid) candidates.push(getBareJid(localJid), getDomain(localJid))
    } else if (isLocalServerAddress(from, localJid)) {
      candidates.push(undefined)
    }

    for (const to of candidates) {
      const key = pendingKey(to, id)
      if (this.pending.has(key)) return key
    }
    return null
  }

  // ── Teardown ─────────────────────────────────────────────────────────────

  /**
   * Reject pending requests with `error`, then cancel running handler
   * tasks and wait up to `graceMs` for them. Never throws.
   */
  async shutdown(error: StanzakitError, graceMs: number): Promise<void> {
    this.failPending(error)
    await this.tasks.cancelAll(graceMs)
  }
}

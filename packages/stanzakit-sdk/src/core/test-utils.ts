/**
 * Shared test utilities: an in-process transport, a scripted connector and
 * a fake Stream Management peer, standing in for the network.
 */
import { vi } from 'vitest'
import { xml, type Element } from '@xmpp/client'
import type {
  Connector,
  Endpoint,
  ErroneousFrame,
  FailureKind,
  NegotiationResult,
  Transport,
  TransportEventMap,
} from './types'
import { CancelledError, TransientConnectivityError } from './errors'
import { NS_SM } from './namespaces'
import { TypedEventEmitter } from '../utils/eventEmitter'

export const TEST_JID = 'user@example.com/test'

/** A logger whose methods are Vitest mocks. */
export const createMockLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
})

export type MockLogger = ReturnType<typeof createMockLogger>

/** Verdict of a successful negotiation. */
export function success(options: { streamManagement?: boolean; jid?: string | null } = {}): NegotiationResult {
  return {
    verdict: 'success',
    features: { streamManagement: options.streamManagement ?? true },
    jid: options.jid === undefined ? TEST_JID : options.jid,
  }
}

/**
 * In-process transport. Records every written element; tests drive the
 * inbound side with `negotiate`, `receive`, `receiveErroneous` and `drop`.
 */
export class MockTransport implements Transport {
  readonly endpoint: Endpoint
  readonly written: Element[] = []
  closed = false
  /** Called after each successful write, e.g. by a {@link FakeSmPeer}. */
  onWrite: ((element: Element) => void) | null = null
  private events = new TypedEventEmitter<TransportEventMap>()

  readonly write = vi.fn(async (element: Element): Promise<void> => {
    if (this.closed) {
      throw new TransientConnectivityError('Transport is closed')
    }
    this.written.push(element)
    this.onWrite?.(element)
  })

  readonly close = vi.fn(async (): Promise<void> => {
    this.closed = true
  })

  constructor(endpoint: Endpoint = { host: 'xmpp.example.com', port: 5222 }) {
    this.endpoint = endpoint
  }

  on<K extends keyof TransportEventMap>(event: K, handler: (payload: TransportEventMap[K]) => void): () => void {
    return this.events.on(event, handler)
  }

  listenerCount(event: keyof TransportEventMap): number {
    return this.events.listenerCount(event)
  }

  negotiate(result: NegotiationResult): void {
    this.events.emit('negotiated', result)
  }

  receive(element: Element): void {
    this.events.emit('element', element)
  }

  receiveErroneous(frame: ErroneousFrame): void {
    this.events.emit('erroneous', frame)
  }

  /** The connection went away; writes fail from now on. */
  drop(failure?: { kind: FailureKind; error: Error }): void {
    this.closed = true
    this.events.emit('close', { failure })
  }

  /** Names of written elements, nonzas included. */
  writtenNames(): string[] {
    return this.written.map((el) => el.name)
  }

  /** Ids of written message, presence and iq stanzas, in order. */
  writtenStanzaIds(): string[] {
    return this.written.filter((el) => isStanza(el)).map((el) => el.attrs.id)
  }

  lastWritten(name: string): Element | undefined {
    return [...this.written].reverse().find((el) => el.name === name)
  }
}

function isStanza(element: Element): boolean {
  return element.name === 'message' || element.name === 'presence' || element.name === 'iq'
}

/** What the connector does when asked to open an endpoint. */
export type ConnectorStep =
  /** Open, then report this verdict */
  | { negotiate: NegotiationResult }
  /** Fail to open */
  | { fail: Error }
  /** Never open; only the abort signal ends it */
  | { hang: true }
  /** Open, but never report a verdict */
  | { silent: true }

/**
 * Scripted connector. `script` decides per endpoint and attempt what
 * happens; by default every endpoint opens and negotiates successfully.
 * `setup` runs on each new transport before its verdict is reported.
 */
export class MockConnector implements Connector {
  readonly opened: Endpoint[] = []
  readonly transports: MockTransport[] = []
  script: (endpoint: Endpoint, attempt: number) => ConnectorStep
  setup: ((transport: MockTransport) => void) | null = null

  constructor(script?: (endpoint: Endpoint, attempt: number) => ConnectorStep) {
    this.script = script ?? (() => ({ negotiate: success() }))
  }

  get lastTransport(): MockTransport | undefined {
    return this.transports[this.transports.length - 1]
  }

  async open(endpoint: Endpoint, signal: AbortSignal): Promise<Transport> {
    const attempt = this.opened.length + 1
    this.opened.push(endpoint)
    const step = this.script(endpoint, attempt)

    if ('fail' in step) throw step.fail
    if ('hang' in step) {
      return new Promise<Transport>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new CancelledError('Open aborted')), { once: true })
      })
    }

    const transport = new MockTransport(endpoint)
    this.transports.push(transport)
    this.setup?.(transport)
    if ('negotiate' in step) {
      const result = step.negotiate
      setTimeout(() => {
        if (!transport.closed) transport.negotiate(result)
      }, 0)
    }
    return transport
  }
}

export interface FakeSmPeerOptions {
  id?: string
  resumable?: boolean
  max?: number
  location?: string
  /** How a `<resume/>` is answered */
  resume?: 'resumed' | 'failed'
  /** Answer `<enable/>` with `<failed/>` */
  refuseEnable?: boolean
  /** Answer `<r/>` with `<a/>` */
  autoAck?: boolean
}

/**
 * Server side of XEP-0198 for tests: answers `<enable/>`, `<r/>` and
 * `<resume/>` and counts the stanzas it received. Replies are delivered on
 * a microtask so the stream sees them after its write resolved.
 */
export class FakeSmPeer {
  /** Stanzas received in the current session */
  handled = 0
  options: FakeSmPeerOptions
  readonly acksReceived: number[] = []

  constructor(options: FakeSmPeerOptions = {}) {
    this.options = options
  }

  attach(transport: MockTransport): void {
    transport.onWrite = (element) => this.handle(transport, element)
  }

  private reply(transport: MockTransport, element: Element): void {
    queueMicrotask(() => {
      if (!transport.closed) transport.receive(element)
    })
  }

  private handle(transport: MockTransport, element: Element): void {
    if (isStanza(element)) {
      this.handled += 1
      return
    }
    if (element.attrs.xmlns !== NS_SM) return

    const { id = 'sm-1', resumable = true, max, location, resume = 'resumed', refuseEnable = false, autoAck = true } = this.options
    switch (element.name) {
      case 'enable': {
        if (refuseEnable) {
          this.reply(transport, xml('failed', { xmlns: NS_SM }))
          return
        }
        this.handled = 0
        const attrs: Record<string, string> = { xmlns: NS_SM, id }
        if (resumable) attrs.resume = 'true'
        if (max !== undefined) attrs.max = String(max)
        if (location) attrs.location = location
        this.reply(transport, xml('enabled', attrs))
        return
      }
      case 'r':
        if (autoAck) this.reply(transport, xml('a', { xmlns: NS_SM, h: String(this.handled) }))
        return
      case 'a':
        this.acksReceived.push(Number(element.attrs.h))
        return
      case 'resume':
        if (resume === 'resumed') {
          this.reply(transport, xml('resumed', { xmlns: NS_SM, h: String(this.handled), previd: id }))
        } else {
          this.reply(transport, xml('failed', { xmlns: NS_SM, h: String(this.handled) }))
        }
        return
    }
  }
}

/** Let queued timers (delay 0) and microtasks run. */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0))
}

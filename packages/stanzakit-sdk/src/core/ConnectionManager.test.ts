/**
 * Tests for the connection lifecycle manager.
 *
 * Transports come from a scripted in-process connector; Stream Management
 * is answered by a fake peer attached to each transport.
 */
import { describe, it, expect, vi, afterEach } from 'vitest'
import { xml } from '@xmpp/client'
import { ConnectionManager } from './ConnectionManager'
import { StanzaStream } from './StanzaStream'
import { StanzaDispatcher } from './dispatcher'
import { createStanzaFilters } from './stanzaFilters'
import { resolveStreamConfig, type LifecycleConfigInput } from './config'
import {
  CancelledError,
  ConnectionAttemptsExhaustedError,
  CriticalSecurityError,
  DisconnectedError,
  InvalidStateTransitionError,
  ProtocolViolationError,
  TransientConnectivityError,
  type StanzakitError,
} from './errors'
import { FakeSmPeer, MockConnector, success, TEST_JID, type ConnectorStep, type FakeSmPeerOptions } from './test-utils'
import type { Endpoint, LifecycleState } from './types'

const A: Endpoint = { host: 'a.example.com', port: 5222 }
const B: Endpoint = { host: 'b.example.com', port: 5222 }
const C: Endpoint = { host: 'c.example.com', port: 5223 }

interface HarnessOptions {
  script?: (endpoint: Endpoint, attempt: number) => ConnectorStep
  config?: LifecycleConfigInput
  peer?: FakeSmPeerOptions
}

function createHarness(options: HarnessOptions = {}) {
  const filters = createStanzaFilters()
  const holder: { stream: StanzaStream | null } = { stream: null }
  const dispatcher = new StanzaDispatcher({
    filters,
    sendReply: (reply) => {
      holder.stream?.send(reply)
    },
    localJid: () => holder.stream?.jid ?? null,
  })
  const stream = new StanzaStream({
    config: resolveStreamConfig({ ackRequestDebounceMs: 0 }),
    dispatcher,
    filters,
  })
  holder.stream = stream

  const connector = new MockConnector(options.script)
  const peers: FakeSmPeer[] = []
  connector.setup = (transport) => {
    const peer = new FakeSmPeer({ ...options.peer })
    peers.push(peer)
    peer.attach(transport)
  }

  const manager = new ConnectionManager({
    connector,
    stream,
    config: {
      endpoints: [A, B, C],
      random: () => 0,
      ...options.config,
      backoff: { initialDelayMs: 5, maxDelayMs: 20, multiplier: 2, jitter: 0, ...options.config?.backoff },
    },
  })

  const states: LifecycleState[] = []
  const events: string[] = []
  const failures: StanzakitError[] = []
  manager.on('stateChange', ({ state }) => states.push(state))
  manager.on('streamEstablished', () => events.push('established'))
  manager.on('streamSuspended', () => events.push('suspended'))
  manager.on('streamResumed', () => events.push('resumed'))
  manager.on('streamDestroyed', () => events.push('destroyed'))
  manager.on('connectionFailed', ({ error }) => {
    events.push('failed')
    failures.push(error)
  })

  return { manager, stream, connector, peers, states, events, failures }
}

function message(id: string) {
  return xml('message', { id, to: 'peer@example.com', type: 'chat' }, xml('body', {}, 'hello'))
}

const refused = (): ConnectorStep => ({ fail: new TransientConnectivityError('Connection refused') })

describe('ConnectionManager', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('connect', () => {
    it('should establish a stream on the first candidate', async () => {
      const { manager, connector, states, events, stream } = createHarness()
      const established = vi.fn()
      manager.on('streamEstablished', established)

      await manager.connect()

      expect(manager.state).toBe('established')
      expect(connector.opened).toEqual([A])
      expect(states).toEqual(['connecting', 'established'])
      expect(events).toEqual(['established'])
      expect(established).toHaveBeenCalledWith({ jid: TEST_JID, streamManagement: true })
      expect(stream.smEnabled).toBe(true)
    })

    it('should move on to the next candidate after a transient failure', async () => {
      const { manager, connector } = createHarness({
        script: (endpoint) => (endpoint === A ? refused() : { negotiate: success() }),
      })
      const attempts: Endpoint[] = []
      manager.on('attempt', ({ endpoint }) => attempts.push(endpoint))

      await manager.connect()

      expect(connector.opened).toEqual([A, B])
      expect(attempts).toEqual([A, B])
      expect(manager.state).toBe('established')
    })

    it('should surface the critical failure of the last candidate as-is', async () => {
      const critical = new CriticalSecurityError('Certificate rejected')
      const { manager, connector, failures } = createHarness({
        script: (endpoint) =>
          endpoint === C ? { negotiate: { verdict: 'critical-failure', error: critical } } : refused(),
      })

      const error = await manager.connect().catch((err: unknown) => err)

      expect(error).toBe(critical)
      expect(connector.opened).toEqual([A, B, C])
      expect(manager.state).toBe('failed')
      expect(failures).toEqual([critical])
      expect(connector.transports[0].close).toHaveBeenCalled()
    })

    it('should try the remaining candidates after a critical failure but start no further pass', async () => {
      const { manager, connector } = createHarness({
        script: (endpoint) =>
          endpoint === A
            ? { negotiate: { verdict: 'critical-failure', error: new Error('SASL not-authorized') } }
            : refused(),
      })

      const error = await manager.connect().catch((err: unknown) => err)

      expect(error).toBeInstanceOf(ConnectionAttemptsExhaustedError)
      expect(connector.opened).toEqual([A, B, C])
      if (error instanceof ConnectionAttemptsExhaustedError) {
        expect(error.failures.map((f) => f.kind)).toEqual(['critical', 'transient', 'transient'])
        expect(error.failures[0].error).toBeInstanceOf(CriticalSecurityError)
      }
    })

    it('should retry every candidate with backoff, then give up', async () => {
      const { manager, connector, failures } = createHarness({ script: refused })
      const retries: { pass: number; delayMs: number }[] = []
      manager.on('retryScheduled', (retry) => retries.push(retry))

      const error = await manager.connect().catch((err: unknown) => err)

      expect(error).toBeInstanceOf(ConnectionAttemptsExhaustedError)
      expect(error).toHaveProperty('message', 'All candidate endpoints failed (9 attempts over 3 passes)')
      expect(connector.opened).toHaveLength(9)
      expect(retries).toEqual([
        { pass: 2, delayMs: 5 },
        { pass: 3, delayMs: 10 },
      ])
      expect(manager.state).toBe('failed')
      expect(failures).toEqual([error])
    })

    it('should stop at once on a fatal error', async () => {
      const bug = new Error('Connector misconfigured')
      const { manager, connector } = createHarness({ script: () => ({ fail: bug }) })

      await expect(manager.connect()).rejects.toBe(bug)

      expect(connector.opened).toEqual([A])
      expect(manager.state).toBe('destroyed')
    })

    it('should time out an attempt without verdict and try the next candidate', async () => {
      const { manager, connector } = createHarness({
        script: (_endpoint, attempt) => (attempt === 1 ? { silent: true } : { negotiate: success() }),
        config: { attemptTimeoutMs: 20 },
      })

      await manager.connect()

      expect(connector.opened).toEqual([A, B])
      expect(connector.transports[0].close).toHaveBeenCalled()
      expect(manager.state).toBe('established')
    })

    it('should connect without Stream Management when the peer does not offer it', async () => {
      const { manager, stream } = createHarness({
        script: () => ({ negotiate: success({ streamManagement: false }) }),
      })

      await manager.connect()

      expect(stream.smEnabled).toBe(false)
      await expect(stream.send(message('m1')).done).resolves.toEqual({ state: 'acked' })
    })

    it('should refuse to connect twice', async () => {
      const { manager } = createHarness()
      await manager.connect()

      await expect(manager.connect()).rejects.toThrow(InvalidStateTransitionError)
      await expect(manager.connect()).rejects.toThrow('Cannot connect while established')
    })

    it('should connect again after failing', async () => {
      const { manager, connector } = createHarness({ script: refused, config: { maxPasses: 1 } })
      await expect(manager.connect()).rejects.toThrow(ConnectionAttemptsExhaustedError)

      connector.script = () => ({ negotiate: success() })
      await manager.connect()

      expect(manager.state).toBe('established')
    })

    it('should apply reconfigured endpoints to the next connect', async () => {
      const { manager, connector } = createHarness()
      manager.reconfigure({ endpoints: [C] })

      await manager.connect()

      expect(connector.opened).toEqual([C])
      expect(manager.currentConfig.backoff.initialDelayMs).toBe(5)
    })
  })

  describe('disconnect', () => {
    it('should do nothing before connecting', async () => {
      const { manager, states } = createHarness()
      await manager.disconnect()
      expect(manager.state).toBe('idle')
      expect(states).toEqual([])
    })

    it('should send a final ack, close the transport and end the session', async () => {
      const { manager, connector, peers, events, stream } = createHarness()
      const destroyed = vi.fn()
      manager.on('streamDestroyed', destroyed)
      await manager.connect()
      const transport = connector.transports[0]
      transport.receive(xml('message', { from: 'peer@example.com/phone', id: 'in1' }))

      await manager.disconnect()

      expect(peers[0].acksReceived).toEqual([1])
      expect(transport.close).toHaveBeenCalledTimes(1)
      expect(manager.state).toBe('destroyed')
      expect(events).toEqual(['established', 'destroyed'])
      const [{ reason }] = destroyed.mock.calls[0]
      expect(reason).toBeInstanceOf(DisconnectedError)
      expect(stream.send(message('m1')).state).toBe('disconnected')
    })

    it('should cancel a backoff sleep right away', async () => {
      const { manager, connector } = createHarness({
        script: refused,
        config: { backoff: { initialDelayMs: 60_000, maxDelayMs: 60_000 } },
      })
      const scheduled = new Promise<number>((resolve) => {
        manager.on('retryScheduled', ({ delayMs }) => resolve(delayMs))
      })

      const outcome = manager.connect().catch((err: unknown) => err)
      expect(await scheduled).toBe(60_000)
      await manager.disconnect()

      const error = await outcome
      expect(error).toBeInstanceOf(CancelledError)
      expect(error).toHaveProperty('message', 'Connection attempt cancelled')
      expect(connector.opened).toHaveLength(3)
      expect(manager.state).toBe('destroyed')
    })

    it('should cancel an attempt that is still opening', async () => {
      const { manager } = createHarness({ script: () => ({ hang: true }) })
      const started = new Promise<void>((resolve) => {
        manager.on('attempt', () => resolve())
      })

      const outcome = manager.connect().catch((err: unknown) => err)
      await started
      await manager.disconnect()

      expect(await outcome).toBeInstanceOf(CancelledError)
      expect(manager.state).toBe('destroyed')
    })
  })

  describe('recovery', () => {
    it('should resume the session after a transport loss', async () => {
      const { manager, connector, stream, states, events } = createHarness({ peer: { autoAck: false } })
      await manager.connect()
      const token = stream.send(message('m1'))
      expect(token.state).toBe('sent')

      connector.setup = (transport) => {
        const peer = new FakeSmPeer({ autoAck: false })
        peer.handled = 1
        peer.attach(transport)
      }
      connector.transports[0].drop()
      await manager.whenSettled()

      expect(manager.state).toBe('established')
      expect(states).toEqual(['connecting', 'established', 'suspended', 'resuming', 'established'])
      expect(events).toEqual(['established', 'suspended', 'resumed'])
      expect(token.state).toBe('acked')
      expect(connector.transports[1].writtenNames()).toEqual(['resume'])
    })

    it('should replay unacked stanzas on the resumed stream', async () => {
      const { manager, connector, stream } = createHarness({ peer: { autoAck: false } })
      await manager.connect()
      stream.send(message('m1'))
      stream.send(message('m2'))

      connector.setup = (transport) => {
        const peer = new FakeSmPeer({ autoAck: false })
        peer.handled = 1
        peer.attach(transport)
      }
      connector.transports[0].drop()
      await manager.whenSettled()

      expect(connector.transports[1].writtenStanzaIds()).toEqual(['m2'])
      expect(stream.ledger.unackedSequences()).toEqual([1])
    })

    it('should try the resumption location first', async () => {
      const { manager, connector } = createHarness({ peer: { location: 'alt.example.com:5223' } })
      await manager.connect()

      connector.transports[0].drop()
      await manager.whenSettled()

      expect(connector.opened[1]).toMatchObject({ host: 'alt.example.com', port: 5223 })
      expect(manager.state).toBe('established')
    })

    it('should start a fresh session when the stream is not resumable', async () => {
      const { manager, connector, stream, states, events } = createHarness({ peer: { resumable: false, autoAck: false } })
      await manager.connect()
      const token = stream.send(message('m1'))

      connector.transports[0].drop()
      await manager.whenSettled()

      expect(token.state).toBe('disconnected')
      expect(states).toEqual(['connecting', 'established', 'suspended', 'connecting', 'established'])
      expect(events).toEqual(['established', 'suspended', 'destroyed', 'established'])
    })

    it('should start a fresh session on the same transport when resumption fails', async () => {
      const { manager, connector, stream, events } = createHarness({ peer: { autoAck: false } })
      await manager.connect()
      const token = stream.send(message('m1'))

      connector.setup = (transport) => {
        new FakeSmPeer({ resume: 'failed' }).attach(transport)
      }
      connector.transports[0].drop()
      await manager.whenSettled()

      expect(manager.state).toBe('established')
      expect(token.state).toBe('disconnected')
      expect(events).toEqual(['established', 'suspended', 'destroyed', 'established'])
      expect(connector.transports).toHaveLength(2)
      expect(connector.transports[1].writtenNames()).toEqual(['resume', 'enable'])
    })

    it('should start fresh once the resumption window has passed', async () => {
      let now = 1_000
      vi.spyOn(Date, 'now').mockImplementation(() => now)
      const { manager, connector, events } = createHarness({ peer: { max: 60 } })
      await manager.connect()

      // The first resumption pass fails and outlasts the window
      connector.script = (_endpoint, attempt) => {
        if (attempt === 2) now += 61_000
        return attempt < 5 ? refused() : { negotiate: success() }
      }
      connector.transports[0].drop()
      await manager.whenSettled()

      expect(manager.state).toBe('established')
      expect(events).toEqual(['established', 'suspended', 'destroyed', 'established'])
      expect(connector.transports[1].writtenNames()).toEqual(['enable'])
    })

    it('should fail when every recovery pass fails', async () => {
      const { manager, connector, events, failures } = createHarness({ config: { maxPasses: 2 } })
      await manager.connect()

      connector.script = refused
      connector.transports[0].drop()
      await manager.whenSettled()

      expect(manager.state).toBe('failed')
      expect(events).toEqual(['established', 'suspended', 'destroyed', 'failed'])
      expect(failures[0]).toBeInstanceOf(ConnectionAttemptsExhaustedError)
      expect(connector.opened).toHaveLength(7)
    })

    it('should be destroyed by a fatal stream error', async () => {
      const { manager, connector, events, failures } = createHarness()
      await manager.connect()

      connector.transports[0].drop({ kind: 'fatal', error: new Error('Unsupported stream version') })
      await manager.whenSettled()

      expect(manager.state).toBe('destroyed')
      expect(events).toEqual(['established', 'destroyed', 'failed'])
      expect(failures[0]).toBeInstanceOf(ProtocolViolationError)
      expect(failures[0].message).toBe('Unsupported stream version')
    })

    it('should stop recovering on disconnect', async () => {
      const { manager, connector } = createHarness({ config: { backoff: { initialDelayMs: 60_000, maxDelayMs: 60_000 } } })
      await manager.connect()
      connector.script = refused
      const scheduled = new Promise<void>((resolve) => {
        manager.on('retryScheduled', () => resolve())
      })

      connector.transports[0].drop()
      await scheduled
      await manager.disconnect()
      await manager.whenSettled()

      expect(manager.state).toBe('destroyed')
    })
  })

  describe('verifyConnection', () => {
    it('should report a live stream', async () => {
      const { manager } = createHarness()
      await manager.connect()

      await expect(manager.verifyConnection()).resolves.toBe(true)
      expect(manager.state).toBe('established')
    })

    it('should report false before connecting', async () => {
      const { manager } = createHarness()
      await expect(manager.verifyConnection()).resolves.toBe(false)
    })

    it('should treat a silent stream as lost and recover', async () => {
      const { manager, peers, events } = createHarness({ config: { verifyTimeoutMs: 20 } })
      await manager.connect()
      peers[0].options.autoAck = false

      await expect(manager.verifyConnection()).resolves.toBe(false)
      await manager.whenSettled()

      expect(events).toEqual(['established', 'suspended', 'resumed'])
      expect(manager.state).toBe('established')
    })
  })

  describe('warnings', () => {
    it('should publish reported warnings', () => {
      const { manager } = createHarness()
      const onWarning = vi.fn()
      manager.on('warning', onWarning)
      const error = new ProtocolViolationError('Peer acknowledged 3 stanzas but only 1 were sent')

      manager.reportWarning(error)

      expect(onWarning).toHaveBeenCalledWith({ error })
    })
  })
})

/**
 * Tests for the Stream Management ledger.
 *
 * These tests verify:
 * 1. Sequence assignment keeps the unacked queue contiguous and increasing
 * 2. Acks are idempotent under duplicates and reordering
 * 3. Over-acknowledgement is reported without corrupting state
 * 4. Failing the session disconnects every queued token exactly once
 * 5. Counters wrap at 2^32
 */
import { describe, it, expect, beforeEach } from 'vitest'
import { xml } from '@xmpp/client'
import { SM_COUNTER_MODULUS, StreamManagementLedger } from './smLedger'
import { StanzaToken } from './stanzaToken'
import { DisconnectedError, ProtocolViolationError } from './errors'

function makeToken(n: number): StanzaToken {
  return new StanzaToken(xml('message', { id: `m${n}` }), `m${n}`)
}

function expectContiguous(ledger: StreamManagementLedger): void {
  const sequences = ledger.unackedSequences()
  sequences.forEach((seq, i) => {
    if (i > 0) expect(seq).toBe(sequences[i - 1] + 1)
  })
  if (sequences.length > 0) {
    expect(sequences[0]).toBe(ledger.lastAcknowledged)
    expect(sequences[sequences.length - 1]).toBe(ledger.outboundCount - 1)
  }
}

describe('StreamManagementLedger', () => {
  let ledger: StreamManagementLedger

  beforeEach(() => {
    ledger = new StreamManagementLedger()
    ledger.enable({ id: 'sm-1', resumable: true, maxSeconds: 300, location: null })
  })

  describe('enable', () => {
    it('should start with zeroed counters and an empty queue', () => {
      expect(ledger.snapshot()).toEqual({ enabled: true, id: 'sm-1', inbound: 0, outbound: 0, unacked: 0 })
    })

    it('should reset counters when enabled again', () => {
      ledger.track(makeToken(1))
      ledger.countInbound()
      ledger.acknowledge(1)

      ledger.enable({ id: 'sm-2', resumable: false, maxSeconds: null, location: null })

      expect(ledger.snapshot()).toEqual({ enabled: true, id: 'sm-2', inbound: 0, outbound: 0, unacked: 0 })
      expect(ledger.lastAcknowledged).toBe(0)
    })
  })

  describe('track', () => {
    it('should assign increasing sequence numbers and mark tokens sent', () => {
      const tokens = [makeToken(1), makeToken(2), makeToken(3)]
      const sequences = tokens.map((t) => ledger.track(t))

      expect(sequences).toEqual([0, 1, 2])
      expect(ledger.outboundCount).toBe(3)
      expect(tokens.every((t) => t.state === 'sent')).toBe(true)
      expectContiguous(ledger)
    })

    it('should keep the queue contiguous through interleaved sends and acks', () => {
      const steps: Array<['send'] | ['ack', number]> = [
        ['send'], ['send'], ['ack', 1], ['send'], ['send'], ['ack', 3],
        ['send'], ['ack', 2], ['send'], ['ack', 6], ['send'],
      ]
      let n = 0
      for (const step of steps) {
        if (step[0] === 'send') {
          ledger.track(makeToken(n++))
        } else {
          ledger.acknowledge(step[1])
        }
        expectContiguous(ledger)
      }
      expect(ledger.unackedSequences()).toEqual([6])
    })
  })

  describe('acknowledge', () => {
    it('should ack every entry below h', () => {
      const tokens = [makeToken(1), makeToken(2), makeToken(3)]
      tokens.forEach((t) => ledger.track(t))

      const result = ledger.acknowledge(2)

      expect(result.acked).toEqual([tokens[0], tokens[1]])
      expect(result.violation).toBeNull()
      expect(tokens.map((t) => t.state)).toEqual(['acked', 'acked', 'sent'])
      expect(ledger.unackedSequences()).toEqual([2])
    })

    it('should resolve the done promise of acked tokens', async () => {
      const token = makeToken(1)
      ledger.track(token)
      ledger.acknowledge(1)

      await expect(token.done).resolves.toEqual({ state: 'acked' })
    })

    it('should ignore a duplicate ack', () => {
      ;[makeToken(1), makeToken(2)].forEach((t) => ledger.track(t))
      ledger.acknowledge(1)

      const result = ledger.acknowledge(1)

      expect(result).toEqual({ acked: [], violation: null })
      expect(ledger.unackedSequences()).toEqual([1])
    })

    it('should ignore an ack lower than one already seen', () => {
      ;[makeToken(1), makeToken(2), makeToken(3)].forEach((t) => ledger.track(t))
      ledger.acknowledge(2)

      const result = ledger.acknowledge(1)

      expect(result.acked).toEqual([])
      expect(ledger.lastAcknowledged).toBe(2)
      expect(ledger.unackedSequences()).toEqual([2])
    })

    it('should treat ack(0) on a fresh session as a no-op', () => {
      ledger.track(makeToken(1))
      expect(ledger.acknowledge(0).acked).toEqual([])
      expect(ledger.unackedCount).toBe(1)
    })

    it('should report an ack beyond what was sent without corrupting state', () => {
      const tokens = [makeToken(1), makeToken(2)]
      tokens.forEach((t) => ledger.track(t))

      const result = ledger.acknowledge(5)

      expect(result.violation).toBeInstanceOf(ProtocolViolationError)
      expect(result.violation?.message).toBe('Peer acknowledged 5 stanzas but only 2 were sent')
      expect(result.acked).toEqual(tokens)
      expect(ledger.lastAcknowledged).toBe(2)
      expect(ledger.outboundCount).toBe(2)

      // Later stanzas are still tracked and acknowledged normally
      const next = makeToken(3)
      expect(ledger.track(next)).toBe(2)
      ledger.acknowledge(3)
      expect(next.state).toBe('acked')
    })
  })

  describe('countInbound', () => {
    it('should count every frame while enabled', () => {
      expect(ledger.countInbound()).toBe(1)
      expect(ledger.countInbound()).toBe(2)
      expect(ledger.inboundCount).toBe(2)
    })

    it('should not count while disabled', () => {
      const disabled = new StreamManagementLedger()
      expect(disabled.countInbound()).toBeNull()
      expect(disabled.inboundCount).toBe(0)
    })
  })

  describe('counter wrap', () => {
    const LAST = SM_COUNTER_MODULUS - 1

    beforeEach(() => {
      ledger.enable({ id: 'sm-1', resumable: true, maxSeconds: 300, location: null }, { inbound: LAST, outbound: LAST })
    })

    it('should wrap the inbound counter to zero', () => {
      expect(ledger.inboundCount).toBe(LAST)
      expect(ledger.countInbound()).toBe(0)
      expect(ledger.countInbound()).toBe(1)
    })

    it('should read an h past the wrap as a forward ack', () => {
      const tokens = [makeToken(1), makeToken(2), makeToken(3)]
      tokens.forEach((t) => ledger.track(t))

      const result = ledger.acknowledge(1)

      expect(result).toEqual({ acked: [tokens[0], tokens[1]], violation: null })
      expect(tokens[2].state).toBe('sent')
      expect(ledger.unackedCount).toBe(1)
    })

    it('should ignore an h from before the wrap', () => {
      const tokens = [makeToken(1), makeToken(2)]
      tokens.forEach((t) => ledger.track(t))
      ledger.acknowledge(1)

      expect(ledger.acknowledge(LAST).acked).toEqual([])
      expect(ledger.acknowledge(SM_COUNTER_MODULUS - 2).acked).toEqual([])
      expect(ledger.unackedCount).toBe(0)
    })

    it('should report an ack past the wrap beyond what was sent', () => {
      ledger.track(makeToken(1))

      const result = ledger.acknowledge(5)

      expect(result.violation?.message).toBe('Peer acknowledged 5 stanzas but only 0 were sent')
      expect(result.acked).toHaveLength(1)
    })
  })

  describe('fail', () => {
    it('should disconnect every queued token exactly once and empty the queue', async () => {
      const tokens = [makeToken(1), makeToken(2), makeToken(3)]
      tokens.forEach((t) => ledger.track(t))
      ledger.acknowledge(1)
      const transitions: string[] = []
      tokens.forEach((t) => t.onStateChange((state) => transitions.push(`${t.id}:${state}`)))
      const error = new DisconnectedError('Session resumption failed')

      const failed = ledger.fail(error)

      expect(failed).toEqual([tokens[1], tokens[2]])
      expect(transitions).toEqual(['m2:disconnected', 'm3:disconnected'])
      expect(ledger.unackedCount).toBe(0)
      await expect(tokens[2].done).resolves.toEqual({ state: 'disconnected', error })

      // A second failure has nothing left to touch
      expect(ledger.fail(error)).toEqual([])
      expect(transitions).toHaveLength(2)
    })
  })

  describe('replayable', () => {
    it('should list unacked tokens in sequence order', () => {
      const tokens = [makeToken(1), makeToken(2), makeToken(3)]
      tokens.forEach((t) => ledger.track(t))
      ledger.acknowledge(1)

      expect(ledger.replayable()).toEqual([tokens[1], tokens[2]])
    })
  })

  describe('reset', () => {
    it('should disable the ledger', () => {
      ledger.reset()
      expect(ledger.snapshot()).toEqual({ enabled: false, id: null, inbound: 0, outbound: 0, unacked: 0 })
    })
  })
})

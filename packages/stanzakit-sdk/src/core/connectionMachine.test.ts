/**
 * Tests for the connection lifecycle machine.
 *
 * These tests verify:
 * 1. State transitions are correct for all lifecycle paths
 * 2. Context is updated (pass counter, resumptions, errors)
 * 3. Events sent in the wrong state are ignored
 * 4. `failed` and `destroyed` only recover through CONNECT
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createActor } from 'xstate'
import { connectionMachine, getLifecycleState, isLifecycleState, type ConnectionActor } from './connectionMachine'

describe('connectionMachine', () => {
  let actor: ConnectionActor

  beforeEach(() => {
    actor = createActor(connectionMachine).start()
  })

  afterEach(() => {
    actor.stop()
  })

  function reach(...events: Parameters<ConnectionActor['send']>[0][]): void {
    for (const event of events) actor.send(event)
  }

  describe('initial state', () => {
    it('should start in idle with empty context', () => {
      expect(getLifecycleState(actor)).toBe('idle')
      expect(actor.getSnapshot().context).toEqual({ pass: 0, resumptions: 0, lastError: null })
    })

    it('should ignore DISCONNECT while idle', () => {
      actor.send({ type: 'DISCONNECT' })
      expect(getLifecycleState(actor)).toBe('idle')
    })
  })

  describe('happy path: idle → connecting → established', () => {
    it('should transition through the happy path', () => {
      actor.send({ type: 'CONNECT' })
      expect(getLifecycleState(actor)).toBe('connecting')

      actor.send({ type: 'ESTABLISHED', resumed: false })
      expect(getLifecycleState(actor)).toBe('established')
    })

    it('should track the current pass while connecting and reset it once established', () => {
      reach({ type: 'CONNECT' }, { type: 'PASS_STARTED', pass: 2 })
      expect(actor.getSnapshot().context.pass).toBe(2)

      actor.send({ type: 'ESTABLISHED', resumed: false })
      expect(actor.getSnapshot().context.pass).toBe(0)
    })
  })

  describe('initial failure', () => {
    it('should move to failed and keep the error', () => {
      reach({ type: 'CONNECT' }, { type: 'CONNECT_FAILED', error: 'All candidate endpoints failed' })

      expect(getLifecycleState(actor)).toBe('failed')
      expect(actor.getSnapshot().context.lastError).toBe('All candidate endpoints failed')
    })

    it('should allow a fresh CONNECT from failed and clear the error', () => {
      reach({ type: 'CONNECT' }, { type: 'CONNECT_FAILED', error: 'boom' }, { type: 'CONNECT' })

      expect(getLifecycleState(actor)).toBe('connecting')
      expect(actor.getSnapshot().context.lastError).toBeNull()
    })

    it('should not recover from failed without CONNECT', () => {
      reach({ type: 'CONNECT' }, { type: 'CONNECT_FAILED', error: 'boom' })
      actor.send({ type: 'ESTABLISHED', resumed: false })
      actor.send({ type: 'RESUME' })
      expect(getLifecycleState(actor)).toBe('failed')
    })
  })

  describe('steady-state loss', () => {
    beforeEach(() => {
      reach({ type: 'CONNECT' }, { type: 'ESTABLISHED', resumed: false })
    })

    it('should suspend on TRANSPORT_LOST', () => {
      actor.send({ type: 'TRANSPORT_LOST', error: 'Stream closed by peer' })
      expect(getLifecycleState(actor)).toBe('suspended')
      expect(actor.getSnapshot().context.lastError).toBe('Stream closed by peer')
    })

    it('should resume the session: suspended → resuming → established', () => {
      reach({ type: 'TRANSPORT_LOST', error: 'lost' }, { type: 'RESUME' })
      expect(getLifecycleState(actor)).toBe('resuming')

      actor.send({ type: 'ESTABLISHED', resumed: true })
      expect(getLifecycleState(actor)).toBe('established')
      expect(actor.getSnapshot().context.resumptions).toBe(1)
      expect(actor.getSnapshot().context.lastError).toBeNull()
    })

    it('should reset the resumption count on a fresh session', () => {
      reach(
        { type: 'TRANSPORT_LOST', error: 'lost' },
        { type: 'RESUME' },
        { type: 'ESTABLISHED', resumed: true },
        { type: 'TRANSPORT_LOST', error: 'lost' },
        { type: 'RECONNECT' },
        { type: 'ESTABLISHED', resumed: false }
      )
      expect(actor.getSnapshot().context.resumptions).toBe(0)
    })

    it('should reconnect fresh: suspended → connecting', () => {
      reach({ type: 'TRANSPORT_LOST', error: 'lost' }, { type: 'RECONNECT' })
      expect(getLifecycleState(actor)).toBe('connecting')
    })

    it('should fall back to connecting when resumption gives up on the session', () => {
      reach({ type: 'TRANSPORT_LOST', error: 'lost' }, { type: 'RESUME' }, { type: 'RECONNECT' })
      expect(getLifecycleState(actor)).toBe('connecting')
    })

    it('should fail when resumption attempts are exhausted', () => {
      reach({ type: 'TRANSPORT_LOST', error: 'lost' }, { type: 'RESUME' }, { type: 'CONNECT_FAILED', error: 'exhausted' })
      expect(getLifecycleState(actor)).toBe('failed')
    })

    it('should ignore RESUME while established', () => {
      actor.send({ type: 'RESUME' })
      expect(getLifecycleState(actor)).toBe('established')
    })
  })

  describe('destroyed', () => {
    it.each([
      ['connecting', [{ type: 'CONNECT' }]],
      ['established', [{ type: 'CONNECT' }, { type: 'ESTABLISHED', resumed: false }]],
      ['suspended', [{ type: 'CONNECT' }, { type: 'ESTABLISHED', resumed: false }, { type: 'TRANSPORT_LOST', error: 'x' }]],
      [
        'resuming',
        [{ type: 'CONNECT' }, { type: 'ESTABLISHED', resumed: false }, { type: 'TRANSPORT_LOST', error: 'x' }, { type: 'RESUME' }],
      ],
    ] as const)('should be reached by FATAL from %s', (_state, events) => {
      reach(...events)
      actor.send({ type: 'FATAL', error: 'not-authorized' })
      expect(getLifecycleState(actor)).toBe('destroyed')
      expect(actor.getSnapshot().context.lastError).toBe('not-authorized')
    })

    it('should be reached by DISCONNECT from established', () => {
      reach({ type: 'CONNECT' }, { type: 'ESTABLISHED', resumed: false }, { type: 'DISCONNECT' })
      expect(getLifecycleState(actor)).toBe('destroyed')
    })

    it('should be reached by DISCONNECT from failed', () => {
      reach({ type: 'CONNECT' }, { type: 'CONNECT_FAILED', error: 'x' }, { type: 'DISCONNECT' })
      expect(getLifecycleState(actor)).toBe('destroyed')
    })

    it('should only leave destroyed through CONNECT', () => {
      reach({ type: 'CONNECT' }, { type: 'DISCONNECT' })
      actor.send({ type: 'ESTABLISHED', resumed: false })
      expect(getLifecycleState(actor)).toBe('destroyed')

      actor.send({ type: 'CONNECT' })
      expect(getLifecycleState(actor)).toBe('connecting')
    })
  })

  describe('isLifecycleState', () => {
    it('should accept known states only', () => {
      expect(isLifecycleState('resuming')).toBe(true)
      expect(isLifecycleState('online')).toBe(false)
      expect(isLifecycleState({ connected: 'healthy' })).toBe(false)
    })
  })
})

import { describe, it, expect, vi } from 'vitest'
import { xml } from '@xmpp/client'
import { StanzaToken, isTerminalTokenState } from './stanzaToken'
import { CancelledError, DisconnectedError, InvalidStateTransitionError } from './errors'

function createToken(onAbort?: (token: StanzaToken) => void): StanzaToken {
  return new StanzaToken(xml('message', { id: 'm1', to: 'peer@example.com' }), 'm1', onAbort)
}

describe('StanzaToken', () => {
  it('should start active', () => {
    const token = createToken()
    expect(token.state).toBe('active')
    expect(token.error).toBeNull()
    expect(token.isTerminal).toBe(false)
  })

  it('should go active → sent → acked and resolve done once', async () => {
    const token = createToken()
    const states: string[] = []
    token.onStateChange((state) => states.push(state))

    token.updateState('sent')
    token.updateState('acked')

    expect(states).toEqual(['sent', 'acked'])
    await expect(token.done).resolves.toEqual({ state: 'acked' })
  })

  it('should allow active → acked directly', async () => {
    const token = createToken()
    token.updateState('acked')
    await expect(token.done).resolves.toEqual({ state: 'acked' })
  })

  it('should resolve done with the error of a disconnection', async () => {
    const token = createToken()
    const error = new DisconnectedError('Transport lost')
    token.updateState('sent')
    token.updateState('disconnected', error)

    await expect(token.done).resolves.toEqual({ state: 'disconnected', error })
    expect(token.error).toBe(error)
  })

  it.each([
    ['acked', 'sent'],
    ['acked', 'disconnected'],
    ['disconnected', 'acked'],
    ['aborted', 'sent'],
  ] as const)('should refuse %s → %s', (from, to) => {
    const token = createToken()
    token.updateState(from)
    expect(() => token.updateState(to)).toThrow(InvalidStateTransitionError)
    expect(token.state).toBe(from)
  })

  it('should refuse sent → aborted', () => {
    const token = createToken()
    token.updateState('sent')
    expect(() => token.updateState('aborted')).toThrow('Stanza token m1: sent → aborted is not allowed')
  })

  it('should abort while active and notify the owner', async () => {
    const onAbort = vi.fn()
    const token = createToken(onAbort)

    expect(token.abort()).toBe(true)

    expect(token.state).toBe('aborted')
    expect(onAbort).toHaveBeenCalledWith(token)
    const outcome = await token.done
    expect(outcome.state).toBe('aborted')
    expect(token.error).toBeInstanceOf(CancelledError)
  })

  it('should refuse abort once committed', () => {
    const onAbort = vi.fn()
    const token = createToken(onAbort)
    token.commit()

    expect(token.abort()).toBe(false)
    expect(token.state).toBe('active')
    expect(onAbort).not.toHaveBeenCalled()
  })

  it('should refuse abort after sending', () => {
    const token = createToken()
    token.updateState('sent')
    expect(token.abort()).toBe(false)
    expect(token.state).toBe('sent')
  })

  it('should stop notifying after unsubscribe', () => {
    const token = createToken()
    const listener = vi.fn()
    const off = token.onStateChange(listener)
    off()

    token.updateState('acked')
    expect(listener).not.toHaveBeenCalled()
  })

  it('should keep notifying other listeners when one throws', () => {
    const token = createToken()
    const second = vi.fn()
    token.onStateChange(() => {
      throw new Error('listener bug')
    })
    token.onStateChange(second)

    token.updateState('sent')

    expect(second).toHaveBeenCalledWith('sent', null)
  })

  it('should report terminal states', () => {
    expect(isTerminalTokenState('active')).toBe(false)
    expect(isTerminalTokenState('sent')).toBe(false)
    expect(isTerminalTokenState('acked')).toBe(true)
    expect(isTerminalTokenState('disconnected')).toBe(true)
    expect(isTerminalTokenState('aborted')).toBe(true)
  })
})

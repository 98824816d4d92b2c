import { createStore } from 'zustand/vanilla'
import { subscribeWithSelector } from 'zustand/middleware'
import type { LifecycleState } from '../core/types'
import type { SmLedgerSnapshot } from '../core/smLedger'

/**
 * Observable session state of one client.
 *
 * Mirrors the lifecycle machine (status, pass, retry time) and the Stream
 * Management ledger (counters) so that a UI can subscribe to slices of it.
 * The client is the only writer.
 *
 * @example
 * ```ts
 * const client = new StanzaClient({ connector, endpoints })
 *
 * // React to status changes only
 * const unsubscribe = client.session.subscribe(
 *   (state) => state.status,
 *   (status) => console.log('status:', status)
 * )
 *
 * const { unacked, nextRetryAt } = client.session.getState()
 * ```
 *
 * @category Stores
 */
interface SessionState {
  status: LifecycleState
  jid: string | null
  error: string | null
  /** Current pass over the candidate endpoints, 0 when not connecting */
  pass: number
  /** Epoch ms at which the next pass starts, while backing off */
  nextRetryAt: number | null
  smEnabled: boolean
  smId: string | null
  inbound: number
  outbound: number
  unacked: number

  setStatus: (status: LifecycleState) => void
  setJid: (jid: string | null) => void
  setError: (error: string | null) => void
  setRetryState: (pass: number, nextRetryAt: number | null) => void
  setLedger: (snapshot: SmLedgerSnapshot) => void
  reset: () => void
}

type SessionData = Omit<SessionState, 'setStatus' | 'setJid' | 'setError' | 'setRetryState' | 'setLedger' | 'reset'>

const initialState: SessionData = {
  status: 'idle',
  jid: null,
  error: null,
  pass: 0,
  nextRetryAt: null,
  smEnabled: false,
  smId: null,
  inbound: 0,
  outbound: 0,
  unacked: 0,
}

export function createSessionStore() {
  return createStore<SessionState>()(
    subscribeWithSelector((set) => ({
      ...initialState,

      setStatus: (status) => set({ status }),
      setJid: (jid) => set({ jid }),
      setError: (error) => set({ error }),
      setRetryState: (pass, nextRetryAt) => set({ pass, nextRetryAt }),

      setLedger: (snapshot) => set({
        smEnabled: snapshot.enabled,
        smId: snapshot.id,
        inbound: snapshot.inbound,
        outbound: snapshot.outbound,
        unacked: snapshot.unacked,
      }),

      reset: () => set({ ...initialState }),
    }))
  )
}

export type SessionStore = ReturnType<typeof createSessionStore>

export type { SessionState }

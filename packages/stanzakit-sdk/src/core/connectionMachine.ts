/**
 * XState connection lifecycle machine.
 *
 * Holds the lifecycle state of one {@link ConnectionManager} with explicit,
 * auditable transitions. The machine performs no I/O: the manager opens
 * transports, negotiates streams and sends events here as things happen.
 *
 * ## State Diagram
 *
 * ```
 * ┌──────┐ CONNECT ┌────────────┐ CONNECT_FAILED ┌────────┐
 * │ idle │────────►│ connecting │───────────────►│ failed │
 * └──────┘         └─────┬──────┘                └───┬────┘
 *                        │ ESTABLISHED       CONNECT │
 *                        ▼             ◄─────────────┘
 *                 ┌─────────────┐
 *          ┌─────►│ established │
 *          │      └──────┬──────┘
 *          │             │ TRANSPORT_LOST
 * ESTABLISHED            ▼
 *          │      ┌───────────┐ RECONNECT
 *          │      │ suspended │──────────► connecting
 *          │      └─────┬─────┘
 *          │            │ RESUME
 *          │            ▼
 *          │      ┌──────────┐ CONNECT_FAILED
 *          └──────│ resuming │───────────────► failed
 *                 └──────────┘
 *
 * any state but idle ── FATAL / DISCONNECT ──► destroyed ── CONNECT ──► connecting
 * ```
 *
 * ## Key Invariants
 *
 * 1. `established` is only reached from `connecting` or `resuming`
 * 2. Only `suspended` can start a resumption
 * 3. `failed` and `destroyed` never recover by themselves, only through CONNECT
 * 4. `pass` is 0 outside of connection attempts
 *
 * @module Core/ConnectionMachine
 */
import { setup, assign, type ActorRefFrom } from 'xstate'
import type { LifecycleState } from './types'

// ============================================================================
// Types
// ============================================================================

/**
 * Events that can be sent to the connection machine.
 */
export type ConnectionMachineEvent =
  | { type: 'CONNECT' }
  | { type: 'PASS_STARTED'; pass: number }
  | { type: 'ESTABLISHED'; resumed: boolean }
  | { type: 'CONNECT_FAILED'; error: string }
  | { type: 'TRANSPORT_LOST'; error: string }
  | { type: 'RESUME' }
  | { type: 'RECONNECT' }
  | { type: 'FATAL'; error: string }
  | { type: 'DISCONNECT' }

/**
 * Context (extended state) for the connection machine.
 */
export interface ConnectionMachineContext {
  /** Current pass over the candidate endpoints (1-based), 0 when not connecting */
  pass: number
  /** How often the current session has been resumed */
  resumptions: number
  /** Last error message, null when no error */
  lastError: string | null
}

const LIFECYCLE_STATES: readonly LifecycleState[] = [
  'idle',
  'connecting',
  'established',
  'suspended',
  'resuming',
  'failed',
  'destroyed',
]

export function isLifecycleState(value: unknown): value is LifecycleState {
  return LIFECYCLE_STATES.some((state) => state === value)
}

// ============================================================================
// Machine Definition
// ============================================================================

export const connectionMachine = setup({
  types: {
    context: {} as ConnectionMachineContext,
    events: {} as ConnectionMachineEvent,
  },
  actions: {
    startConnecting: assign({ pass: 0, lastError: null }),

    setPass: assign(({ event }) => {
      if (event.type === 'PASS_STARTED') {
        return { pass: event.pass }
      }
      return {}
    }),

    markEstablished: assign(({ context, event }) => {
      if (event.type === 'ESTABLISHED') {
        return {
          pass: 0,
          lastError: null,
          resumptions: event.resumed ? context.resumptions + 1 : 0,
        }
      }
      return {}
    }),

    setError: assign(({ event }) => {
      switch (event.type) {
        case 'CONNECT_FAILED':
        case 'TRANSPORT_LOST':
        case 'FATAL':
          return { lastError: event.error }
        default:
          return {}
      }
    }),

    resetPass: assign({ pass: 0 }),
  },
}).createMachine({
  id: 'connection',
  context: {
    pass: 0,
    resumptions: 0,
    lastError: null,
  },
  initial: 'idle',
  on: {
    PASS_STARTED: { actions: 'setPass' },
  },
  states: {
    /** No connection has been attempted yet. */
    idle: {
      on: {
        CONNECT: { target: 'connecting', actions: 'startConnecting' },
      },
    },

    /** Iterating candidate endpoints for a fresh stream. */
    connecting: {
      on: {
        ESTABLISHED: { target: 'established', actions: 'markEstablished' },
        CONNECT_FAILED: { target: 'failed', actions: ['setError', 'resetPass'] },
        FATAL: { target: 'destroyed', actions: ['setError', 'resetPass'] },
        DISCONNECT: { target: 'destroyed', actions: 'resetPass' },
      },
    },

    /** Stream negotiated and running. */
    established: {
      on: {
        TRANSPORT_LOST: { target: 'suspended', actions: 'setError' },
        FATAL: { target: 'destroyed', actions: 'setError' },
        DISCONNECT: 'destroyed',
      },
    },

    /** Transport lost; the session state is kept while deciding how to recover. */
    suspended: {
      on: {
        RESUME: 'resuming',
        RECONNECT: 'connecting',
        FATAL: { target: 'destroyed', actions: 'setError' },
        DISCONNECT: 'destroyed',
      },
    },

    /** Reconnecting to resume the previous session. */
    resuming: {
      on: {
        ESTABLISHED: { target: 'established', actions: 'markEstablished' },
        // Resumption window expired while retrying: continue with a fresh stream
        RECONNECT: 'connecting',
        CONNECT_FAILED: { target: 'failed', actions: ['setError', 'resetPass'] },
        FATAL: { target: 'destroyed', actions: ['setError', 'resetPass'] },
        DISCONNECT: { target: 'destroyed', actions: 'resetPass' },
      },
    },

    /** Every candidate failed. Only CONNECT escapes. */
    failed: {
      on: {
        CONNECT: { target: 'connecting', actions: 'startConnecting' },
        DISCONNECT: 'destroyed',
      },
    },

    /** Closed by the caller or by a non-recoverable error. */
    destroyed: {
      on: {
        CONNECT: { target: 'connecting', actions: 'startConnecting' },
      },
    },
  },
})

// ============================================================================
// Actor Type
// ============================================================================

/**
 * Type for a running connection machine actor.
 */
export type ConnectionActor = ActorRefFrom<typeof connectionMachine>

/**
 * Current lifecycle state of a running actor.
 */
export function getLifecycleState(actor: ConnectionActor): LifecycleState {
  const value = actor.getSnapshot().value
  return isLifecycleState(value) ? value : 'idle'
}

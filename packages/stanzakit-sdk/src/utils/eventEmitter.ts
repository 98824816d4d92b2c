import { describeError, logError } from '../core/logger'

type ListenerMap<Events> = { [K in keyof Events]?: Set<(payload: Events[K]) => void> }

/**
 * Minimal typed event emitter with object payloads.
 *
 * Listener exceptions are logged and do not stop delivery to the other
 * listeners, nor propagate to the code that emitted the event.
 *
 * @example
 * ```typescript
 * const events = new TypedEventEmitter<{ ready: { at: number } }>()
 * const off = events.on('ready', ({ at }) => console.log(at))
 * events.emit('ready', { at: Date.now() })
 * off()
 * ```
 */
export class TypedEventEmitter<Events extends object> {
  private listeners: ListenerMap<Events> = {}

  /**
   * Subscribe to an event.
   * @returns A function to unsubscribe
   */
  on<K extends keyof Events>(event: K, handler: (payload: Events[K]) => void): () => void {
    let set: Set<(payload: Events[K]) => void> | undefined = this.listeners[event]
    if (!set) {
      set = new Set<(payload: Events[K]) => void>()
      this.listeners[event] = set
    }
    const handlers = set
    handlers.add(handler)
    return () => {
      handlers.delete(handler)
    }
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.listeners[event]
    if (!set) return
    for (const handler of [...set]) {
      try {
        handler(payload)
      } catch (err) {
        logError(`Listener for '${String(event)}' threw: ${describeError(err)}`)
      }
    }
  }

  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0
  }

  removeAllListeners(): void {
    this.listeners = {}
  }
}

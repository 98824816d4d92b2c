/**
 * Ordered stanza filter chains.
 *
 * A filter sees a message or presence stanza before routing (inbound) or
 * before sequence assignment (outbound). It returns the stanza, a
 * replacement, or null to drop it. Filters run by ascending `order`; equal
 * orders keep registration order.
 *
 * @module Core/StanzaFilters
 */
import type { Element } from '@xmpp/client'
import type { StanzaFilter } from './types'
import { createLogger, describeError, type Logger } from './logger'

interface FilterEntry {
  filter: StanzaFilter
  order: number
  owner: string | null
  seq: number
}

export class FilterChain {
  private entries: FilterEntry[] = []
  private nextSeq = 0
  private log: Logger

  constructor(name: string, log?: Logger) {
    this.log = log ?? createLogger(`filter:${name}`)
  }

  get size(): number {
    return this.entries.length
  }

  /**
   * Add a filter to the chain.
   * @returns A function that removes the filter again
   */
  register(filter: StanzaFilter, order = 0, owner: string | null = null): () => void {
    const entry: FilterEntry = { filter, order, owner, seq: this.nextSeq++ }
    this.entries.push(entry)
    this.entries.sort((a, b) => a.order - b.order || a.seq - b.seq)
    return () => {
      this.entries = this.entries.filter((e) => e !== entry)
    }
  }

  /** Remove every filter registered by `owner`. */
  removeOwner(owner: string): void {
    this.entries = this.entries.filter((e) => e.owner !== owner)
  }

  /**
   * Run the chain. A filter that throws is skipped (the stanza passes on
   * unchanged) and the error logged.
   *
   * @returns The filtered stanza, or null when a filter dropped it
   */
  apply(stanza: Element): Element | null {
    let current = stanza
    for (const entry of [...this.entries]) {
      let next: Element | null
      try {
        next = entry.filter(current)
      } catch (err) {
        this.log.error(`Filter${entry.owner ? ` of ${entry.owner}` : ''} threw: ${describeError(err)}`)
        continue
      }
      if (next === null) return null
      current = next
    }
    return current
  }
}

/** Inbound and outbound chains for message and presence stanzas. */
export interface StanzaFilters {
  inboundMessage: FilterChain
  inboundPresence: FilterChain
  outboundMessage: FilterChain
  outboundPresence: FilterChain
}

export function createStanzaFilters(): StanzaFilters {
  return {
    inboundMessage: new FilterChain('inbound-message'),
    inboundPresence: new FilterChain('inbound-presence'),
    outboundMessage: new FilterChain('outbound-message'),
    outboundPresence: new FilterChain('outbound-presence'),
  }
}

export type FilterDirection = 'inbound' | 'outbound'

/** Chain for one direction and stanza name, or null for stanzas that are never filtered (IQs, nonzas). */
export function selectFilterChain(filters: StanzaFilters, direction: FilterDirection, name: string): FilterChain | null {
  switch (name) {
    case 'message':
      return direction === 'inbound' ? filters.inboundMessage : filters.outboundMessage
    case 'presence':
      return direction === 'inbound' ? filters.inboundPresence : filters.outboundPresence
    default:
      return null
  }
}

export function removeFilterOwner(filters: StanzaFilters, owner: string): void {
  filters.inboundMessage.removeOwner(owner)
  filters.inboundPresence.removeOwner(owner)
  filters.outboundMessage.removeOwner(owner)
  filters.outboundPresence.removeOwner(owner)
}

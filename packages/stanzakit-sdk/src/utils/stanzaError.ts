import { xml, type Element } from '@xmpp/client'
import { NS_XMPP_STANZAS } from '../core/namespaces'

const STANZA_ERROR_TYPES = ['auth', 'cancel', 'continue', 'modify', 'wait'] as const

/** `type` attribute of an `<error/>` (RFC 6120 §8.3.2). */
export type StanzaErrorType = (typeof STANZA_ERROR_TYPES)[number]

/** A defined condition with its error type and optional text. */
export interface StanzaErrorCondition {
  type: StanzaErrorType
  /** Element name of the condition, e.g. `item-not-found` */
  condition: string
  text?: string
}

function toErrorType(value: string | undefined): StanzaErrorType {
  return STANZA_ERROR_TYPES.find((type) => type === value) ?? 'cancel'
}

/**
 * Read the error carried by a `type='error'` stanza, or by the `<error/>`
 * element itself.
 *
 * The condition is the first child in the stanzas namespace other than
 * `<text/>`. An error without one (or a stanza without `<error/>`) reads as
 * `cancel` / `undefined-condition`.
 */
export function readStanzaError(stanza: Element): StanzaErrorCondition {
  const error = stanza.name === 'error' ? stanza : stanza.getChild('error')
  if (!error) return { type: 'cancel', condition: 'undefined-condition' }

  const defined = error
    .getChildElements()
    .find((child) => child.attrs.xmlns === NS_XMPP_STANZAS && child.name !== 'text')
  const text = error.getChildText('text', NS_XMPP_STANZAS)

  return {
    type: toErrorType(error.attrs.type),
    condition: defined?.name ?? 'undefined-condition',
    ...(text ? { text } : {}),
  }
}

/** The peer's text if it sent one, else the condition spelled out: `Item not found`. */
export function describeStanzaError(error: StanzaErrorCondition): string {
  if (error.text) return error.text
  const spelled = error.condition.replace(/-/g, ' ')
  return spelled.charAt(0).toUpperCase() + spelled.slice(1)
}

/**
 * Build the error reply for a request stanza: same name and id, addressed
 * back to the sender, with the defined condition inside `<error>`.
 */
export function buildErrorReply(request: Element, error: StanzaErrorCondition): Element {
  const attrs: Record<string, string> = { type: 'error' }
  if (request.attrs.id) attrs.id = request.attrs.id
  if (request.attrs.from) attrs.to = request.attrs.from

  const children = [xml(error.condition, { xmlns: NS_XMPP_STANZAS })]
  if (error.text) children.push(xml('text', { xmlns: NS_XMPP_STANZAS }, error.text))
  return xml(request.name, attrs, xml('error', { type: error.type }, ...children))
}

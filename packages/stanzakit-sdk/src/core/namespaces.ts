/**
 * XMPP Namespace Constants
 *
 * Namespaces the core reads or writes itself. Extension namespaces belong
 * to the services that use them.
 */

// RFC 6120: client stream content
export const NS_CLIENT = 'jabber:client'

// RFC 6120 §8.3: stanza error conditions
export const NS_XMPP_STANZAS = 'urn:ietf:params:xml:ns:xmpp-stanzas'

// XEP-0198: Stream Management
export const NS_SM = 'urn:xmpp:sm:3'

// XEP-0199: XMPP Ping
export const NS_PING = 'urn:xmpp:ping'

/**
 * JID (Jabber ID) Utilities
 *
 * XMPP addresses have the format local@domain/resource. The dispatcher
 * only needs to split off the resource (to fall back from a full-JID
 * handler filter to a bare-JID one) and the domain (for privacy-safe
 * log lines and for matching replies from the local server).
 *
 * Note: These are plain string operations. For RFC 7622 preparation and
 * escaping, normalise addresses before they reach the core.
 */

/**
 * Get bare JID (without resource) from a full JID
 * @param fullJid - Full JID (e.g., "user@example.com/mobile")
 * @returns Bare JID (e.g., "user@example.com")
 */
export function getBareJid(fullJid: string): string {
  if (!fullJid) return ''
  const slashIndex = fullJid.indexOf('/')
  return slashIndex >= 0 ? fullJid.substring(0, slashIndex) : fullJid
}

/**
 * Get domain from a JID
 * @param jid - Any JID (e.g., "user@example.com/mobile" or "example.com")
 * @returns Domain (e.g., "example.com")
 */
export function getDomain(jid: string): string {
  const bareJid = getBareJid(jid)
  const atIndex = bareJid.indexOf('@')
  return atIndex >= 0 ? bareJid.substring(atIndex + 1) : bareJid
}

/**
 * Check if a JID has a resource part
 */
export function hasResource(jid: string): boolean {
  return jid.includes('/')
}

/**
 * Whether `from` designates the local account or its server, i.e. a reply
 * that is equivalent to one without a `from` attribute (RFC 6120 §8.1.2.1).
 *
 * @param from - The sender address of an inbound stanza
 * @param localJid - The bound full JID of this session, if known
 */
export function isLocalServerAddress(from: string, localJid: string | null): boolean {
  if (!localJid) return false
  return from === getBareJid(localJid) || from === getDomain(localJid)
}

/** Id for a stanza sent without one. Only needs to be unique within a stream. */
export function generateStanzaId(): string {
  return globalThis.crypto.randomUUID()
}

/**
 * # Stanzakit SDK
 *
 * Reliable messaging core for XMPP clients: Stream Management
 * acknowledgements and resumption, stanza dispatch with IQ correlation,
 * connection lifecycle with backoff, and ordered service start-up.
 *
 * ## Bundle Structure
 *
 * - **`@stanzakit/sdk`** - Client, building blocks and the session store (this bundle)
 * - **`@stanzakit/sdk/core`** - Core only, without the store
 *
 * ## Quick Start
 *
 * ```typescript
 * import { StanzaClient, xml } from '@stanzakit/sdk'
 *
 * const client = new StanzaClient({
 *   connector,
 *   endpoints: [{ host: 'xmpp.example.com', port: 5222 }],
 * })
 *
 * client.registerMessageHandler({ type: 'chat' }, (stanza) => {
 *   console.log(stanza.attrs.from, stanza.getChildText('body'))
 * })
 *
 * await client.connect()
 *
 * const token = client.send(xml('message', { to: 'peer@example.com', type: 'chat' }, xml('body', {}, 'Hello!')))
 * const { state } = await token.done // 'acked' once the server confirmed it
 * ```
 *
 * The `connector` opens and negotiates transports; see {@link Connector}.
 *
 * @packageDocumentation
 */

export * from './core'

// Session store
export { createSessionStore } from './stores/sessionStore'
export type { SessionStore, SessionState } from './stores/sessionStore'

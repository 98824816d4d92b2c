/**
 * XEP-0199: XMPP Ping.
 *
 * Answers `<ping xmlns="urn:xmpp:ping"/>` requests with an empty result and
 * pings other entities on request.
 *
 * @module Services/Ping
 */
import { xml } from '@xmpp/client'
import { BaseService } from './BaseService'
import { ApplicationRejectError } from '../errors'
import { NS_PING } from '../namespaces'
import type { SendIQOptions, ServiceDescriptor } from '../types'

/** Errors by which an entity that does not implement ping still answers. */
const REACHABLE_CONDITIONS = new Set(['service-unavailable', 'feature-not-implemented'])

/**
 * @category Services
 */
export class PingService extends BaseService {
  static readonly descriptor: ServiceDescriptor<PingService> = {
    name: 'ping',
    create: (context) => new PingService(context),
  }

  start(): void {
    this.registrar.registerIQHandler('get', NS_PING, 'ping', (request) => {
      this.log.debug(`Answering ping from ${request.attrs.from ?? 'server'}`)
      return null
    })
  }

  /**
   * Ping `to`, or the own server when omitted.
   *
   * Resolves when the entity answers, including with an error saying it
   * does not support ping.
   *
   * @throws {ApplicationRejectError} for any other error reply, e.g. remote-server-not-found
   * @throws {TimeoutError} when `options.timeoutMs` elapses first
   */
  async ping(to?: string, options: SendIQOptions = {}): Promise<void> {
    const attrs: Record<string, string> = { type: 'get' }
    if (to) attrs.to = to
    try {
      await this.sendIQ(xml('iq', attrs, xml('ping', { xmlns: NS_PING })), options)
    } catch (err) {
      if (err instanceof ApplicationRejectError && REACHABLE_CONDITIONS.has(err.condition)) return
      throw err
    }
  }
}

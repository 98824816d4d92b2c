import type { Element } from '@xmpp/client'
import type { StanzaToken } from '../stanzaToken'
import type { Logger } from '../logger'
import type { SendIQOptions, Service, ServiceContext, ServiceRegistrar } from '../types'

/**
 * Convenience base for services.
 *
 * Holds the {@link ServiceContext} the registry passes to the factory and
 * exposes its parts to subclasses. Ordering and dependencies live in the
 * {@link ServiceDescriptor}, not in the class hierarchy.
 *
 * @example Writing a service
 * ```typescript
 * class VersionService extends BaseService {
 *   static readonly descriptor: ServiceDescriptor<VersionService> = {
 *     name: 'version',
 *     create: (context) => new VersionService(context),
 *   }
 *
 *   start(): void {
 *     this.registrar.registerIQHandler('get', 'jabber:iq:version', 'query', () =>
 *       xml('query', { xmlns: 'jabber:iq:version' }, xml('name', {}, 'stanzakit'))
 *     )
 *   }
 * }
 * ```
 *
 * @category Services
 */
export abstract class BaseService implements Service {
  protected readonly context: ServiceContext

  constructor(context: ServiceContext) {
    this.context = context
  }

  get name(): string {
    return this.context.name
  }

  protected get log(): Logger {
    return this.context.logger
  }

  protected get registrar(): ServiceRegistrar {
    return this.context.registrar
  }

  protected send(stanza: Element): StanzaToken {
    return this.context.send(stanza)
  }

  protected sendIQ(iq: Element, options?: SendIQOptions): Promise<Element> {
    return this.context.sendIQ(iq, options)
  }
}

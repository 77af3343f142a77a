import {Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {createCollaborators, createProvider, sessionFactory} from '../core/runtime.js'
import {SessionRegistry} from '../core/session-registry.js'
import {makeLogger} from '../logging/logger.js'
import {ChatServer} from '../server/chat-server.js'

export default class Serve extends Command {
  static override description = 'Start the WebSocket chat server; every connection gets its own session'

  static override flags = {
    port: Flags.integer({char: 'p', description: 'port to listen on (overrides config)'}),
    host: Flags.string({description: 'interface to bind (overrides config)'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Serve)
    const config = await loadConfig()
    const logger = makeLogger({command: 'serve'})
    const provider = createProvider(config, logger)
    const registry = new SessionRegistry()
    const server = new ChatServer({
      registry,
      createSession: sessionFactory(config, {provider, collaborators: createCollaborators(config), logger}),
      heartbeatMs: config.server.heartbeatMs,
      logger
    })

    const host = flags.host ?? config.server.host
    const port = await server.listen(flags.port ?? config.server.port, host)
    this.log(`termpilot listening on ws://${host}:${port} (${provider.name}/${provider.model})`)

    await new Promise<void>((resolve) => {
      const shutdown = () => {
        process.off('SIGINT', shutdown)
        process.off('SIGTERM', shutdown)
        resolve()
      }
      process.on('SIGINT', shutdown)
      process.on('SIGTERM', shutdown)
    })

    logger.info({sessions: registry.size}, 'shutting down')
    await server.close()
  }
}

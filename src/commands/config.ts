import {Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'

export default class Config extends Command {
  static override description = 'Print the resolved configuration (config file, .env and environment merged)'

  static override flags = {
    section: Flags.string({
      description: 'print only one section',
      options: ['server', 'runtime', 'web']
    })
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Config)
    const config = await loadConfig()
    switch (flags.section) {
      case 'server':
        this.log(JSON.stringify(config.server, null, 2))
        return
      case 'runtime':
        this.log(JSON.stringify(config.runtime, null, 2))
        return
      case 'web':
        this.log(JSON.stringify(config.web, null, 2))
        return
      default:
        this.log(JSON.stringify(config, null, 2))
    }
  }
}

import {Command, Flags} from '@oclif/core'
import {mkdir, writeFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import {getTermpilotHome} from '../config/paths.js'

export default class Init extends Command {
  static override description = 'Initialize local project config and the global termpilot home'

  static override flags = {
    force: Flags.boolean({char: 'f', description: 'overwrite existing files'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Init)
    const targetDir = process.cwd()
    const homeDir = getTermpilotHome()
    const configPath = resolve(targetDir, '.termpilotrc.json')
    const globalEnvExamplePath = resolve(homeDir, '.env.example')

    await mkdir(targetDir, {recursive: true})
    await mkdir(homeDir, {recursive: true})
    await writeFile(
      configPath,
      JSON.stringify(
        {
          provider: 'openai',
          model: '',
          baseURL: '',
          workspace: targetDir,
          server: {host: '127.0.0.1', port: 4010},
          runtime: {maxToolRounds: 8, summarizeThreshold: 30, summaryKeepRecent: 10},
          web: {searchUrl: ''}
        },
        null,
        2
      ) + '\n',
      {flag: flags.force ? 'w' : 'wx'}
    )

    await writeFile(
      globalEnvExamplePath,
      'OPENAI_API_KEY=\nOPENAI_MODEL=gpt-4o-mini\nOPENAI_BASE_URL=\nTERMPILOT_SEARCH_URL=\nTERMPILOT_LOG_LEVEL=info\n',
      {flag: flags.force ? 'w' : 'wx'}
    )

    this.log(`Created ${configPath}`)
    this.log(`Created ${globalEnvExamplePath}`)
  }
}

import {Command, Flags} from '@oclif/core'
import {existsSync} from 'node:fs'
import process from 'node:process'
import {loadConfig} from '../config/load-config.js'
import {getGlobalEnvPath, getTermpilotHome} from '../config/paths.js'

type DoctorReport = {
  cliVersion: string
  nodeVersion: string
  platform: string
  cwd: string
  termpilotHome: string
  globalEnvPath: string
  globalEnvExists: boolean
  localEnvPath: string
  localEnvExists: boolean
  env: {
    apiKeyEnv: string
    hasApiKey: boolean
    hasModel: boolean
    hasBaseURL: boolean
    hasSearchUrl: boolean
  }
  config: unknown
}

export default class Doctor extends Command {
  static override description = 'Print runtime diagnostics for config and environment'

  static override flags = {
    json: Flags.boolean({description: 'print JSON output'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Doctor)
    const config = await loadConfig()

    const localEnvPath = `${process.cwd()}/.env`
    const report: DoctorReport = {
      cliVersion: this.config.pjson.version,
      nodeVersion: process.version,
      platform: `${process.platform}-${process.arch}`,
      cwd: process.cwd(),
      termpilotHome: getTermpilotHome(),
      globalEnvPath: getGlobalEnvPath(),
      globalEnvExists: existsSync(getGlobalEnvPath()),
      localEnvPath,
      localEnvExists: existsSync(localEnvPath),
      env: {
        apiKeyEnv: config.apiKeyEnv,
        hasApiKey: Boolean(process.env[config.apiKeyEnv]),
        hasModel: Boolean(config.model),
        hasBaseURL: Boolean(config.baseURL),
        hasSearchUrl: Boolean(config.web.searchUrl)
      },
      config
    }

    if (flags.json) {
      this.log(JSON.stringify(report, null, 2))
      return
    }

    this.log(`termpilot version: ${report.cliVersion}`)
    this.log(`node: ${report.nodeVersion}`)
    this.log(`platform: ${report.platform}`)
    this.log(`cwd: ${report.cwd}`)
    this.log(`termpilot home: ${report.termpilotHome}`)
    this.log(`global env: ${report.globalEnvPath} (exists=${report.globalEnvExists})`)
    this.log(`local env: ${report.localEnvPath} (exists=${report.localEnvExists})`)
    this.log(
      `env flags: ${report.env.apiKeyEnv}=${report.env.hasApiKey} model=${report.env.hasModel} baseURL=${report.env.hasBaseURL} searchUrl=${report.env.hasSearchUrl}`
    )
    this.log('resolved config:')
    this.log(JSON.stringify(report.config, null, 2))
  }
}

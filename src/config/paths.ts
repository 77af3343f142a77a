import {homedir} from 'node:os'
import {resolve} from 'node:path'

export function getTermpilotHome(): string {
  const custom = process.env.TERMPILOT_HOME?.trim()
  if (custom) return resolve(custom)
  return resolve(homedir(), '.termpilot')
}

export function getGlobalEnvPath(): string {
  return resolve(getTermpilotHome(), '.env')
}

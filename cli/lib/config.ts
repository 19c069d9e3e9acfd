import * as os from 'os'
import * as path from 'path'
import { CLI_NAME, ENV_VARS } from '../../shared/cli-contract'
import { DEFAULT_HISTORY_LIMIT } from '../../src/lib/selector'
import { DEFAULT_HISTORY_DISPLAY_COUNT } from '../../src/lib/reporting'

export const DEFAULT_DATA_DIR = '.affirmations'
export const DEFAULT_DATA_FILE = 'affirmation_data.json'

export interface CliConfig {
  dataFile: string
  historyLimit: number
  historyDisplayCount: number
}

export interface ConfigSources {
  env: NodeJS.ProcessEnv
  homeDir?: string
  cwd?: string
  // --file from the command line; wins over the environment
  file?: string
}

function resolvePositiveInt(name: string, rawValue: string | undefined, fallback: number): number {
  if (rawValue === undefined || rawValue.trim() === '') return fallback

  const parsed = Number(rawValue.trim())
  if (!Number.isInteger(parsed) || parsed < 1) {
    console.warn(`[${CLI_NAME}] Invalid ${name} "${rawValue}". Falling back to ${fallback}.`)
    return fallback
  }

  return parsed
}

export function resolveConfig({ env, homeDir = os.homedir(), cwd = process.cwd(), file }: ConfigSources): CliConfig {
  const configuredFile = file ?? env[ENV_VARS.dataFile]
  const dataFile = configuredFile && configuredFile.trim()
    ? path.resolve(cwd, configuredFile.trim())
    : path.join(homeDir, DEFAULT_DATA_DIR, DEFAULT_DATA_FILE)

  return {
    dataFile,
    historyLimit: resolvePositiveInt(ENV_VARS.historyLimit, env[ENV_VARS.historyLimit], DEFAULT_HISTORY_LIMIT),
    historyDisplayCount: resolvePositiveInt(
      ENV_VARS.historyShow,
      env[ENV_VARS.historyShow],
      DEFAULT_HISTORY_DISPLAY_COUNT
    ),
  }
}

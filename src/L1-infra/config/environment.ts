import { join } from '../paths/paths.js'
import { fileExistsSync } from '../fileSystem/fileSystem.js'
import { loadEnvFile } from '../env/env.js'

// Load .env file from the working directory
const envPath = join(process.cwd(), '.env')
if (fileExistsSync(envPath)) {
  loadEnvFile(envPath)
}

export interface AppEnvironment {
  FFMPEG_PATH: string
  OUTPUT_PATH: string
  OVERWRITE: boolean
  VERBOSE: boolean
}

export interface CLIOptions {
  ffmpegPath?: string
  output?: string
  overwrite?: boolean
  verbose?: boolean
}

let config: AppEnvironment | null = null

/** Parse a boolean env var; unset or empty falls back to `defaultValue`. */
function envFlag(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase()
  if (!raw) return defaultValue
  return raw === '1' || raw === 'true' || raw === 'yes'
}

/** Merge CLI options → env vars → defaults. Call before getConfig(). */
export function initConfig(cli: CLIOptions = {}): AppEnvironment {
  config = {
    FFMPEG_PATH: cli.ffmpegPath || process.env.FFMPEG_PATH || 'ffmpeg',
    OUTPUT_PATH: cli.output || process.env.OUTPUT_PATH || 'output.mp4',
    OVERWRITE: cli.overwrite ?? envFlag('OVERWRITE', true),
    VERBOSE: cli.verbose ?? envFlag('VERBOSE', false),
  }

  return config
}

export function getConfig(): AppEnvironment {
  if (config) {
    return config
  }

  // Fallback: init with no CLI options (pure env-var mode)
  return initConfig()
}

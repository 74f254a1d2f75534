import { execFileRaw, spawnCommand } from '../../L1-infra/process/process.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { getConfig } from '../../L1-infra/config/environment.js'

/** Get the resolved path to the FFmpeg binary. */
export function getFFmpegPath(): string {
  const config = getConfig()
  if (config.FFMPEG_PATH && config.FFMPEG_PATH !== 'ffmpeg') {
    logger.debug(`FFmpeg: using FFMPEG_PATH config: ${config.FFMPEG_PATH}`)
    return config.FFMPEG_PATH
  }
  logger.debug('FFmpeg: using system PATH')
  return 'ffmpeg'
}

/** Pull the first `N.N[.N]` version out of `ffmpeg -version` output. */
export function parseVersionFromOutput(output: string): string | undefined {
  const match = output.match(/(\d+\.\d+(?:\.\d+)?)/)
  return match ? match[1] : undefined
}

/** Installed FFmpeg version, or `undefined` when the binary cannot be run. */
export function getFFmpegVersion(binPath: string = getFFmpegPath()): string | undefined {
  const result = spawnCommand(binPath, ['-version'], { timeout: 10_000 })
  if (result.error || result.status !== 0 || !result.stdout) {
    logger.debug(`FFmpeg: '${binPath} -version' failed (status ${result.status})`)
    return undefined
  }
  return parseVersionFromOutput(result.stdout)
}

/**
 * Run FFmpeg with the given arguments.
 * Rejects with the process error; stderr is logged because FFmpeg reports
 * filter-graph problems there.
 */
export function runFFmpeg(args: string[]): Promise<void> {
  const ffmpegPath = getFFmpegPath()
  logger.debug(`[FFmpeg] ${ffmpegPath} ${args.join(' ')}`)

  return new Promise((resolve, reject) => {
    execFileRaw(ffmpegPath, args, { maxBuffer: 50 * 1024 * 1024 }, (error, _stdout, stderr) => {
      if (error) {
        logger.error(`[FFmpeg] failed: ${stderr}`)
        reject(error)
        return
      }
      resolve()
    })
  })
}

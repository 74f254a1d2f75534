import { describe, it, expect, vi, beforeEach } from 'vitest'

const { mockExecFile, mockSpawn, mockGetConfig } = vi.hoisted(() => ({
  mockExecFile: vi.fn(),
  mockSpawn: vi.fn(),
  mockGetConfig: vi.fn(),
}))

vi.mock('../../../L1-infra/process/process.js', () => ({
  execFileRaw: mockExecFile,
  spawnCommand: mockSpawn,
}))

vi.mock('../../../L1-infra/config/environment.js', () => ({
  getConfig: mockGetConfig,
}))

import {
  getFFmpegPath,
  getFFmpegVersion,
  parseVersionFromOutput,
  runFFmpeg,
} from '../../../L2-clients/ffmpeg/ffmpeg.js'
import logger from '../../../L1-infra/logger/configLogger.js'

beforeEach(() => {
  vi.clearAllMocks()
  mockGetConfig.mockReturnValue({ FFMPEG_PATH: 'ffmpeg' })
})

describe('getFFmpegPath', () => {
  it('uses the system PATH by default', () => {
    expect(getFFmpegPath()).toBe('ffmpeg')
  })

  it('prefers a configured binary', () => {
    mockGetConfig.mockReturnValue({ FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg' })
    expect(getFFmpegPath()).toBe('/opt/ffmpeg/bin/ffmpeg')
  })
})

describe('parseVersionFromOutput', () => {
  it('extracts a three-part version', () => {
    expect(parseVersionFromOutput('ffmpeg version 6.1.1 Copyright (c) 2000-2023')).toBe('6.1.1')
  })

  it('extracts a two-part version', () => {
    expect(parseVersionFromOutput('ffmpeg version 7.0-static')).toBe('7.0')
  })

  it('returns undefined when no version is present', () => {
    expect(parseVersionFromOutput('ffmpeg version git-master')).toBeUndefined()
  })
})

describe('getFFmpegVersion', () => {
  it('returns the parsed version on success', () => {
    mockSpawn.mockReturnValue({ status: 0, stdout: 'ffmpeg version 6.1.1 Copyright', stderr: '' })

    expect(getFFmpegVersion()).toBe('6.1.1')
    expect(mockSpawn).toHaveBeenCalledWith('ffmpeg', ['-version'], { timeout: 10_000 })
  })

  it('runs the binary it is given', () => {
    mockSpawn.mockReturnValue({ status: 0, stdout: 'ffmpeg version 5.1.4', stderr: '' })

    getFFmpegVersion('/usr/local/bin/ffmpeg')

    expect(mockSpawn).toHaveBeenCalledWith('/usr/local/bin/ffmpeg', ['-version'], { timeout: 10_000 })
  })

  it('returns undefined for a non-zero exit', () => {
    mockSpawn.mockReturnValue({ status: 1, stdout: 'ffmpeg version 6.1.1', stderr: '' })
    expect(getFFmpegVersion()).toBeUndefined()
  })

  it('returns undefined when the binary cannot be spawned', () => {
    mockSpawn.mockReturnValue({ status: null, stdout: '', stderr: '', error: new Error('spawn ffmpeg ENOENT') })
    expect(getFFmpegVersion()).toBeUndefined()
  })
})

describe('runFFmpeg', () => {
  const args = ['-i', 'a.mp4', '-i', 'b.mp4', '-filter_complex', '[0][1]hstack=inputs=2[s0]', '-map', '[s0]', 'out.mp4']

  it('resolves when FFmpeg exits cleanly', async () => {
    mockExecFile.mockImplementation((_cmd, _args, _opts, cb) => cb(null, '', ''))

    await expect(runFFmpeg(args)).resolves.toBeUndefined()
    expect(mockExecFile).toHaveBeenCalledWith('ffmpeg', args, { maxBuffer: 52428800 }, expect.any(Function))
  })

  it('rejects with the process error and logs stderr', async () => {
    const failure = new Error('Command failed: ffmpeg')
    mockExecFile.mockImplementation((_cmd, _args, _opts, cb) => cb(failure, '', 'Invalid stream specifier: s9'))

    await expect(runFFmpeg(args)).rejects.toBe(failure)
    expect(logger.error).toHaveBeenCalledWith('[FFmpeg] failed: Invalid stream specifier: s9')
  })
})

import { getFFmpegPath, getFFmpegVersion } from '../../L2-clients/ffmpeg/ffmpeg.js'
import { getConfig } from '../../L1-infra/config/environment.js'

export interface CheckResult {
  label: string
  ok: boolean
  required: boolean
  message: string
}

function getFFmpegInstallHint(): string {
  const platform = process.platform
  const lines = ['Install FFmpeg:']
  if (platform === 'win32') {
    lines.push('  winget install Gyan.FFmpeg')
    lines.push('  choco install ffmpeg        (alternative)')
  } else if (platform === 'darwin') {
    lines.push('  brew install ffmpeg')
  } else {
    lines.push('  sudo apt install ffmpeg     (Debian/Ubuntu)')
    lines.push('  sudo dnf install ffmpeg     (Fedora)')
    lines.push('  sudo pacman -S ffmpeg       (Arch)')
  }
  lines.push('  Or set FFMPEG_PATH to a custom binary location')
  return lines.join('\n          ')
}

export function checkNode(version: string = process.version): CheckResult {
  const major = parseInt(version.slice(1), 10)
  const ok = major >= 20
  return {
    label: 'Node.js',
    ok,
    required: true,
    message: ok
      ? `Node.js ${version} (required: ≥20)`
      : `Node.js ${version} — version ≥20 required`,
  }
}

export function checkFFmpeg(): CheckResult {
  const binPath = getFFmpegPath()
  const source = getConfig().FFMPEG_PATH !== 'ffmpeg' ? 'FFMPEG_PATH config' : 'system PATH'
  const version = getFFmpegVersion(binPath)
  if (version) {
    return { label: 'FFmpeg', ok: true, required: true, message: `FFmpeg ${version} (source: ${source})` }
  }
  return {
    label: 'FFmpeg',
    ok: false,
    required: true,
    message: `FFmpeg not found — ${getFFmpegInstallHint()}`,
  }
}

/** Print prerequisite checks. Returns `true` when every required check passed. */
export function runDoctor(): boolean {
  console.log('\nframestack doctor\n')

  const results: CheckResult[] = [checkNode(), checkFFmpeg()]

  for (const r of results) {
    const icon = r.ok ? '✅' : r.required ? '❌' : '⬚'
    console.log(`  ${icon} ${r.message}`)
  }

  const failedRequired = results.filter((r) => r.required && !r.ok)
  console.log()
  if (failedRequired.length === 0) {
    console.log('  All required checks passed! ✅\n')
    return true
  }
  console.log(`  ${failedRequired.length} required check${failedRequired.length > 1 ? 's' : ''} failed ❌\n`)
  return false
}

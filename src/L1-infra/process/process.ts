import { execFile as nodeExecFile, spawnSync as nodeSpawnSync } from 'child_process'
import type { ExecFileOptions, SpawnSyncOptions, SpawnSyncReturns } from 'child_process'

/**
 * Execute a command with a callback (for cases where consumers need the raw callback pattern).
 * Output is always decoded as UTF-8.
 */
export function execFileRaw(
  cmd: string,
  args: string[],
  opts: ExecFileOptions,
  callback: (error: Error | null, stdout: string, stderr: string) => void,
): void {
  nodeExecFile(cmd, args, { ...opts, encoding: 'utf-8' }, (error, stdout, stderr) => {
    callback(error, stdout, stderr)
  })
}

/**
 * Spawn a command synchronously. Returns full result including status.
 */
export function spawnCommand(
  cmd: string,
  args: string[],
  opts?: Omit<SpawnSyncOptions, 'encoding'>,
): SpawnSyncReturns<string> {
  return nodeSpawnSync(cmd, args, { ...opts, encoding: 'utf-8' })
}

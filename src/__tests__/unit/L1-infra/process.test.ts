import { describe, it, expect } from 'vitest'
import { execFileRaw, spawnCommand } from '../../../L1-infra/process/process.js'

const node = process.execPath

describe('execFileRaw', () => {
  it('invokes callback with decoded stdout on success', async () => {
    const result = await new Promise<{ error: Error | null; stdout: string }>((resolve) => {
      execFileRaw(node, ['-e', 'process.stdout.write("ok")'], {}, (error, stdout) => {
        resolve({ error, stdout })
      })
    })

    expect(result.error).toBeNull()
    expect(result.stdout).toBe('ok')
  })

  it('passes stderr and an error on failure', async () => {
    const result = await new Promise<{ error: Error | null; stderr: string }>((resolve) => {
      execFileRaw(node, ['-e', 'process.stderr.write("bad filter"); process.exit(1)'], {}, (error, _stdout, stderr) => {
        resolve({ error, stderr })
      })
    })

    expect(result.error).toBeInstanceOf(Error)
    expect(result.stderr).toBe('bad filter')
  })
})

describe('spawnCommand', () => {
  it('returns status and string stdout', () => {
    const result = spawnCommand(node, ['-e', 'console.log("v1")'])

    expect(result.status).toBe(0)
    expect(result.stdout.trim()).toBe('v1')
  })

  it('reports a spawn error for a missing binary', () => {
    const result = spawnCommand('framestack-no-such-binary', ['-version'])

    expect(result.error).toBeInstanceOf(Error)
  })
})

import { promises as fsp, existsSync, readFileSync } from 'fs'

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

// ── Reads ──────────────────────────────────────────────────────

/**
 * Read and parse a JSON file. Throws descriptive error on ENOENT or parse failure.
 * The parsed value is returned as `unknown`; callers validate its shape.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string
  try {
    raw = await fsp.readFile(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
  try {
    return JSON.parse(raw)
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new Error(`Failed to parse JSON at ${filePath}: ${reason}`)
  }
}

/** Read a text file synchronously. Throws "File not found: <path>" on ENOENT. */
export function readTextFileSync(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Check if file/dir exists (sync). */
export function fileExistsSync(filePath: string): boolean {
  return existsSync(filePath)
}

// ── Writes ─────────────────────────────────────────────────────

/** Create a directory (and parents) if it does not exist yet. */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsp.mkdir(dirPath, { recursive: true })
}

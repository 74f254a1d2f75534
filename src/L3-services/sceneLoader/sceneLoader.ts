import { readJsonFile, fileExistsSync } from '../../L1-infra/fileSystem/fileSystem.js'
import { extname, resolve, scenesDir } from '../../L1-infra/paths/paths.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import { ORIGIN } from '../../L0-pure/composition/types.js'
import type { CompositionNode, CompositionNodeType, Position, StackType } from '../../L0-pure/composition/types.js'

/**
 * Scene files are JSON documents mirroring the composition tree:
 *
 * ```json
 * { "type": "zstack", "children": [
 *   { "type": "resource", "path": "main.mp4" },
 *   { "type": "resource", "path": "logo.png", "offset": { "x": 100, "y": 800 } }
 * ] }
 * ```
 *
 * The document may also wrap the tree as `{ "root": { ... } }`.
 */

const STACK_TYPES: StackType[] = ['hstack', 'vstack', 'zstack']
const NODE_TYPES: CompositionNodeType[] = ['resource', ...STACK_TYPES]

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStackType(value: unknown): value is StackType {
  return STACK_TYPES.some((type) => type === value)
}

function validateOffset(raw: unknown, context: string): Position {
  if (raw === undefined) return ORIGIN
  if (!isRecord(raw)) {
    throw new Error(`${context}.offset must be an object with "x" and "y"`)
  }
  const { x, y } = raw
  if (typeof x !== 'number' || !Number.isFinite(x)) {
    throw new Error(`${context}.offset.x must be a finite number`)
  }
  if (typeof y !== 'number' || !Number.isFinite(y)) {
    throw new Error(`${context}.offset.y must be a finite number`)
  }
  return Object.freeze({ x, y })
}

function validateNode(raw: unknown, context: string): CompositionNode {
  if (!isRecord(raw)) {
    throw new Error(`${context} must be an object`)
  }

  const offset = validateOffset(raw.offset, context)
  const { type, path, children } = raw

  if (type === 'resource') {
    if (typeof path !== 'string' || path.trim() === '') {
      throw new Error(`${context}.path must be a non-empty string`)
    }
    const node: CompositionNode = { type, path, offset }
    return Object.freeze(node)
  }

  if (isStackType(type)) {
    if (!Array.isArray(children)) {
      throw new Error(`${context}.children must be an array`)
    }
    const validated = children.map((child: unknown, i: number) =>
      validateNode(child, `${context}.children[${i}]`),
    )
    const node: CompositionNode = { type, children: Object.freeze(validated), offset }
    return Object.freeze(node)
  }

  throw new Error(`${context}.type "${String(type)}" is invalid. Valid: ${NODE_TYPES.join(', ')}`)
}

/**
 * Validate a parsed scene document into a composition tree.
 * Empty stacks are accepted here; the compiler reports them.
 */
export function parseScene(document: unknown): CompositionNode {
  if (isRecord(document) && 'root' in document) {
    return validateNode(document.root, 'scene.root')
  }
  return validateNode(document, 'scene')
}

/**
 * Resolve a scene argument to a file path. Existing paths win; otherwise a
 * bare name is looked up among the bundled scenes (`split-screen` →
 * `scenes/split-screen.json`).
 */
export function resolveScenePath(scene: string): string {
  const direct = resolve(scene)
  if (fileExistsSync(direct)) return direct

  const fileName = extname(scene) === '.json' ? scene : `${scene}.json`
  const bundled = scenesDir(fileName)
  if (fileExistsSync(bundled)) return bundled

  throw new Error(`Scene not found: ${scene}`)
}

/** Read, parse and validate a scene file. */
export async function loadScene(scene: string): Promise<CompositionNode> {
  const scenePath = resolveScenePath(scene)
  logger.info(`[SceneLoader] Loading ${sanitizeForLog(scenePath)}`)
  const document = await readJsonFile(scenePath)
  return parseScene(document)
}

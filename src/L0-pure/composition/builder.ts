/**
 * Declarative composition builder.
 *
 * Stack helpers take any mix of nodes, reusable `Video` scenes, arrays and
 * `false | null | undefined`, and flatten them into an ordered child list.
 * That covers conditionals (`showLogo && resource(...)`), optionals and
 * loops (`clips.map(...)`) without the compiler ever seeing anything but a
 * plain tree.
 *
 * @example
 * ```typescript
 * const scene = zstack(
 *   resource('main.mp4'),
 *   showLogo && resource('logo.png', at(100, 800)),
 * )
 * ```
 */

import { CompositionError, EmptyTreeError } from './errors.js'
import { ORIGIN } from './types.js'
import type {
  CompositionNode,
  HStackNode,
  Position,
  ResourceNode,
  StackType,
  VStackNode,
  ZStackNode,
} from './types.js'

/** A reusable scene whose body is spliced in wherever it is composed. */
export interface Video {
  body(): Composable
}

export type Composable =
  | CompositionNode
  | Video
  | readonly Composable[]
  | false
  | null
  | undefined

function isComposableList(value: Composable): value is readonly Composable[] {
  return Array.isArray(value)
}

function isVideo(value: Composable): value is Video {
  return typeof value === 'object' && value !== null && !isComposableList(value) && 'body' in value
}

/** Flatten composables into an ordered list of nodes, dropping skipped entries. */
export function flatten(...items: Composable[]): CompositionNode[] {
  const nodes: CompositionNode[] = []
  const collect = (item: Composable): void => {
    if (item === false || item === null || item === undefined) return
    if (isComposableList(item)) {
      for (const child of item) collect(child)
      return
    }
    if (isVideo(item)) {
      collect(item.body())
      return
    }
    nodes.push(item)
  }
  for (const item of items) collect(item)
  return nodes
}

/** Shorthand for a `Position`. */
export function at(x: number, y: number): Position {
  return Object.freeze({ x, y })
}

export function resource(path: string, offset: Position = ORIGIN): ResourceNode {
  return Object.freeze({ type: 'resource', path, offset })
}

function stack<T extends StackType>(type: T, children: Composable[]) {
  return Object.freeze({
    type,
    children: Object.freeze(flatten(...children)),
    offset: ORIGIN,
  })
}

export function hstack(...children: Composable[]): HStackNode {
  return stack('hstack', children)
}

export function vstack(...children: Composable[]): VStackNode {
  return stack('vstack', children)
}

export function zstack(...children: Composable[]): ZStackNode {
  return stack('zstack', children)
}

/** Copy of `node` placed at `offset` (only meaningful inside a `zstack`). */
export function place<T extends CompositionNode>(node: T, offset: Position): T {
  const placed: T = { ...node, offset }
  Object.freeze(placed)
  return placed
}

/**
 * Resolve a composable to the single root node of a composition.
 *
 * @throws EmptyTreeError when nothing is left after flattening
 * @throws CompositionError (`MULTIPLE_ROOTS`) when more than one node is left
 */
export function rootOf(body: Composable): CompositionNode {
  const nodes = flatten(body)
  const [root] = nodes
  if (!root) {
    throw new EmptyTreeError()
  }
  if (nodes.length > 1) {
    throw new CompositionError(
      'MULTIPLE_ROOTS',
      `Composition body has ${nodes.length} top-level nodes; wrap them in a stack`,
    )
  }
  return root
}

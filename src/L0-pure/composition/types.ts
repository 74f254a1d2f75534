/**
 * Composition tree type definitions for framestack.
 *
 * A composition is a strict tree of nodes. Leaves reference media files;
 * stack nodes arrange their children side by side (`hstack`), top to bottom
 * (`vstack`) or on top of each other (`zstack`). The compiler walks this tree
 * once and turns it into an FFmpeg `-filter_complex` program.
 *
 * ### Child order
 * - `hstack` — left to right
 * - `vstack` — top to bottom
 * - `zstack` — first child is the base layer, each later child is overlaid
 *   onto the running composite at its own `offset`
 */

// ============================================================================
// POSITION
// ============================================================================

/** Overlay placement, in pixels from the top-left corner of the composite. */
export interface Position {
  readonly x: number
  readonly y: number
}

export const ORIGIN: Position = Object.freeze({ x: 0, y: 0 })

// ============================================================================
// COMPOSITION NODES
// ============================================================================

export type StackType = 'hstack' | 'vstack' | 'zstack'

export type CompositionNodeType = 'resource' | StackType

interface NodeBase {
  /**
   * Overlay offset. Only read when the node is a non-first child of a
   * `zstack`; ignored everywhere else.
   */
  readonly offset: Position
}

/** Leaf node referencing one media file. */
export interface ResourceNode extends NodeBase {
  readonly type: 'resource'
  readonly path: string
}

export interface HStackNode extends NodeBase {
  readonly type: 'hstack'
  readonly children: readonly CompositionNode[]
}

export interface VStackNode extends NodeBase {
  readonly type: 'vstack'
  readonly children: readonly CompositionNode[]
}

export interface ZStackNode extends NodeBase {
  readonly type: 'zstack'
  readonly children: readonly CompositionNode[]
}

export type StackNode = HStackNode | VStackNode | ZStackNode

export type CompositionNode = ResourceNode | StackNode

// ============================================================================
// STREAM REFERENCES
// ============================================================================

/** Label of a stream produced by a filter expression (`s0`, `s1`, ...). */
export type StageLabel = `s${number}`

/**
 * A stream inside the filter graph: either an input slot index (`0`, `1`)
 * or a stage label.
 */
export type StreamRef = number | StageLabel

// ============================================================================
// COMPILATION RESULT
// ============================================================================

/** Result of compiling a composition tree. */
export interface CompiledGraph {
  /** Input file paths in slot order; one entry per resource leaf occurrence */
  inputs: string[]
  /** Filter expressions in dependency order */
  filters: string[]
  /** Stream holding the finished composition */
  output: StreamRef
  /** Non-fatal problems found while compiling */
  warnings: string[]
}

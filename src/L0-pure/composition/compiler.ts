/**
 * Composition compiler — transforms a composition tree into an FFmpeg
 * filter graph.
 *
 * Walks the tree once, depth-first and left to right. Resource leaves take
 * the next input slot; every stack expression is appended only after all of
 * its children have been emitted, so the filter list is already in the
 * order FFmpeg needs to resolve stream labels.
 */

import { EmptyTreeError } from './errors.js'
import type {
  CompiledGraph,
  CompositionNode,
  ResourceNode,
  HStackNode,
  VStackNode,
  ZStackNode,
  StageLabel,
  StreamRef,
} from './types.js'

// ============================================================================
// COMPILER STATE
// ============================================================================

/**
 * Per-call accumulator. Created fresh for each compile so concurrent or
 * nested compiles never share counters.
 */
class CompilerState {
  readonly inputs: string[] = []
  readonly filters: string[] = []
  readonly warnings: string[] = []

  /** Register one input occurrence and return its slot. */
  addInput(path: string): number {
    const slot = this.inputs.length
    this.inputs.push(path)
    return slot
  }

  /** Append a filter expression that writes to the returned stage label. */
  emit(build: (stage: StageLabel) => string): StageLabel {
    const stage: StageLabel = `s${this.filters.length}`
    this.filters.push(build(stage))
    return stage
  }
}

// ============================================================================
// FORMATTING
// ============================================================================

/** Wrap a stream reference in FFmpeg's pad-label brackets. */
export function streamLabel(ref: StreamRef): string {
  return `[${ref}]`
}

// ============================================================================
// VISITORS
// ============================================================================

function visit(node: CompositionNode, state: CompilerState): StreamRef {
  switch (node.type) {
    case 'resource':
      return visitResource(node, state)
    case 'hstack':
    case 'vstack':
      return visitLinearStack(node, state)
    case 'zstack':
      return visitZStack(node, state)
  }
}

function visitResource(node: ResourceNode, state: CompilerState): StreamRef {
  return state.addInput(node.path)
}

function visitLinearStack(node: HStackNode | VStackNode, state: CompilerState): StreamRef {
  if (node.children.length === 0) {
    throw new EmptyTreeError(node.type)
  }

  const refs = node.children.map((child) => visit(child, state))

  if (refs.length === 1) {
    state.warnings.push(`${node.type} with a single child; FFmpeg expects at least 2 inputs`)
  }

  const inputs = refs.map(streamLabel).join('')
  return state.emit((stage) => `${inputs}${node.type}=inputs=${refs.length}${streamLabel(stage)}`)
}

function visitZStack(node: ZStackNode, state: CompilerState): StreamRef {
  const [base, ...layers] = node.children
  if (!base) {
    throw new EmptyTreeError(node.type)
  }

  let main = visit(base, state)
  for (const layer of layers) {
    const overlay = visit(layer, state)
    const { x, y } = layer.offset
    const below = main
    main = state.emit(
      (stage) => `${streamLabel(below)}${streamLabel(overlay)}overlay=${x}:${y}${streamLabel(stage)}`,
    )
  }
  return main
}

// ============================================================================
// MAIN COMPILER
// ============================================================================

/**
 * Compile a composition tree into its inputs, filter expressions and final
 * output stream.
 *
 * @throws EmptyTreeError when any stack node in the tree has no children
 */
export function compileComposition(root: CompositionNode): CompiledGraph {
  const state = new CompilerState()
  const output = visit(root, state)

  return {
    inputs: state.inputs,
    filters: state.filters,
    output,
    warnings: state.warnings,
  }
}

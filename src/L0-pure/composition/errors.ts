import type { StackType } from './types.js'

export type CompositionErrorCode = 'EMPTY_TREE' | 'MULTIPLE_ROOTS'

/** Base class for errors raised while building or compiling a composition. */
export class CompositionError extends Error {
  readonly code: CompositionErrorCode

  constructor(code: CompositionErrorCode, message: string) {
    super(message)
    this.name = 'CompositionError'
    this.code = code
  }
}

/**
 * A stack node has no children, so it has no stream to hand to its parent.
 * Also raised when a composition body flattens to nothing.
 */
export class EmptyTreeError extends CompositionError {
  /** Stack that was empty, or `undefined` for an empty composition body */
  readonly stackType: StackType | undefined

  constructor(stackType?: StackType) {
    super(
      'EMPTY_TREE',
      stackType
        ? `${stackType} has no children to compose`
        : 'Composition body is empty',
    )
    this.name = 'EmptyTreeError'
    this.stackType = stackType
  }
}

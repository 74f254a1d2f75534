export * from './types.js'
export { CompositionError, EmptyTreeError } from './errors.js'
export type { CompositionErrorCode } from './errors.js'
export { compileComposition, streamLabel } from './compiler.js'
export { assembleArgs, FILTER_SEPARATOR } from './assembler.js'
export { at, flatten, hstack, place, resource, rootOf, vstack, zstack } from './builder.js'
export type { Composable, Video } from './builder.js'
export { formatCommand, quoteArg } from './commandLine.js'

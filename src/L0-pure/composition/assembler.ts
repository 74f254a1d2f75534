import { streamLabel } from './compiler.js'
import type { CompiledGraph, StageLabel } from './types.js'

/** Separator between filter expressions inside one `-filter_complex` value. */
export const FILTER_SEPARATOR = ';'

/**
 * Turn a compiled graph into FFmpeg arguments:
 * `-i <path>...  -filter_complex <graph>  -map [<output>]`.
 *
 * Paths are passed through untouched. When the graph has no filters (the
 * composition is a single resource) a `null` pass-through stage is added so
 * `-map` still points at a named filter output.
 */
export function assembleArgs(graph: Pick<CompiledGraph, 'inputs' | 'filters' | 'output'>): string[] {
  let filters = graph.filters
  let output = graph.output

  if (filters.length === 0) {
    const stage: StageLabel = 's0'
    filters = [`${streamLabel(output)}null${streamLabel(stage)}`]
    output = stage
  }

  const inputArgs = graph.inputs.flatMap((path) => ['-i', path])

  return [
    ...inputArgs,
    '-filter_complex', filters.join(FILTER_SEPARATOR),
    '-map', streamLabel(output),
  ]
}

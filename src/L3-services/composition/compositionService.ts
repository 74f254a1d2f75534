import { compileComposition } from '../../L0-pure/composition/compiler.js'
import { assembleArgs, FILTER_SEPARATOR } from '../../L0-pure/composition/assembler.js'
import { formatCommand } from '../../L0-pure/composition/commandLine.js'
import type { CompiledGraph, CompositionNode } from '../../L0-pure/composition/types.js'
import { getFFmpegPath, runFFmpeg } from '../../L2-clients/ffmpeg/ffmpeg.js'
import { ensureDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import { dirname, resolve } from '../../L1-infra/paths/paths.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'

export interface RenderOptions {
  /** Output file; defaults to OUTPUT_PATH config */
  outputPath?: string
  /** Pass `-y` so FFmpeg replaces an existing output; defaults to OVERWRITE config */
  overwrite?: boolean
}

export interface RenderPlan {
  graph: CompiledGraph
  /** Full FFmpeg argument list, output path last */
  args: string[]
  outputPath: string
}

/**
 * Compile a composition and assemble the complete FFmpeg argument list.
 *
 * @throws EmptyTreeError when the tree contains an empty stack
 */
export function buildRenderArgs(root: CompositionNode, options: RenderOptions = {}): RenderPlan {
  const config = getConfig()
  const outputPath = options.outputPath ?? config.OUTPUT_PATH
  const overwrite = options.overwrite ?? config.OVERWRITE

  const graph = compileComposition(root)
  logger.info(`[Composition] Compiled ${graph.inputs.length} inputs, ${graph.filters.length} filters → [${graph.output}]`)
  logger.debug(`[Composition] ── filter_complex ──\n${graph.filters.join(`${FILTER_SEPARATOR}\n`)}\n── END filter_complex ──`)
  for (const warning of graph.warnings) {
    logger.warn(`[Composition] ${warning}`)
  }

  const args = [
    ...(overwrite ? ['-y'] : []),
    ...assembleArgs(graph),
    outputPath,
  ]

  return { graph, args, outputPath }
}

/** Render the FFmpeg invocation for a composition as a printable command line. */
export function describeRender(root: CompositionNode, options: RenderOptions = {}): string {
  const { args } = buildRenderArgs(root, options)
  return formatCommand(getFFmpegPath(), args)
}

/**
 * Run FFmpeg for a composition. Resolves with the absolute output path.
 */
export async function renderComposition(root: CompositionNode, options: RenderOptions = {}): Promise<string> {
  const { args, outputPath } = buildRenderArgs(root, options)
  const absoluteOutput = resolve(outputPath)
  await ensureDirectory(dirname(absoluteOutput))

  logger.info(`[Composition] Rendering → ${sanitizeForLog(absoluteOutput)}`)
  try {
    await runFFmpeg(args)
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new Error(`Render failed: ${reason}`)
  }
  logger.info(`[Composition] Complete: ${sanitizeForLog(absoluteOutput)}`)
  return absoluteOutput
}

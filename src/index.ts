/**
 * framestack library entry point.
 *
 * The pure compiler and builder live in `L0-pure/composition`; scene files
 * and FFmpeg execution are layered on top in `L3-services`.
 */
export * from './L0-pure/composition/index.js'
export { parseScene, loadScene, resolveScenePath } from './L3-services/sceneLoader/sceneLoader.js'
export { buildRenderArgs, describeRender, renderComposition } from './L3-services/composition/compositionService.js'
export type { RenderOptions, RenderPlan } from './L3-services/composition/compositionService.js'
export { initConfig, getConfig } from './L1-infra/config/environment.js'
export type { AppEnvironment, CLIOptions } from './L1-infra/config/environment.js'

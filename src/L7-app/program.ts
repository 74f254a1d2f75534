import { Command } from '../L1-infra/cli/cli.js'
import { initConfig } from '../L1-infra/config/environment.js'
import { setQuiet, setVerbose } from '../L1-infra/logger/configLogger.js'
import { readTextFileSync } from '../L1-infra/fileSystem/fileSystem.js'
import { join, projectRoot } from '../L1-infra/paths/paths.js'
import { rootOf } from '../L0-pure/composition/builder.js'
import type { CompositionNode } from '../L0-pure/composition/types.js'
import { loadScene } from '../L3-services/sceneLoader/sceneLoader.js'
import { buildRenderArgs, describeRender, renderComposition } from '../L3-services/composition/compositionService.js'
import { runDoctor } from './commands/doctor.js'
import { SideBySideKeynotes } from './scenes/demoScene.js'

interface GlobalOptions {
  verbose?: boolean
  ffmpegPath?: string
}

interface OutputOptions {
  output?: string
  overwrite?: boolean
}

interface CompileOptions extends OutputOptions {
  json?: boolean
}

interface DemoOptions extends CompileOptions {
  logo?: boolean
}

function readVersion(): string {
  const pkg: unknown = JSON.parse(readTextFileSync(join(projectRoot(), 'package.json')))
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version
  }
  return '0.0.0'
}

/**
 * Build the framestack command tree. Kept separate from the entry point so
 * tests can drive it with `parseAsync`.
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('framestack')
    .description('Compile stacked video compositions into FFmpeg filter graphs')
    .version(readVersion(), '-V, --version')
    .option('-v, --verbose', 'Verbose logging')
    .option('--ffmpeg-path <path>', 'FFmpeg binary (default: env FFMPEG_PATH or ffmpeg on PATH)')

  /** Apply global + per-command options to config and logging. */
  const configure = (opts: OutputOptions, quiet: boolean): void => {
    const globals = program.opts<GlobalOptions>()
    initConfig({
      ffmpegPath: globals.ffmpegPath,
      verbose: globals.verbose,
      output: opts.output,
      overwrite: opts.overwrite,
    })
    if (globals.verbose) setVerbose()
    else if (quiet) setQuiet()
  }

  const print = (root: CompositionNode, opts: CompileOptions): void => {
    if (opts.json) {
      console.log(JSON.stringify(buildRenderArgs(root).args))
    } else {
      console.log(describeRender(root))
    }
  }

  program
    .command('compile')
    .description('Print the FFmpeg command for a scene file')
    .argument('<scene>', 'Scene JSON file, or the name of a bundled scene')
    .option('-o, --output <path>', 'Output video path (default: env OUTPUT_PATH or output.mp4)')
    .option('--overwrite', 'Pass -y so FFmpeg replaces an existing output (default)')
    .option('--no-overwrite', 'Let FFmpeg refuse to replace an existing output')
    .option('--json', 'Print the argument list as a JSON array')
    .action(async (scene: string, opts: CompileOptions) => {
      configure(opts, true)
      const root = await loadScene(scene)
      print(root, opts)
    })

  program
    .command('render')
    .description('Compile a scene file and run FFmpeg')
    .argument('<scene>', 'Scene JSON file, or the name of a bundled scene')
    .option('-o, --output <path>', 'Output video path (default: env OUTPUT_PATH or output.mp4)')
    .option('--overwrite', 'Pass -y so FFmpeg replaces an existing output (default)')
    .option('--no-overwrite', 'Let FFmpeg refuse to replace an existing output')
    .action(async (scene: string, opts: OutputOptions) => {
      configure(opts, false)
      const root = await loadScene(scene)
      const outputPath = await renderComposition(root)
      console.log(outputPath)
    })

  program
    .command('demo')
    .description('Print the FFmpeg command for the built-in side-by-side keynote scene')
    .option('--logo', 'Show the logo on both panels')
    .option('-o, --output <path>', 'Output video path (default: env OUTPUT_PATH or output.mp4)')
    .option('--json', 'Print the argument list as a JSON array')
    .action((opts: DemoOptions) => {
      configure(opts, true)
      print(rootOf(new SideBySideKeynotes(opts.logo ?? false)), opts)
    })

  program
    .command('doctor')
    .description('Check Node.js and FFmpeg prerequisites')
    .action(() => {
      configure({}, false)
      if (!runDoctor()) process.exitCode = 1
    })

  return program
}

#!/usr/bin/env node
/**
 * dirpull CLI entry point
 *
 * Downloads one directory of a remote repository without cloning it
 */

import { realpathSync } from 'fs'
import { fileURLToPath } from 'url'
import { Command } from 'commander'
import { configureLogger, createLogger } from '../utils/logger.js'
import { createConfigLoader } from '../core/config/index.js'
import { initCommand } from './commands/init.js'
import { registerGetCommand } from './commands/get.js'

/**
 * Exit codes for the CLI
 * - 0: success, also when some files failed; the summary lists them
 * - 1: error (bad locator, listing failed, or bad arguments)
 * - 130: cancelled (interrupted by SIGINT)
 */
export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1,
  CANCELLED: 130
} as const

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Global CLI options
 */
export interface GlobalOptions {
  verbose?: boolean
  quiet?: boolean
  config?: string
}

const logger = createLogger('cli')

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('dirpull')
    .description('Download a single directory from a remote repository')
    .version('0.1.0')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('-c, --config <path>', 'Path to configuration file')
    .hook('preAction', () => {
      const globalOpts = program.opts<GlobalOptions>()
      configureLogger({
        level: globalOpts.verbose ? 'debug' : 'info',
        quiet: globalOpts.quiet === true,
        timestamps: globalOpts.verbose === true
      })
    })

  registerGetCommand(program)

  program
    .command('init')
    .description('Write the default configuration file')
    .option('-o, --output <file>', 'Output file path (default: the user configuration file)')
    .option('--force', 'Overwrite existing file')
    .action(async (options: { output?: string; force?: boolean }) => {
      const globalOpts = program.opts<GlobalOptions>()

      const result = await initCommand({
        output: options.output,
        force: options.force
      })

      if (result.success) {
        if (!globalOpts.quiet) {
          logger.info(`Created configuration file: ${result.outputPath}`)
        }
        process.exit(ExitCode.SUCCESS)
      } else {
        logger.error(`Failed to create configuration file: ${result.error}`)
        process.exit(ExitCode.ERROR)
      }
    })

  program
    .command('validate <config>')
    .description('Validate a configuration file')
    .action(async (config: string) => {
      const globalOpts = program.opts<GlobalOptions>()
      const loader = createConfigLoader()
      const result = await loader.validate(config)

      if (result.valid) {
        if (!globalOpts.quiet) {
          logger.info(`✓ Configuration file is valid: ${config}`)
        }
        process.exit(ExitCode.SUCCESS)
      } else {
        logger.error(`✗ Configuration file is invalid: ${config}`)
        for (const error of result.errors) {
          logger.error(`  - ${error}`)
        }
        process.exit(ExitCode.ERROR)
      }
    })

  return program
}

/**
 * Run the CLI
 */
export async function run(args: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(args)
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`CLI error: ${message}`)
    process.exit(ExitCode.ERROR)
  }
}

/**
 * Whether this module is the process entry point, also through the bin symlink
 */
function isMainModule(): boolean {
  const entry = process.argv[1]
  if (!entry) {
    return false
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url)
  } catch {
    return false
  }
}

if (isMainModule()) {
  void run()
}

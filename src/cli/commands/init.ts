/**
 * init command - Write the default configuration file
 */

import * as fs from 'fs'
import * as path from 'path'
import { bundledConfigPath, createConfigLoader } from '../../core/config/index.js'

export interface InitOptions {
  /** Target file; the user configuration file when absent */
  output?: string
  force?: boolean
}

export interface InitResult {
  success: boolean
  outputPath?: string
  error?: string
}

/**
 * Execute the init command
 *
 * @param options - Command options
 * @returns Result of the operation
 */
export async function initCommand(options: InitOptions): Promise<InitResult> {
  const outputPath = options.output
    ? path.resolve(process.cwd(), options.output)
    : createConfigLoader().defaultConfigPath()

  try {
    if (fs.existsSync(outputPath) && !options.force) {
      return {
        success: false,
        outputPath,
        error: `File already exists: ${outputPath}. Use --force to overwrite.`
      }
    }

    const template = fs.readFileSync(bundledConfigPath(), 'utf-8')

    fs.mkdirSync(path.dirname(outputPath), { recursive: true })
    fs.writeFileSync(outputPath, template, 'utf-8')

    return {
      success: true,
      outputPath
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    return {
      success: false,
      outputPath,
      error: message
    }
  }
}

import { mkdir, readFile, writeFile } from 'fs/promises'
import { homedir } from 'os'
import { dirname, join, resolve } from 'path'
import { fileURLToPath } from 'url'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { ConfigLoadError } from '../../types/index.js'
import { type Config, validateConfig, validateConfigSafe, formatValidationErrors } from './schema.js'

export const APP_NAME = 'dirpull'
export const CONFIG_FILENAME = 'config.yaml'

const logger = createLogger('config')

export interface LoaderOptions {
  /** Directory relative config paths resolve against */
  basePath?: string

  /** Environment consulted for XDG_CONFIG_HOME and GITHUB_TOKEN */
  env?: NodeJS.ProcessEnv

  /** Home directory `~` expands to */
  homeDir?: string
}

/**
 * Path of the configuration template shipped with the package
 */
export function bundledConfigPath(): string {
  // src/core/config and dist/core/config both sit three levels below the package root
  return fileURLToPath(new URL('../../../config/default.yaml', import.meta.url))
}

/**
 * Read the shipped configuration template
 */
export async function readDefaultTemplate(): Promise<string> {
  return readFile(bundledConfigPath(), 'utf-8')
}

export class ConfigLoader {
  private basePath: string
  private env: NodeJS.ProcessEnv
  private homeDir: string

  constructor(options: LoaderOptions = {}) {
    this.basePath = options.basePath ?? process.cwd()
    this.env = options.env ?? process.env
    this.homeDir = options.homeDir ?? homedir()
  }

  /**
   * `$XDG_CONFIG_HOME/dirpull/config.yaml`, or under `~/.config` when unset
   */
  defaultConfigPath(): string {
    const configHome = this.env.XDG_CONFIG_HOME || join(this.homeDir, '.config')
    return join(configHome, APP_NAME, CONFIG_FILENAME)
  }

  /**
   * Load configuration from file path
   */
  async load(configPath: string): Promise<Config> {
    const absolutePath = resolve(this.basePath, configPath)
    const content = await this.readConfigFile(absolutePath)
    return this.parse(content, absolutePath)
  }

  /**
   * Load the configuration at the default location, writing the shipped
   * template there first if there is none
   */
  async loadOrCreateDefault(): Promise<Config> {
    const configPath = this.defaultConfigPath()
    const existing = await this.readIfPresent(configPath)
    if (existing !== undefined) {
      return this.parse(existing, configPath)
    }

    const template = await readDefaultTemplate()
    try {
      await mkdir(dirname(configPath), { recursive: true })
      await writeFile(configPath, template, 'utf-8')
      logger.debug(`Created default configuration: ${configPath}`)
    } catch (error) {
      // A read-only home still gets the defaults for this run
      logger.warn(`Could not write default configuration to ${configPath}: ${errorCode(error)}`)
    }
    return this.parse(template, configPath)
  }

  /**
   * Load `configPath` when given, otherwise the default location
   */
  async resolve(configPath?: string): Promise<Config> {
    return configPath ? this.load(configPath) : this.loadOrCreateDefault()
  }

  /**
   * Load configuration from string content
   */
  loadFromString(content: string): Config {
    return validateConfig(yaml.load(content))
  }

  /**
   * Validate configuration file without loading
   */
  async validate(configPath: string): Promise<{
    valid: boolean
    errors: string[]
  }> {
    try {
      await this.load(configPath)
      return { valid: true, errors: [] }
    } catch (error) {
      if (error instanceof ConfigLoadError) {
        return { valid: false, errors: error.validationErrors }
      }
      return {
        valid: false,
        errors: [error instanceof Error ? error.message : String(error)]
      }
    }
  }

  /**
   * Expand a leading `~` to the home directory
   */
  expandHome(path: string): string {
    if (path === '~') {
      return this.homeDir
    }
    if (path.startsWith('~/')) {
      return join(this.homeDir, path.slice(2))
    }
    return resolve(this.basePath, path)
  }

  /**
   * Read the token file named by the configuration
   *
   * @returns the trimmed token, or undefined when the file is missing or blank
   */
  async readToken(config: Config): Promise<string | undefined> {
    const tokenPath = this.expandHome(config.tokenPath)
    const content = await this.readIfPresent(tokenPath)
    const token = content?.trim()
    return token ? token : undefined
  }

  /**
   * Pick the access token: explicit value, then GITHUB_TOKEN, then the token file
   */
  async resolveToken(config: Config, explicit?: string): Promise<string | undefined> {
    if (explicit) {
      return explicit
    }
    const fromEnv = this.env.GITHUB_TOKEN?.trim()
    if (fromEnv) {
      return fromEnv
    }
    return this.readToken(config)
  }

  private parse(content: string, absolutePath: string): Config {
    let raw: unknown
    try {
      raw = yaml.load(content)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new ConfigLoadError(`Invalid YAML in config file: ${absolutePath}`, absolutePath, [reason])
    }

    const validation = validateConfigSafe(raw)
    if (!validation.success) {
      const errors = formatValidationErrors(validation.errors)
      throw new ConfigLoadError(
        `Invalid config file: ${absolutePath}\n${errors.join('\n')}`,
        absolutePath,
        errors
      )
    }
    return validation.data
  }

  private async readConfigFile(absolutePath: string): Promise<string> {
    try {
      return await readFile(absolutePath, 'utf-8')
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to read config file: ${absolutePath}`,
        absolutePath,
        [errorCode(error)]
      )
    }
  }

  /**
   * Read a file that may legitimately be absent
   */
  private async readIfPresent(absolutePath: string): Promise<string | undefined> {
    try {
      return await readFile(absolutePath, 'utf-8')
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return undefined
      }
      throw new ConfigLoadError(
        `Failed to read file: ${absolutePath}`,
        absolutePath,
        [errorCode(error)]
      )
    }
  }
}

function errorCode(error: unknown): string {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : 'UNKNOWN'
}

/**
 * Create a default loader instance
 */
export function createConfigLoader(options?: LoaderOptions): ConfigLoader {
  return new ConfigLoader(options)
}

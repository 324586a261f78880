import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { join } from 'path'
import { mkdtempSync, rmSync, existsSync, readFileSync } from 'fs'
import { tmpdir } from 'os'
import { fileURLToPath } from 'url'
import { createProgram, ExitCode } from './index.js'
import { resetLogger } from '../utils/logger.js'

const fixturesPath = fileURLToPath(new URL('../core/config/__fixtures__', import.meta.url))

describe('CLI Framework', () => {
  let mockExit: MockInstance<typeof process.exit>
  let mockConsoleInfo: MockInstance<typeof console.info>
  let mockConsoleError: MockInstance<typeof console.error>

  beforeEach(() => {
    mockExit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called')
    })
    mockConsoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    mockConsoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    mockExit.mockRestore()
    mockConsoleInfo.mockRestore()
    mockConsoleError.mockRestore()
    resetLogger()
  })

  describe('ExitCode', () => {
    it('should have correct exit codes', () => {
      expect(ExitCode.SUCCESS).toBe(0)
      expect(ExitCode.ERROR).toBe(1)
      expect(ExitCode.CANCELLED).toBe(130)
    })
  })

  describe('createProgram', () => {
    it('should create a program with correct name', () => {
      const program = createProgram()

      expect(program.name()).toBe('dirpull')
    })

    it('should have version set', () => {
      const program = createProgram()

      expect(program.version()).toBe('0.1.0')
    })

    it('should have global options', () => {
      const program = createProgram()
      const optionNames = program.options.map((opt) => opt.long)

      expect(optionNames).toContain('--verbose')
      expect(optionNames).toContain('--quiet')
      expect(optionNames).toContain('--config')
    })

    it('should register the get, init and validate commands', () => {
      const program = createProgram()

      expect(program.commands.map((command) => command.name())).toEqual(['get', 'init', 'validate'])
    })

    it('should give get its download options', () => {
      const program = createProgram()
      const get = program.commands.find((command) => command.name() === 'get')
      const optionNames = get?.options.map((opt) => opt.long)

      expect(optionNames).toEqual([
        '--output',
        '--limit',
        '--dry-run',
        '--resume',
        '--token',
        '--exclude',
        '--no-progress'
      ])
    })
  })

  describe('get command', () => {
    it('should reject a limit below one before any work', async () => {
      const program = createProgram()
      const mockStderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)

      try {
        await program.parseAsync(['node', 'dirpull', 'get', 'owner/repo', '-l', '0'])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.ERROR)
      expect(mockStderr).toHaveBeenCalledWith(expect.stringContaining('Must be a positive integer.'))
    })
  })

  describe('validate command', () => {
    it('should exit with SUCCESS (0) for a valid config', async () => {
      const program = createProgram()

      try {
        await program.parseAsync(['node', 'dirpull', 'validate', join(fixturesPath, 'valid-config.yaml')])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.SUCCESS)
      expect(mockConsoleInfo).toHaveBeenCalledWith(expect.stringContaining('Configuration file is valid'))
    })

    it('should exit with ERROR (1) and list the problems for an invalid config', async () => {
      const program = createProgram()

      try {
        await program.parseAsync(['node', 'dirpull', 'validate', join(fixturesPath, 'invalid-config.yaml')])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.ERROR)
      expect(mockConsoleError).toHaveBeenCalledWith(expect.stringContaining('Configuration file is invalid'))
      expect(mockConsoleError).toHaveBeenCalledWith(expect.stringContaining('- retries: Retries must be <= 10'))
    })

    it('should suppress output in quiet mode for a valid config', async () => {
      const program = createProgram()

      try {
        await program.parseAsync(['node', 'dirpull', '-q', 'validate', join(fixturesPath, 'valid-config.yaml')])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.SUCCESS)
      expect(mockConsoleInfo).not.toHaveBeenCalled()
    })
  })

  describe('init command', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'dirpull-init-test-'))
    })

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true })
    })

    it('should exit with SUCCESS (0) when creating a new config file', async () => {
      const program = createProgram()
      const outputPath = join(tempDir, 'config.yaml')

      try {
        await program.parseAsync(['node', 'dirpull', 'init', '-o', outputPath])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.SUCCESS)
      expect(existsSync(outputPath)).toBe(true)
    })

    it('should write the default configuration', async () => {
      const program = createProgram()
      const outputPath = join(tempDir, 'config.yaml')

      try {
        await program.parseAsync(['node', 'dirpull', 'init', '-o', outputPath])
      } catch {
        // process.exit is mocked to throw
      }

      const content = readFileSync(outputPath, 'utf-8')
      expect(content).toContain('concurrency: 5')
      expect(content).toContain('tokenPath: ~/.github/token')
      expect(content).toContain('exclude: []')
    })

    it('should exit with ERROR (1) when file exists without force', async () => {
      const outputPath = join(tempDir, 'config.yaml')

      try {
        await createProgram().parseAsync(['node', 'dirpull', 'init', '-o', outputPath])
      } catch {
        // Expected
      }

      mockExit.mockClear()
      try {
        await createProgram().parseAsync(['node', 'dirpull', 'init', '-o', outputPath])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.ERROR)
      expect(mockConsoleError).toHaveBeenCalledWith(expect.stringContaining('already exists'))
    })

    it('should exit with SUCCESS (0) when file exists with force flag', async () => {
      const outputPath = join(tempDir, 'config.yaml')

      try {
        await createProgram().parseAsync(['node', 'dirpull', 'init', '-o', outputPath])
      } catch {
        // Expected
      }

      mockExit.mockClear()
      try {
        await createProgram().parseAsync(['node', 'dirpull', 'init', '-o', outputPath, '--force'])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.SUCCESS)
    })

    it('should log success message when creating config', async () => {
      const program = createProgram()
      const outputPath = join(tempDir, 'config.yaml')

      try {
        await program.parseAsync(['node', 'dirpull', 'init', '-o', outputPath])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockConsoleInfo).toHaveBeenCalledWith(expect.stringContaining('Created configuration file'))
    })

    it('should suppress output in quiet mode', async () => {
      const program = createProgram()
      const outputPath = join(tempDir, 'quiet.yaml')

      try {
        await program.parseAsync(['node', 'dirpull', '-q', 'init', '-o', outputPath])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.SUCCESS)
      expect(existsSync(outputPath)).toBe(true)
      expect(mockConsoleInfo).not.toHaveBeenCalled()
    })
  })
})

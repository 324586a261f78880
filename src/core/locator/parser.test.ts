import { describe, it, expect } from 'vitest'
import { parseLocator, baseDirAnchor, effectiveRef, formatLocator } from './parser.js'
import { InvalidLocatorError } from '../../types/index.js'

describe('parseLocator', () => {
  describe('explicit ref', () => {
    it('should parse ref and directory after /tree/', () => {
      expect(parseLocator('https://github.com/owner/repo/tree/main/docs')).toEqual({
        owner: 'owner',
        repo: 'repo',
        ref: 'main',
        dir: 'docs'
      })
    })

    it('should keep nested directories', () => {
      const locator = parseLocator('https://github.com/owner/repo/tree/v1.2.0/src/lib/utils')
      expect(locator.ref).toBe('v1.2.0')
      expect(locator.dir).toBe('src/lib/utils')
    })

    it('should give an empty dir when only the ref is present', () => {
      expect(parseLocator('https://github.com/owner/repo/tree/develop')).toEqual({
        owner: 'owner',
        repo: 'repo',
        ref: 'develop',
        dir: ''
      })
    })

    it('should take only the first segment as ref for slash-containing branches', () => {
      const locator = parseLocator('https://github.com/owner/repo/tree/feature/branch/src')
      expect(locator.ref).toBe('feature')
      expect(locator.dir).toBe('branch/src')
    })

    it('should drop trailing and repeated separators', () => {
      const locator = parseLocator('https://github.com/owner/repo/tree/main//docs/guide/')
      expect(locator.dir).toBe('docs/guide')
    })

    it('should reject /tree/ without a ref', () => {
      expect(() => parseLocator('https://github.com/owner/repo/tree')).toThrow(InvalidLocatorError)
    })
  })

  describe('default branch', () => {
    it('should leave ref unset for a bare repository URL', () => {
      const locator = parseLocator('https://github.com/owner/repo')
      expect(locator).toEqual({ owner: 'owner', repo: 'repo', dir: '' })
      expect(locator.ref).toBeUndefined()
    })

    it('should treat everything after owner/repo as the directory', () => {
      expect(parseLocator('https://github.com/owner/repo/path/to/dir')).toEqual({
        owner: 'owner',
        repo: 'repo',
        dir: 'path/to/dir'
      })
    })

    it('should strip a .git suffix from the repository name', () => {
      expect(parseLocator('https://github.com/owner/repo.git').repo).toBe('repo')
    })
  })

  describe('input forms', () => {
    it('should accept owner/repo shorthand', () => {
      expect(parseLocator('owner/repo/tree/main/docs')).toEqual({
        owner: 'owner',
        repo: 'repo',
        ref: 'main',
        dir: 'docs'
      })
    })

    it('should accept a host without a scheme', () => {
      expect(parseLocator('github.com/owner/repo/tree/main/docs').dir).toBe('docs')
    })

    it('should not validate the hostname', () => {
      expect(parseLocator('https://git.example.org:8443/team/tool/tree/main/lib')).toEqual({
        owner: 'team',
        repo: 'tool',
        ref: 'main',
        dir: 'lib'
      })
    })

    it('should ignore query strings and fragments', () => {
      const locator = parseLocator('https://github.com/owner/repo/tree/main/docs?tab=readme#top')
      expect(locator.dir).toBe('docs')
    })

    it('should decode percent-encoded segments', () => {
      expect(parseLocator('https://github.com/owner/repo/tree/main/my%20docs').dir).toBe('my docs')
    })

    it('should split encoded separators into segments', () => {
      const locator = parseLocator('https://github.com/owner/repo/tree/feature%2Fx/src')
      expect(locator.ref).toBe('feature')
      expect(locator.dir).toBe('x/src')
    })
  })

  describe('invalid input', () => {
    it('should reject single-file URLs', () => {
      expect(() => parseLocator('https://github.com/owner/repo/blob/main/README.md'))
        .toThrow(InvalidLocatorError)
    })

    it('should reject the single-file marker right after the repository', () => {
      expect(() => parseLocator('owner/repo/blob/main/docs')).toThrow(InvalidLocatorError)
    })

    it('should accept a directory named blob deeper in the path', () => {
      const locator = parseLocator('https://github.com/owner/repo/tree/main/assets/blob/data')

      expect(locator.ref).toBe('main')
      expect(locator.dir).toBe('assets/blob/data')
    })

    it('should explain the blob rejection in the hint', () => {
      try {
        parseLocator('https://github.com/owner/repo/blob/main/README.md')
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidLocatorError)
        expect((error as InvalidLocatorError).hint).toContain("'/tree/'")
      }
    })

    it('should reject URLs without a repository', () => {
      expect(() => parseLocator('https://github.com/owner')).toThrow(InvalidLocatorError)
    })

    it('should reject empty input', () => {
      expect(() => parseLocator('   ')).toThrow(InvalidLocatorError)
    })

    it('should reject malformed percent-encoding', () => {
      expect(() => parseLocator('owner/repo/tree/main/%E0%A4%A')).toThrow(InvalidLocatorError)
    })
  })
})

describe('baseDirAnchor', () => {
  it('should return the last directory segment', () => {
    expect(baseDirAnchor({ owner: 'o', repo: 'r', dir: 'path/to/nvim' })).toBe('nvim')
  })

  it('should return an empty anchor for the repository root', () => {
    expect(baseDirAnchor({ owner: 'o', repo: 'r', dir: '' })).toBe('')
  })
})

describe('effectiveRef', () => {
  it('should fall back to HEAD when no ref is set', () => {
    expect(effectiveRef({ owner: 'o', repo: 'r', dir: '' })).toBe('HEAD')
    expect(effectiveRef({ owner: 'o', repo: 'r', ref: 'dev', dir: '' })).toBe('dev')
  })
})

describe('formatLocator', () => {
  it('should render owner/repo@ref:dir', () => {
    expect(formatLocator({ owner: 'o', repo: 'r', ref: 'main', dir: 'docs' })).toBe('o/r@main:docs')
    expect(formatLocator({ owner: 'o', repo: 'r', dir: '' })).toBe('o/r')
  })
})

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { fileURLToPath } from 'url'
import { listRepositoryNames, loadConfig, parseConfig, resolveRepository } from './config.ts'
import { ConfigurationError } from '../core/errors.ts'
import { DEFAULT_CONFIG } from './types.ts'

describe('config', () => {
  describe('parseConfig', () => {
    it('applies defaults to an empty file', () => {
      expect(parseConfig('')).toEqual(DEFAULT_CONFIG)
    })

    it('derives model and key variable from the provider', () => {
      const config = parseConfig('provider: anthropic\n')
      expect(config.model).toBe('claude-sonnet-4-5-20250929')
      expect(config.apiKeyEnvVar).toBe('ANTHROPIC_API_KEY')
    })

    it('reads repository entries in object and shorthand form', () => {
      const config = parseConfig(`
repositories:
  widgets:
    owner: acme
    name: widgets
    defaultBranch: develop
  gadgets: https://github.com/acme/gadgets.git
`)
      expect(config.repositories).toEqual({
        widgets: { owner: 'acme', name: 'widgets', defaultBranch: 'develop' },
        gadgets: { owner: 'acme', name: 'gadgets', defaultBranch: 'main' },
      })
      expect(config.invalidRepositories).toEqual({})
    })

    it('records a malformed entry without failing the others', () => {
      const config = parseConfig(`
repositories:
  widgets:
    owner: acme
    name: widgets
  broken:
    owner: acme
  odd: "not a repo"
`)
      expect(Object.keys(config.repositories)).toEqual(['widgets'])
      expect(config.invalidRepositories.broken).toBe('name: Required')
      expect(config.invalidRepositories.odd).toBe('"not a repo" is not a GitHub repository reference')
    })

    it('rejects invalid top-level settings', () => {
      expect(() => parseConfig('commitLimit: 0\n')).toThrow(ConfigurationError)
      expect(() => parseConfig('provider: other\n')).toThrow(/^Invalid config: provider:/)
    })

    it('accepts the example config', () => {
      const path = fileURLToPath(new URL('../../commit-digest.example.yaml', import.meta.url))
      const config = parseConfig(readFileSync(path, 'utf-8'))
      expect(listRepositoryNames(config)).toEqual(['gadgets', 'widgets'])
      expect(config.invalidRepositories).toEqual({})
    })

    it('rejects malformed YAML', () => {
      expect(() => parseConfig('repositories: [unclosed\n')).toThrow(/^Config is not valid YAML/)
    })
  })

  describe('loadConfig', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'commit-digest-config-'))
    })

    afterEach(() => {
      if (existsSync(tempDir)) {
        rmSync(tempDir, { recursive: true, force: true })
      }
    })

    it('writes a starter file when the default config is missing', () => {
      const result = loadConfig({ cwd: tempDir })

      expect(result.status).toBe('created')
      expect(result.configPath).toBe(join(tempDir, 'commit-digest.yaml'))
      expect(parseConfig(readFileSync(result.configPath, 'utf-8')).repositories).toEqual({})
    })

    it('fails when an explicit path does not exist', () => {
      const result = loadConfig({ path: 'missing.yaml', cwd: tempDir })

      expect(result).toEqual({
        status: 'error',
        error: `Config file not found: ${join(tempDir, 'missing.yaml')}`,
        configPath: join(tempDir, 'missing.yaml'),
      })
    })

    it('loads an explicit file', () => {
      const path = join(tempDir, 'team.yaml')
      writeFileSync(path, 'commitLimit: 5\nrepositories:\n  w: acme/widgets\n')

      const result = loadConfig({ path })

      expect(result.status).toBe('loaded')
      if (result.status === 'loaded') {
        expect(result.config.commitLimit).toBe(5)
        expect(result.config.repositories.w).toEqual({ owner: 'acme', name: 'widgets', defaultBranch: 'main' })
      }
    })

    it('reports parse failures as errors', () => {
      writeFileSync(join(tempDir, 'commit-digest.yaml'), 'maxInputChars: -1\n')

      const result = loadConfig({ cwd: tempDir })

      expect(result.status).toBe('error')
    })
  })

  describe('resolveRepository', () => {
    const config = parseConfig('repositories:\n  widgets: acme/widgets\n  broken: {}\n')

    it('returns a configured repository', () => {
      expect(resolveRepository(config, ' widgets ')).toEqual({
        owner: 'acme',
        name: 'widgets',
        defaultBranch: 'main',
      })
    })

    it('explains a misconfigured repository', () => {
      expect(() => resolveRepository(config, 'broken')).toThrow(/^Repository "broken" is misconfigured: /)
    })

    it('rejects an unknown repository', () => {
      expect(() => resolveRepository(config, 'gizmos')).toThrow('Repository "gizmos" is not configured')
    })

    it('does not treat inherited object members as configured', () => {
      for (const name of ['constructor', 'toString', 'hasOwnProperty', '__proto__']) {
        expect(() => resolveRepository(config, name)).toThrow(`Repository "${name}" is not configured`)
      }
    })

    it('lists valid names only', () => {
      expect(listRepositoryNames(config)).toEqual(['widgets'])
    })
  })
})

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { updateCommand } from '../src/commands/update.js'
import { initCommand } from '../src/commands/init.js'
import { validateCommand } from '../src/commands/validate.js'
import { DEFAULT_CONFIG_TEMPLATE } from '../src/config.js'
import { EXIT_CODES } from '../src/errors.js'
import { configYaml } from './helpers/fixtures.js'
import { stubFetch } from './helpers/fetch.js'

describe('commands', () => {
  let dir: string
  let configPath: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'profile-readme-cli-'))
    configPath = join(dir, 'dashboard_config.yaml')
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(dir, { recursive: true, force: true })
  })

  describe('update', () => {
    it('should exit 0 when sources are unavailable', async () => {
      await writeFile(configPath, configYaml({ sections: ['about', 'publications'] }))

      const code = await updateCommand({ config: configPath }, { fetch: stubFetch({}) })

      expect(code).toBe(EXIT_CODES.ok)
      expect(await readFile(join(dir, 'README.md'), 'utf-8')).toContain('_Publication data is currently unavailable._')
    })

    it('should exit 2 on a missing config file', async () => {
      const code = await updateCommand({ config: join(dir, 'missing.yaml') }, { fetch: stubFetch({}) })

      expect(code).toBe(EXIT_CODES.config)
      expect(console.error).toHaveBeenCalledTimes(1)
    })

    it('should exit 3 on malformed markers', async () => {
      await writeFile(configPath, configYaml({ sections: ['about'] }))
      await writeFile(join(dir, 'README.md'), '<!-- dashboard:start:about -->\nno end\n')

      const code = await updateCommand({ config: configPath }, { fetch: stubFetch({}) })

      expect(code).toBe(EXIT_CODES.render)
      expect(await readFile(join(dir, 'README.md'), 'utf-8')).toBe('<!-- dashboard:start:about -->\nno end\n')
    })

    it('should exit 4 when the README cannot be written', async () => {
      await writeFile(configPath, configYaml({ sections: ['about'] }))

      const code = await updateCommand(
        { config: configPath, output: join(dir, 'missing', 'README.md') },
        { fetch: stubFetch({}) }
      )

      expect(code).toBe(EXIT_CODES.fileSystem)
      expect(console.error).toHaveBeenCalledTimes(1)
    })

    it('should stay silent on success when quiet', async () => {
      await writeFile(configPath, configYaml({ sections: ['about'] }))

      await updateCommand({ config: configPath, quiet: true }, { fetch: stubFetch({}) })

      expect(console.log).not.toHaveBeenCalled()
    })
  })

  describe('init', () => {
    it('should write the starter config', async () => {
      const code = await initCommand({ config: configPath })

      expect(code).toBe(EXIT_CODES.ok)
      expect(await readFile(configPath, 'utf-8')).toBe(DEFAULT_CONFIG_TEMPLATE)
    })

    it('should keep an existing file unless forced', async () => {
      await writeFile(configPath, 'mine\n')

      await initCommand({ config: configPath })
      expect(await readFile(configPath, 'utf-8')).toBe('mine\n')

      await initCommand({ config: configPath, force: true })
      expect(await readFile(configPath, 'utf-8')).toBe(DEFAULT_CONFIG_TEMPLATE)
    })
  })

  describe('validate', () => {
    it('should accept a valid config', async () => {
      await writeFile(configPath, configYaml({ sections: ['about', 'github_stats'] }))

      const code = await validateCommand({ config: configPath })

      expect(code).toBe(EXIT_CODES.ok)
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Sources: github'))
    })

    it('should reject an unknown section', async () => {
      await writeFile(configPath, configYaml({ sections: ['about', 'hobbies'] }))

      const code = await validateCommand({ config: configPath })

      expect(code).toBe(EXIT_CODES.config)
    })
  })
})

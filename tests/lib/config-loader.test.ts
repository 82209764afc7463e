/**
 * Tests for config-loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  CONFIG_FILE,
  CONFIG_LOCAL_FILE,
  DEFAULT_CONFIG,
  expandEnvVars,
  findConfigFile,
  configExists,
  loadConfig,
  loadLayerChain,
  mergeConfigLayers,
  requireEnvironment
} from '../../src/lib/config-loader.js'
import {
  CircularExtendsError,
  ConfigNotFoundError,
  InvalidConfigError,
  InvalidEnvironmentError,
  MissingDependencyError
} from '../../src/lib/errors.js'

const MINIMAL = [
  'solutions:',
  '  - name: Core',
  'environments:',
  '  dev:',
  '    url: https://dev.example.test',
  'dependencies:',
  '  Rnwood.Dataverse.Data.PowerShell: 2.1.0',
  ''
].join('\n')

describe('config-loader', () => {
  let tempDir: string
  let originalEnv: NodeJS.ProcessEnv

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dvalm-config-test-'))
    originalEnv = { ...process.env }
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
    process.env = originalEnv
  })

  const write = (name: string, content: string): string => {
    const filePath = path.join(tempDir, name)
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    fs.writeFileSync(filePath, content)
    return filePath
  }

  describe('findConfigFile', () => {
    it('finds the config in the start directory', () => {
      const configPath = write(CONFIG_FILE, MINIMAL)
      expect(findConfigFile(tempDir)).toBe(configPath)
    })

    it('finds the config in a parent directory', () => {
      const configPath = write(CONFIG_FILE, MINIMAL)
      const childDir = path.join(tempDir, 'a', 'b')
      fs.mkdirSync(childDir, { recursive: true })

      expect(findConfigFile(childDir)).toBe(configPath)
      expect(configExists(childDir)).toBe(true)
    })
  })

  describe('mergeConfigLayers', () => {
    it('concatenates arrays, merges maps and overrides scalars', () => {
      const merged = mergeConfigLayers([
        { solutions: [{ name: 'Core' }], variables: { A: '1', B: '2' }, source_dir: 'src' },
        { solutions: [{ name: 'Sales' }], variables: { B: '3' }, source_dir: 'solutions' }
      ])

      expect(merged).toEqual({
        solutions: [{ name: 'Core' }, { name: 'Sales' }],
        variables: { A: '1', B: '3' },
        source_dir: 'solutions'
      })
    })

    it('does not modify its inputs', () => {
      const base = { hooks: { preDeploy: ['a.sh'] } }
      mergeConfigLayers([base, { hooks: { preDeploy: ['b.sh'] } }])
      expect(base).toEqual({ hooks: { preDeploy: ['a.sh'] } })
    })

    it('leaves the defaults untouched', () => {
      mergeConfigLayers([DEFAULT_CONFIG, { solutions: [{ name: 'Core' }] }])
      expect(DEFAULT_CONFIG.solutions).toEqual([])
    })
  })

  describe('expandEnvVars', () => {
    it('expands braces, defaults and bare names', () => {
      const env = { ORG: 'contoso' }
      expect(expandEnvVars('https://${ORG}.example.test', env)).toBe('https://contoso.example.test')
      expect(expandEnvVars('${MISSING:-fallback}', env)).toBe('fallback')
      expect(expandEnvVars('$ORG/x', env)).toBe('contoso/x')
    })
  })

  describe('loadLayerChain', () => {
    it('rejects circular inheritance', () => {
      write('a.yaml', 'extends: ./b.yaml\n')
      write('b.yaml', 'extends: ./a.yaml\n')

      expect(() => loadLayerChain(path.join(tempDir, 'a.yaml'))).toThrow(CircularExtendsError)
    })

    it('returns parents first without the extends key', () => {
      write('base.yaml', 'source_dir: base\n')
      const child = write('child.yaml', 'extends: ./base.yaml\nsource_dir: child\n')

      expect(loadLayerChain(child)).toEqual([{ source_dir: 'base' }, { source_dir: 'child' }])
    })
  })

  describe('loadConfig', () => {
    it('resolves a minimal config with defaults', () => {
      write(CONFIG_FILE, MINIMAL)

      const config = loadConfig(tempDir)

      expect(config.rootDir).toBe(tempDir)
      expect(config.sourceDir).toBe(path.join(tempDir, 'src'))
      expect(config.artifactsDir).toBe(path.join(tempDir, 'out', 'solutions'))
      expect(config.devEnvironment).toBe('dev')
      expect(config.solutions).toEqual([
        { name: 'Core', deployUnmanaged: false, serviceAccountKey: 'ServiceAccountUpn' }
      ])
      expect(config.platform.module).toBe('Rnwood.Dataverse.Data.PowerShell')
      expect(config.git).toEqual({ enabled: true, push: false, remote: 'origin' })
    })

    it('layers extends, the main file and the local file', () => {
      write('shared/base.yaml', [
        'dev_environment: dev0',
        'solutions:',
        '  - name: Core',
        'hooks:',
        '  preDeploy: [a.sh]',
        'variables:',
        '  A: "1"',
        ''
      ].join('\n'))
      write(CONFIG_FILE, [
        'extends: ./shared/base.yaml',
        'dev_environment: dev1',
        'solutions:',
        '  - name: Sales',
        '    deploy_unmanaged: true',
        'hooks:',
        '  preDeploy: [b.sh]',
        'variables:',
        '  B: "2"',
        'dependencies:',
        '  Rnwood.Dataverse.Data.PowerShell: 2.1.0',
        ''
      ].join('\n'))
      write(CONFIG_LOCAL_FILE, 'dev_environment: dev2\nvariables:\n  A: override\n')

      const config = loadConfig(tempDir)

      expect(config.solutions.map(s => s.name)).toEqual(['Core', 'Sales'])
      expect(config.solutions[1].deployUnmanaged).toBe(true)
      expect(config.hooks.preDeploy).toEqual(['a.sh', 'b.sh'])
      expect(config.variables).toEqual({ A: 'override', B: '2' })
      expect(config.devEnvironment).toBe('dev2')
    })

    it('returns a deeply frozen config', () => {
      write(CONFIG_FILE, MINIMAL)

      const config = loadConfig(tempDir)

      expect(Object.isFrozen(config)).toBe(true)
      expect(Object.isFrozen(config.solutions[0])).toBe(true)
      expect(Object.isFrozen(config.hooks.preDeploy)).toBe(true)
    })

    it('expands environment variables in values', () => {
      process.env.DVALM_TEST_ORG = 'contoso'
      write(CONFIG_FILE, MINIMAL.replace('https://dev.example.test', 'https://${DVALM_TEST_ORG}.example.test'))

      expect(loadConfig(tempDir).environments.dev.url).toBe('https://contoso.example.test')
    })

    it('treats an empty dependency as latest', () => {
      write(CONFIG_FILE, MINIMAL + '  Other.Module:\n')

      expect(loadConfig(tempDir).dependencies['Other.Module']).toBe('')
    })

    it('throws ConfigNotFoundError without a config file', () => {
      expect(() => loadConfig(tempDir)).toThrow(ConfigNotFoundError)
    })

    it('names the file when validation fails', () => {
      const configPath = write(CONFIG_FILE, 'solutions: []\ndependencies:\n  Rnwood.Dataverse.Data.PowerShell: 2.1.0\n')

      expect(() => loadConfig(tempDir)).toThrow(
        `Invalid config in ${configPath}: at least one solution must be listed under solutions`
      )
    })

    it('rejects duplicate solutions', () => {
      write(CONFIG_FILE, MINIMAL)
      write(CONFIG_LOCAL_FILE, 'solutions:\n  - name: Core\n')

      expect(() => loadConfig(tempDir)).toThrow('duplicate solution "Core"')
    })

    it('rejects unknown hook phases', () => {
      write(CONFIG_FILE, MINIMAL + 'hooks:\n  afterDeploy: [x.sh]\n')

      expect(() => loadConfig(tempDir)).toThrow(InvalidConfigError)
      expect(() => loadConfig(tempDir)).toThrow('unknown hook phase "afterDeploy"')
    })

    it('rejects malformed YAML', () => {
      write(CONFIG_FILE, 'solutions: [\n')

      expect(() => loadConfig(tempDir)).toThrow(InvalidConfigError)
    })

    it('requires the platform module to be declared', () => {
      write(CONFIG_FILE, 'solutions:\n  - name: Core\n')

      expect(() => loadConfig(tempDir)).toThrow(MissingDependencyError)
    })
  })

  describe('requireEnvironment', () => {
    it('rejects undeclared environments', () => {
      write(CONFIG_FILE, MINIMAL)
      const config = loadConfig(tempDir)

      expect(requireEnvironment(config, 'dev')).toEqual({ url: 'https://dev.example.test' })
      expect(() => requireEnvironment(config, 'prod')).toThrow(InvalidEnvironmentError)
    })
  })
})

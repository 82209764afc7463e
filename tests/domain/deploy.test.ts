import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { computeDeployPlan } from '../../src/domain/deploy-plan.js'
import { executeDeploy } from '../../src/domain/deploy.js'
import type { ArtifactManifest } from '../../src/domain/build.js'
import type { HookRunner } from '../../src/lib/hooks.js'
import { ExternalCallError, IdentityResolutionError } from '../../src/lib/errors.js'
import type { ResolvedAlmConfig } from '../../src/types.js'
import { FakePlatform } from '../helpers/fake-platform.js'
import { makeConfig } from '../helpers/config.js'

// ============================================================================
// Helpers
// ============================================================================

const SERVICE_UPN = 'svc-alm@example.test'
const SERVICE_USER = { id: 'u-svc', upn: SERVICE_UPN }

function writeArtifacts(dir: string, entries: Array<[string, string]>): ArtifactManifest {
  const solutions = entries.map(([name, version]) => {
    const part = version.replace(/\./g, '_')
    const managed = `${name}_${part}_managed.zip`
    const unmanaged = `${name}_${part}.zip`
    fs.writeFileSync(path.join(dir, managed), 'managed')
    fs.writeFileSync(path.join(dir, unmanaged), 'unmanaged')
    return { name, version, managed, unmanaged }
  })
  return { generatedAt: '2026-01-01T00:00:00.000Z', solutions }
}

/** Hook runner that records phases into the platform call log */
function recordingHooks(platform: FakePlatform): HookRunner {
  return {
    async run(phase) {
      platform.calls.push(`hook:${phase}`)
    }
  }
}

async function deploy(
  platform: FakePlatform,
  config: ResolvedAlmConfig,
  artifacts: ArtifactManifest,
  options: { unmanaged?: boolean; env?: NodeJS.ProcessEnv } = {}
) {
  const plan = await computeDeployPlan({
    platform,
    config,
    environment: 'test',
    unmanaged: options.unmanaged ?? false,
    artifacts
  })
  platform.calls.length = 0

  return executeDeploy({
    platform,
    plan,
    config,
    hooks: recordingHooks(platform),
    env: options.env ?? {}
  })
}

// ============================================================================
// executeDeploy
// ============================================================================

describe('executeDeploy', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dvalm-deploy-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('holding upgrade of a three-solution batch', () => {
    function setup() {
      const config = makeConfig(['Core', 'Sales', 'Service'], { artifacts_dir: tempDir })
      const artifacts = writeArtifacts(tempDir, [['Core', '1.3.0.0'], ['Sales', '1.3.0.0'], ['Service', '1.3.0.0']])
      const platform = new FakePlatform({
        installed: { Core: '1.2.0.0', Sales: '1.2.0.0', Service: '1.2.0.0' },
        users: { [SERVICE_UPN]: [SERVICE_USER] },
        processes: {
          Core: [{ id: 'p1', name: 'Core sync', ownerId: 'u-svc', active: true }],
          Sales: [{ id: 'p2', name: 'Quote approval', ownerId: 'u-other', active: false }],
          Service: [{ id: 'p3', name: 'Case routing', ownerId: 'u-svc', active: false }]
        }
      })
      return { config, artifacts, platform }
    }

    it('stages in list order, migrates, then upgrades in reverse order', async () => {
      const { config, artifacts, platform } = setup()

      await deploy(platform, config, artifacts)

      expect(platform.calls).toEqual([
        `find-users:${SERVICE_UPN}`,
        'hook:preDeploy',
        'stage:Core:holding',
        'stage:Sales:holding',
        'stage:Service:holding',
        'hook:migrateData',
        'upgrade:Service',
        'upgrade:Sales',
        'upgrade:Core',
        'list-processes:Core',
        'list-processes:Sales',
        'assign-owner:p2:u-svc',
        'activate-process:p2',
        'list-processes:Service',
        'activate-process:p3',
        'publish:test',
        'hook:postDeploy'
      ])
    })

    it('reports final states, steps and process counts', async () => {
      const { config, artifacts, platform } = setup()

      const result = await deploy(platform, config, artifacts)

      expect(result.environment).toBe('test')
      expect(result.states).toEqual({ Core: 'published', Sales: 'published', Service: 'published' })
      expect(result.processes).toEqual({ reassigned: 1, activated: 2, unchanged: 1 })
      expect(result.steps.map(step => step.kind)).toEqual([
        'stage', 'stage', 'stage', 'migrate', 'upgrade', 'upgrade', 'upgrade',
        'reassign', 'activate', 'activate', 'publish'
      ])
      expect(result.steps[7]).toEqual({ kind: 'reassign', solution: 'Sales', detail: 'Quote approval' })
      expect(platform.installedVersionOf('Core')).toBe('1.3.0.0')
    })

    it('skips every solution when re-run after a complete deploy', async () => {
      const { config, artifacts, platform } = setup()
      await deploy(platform, config, artifacts)

      const rerun = await deploy(platform, config, artifacts)

      expect(platform.calls).toEqual(['hook:preDeploy', 'hook:postDeploy'])
      expect(rerun.states).toEqual({ Core: 'skipped', Sales: 'skipped', Service: 'skipped' })
      expect(rerun.steps).toEqual([])
    })

    it('leaves correctly owned active processes alone on a second import', async () => {
      const { config, artifacts, platform } = setup()
      await deploy(platform, config, artifacts, { unmanaged: true })

      const second = await deploy(platform, config, artifacts, { unmanaged: true })

      expect(second.processes).toEqual({ reassigned: 0, activated: 0, unchanged: 3 })
      expect(platform.calls.filter(call => call.startsWith('assign-owner') || call.startsWith('activate-process'))).toEqual([])
    })
  })

  it('stops at the first failing stage and does not attempt later solutions', async () => {
    const config = makeConfig(['Core', 'Sales', 'Service'], { artifacts_dir: tempDir })
    const artifacts = writeArtifacts(tempDir, [['Core', '1.0.0.0'], ['Sales', '1.0.0.0'], ['Service', '1.0.0.0']])
    const platform = new FakePlatform({
      users: { [SERVICE_UPN]: [SERVICE_USER] },
      failOn: { stage: 'Sales' }
    })

    const error = await deploy(platform, config, artifacts).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ExternalCallError)
    expect(error).toMatchObject({
      step: 'stage',
      solution: 'Sales',
      message: 'stage failed for solution "Sales" in "test": stage rejected for Sales'
    })
    expect(error).toHaveProperty('context.states', { Core: 'staged', Sales: 'not-staged', Service: 'not-staged' })
    expect(platform.calls).toEqual([
      `find-users:${SERVICE_UPN}`,
      'hook:preDeploy',
      'stage:Core:managed',
      'stage:Sales:managed'
    ])
  })

  it('stops before publishing when an upgrade fails', async () => {
    const config = makeConfig(['Core', 'Sales'], { artifacts_dir: tempDir })
    const artifacts = writeArtifacts(tempDir, [['Core', '2.0.0.0'], ['Sales', '2.0.0.0']])
    const platform = new FakePlatform({
      installed: { Core: '1.0.0.0', Sales: '1.0.0.0' },
      users: { [SERVICE_UPN]: [SERVICE_USER] },
      failOn: { upgrade: 'Sales' }
    })

    await expect(deploy(platform, config, artifacts)).rejects.toThrow(
      'upgrade failed for solution "Sales" in "test": upgrade rejected for Sales'
    )
    expect(platform.calls).not.toContain('upgrade:Core')
    expect(platform.calls).not.toContain('publish:test')
  })

  it('upgrades a single solution directly without a migration step', async () => {
    const config = makeConfig(['Core'], { artifacts_dir: tempDir })
    const artifacts = writeArtifacts(tempDir, [['Core', '1.3.0.0']])
    const platform = new FakePlatform({
      installed: { Core: '1.2.0.0' },
      users: { [SERVICE_UPN]: [SERVICE_USER] }
    })

    const result = await deploy(platform, config, artifacts)

    expect(platform.calls).toEqual([
      `find-users:${SERVICE_UPN}`,
      'hook:preDeploy',
      'stage:Core:direct',
      'list-processes:Core',
      'publish:test',
      'hook:postDeploy'
    ])
    expect(result.states).toEqual({ Core: 'published' })
  })

  describe('service identity', () => {
    it('aborts before any import when the variable is unset', async () => {
      const config = makeConfig([{ name: 'Core', service_account_key: 'CoreOwnerUpn' }], { artifacts_dir: tempDir })
      const artifacts = writeArtifacts(tempDir, [['Core', '1.0.0.0']])
      const platform = new FakePlatform()

      const error = await deploy(platform, config, artifacts).catch((err: unknown) => err)

      expect(error).toBeInstanceOf(IdentityResolutionError)
      expect(error).toMatchObject({ reason: 'unset' })
      expect(platform.calls).toEqual([])
    })

    it('reads the variable from the environment before the config', async () => {
      const config = makeConfig([{ name: 'Core', service_account_key: 'CoreOwnerUpn' }], { artifacts_dir: tempDir })
      const artifacts = writeArtifacts(tempDir, [['Core', '1.0.0.0']])
      const platform = new FakePlatform({ users: { 'owner@example.test': [{ id: 'u-1', upn: 'owner@example.test' }] } })

      await deploy(platform, config, artifacts, { env: { CoreOwnerUpn: 'owner@example.test' } })

      expect(platform.calls[0]).toBe('find-users:owner@example.test')
    })

    it('aborts when no user matches', async () => {
      const config = makeConfig(['Core'], { artifacts_dir: tempDir })
      const artifacts = writeArtifacts(tempDir, [['Core', '1.0.0.0']])
      const platform = new FakePlatform()

      await expect(deploy(platform, config, artifacts)).rejects.toThrow(
        `Cannot resolve service identity ServiceAccountUpn: no user matches "${SERVICE_UPN}"`
      )
      expect(platform.calls).toEqual([`find-users:${SERVICE_UPN}`])
    })

    it('aborts when the UPN is ambiguous', async () => {
      const config = makeConfig(['Core'], { artifacts_dir: tempDir })
      const artifacts = writeArtifacts(tempDir, [['Core', '1.0.0.0']])
      const platform = new FakePlatform({
        users: { [SERVICE_UPN]: [SERVICE_USER, { id: 'u-dup', upn: SERVICE_UPN }] }
      })

      const error = await deploy(platform, config, artifacts).catch((err: unknown) => err)

      expect(error).toMatchObject({ reason: 'ambiguous', message: `Cannot resolve service identity ServiceAccountUpn: 2 users match "${SERVICE_UPN}"` })
      expect(platform.calls.some(call => call.startsWith('stage'))).toBe(false)
    })

    it('does not look up identities when nothing is imported', async () => {
      const config = makeConfig([{ name: 'Core', service_account_key: 'UnsetKey' }], { artifacts_dir: tempDir })
      const artifacts = writeArtifacts(tempDir, [['Core', '1.0.0.0']])
      const platform = new FakePlatform({ installed: { Core: '1.0.0.0' } })

      const result = await deploy(platform, config, artifacts)

      expect(result.states).toEqual({ Core: 'skipped' })
    })
  })
})

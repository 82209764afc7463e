import { describe, it, expect, vi } from 'vitest'
import { createHookRunner, noHooks, type HookExecutor } from '../../src/lib/hooks.js'
import { HookFailedError } from '../../src/lib/errors.js'
import type { HookRegistry } from '../../src/types.js'

function registry(overrides: Partial<HookRegistry> = {}): HookRegistry {
  return {
    preExport: [],
    postExport: [],
    preBuild: [],
    postBuild: [],
    preDeploy: [],
    migrateData: [],
    postDeploy: [],
    ...overrides
  }
}

describe('createHookRunner', () => {
  it('runs each script of a phase in order with phase and context in the environment', async () => {
    const executor = vi.fn<HookExecutor>(async () => {})
    const runner = createHookRunner({
      hooks: registry({ migrateData: ['./a.sh', './b.sh'] }),
      cwd: '/work/alm',
      executor
    })

    await runner.run('migrateData', { environment: 'test', holding: ['Core', 'Sales'] })

    expect(executor.mock.calls.map(([script]) => script)).toEqual(['./a.sh', './b.sh'])
    const [, options] = executor.mock.calls[0]
    expect(options.cwd).toBe('/work/alm')
    expect(options.env.ALM_HOOK_PHASE).toBe('migrateData')
    expect(options.env.ALM_HOOK_CONTEXT).toBe('{"environment":"test","holding":["Core","Sales"]}')
  })

  it('does nothing for a phase without scripts', async () => {
    const executor = vi.fn<HookExecutor>(async () => {})
    const runner = createHookRunner({ hooks: registry(), cwd: '/work/alm', executor })

    await runner.run('preBuild', { artifactsDir: '/out', solutions: [] })

    expect(executor).not.toHaveBeenCalled()
  })

  it('stops at the first failing script', async () => {
    const executor = vi.fn<HookExecutor>(async script => {
      if (script === './fail.sh') throw new Error('exit code 2')
    })
    const runner = createHookRunner({
      hooks: registry({ preDeploy: ['./fail.sh', './never.sh'] }),
      cwd: '/work/alm',
      executor
    })

    const error = await runner.run('preDeploy', { environment: 'test', unmanaged: false, solutions: [] })
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(HookFailedError)
    expect(error).toMatchObject({ message: 'preDeploy hook failed: ./fail.sh' })
    expect(executor).toHaveBeenCalledTimes(1)
  })
})

describe('noHooks', () => {
  it('resolves for every phase', async () => {
    await expect(noHooks.run('postDeploy', { environment: 'test', states: {} })).resolves.toBeUndefined()
  })
})

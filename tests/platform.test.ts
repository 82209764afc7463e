import { describe, it, expect, vi } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { CommandPlatform, parseBridgeReply, spawnCommand, type CommandRunner } from '../src/platform.js'
import { parseSolutionVersion } from '../src/domain/version.js'
import { ExternalCallError } from '../src/lib/errors.js'

const environment = { name: 'test', url: 'https://test.example.test' }

function createPlatform(reply: { code?: number; stdout?: string; stderr?: string }, timeoutMs = 5000) {
  const runner = vi.fn<CommandRunner>(async () => ({
    code: reply.code ?? 0,
    stdout: reply.stdout ?? '',
    stderr: reply.stderr ?? ''
  }))
  const platform = new CommandPlatform({
    config: { command: 'dataverse-bridge', args: ['--profile', 'ci'], module: 'Rnwood.Dataverse.Data.PowerShell', timeoutMs },
    moduleVersion: { kind: 'exact', version: '2.1.0' },
    runner,
    cwd: '/work/alm'
  })
  return { platform, runner }
}

const ok = (result: unknown): string => JSON.stringify({ ok: true, result })

describe('parseBridgeReply', () => {
  it('returns the result of the last line', () => {
    expect(parseBridgeReply(`Connecting...\n${ok({ path: '/tmp/Core.zip' })}\n`)).toEqual({ path: '/tmp/Core.zip' })
  })

  it('raises the reported error', () => {
    expect(() => parseBridgeReply('{"ok":false,"error":"solution not found"}')).toThrow('solution not found')
  })

  it('rejects empty and malformed replies', () => {
    expect(() => parseBridgeReply('\n\n')).toThrow('bridge produced no reply')
    expect(() => parseBridgeReply('done')).toThrow('bridge reply is not JSON: done')
    expect(() => parseBridgeReply('{"result":1}')).toThrow('bridge reply must be an object with an "ok" field')
  })
})

describe('CommandPlatform', () => {
  it('passes operation, payload and module version to the bridge', async () => {
    const { platform, runner } = createPlatform({ stdout: ok(null) })

    await platform.stage(environment, '/out/Core_1_0_0_0_managed.zip', 'holding')

    const [command, args, options] = runner.mock.calls[0]
    expect(command).toBe('dataverse-bridge')
    expect(args).toEqual([
      '--profile',
      'ci',
      'stage',
      '{"url":"https://test.example.test","path":"/out/Core_1_0_0_0_managed.zip","mode":"holding"}'
    ])
    expect(options.cwd).toBe('/work/alm')
    expect(options.env.ALM_PLATFORM_MODULE).toBe('Rnwood.Dataverse.Data.PowerShell')
    expect(options.env.ALM_PLATFORM_MODULE_VERSION).toBe('2.1.0')
  })

  it('parses an installed solution', async () => {
    const { platform } = createPlatform({ stdout: ok({ uniqueName: 'Core', version: '1.2.0.5', isManaged: true }) })

    await expect(platform.getInstalledSolution(environment, 'Core')).resolves.toEqual({
      uniqueName: 'Core',
      installedVersion: parseSolutionVersion('1.2.0.5'),
      isManaged: true
    })
  })

  it('reads a null reply as not installed', async () => {
    const { platform } = createPlatform({ stdout: ok(null) })

    await expect(platform.getInstalledSolution(environment, 'Core')).resolves.toBeUndefined()
  })

  it('parses users and processes', async () => {
    const users = createPlatform({ stdout: ok([{ id: 'u-1', upn: 'svc@example.test' }]) })
    await expect(users.platform.findUsers(environment, 'svc@example.test')).resolves.toEqual([
      { id: 'u-1', upn: 'svc@example.test' }
    ])

    const processes = createPlatform({ stdout: ok([{ id: 'p1', name: 'Sync', ownerId: 'u-1', active: false }]) })
    await expect(processes.platform.listProcesses(environment, 'Core')).resolves.toEqual([
      { id: 'p1', name: 'Sync', ownerId: 'u-1', active: false }
    ])
  })

  it('reads the additive flag from a comparison', async () => {
    const { platform } = createPlatform({ stdout: ok({ isAdditive: false }) })

    await expect(platform.compareComponents(
      { solutionName: 'Core', path: '/a.zip' },
      { solutionName: 'Core', path: '/b.zip' }
    )).resolves.toBe(false)
  })

  it('wraps a non-zero exit with the step and solution', async () => {
    const { platform } = createPlatform({ code: 1, stderr: 'access denied\n' })

    const error = await platform.upgrade(environment, 'Sales').catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ExternalCallError)
    expect(error).toMatchObject({ message: 'upgrade failed for solution "Sales" in "test": access denied' })
  })

  it('treats a malformed result as a failed call', async () => {
    const { platform } = createPlatform({ stdout: ok({ uniqueName: 'Core', version: 5, isManaged: true }) })

    await expect(platform.getInstalledSolution(environment, 'Core')).rejects.toThrow(
      'get-solution failed for solution "Core" in "test": reply field "version" must be a string'
    )
  })

  it('times out a bridge that never replies', async () => {
    const runner = vi.fn<CommandRunner>(() => new Promise(() => {}))
    const platform = new CommandPlatform({
      config: { command: 'dataverse-bridge', args: [], module: 'Rnwood.Dataverse.Data.PowerShell', timeoutMs: 20 },
      moduleVersion: { kind: 'latest' },
      runner
    })

    await expect(platform.publish(environment)).rejects.toThrow(
      'publish failed in "test": Operation timed out after 20ms: publish'
    )
  })

  it('aborts the bridge call when it times out', async () => {
    let signal: AbortSignal | undefined
    const runner = vi.fn<CommandRunner>((_command, _args, options) => {
      signal = options.signal
      return new Promise(() => {})
    })
    const platform = new CommandPlatform({
      config: { command: 'dataverse-bridge', args: [], module: 'Rnwood.Dataverse.Data.PowerShell', timeoutMs: 20 },
      moduleVersion: { kind: 'latest' },
      runner
    })

    await expect(platform.upgrade(environment, 'Core')).rejects.toThrow(
      'upgrade failed for solution "Core" in "test": Operation timed out after 20ms: upgrade'
    )
    expect(signal?.aborted).toBe(true)
  })

  it('leaves the signal alone when the bridge replies in time', async () => {
    const { platform, runner } = createPlatform({ stdout: ok(null) })

    await platform.publish(environment)

    expect(runner.mock.calls[0][2].signal?.aborted).toBe(false)
  })
})

describe('spawnCommand', () => {
  it('collects output and the exit code', async () => {
    const result = await spawnCommand(
      process.execPath,
      ['-e', 'process.stdout.write("reply"); process.stderr.write("progress"); process.exitCode = 3'],
      { env: process.env }
    )

    expect(result).toEqual({ code: 3, stdout: 'reply', stderr: 'progress' })
  })

  it('kills the child when the signal aborts', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dvalm-spawn-test-'))
    const marker = path.join(tempDir, 'marker')
    const controller = new AbortController()

    try {
      const running = spawnCommand(
        process.execPath,
        ['-e', `setTimeout(() => require('node:fs').writeFileSync(${JSON.stringify(marker)}, 'late'), 300)`],
        { env: process.env, signal: controller.signal }
      )
      setTimeout(() => controller.abort(), 50)

      await expect(running).rejects.toMatchObject({ name: 'AbortError' })
      await new Promise(resolve => setTimeout(resolve, 500))
      expect(fs.existsSync(marker)).toBe(false)
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true })
    }
  })
})

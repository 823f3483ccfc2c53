import { describe, it, expect } from 'vitest'
import { SpawnCommandRunner, describeCommandFailure, runCommandLine } from './commandRunner.js'
import { FakeCommandRunner } from './testUtils.js'

describe('SpawnCommandRunner', () => {
  const runner = new SpawnCommandRunner()

  it('captures the exit code and both output streams', async () => {
    const result = await runner.run('sh', ['-c', 'echo done; echo oops >&2; exit 3'])

    expect(result).toEqual({ exitCode: 3, stdout: 'done\n', stderr: 'oops\n' })
  })

  it('reports a zero exit code for a successful command', async () => {
    expect(await runner.run('sh', ['-c', 'true'])).toEqual({ exitCode: 0, stdout: '', stderr: '' })
  })

  it('maps a signal to a non-zero exit code', async () => {
    const result = await runner.run('sh', ['-c', 'kill -TERM $$'])

    expect(result.exitCode).toBe(128)
  })

  it('rejects when the program cannot be started', async () => {
    await expect(runner.run('file-task-no-such-program', [])).rejects.toThrow(/ENOENT/)
  })
})

describe('runCommandLine', () => {
  it('splits the program from its prefix arguments', async () => {
    const runner = new FakeCommandRunner()

    await runCommandLine(runner, ['sudo', '-n', 'chown'], ['alice', '/srv/data'])

    expect(runner.calls).toEqual([{ command: 'sudo', args: ['-n', 'chown', 'alice', '/srv/data'] }])
  })

  it('rejects an empty command line', async () => {
    await expect(runCommandLine(new FakeCommandRunner(), [], ['/mnt/usb'])).rejects.toThrow('未配置外部命令')
  })
})

describe('describeCommandFailure', () => {
  it('prefers trimmed stderr', () => {
    expect(describeCommandFailure(['umount'], { exitCode: 1, stdout: 'ignored', stderr: '\nbusy\n' }))
      .toBe('busy')
  })

  it('falls back to the command and exit code', () => {
    expect(describeCommandFailure(['sudo', 'chown'], { exitCode: 1, stdout: '', stderr: '' }))
      .toBe('sudo chown 退出码 1')
  })
})

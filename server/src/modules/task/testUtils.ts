import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import type { CommandResult, CommandRunner } from './commandRunner.js'

export async function createTempDir(prefix = 'file-task-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix))
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target)
    return true
  } catch {
    return false
  }
}

// 记录调用并返回预设结果的命令执行器
export class FakeCommandRunner implements CommandRunner {
  calls: Array<{ command: string; args: string[] }> = []
  private result: CommandResult | Error

  constructor(result: CommandResult | Error = { exitCode: 0, stdout: '', stderr: '' }) {
    this.result = result
  }

  async run(command: string, args: string[]): Promise<CommandResult> {
    this.calls.push({ command, args })
    if (this.result instanceof Error) {
      throw this.result
    }
    return this.result
  }
}

import { spawn } from 'child_process'

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

// 外部命令执行接口，测试时可替换为假实现
export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>
}

export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'pipe']
      })

      let stdout = ''
      let stderr = ''

      child.stdout.setEncoding('utf8')
      child.stderr.setEncoding('utf8')
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk
      })
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk
      })

      // 命令不存在等情况只会触发 error，不会触发 close
      child.on('error', reject)

      child.on('close', (code, signal) => {
        resolve({
          exitCode: code ?? (signal ? 128 : 1),
          stdout,
          stderr
        })
      })
    })
  }
}

export const defaultCommandRunner: CommandRunner = new SpawnCommandRunner()

// 以 [程序, ...前置参数] 的形式拼接完整命令
export async function runCommandLine(
  runner: CommandRunner,
  commandLine: string[],
  args: string[]
): Promise<CommandResult> {
  const [command, ...prefixArgs] = commandLine
  if (!command) {
    throw new Error('未配置外部命令')
  }
  return runner.run(command, [...prefixArgs, ...args])
}

// 非零退出码转换为错误消息：优先使用标准错误输出
export function describeCommandFailure(commandLine: string[], result: CommandResult): string {
  const stderr = result.stderr.trim()
  if (stderr) {
    return stderr
  }
  return `${commandLine.join(' ')} 退出码 ${result.exitCode}`
}

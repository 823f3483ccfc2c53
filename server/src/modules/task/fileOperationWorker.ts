import { promises as fs } from 'fs'
import path from 'path'
import logger from '../../utils/logger.js'
import { getErrorCode } from '../../utils/errors.js'
import {
  type CommandRunner,
  defaultCommandRunner,
  describeCommandFailure,
  runCommandLine
} from './commandRunner.js'

export interface FileOperationOptions {
  // 命令以 [程序, ...前置参数] 表示，目标参数追加在后面
  chownCommand: string[]
  umountCommand: string[]
}

export const DEFAULT_FILE_OPERATION_OPTIONS: FileOperationOptions = {
  chownCommand: ['sudo', 'chown'],
  umountCommand: ['umount']
}

// 递归复制目录，遇到错误立即中止
async function copyDirectory(src: string, dest: string): Promise<void> {
  await fs.mkdir(dest, { recursive: true })
  const items = await fs.readdir(src)

  for (const item of items) {
    const srcPath = path.join(src, item)
    const destPath = path.join(dest, item)
    const stats = await fs.stat(srcPath)

    if (stats.isDirectory()) {
      await copyDirectory(srcPath, destPath)
    } else {
      await fs.copyFile(srcPath, destPath)
    }
  }
}

export class FileOperationWorker {
  private runner: CommandRunner
  private options: FileOperationOptions

  constructor(
    runner: CommandRunner = defaultCommandRunner,
    options: FileOperationOptions = DEFAULT_FILE_OPERATION_OPTIONS
  ) {
    this.runner = runner
    this.options = options
  }

  async copy(src: string, dest: string): Promise<void> {
    const stats = await fs.stat(src)
    if (stats.isDirectory()) {
      await copyDirectory(src, dest)
    } else {
      await fs.copyFile(src, dest)
    }
  }

  async move(src: string, dest: string): Promise<void> {
    try {
      await fs.rename(src, dest)
    } catch (error) {
      // 跨设备时重命名失败，改用复制+删除
      if (getErrorCode(error) !== 'EXDEV') {
        throw error
      }
      logger.info(`跨设备移动，改用复制后删除: ${src} -> ${dest}`)
      await this.copy(src, dest)
      await fs.rm(src, { recursive: true })
    }
  }

  async delete(targetPath: string): Promise<void> {
    // 符号链接只删除链接本身
    const stats = await fs.lstat(targetPath)
    if (stats.isDirectory()) {
      await fs.rm(targetPath, { recursive: true })
    } else {
      await fs.unlink(targetPath)
    }
  }

  async createFile(filePath: string): Promise<void> {
    await fs.writeFile(filePath, '')
  }

  async createDirectory(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath)
  }

  async chmod(targetPath: string, mode: number): Promise<void> {
    await fs.chmod(targetPath, mode)
  }

  async chown(targetPath: string, owner: string): Promise<void> {
    await this.runExternal(this.options.chownCommand, [owner, targetPath])
  }

  async unmount(mountPath: string): Promise<void> {
    await this.runExternal(this.options.umountCommand, [mountPath])
  }

  private async runExternal(commandLine: string[], args: string[]): Promise<void> {
    const result = await runCommandLine(this.runner, commandLine, args)
    if (result.exitCode !== 0) {
      throw new Error(describeCommandFailure(commandLine, result))
    }
  }
}

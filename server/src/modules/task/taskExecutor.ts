import logger from '../../utils/logger.js'
import { getErrorMessage } from '../../utils/errors.js'
import type { CompressionWorker } from './compressionWorker.js'
import type { FileOperationWorker } from './fileOperationWorker.js'
import type { ProgressSender } from './progressChannel.js'
import type { TaskId, TaskKind } from './types.js'

export interface TaskExecutionContext {
  sender: ProgressSender
  fileWorker: FileOperationWorker
  compressionWorker: CompressionWorker
}

function runOperation(kind: TaskKind, context: TaskExecutionContext): Promise<void> {
  const { fileWorker, compressionWorker } = context

  switch (kind.type) {
    case 'copy':
      return fileWorker.copy(kind.src, kind.dest)
    case 'move':
      return fileWorker.move(kind.src, kind.dest)
    case 'delete':
      return fileWorker.delete(kind.path)
    case 'create-file':
      return fileWorker.createFile(kind.path)
    case 'create-directory':
      return fileWorker.createDirectory(kind.path)
    case 'chmod':
      return fileWorker.chmod(kind.path, kind.mode)
    case 'chown':
      return fileWorker.chown(kind.path, kind.owner)
    case 'unmount':
      return fileWorker.unmount(kind.path)
    case 'archive':
      return compressionWorker.createArchive(kind.paths, kind.dest, kind.format)
    default: {
      const unknownKind: never = kind
      throw new Error(`未知的任务类型: ${JSON.stringify(unknownKind)}`)
    }
  }
}

/**
 * 执行单个任务，并在结束前向通道发送唯一的终止事件。
 * 返回的 Promise 不会 reject：所有错误都转换为 error 事件。
 */
export async function executeTask(
  taskId: TaskId,
  kind: TaskKind,
  context: TaskExecutionContext
): Promise<void> {
  try {
    await runOperation(kind, context)
    context.sender.send(taskId, { type: 'completed' })
  } catch (error) {
    const message = getErrorMessage(error) || '未知错误'
    logger.error(`任务执行失败 (${taskId}, ${kind.type}): ${message}`)
    context.sender.send(taskId, { type: 'error', message })
  }
}

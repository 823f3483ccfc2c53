import { EventEmitter } from 'events'
import { v4 as uuidv4 } from 'uuid'
import logger from '../../utils/logger.js'
import { type CommandRunner, defaultCommandRunner } from './commandRunner.js'
import { CompressionWorker } from './compressionWorker.js'
import { DEFAULT_FILE_OPERATION_OPTIONS, FileOperationWorker } from './fileOperationWorker.js'
import { ProgressChannel, type ProgressSender } from './progressChannel.js'
import { executeTask, type TaskExecutionContext } from './taskExecutor.js'
import {
  isTerminal,
  type ProgressEvent,
  type Task,
  type TaskId,
  type TaskKind,
  type TaskStatus
} from './types.js'

export interface TaskManagerOptions {
  commandRunner?: CommandRunner
  chownCommand?: string[]
  umountCommand?: string[]
  zipCompressionLevel?: number
}

// 一次事件消费的结果；task 为应用之后的快照，找不到任务时为 undefined
export interface AppliedEvent {
  taskId: TaskId
  event: ProgressEvent
  task: Task | undefined
  applied: boolean
}

/**
 * 任务注册表。
 *
 * 只有管理器本身会修改任务状态：执行器通过进度通道回报结果，
 * 每次状态变更都在事件循环中同步完成。
 *
 * 事件：
 * - taskCreated (task)
 * - taskUpdated (task)
 */
export class TaskManager extends EventEmitter {
  private tasks: Task[] = []
  private channel = new ProgressChannel()
  private context: TaskExecutionContext

  constructor(options: TaskManagerOptions = {}) {
    super()
    this.context = {
      sender: this.channel,
      fileWorker: new FileOperationWorker(options.commandRunner ?? defaultCommandRunner, {
        chownCommand: options.chownCommand ?? DEFAULT_FILE_OPERATION_OPTIONS.chownCommand,
        umountCommand: options.umountCommand ?? DEFAULT_FILE_OPERATION_OPTIONS.umountCommand
      }),
      compressionWorker: new CompressionWorker({
        compressionLevel: options.zipCompressionLevel ?? 6
      })
    }
  }

  addTask(kind: TaskKind, description: string): TaskId {
    const id = uuidv4()
    const now = new Date()
    const task: Task = {
      id,
      kind: structuredClone(kind),
      status: { state: 'pending' },
      description,
      createdAt: now,
      updatedAt: now
    }

    this.tasks.push(task)
    logger.info(`任务已创建: ${description} (${id})`)
    this.emit('taskCreated', structuredClone(task))
    return id
  }

  getTasks(): Task[] {
    return this.tasks.map(task => structuredClone(task))
  }

  getTask(id: TaskId): Task | undefined {
    const task = this.findTask(id)
    return task ? structuredClone(task) : undefined
  }

  getActiveTasks(): Task[] {
    return this.tasks
      .filter(task => !isTerminal(task.status))
      .map(task => structuredClone(task))
  }

  // 执行器只拿到发送端
  get progressSender(): ProgressSender {
    return this.channel
  }

  /**
   * 派发所有等待中的任务，不设并发上限。
   * 已派发或已结束的任务不会被再次派发，可以每帧调用。
   */
  processPendingTasks(): number {
    let dispatched = 0

    for (const task of this.tasks) {
      if (task.status.state !== 'pending') continue

      this.setStatus(task, { state: 'in-progress', progress: 0 })
      logger.debug(`派发任务: ${task.description} (${task.id})`)

      // executeTask 不会 reject
      void executeTask(task.id, structuredClone(task.kind), this.context)
      dispatched++
    }

    return dispatched
  }

  /**
   * 等待并应用下一个进度事件。
   * 通道关闭后返回 undefined。
   */
  async nextEvent(): Promise<AppliedEvent | undefined> {
    const message = await this.channel.receive()
    if (!message) return undefined

    const { taskId, event } = message
    const task = this.findTask(taskId)

    // 任务可能已被移除
    if (!task) {
      return { taskId, event, task: undefined, applied: false }
    }

    // 终止状态不再回退
    if (isTerminal(task.status)) {
      logger.warn(`忽略已结束任务的事件: ${taskId} (${event.type})`)
      return { taskId, event, task: structuredClone(task), applied: false }
    }

    switch (event.type) {
      case 'update':
        this.setStatus(task, {
          state: 'in-progress',
          progress: Math.min(1, Math.max(0, event.progress))
        })
        break
      case 'completed':
        this.setStatus(task, { state: 'completed' })
        logger.info(`任务完成: ${task.description}`)
        break
      case 'error':
        this.setStatus(task, { state: 'failed', reason: event.message })
        logger.warn(`任务失败: ${task.description} - ${event.message}`)
        break
    }

    return { taskId, event, task: structuredClone(task), applied: true }
  }

  /**
   * 等待一个事件并应用到对应任务。
   * 仅当应用的是 completed 事件时返回 true；update、error 均返回 false。
   */
  async waitForEvent(): Promise<boolean> {
    const result = await this.nextEvent()
    return result !== undefined && result.applied && result.event.type === 'completed'
  }

  // 关闭进度通道，等待中的消费者随即返回
  close(): void {
    this.channel.close()
  }

  private findTask(id: TaskId): Task | undefined {
    return this.tasks.find(task => task.id === id)
  }

  private setStatus(task: Task, status: TaskStatus) {
    task.status = status
    task.updatedAt = new Date()
    this.emit('taskUpdated', structuredClone(task))
  }
}

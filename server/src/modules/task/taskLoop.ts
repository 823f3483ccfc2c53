import { EventEmitter } from 'events'
import path from 'path'
import logger from '../../utils/logger.js'
import { getErrorMessage } from '../../utils/errors.js'
import type { TaskManager } from './taskManager.js'

/**
 * 前端主循环：按固定间隔派发等待中的任务，同时消费进度事件。
 *
 * 事件：
 * - refresh            有任务完成，需要刷新目录列表和挂载点
 * - notification (msg) 压缩任务完成的提示
 */
export class TaskLoop extends EventEmitter {
  private taskManager: TaskManager
  private tickInterval: number
  private timer: NodeJS.Timeout | null = null
  private consumer: Promise<void> | null = null
  private running = false

  constructor(taskManager: TaskManager, tickInterval: number) {
    super()
    this.taskManager = taskManager
    this.tickInterval = tickInterval
  }

  start(): void {
    if (this.running) return
    this.running = true

    this.tick()
    this.timer = setInterval(() => this.tick(), this.tickInterval)
    this.consumer = this.consumeEvents().catch(error => {
      logger.error(`任务事件循环异常终止: ${getErrorMessage(error)}`)
    })

    logger.info(`任务循环已启动，间隔 ${this.tickInterval}ms`)
  }

  tick(): void {
    this.taskManager.processPendingTasks()
  }

  async stop(): Promise<void> {
    if (!this.running) return
    this.running = false

    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }

    this.taskManager.close()
    await this.consumer
    this.consumer = null
    logger.info('任务循环已停止')
  }

  get isRunning(): boolean {
    return this.running
  }

  private async consumeEvents(): Promise<void> {
    while (this.running) {
      const result = await this.taskManager.nextEvent()
      if (!result) break

      if (!result.applied || result.event.type !== 'completed') continue

      const { task } = result
      if (task && task.kind.type === 'archive') {
        this.emit('notification', `Archive ${path.basename(task.kind.dest)} created successfully`)
      }
      this.emit('refresh')
    }
  }
}

import type { ProgressEvent, ProgressMessage, TaskId } from './types.js'

// 执行器只持有发送端
export interface ProgressSender {
  send(taskId: TaskId, event: ProgressEvent): void
}

/**
 * 多生产者、单消费者的进度通道。
 *
 * 消息按发送顺序投递；没有消费者等待时先缓存，缓冲区不设上限。
 * 关闭后，缓存中剩余的消息仍会被取完，之后 receive() 返回 undefined。
 */
export class ProgressChannel implements ProgressSender {
  private queue: ProgressMessage[] = []
  private waiters: Array<(message: ProgressMessage | undefined) => void> = []
  private closed = false

  send(taskId: TaskId, event: ProgressEvent): void {
    if (this.closed) return

    const message: ProgressMessage = { taskId, event }
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter(message)
    } else {
      this.queue.push(message)
    }
  }

  receive(): Promise<ProgressMessage | undefined> {
    const message = this.queue.shift()
    if (message) {
      return Promise.resolve(message)
    }
    if (this.closed) {
      return Promise.resolve(undefined)
    }
    return new Promise(resolve => {
      this.waiters.push(resolve)
    })
  }

  close(): void {
    if (this.closed) return
    this.closed = true

    const waiters = this.waiters
    this.waiters = []
    waiters.forEach(waiter => waiter(undefined))
  }

  get isClosed(): boolean {
    return this.closed
  }

  get pending(): number {
    return this.queue.length
  }
}

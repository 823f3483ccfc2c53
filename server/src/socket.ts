import type { Server as SocketIOServer } from 'socket.io'
import logger from './utils/logger.js'
import type { TaskManager } from './modules/task/taskManager.js'
import type { TaskLoop } from './modules/task/taskLoop.js'
import type { Task } from './modules/task/types.js'

/**
 * 通过WebSocket推送任务状态
 *
 * - task-updated       任务创建或状态变化
 * - tasks-refresh      有任务完成
 * - task-notification  压缩完成提示 { message }
 * - tasks-snapshot     连接建立时的完整任务列表
 */
export function bindTaskEvents(io: SocketIOServer, taskManager: TaskManager, taskLoop: TaskLoop): void {
  taskManager.on('taskCreated', (task: Task) => {
    io.emit('task-updated', task)
  })
  taskManager.on('taskUpdated', (task: Task) => {
    io.emit('task-updated', task)
  })

  taskLoop.on('refresh', () => {
    io.emit('tasks-refresh')
  })
  taskLoop.on('notification', (message: string) => {
    io.emit('task-notification', { message })
  })

  io.on('connection', socket => {
    logger.info(`客户端已连接: ${socket.id}`)
    socket.emit('tasks-snapshot', taskManager.getTasks())

    socket.on('disconnect', (reason) => {
      logger.info(`客户端已断开: ${socket.id} (${reason})`)
    })
  })
}

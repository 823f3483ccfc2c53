import { createServer } from 'http'
import type { Socket } from 'net'
import { Server as SocketIOServer } from 'socket.io'
import dotenv from 'dotenv'
import path from 'path'
import { fileURLToPath } from 'url'

import logger from './utils/logger.js'
import { getErrorMessage } from './utils/errors.js'
import { ConfigManager } from './modules/config/ConfigManager.js'
import { TaskManager } from './modules/task/taskManager.js'
import { TaskLoop } from './modules/task/taskLoop.js'
import { createApp } from './app.js'
import { bindTaskEvents } from './socket.js'

// 获取当前文件目录
const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

// 加载环境变量
// 首先尝试加载根目录的.env文件，然后加载server目录的.env文件
dotenv.config({ path: path.join(__dirname, '../../.env') })
dotenv.config()

// 追踪所有活动的socket连接
const sockets = new Set<Socket>()

let taskLoop: TaskLoop | null = null
let ioServer: SocketIOServer | null = null

async function startServer() {
  const configManager = new ConfigManager(logger)
  await configManager.initialize()

  const serverConfig = configManager.getServerConfig()
  const taskConfig = configManager.getTaskConfig()

  const taskManager = new TaskManager({
    chownCommand: taskConfig.chownCommand,
    umountCommand: taskConfig.umountCommand,
    zipCompressionLevel: taskConfig.zipCompressionLevel
  })

  const app = createApp({
    taskManager,
    corsOrigin: process.env.CORS_ORIGIN || serverConfig.corsOrigin
  })
  const server = createServer(app)
  const io = new SocketIOServer(server, {
    cors: {
      origin: process.env.SOCKET_CORS_ORIGIN || '*',
      methods: ['GET', 'POST']
    },
    transports: ['websocket', 'polling']
  })
  ioServer = io

  server.on('connection', socket => {
    sockets.add(socket)
    socket.on('close', () => {
      sockets.delete(socket)
    })
  })

  taskLoop = new TaskLoop(taskManager, taskConfig.tickInterval)
  bindTaskEvents(io, taskManager, taskLoop)

  taskLoop.start()

  server.listen(serverConfig.port, serverConfig.host, () => {
    logger.info(`服务器已启动: http://${serverConfig.host}:${serverConfig.port}`)
  })
}

async function shutdown(signal: string) {
  logger.info(`收到 ${signal}，正在关闭服务器...`)

  if (taskLoop) {
    await taskLoop.stop()
  }

  if (!ioServer) {
    process.exit(0)
  }

  // io.close 会同时关闭底层的HTTP服务器
  sockets.forEach(socket => socket.destroy())
  ioServer.close(() => {
    logger.info('服务器已关闭')
    process.exit(0)
  })
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch(error => {
    logger.error(`关闭服务器失败: ${getErrorMessage(error)}`)
    process.exit(1)
  })
})

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch(error => {
    logger.error(`关闭服务器失败: ${getErrorMessage(error)}`)
    process.exit(1)
  })
})

startServer().catch(error => {
  logger.error(`服务器启动失败: ${getErrorMessage(error)}`)
  process.exit(1)
})

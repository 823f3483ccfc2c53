import express from 'express'
import cors from 'cors'
import helmet from 'helmet'
import type { TaskManager } from './modules/task/taskManager.js'
import { setupTaskRoutes } from './routes/tasks.js'

export interface AppOptions {
  taskManager: TaskManager
  corsOrigin: string
}

// 组装 Express 应用；cors 必须先于所有路由注册
export function createApp({ taskManager, corsOrigin }: AppOptions) {
  const app = express()

  app.use(helmet({
    contentSecurityPolicy: false,
    crossOriginOpenerPolicy: false
  }))

  app.use(cors({
    origin: corsOrigin,
    credentials: true
  }))

  app.use(express.json({ limit: '1mb' }))

  // 健康检查端点
  app.get('/api/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    })
  })

  app.use('/api/tasks', setupTaskRoutes(taskManager))

  // 404处理
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      message: '接口不存在'
    })
  })

  return app
}

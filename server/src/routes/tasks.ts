import { Router, type Request, type Response } from 'express'
import Joi from 'joi'
import type { TaskManager } from '../modules/task/taskManager.js'
import { describeTaskKind } from '../modules/task/taskRequests.js'
import type { TaskKind } from '../modules/task/types.js'
import { getErrorMessage } from '../utils/errors.js'
import logger from '../utils/logger.js'

export interface CreateTaskBody {
  kind: TaskKind
  description?: string
}

const pathSchema = Joi.string().min(1).required()

const kindSchema = Joi.alternatives<TaskKind>().try(
  Joi.object({
    type: Joi.string().valid('copy', 'move').required(),
    src: pathSchema,
    dest: pathSchema
  }),
  Joi.object({
    type: Joi.string().valid('delete', 'create-file', 'create-directory', 'unmount').required(),
    path: pathSchema
  }),
  Joi.object({
    type: Joi.string().valid('chmod').required(),
    path: pathSchema,
    mode: Joi.number().integer().min(0).max(0xffffffff).required()
  }),
  Joi.object({
    type: Joi.string().valid('chown').required(),
    path: pathSchema,
    owner: Joi.string().pattern(/^[^:\s]+(:[^:\s]+)?$/).required()
  }),
  // 格式不在此处校验，由执行器报告不支持的格式
  Joi.object({
    type: Joi.string().valid('archive').required(),
    paths: Joi.array().items(Joi.string().min(1)).min(1).required(),
    dest: pathSchema,
    format: Joi.string().min(1).required()
  })
)

const createTaskSchema = Joi.object<CreateTaskBody>({
  kind: kindSchema.required(),
  description: Joi.string().allow('').optional()
}).required()

export function validateCreateTaskBody(body: unknown):
  | { success: true; value: CreateTaskBody }
  | { success: false; message: string } {
  const { error, value } = createTaskSchema.validate(body)
  if (error) {
    return { success: false, message: error.details[0]?.message ?? error.message }
  }
  return { success: true, value }
}

export function setupTaskRoutes(taskManager: TaskManager): Router {
  const router = Router()

  // 获取所有任务
  router.get('/', (req: Request, res: Response) => {
    try {
      res.json({
        success: true,
        data: taskManager.getTasks()
      })
    } catch (error) {
      logger.error('获取任务列表失败:', error)
      res.status(500).json({
        success: false,
        message: '获取任务列表失败',
        error: getErrorMessage(error)
      })
    }
  })

  // 获取活跃任务
  router.get('/active', (req: Request, res: Response) => {
    try {
      res.json({
        success: true,
        data: taskManager.getActiveTasks()
      })
    } catch (error) {
      logger.error('获取活跃任务失败:', error)
      res.status(500).json({
        success: false,
        message: '获取活跃任务失败',
        error: getErrorMessage(error)
      })
    }
  })

  // 获取单个任务
  router.get('/:taskId', (req: Request, res: Response) => {
    try {
      const task = taskManager.getTask(req.params.taskId)

      if (!task) {
        return res.status(404).json({
          success: false,
          message: '任务不存在'
        })
      }

      res.json({
        success: true,
        data: task
      })
    } catch (error) {
      logger.error('获取任务失败:', error)
      res.status(500).json({
        success: false,
        message: '获取任务失败',
        error: getErrorMessage(error)
      })
    }
  })

  // 提交任务，由任务循环在下一次派发时执行
  router.post('/', (req: Request, res: Response) => {
    try {
      const result = validateCreateTaskBody(req.body)

      if (!result.success) {
        return res.status(400).json({
          success: false,
          message: result.message
        })
      }

      const { kind, description } = result.value
      const taskId = taskManager.addTask(kind, description || describeTaskKind(kind))

      res.status(201).json({
        success: true,
        data: taskManager.getTask(taskId)
      })
    } catch (error) {
      logger.error('创建任务失败:', error)
      res.status(500).json({
        success: false,
        message: '创建任务失败',
        error: getErrorMessage(error)
      })
    }
  })

  return router
}

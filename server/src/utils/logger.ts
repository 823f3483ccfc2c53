import winston from 'winston'
import path from 'path'
import fs from 'fs'

const isTest = process.env.NODE_ENV === 'test'

// 确保日志目录存在
const logDir = path.resolve(process.cwd(), 'logs')
if (!isTest && !fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true })
}

// 自定义日志格式
const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss'
  }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack }) => {
    return `${timestamp} [${level.toUpperCase()}]: ${stack || message}`
  })
)

// 控制台输出
const consoleTransport = new winston.transports.Console({
  format: winston.format.combine(
    winston.format.colorize(),
    logFormat
  )
})

// 创建日志器
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isTest ? 'warn' : 'info'),
  format: logFormat,
  transports: [consoleTransport]
})

// 测试时不写日志文件
if (!isTest) {
  // 所有日志文件
  logger.add(new winston.transports.File({
    filename: path.join(logDir, 'app.log'),
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
    tailable: true
  }))

  // 错误日志文件
  logger.add(new winston.transports.File({
    filename: path.join(logDir, 'error.log'),
    level: 'error',
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
    tailable: true
  }))

  // 任务日志文件
  logger.add(new winston.transports.File({
    filename: path.join(logDir, 'tasks.log'),
    level: 'info',
    maxsize: 20 * 1024 * 1024, // 20MB
    maxFiles: 3,
    tailable: true,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, message }) => {
        return `${timestamp} [TASKS]: ${message}`
      })
    )
  }))
}

// 在生产环境中不输出到控制台
if (process.env.NODE_ENV === 'production') {
  logger.remove(consoleTransport)
}

export default logger

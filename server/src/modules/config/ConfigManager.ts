import fs from 'fs/promises'
import path from 'path'
import winston from 'winston'
import Joi from 'joi'
import { getErrorCode } from '../../utils/errors.js'

export interface AppConfig {
  server: {
    port: number
    host: string
    corsOrigin: string
  }
  tasks: {
    tickInterval: number // 派发间隔（毫秒）
    chownCommand: string[] // 修改属主需要提权
    umountCommand: string[]
    zipCompressionLevel: number // 0-9
  }
}

export interface ConfigUpdate {
  server?: Partial<AppConfig['server']>
  tasks?: Partial<AppConfig['tasks']>
}

const commandSchema = Joi.array().items(Joi.string().min(1)).min(1)

const configSchema = Joi.object<ConfigUpdate>({
  server: Joi.object({
    port: Joi.number().integer().min(0).max(65535),
    host: Joi.string(),
    corsOrigin: Joi.string()
  }),
  tasks: Joi.object({
    tickInterval: Joi.number().integer().min(1),
    chownCommand: commandSchema,
    umountCommand: commandSchema,
    zipCompressionLevel: Joi.number().integer().min(0).max(9)
  })
}).unknown(true)

export class ConfigManager {
  private config: AppConfig
  private configPath: string
  private logger: winston.Logger

  constructor(logger: winston.Logger, configPath: string = path.join(process.cwd(), 'data', 'config.json')) {
    this.logger = logger
    this.configPath = configPath
    this.config = this.getDefaultConfig()
  }

  private getDefaultConfig(): AppConfig {
    return {
      server: {
        port: parseInt(process.env.PORT || '3001', 10),
        host: process.env.HOST || '0.0.0.0',
        corsOrigin: process.env.CLIENT_URL || 'http://localhost:3000'
      },
      tasks: {
        tickInterval: parseInt(process.env.TASK_TICK_INTERVAL || '250', 10),
        chownCommand: ['sudo', 'chown'],
        umountCommand: ['umount'],
        zipCompressionLevel: 6
      }
    }
  }

  async initialize(): Promise<void> {
    try {
      // 确保data目录存在
      const dataDir = path.dirname(this.configPath)
      await fs.mkdir(dataDir, { recursive: true })

      // 尝试加载现有配置
      await this.loadConfig()

      this.logger.info('配置管理器初始化完成')
    } catch (error) {
      this.logger.error('配置管理器初始化失败:', error)
      throw error
    }
  }

  private async loadConfig(): Promise<void> {
    try {
      const configData = await fs.readFile(this.configPath, 'utf-8')
      const { error, value } = configSchema.validate(JSON.parse(configData))
      if (error) {
        throw new Error(`配置文件格式错误: ${error.message}`)
      }

      // 合并默认配置和保存的配置
      this.config = this.mergeConfig(this.getDefaultConfig(), value)

      this.logger.info('配置文件加载成功')
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        // 配置文件不存在，创建新的
        this.logger.info('配置文件不存在，创建新的配置文件')
        await this.saveConfig()
      } else {
        this.logger.error('加载配置文件失败:', error)
        throw error
      }
    }
  }

  private mergeConfig(defaultConfig: AppConfig, savedConfig: ConfigUpdate): AppConfig {
    return {
      server: {
        ...defaultConfig.server,
        ...savedConfig.server
      },
      tasks: {
        ...defaultConfig.tasks,
        ...savedConfig.tasks
      }
    }
  }

  async saveConfig(): Promise<void> {
    try {
      await fs.writeFile(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8')
      this.logger.info('配置文件保存成功')
    } catch (error) {
      this.logger.error('保存配置文件失败:', error)
      throw error
    }
  }

  getConfig(): AppConfig {
    return structuredClone(this.config)
  }

  async updateConfig(updates: ConfigUpdate): Promise<void> {
    this.config = this.mergeConfig(this.config, updates)
    await this.saveConfig()
  }

  getServerConfig(): AppConfig['server'] {
    return { ...this.config.server }
  }

  getTaskConfig(): AppConfig['tasks'] {
    return structuredClone(this.config.tasks)
  }
}

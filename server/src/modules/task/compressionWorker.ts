import { createWriteStream, type Stats } from 'fs'
import { promises as fs } from 'fs'
import * as path from 'path'
import archiver from 'archiver'
import * as tar from 'tar'
import logger from '../../utils/logger.js'

export interface CompressionOptions {
  compressionLevel: number
}

// source 为 null 表示显式的目录条目
type ZipEntry =
  | { source: string; name: string; stats: Stats }
  | { source: null; name: string }

export class CompressionWorker {
  private options: CompressionOptions

  constructor(options: CompressionOptions = { compressionLevel: 6 }) {
    this.options = options
  }

  async createArchive(sourcePaths: string[], archivePath: string, format: string): Promise<void> {
    if (sourcePaths.length === 0) {
      throw new Error('没有需要压缩的文件')
    }

    logger.debug(`创建 ${format} 压缩包: ${archivePath} (${sourcePaths.length} 项)`)

    // 根据格式选择不同的压缩方法
    if (format === 'zip') {
      await this.compressZip(sourcePaths, archivePath)
    } else if (format === 'tar') {
      await this.compressTar(sourcePaths, archivePath, false)
    } else if (format === 'tar.gz') {
      await this.compressTar(sourcePaths, archivePath, true)
    } else {
      throw new Error(`不支持的压缩格式: ${format}`)
    }
  }

  /**
   * zip 中文件以文件名存放；目录只保留内部结构，
   * 条目路径相对于该目录本身，不带目录名前缀。
   */
  private async compressZip(sourcePaths: string[], archivePath: string): Promise<void> {
    const entries = await this.collectZipEntries(sourcePaths)

    await new Promise<void>((resolve, reject) => {
      const output = createWriteStream(archivePath)
      const archive = archiver('zip', {
        zlib: { level: this.options.compressionLevel }
      })

      output.on('close', () => {
        resolve()
      })

      output.on('error', (err) => {
        archive.abort()
        reject(err)
      })

      archive.on('error', (err) => {
        reject(err)
      })

      // 读取失败时 archiver 只发出 warning
      archive.on('warning', (err) => {
        reject(err)
      })

      archive.pipe(output)

      // 带上 stats 的文件条目跳过 archiver 的并发 stat 队列，条目按收集顺序写入
      for (const entry of entries) {
        if (entry.source === null) {
          archive.append(Buffer.alloc(0), { name: entry.name })
        } else {
          archive.file(entry.source, { name: entry.name, stats: entry.stats })
        }
      }

      archive.finalize().catch(reject)
    })
  }

  private async collectZipEntries(sourcePaths: string[]): Promise<ZipEntry[]> {
    const entries: ZipEntry[] = []

    for (const sourcePath of sourcePaths) {
      const stats = await fs.stat(sourcePath)
      if (stats.isDirectory()) {
        await this.walkDirectory(sourcePath, sourcePath, entries)
      } else {
        entries.push({ source: sourcePath, name: path.basename(sourcePath), stats })
      }
    }

    return entries
  }

  private async walkDirectory(basePath: string, dirPath: string, entries: ZipEntry[]): Promise<void> {
    const items = (await fs.readdir(dirPath)).sort()

    for (const item of items) {
      const fullPath = path.join(dirPath, item)
      const name = path.relative(basePath, fullPath).split(path.sep).join('/')
      const stats = await fs.stat(fullPath)

      if (stats.isDirectory()) {
        entries.push({ source: null, name: `${name}/` })
        await this.walkDirectory(basePath, fullPath, entries)
      } else {
        entries.push({ source: fullPath, name, stats })
      }
    }
  }

  /**
   * tar 中每个源路径以自身名称作为顶层条目：目录连同内部结构，
   * 文件按文件名，与所在目录无关。
   */
  private async compressTar(sourcePaths: string[], archivePath: string, gzip: boolean): Promise<void> {
    const roots = sourcePaths.map(sourcePath => path.resolve(sourcePath))
    const cwd = path.parse(roots[0]).root

    await tar.create(
      {
        file: archivePath,
        gzip,
        cwd,
        portable: true,
        // 写入头部之前改写条目名称；目录条目此时已带结尾的 /
        onWriteEntry: entry => {
          if (!('absolute' in entry)) return
          const name = tarEntryName(roots, entry.absolute)
          if (name) {
            entry.path = entry.path.endsWith('/') ? `${name}/` : name
          }
        }
      },
      roots.map(root => path.relative(cwd, root))
    )
  }
}

// 取包含该条目的最深源路径，名称为 源路径名/相对路径
function tarEntryName(roots: string[], absolute: string): string | undefined {
  let match: string | undefined
  for (const root of roots) {
    const inside = absolute === root || absolute.startsWith(root + path.sep)
    if (inside && (!match || root.length > match.length)) {
      match = root
    }
  }
  if (!match) return undefined

  const relative = path.relative(match, absolute)
  const segments = [path.basename(match), ...(relative ? relative.split(path.sep) : [])]
  return segments.join('/')
}

import path from 'path'
import type { TaskManager } from './taskManager.js'
import type { ArchiveFormat, TaskId, TaskKind } from './types.js'

export interface TaskRequest {
  kind: TaskKind
  description: string
}

export type ClipboardMode = 'copy' | 'move'

export interface Clipboard {
  paths: string[]
  mode: ClipboardMode | null
}

export type CreateItemType = 'file' | 'directory'

// 带引号的路径，与任务列表中的显示保持一致
function quote(value: string): string {
  return JSON.stringify(value)
}

export function archiveExtension(format: string): string {
  switch (format) {
    case 'zip':
      return '.zip'
    case 'tar':
      return '.tar'
    case 'tar.gz':
      return '.tar.gz'
    default:
      return '.zip'
  }
}

// zip -> tar -> tar.gz -> zip
export function nextArchiveFormat(current: string): ArchiveFormat {
  switch (current) {
    case 'zip':
      return 'tar'
    case 'tar':
      return 'tar.gz'
    default:
      return 'zip'
  }
}

// 八进制权限字符串，例如 "755"
export function parseChmodMode(input: string): number | undefined {
  const trimmed = input.trim()
  if (!/^[0-7]+$/.test(trimmed)) {
    return undefined
  }
  const mode = parseInt(trimmed, 8)
  return mode <= 0xffffffff ? mode : undefined
}

export function describeTaskKind(kind: TaskKind): string {
  switch (kind.type) {
    case 'copy':
      return `Copy ${quote(path.basename(kind.src))} -> ${quote(path.dirname(kind.dest))}`
    case 'move':
      return `Move ${quote(path.basename(kind.src))} -> ${quote(path.dirname(kind.dest))}`
    case 'delete':
      return `Delete ${quote(path.basename(kind.path))}`
    case 'create-file':
    case 'create-directory':
      return `Create ${quote(kind.path)}`
    case 'chmod':
      return `Chmod ${quote(path.basename(kind.path))} to ${kind.mode.toString(8)}`
    case 'chown':
      return `Chown ${quote(path.basename(kind.path))} to ${kind.owner}`
    case 'unmount':
      return `Unmount ${quote(kind.path)}`
    case 'archive':
      return `Archive ${kind.paths.length} items to ${quote(kind.dest)}`
  }
}

function request(kind: TaskKind): TaskRequest {
  return { kind, description: describeTaskKind(kind) }
}

/**
 * 粘贴剪贴板：每个源路径生成一个复制或移动任务，
 * 目标为 destination 下的同名条目。
 */
export function pasteRequests(clipboard: Clipboard, destination: string): TaskRequest[] {
  const { mode } = clipboard
  if (!mode) return []

  return clipboard.paths.map(src => {
    const dest = path.join(destination, path.basename(src))
    return request(mode === 'copy' ? { type: 'copy', src, dest } : { type: 'move', src, dest })
  })
}

export function deleteRequest(targetPath: string): TaskRequest {
  return request({ type: 'delete', path: targetPath })
}

export function createRequest(dir: string, name: string, itemType: CreateItemType): TaskRequest {
  const itemPath = path.join(dir, name)
  return request(
    itemType === 'file'
      ? { type: 'create-file', path: itemPath }
      : { type: 'create-directory', path: itemPath }
  )
}

// 重命名即移动到同一目录下的新名称
export function renameRequest(oldPath: string, newName: string): TaskRequest {
  const newPath = path.join(path.dirname(oldPath), newName)
  return {
    kind: { type: 'move', src: oldPath, dest: newPath },
    description: `Rename ${quote(oldPath)} to ${quote(newPath)}`
  }
}

export function chmodRequest(targetPath: string, mode: number): TaskRequest {
  return request({ type: 'chmod', path: targetPath, mode })
}

export function chownRequest(targetPath: string, owner: string): TaskRequest {
  return request({ type: 'chown', path: targetPath, owner })
}

export function unmountRequest(mountPath: string): TaskRequest {
  return request({ type: 'unmount', path: mountPath })
}

export function archiveRequest(
  paths: string[],
  dir: string,
  archiveName: string,
  format: string
): TaskRequest {
  if (!archiveName) {
    throw new Error('压缩包名称不能为空')
  }
  if (paths.length === 0) {
    throw new Error('没有选择要压缩的文件')
  }

  const dest = path.join(dir, `${archiveName}${archiveExtension(format)}`)
  return request({ type: 'archive', paths: [...paths], dest, format })
}

export function submitRequests(taskManager: TaskManager, requests: TaskRequest[]): TaskId[] {
  return requests.map(({ kind, description }) => taskManager.addTask(kind, description))
}

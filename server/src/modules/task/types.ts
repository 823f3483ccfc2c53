export type TaskId = string

export type ArchiveFormat = 'zip' | 'tar' | 'tar.gz'

export const ARCHIVE_FORMATS: readonly ArchiveFormat[] = ['zip', 'tar', 'tar.gz']

// 任务类型：每种操作携带执行所需的参数
export type TaskKind =
  | { type: 'copy'; src: string; dest: string }
  | { type: 'move'; src: string; dest: string }
  | { type: 'delete'; path: string }
  | { type: 'create-file'; path: string }
  | { type: 'create-directory'; path: string }
  | { type: 'chmod'; path: string; mode: number }
  | { type: 'chown'; path: string; owner: string }
  | { type: 'unmount'; path: string }
  // format 保留原始字符串，不支持的格式由执行器报告失败
  | { type: 'archive'; paths: string[]; dest: string; format: string }

export type TaskKindType = TaskKind['type']

export type TaskStatus =
  | { state: 'pending' }
  | { state: 'in-progress'; progress: number }
  | { state: 'completed' }
  | { state: 'failed'; reason: string }

export interface Task {
  id: TaskId
  kind: TaskKind
  status: TaskStatus
  description: string
  createdAt: Date
  updatedAt: Date
}

export type ProgressEvent =
  | { type: 'update'; progress: number }
  | { type: 'completed' }
  | { type: 'error'; message: string }

export interface ProgressMessage {
  taskId: TaskId
  event: ProgressEvent
}

export function isTerminal(status: TaskStatus): boolean {
  return status.state === 'completed' || status.state === 'failed'
}

export function isArchiveFormat(format: string): format is ArchiveFormat {
  return ARCHIVE_FORMATS.some(candidate => candidate === format)
}
